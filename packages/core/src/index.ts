/**
 * recname core - record name resolution
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  mergeDiagnostics,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./descriptor.js";
export * from "./overrides.js";
export * from "./resolved-name.js";
export * from "./owner-path.js";
export * from "./resolver.js";
