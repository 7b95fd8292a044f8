/**
 * recname frontend - record names from TypeScript source
 */

export type { FrontendOptions, RecnameProgram } from "./program/types.js";
export { defaultTsConfig } from "./program/config.js";
export { createProgram } from "./program/creation.js";
export {
  collectTsDiagnostics,
  convertTsDiagnostic,
  getSourceLocation,
  getNodeLocation,
} from "./program/diagnostics.js";
export { getNamespaceFromPath } from "./naming/namespace.js";
export {
  getOwnerPath,
  typeScriptOwnerPathNormalizer,
} from "./naming/owner-path.js";
export {
  type RecordDeclaration,
  isRecordDeclaration,
  describeDeclaration,
  describeType,
  describeTypeNode,
} from "./naming/describe.js";
export {
  type AnnotationScan,
  ANNOTATIONS_IMPORT_SPECIFIER,
  ANNOTATIONS_EXPORT_NAME,
  scanAnnotations,
  getDeclarationAnnotations,
} from "./annotations/scanner.js";
export * from "./records.js";

import {
  DiagnosticsCollector,
  Result,
  flatMap,
} from "@recname/core";
import { createProgram } from "./program/creation.js";
import type { FrontendOptions } from "./program/types.js";
import { RecordNameEntry, resolveProgramRecords } from "./records.js";

/**
 * Main entry point: resolve the record names declared in TypeScript files
 */
export const resolveFiles = (
  filePaths: readonly string[],
  options: FrontendOptions
): Result<readonly RecordNameEntry[], DiagnosticsCollector> =>
  flatMap(createProgram(filePaths, options), resolveProgramRecords);
