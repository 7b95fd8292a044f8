/**
 * TypeScript diagnostics collection and conversion
 */

import * as ts from "typescript";
import {
  Diagnostic,
  DiagnosticsCollector,
  SourceLocation,
  createDiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
} from "@recname/core";

/**
 * Collect the diagnostics that stop declarations from being read.
 *
 * Semantic errors are left out: an unresolved import or a type error does
 * not change a declaration's name or owner.
 */
export const collectTsDiagnostics = (
  program: ts.Program
): DiagnosticsCollector => {
  const tsDiagnostics = [
    ...program.getOptionsDiagnostics(),
    ...program.getSyntacticDiagnostics(),
  ];

  return tsDiagnostics.reduce((collector, tsDiag) => {
    const diagnostic = convertTsDiagnostic(tsDiag);
    return diagnostic ? addDiagnostic(collector, diagnostic) : collector;
  }, createDiagnosticsCollector());
};

/**
 * Convert TypeScript diagnostic to a recname diagnostic
 */
export const convertTsDiagnostic = (
  tsDiag: ts.Diagnostic
): Diagnostic | null => {
  if (tsDiag.category === ts.DiagnosticCategory.Suggestion) {
    return null;
  }

  const severity =
    tsDiag.category === ts.DiagnosticCategory.Error
      ? "error"
      : tsDiag.category === ts.DiagnosticCategory.Warning
        ? "warning"
        : "info";

  const message = ts.flattenDiagnosticMessageText(tsDiag.messageText, "\n");

  const location =
    tsDiag.file && tsDiag.start !== undefined
      ? getSourceLocation(tsDiag.file, tsDiag.start, tsDiag.length ?? 1)
      : undefined;

  return createDiagnostic("RN2001", severity, message, location);
};

/**
 * Get source location information from TypeScript source file
 */
export const getSourceLocation = (
  file: ts.SourceFile,
  start: number,
  length: number
): SourceLocation => {
  const { line, character } = file.getLineAndCharacterOfPosition(start);
  return {
    file: file.fileName,
    line: line + 1,
    column: character + 1,
    length,
  };
};

export const getNodeLocation = (node: ts.Node): SourceLocation => {
  const sourceFile = node.getSourceFile();
  const start = node.getStart(sourceFile);
  return getSourceLocation(sourceFile, start, node.getEnd() - start);
};
