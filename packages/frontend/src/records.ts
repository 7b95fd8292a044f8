/**
 * Record name resolution over a whole program
 */

import * as ts from "typescript";
import {
  Diagnostic,
  DiagnosticsCollector,
  OverrideSet,
  ResolveOptions,
  ResolvedName,
  Result,
  SourceLocation,
  TypeDescriptor,
  addDiagnostic,
  createDiagnosticsCollector,
  error,
  extractOverrides,
  map,
  mergeDiagnostics,
  ok,
  resolveName,
} from "@recname/core";
import type { RecnameProgram } from "./program/types.js";
import { getNodeLocation } from "./program/diagnostics.js";
import {
  RecordDeclaration,
  describeDeclaration,
  describeType,
  isRecordDeclaration,
} from "./naming/describe.js";
import { typeScriptOwnerPathNormalizer } from "./naming/owner-path.js";
import {
  AnnotationScan,
  getDeclarationAnnotations,
  scanAnnotations,
} from "./annotations/scanner.js";

export type RecordDeclarationKind = "class" | "interface" | "typeAlias" | "enum";

export type RecordNameEntry = {
  readonly kind: RecordDeclarationKind;
  readonly location: SourceLocation;
  readonly descriptor: TypeDescriptor;
  readonly overrides: OverrideSet;
  readonly resolved: ResolvedName;
};

const declarationKind = (
  declaration: RecordDeclaration
): RecordDeclarationKind => {
  if (ts.isClassDeclaration(declaration)) return "class";
  if (ts.isInterfaceDeclaration(declaration)) return "interface";
  if (ts.isTypeAliasDeclaration(declaration)) return "typeAlias";
  return "enum";
};

const isExportedTopLevel = (declaration: RecordDeclaration): boolean =>
  ts.isSourceFile(declaration.parent) &&
  (ts.getCombinedModifierFlags(declaration) & ts.ModifierFlags.Export) !== 0;

/**
 * Record declarations of a file in source order, nested ones included.
 */
export const collectRecordDeclarations = (
  sourceFile: ts.SourceFile,
  exportedOnly: boolean
): readonly RecordDeclaration[] => {
  const declarations: RecordDeclaration[] = [];

  const visit = (node: ts.Node): void => {
    if (
      isRecordDeclaration(node) &&
      (!exportedOnly || isExportedTopLevel(node))
    ) {
      declarations.push(node);
    }
    ts.forEachChild(node, visit);
  };
  visit(sourceFile);

  return declarations;
};

const resolveOptions = (program: RecnameProgram): ResolveOptions => ({
  normalizeOwnerPath:
    program.options.normalizeOwnerPath ?? typeScriptOwnerPathNormalizer,
});

/**
 * Resolve the record name of a single declaration.
 */
export const resolveDeclarationName = (
  declaration: RecordDeclaration,
  program: RecnameProgram,
  scan: AnnotationScan
): Result<RecordNameEntry, Diagnostic> =>
  map(describeDeclaration(declaration, program), (descriptor) => {
    const overrides = extractOverrides(
      getDeclarationAnnotations(scan, declaration, program.checker)
    );
    return {
      kind: declarationKind(declaration),
      location: getNodeLocation(declaration),
      descriptor,
      overrides,
      resolved: resolveName(descriptor, overrides, resolveOptions(program)),
    };
  });

/**
 * Resolve the record name of a type as the checker sees it, for instance
 * the instantiation `Pair<number, string>` of an annotated class.
 */
export const resolveTypeName = (
  type: ts.Type,
  program: RecnameProgram,
  scan: AnnotationScan,
  location?: SourceLocation
): Result<ResolvedName, Diagnostic> =>
  map(describeType(type, program, location), (descriptor) => {
    const symbol = type.aliasSymbol ?? type.getSymbol();
    const annotations =
      symbol !== undefined ? (scan.annotations.get(symbol) ?? []) : [];
    return resolveName(
      descriptor,
      extractOverrides(annotations),
      resolveOptions(program)
    );
  });

/**
 * Resolve every record declaration in the program's source files.
 */
export const resolveProgramRecords = (
  program: RecnameProgram
): Result<readonly RecordNameEntry[], DiagnosticsCollector> => {
  const scan = scanAnnotations(program.sourceFiles, program.checker);
  const exportedOnly = program.options.exportedOnly ?? false;

  const entries: RecordNameEntry[] = [];
  let declarationDiagnostics = createDiagnosticsCollector();

  for (const sourceFile of program.sourceFiles) {
    for (const declaration of collectRecordDeclarations(
      sourceFile,
      exportedOnly
    )) {
      const result = resolveDeclarationName(declaration, program, scan);
      if (result.ok) {
        entries.push(result.value);
      } else {
        declarationDiagnostics = addDiagnostic(
          declarationDiagnostics,
          result.error
        );
      }
    }
  }

  if (program.options.verbose) {
    console.log(
      `Resolved ${entries.length} record name(s) in ${program.sourceFiles.length} file(s)`
    );
  }

  // Annotation problems are reported ahead of declaration problems
  const diagnostics = mergeDiagnostics(
    scan.diagnostics,
    declarationDiagnostics
  );
  return diagnostics.hasErrors ? error(diagnostics) : ok(entries);
};
