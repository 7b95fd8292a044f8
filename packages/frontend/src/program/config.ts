/**
 * TypeScript compiler configuration
 */

import * as ts from "typescript";

/**
 * Default TypeScript compiler options for reading record declarations.
 * Only syntax and symbols are needed, so nothing is emitted.
 */
export const defaultTsConfig: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.NodeNext,
  moduleResolution: ts.ModuleResolutionKind.NodeNext,
  strict: true,
  types: [],
  esModuleInterop: true,
  skipLibCheck: true,
  allowJs: false,
  noEmit: true,
  allowImportingTsExtensions: true,
};
