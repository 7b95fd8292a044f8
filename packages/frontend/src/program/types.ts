/**
 * Program type definitions
 */

import * as ts from "typescript";
import type { OwnerPathNormalizer } from "@recname/core";

export type FrontendOptions = {
  /** Directory namespaces are computed relative to */
  readonly sourceRoot: string;
  /** Prefix of every derived namespace, may be empty */
  readonly rootNamespace: string;
  /** Only resolve exported top-level declarations */
  readonly exportedOnly?: boolean;
  readonly verbose?: boolean;
  /** Defaults to the normalizer for the markers this front end emits */
  readonly normalizeOwnerPath?: OwnerPathNormalizer;
};

export type RecnameProgram = {
  readonly program: ts.Program;
  readonly checker: ts.TypeChecker;
  readonly options: FrontendOptions;
  readonly sourceFiles: readonly ts.SourceFile[];
};
