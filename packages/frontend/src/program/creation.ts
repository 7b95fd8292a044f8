/**
 * Program creation
 */

import * as ts from "typescript";
import * as path from "node:path";
import * as fs from "node:fs";
import {
  Result,
  ok,
  error,
  DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
} from "@recname/core";
import { FrontendOptions, RecnameProgram } from "./types.js";
import { defaultTsConfig } from "./config.js";
import { collectTsDiagnostics } from "./diagnostics.js";

/**
 * Create a program over the given TypeScript source files.
 *
 * @param host - Compiler host to read files through, defaults to the file system
 */
export const createProgram = (
  filePaths: readonly string[],
  options: FrontendOptions,
  host?: ts.CompilerHost
): Result<RecnameProgram, DiagnosticsCollector> => {
  const absolutePaths = filePaths.map((fp) => path.resolve(fp));

  const missing = absolutePaths
    .filter((fp) => !(host ? host.fileExists(fp) : fs.existsSync(fp)))
    .reduce(
      (collector, fp) =>
        addDiagnostic(
          collector,
          createDiagnostic("RN2002", "error", `Source file not found: ${fp}`)
        ),
      createDiagnosticsCollector()
    );

  if (missing.hasErrors) {
    return error(missing);
  }

  if (options.verbose) {
    console.log(`Source root: ${path.resolve(options.sourceRoot)}`);
    for (const fp of absolutePaths) {
      console.log(`  Reading ${fp}`);
    }
  }

  const program = ts.createProgram(
    absolutePaths,
    defaultTsConfig,
    host ?? ts.createCompilerHost(defaultTsConfig)
  );

  const diagnostics = collectTsDiagnostics(program);

  if (diagnostics.hasErrors) {
    return error(diagnostics);
  }

  // Keep the order the files were given in
  const sourceFiles = absolutePaths
    .map((fp) => program.getSourceFile(fp))
    .filter((sf): sf is ts.SourceFile => sf !== undefined);

  return ok({
    program,
    checker: program.getTypeChecker(),
    options,
    sourceFiles,
  });
};
