/**
 * recname resolve command
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  Result,
  createTypeDescriptor,
  error,
  formatDiagnostic,
  formatTypeDescriptor,
  ok,
} from "@recname/core";
import { RecordNameEntry, resolveFiles } from "@recname/frontend";
import type { ResolvedConfig } from "../types.js";

export type RecordNameRow = {
  readonly file: string;
  readonly line: number;
  readonly declaration: string;
  readonly namespace: string;
  readonly name: string;
  readonly fullName: string;
};

const isSourceFile = (name: string): boolean =>
  (name.endsWith(".ts") || name.endsWith(".tsx")) && !name.endsWith(".d.ts");

/**
 * Recursively scan a directory for TypeScript sources, in a stable order
 */
export const collectSourceFiles = (dir: string): readonly string[] => {
  if (!fs.existsSync(dir)) {
    return [];
  }

  const results: string[] = [];
  const entries = fs
    .readdirSync(dir, { withFileTypes: true })
    .sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name !== "node_modules" && !entry.name.startsWith(".")) {
        results.push(...collectSourceFiles(fullPath));
      }
    } else if (isSourceFile(entry.name)) {
      results.push(fullPath);
    }
  }

  return results;
};

export const toRow = (
  entry: RecordNameEntry,
  projectRoot: string
): RecordNameRow => ({
  file: path
    .relative(projectRoot, entry.location.file)
    .replace(/\\/g, "/"),
  line: entry.location.line,
  declaration: formatTypeDescriptor(
    createTypeDescriptor(
      entry.descriptor.shortName,
      "",
      entry.descriptor.typeArguments
    )
  ),
  namespace: entry.resolved.namespace,
  name: entry.resolved.name,
  fullName: entry.resolved.fullName,
});

/**
 * One line per record: full name, then where it is declared
 */
export const formatRows = (rows: readonly RecordNameRow[]): readonly string[] => {
  const width = Math.max(0, ...rows.map((r) => r.fullName.length));
  return rows.map(
    (r) => `${r.fullName.padEnd(width)}  ${r.file}:${r.line}  ${r.declaration}`
  );
};

/**
 * Resolve the record names of the configured files
 */
export const resolveRecords = (
  config: ResolvedConfig
): Result<readonly RecordNameRow[], string> => {
  const files =
    config.entryPoints.length > 0
      ? config.entryPoints
      : collectSourceFiles(config.sourceRoot);

  if (files.length === 0) {
    return error(`No TypeScript files found in ${config.sourceRoot}`);
  }

  if (config.verbose) {
    console.log(`Resolving ${files.length} file(s)`);
  }

  const result = resolveFiles(files, {
    sourceRoot: config.sourceRoot,
    rootNamespace: config.rootNamespace,
    exportedOnly: config.exportedOnly,
    verbose: config.verbose,
  });

  if (!result.ok) {
    return error(result.error.diagnostics.map(formatDiagnostic).join("\n"));
  }

  return ok(result.value.map((entry) => toRow(entry, config.projectRoot)));
};

export const resolveCommand = (config: ResolvedConfig): Result<void, string> => {
  const result = resolveRecords(config);
  if (!result.ok) {
    return result;
  }

  if (config.json) {
    console.log(JSON.stringify(result.value, null, 2));
  } else {
    for (const line of formatRows(result.value)) {
      console.log(line);
    }
    if (!config.quiet) {
      console.log(`\n✓ ${result.value.length} record name(s)`);
    }
  }

  return ok(undefined);
};
