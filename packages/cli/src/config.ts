/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import { Result, error, ok } from "@recname/core";
import type { RecnameConfig, CliOptions, ResolvedConfig } from "./types.js";

export const CONFIG_FILE_NAME = "recname.json";

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((v) => typeof v === "string");

/**
 * Check the shape of a parsed recname.json
 */
export const validateConfig = (
  value: unknown
): Result<RecnameConfig, string> => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return error(`${CONFIG_FILE_NAME}: must be an object`);
  }

  const rootNamespace: unknown = Reflect.get(value, "rootNamespace");
  if (typeof rootNamespace !== "string") {
    return error(`${CONFIG_FILE_NAME}: 'rootNamespace' is required`);
  }

  const sourceRoot: unknown = Reflect.get(value, "sourceRoot");
  if (sourceRoot !== undefined && typeof sourceRoot !== "string") {
    return error(`${CONFIG_FILE_NAME}: 'sourceRoot' must be a string`);
  }

  const entryPoints: unknown = Reflect.get(value, "entryPoints");
  if (entryPoints !== undefined && !isStringArray(entryPoints)) {
    return error(
      `${CONFIG_FILE_NAME}: 'entryPoints' must be an array of strings`
    );
  }

  const exportedOnly: unknown = Reflect.get(value, "exportedOnly");
  if (exportedOnly !== undefined && typeof exportedOnly !== "boolean") {
    return error(`${CONFIG_FILE_NAME}: 'exportedOnly' must be a boolean`);
  }

  return ok({ rootNamespace, sourceRoot, entryPoints, exportedOnly });
};

/**
 * Load recname.json
 */
export const loadConfig = (
  configPath: string
): Result<RecnameConfig, string> => {
  if (!existsSync(configPath)) {
    return error(`Config file not found: ${configPath}`);
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    return validateConfig(JSON.parse(content));
  } catch (err) {
    return error(
      `Failed to parse ${CONFIG_FILE_NAME}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
};

/**
 * Find recname.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      // Hit root
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args.
 * Relative paths are taken from the project root.
 *
 * @param files - Files named on the command line, replacing `entryPoints`
 */
export const resolveConfig = (
  config: RecnameConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  files: readonly string[] = []
): ResolvedConfig => {
  const sourceRoot = resolve(
    projectRoot,
    cliOptions.src ?? config.sourceRoot ?? "src"
  );

  const entryPoints =
    files.length > 0
      ? files.map((f) => resolve(f))
      : (config.entryPoints ?? []).map((f) => resolve(projectRoot, f));

  return {
    rootNamespace: cliOptions.namespace ?? config.rootNamespace,
    projectRoot,
    sourceRoot,
    entryPoints,
    exportedOnly: cliOptions.exportedOnly ?? config.exportedOnly ?? false,
    json: cliOptions.json ?? false,
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};
