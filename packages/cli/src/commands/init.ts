/**
 * recname init command
 */

import { writeFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { Result, error, ok } from "@recname/core";
import { CONFIG_FILE_NAME } from "../config.js";
import type { RecnameConfig } from "../types.js";

type InitOptions = {
  readonly rootNamespace?: string;
  readonly quiet?: boolean;
};

export const generateConfig = (rootNamespace: string): string => {
  const config: RecnameConfig = {
    rootNamespace,
    sourceRoot: "src",
    entryPoints: [],
    exportedOnly: false,
  };
  return JSON.stringify(config, null, 2) + "\n";
};

/**
 * Write a default recname.json into `cwd`
 */
export const initProject = (
  cwd: string,
  options: InitOptions = {}
): Result<string, string> => {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (existsSync(configPath)) {
    return error(
      `${CONFIG_FILE_NAME} already exists. Project is already initialized.`
    );
  }

  writeFileSync(configPath, generateConfig(options.rootNamespace ?? ""), "utf-8");

  if (!options.quiet) {
    console.log(`✓ Created ${CONFIG_FILE_NAME}`);
  }
  return ok(configPath);
};
