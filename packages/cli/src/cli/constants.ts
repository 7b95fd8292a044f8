/**
 * CLI constants
 */

import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

const packageJsonPath = fileURLToPath(
  new URL("../../package.json", import.meta.url)
);

const readVersion = (): string => {
  // Not present next to compiled output
  if (!existsSync(packageJsonPath)) {
    return "0.0.0";
  }
  const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
  const version: unknown =
    typeof packageJson === "object" && packageJson !== null
      ? Reflect.get(packageJson, "version")
      : undefined;
  return typeof version === "string" ? version : "0.0.0";
};

export const VERSION = readVersion();
