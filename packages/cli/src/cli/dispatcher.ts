/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { initProject } from "../commands/init.js";
import { resolveCommand } from "../commands/resolve.js";
import { nameCommand } from "../commands/name.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

/**
 * Main CLI entry point
 */
export const runCli = async (args: string[]): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`recname v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  // Handle init (doesn't need config)
  if (parsed.command === "init") {
    const result = initProject(process.cwd(), {
      rootNamespace: parsed.options.namespace,
      quiet: parsed.options.quiet,
    });
    if (!result.ok) {
      console.error(`Error: ${result.error}`);
      return 1;
    }
    return 0;
  }

  // Handle name (describes its type on the command line)
  if (parsed.command === "name") {
    const result = nameCommand(parsed.positionals[0], parsed.options);
    if (!result.ok) {
      console.error(`Error: ${result.error}`);
      console.error(
        "Usage: recname name <Type> [--owner <path>] [-a <Type>]..."
      );
      return 1;
    }
    return 0;
  }

  if (parsed.command !== "resolve") {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'recname --help' for usage information");
    return 2;
  }

  // Load config
  const configPath = parsed.options.config
    ? resolve(process.cwd(), parsed.options.config)
    : findConfig(process.cwd());

  if (!configPath) {
    console.error("Error: No recname.json found");
    console.error("Run 'recname init' to initialize a project");
    return 3;
  }

  if (parsed.options.verbose) {
    console.log(`Using config: ${configPath}`);
  }

  const configResult = loadConfig(configPath);
  if (!configResult.ok) {
    console.error(`Error: ${configResult.error}`);
    return 1;
  }

  // Project root is the directory containing recname.json
  const config = resolveConfig(
    configResult.value,
    parsed.options,
    dirname(configPath),
    parsed.positionals
  );

  const result = resolveCommand(config);
  if (!result.ok) {
    console.error(result.error);
    return 4;
  }
  return 0;
};
