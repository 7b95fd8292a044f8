/**
 * CLI argument parser
 */

import type { CliOptions, ParsedArgs } from "../types.js";

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue; // Skip if undefined

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // Positional args after command (files, or a type name)
    if (command && !arg.startsWith("-")) {
      positionals.push(arg);
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", positionals: [], options: {} };
      case "-v":
      case "--version":
        return { command: "version", positionals: [], options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-s":
      case "--src":
        options.src = args[++i] ?? "";
        break;
      case "-n":
      case "--namespace":
        options.namespace = args[++i] ?? "";
        break;
      case "--exported-only":
        options.exportedOnly = true;
        break;
      case "--json":
        options.json = true;
        break;
      case "--owner":
        options.owner = args[++i] ?? "";
        break;
      case "-a":
      case "--arg":
        {
          const typeArgument = args[++i] ?? "";
          if (typeArgument) {
            options.typeArguments = options.typeArguments || [];
            options.typeArguments.push(typeArgument);
          }
        }
        break;
      case "--record-name":
        options.recordName = args[++i] ?? "";
        break;
      case "--record-namespace":
        options.recordNamespace = args[++i] ?? "";
        break;
      case "--erased":
        options.erased = true;
        break;
    }
  }

  return { command, positionals, options };
};
