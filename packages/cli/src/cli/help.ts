/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
recname - record names for TypeScript types v${VERSION}

USAGE:
  recname <command> [options]

COMMANDS:
  init                      Create a recname.json in the current directory
  resolve [files...]        Print the record names declared in TypeScript files
  name <Type>               Resolve the record name of a type described by hand

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: recname.json)
  --json                    Print JSON

RESOLVE OPTIONS:
  -s, --src <dir>           Source root directory
  -n, --namespace <ns>      Root namespace override
  --exported-only           Only exported top-level declarations

NAME OPTIONS:
  --owner <path>            Dotted owner path of the type
  -a, --arg <Type>          Type argument, repeatable, in declaration order
  --record-name <name>      Name override
  --record-namespace <ns>   Namespace override
  --erased                  Leave type arguments out of the name

EXAMPLES:
  recname init -n com.acme
  recname resolve src/models/pair.ts
  recname resolve --json --exported-only
  recname name Pair --owner com.acme -a number -a string
`);
};
