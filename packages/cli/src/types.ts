/**
 * Type definitions for CLI
 */

/**
 * recname configuration file (recname.json)
 */
export type RecnameConfig = {
  readonly $schema?: string;
  readonly rootNamespace: string;
  readonly sourceRoot?: string;
  readonly entryPoints?: readonly string[];
  readonly exportedOnly?: boolean;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  src?: string;
  namespace?: string; // Root namespace override
  exportedOnly?: boolean;
  json?: boolean;
  // name command
  owner?: string;
  typeArguments?: string[];
  recordName?: string;
  recordNamespace?: string;
  erased?: boolean;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly rootNamespace: string;
  readonly projectRoot: string; // Directory containing recname.json
  readonly sourceRoot: string; // Absolute
  readonly entryPoints: readonly string[]; // Absolute
  readonly exportedOnly: boolean;
  readonly json: boolean;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

export type ParsedArgs = {
  readonly command: string;
  readonly positionals: readonly string[];
  readonly options: CliOptions;
};
