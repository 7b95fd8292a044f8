/**
 * CLI argument parsing and command dispatch
 */

export { VERSION, showHelp, parseArgs, runCli } from "./cli/index.js";
