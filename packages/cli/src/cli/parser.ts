/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  readonly command: string;
  readonly files: readonly string[];
  readonly options: CliOptions;
  /** Options not recognized by the parser */
  readonly unknownOptions: readonly string[];
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  const files: string[] = [];
  const unknownOptions: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue; // Skip if undefined

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // Positional args after the command are files
    if (command && !arg.startsWith("-")) {
      files.push(arg);
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", files: [], options: {}, unknownOptions: [] };
      case "-v":
      case "--version":
        return {
          command: "version",
          files: [],
          options: {},
          unknownOptions: [],
        };
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
      case "-p":
      case "--project":
        options.project = args[++i] ?? "";
        break;
      case "--json":
        options.json = true;
        break;
      case "--warnings-as-errors":
        options.warningsAsErrors = true;
        break;
      case "--guard":
        options.guard = args[++i] ?? "";
        break;
      case "--type-check":
        options.typeCheck = true;
        break;
      default:
        unknownOptions.push(arg);
    }
  }

  return { command, files, options, unknownOptions };
};
