/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
valuesem - value semantics checker for record declarations v${VERSION}

USAGE:
  valuesem <command> [options]

COMMANDS:
  check [files...]          Check every record in the project or in files
  init                      Create valuesem.json in the current directory

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Leave out the summary line
  -c, --config <file>       Config file path (default: valuesem.json)

CHECK OPTIONS:
  -p, --project <file>      tsconfig.json to analyze
  --json                    Print diagnostics as JSON
  --warnings-as-errors      Report findings as errors
  --guard <call|path>       Cycle guard mode (default: call)
  --type-check              Also report TypeScript errors

EXIT CODES:
  0  No errors
  1  Usage or configuration error
  2  Errors reported
  3  No config or no files to analyze

EXAMPLES:
  valuesem init
  valuesem check
  valuesem check src/orders.ts --warnings-as-errors
  valuesem check -p tsconfig.build.json --json
`);
};
