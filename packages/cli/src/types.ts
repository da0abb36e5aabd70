/**
 * Type definitions for CLI
 */

import type { CycleGuardMode } from "@valuesem/engine";

/**
 * valuesem configuration file (valuesem.json)
 */
export type ValuesemConfig = {
  readonly $schema?: string;
  /** tsconfig.json supplying compiler options and the file list */
  readonly tsconfig?: string;
  /** Files to analyze instead of the tsconfig file list */
  readonly files?: readonly string[];
  /** Record names never analyzed */
  readonly ignoreTypes?: readonly string[];
  readonly warningsAsErrors?: boolean;
  readonly cycleGuard?: CycleGuardMode;
  /** Also report TypeScript errors */
  readonly typeCheck?: boolean;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  project?: string;
  json?: boolean;
  warningsAsErrors?: boolean;
  guard?: string; // Validated when the config is resolved
  typeCheck?: boolean;
};

/**
 * Combined configuration (from file + CLI args).
 * Paths are absolute.
 */
export type ResolvedConfig = {
  readonly projectRoot: string; // Directory containing valuesem.json
  readonly tsconfigPath: string | undefined;
  readonly files: readonly string[];
  readonly ignoreTypes: readonly string[];
  readonly warningsAsErrors: boolean;
  readonly cycleGuard: CycleGuardMode;
  readonly typeCheck: boolean;
  readonly json: boolean;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
