/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import type { DiagnosticsCollector } from "@valuesem/frontend";
import {
  CONFIG_FILE_NAME,
  loadConfig,
  findConfig,
  resolveConfig,
} from "../config.js";
import { initProject } from "../commands/init.js";
import { checkCommand } from "../commands/check.js";
import type { ValuesemConfig } from "../types.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_ERRORS = 2;
export const EXIT_NO_INPUT = 3;

const loadFailureExitCode = (failures: DiagnosticsCollector): number =>
  failures.diagnostics.some((d) => d.code === "RVS9004")
    ? EXIT_NO_INPUT
    : EXIT_USAGE;

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`valuesem v${VERSION}`);
    return EXIT_OK;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_OK;
  }

  if (parsed.unknownOptions.length > 0) {
    console.error(`Error: Unknown option '${parsed.unknownOptions[0]}'`);
    console.error("Run 'valuesem --help' for usage information");
    return EXIT_USAGE;
  }

  // Handle init (doesn't need config)
  if (parsed.command === "init") {
    const result = initProject(cwd);
    if (!result.ok) {
      console.error(`Error: ${result.error}`);
      return EXIT_USAGE;
    }
    if (!parsed.options.quiet) {
      console.log(`✓ Created ${result.value}`);
    }
    return EXIT_OK;
  }

  if (parsed.command !== "check") {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'valuesem --help' for usage information");
    return EXIT_USAGE;
  }

  // Load config
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  // Without a config file, files or a project on the command line suffice
  const canRunWithoutConfig =
    parsed.files.length > 0 || parsed.options.project !== undefined;

  if (!configPath && !canRunWithoutConfig) {
    console.error(`Error: No ${CONFIG_FILE_NAME} found`);
    console.error("Run 'valuesem init' or pass files to check");
    return EXIT_NO_INPUT;
  }

  let fileConfig: ValuesemConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(`Error: ${configResult.error}`);
      return EXIT_USAGE;
    }
    fileConfig = configResult.value;
  }

  // Project root is the directory containing valuesem.json
  const projectRoot = configPath ? dirname(configPath) : cwd;

  const config = resolveConfig(
    fileConfig,
    parsed.options,
    projectRoot,
    parsed.files,
    cwd
  );
  if (!config.ok) {
    console.error(`Error: ${config.error}`);
    return EXIT_USAGE;
  }

  const result = checkCommand(config.value);
  if (!result.ok) {
    return loadFailureExitCode(result.error);
  }
  return result.value.hasErrors ? EXIT_ERRORS : EXIT_OK;
};
