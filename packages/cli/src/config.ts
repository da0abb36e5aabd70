/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { basename, join, resolve, dirname } from "node:path";
import { isCycleGuardMode } from "@valuesem/engine";
import { type Result, ok, error, flatMap } from "@valuesem/frontend";
import type { CliOptions, ResolvedConfig, ValuesemConfig } from "./types.js";

export const CONFIG_FILE_NAME = "valuesem.json";

const CONFIG_FIELDS: ReadonlySet<string> = new Set([
  "$schema",
  "tsconfig",
  "files",
  "ignoreTypes",
  "warningsAsErrors",
  "cycleGuard",
  "typeCheck",
]);

const isString = (value: unknown): value is string =>
  typeof value === "string";

const isBoolean = (value: unknown): value is boolean =>
  typeof value === "boolean";

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every(isString);

/**
 * Validate the parsed contents of a config file
 */
export const parseConfig = (
  value: unknown,
  fileName: string = CONFIG_FILE_NAME
): Result<ValuesemConfig, string> => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return error(`${fileName}: expected a JSON object`);
  }

  const fields = new Map<string, unknown>(Object.entries(value));
  const problems: string[] = [];

  for (const name of fields.keys()) {
    if (!CONFIG_FIELDS.has(name)) {
      problems.push(`unknown field '${name}'`);
    }
  }

  const field = <T>(
    name: keyof ValuesemConfig,
    isValid: (candidate: unknown) => candidate is T,
    expected: string
  ): T | undefined => {
    const candidate = fields.get(name);
    if (candidate === undefined) {
      return undefined;
    }
    if (isValid(candidate)) {
      return candidate;
    }
    problems.push(`'${name}' must be ${expected}`);
    return undefined;
  };

  const config: ValuesemConfig = {
    $schema: field("$schema", isString, "a string"),
    tsconfig: field("tsconfig", isString, "a string"),
    files: field("files", isStringArray, "an array of strings"),
    ignoreTypes: field("ignoreTypes", isStringArray, "an array of strings"),
    warningsAsErrors: field("warningsAsErrors", isBoolean, "a boolean"),
    cycleGuard: field("cycleGuard", isCycleGuardMode, `"call" or "path"`),
    typeCheck: field("typeCheck", isBoolean, "a boolean"),
  };

  return problems.length > 0
    ? error(`${fileName}: ${problems.join("; ")}`)
    : ok(config);
};

const readJson = (filePath: string): Result<unknown, string> => {
  try {
    const content = readFileSync(filePath, "utf-8");
    const value: unknown = JSON.parse(content);
    return ok(value);
  } catch (err) {
    return error(
      `Failed to parse ${basename(filePath)}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
};

/**
 * Load and validate a valuesem.json
 */
export const loadConfig = (
  configPath: string
): Result<ValuesemConfig, string> => {
  if (!existsSync(configPath)) {
    return error(`Config file not found: ${configPath}`);
  }

  return flatMap(readJson(configPath), (value) =>
    parseConfig(value, basename(configPath))
  );
};

/**
 * Find valuesem.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args.
 * Paths from the file are relative to projectRoot, paths from the
 * command line to cwd.
 */
export const resolveConfig = (
  config: ValuesemConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  cliFiles: readonly string[] = [],
  cwd: string = projectRoot
): Result<ResolvedConfig, string> => {
  const cycleGuard = cliOptions.guard ?? config.cycleGuard ?? "call";
  if (!isCycleGuardMode(cycleGuard)) {
    return error(
      `Invalid cycle guard '${cycleGuard}' (expected "call" or "path")`
    );
  }

  const tsconfigPath =
    cliOptions.project !== undefined
      ? resolve(cwd, cliOptions.project)
      : config.tsconfig !== undefined
        ? resolve(projectRoot, config.tsconfig)
        : undefined;

  const files =
    cliFiles.length > 0
      ? cliFiles.map((file) => resolve(cwd, file))
      : (config.files ?? []).map((file) => resolve(projectRoot, file));

  return ok({
    projectRoot,
    tsconfigPath,
    files,
    ignoreTypes: config.ignoreTypes ?? [],
    warningsAsErrors:
      cliOptions.warningsAsErrors ?? config.warningsAsErrors ?? false,
    cycleGuard,
    typeCheck: cliOptions.typeCheck ?? config.typeCheck ?? false,
    json: cliOptions.json ?? false,
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  });
};
