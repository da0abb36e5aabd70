/**
 * valuesem init command
 */

import { writeFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { type Result, ok, error } from "@valuesem/frontend";
import { CONFIG_FILE_NAME } from "../config.js";
import type { ValuesemConfig } from "../types.js";

/**
 * Starter config. Points at tsconfig.json when the project has one,
 * otherwise lists the files to analyze.
 */
export const createDefaultConfig = (hasTsconfig: boolean): ValuesemConfig =>
  hasTsconfig
    ? {
        tsconfig: "tsconfig.json",
        ignoreTypes: [],
        warningsAsErrors: false,
        cycleGuard: "call",
      }
    : {
        files: ["src/index.ts"],
        ignoreTypes: [],
        warningsAsErrors: false,
        cycleGuard: "call",
      };

/**
 * Write valuesem.json into a directory; returns the path written
 */
export const initProject = (cwd: string): Result<string, string> => {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (existsSync(configPath)) {
    return error(`${CONFIG_FILE_NAME} already exists`);
  }

  const config = createDefaultConfig(existsSync(join(cwd, "tsconfig.json")));

  try {
    writeFileSync(configPath, JSON.stringify(config, null, 2) + "\n", "utf-8");
    return ok(configPath);
  } catch (err) {
    return error(
      `Failed to write ${CONFIG_FILE_NAME}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
};
