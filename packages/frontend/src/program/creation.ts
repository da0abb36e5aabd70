/**
 * Program creation
 */

import ts from "typescript";
import * as path from "node:path";
import * as fs from "node:fs";
import { type Result, ok, error, map } from "../types/result.js";
import {
  type Diagnostic,
  type DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
} from "../types/diagnostic.js";
import type { AnalysisProgram, ProjectOptions } from "./types.js";
import { defaultTsConfig, withAnalysisOverrides } from "./config.js";
import { convertTsDiagnostic } from "./diagnostics.js";

type ProjectInputs = {
  readonly rootNames: readonly string[];
  readonly options: ts.CompilerOptions;
};

const failWith = <T>(
  diagnostics: readonly Diagnostic[]
): Result<T, DiagnosticsCollector> =>
  error(diagnostics.reduce(addDiagnostic, createDiagnosticsCollector()));

/**
 * Read compiler options (and the file list) from a tsconfig.json
 */
export const readTsConfig = (
  configPath: string
): Result<ProjectInputs, DiagnosticsCollector> => {
  if (!fs.existsSync(configPath)) {
    return failWith([
      createDiagnostic(
        "RVS9001",
        "error",
        `tsconfig.json not found: ${configPath}`
      ),
    ]);
  }

  const read = ts.readConfigFile(configPath, ts.sys.readFile);
  if (read.error) {
    return failWith([
      createDiagnostic(
        "RVS9002",
        "error",
        `Failed to read ${configPath}: ${ts.flattenDiagnosticMessageText(read.error.messageText, "\n")}`
      ),
    ]);
  }

  const parsed = ts.parseJsonConfigFileContent(
    read.config,
    ts.sys,
    path.dirname(configPath),
    undefined,
    configPath
  );

  // "No inputs were found" only matters when no explicit files are given
  const errors = parsed.errors.filter((e) => e.code !== 18003);
  if (errors.length > 0) {
    return failWith(
      errors.map((e) =>
        createDiagnostic(
          "RVS9003",
          "error",
          `Invalid ${path.basename(configPath)}: ${ts.flattenDiagnosticMessageText(e.messageText, "\n")}`
        )
      )
    );
  }

  return ok({
    rootNames: parsed.fileNames,
    options: withAnalysisOverrides(parsed.options),
  });
};

const resolveInputs = (
  options: ProjectOptions
): Result<ProjectInputs, DiagnosticsCollector> => {
  const cwd = options.cwd ?? process.cwd();
  const explicitFiles = (options.files ?? []).map((f) => path.resolve(cwd, f));

  const base: Result<ProjectInputs, DiagnosticsCollector> =
    options.tsconfigPath !== undefined
      ? readTsConfig(path.resolve(cwd, options.tsconfigPath))
      : ok({ rootNames: [], options: defaultTsConfig });

  return map(base, (inputs) =>
    explicitFiles.length > 0 ? { ...inputs, rootNames: explicitFiles } : inputs
  );
};

/**
 * Create a TypeScript program for analysis
 */
export const createProgram = (
  options: ProjectOptions
): Result<AnalysisProgram, DiagnosticsCollector> => {
  const inputs = resolveInputs(options);
  if (!inputs.ok) {
    return inputs;
  }

  const { rootNames, options: compilerOptions } = inputs.value;

  if (rootNames.length === 0) {
    return failWith([
      createDiagnostic(
        "RVS9004",
        "error",
        "No source files to analyze",
        undefined,
        "Pass files on the command line or point 'tsconfig' at a project"
      ),
    ]);
  }

  const missing = rootNames.filter((name) => !fs.existsSync(name));
  if (missing.length > 0) {
    return failWith(
      missing.map((name) =>
        createDiagnostic("RVS9005", "error", `Source file not found: ${name}`)
      )
    );
  }

  if (options.verbose) {
    console.error(`Analyzing ${rootNames.length} file(s)`);
  }

  const program = ts.createProgram({
    rootNames,
    options: compilerOptions,
  });

  const optionErrors = program
    .getOptionsDiagnostics()
    .map(convertTsDiagnostic)
    .filter((d): d is Diagnostic => d !== null && d.severity === "error");
  if (optionErrors.length > 0) {
    return failWith(
      optionErrors.map((d) => ({ ...d, code: "RVS9006" as const }))
    );
  }

  const sourceFiles = rootNames
    .map((name) => program.getSourceFile(name))
    .filter(
      (sf): sf is ts.SourceFile => sf !== undefined && !sf.isDeclarationFile
    );

  return ok({
    program,
    checker: program.getTypeChecker(),
    sourceFiles,
  });
};
