/**
 * valuesem check command - analyze records and report findings
 */

import {
  type Diagnostic,
  type DiagnosticsCollector,
  type Result,
  analyzeProject,
  formatDiagnostic,
} from "@valuesem/frontend";
import type { ResolvedConfig } from "../types.js";

export type CheckSummary = {
  readonly errors: number;
  readonly warnings: number;
};

export const summarize = (
  diagnostics: readonly Diagnostic[]
): CheckSummary => ({
  errors: diagnostics.filter((d) => d.severity === "error").length,
  warnings: diagnostics.filter((d) => d.severity === "warning").length,
});

/**
 * Output lines for a set of diagnostics: one line per diagnostic, or a
 * single JSON document
 */
export const formatReport = (
  diagnostics: readonly Diagnostic[],
  json: boolean
): readonly string[] =>
  json
    ? [JSON.stringify({ diagnostics, ...summarize(diagnostics) }, null, 2)]
    : diagnostics.map(formatDiagnostic);

export const formatSummary = (summary: CheckSummary): string =>
  summary.errors === 0 && summary.warnings === 0
    ? "✓ No value semantics problems found"
    : `✗ Found ${summary.errors} error(s) and ${summary.warnings} warning(s)`;

/**
 * Run the analysis and print the report. The error branch holds project
 * loading failures.
 */
export const checkCommand = (
  config: ResolvedConfig
): Result<DiagnosticsCollector, DiagnosticsCollector> => {
  if (config.verbose) {
    console.error(`Project root: ${config.projectRoot}`);
    if (config.tsconfigPath) {
      console.error(`Using ${config.tsconfigPath}`);
    }
    console.error(`Cycle guard: ${config.cycleGuard}`);
  }

  const result = analyzeProject(
    {
      tsconfigPath: config.tsconfigPath,
      files: config.files,
      cwd: config.projectRoot,
      verbose: config.verbose,
    },
    {
      ignoreTypes: config.ignoreTypes,
      cycleGuard: config.cycleGuard,
      warningsAsErrors: config.warningsAsErrors,
      typeCheck: config.typeCheck,
    }
  );

  if (!result.ok) {
    for (const line of formatReport(result.error.diagnostics, config.json)) {
      console.error(line);
    }
    return result;
  }

  const { diagnostics } = result.value;
  for (const line of formatReport(diagnostics, config.json)) {
    console.log(line);
  }

  if (!config.json && !config.quiet) {
    console.log(formatSummary(summarize(diagnostics)));
  }

  return result;
};
