/**
 * Project analysis - program creation, optional type check, record checks
 */

import type { ProjectOptions } from "../program/types.js";
import { createProgram } from "../program/creation.js";
import { collectTsDiagnostics } from "../program/diagnostics.js";
import {
  type DiagnosticsCollector,
  mergeDiagnostics,
} from "../types/diagnostic.js";
import { type Result, map } from "../types/result.js";
import {
  analyzeRecords,
  type RecordAnalysisOptions,
} from "./record-analyzer.js";

export type AnalyzeOptions = RecordAnalysisOptions & {
  /** Also report TypeScript errors of the analyzed program */
  readonly typeCheck?: boolean;
};

/**
 * Analyze a project. The error branch holds loading failures only;
 * findings, including error-severity ones, are in the ok branch.
 */
export const analyzeProject = (
  project: ProjectOptions,
  options: AnalyzeOptions = {}
): Result<DiagnosticsCollector, DiagnosticsCollector> =>
  map(createProgram(project), (program) => {
    const findings = analyzeRecords(program, options);
    return options.typeCheck
      ? mergeDiagnostics(collectTsDiagnostics(program.program), findings)
      : findings;
  });
