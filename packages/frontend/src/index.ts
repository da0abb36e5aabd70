/**
 * valuesem frontend - TypeScript programs described to the classifier
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  mergeDiagnostics,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";

export {
  type AnalysisProgram,
  type ProjectOptions,
  defaultTsConfig,
  collectTsDiagnostics,
  convertTsDiagnostic,
  getSourceLocation,
  getNodeLocation,
  createProgram,
  readTsConfig,
} from "./program/index.js";

export {
  createTypeRefFactory,
  type TypeRefFactory,
} from "./type-refs/factory.js";
export {
  KNOWN_NON_VALUE_WRAPPERS,
  resolveKind,
} from "./type-refs/kind-resolver.js";
export { resolveEqualityCapabilities } from "./type-refs/equality.js";
export { getClassMarkers, type CompositeMarkers } from "./type-refs/markers.js";

export {
  analyzeRecords,
  describeFailure,
  type RecordAnalysisOptions,
} from "./analysis/record-analyzer.js";
export { analyzeProject, type AnalyzeOptions } from "./analysis/analyze.js";
