/**
 * Program - Public API
 */

export type { AnalysisProgram, ProjectOptions } from "./types.js";
export { defaultTsConfig } from "./config.js";
export {
  collectTsDiagnostics,
  convertTsDiagnostic,
  getSourceLocation,
  getNodeLocation,
} from "./diagnostics.js";
export { createProgram, readTsConfig } from "./creation.js";
