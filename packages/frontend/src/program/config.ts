/**
 * TypeScript compiler configuration
 */

import ts from "typescript";

/**
 * Compiler options used when no tsconfig.json is given.
 * strict is required: optional members only carry `| undefined` under
 * strictNullChecks, and that is how nullable wrappers are detected.
 */
export const defaultTsConfig: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.NodeNext,
  moduleResolution: ts.ModuleResolutionKind.NodeNext,
  strict: true,
  esModuleInterop: true,
  skipLibCheck: true,
  forceConsistentCasingInFileNames: true,
  allowJs: false,
  noEmit: true,
  types: [],
};

/**
 * Options read from a tsconfig.json always get noEmit and strictNullChecks
 */
export const withAnalysisOverrides = (
  options: ts.CompilerOptions
): ts.CompilerOptions => ({
  ...options,
  strictNullChecks: true,
  noEmit: true,
});
