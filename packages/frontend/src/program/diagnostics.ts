/**
 * TypeScript diagnostics collection and conversion
 */

import ts from "typescript";
import {
  type Diagnostic,
  type DiagnosticsCollector,
  type SourceLocation,
  createDiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
} from "../types/diagnostic.js";

/**
 * Collect the TypeScript diagnostics of a program
 */
export const collectTsDiagnostics = (
  program: ts.Program
): DiagnosticsCollector => {
  const tsDiagnostics = [
    ...program.getConfigFileParsingDiagnostics(),
    ...program.getOptionsDiagnostics(),
    ...program.getSyntacticDiagnostics(),
    ...program.getGlobalDiagnostics(),
    ...program.getSemanticDiagnostics(),
  ];

  return tsDiagnostics.reduce((collector, tsDiag) => {
    const diagnostic = convertTsDiagnostic(tsDiag);
    return diagnostic ? addDiagnostic(collector, diagnostic) : collector;
  }, createDiagnosticsCollector());
};

/**
 * Convert a TypeScript diagnostic; suggestions are dropped
 */
export const convertTsDiagnostic = (
  tsDiag: ts.Diagnostic
): Diagnostic | null => {
  if (tsDiag.category === ts.DiagnosticCategory.Suggestion) {
    return null;
  }

  const severity =
    tsDiag.category === ts.DiagnosticCategory.Error
      ? "error"
      : tsDiag.category === ts.DiagnosticCategory.Warning
        ? "warning"
        : "info";

  const message = ts.flattenDiagnosticMessageText(tsDiag.messageText, "\n");

  const location =
    tsDiag.file && tsDiag.start !== undefined
      ? getSourceLocation(tsDiag.file, tsDiag.start, tsDiag.length ?? 1)
      : undefined;

  return createDiagnostic("RVS2001", severity, message, location);
};

/**
 * 1-based line and column of a position in a source file
 */
export const getSourceLocation = (
  file: ts.SourceFile,
  start: number,
  length: number
): SourceLocation => {
  const { line, character } = file.getLineAndCharacterOfPosition(start);
  return {
    file: file.fileName,
    line: line + 1,
    column: character + 1,
    length,
  };
};

export const getNodeLocation = (node: ts.Node): SourceLocation => {
  const sourceFile = node.getSourceFile();
  return getSourceLocation(
    sourceFile,
    node.getStart(sourceFile),
    node.getWidth(sourceFile)
  );
};
