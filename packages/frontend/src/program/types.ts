/**
 * Program type definitions
 */

import type ts from "typescript";

export type ProjectOptions = {
  /** tsconfig.json supplying compiler options and, without files, the file list */
  readonly tsconfigPath?: string;
  /** Source files to analyze; relative paths resolve against cwd */
  readonly files?: readonly string[];
  readonly cwd?: string;
  readonly verbose?: boolean;
};

export type AnalysisProgram = {
  readonly program: ts.Program;
  readonly checker: ts.TypeChecker;
  /** Root source files, declaration files excluded */
  readonly sourceFiles: readonly ts.SourceFile[];
};
