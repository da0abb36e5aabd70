/**
 * Test harness for type-ref and analyzer tests.
 * Creates a real TypeScript program from a snippet and provides helpers to
 * look up declared types.
 */

import ts from "typescript";
import * as path from "node:path";
import * as os from "node:os";
import * as fs from "node:fs";
import type { AnalysisProgram } from "../program/types.js";

/**
 * Marker declarations prepended to every snippet, on a single line so that
 * snippet line N is file line N + 1
 */
const MARKERS =
  "interface struct {} interface record {} interface inlineArray {}";

export type TestHarness = {
  readonly program: ts.Program;
  readonly checker: ts.TypeChecker;
  readonly sourceFile: ts.SourceFile;
  readonly analysisProgram: AnalysisProgram;
  readonly cleanup: () => void;
};

/**
 * Create a test harness with a real TypeScript program.
 * The snippet is compiled as a module under strict options.
 */
export const createTestHarness = (code: string): TestHarness => {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "valuesem-test-"));

  const testCodePath = path.join(tmpDir, "test.ts");
  fs.writeFileSync(testCodePath, `${MARKERS}${code}\nexport {};\n`);

  const program = ts.createProgram({
    rootNames: [testCodePath],
    options: {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.ESNext,
      moduleResolution: ts.ModuleResolutionKind.Bundler,
      strict: true,
      skipLibCheck: true,
      noEmit: true,
      types: [],
    },
  });

  const checker = program.getTypeChecker();
  const sourceFile = program.getSourceFile(testCodePath);

  if (!sourceFile) {
    throw new Error("Failed to get source file from test program");
  }

  const cleanup = () => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  };

  return {
    program,
    checker,
    sourceFile,
    analysisProgram: { program, checker, sourceFiles: [sourceFile] },
    cleanup,
  };
};

/**
 * Type of a variable or parameter declared anywhere in the snippet
 */
export const getDeclaredType = (harness: TestHarness, name: string): ts.Type => {
  let found: ts.Type | undefined = undefined;

  const visit = (node: ts.Node): void => {
    if (
      (ts.isVariableDeclaration(node) || ts.isParameter(node)) &&
      ts.isIdentifier(node.name) &&
      node.name.text === name
    ) {
      found = harness.checker.getTypeAtLocation(node.name);
    }
    ts.forEachChild(node, visit);
  };

  visit(harness.sourceFile);

  if (!found) {
    throw new Error(`No variable or parameter named '${name}' in snippet`);
  }
  return found;
};

/**
 * Symbol of a class declared anywhere in the snippet
 */
export const getClassSymbol = (
  harness: TestHarness,
  name: string
): ts.Symbol => {
  let found: ts.Symbol | undefined = undefined;

  const visit = (node: ts.Node): void => {
    if (
      ts.isClassLike(node) &&
      node.name !== undefined &&
      node.name.text === name
    ) {
      found = harness.checker.getSymbolAtLocation(node.name);
    }
    ts.forEachChild(node, visit);
  };

  visit(harness.sourceFile);

  if (!found) {
    throw new Error(`No class named '${name}' in snippet`);
  }
  return found;
};
