/**
 * Record analyzer - one diagnostic per record member without value semantics
 *
 * A record's equality is derived from its members, so every member type
 * must compare by content. Each top-level member is classified with its own
 * cycle guard; the classifier reports at most one level of nested detail.
 */

import ts from "typescript";
import {
  classifyMember,
  isOkVerdict,
  type CycleGuardMode,
  type Verdict,
} from "@valuesem/engine";
import {
  type Diagnostic,
  type DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
} from "../types/diagnostic.js";
import { getNodeLocation } from "../program/diagnostics.js";
import type { AnalysisProgram } from "../program/types.js";
import { type Result, error, ok } from "../types/result.js";
import {
  getOwnEqualsMethods,
  isValueEqualsMethod,
} from "../type-refs/equality.js";
import { getDeclaredFields, getFieldName } from "../type-refs/fields.js";
import { getClassMarkers } from "../type-refs/markers.js";
import {
  createTypeRefFactory,
  type TypeRefFactory,
} from "../type-refs/factory.js";

export type RecordAnalysisOptions = {
  /** Record names to skip */
  readonly ignoreTypes?: readonly string[];
  readonly cycleGuard?: CycleGuardMode;
  readonly warningsAsErrors?: boolean;
};

type RecordContext = {
  readonly checker: ts.TypeChecker;
  readonly factory: TypeRefFactory;
  readonly options: RecordAnalysisOptions;
};

/**
 * Text inside the quotes of the diagnostic message:
 * `<type> <member>` plus ` (field <inner>)` for a nested failure.
 */
export const describeFailure = (
  typeName: string,
  memberName: string,
  verdict: Verdict
): string =>
  verdict.kind === "nestedFailed"
    ? `${typeName} ${memberName} (field ${verdict.innerTypeName})`
    : `${typeName} ${memberName}`;

/**
 * Does the record declare equals(other: Self): boolean itself?
 * Such a record defines its own equality and its members are not checked.
 */
export const recordDeclaresEquals = (
  symbol: ts.Symbol,
  isStruct: boolean,
  checker: ts.TypeChecker
): boolean =>
  getOwnEqualsMethods(symbol).some((method) => {
    if (!isValueEqualsMethod(method, symbol, isStruct, checker)) {
      return false;
    }
    const signature = checker.getSignatureFromDeclaration(method);
    return (
      signature !== undefined &&
      (checker.getReturnTypeOfSignature(signature).flags &
        ts.TypeFlags.BooleanLike) !==
        0
    );
  });

const analyzeRecord = (
  node: ts.ClassLikeDeclaration,
  name: ts.Identifier,
  context: RecordContext
): readonly Diagnostic[] => {
  const { checker, options } = context;

  const symbol = checker.getSymbolAtLocation(name);
  if (!symbol) {
    return [];
  }

  const markers = getClassMarkers(node, checker);
  if (recordDeclaresEquals(symbol, markers.struct, checker)) {
    return [];
  }

  const severity = options.warningsAsErrors ? "error" : "warning";

  return getDeclaredFields(node).flatMap((field): readonly Diagnostic[] => {
    const type = checker.getTypeAtLocation(field);
    const memberName = getFieldName(field);

    const verdict = classifyField(type, context);
    if (!verdict.ok) {
      return [
        createDiagnostic(
          "RVS6001",
          "error",
          `Failed to analyze member '${memberName}' of ${name.text}: ${verdict.error}`,
          getNodeLocation(field)
        ),
      ];
    }
    if (isOkVerdict(verdict.value)) {
      return [];
    }

    const typeName = checker.typeToString(type);

    return [
      createDiagnostic(
        "RVS1001",
        severity,
        `Member '${describeFailure(typeName, memberName, verdict.value)}' does not have value semantics`,
        getNodeLocation(field),
        `Give ${typeName} value semantics or declare equals(other: ${name.text}): boolean on ${name.text}`
      ),
    ];
  });
};

const classifyField = (
  type: ts.Type,
  context: RecordContext
): Result<Verdict, string> => {
  try {
    return ok(
      classifyMember(context.factory.get(type), context.options.cycleGuard)
    );
  } catch (err) {
    return error(err instanceof Error ? err.message : String(err));
  }
};

const analyzeSourceFile = (
  sourceFile: ts.SourceFile,
  context: RecordContext
): readonly Diagnostic[] => {
  const ignored = new Set(context.options.ignoreTypes ?? []);
  const diagnostics: Diagnostic[] = [];

  const visit = (node: ts.Node): void => {
    if (
      ts.isClassLike(node) &&
      node.name !== undefined &&
      !ignored.has(node.name.text) &&
      getClassMarkers(node, context.checker).record
    ) {
      diagnostics.push(...analyzeRecord(node, node.name, context));
    }
    ts.forEachChild(node, visit);
  };

  visit(sourceFile);
  return diagnostics;
};

/**
 * Analyze every record declared in the program's source files
 */
export const analyzeRecords = (
  program: AnalysisProgram,
  options: RecordAnalysisOptions = {}
): DiagnosticsCollector => {
  const context: RecordContext = {
    checker: program.checker,
    factory: createTypeRefFactory(program.checker),
    options,
  };

  return program.sourceFiles
    .flatMap((sourceFile) => analyzeSourceFile(sourceFile, context))
    .reduce(addDiagnostic, createDiagnosticsCollector());
};
