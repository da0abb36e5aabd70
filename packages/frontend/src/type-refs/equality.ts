/**
 * Equality capabilities declared directly on a class
 */

import ts from "typescript";
import { NO_EQUALITY, type EqualityCapabilities } from "@valuesem/engine";

const EQUALS_METHOD_NAMES: ReadonlySet<string> = new Set(["equals", "Equals"]);

const UNIVERSAL_PARAMETER_FLAGS =
  ts.TypeFlags.Any | ts.TypeFlags.Unknown | ts.TypeFlags.NonPrimitive;

const hasModifier = (node: ts.Declaration, flag: ts.ModifierFlags): boolean =>
  (ts.getCombinedModifierFlags(node) & flag) !== 0;

/**
 * Single-parameter instance methods named equals/Equals declared in the
 * class body itself. Inherited methods never appear here.
 */
export const getOwnEqualsMethods = (
  symbol: ts.Symbol
): readonly ts.MethodDeclaration[] =>
  (symbol.declarations ?? [])
    .filter(ts.isClassLike)
    .flatMap((decl) => decl.members.filter(ts.isMethodDeclaration))
    .filter(
      (method) =>
        ts.isIdentifier(method.name) &&
        EQUALS_METHOD_NAMES.has(method.name.text) &&
        method.parameters.length === 1 &&
        !hasModifier(method, ts.ModifierFlags.Static)
    );

const getParameterType = (
  method: ts.MethodDeclaration,
  checker: ts.TypeChecker
): ts.Type | undefined => {
  const typeNode = method.parameters[0]?.type;
  return typeNode ? checker.getTypeFromTypeNode(typeNode) : undefined;
};

const refersTo = (type: ts.Type, symbol: ts.Symbol): boolean =>
  type.getSymbol() === symbol;

/**
 * equals(other: Self): not an override, not abstract. Value composites may
 * also take `Self | undefined`.
 */
export const isValueEqualsMethod = (
  method: ts.MethodDeclaration,
  symbol: ts.Symbol,
  acceptsNullable: boolean,
  checker: ts.TypeChecker
): boolean => {
  if (
    hasModifier(method, ts.ModifierFlags.Override) ||
    hasModifier(method, ts.ModifierFlags.Abstract)
  ) {
    return false;
  }

  const parameterType = getParameterType(method, checker);
  if (!parameterType) {
    return false;
  }

  if (refersTo(parameterType, symbol)) {
    return true;
  }

  return (
    acceptsNullable &&
    parameterType.isUnion() &&
    refersTo(checker.getNonNullableType(parameterType), symbol)
  );
};

/**
 * override equals(other: unknown | any | object | Object)
 */
export const isIdentityEqualsOverride = (
  method: ts.MethodDeclaration,
  checker: ts.TypeChecker
): boolean => {
  if (!hasModifier(method, ts.ModifierFlags.Override)) {
    return false;
  }

  const parameterType = getParameterType(method, checker);
  if (!parameterType) {
    return false;
  }

  return (
    (parameterType.flags & UNIVERSAL_PARAMETER_FLAGS) !== 0 ||
    parameterType.getSymbol()?.name === "Object"
  );
};

export const resolveEqualityCapabilities = (
  symbol: ts.Symbol | undefined,
  acceptsNullable: boolean,
  checker: ts.TypeChecker
): EqualityCapabilities => {
  if (!symbol) {
    return NO_EQUALITY;
  }

  const methods = getOwnEqualsMethods(symbol);

  return {
    hasOwnValueEqualsMethod: methods.some((m) =>
      isValueEqualsMethod(m, symbol, acceptsNullable, checker)
    ),
    hasOwnIdentityEqualsOverride: methods.some((m) =>
      isIdentityEqualsOverride(m, checker)
    ),
  };
};
