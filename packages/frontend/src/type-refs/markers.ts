/**
 * Composite markers in implements clauses
 */

import ts from "typescript";

export type CompositeMarkers = {
  readonly struct: boolean;
  readonly record: boolean;
  readonly inlineArray: boolean;
};

const markerOf = (name: string): keyof CompositeMarkers | undefined => {
  switch (name) {
    case "struct":
    case "Struct":
      return "struct";
    case "record":
      return "record";
    case "inlineArray":
      return "inlineArray";
    default:
      return undefined;
  }
};

/**
 * Markers named in the implements clause of a class declaration.
 * Matched by symbol name, so a local marker declaration works too.
 */
export const getClassMarkers = (
  node: ts.ClassLikeDeclaration,
  checker: ts.TypeChecker
): CompositeMarkers => {
  const found = new Set<keyof CompositeMarkers>();

  const implementsClause = node.heritageClauses?.find(
    (h) => h.token === ts.SyntaxKind.ImplementsKeyword
  );

  for (const typeRef of implementsClause?.types ?? []) {
    const symbol = checker.getSymbolAtLocation(typeRef.expression);
    const marker = symbol ? markerOf(symbol.name) : undefined;
    if (marker) {
      found.add(marker);
    }
  }

  return {
    struct: found.has("struct"),
    record: found.has("record"),
    inlineArray: found.has("inlineArray"),
  };
};

/**
 * Markers of every class declaration of a symbol
 */
export const getSymbolMarkers = (
  symbol: ts.Symbol,
  checker: ts.TypeChecker
): CompositeMarkers =>
  (symbol.declarations ?? [])
    .filter(ts.isClassLike)
    .map((decl) => getClassMarkers(decl, checker))
    .reduce(
      (acc, markers) => ({
        struct: acc.struct || markers.struct,
        record: acc.record || markers.record,
        inlineArray: acc.inlineArray || markers.inlineArray,
      }),
      { struct: false, record: false, inlineArray: false }
    );
