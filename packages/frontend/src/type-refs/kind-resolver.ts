/**
 * Kind resolution - maps a checker type onto the closed TypeKind set
 *
 * The checker answers many overlapping "is this A / B / C" questions
 * (boolean is a union, enums are unions of literals, a class may carry
 * several markers). Every tie-break between them lives here, in the order
 * the checks run.
 */

import ts from "typescript";
import type { TypeKind } from "@valuesem/engine";
import { BRAND_PROPERTY } from "./fields.js";
import { getSymbolMarkers } from "./markers.js";

const UNTYPED_FLAGS =
  ts.TypeFlags.Any | ts.TypeFlags.Unknown | ts.TypeFlags.NonPrimitive;

const PRIMITIVE_FLAGS =
  ts.TypeFlags.StringLike |
  ts.TypeFlags.NumberLike |
  ts.TypeFlags.BigIntLike |
  ts.TypeFlags.BooleanLike;

export const NULLISH_FLAGS = ts.TypeFlags.Null | ts.TypeFlags.Undefined;

/**
 * Wrappers whose equality compares the identity of an underlying buffer or
 * view: segment, immutable-array and memory kinds, and the buffer views.
 */
export const KNOWN_NON_VALUE_WRAPPERS: ReadonlySet<string> = new Set([
  "ArraySegment",
  "ImmutableArray",
  "Memory",
  "ReadOnlyMemory",
  "ArrayBuffer",
  "SharedArrayBuffer",
  "DataView",
  "Int8Array",
  "Uint8Array",
  "Uint8ClampedArray",
  "Int16Array",
  "Uint16Array",
  "Int32Array",
  "Uint32Array",
  "Float32Array",
  "Float64Array",
  "BigInt64Array",
  "BigUint64Array",
]);

export const isTypeReference = (type: ts.Type): type is ts.TypeReference =>
  (type.flags & ts.TypeFlags.Object) !== 0 && "target" in type;

const isTupleTarget = (type: ts.GenericType): type is ts.TupleType =>
  "elementFlags" in type;

export const isTupleType = (type: ts.Type): boolean =>
  isTypeReference(type) && isTupleTarget(type.target);

/**
 * Fixed-length tuple element types, or undefined for anything else
 * (including tuples with a rest element)
 */
export const getTupleElementTypes = (
  type: ts.Type,
  checker: ts.TypeChecker
): readonly ts.Type[] | undefined => {
  if (!isTypeReference(type)) {
    return undefined;
  }

  const target = type.target;
  if (!isTupleTarget(target) || target.hasRestElement) {
    return undefined;
  }

  return checker.getTypeArguments(type).slice(0, target.elementFlags.length);
};

export const isNullableWrapper = (type: ts.Type): boolean =>
  (type.flags & NULLISH_FLAGS) !== 0 ||
  (type.isUnion() && type.types.some((t) => (t.flags & NULLISH_FLAGS) !== 0));

const isPrimitiveLike = (type: ts.Type): boolean =>
  (type.flags & (PRIMITIVE_FLAGS | ts.TypeFlags.EnumLike)) !== 0;

/**
 * `string & { readonly __brand: "Id" }`: a primitive tagged with an object
 * type that declares nothing but the brand
 */
const isBrandedPrimitive = (
  type: ts.IntersectionType,
  checker: ts.TypeChecker
): boolean =>
  type.types.some(isPrimitiveLike) &&
  type.types.every(
    (t) =>
      isPrimitiveLike(t) ||
      ((t.flags & ts.TypeFlags.Object) !== 0 &&
        checker
          .getPropertiesOfType(t)
          .every((prop) => prop.name === BRAND_PROPERTY))
  );

/**
 * Resolve the kind of a type. Nullable wrappers are expected to be
 * unwrapped by the caller first.
 */
export const resolveKind = (
  type: ts.Type,
  checker: ts.TypeChecker
): TypeKind => {
  if (type.flags & UNTYPED_FLAGS) {
    return "untypedOrUniversalBase";
  }

  // Enums are unions of their literals; test them before unions
  if (type.flags & ts.TypeFlags.EnumLike) {
    return "enumLike";
  }

  // boolean is the union true | false and carries the Boolean flag
  if (type.flags & PRIMITIVE_FLAGS) {
    return "primitive";
  }

  if (type.isUnion()) {
    return type.types.every(isPrimitiveLike)
      ? "primitive"
      : "typeParameterOrOther";
  }

  if (type.isIntersection() && isBrandedPrimitive(type, checker)) {
    return "primitive";
  }

  if (type.flags & ts.TypeFlags.TypeParameter) {
    return "typeParameterOrOther";
  }

  if (isTupleType(type)) {
    return getTupleElementTypes(type, checker)
      ? "heterogeneousFixedTuple"
      : "typeParameterOrOther";
  }

  const symbol = type.getSymbol();
  if (!symbol) {
    return "typeParameterOrOther";
  }

  if (KNOWN_NON_VALUE_WRAPPERS.has(symbol.name)) {
    return "knownNonValueWrapper";
  }

  if (symbol.name === "Object" && !(symbol.flags & ts.SymbolFlags.Class)) {
    return "untypedOrUniversalBase";
  }

  if (symbol.flags & ts.SymbolFlags.Class) {
    const markers = getSymbolMarkers(symbol, checker);
    if (markers.inlineArray) {
      return "fixedSizeBufferOverlay";
    }
    if (markers.record) {
      return "derivedEqualityComposite";
    }
    if (markers.struct) {
      return "valueComposite";
    }
    return "referenceComposite";
  }

  return "typeParameterOrOther";
};
