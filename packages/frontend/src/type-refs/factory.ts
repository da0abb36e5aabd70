/**
 * TypeRef factory - describes checker types to the classifier
 *
 * The checker interns types, so caching one TypeRef per ts.Type gives the
 * cycle guard stable identities. Kind, capabilities and member lists are
 * computed on first use; a cyclic struct graph is never walked eagerly.
 */

import ts from "typescript";
import type { Member, TypeKind, TypeRef } from "@valuesem/engine";
import { resolveEqualityCapabilities } from "./equality.js";
import { BRAND_PROPERTY, isFieldDeclaration } from "./fields.js";
import {
  getTupleElementTypes,
  isNullableWrapper,
  isTupleType,
  isTypeReference,
  resolveKind,
} from "./kind-resolver.js";

export type TypeRefFactory = {
  readonly get: (type: ts.Type) => TypeRef;
};

/**
 * Instantiations of one generic target allowed on an expansion path before
 * the next one is folded into the nearest ancestor. Same cutoff as the
 * checker's deeply nested type check.
 */
const EXPANSION_DEPTH_LIMIT = 3;

const lazy = <T>(compute: () => T): (() => T) => {
  let cell: { readonly value: T } | undefined;
  return () => {
    cell ??= { value: compute() };
    return cell.value;
  };
};

const genericTargetOf = (type: ts.Type): ts.Type | undefined =>
  isTypeReference(type) && type.target !== type && !isTupleType(type)
    ? type.target
    : undefined;

export const createTypeRefFactory = (
  checker: ts.TypeChecker
): TypeRefFactory => {
  const cache = new Map<ts.Type, TypeRef>();

  /**
   * `path` holds the composites whose members led to this type. An
   * expanding generic such as Node<T> { next: Node<[T]> } makes a new
   * instantiation at every step; past the limit the nearest ancestor of the
   * same target stands in, so the cycle guard sees a repeat.
   */
  const get = (type: ts.Type, path: readonly ts.Type[] = []): TypeRef => {
    const cached = cache.get(type);
    if (cached) {
      return cached;
    }

    const target = genericTargetOf(type);
    if (target) {
      const sameTarget = path.filter((t) => genericTargetOf(t) === target);
      const nearest = sameTarget[sameTarget.length - 1];
      if (nearest && sameTarget.length >= EXPANSION_DEPTH_LIMIT) {
        const folded = get(nearest);
        cache.set(type, folded);
        return folded;
      }
    }

    const ref = describe(type, path);
    cache.set(type, ref);
    return ref;
  };

  const getFieldMembers = (
    type: ts.Type,
    path: readonly ts.Type[]
  ): readonly Member[] =>
    checker.getPropertiesOfType(type).flatMap((prop): readonly Member[] => {
      // For an accessor pair the setter may be declared first
      const decl = prop.declarations?.find(isFieldDeclaration);
      if (!decl || prop.name === BRAND_PROPERTY) {
        return [];
      }
      return [
        {
          name: prop.name,
          type: get(checker.getTypeOfSymbolAtLocation(prop, decl), path),
        },
      ];
    });

  const getElementMembers = (
    type: ts.Type,
    path: readonly ts.Type[]
  ): readonly Member[] =>
    (getTupleElementTypes(type, checker) ?? []).map((elementType, index) => ({
      name: `Item${index + 1}`,
      type: get(elementType, path),
    }));

  const describe = (type: ts.Type, path: readonly ts.Type[]): TypeRef => {
    const memberPath = [...path, type];
    const nullable = isNullableWrapper(type);
    const kind = lazy((): TypeKind => resolveKind(type, checker));
    const displayName = lazy(() =>
      checker.typeToString(type, undefined, ts.TypeFormatFlags.NoTruncation)
    );
    const equality = lazy(() =>
      resolveEqualityCapabilities(
        type.getSymbol(),
        kind() === "valueComposite",
        checker
      )
    );
    const members = lazy(() =>
      kind() === "valueComposite" ? getFieldMembers(type, memberPath) : []
    );
    const tupleElements = lazy(() =>
      kind() === "heterogeneousFixedTuple"
        ? getElementMembers(type, memberPath)
        : []
    );

    return {
      get kind() {
        return kind();
      },
      get displayName() {
        return displayName();
      },
      isNullableValueWrapper: nullable,
      get equality() {
        return equality();
      },
      unwrap: () => {
        if (!nullable) {
          return undefined;
        }
        const inner = checker.getNonNullableType(type);
        return inner.flags & ts.TypeFlags.Never ? undefined : get(inner, path);
      },
      members,
      tupleElements,
    };
  };

  return { get: (type) => get(type) };
};
