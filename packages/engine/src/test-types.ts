/**
 * In-memory type graphs for classifier tests.
 * Types refer to each other by name, so cycles are easy to describe.
 */

import {
  NO_EQUALITY,
  type Member,
  type TypeKind,
  type TypeRef,
} from "./types/type-ref.js";

export type TypeSpec = {
  readonly kind: TypeKind;
  readonly displayName?: string;
  /** [member name, type name] pairs */
  readonly members?: readonly (readonly [string, string])[];
  /** type names of tuple elements */
  readonly elements?: readonly string[];
  readonly valueEquals?: boolean;
  readonly identityOverride?: boolean;
  /** Makes this a nullable wrapper; null means there is nothing to unwrap */
  readonly nullableOf?: string | null;
};

export type TypeGraph = {
  readonly get: (name: string) => TypeRef;
  /** How many times each type's member or element list was requested */
  readonly expansions: ReadonlyMap<string, number>;
};

export const createTypeGraph = (
  specs: Readonly<Record<string, TypeSpec>>,
  predefined: Readonly<Record<string, TypeRef>> = {}
): TypeGraph => {
  const refs = new Map<string, TypeRef>(Object.entries(predefined));
  const expansions = new Map<string, number>();

  const countExpansion = (name: string): void => {
    expansions.set(name, (expansions.get(name) ?? 0) + 1);
  };

  const get = (name: string): TypeRef => {
    const existing = refs.get(name);
    if (existing) {
      return existing;
    }

    const spec = specs[name];
    if (!spec) {
      throw new Error(`Unknown test type: ${name}`);
    }

    const toMembers = (
      pairs: readonly (readonly [string, string])[]
    ): readonly Member[] =>
      pairs.map(([memberName, typeName]) => ({
        name: memberName,
        type: get(typeName),
      }));

    const ref: TypeRef = {
      kind: spec.kind,
      displayName: spec.displayName ?? name,
      isNullableValueWrapper: spec.nullableOf !== undefined,
      equality: {
        ...NO_EQUALITY,
        hasOwnValueEqualsMethod: spec.valueEquals ?? false,
        hasOwnIdentityEqualsOverride: spec.identityOverride ?? false,
      },
      unwrap: () =>
        spec.nullableOf === undefined || spec.nullableOf === null
          ? undefined
          : get(spec.nullableOf),
      members: () => {
        countExpansion(name);
        return toMembers(spec.members ?? []);
      },
      tupleElements: () => {
        countExpansion(name);
        return toMembers(
          (spec.elements ?? []).map((typeName, index) => [
            `Item${index + 1}`,
            typeName,
          ])
        );
      },
    };

    refs.set(name, ref);
    return ref;
  };

  return { get, expansions };
};

/**
 * A type whose inspection throws. Used to prove a member is never reached.
 */
export const createExplodingType = (displayName: string): TypeRef => {
  const explode = (): never => {
    throw new Error(`${displayName} must not be inspected`);
  };

  return {
    get kind(): TypeKind {
      return explode();
    },
    displayName,
    get isNullableValueWrapper(): boolean {
      return explode();
    },
    equality: NO_EQUALITY,
    unwrap: explode,
    members: explode,
    tupleElements: explode,
  };
};
