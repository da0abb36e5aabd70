/**
 * Type descriptions consumed by the classifier
 */

/**
 * Closed set of type kinds the classifier dispatches on.
 *
 * A provider computes exactly one kind per type; every tie-break between
 * overlapping host predicates happens there, not in the classifier.
 */
export type TypeKind =
  | "primitive"
  | "enumLike"
  | "untypedOrUniversalBase"
  | "fixedSizeBufferOverlay"
  | "knownNonValueWrapper"
  | "heterogeneousFixedTuple"
  | "derivedEqualityComposite"
  | "referenceComposite"
  | "valueComposite"
  | "typeParameterOrOther";

/**
 * Equality methods declared directly on a type (never inherited)
 */
export type EqualityCapabilities = {
  /** `equals(other: Self)`: instance, non-abstract, not an override */
  readonly hasOwnValueEqualsMethod: boolean;
  /** `override equals(other: unknown)` declared on this type */
  readonly hasOwnIdentityEqualsOverride: boolean;
};

export type Member = {
  readonly name: string;
  readonly type: TypeRef;
};

/**
 * Handle to a type in the host type system.
 *
 * Identity matters: a provider must return the same object for the same
 * host type, since cycle detection compares handles by reference.
 * Member and tuple lists are produced on demand so cyclic graphs can be
 * described without building them eagerly.
 */
export type TypeRef = {
  readonly kind: TypeKind;
  readonly displayName: string;
  readonly isNullableValueWrapper: boolean;
  readonly equality: EqualityCapabilities;
  /**
   * Underlying type of a nullable wrapper, or undefined when there is none
   */
  readonly unwrap: () => TypeRef | undefined;
  readonly members: () => readonly Member[];
  readonly tupleElements: () => readonly Member[];
};

export const NO_EQUALITY: EqualityCapabilities = {
  hasOwnValueEqualsMethod: false,
  hasOwnIdentityEqualsOverride: false,
};
