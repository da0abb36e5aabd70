/**
 * Classification outcome for a single member type
 */

export type OkVerdict = {
  readonly kind: "ok";
};

/**
 * The member type itself lacks value semantics
 */
export type FailedVerdict = {
  readonly kind: "failed";
};

/**
 * One of the member type's own members failed.
 * innerTypeName names the immediate failing child, not the deepest cause.
 */
export type NestedFailedVerdict = {
  readonly kind: "nestedFailed";
  readonly innerTypeName: string;
};

export type Verdict = OkVerdict | FailedVerdict | NestedFailedVerdict;

export const okVerdict: OkVerdict = { kind: "ok" };

export const failedVerdict: FailedVerdict = { kind: "failed" };

export const nestedFailed = (innerTypeName: string): NestedFailedVerdict => ({
  kind: "nestedFailed",
  innerTypeName,
});

export const isOkVerdict = (verdict: Verdict): verdict is OkVerdict =>
  verdict.kind === "ok";
