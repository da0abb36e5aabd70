/**
 * Value-semantics classifier
 *
 * Decides whether every member reachable from a type has equality that
 * depends on content rather than instance identity. Rules are ordered and
 * the first match wins.
 */

import {
  createCycleGuard,
  type CycleGuard,
  type CycleGuardMode,
} from "./cycle-guard.js";
import type { Member, TypeRef } from "./types/type-ref.js";
import {
  type Verdict,
  failedVerdict,
  isOkVerdict,
  nestedFailed,
  okVerdict,
} from "./types/verdict.js";

/**
 * Classify a type against a guard shared by one top-level call.
 */
export const classify = (type: TypeRef, guard: CycleGuard): Verdict => {
  const target = type.isNullableValueWrapper ? type.unwrap() : type;

  // An absent type cannot itself be a defect
  if (!target) {
    return okVerdict;
  }

  if (!guard.add(target)) {
    return okVerdict;
  }

  const verdict = classifyUnvisited(target, guard);
  guard.leave(target);
  return verdict;
};

/**
 * Classify the type of one top-level member with its own guard.
 */
export const classifyMember = (
  type: TypeRef,
  mode: CycleGuardMode = "call"
): Verdict => classify(type, createCycleGuard(mode));

const classifyUnvisited = (type: TypeRef, guard: CycleGuard): Verdict => {
  switch (type.kind) {
    case "untypedOrUniversalBase":
      return failedVerdict;
    case "primitive":
    case "enumLike":
      return okVerdict;
    case "fixedSizeBufferOverlay":
      return failedVerdict;
    // Wrappers compare the identity of the buffer they view, whatever
    // equals method they expose
    case "knownNonValueWrapper":
      return failedVerdict;
    default:
      break;
  }

  if (type.kind !== "heterogeneousFixedTuple") {
    if (type.equality.hasOwnValueEqualsMethod) {
      return okVerdict;
    }
    if (type.equality.hasOwnIdentityEqualsOverride) {
      return okVerdict;
    }
    // Checked on its own as a top-level unit
    if (type.kind === "derivedEqualityComposite") {
      return okVerdict;
    }
    if (type.kind === "referenceComposite") {
      return failedVerdict;
    }
  }

  const members = getMemberList(type);
  if (!members) {
    return failedVerdict;
  }

  for (const member of members) {
    const verdict = classify(member.type, guard);
    if (!isOkVerdict(verdict)) {
      return nestedFailed(member.type.displayName);
    }
  }

  return okVerdict;
};

const getMemberList = (type: TypeRef): readonly Member[] | undefined => {
  switch (type.kind) {
    case "heterogeneousFixedTuple":
      return type.tupleElements();
    case "valueComposite":
      return type.members();
    default:
      return undefined;
  }
};
