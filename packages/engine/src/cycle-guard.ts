/**
 * Cycle guard - bounds recursion over possibly cyclic type graphs
 *
 * Some host type systems still build full symbol graphs for type definitions
 * they reject as ill-formed (a struct containing itself, for instance), so
 * recursion is bounded by the number of distinct types reached, never by
 * call depth.
 */

import type { TypeRef } from "./types/type-ref.js";

/**
 * "call": a type visited anywhere in one top-level call is not expanded
 * again. Sound while a type's verdict does not depend on the path used to
 * reach it.
 *
 * "path": only types on the current recursion path are skipped, at the cost
 * of re-expanding types reached through several siblings.
 */
export type CycleGuardMode = "call" | "path";

export type CycleGuard = {
  readonly mode: CycleGuardMode;
  /**
   * Record a type as visited. Returns false if it already was.
   */
  readonly add: (type: TypeRef) => boolean;
  /**
   * Called when classification of a type completes
   */
  readonly leave: (type: TypeRef) => void;
};

export const createCycleGuard = (mode: CycleGuardMode = "call"): CycleGuard => {
  const visited = new Set<TypeRef>();

  return {
    mode,
    add: (type) => {
      if (visited.has(type)) {
        return false;
      }
      visited.add(type);
      return true;
    },
    leave: (type) => {
      if (mode === "path") {
        visited.delete(type);
      }
    },
  };
};

export const isCycleGuardMode = (value: unknown): value is CycleGuardMode =>
  value === "call" || value === "path";
