/**
 * valuesem engine - provider-agnostic value-semantics classification
 */

export * from "./types/type-ref.js";
export * from "./types/verdict.js";
export * from "./cycle-guard.js";
export { classify, classifyMember } from "./classifier.js";
