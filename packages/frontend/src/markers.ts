/**
 * Marker interfaces for declaring value-style composites.
 *
 * @example
 * ```ts
 * import type { record, struct } from "@valuesem/frontend/markers";
 *
 * export class Point implements struct {
 *   constructor(readonly x: number, readonly y: number) {}
 * }
 *
 * export class Order implements record {
 *   constructor(readonly id: string, readonly at: Point) {}
 * }
 * ```
 */

/** Value type; equality compares its fields */
export interface struct {}

/** Equality is derived from the declared members */
export interface record {}

/** Fixed-size inline buffer; combine with struct */
export interface inlineArray {}
