/**
 * Fixed-size sequence helpers.
 *
 * reverse() and transform() work in place on the caller's array; length()
 * and toVector() only read it.
 */

import { applyEach, swapReverse } from './internal';

/**
 * Element count. For a tuple the result keeps its literal type:
 * `length([1, 2, 3] as const)` is typed `3`.
 */
export function length<S extends readonly unknown[]>(seq: S): S['length'] {
  return seq.length;
}

export function reverse<T>(seq: T[]): void {
  swapReverse(seq);
}

/**
 * Replaces each element with fn(element), in index order.
 * fn should be pure; call order is left to right.
 */
export function transform<T>(seq: T[], fn: (value: T) => T): void {
  applyEach(seq, fn);
}

// Independent copy; later changes to either side do not show in the other
export function toVector<T>(seq: readonly T[]): T[] {
  return Array.from(seq);
}
