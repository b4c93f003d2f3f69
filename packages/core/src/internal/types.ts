/**
 * Core type definitions
 */

// Result of a search primitive; undefined means "not found"
export type Index = number | undefined;

type BuildTuple<T, N extends number, R extends T[] = []> =
  R['length'] extends N ? R : BuildTuple<T, N, [...R, T]>;

/**
 * Fixed-length sequence. N must be a non-negative integer literal, or a union
 * of them (`FixedArray<T, 2 | 3>` is `[T, T] | [T, T, T]`); plain `number`
 * falls back to T[].
 */
export type FixedArray<T, N extends number> =
  number extends N ? T[] : N extends N ? BuildTuple<T, N> : never;

/**
 * How split() recognises a delimiter.
 *
 * - literal: the whole string must match; consumes value.length characters
 * - set: any one of the characters matches; consumes exactly one character
 */
export type Delimiter =
  | { readonly kind: 'literal'; readonly value: string }
  | { readonly kind: 'set'; readonly chars: string };

// One located delimiter occurrence, end exclusive
export interface Span {
  start: number;
  end: number;
}
