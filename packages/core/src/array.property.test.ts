/**
 * Property tests for fixed-size array helpers
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { arrays } from './index';

describe('property tests', () => {
  it('arrays.reverse twice restores the array', () => {
    fc.assert(
      fc.property(fc.array(fc.integer()), values => {
        const arr = [...values];
        arrays.reverse(arr);
        arrays.reverse(arr);
        expect(arr).toEqual(values);
      })
    );
  });

  it('arrays.transform keeps length and maps every element', () => {
    fc.assert(
      fc.property(fc.array(fc.integer({ min: -1000, max: 1000 })), values => {
        const arr = [...values];
        arrays.transform(arr, n => n * 2 + 1);
        expect(arrays.length(arr)).toBe(values.length);
        arr.forEach((n, i) => expect(n).toBe(values[i] * 2 + 1));
      })
    );
  });

  it('arrays.toVector copies every element in order', () => {
    fc.assert(
      fc.property(fc.array(fc.string()), values => {
        const vec = arrays.toVector(values);
        expect(vec).toEqual(values);
        expect(vec).not.toBe(values);
      })
    );
  });
});
