/**
 * Tests for fixed-size array helpers
 */

import { describe, it, expect } from 'vitest';
import { arrays, type FixedArray } from './index';

describe('arrays', () => {
  describe('length', () => {
    it('should return the element count', () => {
      expect(arrays.length([1, 2, 3])).toBe(3);
      expect(arrays.length([])).toBe(0);
    });

    it('should keep the literal length of a tuple', () => {
      const size: 3 = arrays.length(['a', 'b', 'c'] as const);
      expect(size).toBe(3);
    });
  });

  describe('FixedArray', () => {
    it('should accept every size of a union of lengths', () => {
      const pair: FixedArray<number, 2 | 3> = [1, 2];
      const triple: FixedArray<number, 2 | 3> = [1, 2, 3];
      arrays.reverse(triple);
      expect(arrays.length(pair)).toBe(2);
      expect(triple).toEqual([3, 2, 1]);
    });
  });

  describe('reverse', () => {
    it('should reverse an odd-length array in place', () => {
      const arr: FixedArray<number, 5> = [1, 2, 3, 4, 5];
      arrays.reverse(arr);
      expect(arr).toEqual([5, 4, 3, 2, 1]);
    });

    it('should reverse an even-length array in place', () => {
      const arr = ['w', 'x', 'y', 'z'];
      arrays.reverse(arr);
      expect(arr).toEqual(['z', 'y', 'x', 'w']);
    });

    it('should leave empty and single-element arrays alone', () => {
      const empty: number[] = [];
      const single = [7];
      arrays.reverse(empty);
      arrays.reverse(single);
      expect(empty).toEqual([]);
      expect(single).toEqual([7]);
    });

    it('should restore the original after two calls', () => {
      const arr = [3, 1, 4, 1, 5, 9];
      arrays.reverse(arr);
      arrays.reverse(arr);
      expect(arr).toEqual([3, 1, 4, 1, 5, 9]);
    });
  });

  describe('transform', () => {
    it('should replace every element in place', () => {
      const arr: FixedArray<number, 4> = [1, 2, 3, 4];
      arrays.transform(arr, n => n * 10);
      expect(arr).toEqual([10, 20, 30, 40]);
    });

    it('should visit elements left to right', () => {
      const seen: string[] = [];
      const arr = ['a', 'b', 'c'];
      arrays.transform(arr, s => {
        seen.push(s);
        return s.toUpperCase();
      });
      expect(seen).toEqual(['a', 'b', 'c']);
      expect(arr).toEqual(['A', 'B', 'C']);
    });
  });

  describe('toVector', () => {
    it('should copy elements in order', () => {
      const arr: FixedArray<number, 3> = [1, 2, 3];
      expect(arrays.toVector(arr)).toEqual([1, 2, 3]);
    });

    it('should return storage independent of the input', () => {
      const arr = [1, 2, 3];
      const vec = arrays.toVector(arr);
      vec.push(4);
      vec[0] = 100;
      expect(arr).toEqual([1, 2, 3]);
      expect(vec).toEqual([100, 2, 3, 4]);
    });
  });
});
