/**
 * Traversal shared by the array and string helpers
 */

// Replaces every element with fn(element), left to right. Mutates items.
export function applyEach<T>(items: T[], fn: (value: T) => T): T[] {
  const len = items.length;
  for (let i = 0; i < len; i++) {
    items[i] = fn(items[i]);
  }
  return items;
}

// Swaps i and len-1-i for i < len/2. Mutates items.
export function swapReverse<T>(items: T[]): T[] {
  const len = items.length;
  const half = len >>> 1;
  for (let i = 0; i < half; i++) {
    const j = len - i - 1;
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}
