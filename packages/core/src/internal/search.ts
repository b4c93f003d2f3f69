/**
 * Search primitives over strings.
 * Every lookup returns an Index so callers never handle a -1 sentinel.
 */

import type { Index } from './types';

function toIndex(position: number): Index {
  return position === -1 ? undefined : position;
}

export function find(haystack: string, needle: string, from = 0): Index {
  return toIndex(haystack.indexOf(needle, from));
}

export function findFirstOf(haystack: string, chars: string, from = 0): Index {
  for (let i = from; i < haystack.length; i++) {
    if (chars.includes(haystack[i])) return i;
  }
  return undefined;
}

export function findFirstNotOf(haystack: string, chars: string, from = 0): Index {
  for (let i = from; i < haystack.length; i++) {
    if (!chars.includes(haystack[i])) return i;
  }
  return undefined;
}

export function findLastNotOf(haystack: string, chars: string): Index {
  for (let i = haystack.length - 1; i >= 0; i--) {
    if (!chars.includes(haystack[i])) return i;
  }
  return undefined;
}
