/**
 * Single-byte case mapping. Only A-Z and a-z change; everything else,
 * including non-ASCII characters, passes through untouched.
 */

import { CASE_OFFSET } from './constants';

const UPPER_A = 65; // 'A'
const UPPER_Z = 90; // 'Z'
const LOWER_A = 97; // 'a'
const LOWER_Z = 122; // 'z'

export function toUpperChar(ch: string): string {
  if (ch.length !== 1) return ch;
  const c = ch.charCodeAt(0);
  return c >= LOWER_A && c <= LOWER_Z ? String.fromCharCode(c - CASE_OFFSET) : ch;
}

export function toLowerChar(ch: string): string {
  if (ch.length !== 1) return ch;
  const c = ch.charCodeAt(0);
  return c >= UPPER_A && c <= UPPER_Z ? String.fromCharCode(c + CASE_OFFSET) : ch;
}
