/**
 * Text helpers: tokenization, joining, trimming, case conversion.
 *
 * Characters are UTF-16 code units handled as single-byte characters.
 * Every function returns a new string; inputs are never changed.
 */

import {
  WHITESPACE,
  DEFAULT_DELIMITER,
  DEFAULT_SEPARATOR,
  find,
  findFirstOf,
  findFirstNotOf,
  findLastNotOf,
  applyEach,
  swapReverse,
  toUpperChar,
  toLowerChar,
  requires,
  ensures,
  type Delimiter,
  type Span,
} from './internal';

// =====================================================
// Per-character transforms
// =====================================================

export function transform(text: string, fn: (ch: string) => string): string {
  return applyEach(text.split(''), fn).join('');
}

export function toUpper(text: string): string {
  return transform(text, toUpperChar);
}

export function toLower(text: string): string {
  return transform(text, toLowerChar);
}

export function reverse(text: string): string {
  return swapReverse(text.split('')).join('');
}

// =====================================================
// Tokenization
// =====================================================

// Match the whole string
export function literal(value: string): Delimiter {
  return { kind: 'literal', value };
}

// Match any single character of chars
export function anyOf(chars: string): Delimiter {
  return { kind: 'set', chars };
}

function delimiterText(delimiter: Delimiter): string {
  return delimiter.kind === 'literal' ? delimiter.value : delimiter.chars;
}

function locate(text: string, from: number, delimiter: Delimiter): Span | undefined {
  switch (delimiter.kind) {
    case 'literal': {
      const start = find(text, delimiter.value, from);
      return start === undefined ? undefined : { start, end: start + delimiter.value.length };
    }
    case 'set': {
      const start = findFirstOf(text, delimiter.chars, from);
      // A set match always consumes one character, however many chars there are
      return start === undefined ? undefined : { start, end: start + 1 };
    }
  }
}

/**
 * Splits text on every occurrence of delimiter, dropping empty tokens.
 *
 * @throws PreconditionError if text or the delimiter is empty
 *
 * @example
 * ```typescript
 * tokenize('a,,b', literal(','));   // ['a', 'b']
 * tokenize('a;b,c', anyOf(',;'));   // ['a', 'b', 'c']
 * ```
 */
export function tokenize(text: string, delimiter: Delimiter): string[] {
  requires(text.length > 0, 'text must not be empty');
  requires(delimiterText(delimiter).length > 0, 'delimiter must not be empty');

  const tokens: string[] = [];
  const len = text.length;
  let cursor = 0;

  while (cursor < len) {
    const span = locate(text, cursor, delimiter);
    const token = text.slice(cursor, span ? span.start : len);
    cursor = span ? span.end : len;

    if (token.length > 0) tokens.push(token);
  }

  return tokens;
}

/**
 * Splits text on delimiter. With multiple set, each character of delimiter
 * is a separator on its own; otherwise delimiter must match as a whole.
 *
 * @throws PreconditionError if text or delimiter is empty
 */
export function split(text: string, delimiter: string = DEFAULT_DELIMITER, multiple = false): string[] {
  return tokenize(text, multiple ? anyOf(delimiter) : literal(delimiter));
}

// =====================================================
// Joining & trimming
// =====================================================

/**
 * Concatenates tokens with one separator between each adjacent pair.
 * Tuples of a fixed size are accepted as-is.
 */
export function join(tokens: readonly string[], separator: string = DEFAULT_SEPARATOR): string {
  let joined = '';
  const last = tokens.length - 1;
  for (let i = 0; i <= last; i++) {
    joined += i < last ? tokens[i] + separator : tokens[i];
  }
  return joined;
}

// Strips WHITESPACE from both ends; empty or all-whitespace text gives ''
export function trim(text: string): string {
  const first = findFirstNotOf(text, WHITESPACE);
  const last = findLastNotOf(text, WHITESPACE);
  if (first === undefined || last === undefined) return '';

  const trimmed = text.slice(first, last + 1);
  ensures(
    !WHITESPACE.includes(trimmed[0]) && !WHITESPACE.includes(trimmed[trimmed.length - 1]),
    'trimmed text must not start or end with whitespace'
  );
  return trimmed;
}
