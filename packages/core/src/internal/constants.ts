/**
 * Core constants for Tidbits text operations
 */

// Characters stripped by trim()
export const WHITESPACE = ' \t\n\r';

// split() defaults to a single space, matched literally
export const DEFAULT_DELIMITER = ' ';

// join() concatenates without a separator unless given one
export const DEFAULT_SEPARATOR = '';

// ASCII case mapping: 'a' - 'A'
export const CASE_OFFSET = 32;
