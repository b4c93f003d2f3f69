/**
 * Tidbits – fixed-size array + string helpers
 *
 * - arrays.*   → length / reverse / transform / toVector (in place where noted)
 * - strings.*  → split / join / trim / case conversion / reverse
 *
 * Every function is pure and synchronous; only arrays.reverse and
 * arrays.transform mutate their argument.
 */

import * as arrays from './array';
import * as strings from './string';

export { arrays, strings };

// Text operations without an array counterpart are exported flat as well
export {
  split,
  tokenize,
  literal,
  anyOf,
  join,
  trim,
  toUpper,
  toLower,
} from './string';

export { toVector } from './array';

export {
  WHITESPACE,
  DEFAULT_DELIMITER,
  DEFAULT_SEPARATOR,
  toUpperChar,
  toLowerChar,
  ContractError,
  PreconditionError,
  PostconditionError,
  type FixedArray,
  type Delimiter,
  type Index,
} from './internal';
