/**
 * Internal modules barrel export
 */

// Constants
export {
  WHITESPACE,
  DEFAULT_DELIMITER,
  DEFAULT_SEPARATOR,
} from './constants';

// Search
export { find, findFirstOf, findFirstNotOf, findLastNotOf } from './search';

// Traversal
export { applyEach, swapReverse } from './iterate';

// Case mapping
export { toUpperChar, toLowerChar } from './ascii';

// Contracts
export {
  ContractError,
  PreconditionError,
  PostconditionError,
  requires,
  ensures,
} from './contract';

// Types
export type { Index, FixedArray, Delimiter, Span } from './types';
