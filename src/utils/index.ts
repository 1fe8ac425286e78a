/**
 * Utils module exports
 */

export { InvariantError, checkState, checkArgument } from './invariant.js';
export { hashString, combineHashes } from './hash.js';
