/**
 * Siglattice - The function-type lattice of a structural type checker
 *
 * Signatures with required, optional and rest formals, constructor
 * identity and captured-variable preconditions, together with the join,
 * meet and subtyping algebra a checker needs at control-flow merges and
 * call sites.
 */

export * from './types/index.js';

export * from './output/index.js';

export { InvariantError } from './utils/index.js';
