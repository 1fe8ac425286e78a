/**
 * Function lattice - Main exports
 */

// Value types
export type {
  ValueType,
  TopValue,
  BottomValue,
  UnknownValue,
  PrimitiveName,
  PrimitiveValue,
  InstanceValue,
  CallableValue,
  UnionValue,
  AtomValue,
} from './value.js';

export {
  TOP,
  BOTTOM,
  UNKNOWN,
  NUMBER,
  STRING,
  BOOLEAN,
  NULL,
  UNDEFINED,
  isTopValue,
  isBottomValue,
  isUnknownValue,
  instanceOf,
  classOfInstance,
  unionOf,
  joinValues,
  meetValues,
  valueEquals,
  hashValue,
  valueToString,
} from './value.js';

// Nominal classes
export type { NominalClass } from './nominal.js';
export { nominalClass } from './nominal.js';

// Signatures
export type {
  TopFunction,
  Signature,
  FunctionSignature,
  SignatureParts,
} from './signature.js';

export {
  UNBOUNDED_ARITY,
  TOP_FUNCTION,
  LOOSE_TOP_FUNCTION,
  BOTTOM_FUNCTION,
  normalized,
  functionValue,
  isTopFunction,
  isBottomFunction,
  isConstructor,
  isLoose,
  checkValid,
  withLoose,
  formalTypeAt,
  returnTypeOf,
  capturedVarPrecondition,
  minArity,
  maxArity,
  totalArity,
  typeOfThis,
  constructorObject,
  signatureEquals,
  hashSignature,
} from './signature.js';

// Builder
export { SignatureBuilder, ParameterOrderError } from './builder.js';

// Lattice operations
export {
  joinSignatures,
  meetSignatures,
  specialize,
  isSubtypeOf,
  isLooseSubtypeOf,
} from './lattice.js';
