/**
 * Function Signatures - The elements of the function lattice
 *
 * A signature is either one of the two top sentinels ("every possible
 * function", precise or loose) or a normalized signature:
 *
 *   function (R1, ..., Rn, O1=, ..., Om=, ...Rest): Ret
 *
 * Signatures are immutable. The only way to build a non-top signature is
 * normalized() (or SignatureBuilder, which calls it), so the
 * normalization rule always holds: no trailing optional formal equals the
 * rest formal.
 */

import type { NominalClass } from './nominal.js';
import type { CallableValue, InstanceValue, ValueType } from './value.js';
import { TOP, BOTTOM, instanceOf, valueEquals, hashValue, signatureRecordsEqual } from './value.js';
import { checkArgument, checkState } from '../utils/invariant.js';
import { combineHashes } from '../utils/hash.js';

// ============================================================================
// Signature Types
// ============================================================================

/**
 * The top of the function lattice. Calling it is always a type error, but
 * it is kept distinct from the top value type so that a union such as
 * `number | TOP_FUNCTION` can still be narrowed back to `number`.
 */
export interface TopFunction {
  readonly kind: 'top';
  readonly loose: boolean;
}

export interface Signature {
  readonly kind: 'signature';
  /** Formals every caller must supply */
  readonly requiredFormals: readonly ValueType[];
  /** Formals a caller may omit, following the required ones */
  readonly optionalFormals: readonly ValueType[];
  /** Type of every extra positional argument; absent if not variadic */
  readonly restFormal?: ValueType;
  /** Ignored by returnTypeOf() when this is a constructor */
  readonly returnType: ValueType;
  /** Present iff this signature is a constructor */
  readonly ownerClass?: NominalClass;
  /** Required type of each captured variable when the function is invoked */
  readonly capturedVarPreconditions: ReadonlyMap<string, ValueType>;
  /** An approximation inferred from partial evidence */
  readonly loose: boolean;
}

export type FunctionSignature = TopFunction | Signature;

/**
 * maxArity() of a variadic signature
 */
export const UNBOUNDED_ARITY = Number.POSITIVE_INFINITY;

// ============================================================================
// Construction
// ============================================================================

export interface SignatureParts {
  requiredFormals?: readonly ValueType[];
  optionalFormals?: readonly ValueType[];
  restFormal?: ValueType;
  returnType: ValueType;
  ownerClass?: NominalClass;
  capturedVarPreconditions?: ReadonlyMap<string, ValueType>;
  loose?: boolean;
}

/**
 * Build a signature, dropping trailing optional formals that equal the
 * rest formal (the variadic tail already accepts them).
 */
export function normalized(parts: SignatureParts): Signature {
  const optionalFormals = [...(parts.optionalFormals ?? [])];
  const rest = parts.restFormal;

  if (rest !== undefined) {
    while (optionalFormals.length > 0) {
      const last = optionalFormals[optionalFormals.length - 1];
      if (last === undefined || !valueEquals(last, rest)) break;
      optionalFormals.pop();
    }
  }

  return {
    kind: 'signature',
    requiredFormals: [...(parts.requiredFormals ?? [])],
    optionalFormals,
    restFormal: rest,
    returnType: parts.returnType,
    ownerClass: parts.ownerClass,
    capturedVarPreconditions: new Map(parts.capturedVarPreconditions ?? []),
    loose: parts.loose ?? false,
  };
}

/**
 * Wrap a plain signature as a function value
 */
export function functionValue(
  requiredFormals: readonly ValueType[],
  optionalFormals: readonly ValueType[],
  restFormal: ValueType | undefined,
  returnType: ValueType
): CallableValue {
  return {
    kind: 'callable',
    signature: normalized({ requiredFormals, optionalFormals, restFormal, returnType }),
  };
}

// ============================================================================
// Sentinels
// ============================================================================

export const TOP_FUNCTION: TopFunction = { kind: 'top', loose: false };
export const LOOSE_TOP_FUNCTION: TopFunction = { kind: 'top', loose: true };

/**
 * Subtype of every function: callable in every context. Conceptually it
 * takes infinitely many bottom-typed arguments; represented as accepting
 * any number of arguments of any type and never returning.
 */
export const BOTTOM_FUNCTION: Signature = normalized({
  restFormal: TOP,
  returnType: BOTTOM,
});

// ============================================================================
// Predicates
// ============================================================================

export function isTopFunction(f: FunctionSignature): f is TopFunction {
  return f.kind === 'top';
}

export function isBottomFunction(f: FunctionSignature): boolean {
  return signatureEquals(f, BOTTOM_FUNCTION);
}

export function isConstructor(f: FunctionSignature): boolean {
  return f.kind === 'signature' && f.ownerClass !== undefined;
}

export function isLoose(f: FunctionSignature): boolean {
  return f.loose;
}

/**
 * Sanity check on a constructed signature. Failure means a construction
 * bug upstream.
 */
export function checkValid(f: FunctionSignature): void {
  if (f.kind === 'top') {
    return;
  }
  for (const formal of f.requiredFormals) {
    checkState(formal != null, 'required formal is null');
  }
  for (const formal of f.optionalFormals) {
    checkState(formal != null, 'optional formal is null');
  }
  checkState(f.returnType != null, 'return type is null');
}

/**
 * The same signature, marked as an approximation
 */
export function withLoose(f: FunctionSignature): FunctionSignature {
  if (f.kind === 'top') {
    return LOOSE_TOP_FUNCTION;
  }
  return { ...f, loose: true };
}

// ============================================================================
// Queries
// ============================================================================

function requireSignature(f: FunctionSignature, operation: string): Signature {
  checkArgument(f.kind === 'signature', `${operation} on TOP_FUNCTION`);
  return f;
}

/**
 * Type of the formal at a 0-indexed position.
 *
 * Falls back from required to optional to the rest formal. An undefined
 * result means no constraint at that position (past the last formal of a
 * non-variadic signature), which joins and meets pass through.
 */
export function formalTypeAt(f: FunctionSignature, position: number): ValueType | undefined {
  const sig = requireSignature(f, 'formalTypeAt');
  checkArgument(Number.isInteger(position) && position >= 0, `bad position ${position}`);
  checkValid(sig);

  const numRequired = sig.requiredFormals.length;
  if (position < numRequired) {
    return sig.requiredFormals[position];
  }
  if (position < numRequired + sig.optionalFormals.length) {
    return sig.optionalFormals[position - numRequired];
  }
  return sig.restFormal;
}

/**
 * What a call produces. Constructors produce an instance of their class
 * whatever the stored return type says.
 */
export function returnTypeOf(f: FunctionSignature): ValueType {
  const sig = requireSignature(f, 'returnTypeOf');
  return sig.ownerClass ? instanceOf(sig.ownerClass) : sig.returnType;
}

export function capturedVarPrecondition(f: FunctionSignature, name: string): ValueType | undefined {
  return requireSignature(f, 'capturedVarPrecondition').capturedVarPreconditions.get(name);
}

export function minArity(f: FunctionSignature): number {
  return requireSignature(f, 'minArity').requiredFormals.length;
}

export function maxArity(f: FunctionSignature): number {
  const sig = requireSignature(f, 'maxArity');
  if (sig.restFormal !== undefined) {
    return UNBOUNDED_ARITY;
  }
  return sig.requiredFormals.length + sig.optionalFormals.length;
}

/**
 * Number of positional formals, not counting the rest formal
 */
export function totalArity(sig: Signature): number {
  return sig.requiredFormals.length + sig.optionalFormals.length;
}

/**
 * Type of `this` inside a constructor
 */
export function typeOfThis(f: FunctionSignature): InstanceValue {
  const sig = requireSignature(f, 'typeOfThis');
  checkState(sig.ownerClass !== undefined, 'typeOfThis on a non-constructor');
  return instanceOf(sig.ownerClass);
}

export function constructorObject(f: FunctionSignature): CallableValue {
  checkState(f.kind === 'signature' && f.ownerClass !== undefined, 'constructorObject on a non-constructor');
  return f.ownerClass.createConstructorObject(f);
}

// ============================================================================
// Equality
// ============================================================================

/**
 * Structural equality over formals, rest formal and stored return type.
 *
 * Looseness, constructor identity and captured-variable preconditions do
 * not take part: signatures differing only in those are the same lattice
 * element. Both top sentinels are equal to each other.
 */
export function signatureEquals(a: FunctionSignature, b: FunctionSignature): boolean {
  if (a.kind === 'top' || b.kind === 'top') {
    return a.kind === b.kind;
  }
  return signatureRecordsEqual(a, b);
}

/**
 * Hash consistent with signatureEquals()
 */
export function hashSignature(f: FunctionSignature): number {
  if (f.kind === 'top') {
    return 0;
  }
  return combineHashes([
    combineHashes(f.requiredFormals.map(hashValue)),
    combineHashes(f.optionalFormals.map(hashValue)),
    f.restFormal === undefined ? 0 : hashValue(f.restFormal),
    hashValue(f.returnType),
  ]);
}
