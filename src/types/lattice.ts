/**
 * Function Lattice - join, meet and subtyping over signatures
 *
 * Parameters are contravariant and the return type is covariant, so the
 * two sides swap operations:
 *
 *   join(f, g):  formals = f.formal ⊓ g.formal,  return = f.ret ⊔ g.ret
 *   meet(f, g):  formals = f.formal ⊔ g.formal,  return = f.ret ⊓ g.ret
 *
 * We want to warn about argument-count mismatches, so a function with N
 * required formals is not treated as having a TOP rest formal. Joins may
 * still change arity, e.g. after an IF:
 *
 *   (number) → number  ⊔  (number, number) → number  =  (number, number) → number
 *
 * Loose signatures are approximations; both join and meet go through
 * looseJoin() for them.
 */

import type { FunctionSignature, Signature } from './signature.js';
import type { ValueType } from './value.js';
import {
  TOP_FUNCTION,
  formalTypeAt,
  isBottomFunction,
  returnTypeOf,
  signatureEquals,
  totalArity,
} from './signature.js';
import { SignatureBuilder } from './builder.js';
import {
  BOTTOM,
  UNKNOWN,
  isBottomValue,
  isUnknownValue,
  joinValues,
  meetValues,
} from './value.js';
import { checkArgument, checkState } from '../utils/invariant.js';

// ============================================================================
// Pass-through Operations
// ============================================================================

/**
 * Join where an absent side passes the other through
 */
function passThroughJoin(a: ValueType | undefined, b: ValueType | undefined): ValueType {
  if (a === undefined) {
    checkArgument(b !== undefined, 'both formals absent');
    return b;
  }
  return b === undefined ? a : joinValues(a, b);
}

/**
 * Meet where an absent side passes the other through
 */
function passThroughMeet(a: ValueType | undefined, b: ValueType | undefined): ValueType {
  if (a === undefined) {
    checkArgument(b !== undefined, 'both formals absent');
    return b;
  }
  return b === undefined ? a : meetValues(a, b);
}

// ============================================================================
// Loose Join
// ============================================================================

/**
 * Join and meet of loose signatures. Formals are always joined, and the
 * result never has a rest formal: there is no way for varargs
 * information to reach a function summary.
 */
function looseJoin(f1: Signature, f2: Signature): Signature {
  checkArgument(f1.loose || f2.loose, 'looseJoin on two precise signatures');

  const builder = new SignatureBuilder();
  const minRequired = Math.min(f1.requiredFormals.length, f2.requiredFormals.length);
  for (let i = 0; i < minRequired; i++) {
    builder.addRequiredFormal(passThroughJoin(formalTypeAt(f1, i), formalTypeAt(f2, i)));
  }
  const maxTotal = Math.max(totalArity(f1), totalArity(f2));
  for (let i = minRequired; i < maxTotal; i++) {
    builder.addOptionalFormal(passThroughJoin(formalTypeAt(f1, i), formalTypeAt(f2, i)));
  }
  return builder
    .addReturnType(joinValues(f1.returnType, f2.returnType))
    .markLoose()
    .build();
}

// ============================================================================
// Join
// ============================================================================

/**
 * Least upper bound. An absent operand is the identity.
 */
export function joinSignatures(f1: FunctionSignature, f2: FunctionSignature): FunctionSignature;
export function joinSignatures(
  f1: FunctionSignature | undefined,
  f2: FunctionSignature | undefined
): FunctionSignature | undefined;
export function joinSignatures(
  f1: FunctionSignature | undefined,
  f2: FunctionSignature | undefined
): FunctionSignature | undefined {
  if (f1 === undefined) {
    return f2;
  }
  if (f2 === undefined || isBottomFunction(f2) || signatureEquals(f1, f2)) {
    return f1;
  }
  if (isBottomFunction(f1)) {
    return f2;
  }
  if (f1.kind === 'top' || f2.kind === 'top') {
    return TOP_FUNCTION;
  }
  if (f1.loose || f2.loose) {
    return looseJoin(f1, f2);
  }

  const builder = new SignatureBuilder();
  const maxRequired = Math.max(f1.requiredFormals.length, f2.requiredFormals.length);
  for (let i = 0; i < maxRequired; i++) {
    builder.addRequiredFormal(passThroughMeet(formalTypeAt(f1, i), formalTypeAt(f2, i)));
  }
  const maxTotal = Math.max(totalArity(f1), totalArity(f2));
  for (let i = maxRequired; i < maxTotal; i++) {
    builder.addOptionalFormal(passThroughMeet(formalTypeAt(f1, i), formalTypeAt(f2, i)));
  }
  if (f1.restFormal !== undefined && f2.restFormal !== undefined) {
    builder.addRestFormal(meetValues(f1.restFormal, f2.restFormal));
  }
  return builder
    .addReturnType(joinValues(f1.returnType, f2.returnType))
    .build();
}

// ============================================================================
// Meet
// ============================================================================

/**
 * Greatest lower bound. An absent operand makes the result absent.
 */
export function meetSignatures(f1: FunctionSignature, f2: FunctionSignature): FunctionSignature;
export function meetSignatures(
  f1: FunctionSignature | undefined,
  f2: FunctionSignature | undefined
): FunctionSignature | undefined;
export function meetSignatures(
  f1: FunctionSignature | undefined,
  f2: FunctionSignature | undefined
): FunctionSignature | undefined {
  if (f1 === undefined || f2 === undefined) {
    return undefined;
  }
  if (f1.kind === 'top') {
    return f2;
  }
  if (f2.kind === 'top' || signatureEquals(f1, f2)) {
    return f1;
  }
  // Meet is join for loose signatures
  if (f1.loose || f2.loose) {
    return looseJoin(f1, f2);
  }

  const builder = new SignatureBuilder();
  const minRequired = Math.min(f1.requiredFormals.length, f2.requiredFormals.length);
  for (let i = 0; i < minRequired; i++) {
    builder.addRequiredFormal(passThroughJoin(formalTypeAt(f1, i), formalTypeAt(f2, i)));
  }
  const maxTotal = Math.max(totalArity(f1), totalArity(f2));
  for (let i = minRequired; i < maxTotal; i++) {
    builder.addOptionalFormal(passThroughJoin(formalTypeAt(f1, i), formalTypeAt(f2, i)));
  }
  if (f1.restFormal !== undefined || f2.restFormal !== undefined) {
    builder.addRestFormal(passThroughJoin(f1.restFormal, f2.restFormal));
  }
  return builder
    .addReturnType(meetValues(f1.returnType, f2.returnType))
    .build();
}

// ============================================================================
// Specialize
// ============================================================================

/**
 * Narrow `f` with an observed signature. Precise information is never
 * replaced by a loose approximation.
 */
export function specialize(f: FunctionSignature, other: FunctionSignature | undefined): FunctionSignature | undefined {
  if (other === undefined) {
    return undefined;
  }
  if (!f.loose && other.loose) {
    return f;
  }
  return meetSignatures(f, other);
}

// ============================================================================
// Subtyping
// ============================================================================

function bottomIfUnknown(t: ValueType): ValueType {
  return isUnknownValue(t) ? BOTTOM : t;
}

/**
 * f <: other iff other = f ⊔ other.
 *
 * That characterization does not hold as-is in the presence of `?`, so
 * the comparison is made against a copy of `other` in which unknown
 * formals become bottom, and whose return type is unknown when f's is.
 */
export function isSubtypeOf(f: FunctionSignature, other: FunctionSignature): boolean {
  if (other.kind === 'top') {
    return true;
  }
  if (f.kind === 'top') {
    return false;
  }

  const builder = new SignatureBuilder();
  for (const formal of other.requiredFormals) {
    builder.addRequiredFormal(bottomIfUnknown(formal));
  }
  for (const formal of other.optionalFormals) {
    builder.addOptionalFormal(bottomIfUnknown(formal));
  }
  if (other.restFormal !== undefined) {
    builder.addOptionalFormal(bottomIfUnknown(other.restFormal));
  }
  builder.addReturnType(isUnknownValue(f.returnType) ? UNKNOWN : other.returnType);
  if (other.loose) {
    builder.markLoose();
  }

  const adjusted = builder.build();
  return signatureEquals(adjusted, joinSignatures(f, adjusted));
}

/**
 * Best-effort compatibility check for deferred checks on inferred
 * signatures. At least one side must be loose.
 *
 * Fails only when some formal among the required ones, or the return
 * type, has an empty meet.
 */
export function isLooseSubtypeOf(f: FunctionSignature, other: FunctionSignature): boolean {
  checkState(f.loose || other.loose, 'isLooseSubtypeOf needs a loose signature');
  if (f.kind === 'top' || other.kind === 'top') {
    return true;
  }

  const maxRequired = Math.max(f.requiredFormals.length, other.requiredFormals.length);
  for (let i = 0; i < maxRequired; i++) {
    if (isBottomValue(passThroughMeet(formalTypeAt(f, i), formalTypeAt(other, i)))) {
      return false;
    }
  }

  const ret = returnTypeOf(f);
  const otherRet = returnTypeOf(other);
  if (!isBottomValue(ret) && !isBottomValue(otherRet) && isBottomValue(meetValues(ret, otherRet))) {
    return false;
  }
  return true;
}
