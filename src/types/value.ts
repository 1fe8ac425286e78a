/**
 * Value Types - The lattice of non-function values
 *
 * Parameter and return types of a signature are drawn from this lattice.
 * It is deliberately small: just enough structure for the function lattice
 * to merge, narrow and compare signatures.
 *
 *   ⊤ (top)         every value
 *   ? (unknown)     not yet known; absorbs joins, neutral in meets
 *   ⊥ (bottom)      no value
 *   atoms           primitives, class instances, callables
 *   unions          two or more atoms
 */

import type { NominalClass } from './nominal.js';
import type { Signature } from './signature.js';
import { hashString, combineHashes } from '../utils/hash.js';

// ============================================================================
// Value Types
// ============================================================================

interface ValueTypeBase {
  readonly kind: string;
}

export interface TopValue extends ValueTypeBase {
  readonly kind: 'top';
}

export interface BottomValue extends ValueTypeBase {
  readonly kind: 'bottom';
}

export interface UnknownValue extends ValueTypeBase {
  readonly kind: 'unknown';
}

export type PrimitiveName = 'number' | 'string' | 'boolean' | 'null' | 'undefined';

export interface PrimitiveValue extends ValueTypeBase {
  readonly kind: 'primitive';
  readonly name: PrimitiveName;
}

/**
 * Instance of a nominal class
 */
export interface InstanceValue extends ValueTypeBase {
  readonly kind: 'instance';
  readonly klass: NominalClass;
}

/**
 * A function value. Carries the class it constructs when it is a
 * constructor object.
 */
export interface CallableValue extends ValueTypeBase {
  readonly kind: 'callable';
  readonly signature: Signature;
  readonly klass?: NominalClass;
}

export interface UnionValue extends ValueTypeBase {
  readonly kind: 'union';
  /** At least two atoms, no duplicates */
  readonly members: readonly AtomValue[];
}

export type AtomValue = PrimitiveValue | InstanceValue | CallableValue;

export type ValueType =
  | TopValue
  | BottomValue
  | UnknownValue
  | AtomValue
  | UnionValue;

// ============================================================================
// Constants
// ============================================================================

export const TOP: TopValue = { kind: 'top' };
export const BOTTOM: BottomValue = { kind: 'bottom' };
export const UNKNOWN: UnknownValue = { kind: 'unknown' };

export const NUMBER: PrimitiveValue = { kind: 'primitive', name: 'number' };
export const STRING: PrimitiveValue = { kind: 'primitive', name: 'string' };
export const BOOLEAN: PrimitiveValue = { kind: 'primitive', name: 'boolean' };
export const NULL: PrimitiveValue = { kind: 'primitive', name: 'null' };
export const UNDEFINED: PrimitiveValue = { kind: 'primitive', name: 'undefined' };

// ============================================================================
// Predicates
// ============================================================================

export function isTopValue(t: ValueType): t is TopValue {
  return t.kind === 'top';
}

export function isBottomValue(t: ValueType): t is BottomValue {
  return t.kind === 'bottom';
}

export function isUnknownValue(t: ValueType): t is UnknownValue {
  return t.kind === 'unknown';
}

function isAtom(t: ValueType): t is AtomValue {
  return t.kind === 'primitive' || t.kind === 'instance' || t.kind === 'callable';
}

// ============================================================================
// Nominal Wrapping
// ============================================================================

/**
 * The type of instances of `klass`
 */
export function instanceOf(klass: NominalClass): InstanceValue {
  return { kind: 'instance', klass };
}

/**
 * The class of an instance type, if `t` is one
 */
export function classOfInstance(t: ValueType): NominalClass | undefined {
  return t.kind === 'instance' ? t.klass : undefined;
}

// ============================================================================
// Unions
// ============================================================================

function atomsOf(t: ValueType): readonly AtomValue[] {
  if (t.kind === 'union') return t.members;
  return isAtom(t) ? [t] : [];
}

function atomEquals(a: AtomValue, b: AtomValue): boolean {
  switch (a.kind) {
    case 'primitive':
      return b.kind === 'primitive' && a.name === b.name;
    case 'instance':
      return b.kind === 'instance' && a.klass === b.klass;
    case 'callable':
      return b.kind === 'callable' && a.klass === b.klass && signatureRecordsEqual(a.signature, b.signature);
  }
}

function formalsEqual(a: readonly ValueType[], b: readonly ValueType[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((t, i) => {
    const other = b[i];
    return other !== undefined && valueEquals(t, other);
  });
}

/**
 * Structural equality of two signatures over their formals, rest formal
 * and stored return type. Looseness, owner class and captured variables
 * do not take part.
 */
export function signatureRecordsEqual(a: Signature, b: Signature): boolean {
  if (a === b) return true;
  if (a.restFormal === undefined || b.restFormal === undefined) {
    if (a.restFormal !== b.restFormal) return false;
  } else if (!valueEquals(a.restFormal, b.restFormal)) {
    return false;
  }
  return formalsEqual(a.requiredFormals, b.requiredFormals) &&
    formalsEqual(a.optionalFormals, b.optionalFormals) &&
    valueEquals(a.returnType, b.returnType);
}

/**
 * Build a value from a set of atoms, collapsing the trivial cases.
 * An instance of a superclass subsumes instances of its subclasses.
 */
export function unionOf(atoms: readonly AtomValue[]): ValueType {
  const members: AtomValue[] = [];

  for (const atom of atoms) {
    if (members.some(m => atomEquals(m, atom) || subsumes(m, atom))) {
      continue;
    }
    for (let i = members.length - 1; i >= 0; i--) {
      const existing = members[i];
      if (existing !== undefined && subsumes(atom, existing)) {
        members.splice(i, 1);
      }
    }
    members.push(atom);
  }

  const [first] = members;
  if (first === undefined) return BOTTOM;
  if (members.length === 1) return first;
  return { kind: 'union', members };
}

function subsumes(sup: AtomValue, sub: AtomValue): boolean {
  return sup.kind === 'instance' &&
    sub.kind === 'instance' &&
    sup.klass !== sub.klass &&
    sub.klass.isSubclassOf(sup.klass);
}

// ============================================================================
// Lattice Operations
// ============================================================================

/**
 * Least upper bound
 */
export function joinValues(a: ValueType, b: ValueType): ValueType {
  if (a.kind === 'top' || b.kind === 'top') return TOP;
  if (a.kind === 'unknown' || b.kind === 'unknown') return UNKNOWN;
  if (a.kind === 'bottom') return b;
  if (b.kind === 'bottom') return a;
  return unionOf([...atomsOf(a), ...atomsOf(b)]);
}

/**
 * Greatest lower bound
 */
export function meetValues(a: ValueType, b: ValueType): ValueType {
  // TOP before UNKNOWN on both sides, so that ⊤ ⊓ ? = ? in either order
  if (a.kind === 'top') return b;
  if (b.kind === 'top') return a;
  if (a.kind === 'unknown') return b;
  if (b.kind === 'unknown') return a;
  if (a.kind === 'bottom' || b.kind === 'bottom') return BOTTOM;

  const survivors: AtomValue[] = [];
  for (const x of atomsOf(a)) {
    for (const y of atomsOf(b)) {
      const met = meetAtoms(x, y);
      if (met !== undefined) {
        survivors.push(met);
      }
    }
  }
  return unionOf(survivors);
}

function meetAtoms(x: AtomValue, y: AtomValue): AtomValue | undefined {
  if (atomEquals(x, y)) return x;
  if (subsumes(x, y)) return y;
  if (subsumes(y, x)) return x;
  return undefined;
}

// ============================================================================
// Equality and Hashing
// ============================================================================

/**
 * Structural equality; union members compare as sets
 */
export function valueEquals(a: ValueType, b: ValueType): boolean {
  if (a === b) return true;
  if (a.kind === 'union' && b.kind === 'union') {
    return a.members.length === b.members.length &&
      a.members.every(am => b.members.some(bm => atomEquals(am, bm)));
  }
  if (isAtom(a) && isAtom(b)) {
    return atomEquals(a, b);
  }
  return a.kind === b.kind && (a.kind === 'top' || a.kind === 'bottom' || a.kind === 'unknown');
}

export function hashValue(t: ValueType): number {
  if (t.kind === 'union') {
    // Order-independent: members are summed
    let h = 0;
    for (const m of t.members) {
      h = (h + hashValue(m)) | 0;
    }
    return combineHashes([hashString('union'), h]);
  }
  return hashString(valueToString(t));
}

// ============================================================================
// Rendering
// ============================================================================

export function valueToString(t: ValueType): string {
  switch (t.kind) {
    case 'top':
      return '*';
    case 'bottom':
      return 'bottom';
    case 'unknown':
      return '?';
    case 'primitive':
      return t.name;
    case 'instance':
      return t.klass.name;
    case 'callable':
      return t.klass ? `new:${t.klass.name}` : 'function';
    case 'union':
      return `(${t.members.map(valueToString).join('|')})`;
  }
}
