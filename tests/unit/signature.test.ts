/**
 * Tests for signature construction and queries
 */

import { describe, it, expect } from 'vitest';
import {
  TOP,
  BOTTOM,
  UNKNOWN,
  NUMBER,
  STRING,
  BOOLEAN,
  UNDEFINED,
  TOP_FUNCTION,
  LOOSE_TOP_FUNCTION,
  BOTTOM_FUNCTION,
  UNBOUNDED_ARITY,
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
  typeOfThis,
  constructorObject,
  signatureEquals,
  hashSignature,
  nominalClass,
  classOfInstance,
  InvariantError,
} from '../../src/index.js';

describe('Signature', () => {
  const Foo = nominalClass('Foo');

  describe('normalization', () => {
    it('should drop a trailing optional formal equal to the rest formal', () => {
      const f = normalized({ optionalFormals: [STRING], restFormal: STRING, returnType: NUMBER });
      expect(f.optionalFormals).toEqual([]);
      expect(f.restFormal).toBe(STRING);
    });

    it('should drop every redundant trailing optional formal', () => {
      const f = normalized({
        optionalFormals: [NUMBER, STRING, STRING],
        restFormal: STRING,
        returnType: NUMBER,
      });
      expect(f.optionalFormals).toEqual([NUMBER]);
    });

    it('should keep optional formals that are not trailing', () => {
      const f = normalized({
        optionalFormals: [STRING, NUMBER],
        restFormal: STRING,
        returnType: NUMBER,
      });
      expect(f.optionalFormals).toEqual([STRING, NUMBER]);
    });

    it('should default absent parts', () => {
      const f = normalized({ returnType: UNDEFINED });
      expect(f.requiredFormals).toEqual([]);
      expect(f.optionalFormals).toEqual([]);
      expect(f.restFormal).toBeUndefined();
      expect(f.ownerClass).toBeUndefined();
      expect(f.capturedVarPreconditions.size).toBe(0);
      expect(f.loose).toBe(false);
    });

    it('should not alias the caller\'s lists', () => {
      const required = [NUMBER];
      const f = normalized({ requiredFormals: required, returnType: NUMBER });
      required.push(STRING);
      expect(f.requiredFormals).toEqual([NUMBER]);
    });
  });

  describe('sentinels', () => {
    it('should recognize both top functions', () => {
      expect(isTopFunction(TOP_FUNCTION)).toBe(true);
      expect(isTopFunction(LOOSE_TOP_FUNCTION)).toBe(true);
      expect(isLoose(TOP_FUNCTION)).toBe(false);
      expect(isLoose(LOOSE_TOP_FUNCTION)).toBe(true);
      expect(isTopFunction(BOTTOM_FUNCTION)).toBe(false);
    });

    it('should shape the bottom function as (...*): bottom', () => {
      expect(BOTTOM_FUNCTION.requiredFormals).toEqual([]);
      expect(BOTTOM_FUNCTION.optionalFormals).toEqual([]);
      expect(BOTTOM_FUNCTION.restFormal).toBe(TOP);
      expect(BOTTOM_FUNCTION.returnType).toBe(BOTTOM);
    });

    it('should recognize the bottom function structurally', () => {
      expect(isBottomFunction(BOTTOM_FUNCTION)).toBe(true);
      expect(isBottomFunction(normalized({ restFormal: TOP, returnType: BOTTOM, loose: true }))).toBe(true);
      expect(isBottomFunction(normalized({ restFormal: NUMBER, returnType: BOTTOM }))).toBe(false);
      expect(isBottomFunction(TOP_FUNCTION)).toBe(false);
    });

    it('should mark signatures loose', () => {
      const f = normalized({ requiredFormals: [NUMBER], returnType: STRING });
      const loose = withLoose(f);
      expect(loose.loose).toBe(true);
      expect(f.loose).toBe(false);
      expect(signatureEquals(f, loose)).toBe(true);
      expect(withLoose(TOP_FUNCTION)).toBe(LOOSE_TOP_FUNCTION);
    });
  });

  describe('formalTypeAt', () => {
    const f = normalized({
      requiredFormals: [NUMBER],
      optionalFormals: [STRING],
      restFormal: BOOLEAN,
      returnType: UNDEFINED,
    });

    it('should fall back from required to optional to rest', () => {
      expect(formalTypeAt(f, 0)).toBe(NUMBER);
      expect(formalTypeAt(f, 1)).toBe(STRING);
      expect(formalTypeAt(f, 2)).toBe(BOOLEAN);
      expect(formalTypeAt(f, 7)).toBe(BOOLEAN);
    });

    it('should be undefined past the last formal of a non-variadic signature', () => {
      const g = normalized({ requiredFormals: [NUMBER], returnType: UNDEFINED });
      expect(formalTypeAt(g, 1)).toBeUndefined();
    });

    it('should fail on the top function', () => {
      expect(() => formalTypeAt(TOP_FUNCTION, 0)).toThrow(InvariantError);
    });

    it('should fail on a negative position', () => {
      expect(() => formalTypeAt(f, -1)).toThrow(InvariantError);
    });
  });

  describe('arity', () => {
    it('should count required and optional formals', () => {
      const f = normalized({ requiredFormals: [NUMBER, NUMBER], optionalFormals: [STRING], returnType: NUMBER });
      expect(minArity(f)).toBe(2);
      expect(maxArity(f)).toBe(3);
    });

    it('should be unbounded with a rest formal', () => {
      const f = normalized({ requiredFormals: [NUMBER], restFormal: STRING, returnType: NUMBER });
      expect(minArity(f)).toBe(1);
      expect(maxArity(f)).toBe(UNBOUNDED_ARITY);
    });

    it('should fail on the top function', () => {
      expect(() => minArity(TOP_FUNCTION)).toThrow(InvariantError);
      expect(() => maxArity(LOOSE_TOP_FUNCTION)).toThrow(InvariantError);
    });
  });

  describe('constructors', () => {
    const ctor = normalized({ requiredFormals: [NUMBER], returnType: UNDEFINED, ownerClass: Foo });
    const plain = normalized({ requiredFormals: [NUMBER], returnType: UNDEFINED });

    it('should be recognized by owner class', () => {
      expect(isConstructor(ctor)).toBe(true);
      expect(isConstructor(plain)).toBe(false);
      expect(isConstructor(TOP_FUNCTION)).toBe(false);
    });

    it('should return an instance of the owner class', () => {
      expect(classOfInstance(returnTypeOf(ctor))).toBe(Foo);
      expect(returnTypeOf(plain)).toBe(UNDEFINED);
    });

    it('should type this as an instance of the owner class', () => {
      expect(typeOfThis(ctor).klass).toBe(Foo);
      expect(() => typeOfThis(plain)).toThrow(InvariantError);
      expect(() => typeOfThis(TOP_FUNCTION)).toThrow(InvariantError);
    });

    it('should delegate constructor objects to the owner class', () => {
      const value = constructorObject(ctor);
      expect(value.kind).toBe('callable');
      expect(value.klass).toBe(Foo);
      expect(value.signature).toBe(ctor);
      expect(() => constructorObject(plain)).toThrow(InvariantError);
    });
  });

  describe('captured variables', () => {
    const f = normalized({
      returnType: NUMBER,
      capturedVarPreconditions: new Map([['x', NUMBER]]),
    });

    it('should look up preconditions by name', () => {
      expect(capturedVarPrecondition(f, 'x')).toBe(NUMBER);
      expect(capturedVarPrecondition(f, 'y')).toBeUndefined();
    });

    it('should fail on the top function', () => {
      expect(() => capturedVarPrecondition(TOP_FUNCTION, 'x')).toThrow(InvariantError);
    });
  });

  describe('returnTypeOf', () => {
    it('should fail on the top function', () => {
      expect(() => returnTypeOf(TOP_FUNCTION)).toThrow(InvariantError);
    });
  });

  describe('checkValid', () => {
    it('should accept the sentinels and normalized signatures', () => {
      expect(() => checkValid(TOP_FUNCTION)).not.toThrow();
      expect(() => checkValid(BOTTOM_FUNCTION)).not.toThrow();
      expect(() => checkValid(normalized({ requiredFormals: [UNKNOWN], returnType: NUMBER }))).not.toThrow();
    });
  });

  describe('equality', () => {
    const base = normalized({ requiredFormals: [NUMBER], optionalFormals: [STRING], returnType: BOOLEAN });

    it('should ignore looseness', () => {
      const loose = normalized({
        requiredFormals: [NUMBER],
        optionalFormals: [STRING],
        returnType: BOOLEAN,
        loose: true,
      });
      expect(signatureEquals(base, loose)).toBe(true);
      expect(hashSignature(base)).toBe(hashSignature(loose));
    });

    it('should ignore owner class and captured variables', () => {
      const other = normalized({
        requiredFormals: [NUMBER],
        optionalFormals: [STRING],
        returnType: BOOLEAN,
        ownerClass: Foo,
        capturedVarPreconditions: new Map([['y', STRING]]),
      });
      expect(signatureEquals(base, other)).toBe(true);
      expect(hashSignature(base)).toBe(hashSignature(other));
    });

    it('should distinguish required from optional formals', () => {
      const other = normalized({ requiredFormals: [NUMBER, STRING], returnType: BOOLEAN });
      expect(signatureEquals(base, other)).toBe(false);
    });

    it('should compare rest formals', () => {
      const withRest = normalized({ requiredFormals: [NUMBER], optionalFormals: [STRING], restFormal: NUMBER, returnType: BOOLEAN });
      expect(signatureEquals(base, withRest)).toBe(false);
      expect(signatureEquals(withRest, withRest)).toBe(true);
    });

    it('should treat the two top functions as equal', () => {
      expect(signatureEquals(TOP_FUNCTION, LOOSE_TOP_FUNCTION)).toBe(true);
      expect(signatureEquals(TOP_FUNCTION, base)).toBe(false);
    });
  });

  describe('functionValue', () => {
    it('should wrap a normalized signature', () => {
      const value = functionValue([NUMBER], [STRING], STRING, BOOLEAN);
      expect(value.kind).toBe('callable');
      expect(value.klass).toBeUndefined();
      expect(value.signature.requiredFormals).toEqual([NUMBER]);
      expect(value.signature.optionalFormals).toEqual([]);
      expect(value.signature.restFormal).toBe(STRING);
    });
  });
});
