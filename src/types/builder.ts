/**
 * SignatureBuilder - Incremental assembly of a signature
 *
 * Formals are added in declaration order: required, then optional, then
 * at most one rest formal. build() normalizes like direct construction.
 */

import type { NominalClass } from './nominal.js';
import type { Signature } from './signature.js';
import type { ValueType } from './value.js';
import { normalized } from './signature.js';
import { checkState } from '../utils/invariant.js';

/**
 * A formal was added after one that must follow it.
 * Declared signatures can be written this way, so callers may report it.
 */
export class ParameterOrderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParameterOrderError';
  }
}

export class SignatureBuilder {
  private readonly requiredFormals: ValueType[] = [];
  private readonly optionalFormals: ValueType[] = [];
  private restFormal: ValueType | undefined;
  private returnType: ValueType | undefined;
  private ownerClass: NominalClass | undefined;
  private readonly capturedVars = new Map<string, ValueType>();
  private loose = false;

  addRequiredFormal(type: ValueType): this {
    if (this.optionalFormals.length > 0 || this.restFormal !== undefined) {
      throw new ParameterOrderError('required formal after optional or rest formal');
    }
    this.requiredFormals.push(type);
    return this;
  }

  addOptionalFormal(type: ValueType): this {
    if (this.restFormal !== undefined) {
      throw new ParameterOrderError('optional formal after rest formal');
    }
    this.optionalFormals.push(type);
    return this;
  }

  addRestFormal(type: ValueType): this {
    checkState(this.restFormal === undefined, 'rest formal already set');
    this.restFormal = type;
    return this;
  }

  addReturnType(type: ValueType): this {
    checkState(this.returnType === undefined, 'return type already set');
    this.returnType = type;
    return this;
  }

  addOwnerClass(klass: NominalClass): this {
    checkState(this.ownerClass === undefined, 'owner class already set');
    this.ownerClass = klass;
    return this;
  }

  addCapturedVarPrecondition(name: string, type: ValueType): this {
    this.capturedVars.set(name, type);
    return this;
  }

  markLoose(): this {
    this.loose = true;
    return this;
  }

  build(): Signature {
    checkState(this.returnType !== undefined, 'signature built without a return type');
    return normalized({
      requiredFormals: this.requiredFormals,
      optionalFormals: this.optionalFormals,
      restFormal: this.restFormal,
      returnType: this.returnType,
      ownerClass: this.ownerClass,
      capturedVarPreconditions: this.capturedVars,
      loose: this.loose,
    });
  }
}
