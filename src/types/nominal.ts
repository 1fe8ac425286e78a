/**
 * Nominal classes - identity for constructors and instance types
 */

import type { Signature } from './signature.js';
import type { CallableValue } from './value.js';

export interface NominalClass {
  readonly name: string;
  readonly superClass?: NominalClass;
  /** True if this class is `other` or extends it, directly or not */
  isSubclassOf(other: NominalClass): boolean;
  /** The constructor function value for this class */
  createConstructorObject(signature: Signature): CallableValue;
}

/**
 * Create a nominal class. Classes compare by identity.
 */
export function nominalClass(name: string, superClass?: NominalClass): NominalClass {
  const klass: NominalClass = {
    name,
    superClass,
    isSubclassOf(other: NominalClass): boolean {
      let current: NominalClass | undefined = klass;
      while (current !== undefined) {
        if (current === other) return true;
        current = current.superClass;
      }
      return false;
    },
    createConstructorObject(signature: Signature): CallableValue {
      return { kind: 'callable', signature, klass };
    },
  };
  return klass;
}
