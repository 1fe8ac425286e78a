/**
 * Signature Formatter - Canonical text for function signatures
 *
 *   function (new:Foo, number, string=, ...boolean): undefined (loose)\tFV:{x=number}
 *
 * Used for diagnostics only; the output is never parsed back.
 */

import type { FunctionSignature } from '../types/signature.js';
import { valueToString } from '../types/value.js';

/**
 * Format options for signature output
 */
export interface FormatOptions {
  /** Append ` (loose)` to loose signatures */
  showLoose?: boolean;
  /** Append the captured-variable preconditions, if any */
  showCapturedVars?: boolean;
  /** Prefix constructors with `new:<ClassName>` */
  showConstructor?: boolean;
}

export const DEFAULT_FORMAT_OPTIONS: Required<FormatOptions> = {
  showLoose: true,
  showCapturedVars: true,
  showConstructor: true,
};

/**
 * Format a signature. The defaults give the canonical rendering.
 */
export function formatSignature(f: FunctionSignature, options: FormatOptions = {}): string {
  const opts = { ...DEFAULT_FORMAT_OPTIONS, ...options };
  const loose = opts.showLoose && f.loose ? ' (loose)' : '';

  if (f.kind === 'top') {
    return `TOP_FUNCTION${loose}`;
  }

  const formals: string[] = [];
  if (opts.showConstructor && f.ownerClass) {
    formals.push(`new:${f.ownerClass.name}`);
  }
  for (const formal of f.requiredFormals) {
    formals.push(valueToString(formal));
  }
  for (const formal of f.optionalFormals) {
    formals.push(`${valueToString(formal)}=`);
  }
  if (f.restFormal !== undefined) {
    formals.push(`...${valueToString(f.restFormal)}`);
  }

  let result = `function (${formals.join(', ')}): ${valueToString(f.returnType)}${loose}`;
  if (opts.showCapturedVars && f.capturedVarPreconditions.size > 0) {
    const vars = [...f.capturedVarPreconditions]
      .map(([name, type]) => `${name}=${valueToString(type)}`)
      .join(', ');
    result += `\tFV:{${vars}}`;
  }
  return result;
}
