#!/usr/bin/env npx tsx
/**
 * Benchmark script to measure lattice operation throughput
 * Usage: npx tsx scripts/bench.ts [iterations]
 */

import {
  NUMBER,
  STRING,
  BOOLEAN,
  UNKNOWN,
  SignatureBuilder,
  joinSignatures,
  meetSignatures,
  isSubtypeOf,
} from '../src/index.js';
import type { Signature, ValueType } from '../src/index.js';

const iterations = Number(process.argv[2] ?? '10000');
if (!Number.isInteger(iterations) || iterations <= 0) {
  console.error(`Error: bad iteration count '${process.argv[2]}'`);
  process.exit(1);
}

const palette: readonly ValueType[] = [NUMBER, STRING, BOOLEAN, UNKNOWN];

function pick(seed: number): ValueType {
  return palette[seed % palette.length] ?? NUMBER;
}

// A fixed batch of signatures of varying shape
const signatures: Signature[] = [];
for (let i = 0; i < 64; i++) {
  const builder = new SignatureBuilder();
  for (let j = 0; j < i % 4; j++) builder.addRequiredFormal(pick(i + j));
  for (let j = 0; j < i % 3; j++) builder.addOptionalFormal(pick(i * 3 + j));
  if (i % 5 === 0) builder.addRestFormal(pick(i));
  if (i % 7 === 0) builder.markLoose();
  signatures.push(builder.addReturnType(pick(i * 7)).build());
}

function time(label: string, op: (a: Signature, b: Signature) => unknown): void {
  const start = performance.now();
  for (let n = 0; n < iterations; n++) {
    const a = signatures[n % signatures.length];
    const b = signatures[(n * 31 + 7) % signatures.length];
    if (a !== undefined && b !== undefined) op(a, b);
  }
  const elapsed = performance.now() - start;
  console.log(`${label}: ${elapsed.toFixed(2)}ms (${((iterations / elapsed) * 1000).toFixed(0)} ops/s)`);
}

console.log(`Signatures: ${signatures.length}, iterations: ${iterations}`);
console.log('');

time('join', joinSignatures);
time('meet', meetSignatures);
time('isSubtypeOf', isSubtypeOf);
