/**
 * 32-bit hashing helpers
 */

/**
 * Hash a string (31 * h + c, kept in 32 bits)
 */
export function hashString(text: string): number {
  let h = 0;
  for (let i = 0; i < text.length; i++) {
    h = (Math.imul(31, h) + text.charCodeAt(i)) | 0;
  }
  return h;
}

/**
 * Combine hashes in order
 */
export function combineHashes(hashes: readonly number[]): number {
  let h = 1;
  for (const part of hashes) {
    h = (Math.imul(31, h) + part) | 0;
  }
  return h;
}
