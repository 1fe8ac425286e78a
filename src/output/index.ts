/**
 * Output module exports
 */

export { formatSignature, DEFAULT_FORMAT_OPTIONS } from './formatter.js';
export type { FormatOptions } from './formatter.js';
