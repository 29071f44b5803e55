/**
 * Confgate Kernel: Canonical JSON
 *
 * JSON.stringify keeps property insertion order. Hashing needs a form in
 * which equal data always produces equal text, so object keys are sorted at
 * every level. Arrays keep their order.
 */

import { createHash } from 'node:crypto';

export function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'bigint') {
    return JSON.stringify(value.toString());
  }
  if (Array.isArray(value)) {
    return '[' + value.map(canonicalize).join(',') + ']';
  }
  if (value instanceof Set) {
    return canonicalize([...value].sort());
  }
  if (typeof value === 'object') {
    const pairs = Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`);
    return '{' + pairs.join(',') + '}';
  }
  return 'null';
}

/** SHA-256 hex digest of a value's canonical JSON. */
export function sha256Canonical(value: unknown): string {
  return createHash('sha256').update(canonicalize(value)).digest('hex');
}
