/**
 * Confgate Schema: Scalar Type Checking
 *
 * Checks one raw value against one TypeConstraint and produces its
 * normalized form. Used by the tree builder to check declared defaults and
 * by the kernel validator for every leaf and leaf-list member.
 *
 * Pure: no state, no I/O. The identity registry is only read.
 */

import type { IdentityRegistry } from './identity-registry.js';
import type { IntegerWidth, ScalarValue, TypeConstraint } from './types.js';

/** Machine-readable reason a scalar was rejected. */
export type ScalarFailureKind =
  | 'type-mismatch'
  | 'pattern'
  | 'length'
  | 'range'
  | 'enumeration'
  | 'identity';

export type ScalarCheck =
  | { readonly ok: true; readonly value: ScalarValue; readonly unconstrained: boolean }
  | { readonly ok: false; readonly kind: ScalarFailureKind; readonly detail: string };

/** Inclusive bounds of each integer width. */
export const WIDTH_BOUNDS: Readonly<Record<IntegerWidth, { readonly min: bigint; readonly max: bigint }>> = {
  int8: { min: -128n, max: 127n },
  int16: { min: -32768n, max: 32767n },
  int32: { min: -2147483648n, max: 2147483647n },
  int64: { min: -9223372036854775808n, max: 9223372036854775807n },
  uint8: { min: 0n, max: 255n },
  uint16: { min: 0n, max: 65535n },
  uint32: { min: 0n, max: 4294967295n },
  uint64: { min: 0n, max: 18446744073709551615n },
};

const INTEGER_TEXT = /^[+-]?\d+$/;

/**
 * Parse an integer from a JS number or a decimal string. Returns null for
 * anything else, including non-integral and unsafe numbers.
 */
export function parseInteger(raw: unknown): bigint | null {
  if (typeof raw === 'number') {
    return Number.isSafeInteger(raw) ? BigInt(raw) : null;
  }
  if (typeof raw === 'string' && INTEGER_TEXT.test(raw)) {
    return BigInt(raw);
  }
  return null;
}

/** Short description of a value's JSON type, for rejection details. */
export function describeValue(raw: unknown): string {
  if (raw === null) return 'null';
  if (Array.isArray(raw)) return 'an array';
  if (typeof raw === 'object') return 'an object';
  return `a ${typeof raw}`;
}

/**
 * Check `raw` against `type`.
 *
 * String patterns are matched against the whole value: each compiled regex
 * is anchored at both ends, so a value that merely contains a matching
 * substring is rejected.
 */
export function checkScalar(
  type: TypeConstraint,
  raw: unknown,
  identities: IdentityRegistry,
): ScalarCheck {
  switch (type.kind) {
    case 'string': {
      if (typeof raw !== 'string') {
        return mismatch(`expected a string, got ${describeValue(raw)}`);
      }
      if (type.length !== null) {
        // Length counts code points, not UTF-16 units.
        const length = [...raw].length;
        if (length < type.length.min) {
          return { ok: false, kind: 'length', detail: `length ${length} is below minimum ${type.length.min}` };
        }
        if (type.length.max !== null && length > type.length.max) {
          return { ok: false, kind: 'length', detail: `length ${length} is above maximum ${type.length.max}` };
        }
      }
      for (const pattern of type.patterns) {
        if (!pattern.regex.test(raw)) {
          return {
            ok: false,
            kind: 'pattern',
            detail: `value does not fully match pattern "${pattern.source}"`,
          };
        }
      }
      return { ok: true, value: raw, unconstrained: false };
    }

    case 'numeric': {
      const n = parseInteger(raw);
      if (n === null) {
        return mismatch(`expected a ${type.width} integer, got ${describeValue(raw)}`);
      }
      if (n < type.min) {
        return { ok: false, kind: 'range', detail: `value ${n} is below minimum ${type.min}` };
      }
      if (n > type.max) {
        return { ok: false, kind: 'range', detail: `value ${n} is above maximum ${type.max}` };
      }
      // 64-bit values are carried as decimal strings; a JS number cannot
      // represent the whole width.
      const value = type.width === 'int64' || type.width === 'uint64' ? n.toString() : Number(n);
      return { ok: true, value, unconstrained: false };
    }

    case 'enumeration': {
      if (typeof raw !== 'string') {
        return mismatch(`expected an enumeration token, got ${describeValue(raw)}`);
      }
      if (!type.tokens.includes(raw)) {
        return {
          ok: false,
          kind: 'enumeration',
          detail: `value is not one of: ${type.tokens.join(', ')}`,
        };
      }
      return { ok: true, value: raw, unconstrained: false };
    }

    case 'identityref': {
      if (typeof raw !== 'string') {
        return mismatch(`expected an identity name, got ${describeValue(raw)}`);
      }
      const identity = identities.resolve(raw);
      if (identity === undefined) {
        return { ok: false, kind: 'identity', detail: `unknown identity "${raw}"` };
      }
      if (!identities.isDerivedFrom(identity.name, type.base)) {
        return {
          ok: false,
          kind: 'identity',
          detail: `identity "${identity.name}" is not derived from "${type.base}"`,
        };
      }
      return { ok: true, value: identity.name, unconstrained: false };
    }

    case 'boolean': {
      if (raw === true || raw === 'true') return { ok: true, value: true, unconstrained: false };
      if (raw === false || raw === 'false') return { ok: true, value: false, unconstrained: false };
      return mismatch(`expected a boolean, got ${describeValue(raw)}`);
    }

    case 'union': {
      for (const member of type.members) {
        const result = checkScalar(member, raw, identities);
        if (result.ok) return result;
      }
      return mismatch('value matches no member of the union');
    }

    case 'opaque': {
      if (typeof raw === 'string' || typeof raw === 'boolean') {
        return { ok: true, value: raw, unconstrained: true };
      }
      if (typeof raw === 'number' && Number.isFinite(raw)) {
        return { ok: true, value: raw, unconstrained: true };
      }
      return mismatch(`expected a scalar value, got ${describeValue(raw)}`);
    }
  }
}

function mismatch(detail: string): ScalarCheck {
  return { ok: false, kind: 'type-mismatch', detail };
}
