/**
 * Confgate Runtime Host: ULID
 *
 * 26-character Crockford Base32 identifiers: 10 characters of millisecond
 * timestamp followed by 16 characters of randomness. Used as the
 * `event_id` of every audit line, so that logs merged from several copies
 * can be deduplicated on read.
 */

import { randomBytes } from 'node:crypto';

const CROCKFORD = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const TIME_CHARS = 10;
const RANDOM_CHARS = 16;

/** Largest timestamp a ULID can carry (48 bits). */
const MAX_TIME = 2 ** 48 - 1;

function encode(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD.charAt(Number(v & 31n)) + out;
    v >>= 5n;
  }
  return out;
}

/**
 * Generate a ULID.
 *
 * @param now - Millisecond timestamp to encode; defaults to Date.now()
 * @throws {RangeError} if `now` is negative, fractional or beyond 48 bits
 */
export function ulid(now: number = Date.now()): string {
  if (!Number.isInteger(now) || now < 0 || now > MAX_TIME) {
    throw new RangeError(`ULID timestamp out of range: ${now}`);
  }
  let random = 0n;
  for (const byte of randomBytes(10)) {
    random = (random << 8n) | BigInt(byte);
  }
  return encode(BigInt(now), TIME_CHARS) + encode(random, RANDOM_CHARS);
}

/** The millisecond timestamp encoded in a ULID, or null if it is not one. */
export function decodeTime(id: string): number | null {
  if (id.length !== TIME_CHARS + RANDOM_CHARS) return null;
  let time = 0;
  for (const ch of id.slice(0, TIME_CHARS)) {
    const digit = CROCKFORD.indexOf(ch);
    if (digit === -1) return null;
    time = time * 32 + digit;
  }
  return time;
}
