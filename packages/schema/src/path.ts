/**
 * Confgate Schema: Path Parser
 *
 * Parses data paths of the form
 *
 *   /interfaces/interface[name='eth0']/mtu
 *   ietf-system:system/user[name="admin"]
 *   run-command/input/command
 *
 * The leading `/` is optional. The first segment, and only the first, may
 * carry a `module:` prefix. Any segment may carry key predicates; a
 * multi-key list entry repeats the bracket (`[a='1'][b='2']`).
 *
 * The parser is syntactic only. Whether a predicate names a real key is the
 * tree's concern.
 */

import { PathSyntaxError } from './errors.js';

/** One `[name='value']` predicate. */
export interface KeyPredicate {
  readonly name: string;
  readonly value: string;
}

export interface PathSegment {
  readonly prefix: string | null;
  readonly name: string;
  readonly keys: ReadonlyArray<KeyPredicate>;
}

const IDENT_START = /[A-Za-z_]/;
const IDENT_REST = /[A-Za-z0-9_.-]/;

/**
 * Parse a data path into segments.
 *
 * @throws {PathSyntaxError} on empty paths, empty segments, bad identifiers,
 *   unterminated or malformed predicates, or a prefix after the first segment
 */
export function parsePath(source: string): ReadonlyArray<PathSegment> {
  let pos = source.startsWith('/') ? 1 : 0;
  if (pos >= source.length) {
    throw new PathSyntaxError(source, pos, 'path has no segments');
  }

  const segments: PathSegment[] = [];

  const fail = (detail: string): never => {
    throw new PathSyntaxError(source, pos, detail);
  };

  const readIdent = (): string => {
    const start = pos;
    const first = source[pos];
    if (first === undefined || !IDENT_START.test(first)) {
      fail('expected an identifier');
    }
    pos++;
    while (pos < source.length) {
      const ch = source[pos];
      if (ch === undefined || !IDENT_REST.test(ch)) break;
      pos++;
    }
    return source.slice(start, pos);
  };

  const skipSpaces = (): void => {
    while (source[pos] === ' ') pos++;
  };

  const readQuoted = (): string => {
    const quote = source[pos];
    if (quote !== "'" && quote !== '"') {
      return fail('expected a quoted key value');
    }
    const end = source.indexOf(quote, pos + 1);
    if (end === -1) {
      return fail('unterminated key value');
    }
    const value = source.slice(pos + 1, end);
    pos = end + 1;
    return value;
  };

  while (pos < source.length) {
    let prefix: string | null = null;
    let name = readIdent();
    if (source[pos] === ':') {
      if (segments.length > 0) {
        fail('module prefix is only allowed on the first segment');
      }
      pos++;
      prefix = name;
      name = readIdent();
    }

    const keys: KeyPredicate[] = [];
    while (source[pos] === '[') {
      pos++;
      skipSpaces();
      const keyName = readIdent();
      skipSpaces();
      if (source[pos] !== '=') {
        fail("expected '=' in key predicate");
      }
      pos++;
      skipSpaces();
      const value = readQuoted();
      skipSpaces();
      if (source[pos] !== ']') {
        fail("expected ']' to close key predicate");
      }
      pos++;
      keys.push({ name: keyName, value });
    }

    segments.push({ prefix, name, keys });

    if (pos === source.length) break;
    if (source[pos] !== '/') {
      fail("expected '/' between segments");
    }
    pos++;
    if (pos === source.length) {
      fail('trailing slash');
    }
  }

  return segments;
}

/**
 * Render key predicates in path syntax. Values containing a single quote are
 * wrapped in double quotes.
 */
export function formatKeys(keys: ReadonlyArray<KeyPredicate>): string {
  return keys
    .map((k) => (k.value.includes("'") ? `[${k.name}="${k.value}"]` : `[${k.name}='${k.value}']`))
    .join('');
}

/** Render parsed segments back to a canonical instance path. */
export function formatPath(segments: ReadonlyArray<PathSegment>): string {
  return segments
    .map((s) => `/${s.prefix !== null ? `${s.prefix}:` : ''}${s.name}${formatKeys(s.keys)}`)
    .join('');
}
