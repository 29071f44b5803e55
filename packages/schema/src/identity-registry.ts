/**
 * Confgate Schema: Identity Registry
 *
 * Identities form a directed acyclic graph: an identity may name several
 * bases. Derivation is reflexive and transitive.
 *
 * The registry precomputes, for every identity, a bitmask of itself and all
 * of its ancestors. isDerivedFrom() is then a single AND against the base's
 * bit; no graph walk happens per validation call.
 *
 * Built once, immutable afterwards.
 */

import { SchemaBuildError } from './errors.js';
import type { BuildIssue } from './errors.js';
import type { IdentitySpec } from './spec-types.js';
import type { Identity } from './types.js';

interface Entry {
  readonly identity: Identity;
  /** This identity's own bit. */
  readonly bit: bigint;
  /** Bits of this identity and every identity it derives from. */
  readonly closure: bigint;
}

export class IdentityRegistry {
  private constructor(private readonly entries: ReadonlyMap<string, Entry>) {}

  /** A registry with no identities. Every identityref lookup against it fails. */
  static empty(): IdentityRegistry {
    return new IdentityRegistry(new Map());
  }

  /**
   * Build a registry from identity definitions.
   *
   * @throws {SchemaBuildError} on duplicate names, bases that name no
   *   identity, or derivation cycles. All issues are reported together.
   */
  static build(defs: ReadonlyArray<IdentitySpec>): IdentityRegistry {
    const issues: BuildIssue[] = [];
    const byName = new Map<string, Identity>();

    for (const def of defs) {
      if (byName.has(def.name)) {
        issues.push({ path: `identity ${def.name}`, message: 'duplicate identity name' });
        continue;
      }
      byName.set(def.name, {
        name: def.name,
        module: def.module ?? null,
        bases: [...new Set(def.bases ?? [])],
      });
    }

    for (const identity of byName.values()) {
      for (const base of identity.bases) {
        if (!byName.has(base)) {
          issues.push({
            path: `identity ${identity.name}`,
            message: `base identity "${base}" is not defined`,
          });
        }
      }
    }

    if (issues.length === 0) {
      issues.push(...findCycles(byName));
    }
    if (issues.length > 0) {
      throw new SchemaBuildError(issues);
    }

    // Bits are assigned in sorted name order so that a given set of
    // definitions always yields the same masks.
    const names = [...byName.keys()].sort();
    const bits = new Map<string, bigint>();
    names.forEach((name, i) => bits.set(name, 1n << BigInt(i)));

    const closures = new Map<string, bigint>();
    const closureOf = (name: string): bigint => {
      const cached = closures.get(name);
      if (cached !== undefined) return cached;
      const identity = byName.get(name);
      let mask = bits.get(name) ?? 0n;
      for (const base of identity?.bases ?? []) {
        mask |= closureOf(base);
      }
      closures.set(name, mask);
      return mask;
    };

    const entries = new Map<string, Entry>();
    for (const name of names) {
      const identity = byName.get(name);
      if (identity === undefined) continue;
      entries.set(name, {
        identity: Object.freeze({ ...identity, bases: Object.freeze([...identity.bases]) }),
        bit: bits.get(name) ?? 0n,
        closure: closureOf(name),
      });
    }
    return new IdentityRegistry(entries);
  }

  get size(): number {
    return this.entries.size;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): Identity | undefined {
    return this.entries.get(name)?.identity;
  }

  /**
   * Look up a value as it appears in data: either a bare identity name or
   * `module:name`. A prefix must match the identity's own module.
   */
  resolve(value: string): Identity | undefined {
    const colon = value.indexOf(':');
    if (colon === -1) {
      return this.get(value);
    }
    const identity = this.get(value.slice(colon + 1));
    if (identity === undefined || identity.module !== value.slice(0, colon)) {
      return undefined;
    }
    return identity;
  }

  /**
   * True iff `candidate` equals `base` or derives from it through any chain
   * of bases. Unknown names on either side yield false.
   */
  isDerivedFrom(candidate: string, base: string): boolean {
    const c = this.entries.get(candidate);
    const b = this.entries.get(base);
    if (c === undefined || b === undefined) return false;
    return (c.closure & b.bit) !== 0n;
  }

  /** Names of every identity derived from `base` (including itself), sorted. */
  derivedFrom(base: string): ReadonlyArray<string> {
    const b = this.entries.get(base);
    if (b === undefined) return [];
    return [...this.entries.values()]
      .filter((e) => (e.closure & b.bit) !== 0n)
      .map((e) => e.identity.name);
  }

  list(): ReadonlyArray<Identity> {
    return [...this.entries.values()].map((e) => e.identity);
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/**
 * Depth-first search for derivation cycles. Each cycle is reported once, as
 * the chain of names that closes it.
 *
 * @internal
 */
function findCycles(byName: ReadonlyMap<string, Identity>): BuildIssue[] {
  const issues: BuildIssue[] = [];
  const state = new Map<string, 'visiting' | 'done'>();
  const stack: string[] = [];

  const visit = (name: string): void => {
    state.set(name, 'visiting');
    stack.push(name);
    for (const base of byName.get(name)?.bases ?? []) {
      const s = state.get(base);
      if (s === 'visiting') {
        const chain = [...stack.slice(stack.indexOf(base)), base];
        issues.push({
          path: `identity ${base}`,
          message: `derivation cycle: ${chain.join(' -> ')}`,
        });
      } else if (s === undefined) {
        visit(base);
      }
    }
    stack.pop();
    state.set(name, 'done');
  };

  for (const name of [...byName.keys()].sort()) {
    if (state.get(name) === undefined) visit(name);
  }
  return issues;
}
