/**
 * Confgate Kernel: Policy Compiler
 *
 * Turns configured policy entries into a CompiledPolicy:
 * - Entries for the same (module, principal class) are merged; their
 *   operation sets are unioned.
 * - Merged entries are sorted by module, then class, and each operation
 *   list is sorted, so that the hash does not depend on input order.
 * - The grant table and every entry are frozen.
 *
 * Compiling is pure. Versioning happens in PolicyStore.
 */

import type { CompiledPolicy, GrantTable, PolicyEntry, PolicyHash } from '../types/policy.js';
import { Operation } from '../types/policy.js';
import { sha256Canonical } from './canonical.js';

const OPERATION_ORDER: ReadonlyArray<Operation> = [Operation.Read, Operation.Write, Operation.Execute];

export function compilePolicy(entries: ReadonlyArray<PolicyEntry>): CompiledPolicy {
  const grants = new Map<string, Map<string, Set<Operation>>>();

  for (const entry of entries) {
    let byClass = grants.get(entry.module_name);
    if (byClass === undefined) {
      byClass = new Map();
      grants.set(entry.module_name, byClass);
    }
    let ops = byClass.get(entry.principal_class);
    if (ops === undefined) {
      ops = new Set();
      byClass.set(entry.principal_class, ops);
    }
    for (const op of entry.operations) ops.add(op);
  }

  const canonical: PolicyEntry[] = [];
  for (const module of [...grants.keys()].sort()) {
    const byClass = grants.get(module);
    if (byClass === undefined) continue;
    for (const principalClass of [...byClass.keys()].sort()) {
      const ops = byClass.get(principalClass) ?? new Set<Operation>();
      canonical.push(
        Object.freeze({
          module_name: module,
          principal_class: principalClass,
          operations: Object.freeze(OPERATION_ORDER.filter((op) => ops.has(op))),
        }),
      );
    }
  }

  return Object.freeze({
    entries: Object.freeze(canonical),
    grants: grants satisfies GrantTable,
    hash: hashPolicy(canonical),
  });
}

/**
 * SHA-256 over the canonical JSON of compiled entries.
 *
 * The only place a PolicyHash is minted.
 */
export function hashPolicy(entries: ReadonlyArray<PolicyEntry>): PolicyHash {
  return sha256Canonical(entries) as PolicyHash;
}
