/**
 * Confgate Kernel: Policy Store
 *
 * Holds the active PolicySnapshot. Readers take the current snapshot with
 * current() and never wait. Reloads are serialized by a mutex: each reload
 * reads and compiles its entries, then swaps the snapshot reference in one
 * assignment. A failed reload leaves the previous snapshot active.
 *
 * Snapshots are immutable, so a call that captured one before a reload
 * keeps authorizing against it until the call ends.
 */

import { Mutex } from 'async-mutex';
import type { PolicyEntry, PolicySnapshot } from '../types/policy.js';
import { compilePolicy } from './compiler.js';

/** Entries, or a loader that produces them (for example from a file). */
export type PolicySource = ReadonlyArray<PolicyEntry> | (() => Promise<ReadonlyArray<PolicyEntry>>);

export class PolicyStore {
  private snapshot: PolicySnapshot;
  private readonly mutex = new Mutex();

  /**
   * @param entries - Initial grants. Empty means every request is denied.
   * @param clock - Injectable for deterministic `loaded_at` values in tests.
   */
  constructor(
    entries: ReadonlyArray<PolicyEntry> = [],
    private readonly clock: () => string = () => new Date().toISOString(),
  ) {
    this.snapshot = this.seal(entries, 1);
  }

  current(): PolicySnapshot {
    return this.snapshot;
  }

  /**
   * Install a new policy. Concurrent reloads apply one at a time, in call
   * order. If the source throws, the active snapshot is unchanged and the
   * error propagates.
   */
  async reload(source: PolicySource): Promise<PolicySnapshot> {
    return this.mutex.runExclusive(async () => {
      const entries = typeof source === 'function' ? await source() : source;
      const next = this.seal(entries, this.snapshot.version + 1);
      this.snapshot = next;
      return next;
    });
  }

  private seal(entries: ReadonlyArray<PolicyEntry>, version: number): PolicySnapshot {
    const compiled = compilePolicy(entries);
    return Object.freeze({ ...compiled, version, loaded_at: this.clock() });
  }
}
