/**
 * Confgate Kernel: Session
 *
 * One session per client connection. A session carries the authenticated
 * principal, reaches the active policy through the shared PolicyStore, and
 * tracks the module locks its in-flight calls hold.
 *
 * Closing a session fires its abort signal: queued lock waits and running
 * handlers are cancelled. Dispatching on a closed session throws
 * SessionClosedError.
 */

import { randomUUID } from 'node:crypto';
import type { PolicyStore } from '../policy/store.js';
import type { PolicySnapshot } from '../types/policy.js';
import type { HeldLock, Principal } from '../types/session.js';

export class SessionClosedError extends Error {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} is closed`);
    this.name = 'SessionClosedError';
  }
}

export interface SessionOptions {
  readonly principal: Principal;
  readonly policies: PolicyStore;
  readonly id?: string;
}

export class Session {
  readonly id: string;
  readonly principal: Principal;
  private readonly policies: PolicyStore;
  private readonly controller = new AbortController();
  private readonly held = new Set<HeldLock>();

  constructor(options: SessionOptions) {
    this.id = options.id ?? randomUUID();
    this.principal = Object.freeze({ ...options.principal });
    this.policies = options.policies;
  }

  /** The active policy snapshot. A call captures this once, after its lock wait. */
  policy(): PolicySnapshot {
    return this.policies.current();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  heldLocks(): ReadonlyArray<HeldLock> {
    return [...this.held];
  }

  /** @throws {SessionClosedError} */
  assertOpen(): void {
    if (this.closed) throw new SessionClosedError(this.id);
  }

  /** Idempotent. */
  close(): void {
    if (!this.closed) {
      this.controller.abort(new SessionClosedError(this.id));
    }
  }

  /** @internal Called by the lock manager. */
  track(lock: HeldLock): void {
    this.held.add(lock);
  }

  /** @internal Called by the lock manager. */
  untrack(lock: HeldLock): void {
    this.held.delete(lock);
  }
}
