/**
 * Confgate Kernel: Module Lock Manager
 *
 * One reader/writer lock per module, built on an async-mutex Semaphore:
 * a shared acquisition takes one permit, an exclusive one takes them all.
 * The semaphore queue is FIFO, so once a writer is waiting, readers that
 * arrive after it wait too and writers are not starved.
 *
 * Waiting is abortable. If the signal fires while queued, acquire()
 * rejects with the signal's reason, and the permit is handed straight back
 * when the semaphore eventually grants it.
 */

import { Semaphore } from 'async-mutex';
import type { Session } from './session.js';
import type { HeldLock } from '../types/session.js';
import { LockMode } from '../types/session.js';

/** Upper bound on concurrent readers of one module. */
const PERMITS = 1024;

/** Releases a held lock. Safe to call more than once. */
export type LockRelease = () => void;

export class LockAbortedError extends Error {
  constructor(readonly module: string) {
    super(`Lock wait on module ${module} was cancelled`);
    this.name = 'LockAbortedError';
  }
}

export class ModuleLockManager {
  private readonly semaphores = new Map<string, Semaphore>();

  /**
   * Acquire `mode` on `module` for `session`.
   *
   * @throws {LockAbortedError} if `signal` fires before the lock is granted
   */
  async acquire(session: Session, module: string, mode: LockMode, signal?: AbortSignal): Promise<LockRelease> {
    if (signal?.aborted === true) throw new LockAbortedError(module);

    const weight = mode === LockMode.Exclusive ? PERMITS : 1;
    const pending = this.semaphore(module).acquire(weight);

    const [, releaser] = await new Promise<Awaited<typeof pending>>((resolve, reject) => {
      const onAbort = (): void => {
        reject(new LockAbortedError(module));
        // Hand the permit back as soon as it is granted.
        void pending.then(
          ([, release]) => release(),
          () => undefined,
        );
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      pending.then(
        (granted) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(granted);
        },
        (err: unknown) => {
          signal?.removeEventListener('abort', onAbort);
          reject(err);
        },
      );
    });

    const lock: HeldLock = Object.freeze({ module, mode });
    session.track(lock);
    let released = false;
    return () => {
      if (released) return;
      released = true;
      session.untrack(lock);
      releaser();
    };
  }

  /** True while any permit of the module's lock is taken. */
  isLocked(module: string): boolean {
    const sem = this.semaphores.get(module);
    return sem !== undefined && sem.getValue() < PERMITS;
  }

  private semaphore(module: string): Semaphore {
    let sem = this.semaphores.get(module);
    if (sem === undefined) {
      sem = new Semaphore(PERMITS);
      this.semaphores.set(module, sem);
    }
    return sem;
  }
}
