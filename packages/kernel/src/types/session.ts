/**
 * Confgate Kernel: Principal and Lock Types
 */

/** The authenticated party behind a session. */
export interface Principal {
  readonly id: string;
  /** The class policy grants are written against (e.g. `operator`, `monitor`). */
  readonly principal_class: string;
}

export enum LockMode {
  Shared = 'shared',
  Exclusive = 'exclusive',
}

/** A module lock currently held on behalf of a session. */
export interface HeldLock {
  readonly module: string;
  readonly mode: LockMode;
}
