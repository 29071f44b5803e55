/**
 * Confgate Kernel: Audit Types
 *
 * Every dispatched call produces exactly one AuditEntry, whatever its
 * outcome. Fields that do not apply to an outcome are null, never absent,
 * so that every entry has the same shape.
 */

import type { DenialReason } from '../access/enforcer.js';
import type { CallState, RequestKind, ResponseStatus } from './dispatch.js';

export interface AuditEntry {
  readonly session_id: string;
  readonly principal_id: string;
  readonly principal_class: string;
  readonly kind: RequestKind;
  /** The path as the caller sent it. */
  readonly path: string;
  readonly status: ResponseStatus;
  /** The state the call ended in. */
  readonly state: CallState;
  readonly trace: ReadonlyArray<CallState>;
  /** Validation kind, or callback error code. */
  readonly error_kind: string | null;
  readonly error_path: string | null;
  readonly error_detail: string | null;
  /** Internal. Never returned to the caller. */
  readonly denial_reason: DenialReason | null;
  readonly unconstrained: ReadonlyArray<string>;
  readonly policy_version: number;
  readonly policy_hash: string;
  readonly timestamp: string;
}
