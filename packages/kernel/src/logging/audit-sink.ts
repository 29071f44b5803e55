/**
 * Confgate Kernel: Audit Sink Interface
 *
 * The injection point for audit persistence. The kernel owns this contract
 * and the AuditLogger; concrete sinks live in the runtime host, so the
 * kernel itself never writes to disk.
 */

import type { AuditEntry } from '../types/audit.js';

/**
 * Receives and persists audit entries.
 *
 * append() is called from a finally block, once per dispatched call, after
 * the call's outcome is known. Implementations must not silently discard
 * entries.
 */
export interface AuditSink {
  append(entry: AuditEntry): void;
}
