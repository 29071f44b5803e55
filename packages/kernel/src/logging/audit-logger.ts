/**
 * Confgate Kernel: Audit Logger
 *
 * Every dispatched call produces exactly one audit entry, whatever its
 * outcome. A missed entry is an integrity failure.
 *
 * Without a sink (tests, embedded evaluation) record() is a no-op.
 */

import type { AuditEntry } from '../types/audit.js';
import type { AuditSink } from './audit-sink.js';

export class AuditLogger {
  constructor(private readonly sink?: AuditSink) {}

  record(entry: AuditEntry): void {
    this.sink?.append(entry);
  }
}

/** Keeps entries in memory. For tests and for embedding without persistence. */
export class MemoryAuditSink implements AuditSink {
  readonly entries: AuditEntry[] = [];

  append(entry: AuditEntry): void {
    this.entries.push(entry);
  }
}
