/**
 * Confgate Runtime Host: File-backed Audit Sink
 *
 * Implements the kernel's AuditSink by appending one JSONL line per call
 * to `logs/audit.jsonl` through the injected StateIO. Each line is the
 * kernel's AuditEntry plus a ULID `event_id`.
 *
 * Writes are synchronous, so the entry is durable before dispatch()
 * returns its envelope.
 */

import type { AuditEntry, AuditSink } from '@confgate/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const AUDIT_LOG = 'audit.jsonl';

export class FileAuditSink implements AuditSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly newId: () => string = () => ulid(),
  ) {}

  append(entry: AuditEntry): void {
    this.stateIO.appendLine(AUDIT_LOG, JSON.stringify({ event_id: this.newId(), ...entry }));
  }
}
