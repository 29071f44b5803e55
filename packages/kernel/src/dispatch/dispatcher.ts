/**
 * Confgate Kernel: Dispatcher
 *
 * The single path from an external request to application logic. Every
 * call moves through
 *
 *   Received -> Resolved -> Validated -> Authorized -> Invoked -> Completed
 *
 * and leaves early through NotFound, Rejected, Denied or CallbackError.
 *
 * Dispatch contract:
 * - A handler runs only after validation and authorization have both
 *   passed, and it receives only the normalized value.
 * - The policy snapshot is captured once, after the module lock is held
 *   and before validation. A reload after that point does not change the
 *   call's authorization; a call still queued for the lock sees it.
 * - Reads hold the target module's lock shared, writes exclusive, from
 *   before validation until the handler returns. RPCs and notifications
 *   take no module lock.
 * - Validation detail is disclosed only to callers holding `read` on the
 *   module. Anyone else gets ACCESS_DENIED.
 * - Locks are released and exactly one audit entry is recorded on every
 *   exit path, in a finally block.
 * - Handlers are bounded by a timeout and receive an AbortSignal that also
 *   fires on request cancellation and session close. A result arriving
 *   after that is discarded.
 */

import { NodeKind, formatKeys, isDataNode } from '@confgate/schema';
import type {
  ConstraintTree,
  KeyPredicate,
  LeafNode,
  NormalizedValue,
  ResolvedSegment,
  SchemaNode,
} from '@confgate/schema';
import { authorize } from '../access/enforcer.js';
import type { DenialReason } from '../access/enforcer.js';
import { AuditLogger } from '../logging/audit-logger.js';
import type { AuditSink } from '../logging/audit-sink.js';
import { LockAbortedError, ModuleLockManager } from '../session/locks.js';
import type { LockRelease } from '../session/locks.js';
import type { Session } from '../session/session.js';
import type { AuditEntry } from '../types/audit.js';
import { CallState, EditMode, RequestKind, ResponseStatus } from '../types/dispatch.js';
import type { DispatchRequest, Envelope, Handler, HandlerCall, HandlerResult } from '../types/dispatch.js';
import { Operation } from '../types/policy.js';
import type { PolicySnapshot } from '../types/policy.js';
import { LockMode } from '../types/session.js';
import type { ValidationFailure } from '../types/validation.js';
import { Validator, member } from '../validation/validator.js';
import type { HandlerRegistry } from './handler-registry.js';

/** What to do with accepted values whose type imposes no check. */
export type UnconstrainedMode = 'audit' | 'reject';

export const DEFAULT_CALLBACK_TIMEOUT_MS = 5000;

/** Largest delay setTimeout honours; longer delays fire after 1ms. */
export const MAX_CALLBACK_TIMEOUT_MS = 2_147_483_647;

export interface DispatcherOptions {
  readonly tree: ConstraintTree;
  readonly handlers: HandlerRegistry;
  readonly locks?: ModuleLockManager;
  readonly auditSink?: AuditSink;
  readonly callbackTimeoutMs?: number;
  readonly unconstrained?: UnconstrainedMode;
  readonly clock?: () => string;
}

export class Dispatcher {
  readonly validator: Validator;
  private readonly tree: ConstraintTree;
  private readonly handlers: HandlerRegistry;
  private readonly locks: ModuleLockManager;
  private readonly logger: AuditLogger;
  private readonly timeoutMs: number;
  private readonly unconstrained: UnconstrainedMode;
  private readonly clock: () => string;

  constructor(options: DispatcherOptions) {
    this.tree = options.tree;
    this.handlers = options.handlers;
    this.validator = new Validator(options.tree);
    this.locks = options.locks ?? new ModuleLockManager();
    this.logger = new AuditLogger(options.auditSink);
    this.timeoutMs = options.callbackTimeoutMs ?? DEFAULT_CALLBACK_TIMEOUT_MS;
    if (!Number.isInteger(this.timeoutMs) || this.timeoutMs < 1 || this.timeoutMs > MAX_CALLBACK_TIMEOUT_MS) {
      throw new RangeError(`callbackTimeoutMs must be an integer in 1..${MAX_CALLBACK_TIMEOUT_MS}, got ${this.timeoutMs}`);
    }
    this.unconstrained = options.unconstrained ?? 'audit';
    this.clock = options.clock ?? (() => new Date().toISOString());
  }

  /**
   * Run one request to completion.
   *
   * Per-call failures are returned as envelopes, never thrown.
   *
   * @throws {SessionClosedError} if the session is already closed
   */
  async dispatch(session: Session, request: DispatchRequest): Promise<Envelope> {
    session.assertOpen();
    const call = new CallRecord([request.signal, session.signal]);
    let envelope: Envelope | undefined;
    try {
      envelope = await this.run(session, request, call);
      return envelope;
    } finally {
      call.release?.();
      call.dispose();
      // Calls that ended before the capture point record the current policy.
      const snapshot = call.snapshot ?? session.policy();
      this.logger.record(call.toEntry(session, request, snapshot, envelope, this.clock()));
    }
  }

  // -------------------------------------------------------------------------
  // Pipeline
  // -------------------------------------------------------------------------

  private async run(
    session: Session,
    request: DispatchRequest,
    call: CallRecord,
  ): Promise<Envelope> {
    // Resolve
    const resolved = this.tree.resolve(request.path);
    if (!resolved.ok) {
      call.error(resolved.reason, null, resolved.detail);
      return call.notFound();
    }
    const target = resolved.node;
    const operation = operationFor(request.kind, resolved.segments);
    if (operation === null) {
      call.error('kind-mismatch', resolved.instancePath, `${request.kind} does not apply to ${target.kind} nodes`);
      return call.notFound();
    }
    call.advance(CallState.Resolved);

    // Lock
    const mode = lockModeFor(request.kind);
    if (mode !== null) {
      try {
        call.release = await this.locks.acquire(session, resolved.module, mode, call.signal);
      } catch (err: unknown) {
        if (err instanceof LockAbortedError) {
          return call.callbackError('cancelled', 'call cancelled while waiting for a module lock');
        }
        throw err;
      }
    }

    const snapshot = session.policy();
    call.snapshot = snapshot;

    // Validate
    let prepared = this.prepare(request, target, resolved.segments, resolved.instancePath);
    if (prepared.ok && prepared.unconstrained.length > 0 && this.unconstrained === 'reject') {
      prepared = {
        ok: false,
        kind: 'unconstrained',
        path: prepared.unconstrained[0] ?? resolved.instancePath,
        detail: 'values for unconstrained leaves are not accepted',
      };
    }
    if (!prepared.ok) {
      call.error(prepared.kind, prepared.path, prepared.detail);
      const disclosure = authorize(session, resolved.module, Operation.Read, snapshot);
      if (!disclosure.granted) {
        call.denial = disclosure.reason;
        return call.denied();
      }
      return call.rejected(prepared);
    }
    call.unconstrained = prepared.unconstrained;
    call.advance(CallState.Validated);

    // Authorize
    const decision = authorize(session, resolved.module, operation, snapshot);
    if (!decision.granted) {
      call.denial = decision.reason;
      return call.denied();
    }
    call.advance(CallState.Authorized);

    // Invoke
    const handler = this.handlers.lookup(target);
    if (handler === undefined) {
      return call.callbackError('no-handler', `no handler is registered for ${target.path}`);
    }
    call.advance(CallState.Invoked);

    const invocation = await this.invoke(handler, call.signal, {
      kind: request.kind,
      path: resolved.instancePath,
      schemaPath: target.path,
      keys: resolved.segments.flatMap((s) => s.keys),
      value: prepared.value,
      edit: request.kind === RequestKind.Write ? request.edit ?? EditMode.Replace : null,
      principal: session.principal,
    });

    if (invocation.type !== 'result') {
      return failedInvocation(call, invocation, this.timeoutMs);
    }

    const result = invocation.result;
    if (!result.ok) {
      return call.callbackError(result.code, result.message);
    }

    let value: unknown = null;
    if (target.kind === NodeKind.Rpc && target.output !== null) {
      const output = this.validator.validateOutput(target, result.payload, { path: resolved.instancePath });
      if (!output.ok) {
        call.error('invalid-output', output.path, output.detail);
        return call.callbackError('invalid-output', `${output.path}: ${output.detail}`, false);
      }
      value = output.value;
    } else if (request.kind === RequestKind.Read) {
      value = result.payload ?? null;
    }

    call.advance(CallState.Completed);
    return {
      status: ResponseStatus.Ok,
      value,
      unconstrained: call.unconstrained,
      trace: call.traceCopy(),
    };
  }

  /**
   * Validate everything the request carries: list-key predicate values,
   * the write path and the payload. Returns the normalized payload.
   */
  private prepare(
    request: DispatchRequest,
    target: SchemaNode,
    segments: ReadonlyArray<ResolvedSegment>,
    instancePath: string,
  ): Prepared {
    const predicateValues = new Map<string, NormalizedValue>();
    const keyUnconstrained: string[] = [];
    // Set when the target is a key leaf of the entry selected just above it.
    let targetKeyValue: NormalizedValue | undefined;
    let segmentPath = '';
    for (const [i, seg] of segments.entries()) {
      segmentPath += `/${seg.node.name}`;
      if (seg.node.kind === NodeKind.List) {
        const list = seg.node;
        for (const key of seg.keys) {
          const leaf = list.children.find((c): c is LeafNode => c.name === key.name && c.kind === NodeKind.Leaf);
          if (leaf === undefined) continue;
          const check = this.validator.checkLeafValue(leaf, key.value, `${segmentPath}/${key.name}`);
          if (!check.ok) return check;
          keyUnconstrained.push(...check.unconstrained);
          if (i === segments.length - 1) predicateValues.set(key.name, check.value);
          if (i === segments.length - 2 && key.name === target.name && target.kind === NodeKind.Leaf) {
            targetKeyValue = check.value;
          }
        }
        segmentPath += formatKeys(seg.keys);
      }

      if (request.kind !== RequestKind.Write) continue;
      if (isDataNode(seg.node) && !seg.node.config) {
        return fail('read-only-node', segmentPath, 'node is state data and cannot be written');
      }
      if (seg.node.kind === NodeKind.List && seg.keys.length === 0 && i < segments.length - 1) {
        return fail('missing-key-predicate', segmentPath, `list "${seg.node.name}" needs key predicates to select an entry`);
      }
    }

    const outcome = this.payload(request, target, segments, instancePath, predicateValues, targetKeyValue);
    if (!outcome.ok || keyUnconstrained.length === 0) return outcome;
    return { ...outcome, unconstrained: [...keyUnconstrained, ...outcome.unconstrained] };
  }

  private payload(
    request: DispatchRequest,
    target: SchemaNode,
    segments: ReadonlyArray<ResolvedSegment>,
    instancePath: string,
    predicateValues: ReadonlyMap<string, NormalizedValue>,
    targetKeyValue: NormalizedValue | undefined,
  ): Prepared {
    switch (request.kind) {
      case RequestKind.Read:
        return { ok: true, value: null, unconstrained: [] };

      case RequestKind.Rpc:
      case RequestKind.Notify:
        return this.validator.validate(target, request.value ?? {}, { path: instancePath });

      case RequestKind.Write: {
        const edit = request.edit ?? EditMode.Replace;
        if (edit === EditMode.Delete) {
          return { ok: true, value: null, unconstrained: [] };
        }
        if (request.value === undefined) {
          return fail('type-mismatch', instancePath, `${edit} requires a payload`);
        }
        const options = { partial: edit === EditMode.Merge, configOnly: true, path: instancePath };
        const last = segments[segments.length - 1];
        if (target.kind === NodeKind.List && last !== undefined && last.keys.length > 0) {
          const entry = withKeys(request.value, last.keys);
          const outcome = this.validator.validateEntry(target, entry, options);
          if (!outcome.ok) return outcome;
          for (const [name, expected] of predicateValues) {
            const actual = isRecordValue(outcome.value) ? member(outcome.value, name) : undefined;
            if (actual !== expected) {
              return fail('key-mismatch', `${instancePath}/${name}`, `payload key "${name}" does not match the path`);
            }
          }
          return outcome;
        }
        const outcome = this.validator.validate(target, request.value, options);
        if (outcome.ok && targetKeyValue !== undefined && outcome.value !== targetKeyValue) {
          return fail('key-mismatch', instancePath, `key "${target.name}" does not match the path`);
        }
        return outcome;
      }
    }
  }

  /**
   * Run a handler against the timeout and the call's abort signal. Never
   * rejects: every way the handler can end is a tagged value.
   */
  private invoke(handler: Handler, signal: AbortSignal, call: Omit<HandlerCall, 'signal'>): Promise<Invocation> {
    const controller = new AbortController();
    return new Promise<Invocation>((resolve) => {
      let settled = false;
      const finish = (invocation: Invocation): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
        if (invocation.type === 'timeout' || invocation.type === 'cancelled') {
          controller.abort();
        }
        resolve(invocation);
      };
      const onAbort = (): void => finish({ type: 'cancelled' });
      const timer = setTimeout(() => finish({ type: 'timeout' }), this.timeoutMs);

      if (signal.aborted) {
        finish({ type: 'cancelled' });
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });

      let pending: Promise<HandlerResult>;
      try {
        pending = handler.handle({ ...call, signal: controller.signal });
      } catch (error: unknown) {
        finish({ type: 'error', error });
        return;
      }
      void pending.then(
        (result) => finish({ type: 'result', result }),
        (error: unknown) => finish({ type: 'error', error }),
      );
    });
  }
}

// ---------------------------------------------------------------------------
// Internal: per-call state
// ---------------------------------------------------------------------------

type Prepared =
  | {
      readonly ok: true;
      readonly value: NormalizedValue | null;
      readonly unconstrained: ReadonlyArray<string>;
    }
  | ValidationFailure;

type Invocation =
  | { readonly type: 'result'; readonly result: HandlerResult }
  | { readonly type: 'error'; readonly error: unknown }
  | { readonly type: 'timeout' }
  | { readonly type: 'cancelled' };

/**
 * Mutable bookkeeping for one call: trace, held lock, audit fields and the
 * merged abort signal. Owned by a single dispatch() invocation.
 *
 * @internal
 */
class CallRecord {
  readonly trace: CallState[] = [CallState.Received];
  release: LockRelease | null = null;
  /** Policy the call authorizes against; null until the lock phase is over. */
  snapshot: PolicySnapshot | null = null;
  denial: DenialReason | null = null;
  unconstrained: ReadonlyArray<string> = [];
  private errorKind: string | null = null;
  private errorPath: string | null = null;
  private errorDetail: string | null = null;
  private readonly controller = new AbortController();
  private readonly sources: ReadonlyArray<AbortSignal>;
  private readonly onAbort = (): void => this.controller.abort();

  constructor(sources: ReadonlyArray<AbortSignal | undefined>) {
    this.sources = sources.filter((s): s is AbortSignal => s !== undefined);
    for (const source of this.sources) {
      if (source.aborted) {
        this.controller.abort();
        break;
      }
      source.addEventListener('abort', this.onAbort, { once: true });
    }
  }

  /** Fires when the request is cancelled or the session closes. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  dispose(): void {
    for (const source of this.sources) source.removeEventListener('abort', this.onAbort);
  }

  advance(state: CallState): void {
    this.trace.push(state);
  }

  traceCopy(): ReadonlyArray<CallState> {
    return [...this.trace];
  }

  error(kind: string, path: string | null, detail: string): void {
    this.errorKind = kind;
    this.errorPath = path;
    this.errorDetail = detail;
  }

  notFound(): Envelope {
    this.advance(CallState.NotFound);
    return { status: ResponseStatus.NotFound, trace: this.traceCopy() };
  }

  rejected(failure: ValidationFailure): Envelope {
    this.advance(CallState.Rejected);
    return {
      status: ResponseStatus.ValidationFailed,
      detail: { kind: failure.kind, path: failure.path, detail: failure.detail },
      trace: this.traceCopy(),
    };
  }

  denied(): Envelope {
    this.advance(CallState.Denied);
    return { status: ResponseStatus.AccessDenied, trace: this.traceCopy() };
  }

  callbackError(code: string, message: string, record = true): Envelope {
    if (record) this.error(code, null, message);
    this.advance(CallState.CallbackError);
    return { status: ResponseStatus.CallbackError, detail: `${code}: ${message}`, trace: this.traceCopy() };
  }

  toEntry(
    session: Session,
    request: DispatchRequest,
    snapshot: PolicySnapshot,
    envelope: Envelope | undefined,
    timestamp: string,
  ): AuditEntry {
    const state = this.trace[this.trace.length - 1] ?? CallState.Received;
    return {
      session_id: session.id,
      principal_id: session.principal.id,
      principal_class: session.principal.principal_class,
      kind: request.kind,
      path: request.path,
      // No envelope means the pipeline threw.
      status: envelope?.status ?? ResponseStatus.CallbackError,
      state: envelope === undefined ? CallState.CallbackError : state,
      trace: this.traceCopy(),
      error_kind: envelope === undefined ? this.errorKind ?? 'internal-error' : this.errorKind,
      error_path: this.errorPath,
      error_detail: this.errorDetail,
      denial_reason: this.denial,
      unconstrained: this.unconstrained,
      policy_version: snapshot.version,
      policy_hash: snapshot.hash,
      timestamp,
    };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * The operation a request needs, or null when the request kind does not fit
 * the target. Reads and writes address data nodes outside any rpc or
 * notification.
 */
function operationFor(kind: RequestKind, segments: ReadonlyArray<ResolvedSegment>): Operation | null {
  const top = segments[0]?.node;
  const target = segments[segments.length - 1]?.node;
  if (top === undefined || target === undefined) return null;
  switch (kind) {
    case RequestKind.Read:
      return isDataNode(top) && isDataNode(target) ? Operation.Read : null;
    case RequestKind.Write:
      return isDataNode(top) && isDataNode(target) ? Operation.Write : null;
    case RequestKind.Rpc:
      return target.kind === NodeKind.Rpc ? Operation.Execute : null;
    case RequestKind.Notify:
      return target.kind === NodeKind.Notification ? Operation.Read : null;
  }
}

function failedInvocation(
  call: CallRecord,
  invocation: Exclude<Invocation, { readonly type: 'result' }>,
  timeoutMs: number,
): Envelope {
  switch (invocation.type) {
    case 'timeout':
      return call.callbackError('timeout', `handler did not complete within ${timeoutMs}ms`);
    case 'cancelled':
      return call.callbackError('cancelled', 'call was cancelled');
    case 'error': {
      const message = invocation.error instanceof Error ? invocation.error.message : String(invocation.error);
      return call.callbackError('handler-error', message);
    }
  }
}

function lockModeFor(kind: RequestKind): LockMode | null {
  switch (kind) {
    case RequestKind.Read:
      return LockMode.Shared;
    case RequestKind.Write:
      return LockMode.Exclusive;
    case RequestKind.Rpc:
    case RequestKind.Notify:
      return null;
  }
}

function fail(kind: ValidationFailure['kind'], path: string, detail: string): ValidationFailure {
  return { ok: false, kind, path, detail };
}

function isRecordValue(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Fill absent key leaves of a list-entry payload from the path predicates. */
function withKeys(value: unknown, keys: ReadonlyArray<KeyPredicate>): unknown {
  if (!isRecordValue(value)) return value;
  const filled: Record<string, unknown> = { ...value };
  for (const key of keys) {
    if (member(filled, key.name) === undefined) filled[key.name] = key.value;
  }
  return filled;
}
