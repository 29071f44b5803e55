/**
 * Confgate Kernel: Dispatcher Tests
 *
 * End-to-end behaviour of the dispatch state machine: ordering of
 * validation and authorization, the disclosure rule, write paths, handler
 * failures, timeouts and cancellation, lock release, audit records and
 * policy reload isolation.
 *
 * Everything runs in process against fake handlers and a memory sink.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  CallState,
  Dispatcher,
  EditMode,
  HandlerRegistry,
  MAX_CALLBACK_TIMEOUT_MS,
  MemoryAuditSink,
  ModuleLockManager,
  Operation,
  PolicyStore,
  RequestKind,
  ResponseStatus,
  Session,
  SessionClosedError,
} from '../src/index.js';
import type { DispatcherOptions, HandlerResult, HeldLock, PolicyEntry } from '../src/index.js';
import { buildConstraintTree } from '@confgate/schema';
import { FIXED_CLOCK, POLICY, RecordingHandler, TREE, sessionFor } from './fixtures.js';

type Tuning = Partial<Pick<DispatcherOptions, 'callbackTimeoutMs' | 'unconstrained' | 'tree'>>;

function setup(tuning: Tuning = {}, entries: ReadonlyArray<PolicyEntry> = POLICY) {
  const store = new PolicyStore(entries, FIXED_CLOCK);
  const handlers = new HandlerRegistry();
  const locks = new ModuleLockManager();
  const sink = new MemoryAuditSink();
  const dispatcher = new Dispatcher({
    tree: TREE,
    handlers,
    locks,
    auditSink: sink,
    clock: FIXED_CLOCK,
    ...tuning,
  });
  return { store, handlers, locks, sink, dispatcher };
}

const never = (): Promise<HandlerResult> => new Promise<HandlerResult>(() => undefined);

const FULL_TRACE = [
  CallState.Received,
  CallState.Resolved,
  CallState.Validated,
  CallState.Authorized,
  CallState.Invoked,
  CallState.Completed,
];

// ---------------------------------------------------------------------------
// End to end
// ---------------------------------------------------------------------------

describe('dispatcher: run-command end to end', () => {
  it('reaches the handler once with the normalized input when execute is granted', async () => {
    const { store, handlers, sink, dispatcher } = setup();
    const handler = new RecordingHandler(() => ({ ok: true, payload: { 'exit-code': 0 } }));
    handlers.register('/run-command', handler);

    const envelope = await dispatcher.dispatch(sessionFor(store, 'operator'), {
      kind: RequestKind.Rpc,
      path: '/run-command',
      value: { command: 'shutdown' },
    });

    expect(envelope).toEqual({
      status: ResponseStatus.Ok,
      value: { 'exit-code': 0 },
      unconstrained: [],
      trace: FULL_TRACE,
    });
    expect(handler.calls).toHaveLength(1);
    expect(handler.calls[0]).toMatchObject({
      kind: RequestKind.Rpc,
      path: '/run-command',
      schemaPath: '/run-command',
      keys: [],
      value: { command: 'shutdown' },
      edit: null,
      principal: { id: 'operator-1', principal_class: 'operator' },
    });
    expect(sink.entries).toEqual([
      {
        session_id: 'session-operator',
        principal_id: 'operator-1',
        principal_class: 'operator',
        kind: 'rpc',
        path: '/run-command',
        status: 'OK',
        state: 'Completed',
        trace: FULL_TRACE,
        error_kind: null,
        error_path: null,
        error_detail: null,
        denial_reason: null,
        unconstrained: [],
        policy_version: 1,
        policy_hash: store.current().hash,
        timestamp: '2026-01-01T00:00:00.000Z',
      },
    ]);
  });

  it('never reaches the handler without the execute grant', async () => {
    const { store, handlers, sink, dispatcher } = setup();
    const handler = new RecordingHandler();
    handlers.register('/run-command', handler);

    const envelope = await dispatcher.dispatch(sessionFor(store, 'monitor'), {
      kind: RequestKind.Rpc,
      path: '/run-command',
      value: { command: 'shutdown' },
    });

    expect(envelope).toEqual({
      status: ResponseStatus.AccessDenied,
      trace: [CallState.Received, CallState.Resolved, CallState.Validated, CallState.Denied],
    });
    expect(handler.calls).toHaveLength(0);
    expect(sink.entries[0]?.denial_reason).toBe('operation-not-granted');
  });

  it('denies everything under an empty policy', async () => {
    const { store, handlers, sink, dispatcher } = setup({}, []);
    const handler = new RecordingHandler();
    handlers.register('/system', handler);

    const envelope = await dispatcher.dispatch(sessionFor(store, 'admin'), {
      kind: RequestKind.Read,
      path: '/system',
    });

    expect(envelope.status).toBe(ResponseStatus.AccessDenied);
    expect(handler.calls).toHaveLength(0);
    expect(sink.entries[0]?.denial_reason).toBe('no-module-policy');
  });
});

// ---------------------------------------------------------------------------
// Disclosure
// ---------------------------------------------------------------------------

describe('dispatcher: validation failures', () => {
  it('returns the failure detail to a caller holding read', async () => {
    const { store, handlers, dispatcher } = setup();
    const handler = new RecordingHandler();
    handlers.register('/run-command', handler);

    const envelope = await dispatcher.dispatch(sessionFor(store, 'admin'), {
      kind: RequestKind.Rpc,
      path: '/run-command',
      value: { command: 'format-disk' },
    });

    expect(envelope).toEqual({
      status: ResponseStatus.ValidationFailed,
      detail: {
        kind: 'identity',
        path: '/run-command/input/command',
        detail: 'unknown identity "format-disk"',
      },
      trace: [CallState.Received, CallState.Resolved, CallState.Rejected],
    });
    expect(handler.calls).toHaveLength(0);
  });

  it('answers ACCESS_DENIED to a caller without read and audits the real failure', async () => {
    const { store, handlers, sink, dispatcher } = setup();
    handlers.register('/run-command', new RecordingHandler());

    const envelope = await dispatcher.dispatch(sessionFor(store, 'operator'), {
      kind: RequestKind.Rpc,
      path: '/run-command',
      value: { command: 'format-disk' },
    });

    expect(envelope).toEqual({
      status: ResponseStatus.AccessDenied,
      trace: [CallState.Received, CallState.Resolved, CallState.Denied],
    });
    expect(sink.entries[0]).toMatchObject({
      status: 'ACCESS_DENIED',
      state: 'Denied',
      error_kind: 'identity',
      error_path: '/run-command/input/command',
      denial_reason: 'operation-not-granted',
    });
  });
});

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

describe('dispatcher: not found', () => {
  it.each([
    [RequestKind.Read, '/system/nope'],
    [RequestKind.Rpc, '/system'],
    [RequestKind.Read, '/run-command'],
    [RequestKind.Read, '/run-command/input/command'],
    [RequestKind.Notify, '/run-command'],
    [RequestKind.Write, 'system//hostname'],
  ])('%s %s is NOT_FOUND', async (kind, path) => {
    const { store, dispatcher } = setup();
    expect(await dispatcher.dispatch(sessionFor(store, 'admin'), { kind, path })).toEqual({
      status: ResponseStatus.NotFound,
      trace: [CallState.Received, CallState.NotFound],
    });
  });
});

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

describe('dispatcher: writes', () => {
  const ENTRY = `/interfaces/interface[name='eth0']`;

  it('merges into a list entry, filling the key from the path', async () => {
    const { store, handlers, dispatcher } = setup();
    const handler = new RecordingHandler();
    handlers.register('/interfaces', handler);

    const envelope = await dispatcher.dispatch(sessionFor(store, 'admin'), {
      kind: RequestKind.Write,
      path: ENTRY,
      edit: EditMode.Merge,
      value: { mtu: 1500 },
    });

    expect(envelope).toEqual({ status: ResponseStatus.Ok, value: null, unconstrained: [], trace: FULL_TRACE });
    expect(handler.calls[0]).toMatchObject({
      path: ENTRY,
      schemaPath: '/interfaces/interface',
      keys: [{ name: 'name', value: 'eth0' }],
      value: { name: 'eth0', mtu: 1500 },
      edit: EditMode.Merge,
    });
  });

  it('rejects a payload key that differs from the path predicate', async () => {
    const { store, handlers, dispatcher } = setup();
    handlers.register('/interfaces', new RecordingHandler());

    const envelope = await dispatcher.dispatch(sessionFor(store, 'admin'), {
      kind: RequestKind.Write,
      path: ENTRY,
      value: { name: 'eth1' },
    });

    expect(envelope.status === ResponseStatus.ValidationFailed ? envelope.detail : null).toEqual({
      kind: 'key-mismatch',
      path: `${ENTRY}/name`,
      detail: 'payload key "name" does not match the path',
    });
  });

  it('rejects a write to the key leaf that would rename the entry', async () => {
    const { store, handlers, dispatcher } = setup();
    const handler = new RecordingHandler();
    handlers.register('/interfaces', handler);
    const admin = sessionFor(store, 'admin');

    const renamed = await dispatcher.dispatch(admin, { kind: RequestKind.Write, path: `${ENTRY}/name`, value: 'eth1' });
    expect(renamed.status === ResponseStatus.ValidationFailed ? renamed.detail : null).toEqual({
      kind: 'key-mismatch',
      path: `${ENTRY}/name`,
      detail: 'key "name" does not match the path',
    });
    expect(handler.calls).toHaveLength(0);

    const same = await dispatcher.dispatch(admin, { kind: RequestKind.Write, path: `${ENTRY}/name`, value: 'eth0' });
    expect(same.status).toBe(ResponseStatus.Ok);
    expect(handler.calls[0]?.value).toBe('eth0');
  });

  it('validates predicate values against the key leaf type', async () => {
    const { store, dispatcher } = setup();
    const envelope = await dispatcher.dispatch(sessionFor(store, 'admin'), {
      kind: RequestKind.Write,
      path: `/interfaces/interface[name='ETH0']/mtu`,
      value: 1500,
    });
    expect(envelope.status === ResponseStatus.ValidationFailed ? envelope.detail : null).toEqual({
      kind: 'pattern',
      path: '/interfaces/interface/name',
      detail: 'value does not fully match pattern "[a-z]+[0-9]+"',
    });
  });

  it('requires key predicates to write below a list', async () => {
    const { store, dispatcher } = setup();
    const envelope = await dispatcher.dispatch(sessionFor(store, 'admin'), {
      kind: RequestKind.Write,
      path: '/interfaces/interface/mtu',
      value: 1500,
    });
    expect(envelope.status === ResponseStatus.ValidationFailed ? envelope.detail : null).toEqual({
      kind: 'missing-key-predicate',
      path: '/interfaces/interface',
      detail: 'list "interface" needs key predicates to select an entry',
    });
  });

  it('rejects writes to state data', async () => {
    const { store, dispatcher } = setup();
    const envelope = await dispatcher.dispatch(sessionFor(store, 'admin'), {
      kind: RequestKind.Write,
      path: '/system/load',
      value: 3,
    });
    expect(envelope.status === ResponseStatus.ValidationFailed ? envelope.detail : null).toEqual({
      kind: 'read-only-node',
      path: '/system/load',
      detail: 'node is state data and cannot be written',
    });
  });

  it('requires a payload for replace', async () => {
    const { store, dispatcher } = setup();
    const envelope = await dispatcher.dispatch(sessionFor(store, 'admin'), {
      kind: RequestKind.Write,
      path: '/system/hostname',
    });
    expect(envelope.status === ResponseStatus.ValidationFailed ? envelope.detail : null).toEqual({
      kind: 'type-mismatch',
      path: '/system/hostname',
      detail: 'replace requires a payload',
    });
  });

  it('passes a delete through without a payload', async () => {
    const { store, handlers, dispatcher } = setup();
    const handler = new RecordingHandler();
    handlers.register('/interfaces', handler);
    const envelope = await dispatcher.dispatch(sessionFor(store, 'admin'), {
      kind: RequestKind.Write,
      path: ENTRY,
      edit: EditMode.Delete,
    });
    expect(envelope.status).toBe(ResponseStatus.Ok);
    expect(handler.calls[0]).toMatchObject({ value: null, edit: EditMode.Delete });
  });
});

// ---------------------------------------------------------------------------
// Reads and notifications
// ---------------------------------------------------------------------------

describe('dispatcher: reads and notifications', () => {
  it('returns the read payload and holds the module lock shared meanwhile', async () => {
    const { store, handlers, dispatcher } = setup();
    const admin = sessionFor(store, 'admin');
    let during: ReadonlyArray<HeldLock> = [];
    handlers.register(
      '/interfaces',
      new RecordingHandler(() => {
        during = admin.heldLocks();
        return { ok: true, payload: { interface: [] } };
      }),
    );

    const envelope = await dispatcher.dispatch(admin, { kind: RequestKind.Read, path: '/interfaces' });

    expect(envelope).toEqual({
      status: ResponseStatus.Ok,
      value: { interface: [] },
      unconstrained: [],
      trace: FULL_TRACE,
    });
    expect(during).toEqual([{ module: 'interfaces', mode: 'shared' }]);
    expect(admin.heldLocks()).toEqual([]);
  });

  it('delivers a notification to a reader', async () => {
    const { store, handlers, dispatcher } = setup();
    const handler = new RecordingHandler();
    handlers.register('/command-finished', handler);

    const envelope = await dispatcher.dispatch(sessionFor(store, 'monitor'), {
      kind: RequestKind.Notify,
      path: '/command-finished',
      value: { command: 'restart' },
    });

    expect(envelope.status).toBe(ResponseStatus.Ok);
    expect(handler.calls[0]?.value).toEqual({ command: 'restart' });
  });
});

// ---------------------------------------------------------------------------
// Handler failures
// ---------------------------------------------------------------------------

describe('dispatcher: callback errors', () => {
  it('reports a missing handler', async () => {
    const { store, dispatcher } = setup();
    expect(await dispatcher.dispatch(sessionFor(store, 'admin'), { kind: RequestKind.Rpc, path: '/reboot' })).toEqual({
      status: ResponseStatus.CallbackError,
      detail: 'no-handler: no handler is registered for /reboot',
      trace: [
        CallState.Received,
        CallState.Resolved,
        CallState.Validated,
        CallState.Authorized,
        CallState.CallbackError,
      ],
    });
  });

  it('reports a handler failure result', async () => {
    const { store, handlers, dispatcher } = setup();
    handlers.register('/reboot', new RecordingHandler(() => ({ ok: false, code: 'busy', message: 'try later' })));
    const envelope = await dispatcher.dispatch(sessionFor(store, 'admin'), { kind: RequestKind.Rpc, path: '/reboot' });
    expect(envelope).toEqual({
      status: ResponseStatus.CallbackError,
      detail: 'busy: try later',
      trace: [
        CallState.Received,
        CallState.Resolved,
        CallState.Validated,
        CallState.Authorized,
        CallState.Invoked,
        CallState.CallbackError,
      ],
    });
  });

  it('reports a thrown handler error', async () => {
    const { store, handlers, dispatcher } = setup();
    handlers.register(
      '/reboot',
      new RecordingHandler(() => {
        throw new Error('boom');
      }),
    );
    const envelope = await dispatcher.dispatch(sessionFor(store, 'admin'), { kind: RequestKind.Rpc, path: '/reboot' });
    expect(envelope.status === ResponseStatus.CallbackError ? envelope.detail : null).toBe('handler-error: boom');
  });

  it('validates rpc output', async () => {
    const { store, handlers, sink, dispatcher } = setup();
    handlers.register('/run-command', new RecordingHandler(() => ({ ok: true, payload: {} })));
    const envelope = await dispatcher.dispatch(sessionFor(store, 'admin'), {
      kind: RequestKind.Rpc,
      path: '/run-command',
      value: { command: 'restart' },
    });
    expect(envelope.status === ResponseStatus.CallbackError ? envelope.detail : null).toBe(
      'invalid-output: /run-command/output/exit-code: mandatory leaf is missing',
    );
    expect(sink.entries[0]).toMatchObject({
      error_kind: 'invalid-output',
      error_path: '/run-command/output/exit-code',
    });
  });
});

// ---------------------------------------------------------------------------
// Timeouts, cancellation and lock release
// ---------------------------------------------------------------------------

describe('dispatcher: timeouts and cancellation', () => {
  it('refuses a timeout no timer can hold', () => {
    expect(() => setup({ callbackTimeoutMs: MAX_CALLBACK_TIMEOUT_MS + 1 })).toThrow(
      'callbackTimeoutMs must be an integer in 1..2147483647, got 2147483648',
    );
    expect(() => setup({ callbackTimeoutMs: 0 })).toThrow(RangeError);
    expect(() => setup({ callbackTimeoutMs: MAX_CALLBACK_TIMEOUT_MS })).not.toThrow();
  });

  it('times out a slow handler, aborts its signal and releases the lock', async () => {
    const { store, handlers, locks, dispatcher } = setup({ callbackTimeoutMs: 20 });
    const admin = sessionFor(store, 'admin');
    let during: ReadonlyArray<HeldLock> = [];
    const handler = new RecordingHandler(() => {
      during = admin.heldLocks();
      return never();
    });
    handlers.register('/interfaces', handler);

    const envelope = await dispatcher.dispatch(admin, {
      kind: RequestKind.Write,
      path: `/interfaces/interface[name='eth0']`,
      value: { mtu: 1500 },
    });

    expect(envelope.status === ResponseStatus.CallbackError ? envelope.detail : null).toBe(
      'timeout: handler did not complete within 20ms',
    );
    expect(during).toEqual([{ module: 'interfaces', mode: 'exclusive' }]);
    expect(handler.calls[0]?.signal.aborted).toBe(true);
    expect(admin.heldLocks()).toEqual([]);
    expect(locks.isLocked('interfaces')).toBe(false);
  });

  it('discards a result that arrives after the timeout', async () => {
    const { store, handlers, dispatcher } = setup({ callbackTimeoutMs: 10 });
    handlers.register(
      '/reboot',
      new RecordingHandler(
        () => new Promise<HandlerResult>((resolve) => setTimeout(() => resolve({ ok: true }), 30)),
      ),
    );
    const envelope = await dispatcher.dispatch(sessionFor(store, 'admin'), { kind: RequestKind.Rpc, path: '/reboot' });
    await new Promise((resolve) => setTimeout(resolve, 40));
    expect(envelope.status).toBe(ResponseStatus.CallbackError);
  });

  it('cancels through the request signal', async () => {
    const { store, handlers, dispatcher } = setup();
    const handler = new RecordingHandler(never);
    handlers.register('/reboot', handler);
    const controller = new AbortController();

    const pending = dispatcher.dispatch(sessionFor(store, 'admin'), {
      kind: RequestKind.Rpc,
      path: '/reboot',
      signal: controller.signal,
    });
    await vi.waitFor(() => expect(handler.calls).toHaveLength(1));
    controller.abort();

    const envelope = await pending;
    expect(envelope.status === ResponseStatus.CallbackError ? envelope.detail : null).toBe(
      'cancelled: call was cancelled',
    );
    expect(handler.calls[0]?.signal.aborted).toBe(true);
  });

  it('cancels in-flight calls when the session closes and refuses new ones', async () => {
    const { store, handlers, dispatcher } = setup();
    const handler = new RecordingHandler(never);
    handlers.register('/reboot', handler);
    const admin = sessionFor(store, 'admin');

    const pending = dispatcher.dispatch(admin, { kind: RequestKind.Rpc, path: '/reboot' });
    await vi.waitFor(() => expect(handler.calls).toHaveLength(1));
    admin.close();

    const envelope = await pending;
    expect(envelope.status === ResponseStatus.CallbackError ? envelope.detail : null).toBe(
      'cancelled: call was cancelled',
    );
    await expect(dispatcher.dispatch(admin, { kind: RequestKind.Rpc, path: '/reboot' })).rejects.toBeInstanceOf(
      SessionClosedError,
    );
  });
});

// ---------------------------------------------------------------------------
// Unconstrained values
// ---------------------------------------------------------------------------

describe('dispatcher: unconstrained values', () => {
  it('accepts and reports them in audit mode', async () => {
    const { store, handlers, sink, dispatcher } = setup();
    handlers.register('/system', new RecordingHandler());
    const envelope = await dispatcher.dispatch(sessionFor(store, 'admin'), {
      kind: RequestKind.Write,
      path: '/system',
      value: { contact: 'ops' },
    });
    expect(envelope).toEqual({
      status: ResponseStatus.Ok,
      value: null,
      unconstrained: ['/system/contact'],
      trace: FULL_TRACE,
    });
    expect(sink.entries[0]?.unconstrained).toEqual(['/system/contact']);
  });

  describe('in list-key predicates', () => {
    const USERS_TREE = buildConstraintTree({
      modules: [
        {
          name: 'users',
          nodes: [
            {
              kind: 'container',
              name: 'users',
              children: [
                {
                  kind: 'list',
                  name: 'user',
                  keys: ['name'],
                  children: [
                    { kind: 'leaf', name: 'name', type: { type: 'string' } },
                    { kind: 'leaf', name: 'uid', type: { type: 'numeric', width: 'uint32' } },
                  ],
                },
              ],
            },
          ],
        },
      ],
    });
    const USERS_POLICY = [
      { module_name: 'users', principal_class: 'admin', operations: [Operation.Read, Operation.Write] },
    ];
    const request = { kind: RequestKind.Write, path: `/users/user[name='x; rm -rf /']/uid`, value: 5 };

    it('reports an opaque key value in audit mode', async () => {
      const { store, handlers, sink, dispatcher } = setup({ tree: USERS_TREE }, USERS_POLICY);
      const handler = new RecordingHandler();
      handlers.register('/users', handler);

      const envelope = await dispatcher.dispatch(sessionFor(store, 'admin'), request);

      expect(envelope).toEqual({
        status: ResponseStatus.Ok,
        value: null,
        unconstrained: ['/users/user/name'],
        trace: FULL_TRACE,
      });
      expect(handler.calls[0]?.keys).toEqual([{ name: 'name', value: 'x; rm -rf /' }]);
      expect(sink.entries[0]?.unconstrained).toEqual(['/users/user/name']);
    });

    it('rejects an opaque key value in reject mode', async () => {
      const { store, handlers, dispatcher } = setup({ tree: USERS_TREE, unconstrained: 'reject' }, USERS_POLICY);
      const handler = new RecordingHandler();
      handlers.register('/users', handler);

      const envelope = await dispatcher.dispatch(sessionFor(store, 'admin'), request);

      expect(envelope.status === ResponseStatus.ValidationFailed ? envelope.detail : null).toEqual({
        kind: 'unconstrained',
        path: '/users/user/name',
        detail: 'values for unconstrained leaves are not accepted',
      });
      expect(handler.calls).toHaveLength(0);
    });
  });

  it('rejects them in reject mode', async () => {
    const { store, handlers, dispatcher } = setup({ unconstrained: 'reject' });
    handlers.register('/system', new RecordingHandler());
    const envelope = await dispatcher.dispatch(sessionFor(store, 'admin'), {
      kind: RequestKind.Write,
      path: '/system',
      value: { contact: 'ops' },
    });
    expect(envelope.status === ResponseStatus.ValidationFailed ? envelope.detail : null).toEqual({
      kind: 'unconstrained',
      path: '/system/contact',
      detail: 'values for unconstrained leaves are not accepted',
    });
  });
});

// ---------------------------------------------------------------------------
// Policy reload isolation
// ---------------------------------------------------------------------------

describe('dispatcher: policy reload', () => {
  it('does not affect a call whose authorization already ran', async () => {
    const { store, handlers, sink, dispatcher } = setup();
    handlers.register(
      '/run-command',
      new RecordingHandler(async () => {
        await store.reload([]);
        return { ok: true, payload: { 'exit-code': 0 } };
      }),
    );
    const operator = sessionFor(store, 'operator');
    const request = { kind: RequestKind.Rpc, path: '/run-command', value: { command: 'shutdown' } };

    expect((await dispatcher.dispatch(operator, request)).status).toBe(ResponseStatus.Ok);
    expect((await dispatcher.dispatch(operator, request)).status).toBe(ResponseStatus.AccessDenied);
    expect(sink.entries.map((e) => e.policy_version)).toEqual([1, 2]);
  });

  it('authorizes a call queued for the module lock against the policy in force once it holds the lock', async () => {
    const { store, handlers, sink, dispatcher } = setup();
    let open: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    let invocations = 0;
    const handler = new RecordingHandler(async () => {
      invocations += 1;
      if (invocations === 1) await gate;
      return { ok: true };
    });
    handlers.register('/interfaces', handler);

    const first = sessionFor(store, 'admin');
    const second = new Session({ principal: { id: 'admin-2', principal_class: 'admin' }, policies: store, id: 'session-b' });
    const request = { kind: RequestKind.Write, path: `/interfaces/interface[name='eth0']`, value: { mtu: 1500 } };

    const pendingFirst = dispatcher.dispatch(first, request);
    await vi.waitFor(() => expect(handler.calls).toHaveLength(1));
    const pendingSecond = dispatcher.dispatch(second, request);
    await store.reload([]);
    open();

    expect((await pendingFirst).status).toBe(ResponseStatus.Ok);
    expect((await pendingSecond).status).toBe(ResponseStatus.AccessDenied);
    expect(handler.calls).toHaveLength(1);
    expect(sink.entries.find((e) => e.session_id === 'session-admin')?.policy_version).toBe(1);
    expect(sink.entries.find((e) => e.session_id === 'session-b')).toMatchObject({
      policy_version: 2,
      denial_reason: 'no-module-policy',
    });
  });

  it('records exactly one audit entry per call', async () => {
    const { store, handlers, sink, dispatcher } = setup();
    handlers.register('/reboot', new RecordingHandler());
    const admin = sessionFor(store, 'admin');
    await dispatcher.dispatch(admin, { kind: RequestKind.Rpc, path: '/reboot' });
    await dispatcher.dispatch(admin, { kind: RequestKind.Read, path: '/nope' });
    await dispatcher.dispatch(sessionFor(store, 'guest'), { kind: RequestKind.Rpc, path: '/reboot' });
    expect(sink.entries.map((e) => e.status)).toEqual(['OK', 'NOT_FOUND', 'ACCESS_DENIED']);
  });
});
