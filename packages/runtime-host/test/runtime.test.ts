/**
 * Confgate Runtime Host: Runtime Lifecycle Tests
 *
 * Each test initializes the process runtime against a MemoryStateIO and
 * shuts it down afterwards, so the process slot is free for the next one.
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Operation, RequestKind, ResponseStatus } from '@confgate/kernel';
import type { HandlerResult } from '@confgate/kernel';
import { PolicyLoadError } from '@confgate/loader';
import { buildConstraintTree } from '@confgate/schema';
import { RuntimeConfigError, saveRuntimeConfig } from '../src/config.js';
import { readLog } from '../src/logging/log-reader.js';
import { RuntimeAlreadyInitializedError, currentRuntime, initRuntime, shutdown } from '../src/runtime.js';
import { MemoryStateIO } from '../src/state/state-io.js';

const TREE = buildConstraintTree({
  modules: [
    {
      name: 'system',
      nodes: [
        {
          kind: 'container',
          name: 'system',
          children: [{ kind: 'leaf', name: 'hostname', type: { type: 'string', length: { min: 1, max: 63 } } }],
        },
        { kind: 'rpc', name: 'reboot' },
      ],
    },
  ],
});

const ADMIN = { module_name: 'system', principal_class: 'admin', operations: [Operation.Read, Operation.Execute] };
const clock = (): string => '2026-01-01T00:00:00.000Z';

afterEach(() => {
  shutdown();
  vi.restoreAllMocks();
});

describe('initRuntime', () => {
  it('dispatches through the kernel and audits to logs/audit.jsonl', async () => {
    const stateIO = new MemoryStateIO();
    const runtime = initRuntime({ stateIO, tree: TREE, policy: [ADMIN], clock, env: {} });
    runtime.handlers.register('/reboot', { handle: async (): Promise<HandlerResult> => ({ ok: true }) });

    const session = runtime.openSession({ id: 'alice', principal_class: 'admin' });
    const envelope = await runtime.dispatcher.dispatch(session, { kind: RequestKind.Rpc, path: '/reboot' });

    expect(envelope.status).toBe(ResponseStatus.Ok);
    const { events } = readLog(stateIO.readLogRaw('audit.jsonl'));
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      session_id: 'session-1',
      principal_id: 'alice',
      path: '/reboot',
      status: 'OK',
      policy_version: 1,
      timestamp: '2026-01-01T00:00:00.000Z',
    });
  });

  it('refuses a second initialization until shutdown', () => {
    initRuntime({ stateIO: new MemoryStateIO(), tree: TREE, policy: [], env: {} });
    expect(() => initRuntime({ stateIO: new MemoryStateIO(), tree: TREE, policy: [], env: {} })).toThrow(
      RuntimeAlreadyInitializedError,
    );
    shutdown();
    expect(currentRuntime()).toBeNull();
    expect(initRuntime({ stateIO: new MemoryStateIO(), tree: TREE, policy: [], env: {} })).toBe(currentRuntime());
  });

  it('closes every open session on shutdown', () => {
    const runtime = initRuntime({ stateIO: new MemoryStateIO(), tree: TREE, policy: [ADMIN], env: {} });
    const a = runtime.openSession({ id: 'alice', principal_class: 'admin' });
    const b = runtime.openSession({ id: 'bob', principal_class: 'admin' });
    expect(runtime.openSessions()).toBe(2);

    shutdown();

    expect(a.closed).toBe(true);
    expect(b.closed).toBe(true);
    expect(runtime.openSessions()).toBe(0);
  });

  it('warns on stderr and denies everything without a policy', async () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const runtime = initRuntime({ stateIO: new MemoryStateIO(), tree: TREE, env: {} });
    expect(write).toHaveBeenCalledWith('[confgate] No policy configured; every request will be denied.\n');

    runtime.handlers.register('/reboot', { handle: async (): Promise<HandlerResult> => ({ ok: true }) });
    const session = runtime.openSession({ id: 'alice', principal_class: 'admin' });
    const envelope = await runtime.dispatcher.dispatch(session, { kind: RequestKind.Rpc, path: '/reboot' });
    expect(envelope.status).toBe(ResponseStatus.AccessDenied);
  });

  it('requires a schema when none is passed', () => {
    let caught: unknown;
    try {
      initRuntime({ stateIO: new MemoryStateIO(), env: {} });
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(RuntimeConfigError);
    expect(caught instanceof RuntimeConfigError ? caught.issues : []).toEqual([
      { path: 'schema_path', message: 'no schema artifact is configured' },
    ]);
    expect(currentRuntime()).toBeNull();
  });

  it('rejects a policy naming an undefined module and leaves the slot free', () => {
    const routing = { module_name: 'routing', principal_class: 'admin', operations: [Operation.Read] };
    expect(() => initRuntime({ stateIO: new MemoryStateIO(), tree: TREE, policy: [routing], env: {} })).toThrow(
      PolicyLoadError,
    );
    expect(currentRuntime()).toBeNull();
  });

  it('takes the callback timeout from the stored configuration', async () => {
    const stateIO = new MemoryStateIO();
    saveRuntimeConfig(stateIO, { callback_timeout_ms: 15 });
    const runtime = initRuntime({ stateIO, tree: TREE, policy: [ADMIN], env: {} });
    runtime.handlers.register('/reboot', { handle: () => new Promise<HandlerResult>(() => undefined) });

    const session = runtime.openSession({ id: 'alice', principal_class: 'admin' });
    const envelope = await runtime.dispatcher.dispatch(session, { kind: RequestKind.Rpc, path: '/reboot' });
    expect(envelope.status === ResponseStatus.CallbackError ? envelope.detail : null).toBe(
      'timeout: handler did not complete within 15ms',
    );
  });
});

describe('Runtime.reloadPolicy', () => {
  it('swaps in new entries', async () => {
    const runtime = initRuntime({ stateIO: new MemoryStateIO(), tree: TREE, policy: [], env: {} });
    const snapshot = await runtime.reloadPolicy([ADMIN]);
    expect(snapshot.version).toBe(2);
    expect(runtime.policies.current().grants.get('system')?.get('admin')).toEqual(
      new Set([Operation.Read, Operation.Execute]),
    );
  });

  it('keeps the active policy when the new one is invalid', async () => {
    const runtime = initRuntime({ stateIO: new MemoryStateIO(), tree: TREE, policy: [ADMIN], env: {} });
    const routing = { module_name: 'routing', principal_class: 'admin', operations: [Operation.Read] };
    await expect(runtime.reloadPolicy([routing])).rejects.toBeInstanceOf(PolicyLoadError);
    expect(runtime.policies.current().version).toBe(1);
  });

  it('re-reads the configured policy file', async () => {
    const file = join(mkdtempSync(join(tmpdir(), 'confgate-policy-')), 'policy.json');
    writeFileSync(file, JSON.stringify({ entries: [] }), 'utf-8');
    const stateIO = new MemoryStateIO();
    saveRuntimeConfig(stateIO, { policy_path: file });
    const runtime = initRuntime({ stateIO, tree: TREE, env: {} });
    expect(runtime.policies.current().entries).toEqual([]);

    writeFileSync(file, JSON.stringify([ADMIN]), 'utf-8');
    await runtime.reloadPolicy();
    expect(runtime.policies.current().entries).toEqual([ADMIN]);
  });

  it('needs a policy file to reload from disk', async () => {
    const runtime = initRuntime({ stateIO: new MemoryStateIO(), tree: TREE, policy: [], env: {} });
    await expect(runtime.reloadPolicy()).rejects.toBeInstanceOf(RuntimeConfigError);
  });
});
