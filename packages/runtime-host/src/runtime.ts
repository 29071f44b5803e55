/**
 * Confgate Runtime Host: Process Runtime
 *
 * Wires the kernel for one process: the constraint tree and policy are
 * built once, the Dispatcher writes its audit trail through a
 * FileAuditSink, and sessions are opened per client connection.
 *
 * Lifecycle:
 *   initRuntime()   once per process; a second call throws until shutdown()
 *   openSession()   per connection
 *   reloadPolicy()  re-read the policy file (or take new entries) and swap
 *   shutdown()      close every open session and free the process slot
 */

import {
  Dispatcher,
  HandlerRegistry,
  ModuleLockManager,
  PolicyStore,
  Session,
} from '@confgate/kernel';
import type { AuditSink, PolicyEntry, PolicySnapshot, Principal } from '@confgate/kernel';
import { parsePolicyDocument, readPolicyFile, readSchemaFile } from '@confgate/loader';
import type { ConstraintTree } from '@confgate/schema';
import { RuntimeConfigError, loadRuntimeConfig } from './config.js';
import type { RuntimeConfig } from './config.js';
import { resolveHome } from './home.js';
import { FileAuditSink } from './logging/file-audit-sink.js';
import { FileStateIO } from './state/state-io.js';
import type { StateIO } from './state/state-io.js';

export class RuntimeAlreadyInitializedError extends Error {
  constructor() {
    super('The confgate runtime is already initialized in this process');
    this.name = 'RuntimeAlreadyInitializedError';
  }
}

export interface RuntimeOptions {
  /** Home directory; resolved with resolveHome() when no stateIO is given. */
  readonly home?: string | undefined;
  /** Injected state I/O. Tests pass a MemoryStateIO. */
  readonly stateIO?: StateIO | undefined;
  /** A prebuilt tree. Otherwise `schema_path` from the config is read. */
  readonly tree?: ConstraintTree | undefined;
  /** Initial grants. Otherwise `policy_path` from the config, else none. */
  readonly policy?: ReadonlyArray<PolicyEntry> | undefined;
  readonly handlers?: HandlerRegistry | undefined;
  /** Overrides the FileAuditSink. */
  readonly auditSink?: AuditSink | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
  readonly clock?: (() => string) | undefined;
}

export class Runtime {
  readonly handlers: HandlerRegistry;
  readonly policies: PolicyStore;
  readonly dispatcher: Dispatcher;
  private readonly sessions = new Set<Session>();
  private sessionCount = 0;

  constructor(
    readonly tree: ConstraintTree,
    readonly config: RuntimeConfig,
    readonly stateIO: StateIO,
    policy: ReadonlyArray<PolicyEntry>,
    options: RuntimeOptions,
  ) {
    this.handlers = options.handlers ?? new HandlerRegistry();
    this.policies = new PolicyStore(policy, options.clock);
    this.dispatcher = new Dispatcher({
      tree,
      handlers: this.handlers,
      locks: new ModuleLockManager(),
      auditSink: options.auditSink ?? new FileAuditSink(stateIO),
      callbackTimeoutMs: config.callback_timeout_ms,
      unconstrained: config.unconstrained,
      clock: options.clock,
    });
  }

  openSession(principal: Principal): Session {
    this.sessionCount += 1;
    const session = new Session({
      principal,
      policies: this.policies,
      id: `session-${this.sessionCount}`,
    });
    this.sessions.add(session);
    return session;
  }

  /** Close one session, cancelling its in-flight calls. */
  closeSession(session: Session): void {
    session.close();
    this.sessions.delete(session);
  }

  openSessions(): number {
    return this.sessions.size;
  }

  /**
   * Replace the active policy. Without entries, `policy_path` is re-read.
   * On failure the previous policy stays active and the error propagates.
   *
   * @throws {PolicyLoadError} if the new policy is invalid
   * @throws {RuntimeConfigError} if no entries are given and no policy_path is configured
   */
  async reloadPolicy(entries?: ReadonlyArray<PolicyEntry>): Promise<PolicySnapshot> {
    if (entries !== undefined) {
      return this.policies.reload(async () => parsePolicyDocument(entries, this.tree));
    }
    const policyPath = this.config.policy_path;
    if (policyPath === undefined) {
      throw new RuntimeConfigError([{ path: 'policy_path', message: 'no policy file is configured' }]);
    }
    return this.policies.reload(async () => readPolicyFile(policyPath, this.tree));
  }

  closeAll(): void {
    for (const session of this.sessions) session.close();
    this.sessions.clear();
  }
}

// ---------------------------------------------------------------------------
// Process slot
// ---------------------------------------------------------------------------

let active: Runtime | null = null;

/**
 * Build the process runtime.
 *
 * @throws {RuntimeAlreadyInitializedError} if a runtime is already active
 * @throws {RuntimeConfigError} on invalid configuration or a missing schema
 * @throws {SchemaBuildError} if the schema artifact is invalid
 * @throws {PolicyLoadError} if the initial policy is invalid
 */
export function initRuntime(options: RuntimeOptions = {}): Runtime {
  if (active !== null) {
    throw new RuntimeAlreadyInitializedError();
  }
  const env = options.env ?? process.env;
  const stateIO = options.stateIO ?? new FileStateIO(resolveHome({ home: options.home, env }));
  const config = loadRuntimeConfig(stateIO, env);

  let tree = options.tree;
  if (tree === undefined) {
    if (config.schema_path === undefined) {
      throw new RuntimeConfigError([{ path: 'schema_path', message: 'no schema artifact is configured' }]);
    }
    tree = readSchemaFile(config.schema_path);
  }

  let policy: ReadonlyArray<PolicyEntry>;
  if (options.policy !== undefined) {
    policy = parsePolicyDocument(options.policy, tree, 'options');
  } else if (config.policy_path !== undefined) {
    policy = readPolicyFile(config.policy_path, tree);
  } else {
    process.stderr.write('[confgate] No policy configured; every request will be denied.\n');
    policy = [];
  }

  active = new Runtime(tree, config, stateIO, policy, options);
  return active;
}

export function currentRuntime(): Runtime | null {
  return active;
}

/** Close every open session and free the process slot. No-op when idle. */
export function shutdown(): void {
  if (active === null) return;
  active.closeAll();
  active = null;
}
