/**
 * @confgate/kernel
 *
 * Confgate Kernel: validation, access control and dispatch.
 *
 * The kernel is the choke point between external input and application
 * logic. It defines:
 * - The Validator (payloads against the constraint tree)
 * - Policy compilation, snapshots and the PolicyStore
 * - The Access Control Enforcer (authorize)
 * - Sessions and the per-module lock manager
 * - The HandlerRegistry and the Dispatcher state machine
 * - The AuditSink interface and AuditLogger
 *
 * The kernel performs no filesystem or network I/O. Persistence is
 * injected by the runtime host.
 */

// Types
export type {
  AuditEntry,
  CompiledPolicy,
  DispatchRequest,
  Envelope,
  FailureDetail,
  GrantTable,
  Handler,
  HandlerCall,
  HandlerResult,
  HeldLock,
  PolicyEntry,
  PolicyHash,
  PolicySnapshot,
  Principal,
  ValidateOptions,
  ValidationFailure,
  ValidationFailureKind,
  ValidationOutcome,
} from './types/index.js';
export { CallState, EditMode, LockMode, Operation, RequestKind, ResponseStatus } from './types/index.js';

// Validation
export { Validator } from './validation/validator.js';

// Policy
export { canonicalize, sha256Canonical } from './policy/canonical.js';
export { compilePolicy, hashPolicy } from './policy/compiler.js';
export { PolicyStore } from './policy/store.js';
export type { PolicySource } from './policy/store.js';

// Access control
export { authorize } from './access/enforcer.js';
export type { AccessDecision, DenialReason } from './access/enforcer.js';

// Sessions
export { Session, SessionClosedError } from './session/session.js';
export type { SessionOptions } from './session/session.js';
export { LockAbortedError, ModuleLockManager } from './session/locks.js';
export type { LockRelease } from './session/locks.js';

// Dispatch
export { HandlerRegistry } from './dispatch/handler-registry.js';
export { DEFAULT_CALLBACK_TIMEOUT_MS, Dispatcher, MAX_CALLBACK_TIMEOUT_MS } from './dispatch/dispatcher.js';
export type { DispatcherOptions, UnconstrainedMode } from './dispatch/dispatcher.js';

// Audit
export type { AuditSink } from './logging/audit-sink.js';
export { AuditLogger, MemoryAuditSink } from './logging/audit-logger.js';
