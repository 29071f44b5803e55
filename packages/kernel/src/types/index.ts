export type { AuditEntry } from './audit.js';
export type {
  DispatchRequest,
  Envelope,
  FailureDetail,
  Handler,
  HandlerCall,
  HandlerResult,
} from './dispatch.js';
export { CallState, EditMode, RequestKind, ResponseStatus } from './dispatch.js';
export type { CompiledPolicy, GrantTable, PolicyEntry, PolicyHash, PolicySnapshot } from './policy.js';
export { Operation } from './policy.js';
export type { HeldLock, Principal } from './session.js';
export { LockMode } from './session.js';
export type {
  ValidateOptions,
  ValidationFailure,
  ValidationFailureKind,
  ValidationOutcome,
} from './validation.js';
