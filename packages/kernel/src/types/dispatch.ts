/**
 * Confgate Kernel: Dispatch Types
 *
 * Request, handler and response shapes for the Dispatcher. A request moves
 * through a fixed sequence of states; the trace of states it visited is
 * returned in every envelope and recorded in the audit trail.
 */

import type { KeyPredicate, NormalizedValue, SchemaPath } from '@confgate/schema';
import type { Principal } from './session.js';
import type { ValidationFailureKind } from './validation.js';

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export enum RequestKind {
  Read = 'read',
  Write = 'write',
  Rpc = 'rpc',
  Notify = 'notify',
}

/** How a write applies its payload to the target. */
export enum EditMode {
  /** The payload replaces the target and is validated in full. */
  Replace = 'replace',
  /** The payload is merged into the target; absent nodes are left alone. */
  Merge = 'merge',
  /** The target is removed. No payload. */
  Delete = 'delete',
}

export interface DispatchRequest {
  readonly kind: RequestKind;
  readonly path: string;
  /** Payload: RPC input, notification content or the written value. */
  readonly value?: unknown;
  /** Writes only. Defaults to Replace. */
  readonly edit?: EditMode;
  /** Aborting cancels the call wherever it is. */
  readonly signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Call states
// ---------------------------------------------------------------------------

export enum CallState {
  Received = 'Received',
  Resolved = 'Resolved',
  Validated = 'Validated',
  Authorized = 'Authorized',
  Invoked = 'Invoked',
  Completed = 'Completed',
  NotFound = 'NotFound',
  Rejected = 'Rejected',
  Denied = 'Denied',
  CallbackError = 'CallbackError',
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

/** What a handler receives. Every value in it has passed validation. */
export interface HandlerCall {
  readonly kind: RequestKind;
  /** Canonical instance path of the target. */
  readonly path: string;
  readonly schemaPath: SchemaPath;
  /** List keys selected along the path, outermost first. */
  readonly keys: ReadonlyArray<KeyPredicate>;
  readonly value: NormalizedValue | null;
  readonly edit: EditMode | null;
  readonly principal: Principal;
  /** Fires on timeout, request cancellation or session close. */
  readonly signal: AbortSignal;
}

export type HandlerResult =
  | { readonly ok: true; readonly payload?: unknown }
  | { readonly ok: false; readonly code: string; readonly message: string };

/**
 * Application logic behind a schema path. Handlers are only ever invoked
 * after validation and authorization have both passed.
 */
export interface Handler {
  handle(call: HandlerCall): Promise<HandlerResult>;
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

export enum ResponseStatus {
  Ok = 'OK',
  NotFound = 'NOT_FOUND',
  ValidationFailed = 'VALIDATION_FAILED',
  AccessDenied = 'ACCESS_DENIED',
  CallbackError = 'CALLBACK_ERROR',
}

/** Disclosed validation failure. Only callers holding `read` on the module see it. */
export interface FailureDetail {
  readonly kind: ValidationFailureKind;
  readonly path: string;
  readonly detail: string;
}

export type Envelope =
  | {
      readonly status: ResponseStatus.Ok;
      /** RPC output, read payload, or null. */
      readonly value: unknown;
      readonly unconstrained: ReadonlyArray<string>;
      readonly trace: ReadonlyArray<CallState>;
    }
  | { readonly status: ResponseStatus.NotFound; readonly trace: ReadonlyArray<CallState> }
  | {
      readonly status: ResponseStatus.ValidationFailed;
      readonly detail: FailureDetail;
      readonly trace: ReadonlyArray<CallState>;
    }
  | { readonly status: ResponseStatus.AccessDenied; readonly trace: ReadonlyArray<CallState> }
  | {
      readonly status: ResponseStatus.CallbackError;
      readonly detail: string;
      readonly trace: ReadonlyArray<CallState>;
    };
