/**
 * Confgate Kernel: Access Control Enforcer
 *
 * Default deny. A request is granted only if the policy has an entry for
 * the module, that entry names the caller's principal class, and the class
 * holds the requested operation. Checks run in that order and stop at the
 * first miss.
 *
 * Grants are flat per module: a grant covers every node the module owns
 * and nothing else. Operations never imply one another.
 *
 * The denial reason is for the audit trail only. Callers are told nothing
 * beyond "denied".
 */

import type { Operation, PolicySnapshot } from '../types/policy.js';
import type { Session } from '../session/session.js';

export type DenialReason = 'no-module-policy' | 'no-class-grant' | 'operation-not-granted';

export type AccessDecision =
  | { readonly granted: true }
  | { readonly granted: false; readonly reason: DenialReason };

const GRANTED: AccessDecision = Object.freeze({ granted: true });

/**
 * Decide whether `session` may perform `operation` on `module`.
 *
 * @param snapshot - The snapshot captured for this call. Defaults to the
 *   session's current policy.
 */
export function authorize(
  session: Session,
  module: string,
  operation: Operation,
  snapshot: PolicySnapshot = session.policy(),
): AccessDecision {
  const byClass = snapshot.grants.get(module);
  if (byClass === undefined) {
    return { granted: false, reason: 'no-module-policy' };
  }
  const ops = byClass.get(session.principal.principal_class);
  if (ops === undefined) {
    return { granted: false, reason: 'no-class-grant' };
  }
  if (!ops.has(operation)) {
    return { granted: false, reason: 'operation-not-granted' };
  }
  return GRANTED;
}
