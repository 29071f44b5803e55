/**
 * Confgate Kernel: Validation Types
 */

import type { NormalizedValue, ScalarFailureKind } from '@confgate/schema';

/**
 * Why a value was rejected. Scalar kinds come from the leaf type check;
 * the rest from structure, cardinality and the write path.
 */
export type ValidationFailureKind =
  | ScalarFailureKind
  | 'missing-mandatory'
  | 'unknown-node'
  | 'cardinality'
  | 'duplicate-key'
  | 'missing-key'
  | 'read-only-node'
  | 'unconstrained'
  | 'missing-key-predicate'
  | 'key-mismatch';

export interface ValidationFailure {
  readonly ok: false;
  readonly kind: ValidationFailureKind;
  /** Instance path of the offending node. */
  readonly path: string;
  readonly detail: string;
}

export type ValidationOutcome =
  | {
      readonly ok: true;
      readonly value: NormalizedValue;
      /** Instance paths of accepted values whose type imposes no check. */
      readonly unconstrained: ReadonlyArray<string>;
    }
  | ValidationFailure;

export interface ValidateOptions {
  /**
   * Merge semantics: the payload is a partial update, so absent mandatory
   * nodes are not reported and defaults are not filled in.
   */
  readonly partial?: boolean;
  /** Reject any present `config: false` node with `read-only-node`. */
  readonly configOnly?: boolean;
  /** Instance path of the validated node. Defaults to its schema path. */
  readonly path?: string;
}
