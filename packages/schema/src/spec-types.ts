/**
 * Confgate Schema: Artifact Specification Types
 *
 * The uncompiled shape of a schema artifact, as produced by a schema-source
 * compiler and consumed by buildConstraintTree(). The loader package parses
 * JSON into these types; tests construct them directly.
 *
 * Field names are the artifact's wire names (snake_case), kept identical to
 * the JSON so that parsed artifacts need no renaming pass.
 */

import type { IntegerWidth, ScalarValue } from './types.js';

export type TypeSpec =
  | {
      readonly type: 'string';
      readonly patterns?: ReadonlyArray<string> | undefined;
      readonly length?: { readonly min?: number | undefined; readonly max?: number | null | undefined } | undefined;
    }
  | {
      readonly type: 'numeric';
      readonly width: IntegerWidth;
      /** Integer bound. Strings carry 64-bit bounds that a JS number cannot. */
      readonly min?: number | string | undefined;
      readonly max?: number | string | undefined;
    }
  | { readonly type: 'enumeration'; readonly tokens: ReadonlyArray<string> }
  | { readonly type: 'identityref'; readonly base: string }
  | { readonly type: 'boolean' }
  | { readonly type: 'union'; readonly members: ReadonlyArray<TypeSpec> }
  | { readonly type: 'opaque' };

interface NodeSpecBase {
  readonly name: string;
  readonly description?: string | undefined;
}

export interface LeafSpec extends NodeSpecBase {
  readonly kind: 'leaf';
  readonly type: TypeSpec;
  readonly mandatory?: boolean | undefined;
  readonly default?: ScalarValue | undefined;
  readonly config?: boolean | undefined;
}

export interface LeafListSpec extends NodeSpecBase {
  readonly kind: 'leaf-list';
  readonly type: TypeSpec;
  readonly min_elements?: number | undefined;
  readonly max_elements?: number | null | undefined;
  readonly config?: boolean | undefined;
}

export interface ContainerSpec extends NodeSpecBase {
  readonly kind: 'container';
  readonly children?: ReadonlyArray<NodeSpec> | undefined;
  readonly mandatory?: boolean | undefined;
  readonly config?: boolean | undefined;
}

export interface ListSpec extends NodeSpecBase {
  readonly kind: 'list';
  readonly keys?: ReadonlyArray<string> | undefined;
  readonly children?: ReadonlyArray<NodeSpec> | undefined;
  readonly min_elements?: number | undefined;
  readonly max_elements?: number | null | undefined;
  readonly config?: boolean | undefined;
}

export interface RpcSpec extends NodeSpecBase {
  readonly kind: 'rpc';
  readonly input?: ReadonlyArray<NodeSpec> | undefined;
  readonly output?: ReadonlyArray<NodeSpec> | undefined;
}

export interface NotificationSpec extends NodeSpecBase {
  readonly kind: 'notification';
  readonly children?: ReadonlyArray<NodeSpec> | undefined;
}

export type NodeSpec =
  | LeafSpec
  | LeafListSpec
  | ContainerSpec
  | ListSpec
  | RpcSpec
  | NotificationSpec;

export interface ModuleSpec {
  readonly name: string;
  readonly nodes: ReadonlyArray<NodeSpec>;
}

export interface IdentitySpec {
  readonly name: string;
  readonly module?: string | undefined;
  readonly bases?: ReadonlyArray<string> | undefined;
}

/** A complete compiled schema artifact. */
export interface SchemaArtifact {
  readonly identities?: ReadonlyArray<IdentitySpec> | undefined;
  readonly modules: ReadonlyArray<ModuleSpec>;
}
