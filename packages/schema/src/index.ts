/**
 * @confgate/schema
 *
 * Confgate Schema: compiled data-model types, path parser, identity
 * registry and constraint tree.
 *
 * This package is the base layer of confgate. It defines:
 * - The schema node and type constraint model (NodeKind, TypeConstraint)
 * - The uncompiled artifact types consumed by the tree builder
 * - parsePath() and the ConstraintTree resolver
 * - IdentityRegistry with O(1) derivation checks
 * - checkScalar(), shared by the builder (defaults) and the validator
 *
 * All other confgate packages depend on this package. This package has no
 * internal confgate dependencies.
 */

// Types
export type {
  CompiledPattern,
  ContainerNode,
  DataNode,
  Identity,
  IntegerWidth,
  InteriorNode,
  LeafListNode,
  LeafNode,
  LengthRange,
  ListNode,
  NormalizedValue,
  NotificationNode,
  RpcNode,
  ScalarValue,
  SchemaNode,
  SchemaPath,
  TypeConstraint,
  TypeConstraintKind,
} from './types.js';
export { NodeKind, isConfigNode, isDataNode } from './types.js';

export type {
  ContainerSpec,
  IdentitySpec,
  LeafListSpec,
  LeafSpec,
  ListSpec,
  ModuleSpec,
  NodeSpec,
  NotificationSpec,
  RpcSpec,
  SchemaArtifact,
  TypeSpec,
} from './spec-types.js';

export type { BuildIssue } from './errors.js';
export { PathSyntaxError, SchemaBuildError } from './errors.js';

// Paths
export type { KeyPredicate, PathSegment } from './path.js';
export { formatKeys, formatPath, parsePath } from './path.js';

// Identities
export { IdentityRegistry } from './identity-registry.js';

// Scalars
export type { ScalarCheck, ScalarFailureKind } from './scalar.js';
export { WIDTH_BOUNDS, checkScalar, describeValue, parseInteger } from './scalar.js';

// Tree
export type { ResolveFailure, ResolveResult, ResolvedSegment } from './tree.js';
export { ConstraintTree, childNodes } from './tree.js';
export { buildConstraintTree, buildTreeWithIdentities } from './builder.js';
