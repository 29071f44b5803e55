/**
 * Confgate Schema: Core Type Definitions
 *
 * The compiled, in-memory shape of a data-model schema: schema nodes, type
 * constraints and identities. Every other confgate package depends on these
 * types; this package has no internal confgate dependencies.
 *
 * Compiled values are immutable. The tree builder deep-freezes every node it
 * produces, so nothing downstream can alter schema shape after startup.
 */

// ---------------------------------------------------------------------------
// Node kinds
// ---------------------------------------------------------------------------

/**
 * The kinds of schema node a compiled tree may contain.
 *
 * Data nodes (leaf, leaf-list, container, list) describe datastore content.
 * RPC and notification nodes are top-level operations and events.
 */
export enum NodeKind {
  Leaf = 'leaf',
  LeafList = 'leaf-list',
  Container = 'container',
  List = 'list',
  Rpc = 'rpc',
  Notification = 'notification',
}

// ---------------------------------------------------------------------------
// Type constraints
// ---------------------------------------------------------------------------

/** Declared bit width of an integer leaf. */
export type IntegerWidth =
  | 'int8'
  | 'int16'
  | 'int32'
  | 'int64'
  | 'uint8'
  | 'uint16'
  | 'uint32'
  | 'uint64';

/** A pattern compiled once at build time. `regex` is anchored at both ends. */
export interface CompiledPattern {
  readonly source: string;
  readonly regex: RegExp;
}

/** Inclusive length bounds for a string leaf. `max: null` is unbounded. */
export interface LengthRange {
  readonly min: number;
  readonly max: number | null;
}

/**
 * The constraint attached to a leaf or leaf-list.
 *
 * Numeric bounds are bigint so that 64-bit widths compare exactly.
 * `opaque` is what the builder produces for a type that declares nothing to
 * check (for instance a string with no pattern and no length); the validator
 * accepts it and reports the leaf as unconstrained.
 */
export type TypeConstraint =
  | {
      readonly kind: 'string';
      readonly patterns: ReadonlyArray<CompiledPattern>;
      readonly length: LengthRange | null;
    }
  | {
      readonly kind: 'numeric';
      readonly width: IntegerWidth;
      readonly min: bigint;
      readonly max: bigint;
    }
  | { readonly kind: 'enumeration'; readonly tokens: ReadonlyArray<string> }
  | { readonly kind: 'identityref'; readonly base: string }
  | { readonly kind: 'boolean' }
  | { readonly kind: 'union'; readonly members: ReadonlyArray<TypeConstraint> }
  | { readonly kind: 'opaque' };

export type TypeConstraintKind = TypeConstraint['kind'];

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

/** A scalar after validation: what a leaf holds once accepted. */
export type ScalarValue = string | number | boolean;

/**
 * A value after validation. Objects are containers, list entries and RPC
 * input/output; arrays are lists and leaf-lists.
 */
export type NormalizedValue =
  | ScalarValue
  | ReadonlyArray<NormalizedValue>
  | { readonly [member: string]: NormalizedValue };

// ---------------------------------------------------------------------------
// Schema nodes
// ---------------------------------------------------------------------------

/** Canonical schema path: `/` followed by node names, no prefixes or keys. */
export type SchemaPath = string;

interface NodeBase {
  readonly name: string;
  /** The module that owns this node (the policy granularity unit). */
  readonly module: string;
  readonly path: SchemaPath;
  readonly description: string | null;
}

export interface LeafNode extends NodeBase {
  readonly kind: NodeKind.Leaf;
  readonly type: TypeConstraint;
  readonly mandatory: boolean;
  /** Normalized default, applied when the leaf is absent from a full payload. */
  readonly default: ScalarValue | null;
  readonly config: boolean;
}

export interface LeafListNode extends NodeBase {
  readonly kind: NodeKind.LeafList;
  readonly type: TypeConstraint;
  readonly min_elements: number;
  readonly max_elements: number | null;
  readonly config: boolean;
}

export interface ContainerNode extends NodeBase {
  readonly kind: NodeKind.Container;
  readonly children: ReadonlyArray<SchemaNode>;
  readonly mandatory: boolean;
  readonly config: boolean;
}

export interface ListNode extends NodeBase {
  readonly kind: NodeKind.List;
  readonly children: ReadonlyArray<SchemaNode>;
  /** Names of the key leaves, in declaration order. Each is a direct leaf child. */
  readonly keys: ReadonlyArray<string>;
  readonly min_elements: number;
  readonly max_elements: number | null;
  readonly config: boolean;
}

export interface RpcNode extends NodeBase {
  readonly kind: NodeKind.Rpc;
  readonly input: ReadonlyArray<SchemaNode>;
  /** Output children, or null when the RPC declares no output. */
  readonly output: ReadonlyArray<SchemaNode> | null;
}

export interface NotificationNode extends NodeBase {
  readonly kind: NodeKind.Notification;
  readonly children: ReadonlyArray<SchemaNode>;
}

export type SchemaNode =
  | LeafNode
  | LeafListNode
  | ContainerNode
  | ListNode
  | RpcNode
  | NotificationNode;

/** Nodes that hold datastore content. */
export type DataNode = LeafNode | LeafListNode | ContainerNode | ListNode;

/** Nodes whose children are validated as members of a JSON object. */
export type InteriorNode = ContainerNode | ListNode | NotificationNode;

export function isDataNode(node: SchemaNode): node is DataNode {
  return (
    node.kind === NodeKind.Leaf ||
    node.kind === NodeKind.LeafList ||
    node.kind === NodeKind.Container ||
    node.kind === NodeKind.List
  );
}

/** Whether a data node may be written. RPCs and notifications are never data. */
export function isConfigNode(node: SchemaNode): boolean {
  return isDataNode(node) && node.config;
}

// ---------------------------------------------------------------------------
// Identities
// ---------------------------------------------------------------------------

/** A named identity. `bases` may name several identities (a DAG, not a tree). */
export interface Identity {
  readonly name: string;
  readonly module: string | null;
  readonly bases: ReadonlyArray<string>;
}
