/**
 * Confgate Schema: Constraint Tree
 *
 * The compiled, immutable schema. Built once at startup by
 * buildConstraintTree() and shared by every session for the life of the
 * process. Lookups read only frozen data and a prebuilt index, so any number
 * of callers may resolve paths concurrently without locking.
 */

import { PathSyntaxError } from './errors.js';
import type { IdentityRegistry } from './identity-registry.js';
import { formatKeys, parsePath } from './path.js';
import type { KeyPredicate, PathSegment } from './path.js';
import { NodeKind } from './types.js';
import type { SchemaNode, SchemaPath } from './types.js';

/** A node on the resolved path, with the key predicates that selected it. */
export interface ResolvedSegment {
  readonly node: SchemaNode;
  readonly keys: ReadonlyArray<KeyPredicate>;
}

export type ResolveFailure = 'malformed-path' | 'unknown-module' | 'unknown-node' | 'invalid-predicate';

export type ResolveResult =
  | {
      readonly ok: true;
      readonly node: SchemaNode;
      /** Module owning the target node. */
      readonly module: string;
      /** Data nodes along the path, outermost first. Ends with `node`. */
      readonly segments: ReadonlyArray<ResolvedSegment>;
      /** Canonical instance path: no prefixes, normalized predicate quoting. */
      readonly instancePath: string;
    }
  | { readonly ok: false; readonly reason: ResolveFailure; readonly detail: string };

export class ConstraintTree {
  private readonly index: ReadonlyMap<SchemaPath, SchemaNode>;

  /**
   * Use buildConstraintTree() to construct a tree from an artifact. The
   * constructor trusts that `topLevel` is frozen and its paths unique.
   */
  constructor(
    private readonly moduleNames: ReadonlyArray<string>,
    private readonly topLevel: ReadonlyArray<SchemaNode>,
    readonly identities: IdentityRegistry,
  ) {
    const index = new Map<SchemaPath, SchemaNode>();
    const walk = (node: SchemaNode): void => {
      index.set(node.path, node);
      for (const child of childNodes(node)) walk(child);
    };
    for (const node of topLevel) walk(node);
    this.index = index;
  }

  modules(): ReadonlyArray<string> {
    return this.moduleNames;
  }

  hasModule(name: string): boolean {
    return this.moduleNames.includes(name);
  }

  roots(): ReadonlyArray<SchemaNode> {
    return this.topLevel;
  }

  get nodeCount(): number {
    return this.index.size;
  }

  /** Exact lookup by canonical schema path (`/a/b`, RPC children via `/rpc/input/x`). */
  node(path: SchemaPath): SchemaNode | undefined {
    return this.index.get(path);
  }

  /**
   * Resolve a data path to its schema node.
   *
   * Never throws: malformed text, unknown names and bad predicates all
   * produce `{ ok: false }` with a reason. Predicates are only accepted on
   * list nodes and must name every key of the list exactly once.
   */
  resolve(path: string): ResolveResult {
    let parsed: ReadonlyArray<PathSegment>;
    try {
      parsed = parsePath(path);
    } catch (err: unknown) {
      if (err instanceof PathSyntaxError) {
        return { ok: false, reason: 'malformed-path', detail: err.message };
      }
      throw err;
    }

    const segments: ResolvedSegment[] = [];
    let schemaPath = '';
    let instancePath = '';
    let current: SchemaNode | null = null;

    for (const seg of parsed) {
      // Directly below an rpc the next segment picks its input or output.
      if (current !== null && current.kind === NodeKind.Rpc && schemaPath === current.path) {
        if ((seg.name !== 'input' && seg.name !== 'output') || seg.keys.length > 0) {
          return notFound(`${instancePath}/${seg.name}`, "expected 'input' or 'output' below an rpc");
        }
        if (seg.name === 'output' && current.output === null) {
          return notFound(`${instancePath}/output`, 'rpc declares no output');
        }
        schemaPath += `/${seg.name}`;
        instancePath += `/${seg.name}`;
        continue;
      }
      if (current !== null && !hasChildren(current)) {
        return notFound(`${instancePath}/${seg.name}`, `${current.kind} "${current.name}" has no children`);
      }

      if (seg.prefix !== null && !this.moduleNames.includes(seg.prefix)) {
        return { ok: false, reason: 'unknown-module', detail: `unknown module "${seg.prefix}"` };
      }

      const node = this.index.get(`${schemaPath}/${seg.name}`);
      if (node === undefined || (seg.prefix !== null && node.module !== seg.prefix)) {
        return notFound(`${instancePath}/${seg.name}`, 'no such schema node');
      }

      if (seg.keys.length > 0) {
        const problem = checkPredicates(node, seg.keys);
        if (problem !== null) {
          return { ok: false, reason: 'invalid-predicate', detail: `${node.path}: ${problem}` };
        }
      }

      segments.push({ node, keys: seg.keys });
      schemaPath = node.path;
      instancePath += `/${node.name}${formatKeys(seg.keys)}`;
      current = node;
    }

    const target = segments[segments.length - 1];
    if (target === undefined || target.node.path !== schemaPath) {
      // The path ended on an rpc's input/output pseudo-segment.
      return notFound(instancePath, 'path does not end on a schema node');
    }
    return {
      ok: true,
      node: target.node,
      module: target.node.module,
      segments,
      instancePath,
    };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Every child of a node, RPC input and output included. */
export function childNodes(node: SchemaNode): ReadonlyArray<SchemaNode> {
  switch (node.kind) {
    case NodeKind.Container:
    case NodeKind.List:
    case NodeKind.Notification:
      return node.children;
    case NodeKind.Rpc:
      return [...node.input, ...(node.output ?? [])];
    case NodeKind.Leaf:
    case NodeKind.LeafList:
      return [];
  }
}

function hasChildren(node: SchemaNode): boolean {
  return node.kind !== NodeKind.Leaf && node.kind !== NodeKind.LeafList;
}

function notFound(path: string, detail: string): ResolveResult {
  return { ok: false, reason: 'unknown-node', detail: `${path}: ${detail}` };
}

/** @internal */
function checkPredicates(node: SchemaNode, keys: ReadonlyArray<KeyPredicate>): string | null {
  if (node.kind !== NodeKind.List) {
    return 'key predicates are only allowed on lists';
  }
  const seen = new Set<string>();
  for (const key of keys) {
    if (!node.keys.includes(key.name)) {
      return `"${key.name}" is not a key of this list`;
    }
    if (seen.has(key.name)) {
      return `key "${key.name}" given more than once`;
    }
    seen.add(key.name);
  }
  if (seen.size !== node.keys.length) {
    return `predicates must name every key (${node.keys.join(', ')})`;
  }
  return null;
}
