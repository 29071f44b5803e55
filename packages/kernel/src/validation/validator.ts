/**
 * Confgate Kernel: Validator
 *
 * Checks an untrusted JSON value against a schema node and produces its
 * normalized form.
 *
 * Validation contract:
 * - Pure and reentrant: reads only the frozen tree, performs no I/O and
 *   never suspends.
 * - Deterministic: the reported failure is the first one in traversal
 *   order. Within an object, unknown members are reported before anything
 *   else, in payload key order; then children are visited in schema order.
 * - Idempotent: validating an accepted value's normalized form yields the
 *   same outcome again.
 *
 * Patterns are matched against the whole value. A value that merely
 * contains a matching substring is rejected.
 */

import { NodeKind, checkScalar, describeValue, formatKeys } from '@confgate/schema';
import type {
  ConstraintTree,
  KeyPredicate,
  LeafListNode,
  LeafNode,
  ListNode,
  NormalizedValue,
  RpcNode,
  ScalarValue,
  SchemaNode,
} from '@confgate/schema';
import type {
  ValidateOptions,
  ValidationFailure,
  ValidationFailureKind,
  ValidationOutcome,
} from '../types/validation.js';

type Step = { readonly ok: true; readonly value: NormalizedValue } | ValidationFailure;

interface Walk {
  readonly partial: boolean;
  readonly configOnly: boolean;
  readonly unconstrained: string[];
}

/**
 * Validates payloads against a compiled ConstraintTree.
 *
 * Holds only a reference to the tree; one instance can serve every session.
 */
export class Validator {
  constructor(private readonly tree: ConstraintTree) {}

  /**
   * Validate `value` against `node`.
   *
   * For an RPC node the value is the RPC input; for a notification it is
   * the notification content. Leaves, leaf-lists, containers and lists take
   * the value the node holds (a list takes the array of its entries).
   */
  validate(node: SchemaNode, value: unknown, options: ValidateOptions = {}): ValidationOutcome {
    const walk = this.walk(options);
    const path = options.path ?? node.path;
    const step =
      node.kind === NodeKind.Rpc
        ? this.members(node.input, value, `${path}/input`, walk)
        : this.node(node, value, path, walk);
    return this.finish(step, walk);
  }

  /**
   * Validate a single list entry, as written to `list[key='v']`.
   *
   * `options.path` should carry the entry's predicates; without it the
   * entry path is derived from the key values in the payload.
   */
  validateEntry(list: ListNode, value: unknown, options: ValidateOptions = {}): ValidationOutcome {
    const walk = this.walk(options);
    if (walk.configOnly && !list.config) {
      return readOnly(options.path ?? list.path);
    }
    const step = this.entry(list, value, options.path ?? list.path, 0, options.path !== undefined, walk);
    return this.finish(step, walk);
  }

  /**
   * Validate an RPC's output payload. An RPC without declared output
   * accepts only an absent payload.
   */
  validateOutput(rpc: RpcNode, value: unknown, options: ValidateOptions = {}): ValidationOutcome {
    const walk = this.walk(options);
    const path = `${options.path ?? rpc.path}/output`;
    if (rpc.output === null) {
      if (value === undefined || value === null) {
        return { ok: true, value: {}, unconstrained: [] };
      }
      return fail('unknown-node', path, 'rpc declares no output');
    }
    return this.finish(this.members(rpc.output, value ?? {}, path, walk), walk);
  }

  /**
   * Check one scalar against a leaf's type. Used for list-key predicate
   * values, which arrive as strings.
   */
  checkLeafValue(leaf: LeafNode, raw: unknown, path: string): ValidationOutcome {
    const check = checkScalar(leaf.type, raw, this.tree.identities);
    if (!check.ok) return fail(check.kind, path, check.detail);
    return { ok: true, value: check.value, unconstrained: check.unconstrained ? [path] : [] };
  }

  // -------------------------------------------------------------------------
  // Internal traversal
  // -------------------------------------------------------------------------

  private walk(options: ValidateOptions): Walk {
    return {
      partial: options.partial ?? false,
      configOnly: options.configOnly ?? false,
      unconstrained: [],
    };
  }

  private finish(step: Step, walk: Walk): ValidationOutcome {
    if (!step.ok) return step;
    return { ok: true, value: step.value, unconstrained: walk.unconstrained };
  }

  private node(node: SchemaNode, raw: unknown, path: string, walk: Walk): Step {
    switch (node.kind) {
      case NodeKind.Leaf:
        if (walk.configOnly && !node.config) return readOnly(path);
        return this.scalar(node, raw, path, walk);

      case NodeKind.LeafList:
        if (walk.configOnly && !node.config) return readOnly(path);
        return this.leafList(node, raw, path, walk);

      case NodeKind.Container:
        if (walk.configOnly && !node.config) return readOnly(path);
        return this.members(node.children, raw, path, walk);

      case NodeKind.List:
        if (walk.configOnly && !node.config) return readOnly(path);
        return this.list(node, raw, path, walk);

      case NodeKind.Notification:
        return this.members(node.children, raw, path, walk);

      case NodeKind.Rpc:
        // RPCs are only ever top-level; a nested one is a build error.
        return fail('unknown-node', path, 'an rpc cannot be nested as data');
    }
  }

  private scalar(node: LeafNode | LeafListNode, raw: unknown, path: string, walk: Walk): Step {
    const check = checkScalar(node.type, raw, this.tree.identities);
    if (!check.ok) return fail(check.kind, path, check.detail);
    if (check.unconstrained) walk.unconstrained.push(path);
    return { ok: true, value: check.value };
  }

  private leafList(node: LeafListNode, raw: unknown, path: string, walk: Walk): Step {
    if (!Array.isArray(raw)) {
      return fail('type-mismatch', path, `expected an array, got ${describeValue(raw)}`);
    }
    const bounds = checkCardinality(node.min_elements, node.max_elements, raw.length, path);
    if (bounds !== null) return bounds;

    const out: ScalarValue[] = [];
    const seen = new Set<string>();
    for (const [i, item] of raw.entries()) {
      const check = checkScalar(node.type, item, this.tree.identities);
      if (!check.ok) return fail(check.kind, path, `element ${i}: ${check.detail}`);
      const identity = scalarKey(check.value);
      if (seen.has(identity)) {
        return fail('duplicate-key', path, `duplicate value ${JSON.stringify(check.value)}`);
      }
      seen.add(identity);
      if (check.unconstrained && !walk.unconstrained.includes(path)) walk.unconstrained.push(path);
      out.push(check.value);
    }
    return { ok: true, value: out };
  }

  private list(node: ListNode, raw: unknown, path: string, walk: Walk): Step {
    if (!Array.isArray(raw)) {
      return fail('type-mismatch', path, `expected an array of entries, got ${describeValue(raw)}`);
    }
    const bounds = checkCardinality(node.min_elements, node.max_elements, raw.length, path);
    if (bounds !== null) return bounds;

    const out: NormalizedValue[] = [];
    const seen = new Set<string>();
    for (const [i, item] of raw.entries()) {
      const step = this.entry(node, item, path, i, false, walk);
      if (!step.ok) return step;
      if (node.keys.length > 0 && isRecord(step.value)) {
        const tuple = keyTuple(node, step.value);
        if (seen.has(tuple)) {
          return fail('duplicate-key', entryPath(node, path, step.value), `duplicate entry for key ${tuple}`);
        }
        seen.add(tuple);
      }
      out.push(step.value);
    }
    return { ok: true, value: out };
  }

  /**
   * One list entry. Keys are checked before any member, since they are
   * what identifies the entry in every later path.
   */
  private entry(
    node: ListNode,
    raw: unknown,
    listPath: string,
    index: number,
    pathHasKeys: boolean,
    walk: Walk,
  ): Step {
    if (!isRecord(raw)) {
      return fail('type-mismatch', listPath, `entry ${index}: expected an object, got ${describeValue(raw)}`);
    }
    for (const key of node.keys) {
      if (member(raw, key) === undefined) {
        return fail('missing-key', listPath, `entry ${index} is missing key "${key}"`);
      }
    }
    const path = pathHasKeys ? listPath : entryPath(node, listPath, raw);
    return this.members(node.children, raw, path, walk);
  }

  private members(
    children: ReadonlyArray<SchemaNode>,
    raw: unknown,
    path: string,
    walk: Walk,
  ): Step {
    if (!isRecord(raw)) {
      return fail('type-mismatch', path, `expected an object, got ${describeValue(raw)}`);
    }

    for (const member of Object.keys(raw)) {
      if (!children.some((c) => c.name === member)) {
        return fail('unknown-node', `${path}/${member}`, 'no such schema node');
      }
    }

    const out: Record<string, NormalizedValue> = {};
    for (const child of children) {
      const childPath = `${path}/${child.name}`;
      const value = member(raw, child.name);
      if (value !== undefined) {
        const step = this.node(child, value, childPath, walk);
        if (!step.ok) return step;
        out[child.name] = step.value;
        continue;
      }
      if (walk.partial) continue;

      const missing = checkAbsent(child, childPath);
      if (missing !== null) return missing;
      if (child.kind === NodeKind.Leaf && child.default !== null && !(walk.configOnly && !child.config)) {
        out[child.name] = child.default;
      }
    }
    return { ok: true, value: out };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function fail(kind: ValidationFailureKind, path: string, detail: string): ValidationFailure {
  return { ok: false, kind, path, detail };
}

function readOnly(path: string): ValidationFailure {
  return fail('read-only-node', path, 'node is state data and cannot be written');
}

function isRecord(raw: unknown): raw is Readonly<Record<string, unknown>> {
  return typeof raw === 'object' && raw !== null && !Array.isArray(raw);
}

/** Own properties only: `constructor` or `toString` in a payload must be data. */
export function member(record: Readonly<Record<string, unknown>>, name: string): unknown {
  return Object.hasOwn(record, name) ? record[name] : undefined;
}

function checkAbsent(child: SchemaNode, path: string): ValidationFailure | null {
  switch (child.kind) {
    case NodeKind.Leaf:
      return child.mandatory ? fail('missing-mandatory', path, 'mandatory leaf is missing') : null;
    case NodeKind.Container:
      return child.mandatory ? fail('missing-mandatory', path, 'mandatory container is missing') : null;
    case NodeKind.List:
    case NodeKind.LeafList:
      return child.min_elements > 0
        ? fail('cardinality', path, `expected at least ${child.min_elements} entries, got 0`)
        : null;
    case NodeKind.Rpc:
    case NodeKind.Notification:
      return null;
  }
}

function checkCardinality(
  min: number,
  max: number | null,
  count: number,
  path: string,
): ValidationFailure | null {
  if (count < min) {
    return fail('cardinality', path, `expected at least ${min} entries, got ${count}`);
  }
  if (max !== null && count > max) {
    return fail('cardinality', path, `expected at most ${max} entries, got ${count}`);
  }
  return null;
}

/** Distinguishes `1` from `"1"` and `true` from `"true"`. */
function scalarKey(value: ScalarValue): string {
  return `${typeof value}:${String(value)}`;
}

function keyTuple(node: ListNode, entry: Readonly<Record<string, unknown>>): string {
  return node.keys.map((k) => `${k}=${JSON.stringify(member(entry, k))}`).join(',');
}

function entryPath(node: ListNode, listPath: string, entry: Readonly<Record<string, unknown>>): string {
  const keys: KeyPredicate[] = node.keys.map((k) => ({ name: k, value: keyText(member(entry, k)) }));
  return `${listPath}${formatKeys(keys)}`;
}

function keyText(value: unknown): string {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
    ? String(value)
    : JSON.stringify(value);
}
