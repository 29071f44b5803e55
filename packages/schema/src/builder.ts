/**
 * Confgate Schema: Constraint Tree Builder
 *
 * Compiles a SchemaArtifact into an immutable ConstraintTree.
 *
 * Builder guarantees:
 * - Rejecting: any inconsistency (duplicate path, malformed pattern, dangling
 *   identity base, bad range, bad key, invalid default) fails the whole
 *   build. There is no partially built tree.
 * - Exhaustive reporting: every issue is collected before throwing.
 * - Frozen output: every node, child array and constraint is frozen.
 */

import { SchemaBuildError } from './errors.js';
import type { BuildIssue } from './errors.js';
import { IdentityRegistry } from './identity-registry.js';
import { checkScalar, parseInteger, WIDTH_BOUNDS } from './scalar.js';
import type { ModuleSpec, NodeSpec, SchemaArtifact, TypeSpec } from './spec-types.js';
import { ConstraintTree } from './tree.js';
import { NodeKind } from './types.js';
import type { CompiledPattern, LeafNode, SchemaNode, TypeConstraint } from './types.js';

/**
 * Build the identity registry and constraint tree from a compiled artifact.
 *
 * @throws {SchemaBuildError} if the identity graph or any node is invalid
 */
export function buildConstraintTree(artifact: SchemaArtifact): ConstraintTree {
  const identities = IdentityRegistry.build(artifact.identities ?? []);
  return buildTreeWithIdentities(artifact.modules, identities);
}

/**
 * Build a tree against an already-built identity registry.
 *
 * @throws {SchemaBuildError} on any node-level inconsistency
 */
export function buildTreeWithIdentities(
  modules: ReadonlyArray<ModuleSpec>,
  identities: IdentityRegistry,
): ConstraintTree {
  const ctx: BuildContext = { identities, issues: [], paths: new Set() };
  const moduleNames: string[] = [];
  const roots: SchemaNode[] = [];

  for (const mod of modules) {
    if (moduleNames.includes(mod.name)) {
      ctx.issues.push({ path: `module ${mod.name}`, message: 'duplicate module name' });
      continue;
    }
    moduleNames.push(mod.name);
    for (const spec of mod.nodes) {
      const node = compileNode(spec, mod.name, '', true, ctx);
      if (node !== null) roots.push(node);
    }
  }

  if (ctx.issues.length > 0) {
    throw new SchemaBuildError(ctx.issues);
  }
  return new ConstraintTree(Object.freeze(moduleNames), Object.freeze(roots), identities);
}

// ---------------------------------------------------------------------------
// Internal: node compilation
// ---------------------------------------------------------------------------

interface BuildContext {
  readonly identities: IdentityRegistry;
  readonly issues: BuildIssue[];
  /** Every schema path claimed so far, across all modules. */
  readonly paths: Set<string>;
}

/** @internal */
function compileNode(
  spec: NodeSpec,
  module: string,
  parentPath: string,
  topLevel: boolean,
  ctx: BuildContext,
): SchemaNode | null {
  const path = `${parentPath}/${spec.name}`;
  if (ctx.paths.has(path)) {
    ctx.issues.push({ path, message: 'duplicate schema path' });
    return null;
  }
  ctx.paths.add(path);

  const base = {
    name: spec.name,
    module,
    path,
    description: spec.description ?? null,
  };

  switch (spec.kind) {
    case 'leaf': {
      const type = compileType(spec.type, path, ctx);
      let defaultValue: LeafNode['default'] = null;
      if (spec.default !== undefined) {
        const check = checkScalar(type, spec.default, ctx.identities);
        if (check.ok) {
          defaultValue = check.value;
        } else {
          ctx.issues.push({ path, message: `invalid default: ${check.detail}` });
        }
      }
      if (spec.mandatory === true && spec.default !== undefined) {
        ctx.issues.push({ path, message: 'a mandatory leaf cannot declare a default' });
      }
      return Object.freeze({
        ...base,
        kind: NodeKind.Leaf,
        type,
        mandatory: spec.mandatory ?? false,
        default: defaultValue,
        config: spec.config ?? true,
      });
    }

    case 'leaf-list': {
      const type = compileType(spec.type, path, ctx);
      const bounds = compileElements(spec.min_elements, spec.max_elements, path, ctx);
      return Object.freeze({
        ...base,
        kind: NodeKind.LeafList,
        type,
        ...bounds,
        config: spec.config ?? true,
      });
    }

    case 'container': {
      const children = compileChildren(spec.children ?? [], module, path, ctx);
      return Object.freeze({
        ...base,
        kind: NodeKind.Container,
        children,
        mandatory: spec.mandatory ?? false,
        config: spec.config ?? true,
      });
    }

    case 'list': {
      const children = compileChildren(spec.children ?? [], module, path, ctx);
      const keys = spec.keys ?? [];
      const config = spec.config ?? true;
      checkListKeys(keys, children, config, path, ctx);
      const bounds = compileElements(spec.min_elements, spec.max_elements, path, ctx);
      return Object.freeze({
        ...base,
        kind: NodeKind.List,
        children,
        keys: Object.freeze([...keys]),
        ...bounds,
        config,
      });
    }

    case 'rpc': {
      if (!topLevel) {
        ctx.issues.push({ path, message: 'rpc must be declared at the top level of a module' });
      }
      const input = compileChildren(spec.input ?? [], module, `${path}/input`, ctx);
      const output =
        spec.output === undefined ? null : compileChildren(spec.output, module, `${path}/output`, ctx);
      return Object.freeze({ ...base, kind: NodeKind.Rpc, input, output });
    }

    case 'notification': {
      if (!topLevel) {
        ctx.issues.push({ path, message: 'notification must be declared at the top level of a module' });
      }
      const children = compileChildren(spec.children ?? [], module, path, ctx);
      return Object.freeze({ ...base, kind: NodeKind.Notification, children });
    }
  }
}

function compileChildren(
  specs: ReadonlyArray<NodeSpec>,
  module: string,
  parentPath: string,
  ctx: BuildContext,
): ReadonlyArray<SchemaNode> {
  const out: SchemaNode[] = [];
  for (const spec of specs) {
    const child = compileNode(spec, module, parentPath, false, ctx);
    if (child !== null) out.push(child);
  }
  return Object.freeze(out);
}

function compileElements(
  min: number | undefined,
  max: number | null | undefined,
  path: string,
  ctx: BuildContext,
): { readonly min_elements: number; readonly max_elements: number | null } {
  const minElements = min ?? 0;
  const maxElements = max ?? null;
  if (!Number.isInteger(minElements) || minElements < 0) {
    ctx.issues.push({ path, message: 'min_elements must be a non-negative integer' });
  }
  if (maxElements !== null && (!Number.isInteger(maxElements) || maxElements < 1)) {
    ctx.issues.push({ path, message: 'max_elements must be a positive integer' });
  }
  if (maxElements !== null && minElements > maxElements) {
    ctx.issues.push({ path, message: `min_elements ${minElements} exceeds max_elements ${maxElements}` });
  }
  return { min_elements: minElements, max_elements: maxElements };
}

function checkListKeys(
  keys: ReadonlyArray<string>,
  children: ReadonlyArray<SchemaNode>,
  config: boolean,
  path: string,
  ctx: BuildContext,
): void {
  if (keys.length === 0 && config) {
    ctx.issues.push({ path, message: 'a config list must declare at least one key' });
  }
  const seen = new Set<string>();
  for (const key of keys) {
    if (seen.has(key)) {
      ctx.issues.push({ path, message: `key "${key}" declared more than once` });
      continue;
    }
    seen.add(key);
    const child = children.find((c) => c.name === key);
    if (child === undefined || child.kind !== NodeKind.Leaf) {
      ctx.issues.push({ path, message: `key "${key}" does not name a leaf child` });
    }
  }
}

// ---------------------------------------------------------------------------
// Internal: type compilation
// ---------------------------------------------------------------------------

/** @internal */
function compileType(spec: TypeSpec, path: string, ctx: BuildContext): TypeConstraint {
  switch (spec.type) {
    case 'string': {
      const patterns: CompiledPattern[] = [];
      for (const source of spec.patterns ?? []) {
        try {
          patterns.push(Object.freeze({ source, regex: new RegExp(`^(?:${source})$`, 'u') }));
        } catch (err: unknown) {
          const reason = err instanceof Error ? err.message : String(err);
          ctx.issues.push({ path, message: `malformed pattern "${source}": ${reason}` });
        }
      }
      let length: { min: number; max: number | null } | null = null;
      if (spec.length !== undefined) {
        length = { min: spec.length.min ?? 0, max: spec.length.max ?? null };
        if (!Number.isInteger(length.min) || length.min < 0) {
          ctx.issues.push({ path, message: 'length minimum must be a non-negative integer' });
        }
        if (length.max !== null && (!Number.isInteger(length.max) || length.max < length.min)) {
          ctx.issues.push({ path, message: 'length maximum must be an integer no less than the minimum' });
        }
      }
      // A string that declares nothing to check is unconstrained.
      if ((spec.patterns ?? []).length === 0 && length === null) {
        return Object.freeze({ kind: 'opaque' });
      }
      return Object.freeze({
        kind: 'string',
        patterns: Object.freeze(patterns),
        length: length === null ? null : Object.freeze(length),
      });
    }

    case 'numeric': {
      const bounds = WIDTH_BOUNDS[spec.width];
      const min = spec.min === undefined ? bounds.min : parseInteger(spec.min);
      const max = spec.max === undefined ? bounds.max : parseInteger(spec.max);
      if (min === null || max === null) {
        ctx.issues.push({ path, message: 'numeric bounds must be integers' });
        return Object.freeze({ kind: 'numeric', width: spec.width, min: bounds.min, max: bounds.max });
      }
      if (min < bounds.min || max > bounds.max) {
        ctx.issues.push({
          path,
          message: `range ${min}..${max} exceeds ${spec.width} bounds ${bounds.min}..${bounds.max}`,
        });
      }
      if (min > max) {
        ctx.issues.push({ path, message: `range minimum ${min} exceeds maximum ${max}` });
      }
      return Object.freeze({ kind: 'numeric', width: spec.width, min, max });
    }

    case 'enumeration': {
      if (spec.tokens.length === 0) {
        ctx.issues.push({ path, message: 'enumeration declares no tokens' });
      }
      const unique = new Set(spec.tokens);
      if (unique.size !== spec.tokens.length) {
        ctx.issues.push({ path, message: 'enumeration declares a token more than once' });
      }
      return Object.freeze({ kind: 'enumeration', tokens: Object.freeze([...unique]) });
    }

    case 'identityref': {
      if (!ctx.identities.has(spec.base)) {
        ctx.issues.push({ path, message: `identityref base "${spec.base}" is not a defined identity` });
      }
      return Object.freeze({ kind: 'identityref', base: spec.base });
    }

    case 'boolean':
      return Object.freeze({ kind: 'boolean' });

    case 'union': {
      if (spec.members.length === 0) {
        ctx.issues.push({ path, message: 'union declares no members' });
      }
      const members = spec.members.map((m) => compileType(m, path, ctx));
      return Object.freeze({ kind: 'union', members: Object.freeze(members) });
    }

    case 'opaque':
      return Object.freeze({ kind: 'opaque' });
  }
}
