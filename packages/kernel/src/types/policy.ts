/**
 * Confgate Kernel: Policy Types
 *
 * Access-control policy is a set of grants, one per (module, principal
 * class), each naming the operations that class may perform on everything
 * the module owns. There are no deny rules: anything not granted is denied.
 */

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

/**
 * The operations a grant can permit. Each is independent: holding `write`
 * implies nothing about `read`, and `execute` (RPCs) implies neither.
 */
export enum Operation {
  Read = 'read',
  Write = 'write',
  Execute = 'execute',
}

// ---------------------------------------------------------------------------
// Policy entries
// ---------------------------------------------------------------------------

/** One configured grant, exactly as it appears in policy configuration. */
export interface PolicyEntry {
  readonly module_name: string;
  readonly principal_class: string;
  readonly operations: ReadonlyArray<Operation>;
}

// ---------------------------------------------------------------------------
// Branded Types
// ---------------------------------------------------------------------------

declare const __policyHashBrand: unique symbol;

/**
 * SHA-256 over the canonical JSON of a compiled policy's entries.
 *
 * Only compilePolicy() produces values of this type. Two policies that
 * grant the same operations hash identically, whatever their entry order.
 */
export type PolicyHash = string & {
  readonly [__policyHashBrand]: 'PolicyHash';
};

// ---------------------------------------------------------------------------
// Snapshots
// ---------------------------------------------------------------------------

/** Grant lookup: module name -> principal class -> permitted operations. */
export type GrantTable = ReadonlyMap<string, ReadonlyMap<string, ReadonlySet<Operation>>>;

/** The result of compiling policy entries, before it is versioned. */
export interface CompiledPolicy {
  /** Entries merged per (module, class) and sorted canonically. */
  readonly entries: ReadonlyArray<PolicyEntry>;
  readonly grants: GrantTable;
  readonly hash: PolicyHash;
}

/**
 * An immutable, versioned policy.
 *
 * A call captures the current snapshot after its module lock wait and
 * authorizes against that snapshot only. Reloading policy installs a new
 * snapshot and never mutates one already handed out.
 */
export interface PolicySnapshot extends CompiledPolicy {
  /** Starts at 1 and increases by one with every reload. */
  readonly version: number;
  readonly loaded_at: string;
}
