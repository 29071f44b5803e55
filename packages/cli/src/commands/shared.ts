/**
 * Confgate CLI: Shared Command Helpers
 *
 * Failures print to stderr with the `[confgate]` prefix and set a non-zero
 * exit code. Commands never throw past their action handler.
 */

import { SchemaBuildError } from '@confgate/schema';
import type { ConstraintTree } from '@confgate/schema';
import { PolicyLoadError, readPolicyFile, readSchemaFile } from '@confgate/loader';
import type { PolicyEntry } from '@confgate/kernel';
import { formatIssues } from '../output/format.js';

export function fail(message: string): void {
  // eslint-disable-next-line no-console
  console.error(`[confgate] ${message}`);
  process.exitCode = 1;
}

export function print(text: string): void {
  // eslint-disable-next-line no-console
  console.log(text);
}

/** Build a tree, reporting every build issue. Null on failure. */
export function loadTree(schemaPath: string): ConstraintTree | null {
  try {
    return readSchemaFile(schemaPath);
  } catch (err: unknown) {
    if (err instanceof SchemaBuildError) {
      fail(`Schema ${schemaPath} rejected with ${err.issues.length} issue(s):\n${formatIssues(err.issues)}`);
      return null;
    }
    fail(`Cannot read ${schemaPath}: ${errorMessage(err)}`);
    return null;
  }
}

/** Read a policy file, optionally cross-checked against a tree. Null on failure. */
export function loadPolicy(policyPath: string, tree?: ConstraintTree): PolicyEntry[] | null {
  try {
    return readPolicyFile(policyPath, tree);
  } catch (err: unknown) {
    if (err instanceof PolicyLoadError) {
      fail(`Policy ${policyPath} rejected with ${err.issues.length} issue(s):\n${formatIssues(err.issues)}`);
      return null;
    }
    fail(`Cannot read ${policyPath}: ${errorMessage(err)}`);
    return null;
  }
}

/** Parse a JSON command-line argument. `{ ok: false }` (after reporting) on failure. */
export function parseJsonArg(label: string, text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err: unknown) {
    fail(`${label} is not valid JSON: ${errorMessage(err)}`);
    return { ok: false };
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
