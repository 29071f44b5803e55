/**
 * Confgate Loader: Policy Loader
 *
 * Parses access-control policy documents. Two shapes are accepted:
 *
 *   { "entries": [ { "module_name", "principal_class", "operations" } ] }
 *   [ { "module_name", "principal_class", "operations" } ]
 *
 * When a tree is supplied, entries naming a module it does not define are
 * rejected.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { Operation } from '@confgate/kernel';
import type { PolicyEntry } from '@confgate/kernel';
import type { ConstraintTree } from '@confgate/schema';
import { PolicyLoadError } from './errors.js';
import { formatIssuePath, toLoadIssues } from './issues.js';
import type { LoadIssue } from './issues.js';

const policyEntrySchema = z
  .object({
    module_name: z.string().min(1),
    principal_class: z.string().min(1),
    operations: z.array(z.nativeEnum(Operation)),
  })
  .strict();

const entryListSchema = z.array(policyEntrySchema);
const policyDocumentSchema = z.object({ entries: entryListSchema }).strict();

/**
 * Parse an untrusted policy document.
 *
 * @param source - Name used in the error message (a file path, or `document`)
 * @throws {PolicyLoadError} listing every issue
 */
export function parsePolicyDocument(
  raw: unknown,
  tree?: ConstraintTree,
  source = 'document',
): PolicyEntry[] {
  const bare = Array.isArray(raw);
  const result = bare ? entryListSchema.safeParse(raw) : policyDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new PolicyLoadError(source, toLoadIssues(result.error.issues));
  }
  const entries = Array.isArray(result.data) ? result.data : result.data.entries;

  if (tree !== undefined) {
    const issues: LoadIssue[] = [];
    for (const [i, entry] of entries.entries()) {
      if (!tree.hasModule(entry.module_name)) {
        const path = bare ? [i, 'module_name'] : ['entries', i, 'module_name'];
        issues.push({ path: formatIssuePath(path), message: `unknown module "${entry.module_name}"` });
      }
    }
    if (issues.length > 0) {
      throw new PolicyLoadError(source, issues);
    }
  }
  return entries;
}

/**
 * Read a policy document from disk.
 *
 * File system errors propagate unchanged.
 *
 * @throws {PolicyLoadError} if the file is not JSON or the document is invalid
 */
export function readPolicyFile(filePath: string, tree?: ConstraintTree): PolicyEntry[] {
  const text = readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PolicyLoadError(filePath, [{ path: '(root)', message: `invalid JSON: ${reason}` }]);
  }
  return parsePolicyDocument(raw, tree, filePath);
}
