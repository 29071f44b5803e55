/**
 * Confgate Loader: Issue Formatting
 *
 * Turns zod issues into the `{ path, message }` pairs carried by
 * SchemaBuildError and PolicyLoadError. Paths use property-access notation
 * (`modules[0].nodes[2].kind`); an issue at the document root is `(root)`.
 */

import type { ZodIssue } from 'zod';

export interface LoadIssue {
  readonly path: string;
  readonly message: string;
}

export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  let out = '';
  for (const segment of path) {
    out += typeof segment === 'number' ? `[${segment}]` : out === '' ? segment : `.${segment}`;
  }
  return out === '' ? '(root)' : out;
}

export function toLoadIssues(issues: ReadonlyArray<ZodIssue>): LoadIssue[] {
  return issues.map((issue) => ({ path: formatIssuePath(issue.path), message: issue.message }));
}
