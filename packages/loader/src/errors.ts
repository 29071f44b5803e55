/**
 * Confgate Loader: Error Types
 */

import type { LoadIssue } from './issues.js';

/**
 * Thrown when a policy document is malformed or names modules the schema
 * does not define. Every issue is collected before throwing.
 *
 * At startup this is fatal. During a reload the previous policy stays
 * active and the error reaches whoever asked for the reload.
 */
export class PolicyLoadError extends Error {
  readonly issues: ReadonlyArray<LoadIssue>;

  constructor(source: string, issues: ReadonlyArray<LoadIssue>) {
    const summary = issues.map((i) => `  ${i.path}: ${i.message}`).join('\n');
    super(`Policy ${source} rejected with ${issues.length} issue(s):\n${summary}`);
    this.name = 'PolicyLoadError';
    this.issues = issues;
  }
}
