/**
 * Confgate Schema: Error Types
 *
 * Build-time errors are fatal. A process that cannot build a consistent
 * constraint tree or identity registry must refuse to start; these errors are
 * thrown, never converted into a degraded schema.
 */

/** One problem found while building the tree or the identity registry. */
export interface BuildIssue {
  /** Schema path, identity name or artifact location the issue refers to. */
  readonly path: string;
  readonly message: string;
}

/**
 * Thrown when a compiled schema artifact is inconsistent.
 *
 * Builders collect every issue they find before throwing, so an operator
 * sees the full list in one run.
 */
export class SchemaBuildError extends Error {
  readonly issues: ReadonlyArray<BuildIssue>;

  constructor(issues: ReadonlyArray<BuildIssue>) {
    const summary = issues.map((i) => `  ${i.path}: ${i.message}`).join('\n');
    super(`Schema build failed with ${issues.length} issue(s):\n${summary}`);
    this.name = 'SchemaBuildError';
    this.issues = issues;
  }
}

/** Thrown by parsePath() on text that is not a well-formed data path. */
export class PathSyntaxError extends Error {
  constructor(
    readonly source: string,
    readonly offset: number,
    detail: string,
  ) {
    super(`Malformed path ${JSON.stringify(source)} at offset ${offset}: ${detail}`);
    this.name = 'PathSyntaxError';
  }
}
