/**
 * Confgate Loader: Schema Artifact Loader
 *
 * Loading is a three-step process:
 * 1. Parse the JSON text (readSchemaFile only)
 * 2. Check the artifact's shape with zod
 * 3. Build the identity registry and constraint tree
 *
 * A failure at any step throws SchemaBuildError with every issue found at
 * that step. No tree is returned from a partially valid artifact.
 */

import { readFileSync } from 'node:fs';
import { SchemaBuildError, buildConstraintTree } from '@confgate/schema';
import type { ConstraintTree, SchemaArtifact } from '@confgate/schema';
import { schemaArtifactSchema } from './artifact-schema.js';
import { toLoadIssues } from './issues.js';

/**
 * Check an untrusted value against the artifact shape.
 *
 * @throws {SchemaBuildError} listing every shape issue
 */
export function parseSchemaArtifact(raw: unknown): SchemaArtifact {
  const result = schemaArtifactSchema.safeParse(raw);
  if (!result.success) {
    throw new SchemaBuildError(toLoadIssues(result.error.issues));
  }
  return result.data;
}

/**
 * Parse and build in one step.
 *
 * @throws {SchemaBuildError} on a shape or build issue
 */
export function loadSchemaArtifact(raw: unknown): ConstraintTree {
  return buildConstraintTree(parseSchemaArtifact(raw));
}

/**
 * Read a compiled artifact from disk and build its tree.
 *
 * File system errors (missing file, permissions) propagate unchanged.
 *
 * @throws {SchemaBuildError} if the file is not JSON or the artifact is invalid
 */
export function readSchemaFile(filePath: string): ConstraintTree {
  const text = readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SchemaBuildError([{ path: filePath, message: `invalid JSON: ${reason}` }]);
  }
  return loadSchemaArtifact(raw);
}
