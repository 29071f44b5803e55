/**
 * @confgate/loader
 *
 * Turns untrusted JSON into a constraint tree and policy entries. Shapes are
 * checked with zod; semantic checks run in the schema and kernel builders.
 */

export { parseSchemaArtifact, loadSchemaArtifact, readSchemaFile } from './artifact-loader.js';
export { nodeSpecSchema, schemaArtifactSchema, typeSpecSchema } from './artifact-schema.js';
export { parsePolicyDocument, readPolicyFile } from './policy-loader.js';
export { PolicyLoadError } from './errors.js';
export type { LoadIssue } from './issues.js';
export { formatIssuePath } from './issues.js';
