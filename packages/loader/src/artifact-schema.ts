/**
 * Confgate Loader: Artifact Shape
 *
 * zod schemas for the compiled schema artifact. They check shape only:
 * field presence, field types and discriminators. Semantic checks (unique
 * paths, valid patterns, defined identity bases) belong to the tree
 * builder, which runs on the parsed value.
 *
 * Objects are strict. A misspelt field is a shape error, not a silently
 * ignored one.
 */

import { z } from 'zod';
import type { NodeSpec, SchemaArtifact, TypeSpec } from '@confgate/schema';

const integerBound = z.union([z.number().int(), z.string().regex(/^-?[0-9]+$/, 'expected a decimal integer')]);
const count = z.number().int().nonnegative();

export const typeSpecSchema: z.ZodType<TypeSpec> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z
      .object({
        type: z.literal('string'),
        patterns: z.array(z.string()).optional(),
        length: z.object({ min: count.optional(), max: count.nullable().optional() }).strict().optional(),
      })
      .strict(),
    z
      .object({
        type: z.literal('numeric'),
        width: z.enum(['int8', 'int16', 'int32', 'int64', 'uint8', 'uint16', 'uint32', 'uint64']),
        min: integerBound.optional(),
        max: integerBound.optional(),
      })
      .strict(),
    z.object({ type: z.literal('enumeration'), tokens: z.array(z.string()) }).strict(),
    z.object({ type: z.literal('identityref'), base: z.string().min(1) }).strict(),
    z.object({ type: z.literal('boolean') }).strict(),
    z.object({ type: z.literal('union'), members: z.array(typeSpecSchema) }).strict(),
    z.object({ type: z.literal('opaque') }).strict(),
  ]),
);

const name = z.string().min(1);
const description = z.string().optional();
const scalar = z.union([z.string(), z.number(), z.boolean()]);

export const nodeSpecSchema: z.ZodType<NodeSpec> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z
      .object({
        kind: z.literal('leaf'),
        name,
        description,
        type: typeSpecSchema,
        mandatory: z.boolean().optional(),
        default: scalar.optional(),
        config: z.boolean().optional(),
      })
      .strict(),
    z
      .object({
        kind: z.literal('leaf-list'),
        name,
        description,
        type: typeSpecSchema,
        min_elements: count.optional(),
        max_elements: count.nullable().optional(),
        config: z.boolean().optional(),
      })
      .strict(),
    z
      .object({
        kind: z.literal('container'),
        name,
        description,
        children: z.array(nodeSpecSchema).optional(),
        mandatory: z.boolean().optional(),
        config: z.boolean().optional(),
      })
      .strict(),
    z
      .object({
        kind: z.literal('list'),
        name,
        description,
        keys: z.array(z.string()).optional(),
        children: z.array(nodeSpecSchema).optional(),
        min_elements: count.optional(),
        max_elements: count.nullable().optional(),
        config: z.boolean().optional(),
      })
      .strict(),
    z
      .object({
        kind: z.literal('rpc'),
        name,
        description,
        input: z.array(nodeSpecSchema).optional(),
        output: z.array(nodeSpecSchema).optional(),
      })
      .strict(),
    z
      .object({
        kind: z.literal('notification'),
        name,
        description,
        children: z.array(nodeSpecSchema).optional(),
      })
      .strict(),
  ]),
);

export const schemaArtifactSchema: z.ZodType<SchemaArtifact> = z
  .object({
    identities: z
      .array(
        z
          .object({
            name,
            module: z.string().optional(),
            bases: z.array(z.string()).optional(),
          })
          .strict(),
      )
      .optional(),
    modules: z.array(z.object({ name, nodes: z.array(nodeSpecSchema) }).strict()),
  })
  .strict();
