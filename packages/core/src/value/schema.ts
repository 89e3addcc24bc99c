import { z } from 'zod';
import type { Expression, ValueTree } from './types.js';

const literalSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const annotationsSchema = z
  .object({
    display: z.boolean().optional(),
    text: z.boolean().optional(),
    immutable: z.boolean().optional(),
    computed: z.boolean().optional(),
    sensitive: z.boolean().optional(),
    pii: z.boolean().optional(),
    deprecated: z
      .object({
        reason: z.string().optional(),
        since: z.string().optional(),
      })
      .optional(),
  })
  .strict();

const expressionSchema: z.ZodType<Expression, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion('op', [
    z.object({ op: z.literal('literal') }),
    z.object({ op: z.literal('and'), args: z.array(valueTreeSchema) }),
    z.object({ op: z.literal('or'), args: z.array(valueTreeSchema) }),
    z.object({
      op: z.literal('bound'),
      comparator: z.enum(['>=', '>', '<=', '<']),
      limit: z.number().finite(),
    }),
    z.object({ op: z.literal('match'), pattern: z.string() }),
  ])
);

/**
 * Schema for a serialized value tree. `expression` may be omitted for leaf
 * nodes and defaults to a literal.
 */
export const valueTreeSchema: z.ZodType<ValueTree, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      kind: z.enum([
        'string',
        'int',
        'float',
        'number',
        'bool',
        'time',
        'struct',
        'list',
        'top',
        'bottom',
      ]),
      expression: expressionSchema.default({ op: 'literal' }),
      value: literalSchema.optional(),
      reference: z.string().min(1).optional(),
      default: literalSchema.optional(),
      element: valueTreeSchema.optional(),
      bounds: z
        .object({
          lower: z.number().finite().optional(),
          upper: z.number().finite().optional(),
        })
        .strict()
        .optional(),
      pattern: z.string().optional(),
      annotations: annotationsSchema.optional(),
    })
    .strict()
);
