import { z } from 'zod';
import { lookup } from '../util.js';
import { valueTreeSchema } from '../value/schema.js';
import type { Cardinality } from './types.js';

const CARDINALITY_ALIASES: Record<string, Cardinality> = {
  o2o: 'one-to-one',
  o2m: 'one-to-many',
  m2o: 'many-to-one',
  m2m: 'many-to-many',
  'one-to-one': 'one-to-one',
  'one-to-many': 'one-to-many',
  'many-to-one': 'many-to-one',
  'many-to-many': 'many-to-many',
};

const cardinalitySchema = z.string().transform((raw, ctx): Cardinality => {
  const cardinality = lookup(
    CARDINALITY_ALIASES,
    raw.toLowerCase().replace(/_/g, '-')
  );
  if (!cardinality) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unknown cardinality "${raw}"`,
    });
    return z.NEVER;
  }
  return cardinality;
});

const fieldSchema = z.object({
  name: z.string().min(1),
  optional: z.boolean().default(false),
  value: valueTreeSchema,
});

const entitySchema = z.object({
  fields: z.array(fieldSchema).default([]),
});

const relationshipSchema = z.object({
  edge_name: z.string().min(1),
  from: z.string().min(1),
  to: z.string().min(1),
  cardinality: cardinalitySchema,
  inverse_name: z.string().optional(),
  required: z.boolean().default(false),
});

const operationSchema = z.object({
  name: z.string().min(1),
  entity: z.string().min(1),
  type: z.enum(['create', 'get', 'list', 'update', 'delete', 'transition']),
  entity_path: z.string().default(''),
  action: z.string().optional(),
  to_status: z.string().optional(),
  extra_fields: z.array(z.string()).default([]),
  custom: z.boolean().default(false),
});

const serviceSchema = z.object({
  name: z.string().min(1),
  base_path: z.string().default(''),
  entities: z.array(z.string()).default([]),
  operations: z.array(operationSchema).default([]),
});

const enumOverrideSchema = z.object({
  values: z.array(z.object({ value: z.string(), label: z.string() })).default([]),
  groups: z
    .array(z.object({ label: z.string(), values: z.array(z.string()) }))
    .optional(),
});

const entityOverrideSchema = z.object({
  display_name: z.string().optional(),
  display_name_plural: z.string().optional(),
  primary_display_template: z.string().optional(),
});

/**
 * The structural contract of an ontology document. Anything that fails this
 * schema is a load error; everything past it is classified without raising.
 */
export const ontologyDocumentSchema = z.object({
  definitions: z.record(valueTreeSchema).default({}),
  entities: z.record(entitySchema),
  relationships: z.array(relationshipSchema).default([]),
  state_machines: z.record(z.record(z.array(z.string()))).default({}),
  services: z.array(serviceSchema).default([]),
  overrides: z
    .object({
      entities: z.record(entityOverrideSchema).default({}),
      enums: z.record(enumOverrideSchema).default({}),
    })
    .default({}),
});

export type OntologyDocument = z.infer<typeof ontologyDocumentSchema>;
export type OntologyDocumentInput = z.input<typeof ontologyDocumentSchema>;
