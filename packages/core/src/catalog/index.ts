/**
 * Bundled editorial catalogs.
 *
 * Everything here encodes product judgment that cannot be derived from the
 * ontology's type structure: which structured types exist, how identifiers
 * read as labels, how entities lay out their forms. Each catalog is a JSON
 * file validated on load; a lookup that misses falls back to a generic
 * derivation.
 */

import { z } from 'zod';
import type { ValueTypeCatalog } from '../classify/types.js';
import { formatIssues, LoadError } from '../errors.js';
import labelsJson from './labels.json';
import layoutsJson from './layouts.json';
import transitionLabelsJson from './transition-labels.json';
import valueTypesJson from './value-types.json';

// ============================================
// VALUE TYPES
// ============================================

export const valueTypeCatalogSchema = z.object({
  valueTypes: z.record(z.string()),
  moneyTypes: z.record(z.enum(['any', 'non_negative', 'positive'])),
});

// ============================================
// LAYOUTS
// ============================================

const conditionSchema = z.object({
  field: z.string().min(1),
  operator: z.enum(['eq', 'in', 'truthy']),
  value: z.union([z.string(), z.number(), z.boolean()]).optional(),
  values: z.array(z.string()).optional(),
});

const sectionTemplateSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  collapsible: z.boolean().default(false),
  initially_collapsed: z.boolean().optional(),
  fields: z.array(z.string()).optional(),
  embedded_object: z.string().optional(),
  embedded_array: z.string().optional(),
  visible_when: conditionSchema.optional(),
  required_when: conditionSchema.optional(),
});

const constraintSchema = z.object({
  field: z.string().min(1),
  operator: z.enum(['eq', 'in']),
  value: z.union([z.string(), z.number(), z.boolean()]).optional(),
  values: z.array(z.string()).optional(),
  requires: z.array(z.string()).min(1),
});

/**
 * Per-entity form templates and conditional constraints, keyed by the
 * entity's declared (PascalCase) name.
 */
export const layoutCatalogSchema = z.object({
  templates: z.record(z.array(sectionTemplateSchema)).default({}),
  constraints: z.record(z.array(constraintSchema)).default({}),
});

export type SectionTemplate = z.infer<typeof sectionTemplateSchema>;
export type ConstraintRule = z.infer<typeof constraintSchema>;
export type LayoutCatalog = z.infer<typeof layoutCatalogSchema>;

// ============================================
// LABELS
// ============================================

const labelVocabularySchema = z.object({
  abbreviations: z.record(z.string()),
  phrases: z.record(z.string()),
});

const transitionLabelSchema = z.object({
  labels: z.record(z.string()),
  fromState: z
    .record(
      z.array(z.object({ from: z.array(z.string()), label: z.string() }))
    )
    .default({}),
});

export type LabelVocabulary = z.infer<typeof labelVocabularySchema>;
export type TransitionLabels = z.infer<typeof transitionLabelSchema>;

// ============================================
// BUNDLED DEFAULTS
// ============================================

export const DEFAULT_VALUE_TYPES: ValueTypeCatalog =
  valueTypeCatalogSchema.parse(valueTypesJson);

export const DEFAULT_LAYOUTS: LayoutCatalog =
  layoutCatalogSchema.parse(layoutsJson);

export const LABEL_VOCABULARY: LabelVocabulary =
  labelVocabularySchema.parse(labelsJson);

export const TRANSITION_LABELS: TransitionLabels =
  transitionLabelSchema.parse(transitionLabelsJson);

/**
 * Validate a user-supplied layout catalog (the CLI's `--layouts` file).
 */
export function parseLayoutCatalog(raw: unknown): LayoutCatalog {
  const result = layoutCatalogSchema.safeParse(raw);
  if (!result.success) {
    throw new LoadError(
      `Invalid layout catalog:\n${formatIssues(result.error)}`,
      { cause: result.error }
    );
  }
  return result.data;
}

export function parseValueTypeCatalog(raw: unknown): ValueTypeCatalog {
  const result = valueTypeCatalogSchema.safeParse(raw);
  if (!result.success) {
    throw new LoadError(
      `Invalid value type catalog:\n${formatIssues(result.error)}`,
      { cause: result.error }
    );
  }
  return result.data;
}
