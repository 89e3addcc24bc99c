import type {
  ConstraintRule,
  LayoutCatalog,
  SectionTemplate,
} from '../catalog/index.js';
import type { Entity } from '../ontology/types.js';
import { lookup } from '../util.js';
import type { Literal } from '../value/types.js';
import type { ConditionOperator, VisibilityRule } from './types.js';

/**
 * The layout entries that apply to one entity.
 */
export interface EntityLayout {
  template?: SectionTemplate[];
  constraints: ConstraintRule[];
}

export function entityLayout(
  entity: Pick<Entity, 'name'>,
  layouts: LayoutCatalog
): EntityLayout {
  return {
    template: lookup(layouts.templates, entity.name),
    constraints: lookup(layouts.constraints, entity.name) ?? [],
  };
}

/**
 * Fields whose value decides whether another field or section applies.
 * `status` is left out: it is never a form input.
 */
export function conditionFields(layout: EntityLayout): Set<string> {
  const fields = new Set<string>();
  for (const section of layout.template ?? []) {
    if (section.visible_when) {
      fields.add(section.visible_when.field);
    }
    if (section.required_when) {
      fields.add(section.required_when.field);
    }
  }
  for (const constraint of layout.constraints) {
    fields.add(constraint.field);
  }
  fields.delete('status');
  return fields;
}

/**
 * Fields some constraint makes required.
 */
export function conditionallyRequiredFields(layout: EntityLayout): Set<string> {
  const fields = new Set<string>();
  for (const constraint of layout.constraints) {
    for (const field of constraint.requires) {
      fields.add(field);
    }
  }
  return fields;
}

/**
 * Whether a constraint's condition holds when its field equals `value`.
 */
export function constraintMatches(
  constraint: ConstraintRule,
  value: string
): boolean {
  if (constraint.operator === 'in') {
    return constraint.values?.includes(value) ?? false;
  }
  return constraint.value === value;
}

export function toCondition(constraint: {
  field: string;
  operator: ConditionOperator;
  value?: Literal;
  values?: string[];
}): VisibilityRule {
  const condition: VisibilityRule = {
    field: constraint.field,
    operator: constraint.operator,
  };
  if (constraint.value !== undefined) {
    condition.value = constraint.value;
  }
  if (constraint.values && constraint.values.length > 0) {
    condition.values = [...constraint.values];
  }
  return condition;
}

/**
 * Condition value as it reads in a message: `section_8`, `true`, or
 * `asset, expense`.
 */
export function describeConditionValue(constraint: ConstraintRule): string {
  if (constraint.value !== undefined) {
    return String(constraint.value);
  }
  return constraint.values?.join(', ') ?? '';
}
