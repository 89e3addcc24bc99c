import { fieldLabel, toSnake } from '../naming.js';
import type { Entity } from '../ontology/types.js';
import {
  describeConditionValue,
  toCondition,
  type EntityLayout,
} from './constraints.js';
import type {
  CrossFieldRule,
  FieldDescriptor,
  FieldRule,
  ValidationSchema,
} from './types.js';

const MONEY_MINIMUM = { non_negative: 0, positive: 1 } as const;

function fieldRules(field: FieldDescriptor): FieldRule[] {
  const rules: FieldRule[] = [];

  if (field.required && field.show_in_create) {
    rules.push({ field: field.name, rule: 'required' });
  }
  if (field.min !== undefined) {
    rules.push({ field: field.name, rule: 'min', value: field.min });
  }
  if (field.max !== undefined) {
    rules.push({ field: field.name, rule: 'max', value: field.max });
  }
  if (field.pattern) {
    rules.push({ field: field.name, rule: 'pattern', value: field.pattern });
  }
  if (field.min_items !== undefined) {
    rules.push({
      field: field.name,
      rule: 'min_length',
      value: field.min_items,
    });
  }
  if (
    field.type === 'money' &&
    (field.money_variant === 'non_negative' ||
      field.money_variant === 'positive')
  ) {
    rules.push({
      field: `${field.name}.amount_cents`,
      rule: 'min',
      value: MONEY_MINIMUM[field.money_variant],
    });
  }

  return rules;
}

function crossFieldRules(
  entity: Entity,
  layout: EntityLayout
): CrossFieldRule[] {
  const rules: CrossFieldRule[] = [];

  layout.constraints.forEach((constraint, index) => {
    for (const required of constraint.requires) {
      const message =
        `${fieldLabel(required)} is required when ` +
        `${fieldLabel(constraint.field)} is ${describeConditionValue(constraint)}`;
      rules.push({
        id: `${entity.id}_${toSnake(required)}_${index}`,
        description: message,
        condition: toCondition(constraint),
        then: { field: required, rule: 'required' },
        message,
      });
    }
  });

  return rules;
}

export function buildValidation(
  entity: Entity,
  fields: readonly FieldDescriptor[],
  layout: EntityLayout
): ValidationSchema {
  return {
    field_rules: fields.flatMap(fieldRules),
    cross_field_rules: crossFieldRules(entity, layout),
  };
}
