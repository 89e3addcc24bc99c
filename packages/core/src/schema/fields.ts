import type { ClassifiedField } from '../classify/types.js';
import { fieldLabel } from '../naming.js';
import type { Entity } from '../ontology/types.js';
import {
  conditionallyRequiredFields,
  conditionFields,
  type EntityLayout,
} from './constraints.js';
import { enumIdentifier } from './enums.js';
import type { FieldDescriptor } from './types.js';

export interface FieldContext {
  /** Snake entity name to the field shown when it is referenced. */
  displayFields: ReadonlyMap<string, string>;
  layout: EntityLayout;
}

function refDisplay(
  refEntity: string,
  displayFields: ReadonlyMap<string, string>
): string {
  return displayFields.get(refEntity) ?? 'name';
}

function baseDescriptor(field: ClassifiedField): FieldDescriptor {
  const isEntityRef =
    field.type === 'entity_ref' || field.type === 'entity_ref_list';
  return {
    name: field.name,
    type: field.type,
    required: !field.optional,
    default: field.default ?? field.value.default ?? null,
    label: fieldLabel(field.name, isEntityRef),
    show_in_create: true,
    show_in_update: true,
    show_in_list: false,
    show_in_detail: true,
    sortable: false,
    filterable: false,
  };
}

function enrichByType(
  descriptor: FieldDescriptor,
  field: ClassifiedField,
  entity: Entity,
  context: FieldContext
): void {
  switch (field.type) {
    case 'enum':
      descriptor.enum_ref = enumIdentifier(entity, field.name);
      descriptor.sortable = true;
      descriptor.filterable = true;
      descriptor.show_in_list = true;
      if (field.name.endsWith('_type')) {
        descriptor.controls_visibility = true;
      }
      break;

    case 'money':
      descriptor.money_variant = field.moneyVariant;
      descriptor.sortable = true;
      descriptor.filterable = true;
      descriptor.filter_type = 'money_range';
      descriptor.show_in_list = true;
      break;

    case 'entity_ref': {
      const refEntity = field.refEntity ?? '';
      descriptor.ref_entity = refEntity;
      descriptor.ref_display = refDisplay(refEntity, context.displayFields);
      descriptor.sortable = true;
      descriptor.filterable = true;
      descriptor.filter_type = 'entity_ref';
      descriptor.show_in_list = true;
      break;
    }

    case 'entity_ref_list': {
      const refEntity = field.refEntity ?? '';
      descriptor.ref_entity = refEntity;
      descriptor.ref_display = refDisplay(refEntity, context.displayFields);
      descriptor.min_items = 1;
      break;
    }

    case 'date':
    case 'datetime':
    case 'date_range':
      descriptor.sortable = true;
      descriptor.filterable = true;
      descriptor.filter_type = 'date_range';
      break;

    case 'embedded_object':
    case 'embedded_array':
      descriptor.object_ref = field.objectRef;
      break;

    case 'string':
      descriptor.sortable = true;
      descriptor.pattern = field.pattern;
      break;

    case 'int':
    case 'float':
      descriptor.sortable = true;
      descriptor.min = field.bounds?.lower;
      descriptor.max = field.bounds?.upper;
      break;

    case 'bool':
      descriptor.sortable = true;
      descriptor.filterable = true;
      break;
  }
}

function applyAnnotations(
  descriptor: FieldDescriptor,
  field: ClassifiedField
): void {
  const { annotations } = field;

  if (field.isDisplayName) {
    descriptor.is_display_name = true;
  }
  if (annotations.computed) {
    descriptor.is_computed = true;
    descriptor.show_in_create = false;
    descriptor.show_in_update = false;
  }
  if (annotations.immutable) {
    descriptor.immutable = true;
    descriptor.show_in_update = false;
  }
  if (annotations.sensitive) {
    descriptor.is_sensitive = true;
  }
  if (annotations.pii) {
    descriptor.is_pii = true;
  }
  if (annotations.deprecated) {
    descriptor.is_deprecated = true;
    descriptor.deprecated_reason = annotations.deprecated.reason;
    descriptor.deprecated_since = annotations.deprecated.since;
  }
}

/**
 * Field descriptors in declaration order.
 */
export function buildFieldDescriptors(
  entity: Entity,
  context: FieldContext
): FieldDescriptor[] {
  const controlling = conditionFields(context.layout);
  const conditional = conditionallyRequiredFields(context.layout);

  return entity.fields.map((field) => {
    const descriptor = baseDescriptor(field);
    enrichByType(descriptor, field, entity, context);

    // Status moves through transitions only.
    if (field.name === 'status') {
      descriptor.show_in_create = false;
      descriptor.show_in_update = false;
      descriptor.show_in_list = true;
      descriptor.sortable = true;
      descriptor.filterable = true;
      descriptor.immutable = true;
    }

    applyAnnotations(descriptor, field);

    if (controlling.has(field.name)) {
      descriptor.controls_visibility = true;
    }
    if (conditional.has(field.name)) {
      descriptor.conditionally_required = true;
    }
    return descriptor;
  });
}
