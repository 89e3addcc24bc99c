/**
 * Field classification: maps a field's value tree to one of the semantic
 * field types the rendering layer understands.
 *
 * The decision procedure is ordered because categories overlap
 * structurally (a money value is also a struct, an enum is also a string):
 *
 * 1. temporal references
 * 2. catalogued value types (money, address, contact method, ...)
 * 3. list-shaped values
 * 4. string disjunctions (enums)
 * 5. primitive dispatch by kind, including `_id`/`_ids` entity references
 *
 * Classification never throws. Anything it cannot place degrades to a
 * generic type, and a fully unresolved value yields no field at all.
 */

import { stripReferenceSuffix } from '../naming.js';
import { lookup } from '../util.js';
import {
  effectiveKind,
  extractEnumValues,
  extractNumericBounds,
  extractPattern,
  findReference,
  inferListElement,
  isEnum,
  isList,
  isTime,
} from '../value/introspect.js';
import type { ValueTree } from '../value/types.js';
import type {
  ClassifiedField,
  ClassifierContext,
  FieldType,
  ReferenceTables,
} from './types.js';

/** Object reference of a struct whose definition is not catalogued. */
export const UNKNOWN_OBJECT_REF = 'Unknown';
/** Object reference of an unconstrained (top) value. */
export const OPAQUE_OBJECT_REF = 'JSON';

const SPECIAL_VALUE_TYPES: Record<string, FieldType> = {
  Address: 'address',
  DateRange: 'date_range',
  ContactMethod: 'contact_method',
};

type Classification = Omit<
  ClassifiedField,
  'name' | 'optional' | 'value' | 'isDisplayName' | 'annotations'
>;

/**
 * Resolve the entity an `_id`/`_ids` field points at. The entity-name set
 * is consulted before the edge map, so an entity named like an edge wins.
 */
export function resolveEntityReference(
  name: string,
  tables: ReferenceTables
):
  | { type: 'entity_ref' | 'entity_ref_list'; refEntity: string }
  | undefined {
  const suffix = stripReferenceSuffix(name);
  if (!suffix) {
    return undefined;
  }

  const type = suffix.plural ? 'entity_ref_list' : 'entity_ref';
  if (tables.entityNames.has(suffix.prefix)) {
    return { type, refEntity: suffix.prefix };
  }
  const target = tables.edgeTargets.get(suffix.prefix);
  if (target !== undefined) {
    return { type, refEntity: target };
  }
  return undefined;
}

function classifyValueType(
  typeName: string,
  list: boolean
): Classification {
  if (list) {
    return { type: 'embedded_array', objectRef: typeName, isList: true };
  }
  const special = lookup(SPECIAL_VALUE_TYPES, typeName);
  if (special) {
    return { type: special, objectRef: typeName };
  }
  return { type: 'embedded_object', objectRef: typeName };
}

function classifyList(
  value: ValueTree,
  context: ClassifierContext
): Classification {
  const element = inferListElement(value);
  if (element) {
    const ref = findReference(element);
    const typeName = ref
      ? lookup(context.catalog.valueTypes, ref)
      : undefined;
    if (typeName) {
      return { type: 'embedded_array', objectRef: typeName, isList: true };
    }
  }
  // Unknown element kinds render as a list of strings too.
  return { type: 'string_list', isList: true };
}

function classifyPrimitive(
  name: string,
  value: ValueTree,
  context: ClassifierContext
): Classification | undefined {
  switch (effectiveKind(value)) {
    case 'string': {
      const reference = resolveEntityReference(name, context.references);
      if (reference) {
        return reference;
      }
      const pattern = extractPattern(value);
      return pattern ? { type: 'string', pattern } : { type: 'string' };
    }
    case 'int':
      return { type: 'int', bounds: extractNumericBounds(value) };
    case 'float':
    case 'number':
      return { type: 'float', bounds: extractNumericBounds(value) };
    case 'bool':
      return typeof value.default === 'boolean'
        ? { type: 'bool', default: value.default }
        : { type: 'bool' };
    case 'struct':
      return { type: 'embedded_object', objectRef: UNKNOWN_OBJECT_REF };
    case 'bottom':
      return undefined;
    default:
      return { type: 'embedded_object', objectRef: OPAQUE_OBJECT_REF };
  }
}

function classifyShape(
  name: string,
  value: ValueTree,
  context: ClassifierContext
): Classification | undefined {
  if (isTime(value)) {
    return { type: name.toLowerCase().includes('date') ? 'date' : 'datetime' };
  }

  const list = isList(value);
  const ref = findReference(value);
  if (ref) {
    const moneyVariant = lookup(context.catalog.moneyTypes, ref);
    if (moneyVariant) {
      return { type: 'money', moneyVariant };
    }
    const typeName = lookup(context.catalog.valueTypes, ref);
    if (typeName) {
      return classifyValueType(typeName, list);
    }
  }

  if (list) {
    return classifyList(value, context);
  }

  if (isEnum(value, context.definitions)) {
    const enumValues = extractEnumValues(value, context.definitions);
    return typeof value.default === 'string'
      ? { type: 'enum', enumValues, default: value.default }
      : { type: 'enum', enumValues };
  }

  return classifyPrimitive(name, value, context);
}

/**
 * Classify a single field. Returns undefined when the value cannot be
 * resolved at all; the field is then left out of the schema.
 */
export function classifyField(
  name: string,
  value: ValueTree,
  optional: boolean,
  context: ClassifierContext
): ClassifiedField | undefined {
  const classification = classifyShape(name, value, context);
  if (!classification) {
    return undefined;
  }

  const annotations = value.annotations ?? {};
  const type =
    classification.type === 'string' && annotations.text
      ? 'text'
      : classification.type;

  return {
    ...classification,
    type,
    name,
    optional,
    value,
    isDisplayName: annotations.display === true,
    annotations,
  };
}
