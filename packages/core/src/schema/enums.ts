import { mergeEnum } from '../emit/enum-catalog.js';
import { toPascal } from '../naming.js';
import type { Entity, Overrides } from '../ontology/types.js';
import { CANONICAL_ENUM_FIELDS } from './editorial.js';
import type { EnumDefinition } from './types.js';

/**
 * Catalog identifier of an enum field.
 *
 * @example
 * enumIdentifier({ name: 'Lease' }, 'status')      // 'LeaseStatus'
 * enumIdentifier({ name: 'Lease' }, 'lease_type')  // 'LeaseType'
 * enumIdentifier({ name: 'Lease' }, 'liability_type')  // 'LeaseLiabilityType'
 */
export function enumIdentifier(
  entity: Pick<Entity, 'name'>,
  fieldName: string
): string {
  if (fieldName === 'status') {
    return `${toPascal(entity.name)}Status`;
  }
  if (CANONICAL_ENUM_FIELDS.has(fieldName)) {
    return toPascal(fieldName);
  }
  return toPascal(entity.name) + toPascal(fieldName);
}

/**
 * The enums one entity declares, merged with any curated overrides.
 */
export function buildEntityEnums(
  entity: Entity,
  overrides: Overrides
): Map<string, EnumDefinition> {
  const enums = new Map<string, EnumDefinition>();
  for (const field of entity.fields) {
    if (field.type !== 'enum' || !field.enumValues?.length) {
      continue;
    }
    const id = enumIdentifier(entity, field.name);
    enums.set(id, mergeEnum(overrides.enums.get(id), field.enumValues));
  }
  return enums;
}
