import { generateLabel } from '../naming.js';
import type { EnumDefinition, EnumValue } from '../schema/types.js';

/**
 * Merge a curated enum with the values the ontology declares.
 *
 * Every curated value is kept in its curated order and label; ontology
 * values the curated list lacks are appended in declaration order with a
 * generated label. Without a curated entry the result is the ontology values
 * alone. Neither input is modified.
 */
export function mergeEnum(
  curated: EnumDefinition | undefined,
  values: readonly string[]
): EnumDefinition {
  const merged: EnumValue[] = curated
    ? curated.values.map((entry) => ({ ...entry }))
    : [];
  const present = new Set(merged.map((entry) => entry.value));

  for (const value of values) {
    if (!present.has(value)) {
      merged.push({ value, label: generateLabel(value) });
      present.add(value);
    }
  }

  const definition: EnumDefinition = { values: merged };
  if (curated?.groups && curated.groups.length > 0) {
    definition.groups = curated.groups.map((group) => ({
      label: group.label,
      values: [...group.values],
    }));
  }
  return definition;
}

/**
 * Add an entity's enum to the shared catalog. Entities that share a
 * canonical identifier contribute to one entry: values already present keep
 * their place and label, new ones are appended.
 */
export function registerEnum(
  catalog: Map<string, EnumDefinition>,
  id: string,
  definition: EnumDefinition
): void {
  const existing = catalog.get(id);
  if (!existing) {
    catalog.set(id, definition);
    return;
  }

  const present = new Set(existing.values.map((entry) => entry.value));
  const values = [
    ...existing.values,
    ...definition.values.filter((entry) => !present.has(entry.value)),
  ];
  const groups = existing.groups ?? definition.groups;
  catalog.set(id, groups ? { values, groups } : { values });
}
