/**
 * Second classification pass.
 *
 * Entity references are spelled `<entity>_id` or `<edge>_id`, and neither
 * name set is complete until the whole ontology is loaded. The first pass
 * therefore classifies with empty tables and leaves every such field as a
 * plain string; this pass revisits exactly those fields once the tables
 * exist.
 */

import { stripReferenceSuffix, toSnake } from '../naming.js';
import type { Entity, Relationship } from '../ontology/types.js';
import { classifyField } from './field-classifier.js';
import type { ClassifierContext, ReferenceTables } from './types.js';

export function buildReferenceTables(
  entities: Iterable<Entity>,
  relationships: readonly Relationship[]
): ReferenceTables {
  const entityNames = new Set<string>();
  for (const entity of entities) {
    entityNames.add(entity.id);
  }

  const edgeTargets = new Map<string, string>();
  for (const relationship of relationships) {
    edgeTargets.set(relationship.name, toSnake(relationship.to));
  }

  return { entityNames, edgeTargets };
}

/**
 * Re-classify provisional string fields named like references. Only those
 * entries are replaced; everything else keeps its first-pass result.
 *
 * @returns the number of fields that became entity references
 */
export function resolveCrossReferences(
  entities: Iterable<Entity>,
  context: ClassifierContext
): number {
  let resolved = 0;

  for (const entity of entities) {
    entity.fields.forEach((field, index) => {
      if (field.type !== 'string' || !stripReferenceSuffix(field.name)) {
        return;
      }
      const reclassified = classifyField(
        field.name,
        field.value,
        field.optional,
        context
      );
      if (
        reclassified &&
        (reclassified.type === 'entity_ref' ||
          reclassified.type === 'entity_ref_list')
      ) {
        entity.fields[index] = reclassified;
        resolved++;
      }
    });
  }

  return resolved;
}

/**
 * Snake entity name to the field other schemas display when referencing
 * it: the first `display`-annotated field, else `name`, else `id`.
 */
export function buildDisplayFieldIndex(
  entities: Iterable<Entity>
): Map<string, string> {
  const index = new Map<string, string>();
  for (const entity of entities) {
    const display =
      entity.fields.find((field) => field.isDisplayName)?.name ??
      entity.fields.find((field) => field.name === 'name')?.name ??
      'id';
    index.set(entity.id, display);
  }
  return index;
}
