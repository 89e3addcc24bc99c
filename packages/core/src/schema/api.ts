import { toSnake } from '../naming.js';
import type {
  Entity,
  OperationKind,
  Relationship,
  Service,
} from '../ontology/types.js';
import { sortedRecord } from '../util.js';
import type {
  ApiEndpoint,
  ApiSchema,
  RelationshipDescriptor,
} from './types.js';

export function buildRelationships(
  entity: Entity,
  relationships: readonly Relationship[]
): RelationshipDescriptor[] {
  return relationships
    .filter((rel) => rel.from === entity.name)
    .map(
      (rel): RelationshipDescriptor => ({
        name: rel.name,
        target_entity: toSnake(rel.to),
        cardinality: rel.cardinality,
        display_in_detail: true,
        display_mode: rel.cardinality === 'one-to-many' ? 'table' : 'list',
      })
    );
}

const CRUD_ENDPOINTS: Record<
  Exclude<OperationKind, 'transition'>,
  (path: string) => ApiEndpoint
> = {
  create: (path) => ({ method: 'POST', path }),
  get: (path) => ({ method: 'GET', path: `${path}/{id}` }),
  list: (path) => ({ method: 'GET', path }),
  update: (path) => ({ method: 'PATCH', path: `${path}/{id}` }),
  delete: (path) => ({ method: 'DELETE', path: `${path}/{id}` }),
};

/**
 * Endpoints of the entity's catalogued operations. Hand-written (custom)
 * operations are left to their own documentation.
 */
export function buildApi(
  entity: Entity,
  services: readonly Service[]
): ApiSchema {
  let basePath = '';
  const operations: Record<string, ApiEndpoint> = {};
  const transitions: Record<string, ApiEndpoint> = {};

  for (const service of services) {
    for (const operation of service.operations) {
      if (operation.entity !== entity.name || operation.custom) {
        continue;
      }

      const path = `${operation.basePath}/${operation.entityPath}`;
      basePath = path;

      if (operation.kind !== 'transition') {
        operations[operation.kind] = CRUD_ENDPOINTS[operation.kind](path);
      } else if (operation.action) {
        transitions[operation.action] = {
          method: 'POST',
          path: `${path}/{id}/${operation.action}`,
        };
      }
    }
  }

  const transitionEntries = Object.entries(transitions);
  return {
    base_path: basePath,
    operations: sortedRecord(Object.entries(operations)),
    transitions:
      transitionEntries.length > 0 ? sortedRecord(transitionEntries) : undefined,
  };
}
