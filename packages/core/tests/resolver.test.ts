import { DEFAULT_VALUE_TYPES } from '../src/catalog/index.js';
import {
  buildDisplayFieldIndex,
  buildReferenceTables,
  resolveCrossReferences,
} from '../src/classify/resolver.js';
import {
  loadOntology,
  validateOntologyDocument,
} from '../src/ontology/loader.js';
import type { Ontology } from '../src/ontology/types.js';
import { list, str } from '../src/value/builders.js';

function loadFixture(): Ontology {
  return loadOntology(
    validateOntologyDocument({
      entities: {
        Organization: {
          fields: [
            { name: 'id', value: str() },
            { name: 'legal_name', value: str() },
          ],
        },
        Property: {
          fields: [
            { name: 'name', value: str() },
            { name: 'owner_id', value: str() },
            { name: 'manager_ids', value: str() },
            { name: 'unit_id', value: str() },
          ],
        },
        Person: {
          fields: [
            { name: 'full_name', value: str({ annotations: { display: true } }) },
            { name: 'property_ids', value: list(str()) },
          ],
        },
      },
      relationships: [
        {
          edge_name: 'owner',
          from: 'Property',
          to: 'Organization',
          cardinality: 'm2o',
        },
        {
          edge_name: 'manager',
          from: 'Property',
          to: 'Person',
          cardinality: 'many_to_many',
        },
      ],
    }),
    { valueTypes: DEFAULT_VALUE_TYPES }
  );
}

function fieldOf(ontology: Ontology, entity: string, name: string) {
  return ontology.entities
    .get(entity)
    ?.fields.find((field) => field.name === name);
}

describe('cross-reference resolution', () => {
  let ontology: Ontology;

  beforeEach(() => {
    ontology = loadFixture();
  });

  it('should leave edge-named references as strings after the first pass', () => {
    expect(fieldOf(ontology, 'Property', 'owner_id')?.type).toBe('string');
  });

  it('should build tables of entity names and edge targets', () => {
    const tables = buildReferenceTables(
      ontology.entities.values(),
      ontology.relationships
    );

    expect([...tables.entityNames].sort()).toEqual([
      'organization',
      'person',
      'property',
    ]);
    expect(tables.edgeTargets.get('owner')).toBe('organization');
    expect(tables.edgeTargets.get('manager')).toBe('person');
  });

  it('should turn edge-named strings into entity references', () => {
    const resolved = resolveCrossReferences(ontology.entities.values(), {
      definitions: ontology.definitions,
      catalog: DEFAULT_VALUE_TYPES,
      references: buildReferenceTables(
        ontology.entities.values(),
        ontology.relationships
      ),
    });

    expect(resolved).toBe(2);
    expect(fieldOf(ontology, 'Property', 'owner_id')).toMatchObject({
      type: 'entity_ref',
      refEntity: 'organization',
    });
    expect(fieldOf(ontology, 'Property', 'manager_ids')).toMatchObject({
      type: 'entity_ref_list',
      refEntity: 'person',
    });
  });

  it('should leave unmatched and non-string fields untouched', () => {
    resolveCrossReferences(ontology.entities.values(), {
      definitions: ontology.definitions,
      catalog: DEFAULT_VALUE_TYPES,
      references: buildReferenceTables(
        ontology.entities.values(),
        ontology.relationships
      ),
    });

    expect(fieldOf(ontology, 'Property', 'unit_id')?.type).toBe('string');
    expect(fieldOf(ontology, 'Person', 'property_ids')?.type).toBe(
      'string_list'
    );
    expect(fieldOf(ontology, 'Property', 'name')?.type).toBe('string');
  });
});

describe('buildDisplayFieldIndex', () => {
  it('should prefer the display field, then name, then id', () => {
    const index = buildDisplayFieldIndex(loadFixture().entities.values());

    expect(index.get('person')).toBe('full_name');
    expect(index.get('property')).toBe('name');
    expect(index.get('organization')).toBe('id');
  });
});
