import {
  parseValueTypeCatalog,
  type LayoutCatalog,
} from '../src/catalog/index.js';
import { compile, OntologyCompiler } from '../src/compiler.js';
import { renderDocuments } from '../src/emit/serialize.js';
import type { OntologyDocumentInput } from '../src/ontology/schema.js';
import type { SchemaDocument } from '../src/schema/types.js';
import { oneOf, ref, str } from '../src/value/builders.js';
import { findField } from './test-utils.js';

const EMPTY_LAYOUTS: LayoutCatalog = { templates: {}, constraints: {} };

const ONTOLOGY: OntologyDocumentInput = {
  definitions: { '#LeaseKind': oneOf(['fixed_term', 'month_to_month']) },
  entities: {
    Property: {
      fields: [
        { name: 'name', value: str({ annotations: { display: true } }) },
        { name: 'property_type', value: oneOf(['residential', 'commercial']) },
      ],
    },
    Lease: {
      fields: [
        { name: 'id', value: str() },
        { name: 'lease_type', value: ref('#LeaseKind', { kind: 'string' }) },
        { name: 'property_id', value: str() },
        { name: 'owner_id', value: str(), optional: true },
        { name: 'base_rent', value: ref('#PositiveMoney') },
        {
          name: 'status',
          value: oneOf(['draft', 'active', 'terminated'], { default: 'draft' }),
        },
      ],
    },
    Organization: {
      fields: [{ name: 'legal_name', value: str() }],
    },
  },
  relationships: [
    {
      edge_name: 'owner',
      from: 'Lease',
      to: 'Organization',
      cardinality: 'many-to-one',
    },
  ],
  state_machines: {
    lease: {
      draft: ['active', 'terminated'],
      active: ['terminated'],
      terminated: [],
    },
  },
  services: [
    {
      name: 'LeaseService',
      base_path: '/api/v1',
      entities: ['Lease'],
      operations: [
        {
          name: 'CreateLease',
          entity: 'Lease',
          type: 'create',
          entity_path: 'leases',
        },
        {
          name: 'TerminateLease',
          entity: 'Lease',
          type: 'transition',
          entity_path: 'leases',
          action: 'terminate',
          to_status: 'terminated',
        },
      ],
    },
  ],
  overrides: {
    entities: { Organization: { display_name_plural: 'Organizations (legal)' } },
    enums: {
      LeaseType: { values: [{ value: 'month_to_month', label: 'Monthly' }] },
    },
  },
};

function schemaFor(schemas: SchemaDocument[], entity: string): SchemaDocument {
  const schema = schemas.find((candidate) => candidate.entity === entity);
  if (!schema) {
    throw new Error(`No schema for ${entity}`);
  }
  return schema;
}

describe('OntologyCompiler', () => {
  const compiler = new OntologyCompiler({ layouts: EMPTY_LAYOUTS });

  it('should produce one schema per entity in sorted order', () => {
    const result = compiler.compile(ONTOLOGY);

    expect(result.schemas.map((schema) => schema.entity)).toEqual([
      'lease',
      'organization',
      'property',
    ]);
    expect(result.resolvedReferences).toBe(2);
  });

  it('should resolve references in the second pass', () => {
    const lease = schemaFor(compiler.compile(ONTOLOGY).schemas, 'lease');

    expect(findField(lease.fields, 'property_id')).toMatchObject({
      type: 'entity_ref',
      ref_entity: 'property',
      ref_display: 'name',
      label: 'Property',
    });
    expect(findField(lease.fields, 'owner_id')).toMatchObject({
      type: 'entity_ref',
      ref_entity: 'organization',
      ref_display: 'id',
      label: 'Owner',
      required: false,
    });
  });

  it('should name the entity and its display field', () => {
    const { schemas } = compiler.compile(ONTOLOGY);
    const lease = schemaFor(schemas, 'lease');
    const property = schemaFor(schemas, 'property');

    expect(lease.display_name).toBe('Lease');
    expect(lease.display_name_plural).toBe('Leases');
    expect(lease.primary_display_field).toBe('id');
    expect(lease.primary_display_template).toBe('{{id}}');
    expect(property.primary_display_template).toBe('{{name}}');
    expect(schemaFor(schemas, 'organization').display_name_plural).toBe(
      'Organizations (legal)'
    );
  });

  it('should build the shared enum catalog with curated labels', () => {
    const { enums } = compiler.compile(ONTOLOGY);

    expect(Object.keys(enums)).toEqual([
      'LeaseStatus',
      'LeaseType',
      'PropertyType',
    ]);
    expect(enums.LeaseType).toEqual({
      values: [
        { value: 'month_to_month', label: 'Monthly' },
        { value: 'fixed_term', label: 'Fixed Term' },
      ],
    });
  });

  it('should describe status, transitions and endpoints', () => {
    const lease = schemaFor(compiler.compile(ONTOLOGY).schemas, 'lease');

    expect(lease.status).toEqual({
      field: 'status',
      color_mapping: {
        active: 'success',
        draft: 'surface',
        terminated: 'surface',
      },
    });
    expect(
      lease.state_machine?.transitions.draft.map((transition) => [
        transition.label,
        transition.api_endpoint,
      ])
    ).toEqual([
      ['Activate', 'POST /api/v1/leases/{id}/active'],
      ['Cancel', 'POST /api/v1/leases/{id}/terminate'],
    ]);
    expect(lease.api).toEqual({
      base_path: '/api/v1/leases',
      operations: { create: { method: 'POST', path: '/api/v1/leases' } },
      transitions: {
        terminate: { method: 'POST', path: '/api/v1/leases/{id}/terminate' },
      },
    });
  });

  it('should leave entities without a state machine without status', () => {
    const property = schemaFor(compiler.compile(ONTOLOGY).schemas, 'property');

    expect(property.status).toBeUndefined();
    expect(property.state_machine).toBeUndefined();
    expect(property.detail.header.actions).toBe(false);
  });

  it('should pick list columns and generic form sections', () => {
    const lease = schemaFor(compiler.compile(ONTOLOGY).schemas, 'lease');

    expect(lease.list.default_columns.map((column) => column.field)).toEqual([
      'status',
      'lease_type',
      'property_id',
      'owner_id',
      'base_rent',
      'updated_at',
    ]);
    expect(lease.form.sections).toEqual([
      {
        id: 'identity',
        title: 'Lease Details',
        collapsible: false,
        fields: ['lease_type', 'property_id', 'owner_id'],
      },
      { id: 'main', title: 'Details', collapsible: false, fields: ['base_rent'] },
    ]);
  });

  it('should apply the bundled layouts by default', () => {
    const { schemas } = compile(JSON.stringify(ONTOLOGY), 'json');
    const lease = schemaFor(schemas, 'lease');

    expect(lease.form.sections[0]).toMatchObject({
      id: 'identity',
      title: 'Lease Details',
      fields: ['lease_type', 'property_id'],
    });
    expect(lease.state_machine?.transitions.draft[0].requires_fields).toEqual([
      'move_in_date',
      'signed_at',
    ]);
  });

  it('should target the named entity before an edge of the same name', () => {
    const space = schemaFor(
      compiler.compile({
        entities: {
          Property: {
            fields: [
              { name: 'name', value: str({ annotations: { display: true } }) },
            ],
          },
          Building: { fields: [{ name: 'code', value: str() }] },
          Space: { fields: [{ name: 'property_id', value: str() }] },
        },
        relationships: [
          {
            edge_name: 'property',
            from: 'Space',
            to: 'Building',
            cardinality: 'many-to-one',
          },
        ],
      }).schemas,
      'space'
    );

    expect(findField(space.fields, 'property_id')).toMatchObject({
      type: 'entity_ref',
      ref_entity: 'property',
      ref_display: 'name',
    });
    expect(
      space.list.filters.find((filter) => filter.field === 'property_id')
    ).toMatchObject({ type: 'entity_ref', ref_entity: 'property' });
  });

  it('should target the last edge when several share a name', () => {
    const vehicle = schemaFor(
      compiler.compile({
        entities: {
          Organization: { fields: [{ name: 'legal_name', value: str() }] },
          Person: {
            fields: [
              { name: 'name', value: str({ annotations: { display: true } }) },
            ],
          },
          Vehicle: { fields: [{ name: 'owner_id', value: str() }] },
        },
        relationships: [
          {
            edge_name: 'owner',
            from: 'Vehicle',
            to: 'Organization',
            cardinality: 'many-to-one',
          },
          {
            edge_name: 'owner',
            from: 'Vehicle',
            to: 'Person',
            cardinality: 'many-to-one',
          },
        ],
      }).schemas,
      'vehicle'
    );

    expect(findField(vehicle.fields, 'owner_id')).toMatchObject({
      type: 'entity_ref',
      ref_entity: 'person',
      ref_display: 'name',
    });
  });

  it('should use a custom value type catalog', () => {
    const custom = new OntologyCompiler({
      layouts: EMPTY_LAYOUTS,
      valueTypes: parseValueTypeCatalog({
        valueTypes: { '#Coordinates': 'Coordinates' },
        moneyTypes: {},
      }),
    });

    const site = schemaFor(
      custom.compile({
        entities: {
          Site: {
            fields: [
              { name: 'location', value: ref('#Coordinates') },
              { name: 'address', value: ref('#Address') },
            ],
          },
        },
      }).schemas,
      'site'
    );

    expect(findField(site.fields, 'location').object_ref).toBe('Coordinates');
    expect(findField(site.fields, 'address')).toMatchObject({
      type: 'embedded_object',
      object_ref: 'Unknown',
    });
  });
});

describe('determinism', () => {
  it('should render identical files for identical input', () => {
    const first = renderDocuments(compile(JSON.stringify(ONTOLOGY), 'json'));
    const second = renderDocuments(compile(JSON.stringify(ONTOLOGY), 'json'));

    expect(second).toEqual(first);
  });

  it('should not depend on declaration order', () => {
    const reordered: OntologyDocumentInput = {
      ...ONTOLOGY,
      entities: {
        Organization: ONTOLOGY.entities.Organization,
        Lease: ONTOLOGY.entities.Lease,
        Property: ONTOLOGY.entities.Property,
      },
    };

    expect(renderDocuments(compile(JSON.stringify(reordered), 'json'))).toEqual(
      renderDocuments(compile(JSON.stringify(ONTOLOGY), 'json'))
    );
  });
});
