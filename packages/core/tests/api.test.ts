import type { Operation, Service } from '../src/ontology/types.js';
import { buildApi, buildRelationships } from '../src/schema/api.js';
import { makeEntity } from './test-utils.js';

function operation(
  kind: Operation['kind'],
  overrides: Partial<Operation> = {}
): Operation {
  return {
    name: `${kind}Lease`,
    service: 'LeaseService',
    basePath: '/api/v1',
    entity: 'Lease',
    kind,
    entityPath: 'leases',
    extraFields: [],
    custom: false,
    ...overrides,
  };
}

const lease = makeEntity('Lease', []);

describe('buildApi', () => {
  const services: Service[] = [
    {
      name: 'LeaseService',
      basePath: '/api/v1',
      entities: ['Lease'],
      operations: [
        operation('update'),
        operation('list'),
        operation('create'),
        operation('update', {
          name: 'RecalculateRent',
          entityPath: 'leases/rent',
          custom: true,
        }),
        operation('get'),
        operation('delete'),
        operation('transition', { action: 'terminate', toStatus: 'terminated' }),
        operation('create', { entity: 'Space', entityPath: 'spaces' }),
      ],
    },
  ];

  it('should map catalogued operations to endpoints', () => {
    const api = buildApi(lease, services);

    expect(api.base_path).toBe('/api/v1/leases');
    expect(Object.keys(api.operations)).toEqual([
      'create',
      'delete',
      'get',
      'list',
      'update',
    ]);
    expect(api.operations).toEqual({
      create: { method: 'POST', path: '/api/v1/leases' },
      delete: { method: 'DELETE', path: '/api/v1/leases/{id}' },
      get: { method: 'GET', path: '/api/v1/leases/{id}' },
      list: { method: 'GET', path: '/api/v1/leases' },
      update: { method: 'PATCH', path: '/api/v1/leases/{id}' },
    });
  });

  it('should key transitions by action', () => {
    expect(buildApi(lease, services).transitions).toEqual({
      terminate: { method: 'POST', path: '/api/v1/leases/{id}/terminate' },
    });
  });

  it('should be empty for entities without operations', () => {
    expect(buildApi(makeEntity('Note', []), services)).toEqual({
      base_path: '',
      operations: {},
      transitions: undefined,
    });
  });
});

describe('buildRelationships', () => {
  it('should describe outgoing edges', () => {
    expect(
      buildRelationships(lease, [
        {
          name: 'spaces',
          from: 'Lease',
          to: 'Space',
          cardinality: 'one-to-many',
          required: false,
        },
        {
          name: 'property',
          from: 'Lease',
          to: 'Property',
          cardinality: 'many-to-one',
          required: true,
        },
        {
          name: 'leases',
          from: 'Property',
          to: 'Lease',
          cardinality: 'one-to-many',
          required: false,
        },
      ])
    ).toEqual([
      {
        name: 'spaces',
        target_entity: 'space',
        cardinality: 'one-to-many',
        display_in_detail: true,
        display_mode: 'table',
      },
      {
        name: 'property',
        target_entity: 'property',
        cardinality: 'many-to-one',
        display_in_detail: true,
        display_mode: 'list',
      },
    ]);
  });
});
