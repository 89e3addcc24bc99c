import type { ClassifiedField } from '../classify/types.js';
import type { EnumDefinition } from '../schema/types.js';
import type { Definitions } from '../value/types.js';

export type Cardinality =
  | 'one-to-one'
  | 'one-to-many'
  | 'many-to-one'
  | 'many-to-many';

export interface Relationship {
  /** Edge name, e.g. `owner`. */
  name: string;
  from: string;
  to: string;
  cardinality: Cardinality;
  inverseName?: string;
  required: boolean;
}

/**
 * State to the ordered list of states it can move to. A state whose list is
 * empty is terminal.
 */
export type StateMachine = ReadonlyMap<string, readonly string[]>;

export type OperationKind =
  | 'create'
  | 'get'
  | 'list'
  | 'update'
  | 'delete'
  | 'transition';

export interface Operation {
  name: string;
  service: string;
  basePath: string;
  entity: string;
  kind: OperationKind;
  /** Path segment of the entity under the service base path. */
  entityPath: string;
  action?: string;
  toStatus?: string;
  extraFields: string[];
  custom: boolean;
}

export interface Service {
  name: string;
  basePath: string;
  entities: string[];
  operations: Operation[];
}

export interface EntityOverride {
  displayName?: string;
  displayNamePlural?: string;
  primaryDisplayTemplate?: string;
}

export interface Overrides {
  entities: ReadonlyMap<string, EntityOverride>;
  enums: ReadonlyMap<string, EnumDefinition>;
}

export interface Entity {
  /** PascalCase name as declared, e.g. `BankAccount`. */
  name: string;
  /** Snake-case identifier, e.g. `bank_account`. */
  id: string;
  fields: ClassifiedField[];
  stateMachine?: StateMachine;
}

export interface Ontology {
  entities: Map<string, Entity>;
  relationships: Relationship[];
  services: Service[];
  overrides: Overrides;
  definitions: Definitions;
}
