import { parse as parseYaml } from 'yaml';
import { classifyField } from '../classify/field-classifier.js';
import {
  EMPTY_REFERENCE_TABLES,
  type ClassifiedField,
  type ClassifierContext,
  type ValueTypeCatalog,
} from '../classify/types.js';
import { errorMessage, formatIssues, LoadError } from '../errors.js';
import { toSnake } from '../naming.js';
import { lookup } from '../util.js';
import type { EnumDefinition } from '../schema/types.js';
import type { ValueTree } from '../value/types.js';
import {
  ontologyDocumentSchema,
  type OntologyDocument,
} from './schema.js';
import type {
  Entity,
  EntityOverride,
  Ontology,
  Operation,
  Relationship,
  Service,
  StateMachine,
} from './types.js';

export type SourceFormat = 'yaml' | 'json';

/**
 * Validate an already-parsed document against the ontology contract.
 */
export function validateOntologyDocument(raw: unknown): OntologyDocument {
  const result = ontologyDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new LoadError(
      `Invalid ontology document:\n${formatIssues(result.error)}`,
      { cause: result.error }
    );
  }
  return result.data;
}

/**
 * Parse ontology source text. Syntax and contract violations both surface
 * as a LoadError.
 */
export function parseOntologyDocument(
  content: string,
  format: SourceFormat
): OntologyDocument {
  let raw: unknown;
  try {
    raw = format === 'json' ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new LoadError(
      `Failed to parse ontology ${format.toUpperCase()}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
  return validateOntologyDocument(raw);
}

// Fields the persistence layer owns; they never reach a form.
function isStructuralField(name: string): boolean {
  return name === 'id' || name === 'audit' || name.startsWith('_');
}

function loadEntities(
  document: OntologyDocument,
  context: ClassifierContext
): Map<string, Entity> {
  const entities = new Map<string, Entity>();

  for (const [name, definition] of Object.entries(document.entities)) {
    const id = toSnake(name);
    const fields: ClassifiedField[] = [];

    for (const field of definition.fields) {
      if (isStructuralField(field.name)) {
        continue;
      }
      const classified = classifyField(
        field.name,
        field.value,
        field.optional,
        context
      );
      if (classified) {
        fields.push(classified);
      }
    }

    const machine = lookup(document.state_machines, id);
    const stateMachine: StateMachine | undefined = machine
      ? new Map(Object.entries(machine))
      : undefined;

    entities.set(name, { name, id, fields, stateMachine });
  }

  return entities;
}

function loadRelationships(document: OntologyDocument): Relationship[] {
  return document.relationships.map((relationship) => ({
    name: relationship.edge_name,
    from: relationship.from,
    to: relationship.to,
    cardinality: relationship.cardinality,
    inverseName: relationship.inverse_name,
    required: relationship.required,
  }));
}

function loadServices(document: OntologyDocument): Service[] {
  return document.services.map((service) => ({
    name: service.name,
    basePath: service.base_path,
    entities: service.entities,
    operations: service.operations.map(
      (operation): Operation => ({
        name: operation.name,
        service: service.name,
        basePath: service.base_path,
        entity: operation.entity,
        kind: operation.type,
        entityPath: operation.entity_path,
        action: operation.action,
        toStatus: operation.to_status,
        extraFields: operation.extra_fields,
        custom: operation.custom,
      })
    ),
  }));
}

function loadEntityOverrides(
  document: OntologyDocument
): Map<string, EntityOverride> {
  const overrides = new Map<string, EntityOverride>();
  for (const [name, override] of Object.entries(document.overrides.entities)) {
    overrides.set(name, {
      displayName: override.display_name,
      displayNamePlural: override.display_name_plural,
      primaryDisplayTemplate: override.primary_display_template,
    });
  }
  return overrides;
}

function loadEnumOverrides(
  document: OntologyDocument
): Map<string, EnumDefinition> {
  const overrides = new Map<string, EnumDefinition>();
  for (const [id, override] of Object.entries(document.overrides.enums)) {
    overrides.set(
      id,
      override.groups
        ? { values: override.values, groups: override.groups }
        : { values: override.values }
    );
  }
  return overrides;
}

export interface LoadOptions {
  valueTypes: ValueTypeCatalog;
}

/**
 * Build the in-memory ontology. Fields are classified here for the first
 * time, with empty reference tables, so every `_id` field is still a plain
 * string on return.
 */
export function loadOntology(
  document: OntologyDocument,
  options: LoadOptions
): Ontology {
  const definitions = new Map<string, ValueTree>(
    Object.entries(document.definitions)
  );
  const context: ClassifierContext = {
    definitions,
    catalog: options.valueTypes,
    references: EMPTY_REFERENCE_TABLES,
  };

  return {
    entities: loadEntities(document, context),
    relationships: loadRelationships(document),
    services: loadServices(document),
    overrides: {
      entities: loadEntityOverrides(document),
      enums: loadEnumOverrides(document),
    },
    definitions,
  };
}
