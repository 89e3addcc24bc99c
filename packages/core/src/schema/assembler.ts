import type { LayoutCatalog } from '../catalog/index.js';
import { registerEnum } from '../emit/enum-catalog.js';
import type { Entity, Ontology } from '../ontology/types.js';
import { sortedRecord } from '../util.js';
import { buildApi, buildRelationships } from './api.js';
import { entityLayout } from './constraints.js';
import { buildDetail } from './detail.js';
import { buildEntityEnums } from './enums.js';
import { buildFieldDescriptors } from './fields.js';
import { buildForm } from './form.js';
import { buildList } from './list.js';
import { buildStateMachine } from './state-machine.js';
import { buildStatus } from './status.js';
import type { EnumDefinition, SchemaDocument } from './types.js';
import { buildValidation } from './validation.js';

export interface AssemblyContext {
  ontology: Ontology;
  layouts: LayoutCatalog;
  /** Snake entity name to its primary display field. */
  displayFields: ReadonlyMap<string, string>;
  /** Shared enum catalog; every document's enums are registered here. */
  enumCatalog: Map<string, EnumDefinition>;
}

/**
 * Build one entity's schema document from its fully resolved fields.
 */
export function buildSchemaDocument(
  entity: Entity,
  context: AssemblyContext
): SchemaDocument {
  const { ontology } = context;
  const layout = entityLayout(entity, context.layouts);
  const override = ontology.overrides.entities.get(entity.name);

  const primaryDisplayField = context.displayFields.get(entity.id) ?? 'id';
  const primaryDisplayTemplate =
    override?.primaryDisplayTemplate || `{{${primaryDisplayField}}}`;

  const fields = buildFieldDescriptors(entity, {
    displayFields: context.displayFields,
    layout,
  });

  const enums = buildEntityEnums(entity, ontology.overrides);
  for (const [id, definition] of enums) {
    registerEnum(context.enumCatalog, id, definition);
  }

  const machine = entity.stateMachine;

  return {
    entity: entity.id,
    display_name: override?.displayName || entity.name,
    display_name_plural: override?.displayNamePlural || `${entity.name}s`,
    primary_display_field: primaryDisplayField,
    primary_display_template: primaryDisplayTemplate,
    fields,
    enums: sortedRecord(enums),
    form: buildForm(entity, fields, layout),
    detail: buildDetail(
      entity,
      fields,
      ontology.relationships,
      primaryDisplayTemplate
    ),
    list: buildList(entity, fields),
    status: machine ? buildStatus(machine) : undefined,
    state_machine: buildStateMachine(entity, ontology.services, layout),
    relationships: buildRelationships(entity, ontology.relationships),
    validation: buildValidation(entity, fields, layout),
    api: buildApi(entity, ontology.services),
  };
}
