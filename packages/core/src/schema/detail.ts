import { generateLabel, toSnake } from '../naming.js';
import type { Entity, Relationship } from '../ontology/types.js';
import { OVERVIEW_FIELD_LIMIT } from './editorial.js';
import type {
  DetailSchema,
  DetailSection,
  FieldDescriptor,
  RelatedSection,
} from './types.js';

function overviewFields(fields: readonly FieldDescriptor[]): string[] {
  return fields
    .filter(
      (field) =>
        field.show_in_detail &&
        field.type !== 'embedded_object' &&
        field.type !== 'embedded_array' &&
        field.type !== 'text'
    )
    .slice(0, OVERVIEW_FIELD_LIMIT)
    .map((field) => field.name);
}

function embeddedSection(field: FieldDescriptor): DetailSection {
  const section: DetailSection = {
    id: field.name,
    title: field.label,
    layout: 'grid_2col',
  };
  if (field.type === 'embedded_array') {
    section.embedded_array = field.object_ref;
  } else {
    section.embedded_object = field.object_ref;
  }
  section.display_mode = 'readonly';
  section.visible_when = { field: field.name, operator: 'truthy' };
  return section;
}

function relatedSections(
  entity: Entity,
  relationships: readonly Relationship[]
): RelatedSection[] {
  return relationships
    .filter((rel) => rel.from === entity.name)
    .map((rel): RelatedSection => ({
      title: generateLabel(rel.name),
      relationship: rel.name,
      entity: toSnake(rel.to),
      display: rel.cardinality === 'one-to-many' ? 'table' : 'list',
    }));
}

export function buildDetail(
  entity: Entity,
  fields: readonly FieldDescriptor[],
  relationships: readonly Relationship[],
  titleTemplate: string
): DetailSchema {
  const hasStatus = fields.some((field) => field.name === 'status');

  const sections: DetailSection[] = [
    {
      id: 'overview',
      title: 'Overview',
      layout: 'grid_2col',
      fields: overviewFields(fields),
    },
  ];
  for (const field of fields) {
    if (
      field.show_in_detail &&
      (field.type === 'embedded_object' || field.type === 'embedded_array')
    ) {
      sections.push(embeddedSection(field));
    }
  }

  const related = relatedSections(entity, relationships);

  return {
    header: {
      title_template: titleTemplate,
      status_field: hasStatus ? 'status' : undefined,
      actions: entity.stateMachine !== undefined,
    },
    sections,
    related_sections: related.length > 0 ? related : undefined,
  };
}
