import type { SectionTemplate } from '../catalog/index.js';
import type { Entity } from '../ontology/types.js';
import { toCondition, type EntityLayout } from './constraints.js';
import type { FieldDescriptor, FormSchema, FormSection } from './types.js';

function isEmbedded(field: FieldDescriptor): boolean {
  return field.type === 'embedded_object' || field.type === 'embedded_array';
}

function fromTemplate(
  template: SectionTemplate,
  known: ReadonlySet<string>
): FormSection | undefined {
  const fields = (template.fields ?? []).filter((name) => known.has(name));
  const hasSlot =
    template.embedded_object !== undefined ||
    template.embedded_array !== undefined;
  if (fields.length === 0 && !hasSlot) {
    return undefined;
  }

  return {
    id: template.id,
    title: template.title,
    collapsible: template.collapsible,
    initially_collapsed: template.initially_collapsed,
    fields: fields.length > 0 ? fields : undefined,
    embedded_object: template.embedded_object,
    embedded_array: template.embedded_array,
    visible_when: template.visible_when
      ? toCondition(template.visible_when)
      : undefined,
    required_when: template.required_when
      ? toCondition(template.required_when)
      : undefined,
  };
}

function templateSections(
  template: readonly SectionTemplate[],
  fields: readonly FieldDescriptor[]
): FormSection[] {
  const known = new Set(fields.map((field) => field.name));
  const sections: FormSection[] = [];
  for (const entry of template) {
    const section = fromTemplate(entry, known);
    if (section) {
      sections.push(section);
    }
  }
  return sections;
}

/**
 * Buckets for entities without a template: identifying fields, the rest,
 * and structured fields in a collapsed trailing section.
 */
function genericSections(
  entity: Entity,
  fields: readonly FieldDescriptor[]
): FormSection[] {
  const identity: string[] = [];
  const main: string[] = [];
  const secondary: string[] = [];

  for (const field of fields) {
    if (!field.show_in_create || field.name === 'status') {
      continue;
    }
    const { name } = field;
    if (
      name.endsWith('_type') ||
      name.endsWith('_id') ||
      name === 'name' ||
      name === 'legal_name'
    ) {
      identity.push(name);
    } else if (isEmbedded(field)) {
      secondary.push(name);
    } else {
      main.push(name);
    }
  }

  const sections: FormSection[] = [];
  if (identity.length > 0) {
    sections.push({
      id: 'identity',
      title: `${entity.name} Details`,
      collapsible: false,
      fields: identity,
    });
  }
  if (main.length > 0) {
    sections.push({
      id: 'main',
      title: 'Details',
      collapsible: false,
      fields: main,
    });
  }
  if (secondary.length > 0) {
    sections.push({
      id: 'additional',
      title: 'Additional',
      collapsible: true,
      initially_collapsed: true,
      fields: secondary,
    });
  }
  return sections;
}

/**
 * Collect create-form fields no section placed yet, so fields added to the
 * ontology show up before any template mentions them. Structured fields
 * render through slots and are never collected.
 */
function appendUnassigned(
  sections: FormSection[],
  fields: readonly FieldDescriptor[]
): FormSection[] {
  const assigned = new Set(sections.flatMap((section) => section.fields ?? []));
  const extra = fields
    .filter(
      (field) =>
        field.show_in_create && !assigned.has(field.name) && !isEmbedded(field)
    )
    .map((field) => field.name);

  if (extra.length === 0) {
    return sections;
  }
  return [
    ...sections,
    {
      id: 'additional',
      title: 'Additional Details',
      collapsible: true,
      fields: extra,
    },
  ];
}

export function buildForm(
  entity: Entity,
  fields: readonly FieldDescriptor[],
  layout: EntityLayout
): FormSchema {
  const sections = layout.template
    ? templateSections(layout.template, fields)
    : genericSections(entity, fields);

  return {
    sections: appendUnassigned(sections, fields),
    field_order_rule: 'required_first',
  };
}
