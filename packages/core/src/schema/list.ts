import type { Entity } from '../ontology/types.js';
import { MAX_LIST_COLUMNS } from './editorial.js';
import type {
  FieldDescriptor,
  ListColumn,
  ListFilter,
  ListSchema,
} from './types.js';

const TIMESTAMP_FIELDS = new Set(['created_at', 'updated_at']);

class ColumnPicker {
  readonly columns: ListColumn[] = [];
  readonly filters: ListFilter[] = [];
  private readonly picked = new Set<string>();

  get full(): boolean {
    return this.columns.length >= MAX_LIST_COLUMNS;
  }

  has(field: string): boolean {
    return this.picked.has(field);
  }

  add(field: FieldDescriptor, column: ListColumn, filter?: ListFilter): void {
    this.columns.push(column);
    if (filter) {
      this.filters.push(filter);
    }
    this.picked.add(field.name);
  }
}

/**
 * Default list columns, picked in priority order until the cap is reached:
 * display field, status, one type enum, entity references, money, dates,
 * and a trailing last-updated column when room remains.
 */
export function buildList(
  entity: Entity,
  fields: readonly FieldDescriptor[]
): ListSchema {
  const picker = new ColumnPicker();

  const display = fields.find((field) => field.is_display_name);
  if (display) {
    picker.add(display, {
      field: display.name,
      label: display.label,
      width: '200px',
    });
  }

  const status = fields.find((field) => field.name === 'status');
  if (status && !picker.full && !picker.has(status.name)) {
    picker.add(
      status,
      {
        field: 'status',
        width: '100px',
        component: entity.stateMachine ? 'status_badge' : 'enum_badge',
      },
      {
        field: 'status',
        type: 'multi_enum',
        label: 'Status',
        enum_ref: status.enum_ref,
      }
    );
  }

  const typeEnum = fields.find(
    (field) =>
      field.type === 'enum' &&
      field.name !== 'status' &&
      field.name.includes('type') &&
      !picker.has(field.name)
  );
  if (typeEnum && !picker.full) {
    picker.add(
      typeEnum,
      {
        field: typeEnum.name,
        label: typeEnum.label,
        width: '140px',
        component: 'enum_badge',
      },
      {
        field: typeEnum.name,
        type: 'multi_enum',
        label: typeEnum.label,
        enum_ref: typeEnum.enum_ref,
      }
    );
  }

  for (const field of fields) {
    if (field.type !== 'entity_ref' || picker.has(field.name) || picker.full) {
      continue;
    }
    const refEntity = field.ref_entity ?? '';
    picker.add(
      field,
      {
        field: field.name,
        label: field.label,
        width: '180px',
        display_as: `${refEntity}.${field.ref_display || 'name'}`,
      },
      {
        field: field.name,
        type: 'entity_ref',
        label: field.label,
        ref_entity: refEntity,
      }
    );
  }

  for (const field of fields) {
    if (field.type !== 'money' || picker.has(field.name) || picker.full) {
      continue;
    }
    picker.add(
      field,
      {
        field: field.name,
        label: field.label,
        width: '120px',
        align: 'right',
        component: 'money',
      },
      { field: field.name, type: 'money_range', label: field.label }
    );
  }

  for (const field of fields) {
    const isDate =
      field.type === 'date' ||
      field.type === 'datetime' ||
      field.type === 'date_range';
    if (
      !isDate ||
      TIMESTAMP_FIELDS.has(field.name) ||
      picker.has(field.name) ||
      picker.full
    ) {
      continue;
    }
    // A range shows its end date.
    const column: ListColumn =
      field.type === 'date_range'
        ? { field: `${field.name}.end`, label: 'End Date', width: '120px' }
        : { field: field.name, label: field.label, width: '120px' };
    column.component = 'date';
    picker.add(field, column, {
      field: field.name,
      type: 'date_range',
      label: field.label,
    });
  }

  if (!picker.full) {
    picker.columns.push({
      field: 'updated_at',
      label: 'Last Updated',
      width: '140px',
      component: 'datetime',
    });
  }

  return {
    default_columns: picker.columns,
    max_default_columns: MAX_LIST_COLUMNS,
    filters: picker.filters,
    default_sort: { field: 'updated_at', direction: 'desc' },
    row_click_action: 'navigate_to_detail',
    bulk_actions: false,
  };
}
