/**
 * Schema documents: the per-entity output consumed by the rendering layer.
 *
 * Keys are snake_case because the documents are a JSON wire format shared
 * with generators outside this repository. Optional keys are omitted from the
 * serialized document when unset.
 */

import type { FieldType, MoneyVariant } from '../classify/types.js';
import type { Cardinality } from '../ontology/types.js';
import type { Literal } from '../value/types.js';

// ============================================
// SHARED
// ============================================

export type ConditionOperator = 'eq' | 'in' | 'truthy';

/**
 * A condition over another field's value, used for section visibility,
 * section requirement and cross-field validation.
 */
export interface VisibilityRule {
  field: string;
  operator: ConditionOperator;
  value?: Literal;
  values?: string[];
}

export interface EnumValue {
  value: string;
  label: string;
}

export interface EnumGroup {
  label: string;
  values: string[];
}

export interface EnumDefinition {
  values: EnumValue[];
  groups?: EnumGroup[];
}

// ============================================
// FIELDS
// ============================================

export type FilterType = 'money_range' | 'entity_ref' | 'date_range';

export interface FieldDescriptor {
  name: string;
  type: FieldType;
  enum_ref?: string;
  object_ref?: string;
  ref_entity?: string;
  ref_display?: string;
  money_variant?: MoneyVariant;
  required: boolean;
  default: Literal;
  immutable?: boolean;
  conditionally_required?: boolean;
  label: string;
  controls_visibility?: boolean;
  show_in_create: boolean;
  show_in_update: boolean;
  show_in_list: boolean;
  show_in_detail: boolean;
  sortable: boolean;
  filterable: boolean;
  filter_type?: FilterType;
  min_items?: number;
  min?: number;
  max?: number;
  pattern?: string;
  is_display_name?: boolean;
  is_sensitive?: boolean;
  is_pii?: boolean;
  is_computed?: boolean;
  is_deprecated?: boolean;
  deprecated_reason?: string;
  deprecated_since?: string;
}

// ============================================
// FORM
// ============================================

export interface FormSection {
  id: string;
  title: string;
  collapsible: boolean;
  initially_collapsed?: boolean;
  fields?: string[];
  embedded_object?: string;
  embedded_array?: string;
  visible_when?: VisibilityRule;
  required_when?: VisibilityRule;
}

export interface FormSchema {
  sections: FormSection[];
  field_order_rule: 'required_first';
}

// ============================================
// DETAIL
// ============================================

export type RelatedDisplay = 'table' | 'list';

export interface DetailHeader {
  title_template: string;
  status_field?: string;
  actions: boolean;
}

export interface DetailSection {
  id: string;
  title: string;
  layout: 'grid_2col';
  fields?: string[];
  embedded_object?: string;
  embedded_array?: string;
  display_mode?: 'readonly';
  visible_when?: VisibilityRule;
}

export interface RelatedSection {
  title: string;
  relationship: string;
  entity: string;
  display: RelatedDisplay;
}

export interface DetailSchema {
  header: DetailHeader;
  sections: DetailSection[];
  related_sections?: RelatedSection[];
}

// ============================================
// LIST
// ============================================

export interface ListColumn {
  field: string;
  label?: string;
  width: string;
  align?: 'right';
  display_as?: string;
  component?: string;
}

export type ListFilterType = 'multi_enum' | 'entity_ref' | 'money_range' | 'date_range';

export interface ListFilter {
  field: string;
  type: ListFilterType;
  label?: string;
  enum_ref?: string;
  ref_entity?: string;
}

export interface ListSchema {
  default_columns: ListColumn[];
  max_default_columns: number;
  filters: ListFilter[];
  default_sort: { field: string; direction: 'asc' | 'desc' };
  row_click_action: 'navigate_to_detail';
  bulk_actions: boolean;
}

// ============================================
// STATUS & STATE MACHINE
// ============================================

export type StatusColor = 'success' | 'error' | 'warning' | 'surface' | 'secondary';

export interface StatusSchema {
  field: string;
  color_mapping: Record<string, StatusColor>;
}

export type TransitionVariant = 'danger' | 'primary' | 'secondary';

export interface TransitionDescriptor {
  target: string;
  label: string;
  variant: TransitionVariant;
  confirm: boolean;
  confirm_message?: string;
  api_endpoint: string;
  requires_fields?: string[];
}

export interface StateMachineSchema {
  transitions: Record<string, TransitionDescriptor[]>;
}

// ============================================
// RELATIONSHIPS, VALIDATION, API
// ============================================

export interface RelationshipDescriptor {
  name: string;
  target_entity: string;
  cardinality: Cardinality;
  display_in_detail: boolean;
  display_mode: RelatedDisplay;
}

export type FieldRuleKind = 'required' | 'min' | 'max' | 'pattern' | 'min_length';

export interface FieldRule {
  field: string;
  rule: FieldRuleKind;
  value?: number | string;
}

export interface CrossFieldRule {
  id: string;
  description: string;
  condition: VisibilityRule;
  then: FieldRule;
  message: string;
}

export interface ValidationSchema {
  field_rules: FieldRule[];
  cross_field_rules: CrossFieldRule[];
}

export interface ApiEndpoint {
  method: 'GET' | 'POST' | 'PATCH' | 'DELETE';
  path: string;
}

export interface ApiSchema {
  base_path: string;
  operations: Record<string, ApiEndpoint>;
  transitions?: Record<string, ApiEndpoint>;
}

// ============================================
// DOCUMENT
// ============================================

export interface SchemaDocument {
  entity: string;
  display_name: string;
  display_name_plural: string;
  primary_display_field: string;
  primary_display_template: string;
  fields: FieldDescriptor[];
  enums: Record<string, EnumDefinition>;
  form: FormSchema;
  detail: DetailSchema;
  list: ListSchema;
  status?: StatusSchema;
  state_machine?: StateMachineSchema;
  relationships: RelationshipDescriptor[];
  validation: ValidationSchema;
  api: ApiSchema;
}

export type EnumCatalog = Record<string, EnumDefinition>;
