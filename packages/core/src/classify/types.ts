import type {
  Annotations,
  Definitions,
  Literal,
  NumericBounds,
  ValueTree,
} from '../value/types.js';

/**
 * Semantic field types understood by the rendering layer.
 */
export type FieldType =
  | 'string'
  | 'text'
  | 'int'
  | 'float'
  | 'bool'
  | 'date'
  | 'datetime'
  | 'enum'
  | 'money'
  | 'address'
  | 'date_range'
  | 'contact_method'
  | 'string_list'
  | 'embedded_array'
  | 'embedded_object'
  | 'entity_ref'
  | 'entity_ref_list';

export type MoneyVariant = 'any' | 'non_negative' | 'positive';

export interface ClassifiedField {
  name: string;
  optional: boolean;
  type: FieldType;
  value: ValueTree;
  objectRef?: string;
  refEntity?: string;
  moneyVariant?: MoneyVariant;
  enumValues?: string[];
  bounds?: NumericBounds;
  pattern?: string;
  default?: Literal;
  isList?: boolean;
  isDisplayName: boolean;
  annotations: Annotations;
}

/**
 * Global lookup tables for `_id`/`_ids` fields. Empty during the first
 * classification pass; complete once every entity and edge is loaded.
 */
export interface ReferenceTables {
  /** Snake-case entity names. */
  entityNames: ReadonlySet<string>;
  /** Edge name to the snake-case name of the edge's target entity. */
  edgeTargets: ReadonlyMap<string, string>;
}

export const EMPTY_REFERENCE_TABLES: ReferenceTables = {
  entityNames: new Set(),
  edgeTargets: new Map(),
};

/**
 * Structured value types the classifier recognises by reference name.
 */
export interface ValueTypeCatalog {
  /** Reference (`#Address`) to type name (`Address`). */
  valueTypes: Readonly<Record<string, string>>;
  /** Reference (`#PositiveMoney`) to money variant. */
  moneyTypes: Readonly<Record<string, MoneyVariant>>;
}

export interface ClassifierContext {
  definitions: Definitions;
  catalog: ValueTypeCatalog;
  references: ReferenceTables;
}
