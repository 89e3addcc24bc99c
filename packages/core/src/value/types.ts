/**
 * Value trees describe the type and constraints of a single ontology field.
 *
 * A tree is produced once by the loader and never mutated afterwards. Every
 * node carries a kind, the expression it was written as, and whatever the
 * loader could resolve statically (reference, default, literal value).
 */

export type ValueKind =
  | 'string'
  | 'int'
  | 'float'
  | 'number'
  | 'bool'
  | 'time'
  | 'struct'
  | 'list'
  | 'top'
  | 'bottom';

export type Literal = string | number | boolean | null;

export type Comparator = '>=' | '>' | '<=' | '<';

export type Expression =
  | { op: 'literal' }
  | { op: 'and'; args: ValueTree[] }
  | { op: 'or'; args: ValueTree[] }
  | { op: 'bound'; comparator: Comparator; limit: number }
  | { op: 'match'; pattern: string };

export interface NumericBounds {
  lower?: number;
  upper?: number;
}

export interface Deprecation {
  reason?: string;
  since?: string;
}

/**
 * Field-level annotations (`@display()`, `@text()`, ... in the ontology source).
 */
export interface Annotations {
  display?: boolean;
  text?: boolean;
  immutable?: boolean;
  computed?: boolean;
  sensitive?: boolean;
  pii?: boolean;
  deprecated?: Deprecation;
}

export interface ValueTree {
  kind: ValueKind;
  expression: Expression;
  /** Concrete literal, set on literal arms such as enum alternatives. */
  value?: Literal;
  /** Symbolic path to a named definition, e.g. `#Money` or `time.Time`. */
  reference?: string;
  default?: Literal;
  /** Element constraint of a list-shaped node. */
  element?: ValueTree;
  bounds?: NumericBounds;
  pattern?: string;
  annotations?: Annotations;
}

/**
 * Named definitions (`#USState`, `#Money`, ...) that references resolve against.
 */
export type Definitions = ReadonlyMap<string, ValueTree>;

export const TEMPORAL_REFERENCE = 'time.Time';
