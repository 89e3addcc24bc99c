/**
 * Helpers for building value trees in code.
 *
 * @example
 * ```typescript
 * const fields = {
 *   status: oneOf(['draft', 'active'], { default: 'draft' }),
 *   base_rent: ref('#PositiveMoney'),
 *   tags: list(str()),
 *   floor: and([int(), gte(0), lte(200)]),
 * };
 * ```
 */

import { inferKindFromExpression } from './introspect.js';
import {
  TEMPORAL_REFERENCE,
  type Comparator,
  type Literal,
  type ValueKind,
  type ValueTree,
} from './types.js';

export type NodeOptions = Omit<Partial<ValueTree>, 'kind' | 'expression'>;

function leaf(kind: ValueKind, options: NodeOptions = {}): ValueTree {
  return { kind, expression: { op: 'literal' }, ...options };
}

export function str(options?: NodeOptions): ValueTree {
  return leaf('string', options);
}

export function text(options: NodeOptions = {}): ValueTree {
  return leaf('string', {
    ...options,
    annotations: { ...options.annotations, text: true },
  });
}

export function int(options?: NodeOptions): ValueTree {
  return leaf('int', options);
}

export function float(options?: NodeOptions): ValueTree {
  return leaf('float', options);
}

export function bool(
  defaultValue?: boolean,
  options: NodeOptions = {}
): ValueTree {
  return leaf(
    'bool',
    defaultValue === undefined ? options : { ...options, default: defaultValue }
  );
}

export function time(options?: NodeOptions): ValueTree {
  return leaf('struct', { ...options, reference: TEMPORAL_REFERENCE });
}

export function struct(options?: NodeOptions): ValueTree {
  return leaf('struct', options);
}

export function top(options?: NodeOptions): ValueTree {
  return leaf('top', options);
}

export function lit(value: Exclude<Literal, null>): ValueTree {
  let kind: ValueKind;
  if (typeof value === 'string') {
    kind = 'string';
  } else if (typeof value === 'boolean') {
    kind = 'bool';
  } else {
    kind = Number.isInteger(value) ? 'int' : 'float';
  }
  return leaf(kind, { value });
}

export function ref(
  path: string,
  options: NodeOptions & { kind?: ValueKind } = {}
): ValueTree {
  const { kind = 'struct', ...rest } = options;
  return leaf(kind, { ...rest, reference: path });
}

export function list(element?: ValueTree, options: NodeOptions = {}): ValueTree {
  return leaf('list', element ? { ...options, element } : options);
}

/**
 * A disjunction. Bare strings become string literal arms.
 */
export function oneOf(
  values: Array<string | ValueTree>,
  options: NodeOptions = {}
): ValueTree {
  const args = values.map((value) =>
    typeof value === 'string' ? lit(value) : value
  );
  const node: ValueTree = {
    kind: 'bottom',
    expression: { op: 'or', args },
    ...options,
  };
  return { ...node, kind: inferKindFromExpression(node) };
}

/**
 * A conjunction. The node's kind is the first resolvable argument kind.
 */
export function and(args: ValueTree[], options: NodeOptions = {}): ValueTree {
  const node: ValueTree = {
    kind: 'bottom',
    expression: { op: 'and', args },
    ...options,
  };
  return { ...node, kind: inferKindFromExpression(node) };
}

function bound(comparator: Comparator, limit: number): ValueTree {
  return { kind: 'number', expression: { op: 'bound', comparator, limit } };
}

export const gte = (limit: number): ValueTree => bound('>=', limit);
export const gt = (limit: number): ValueTree => bound('>', limit);
export const lte = (limit: number): ValueTree => bound('<=', limit);
export const lt = (limit: number): ValueTree => bound('<', limit);

export function matches(pattern: string): ValueTree {
  return { kind: 'string', expression: { op: 'match', pattern } };
}
