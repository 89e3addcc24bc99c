import {
  TEMPORAL_REFERENCE,
  type Definitions,
  type NumericBounds,
  type ValueKind,
  type ValueTree,
} from './types.js';

// ============================================
// REFERENCES
// ============================================

/**
 * The definition name a reference path points at: the last path segment,
 * so `types.#Money` and `#Money` both name `#Money`.
 */
export function referenceName(path: string): string {
  const segments = path.split('.');
  return segments[segments.length - 1];
}

/**
 * Find the nearest named definition a value refers to.
 *
 * Walks conjunction and disjunction arguments in order and returns the first
 * reference found. Temporal values resolve to `TEMPORAL_REFERENCE`.
 */
export function findReference(value: ValueTree): string | undefined {
  if (value.kind === 'time') {
    return TEMPORAL_REFERENCE;
  }

  if (value.reference) {
    if (value.reference === TEMPORAL_REFERENCE || value.reference === 'Time') {
      return TEMPORAL_REFERENCE;
    }
    return referenceName(value.reference);
  }

  const { expression } = value;
  if (expression.op === 'and' || expression.op === 'or') {
    for (const arg of expression.args) {
      const ref = findReference(arg);
      if (ref) {
        return ref;
      }
    }
  }

  return undefined;
}

/**
 * Resolve a value's own reference against the definitions table.
 */
export function dereference(
  value: ValueTree,
  definitions: Definitions
): ValueTree | undefined {
  if (!value.reference) {
    return undefined;
  }
  return (
    definitions.get(value.reference) ??
    definitions.get(referenceName(value.reference))
  );
}

export function isTime(value: ValueTree): boolean {
  return findReference(value) === TEMPORAL_REFERENCE;
}

// ============================================
// KINDS
// ============================================

/**
 * Infer a kind from the expression when the node itself is unresolved.
 */
export function inferKindFromExpression(value: ValueTree): ValueKind {
  const { expression } = value;

  if (expression.op === 'and') {
    for (const arg of expression.args) {
      if (arg.kind !== 'bottom') {
        return arg.kind;
      }
      const inferred = inferKindFromExpression(arg);
      if (inferred !== 'bottom') {
        return inferred;
      }
    }
  }

  if (expression.op === 'or') {
    for (const arg of expression.args) {
      if (arg.kind !== 'bottom') {
        return arg.kind;
      }
    }
  }

  return 'bottom';
}

export function effectiveKind(value: ValueTree): ValueKind {
  return value.kind !== 'bottom' ? value.kind : inferKindFromExpression(value);
}

/**
 * A value is list-shaped when its own kind is list, or when a list
 * constraint sits directly inside its conjunction.
 */
export function isList(value: ValueTree): boolean {
  if (value.kind === 'list') {
    return true;
  }
  const { expression } = value;
  if (expression.op === 'and') {
    return expression.args.some((arg) => arg.kind === 'list');
  }
  return false;
}

/**
 * Find the element tree of a list-shaped value. Element constraints can be
 * declared on the node itself or on a list argument of its conjunction.
 */
export function inferListElement(value: ValueTree): ValueTree | undefined {
  if (value.element) {
    return value.element;
  }

  const { expression } = value;
  if (expression.op === 'and') {
    for (const arg of expression.args) {
      const listShaped =
        arg.kind === 'list' || inferKindFromExpression(arg) === 'list';
      if (listShaped && arg.element) {
        return arg.element;
      }
    }
  }

  return undefined;
}

// ============================================
// ENUMS
// ============================================

/**
 * Locate the disjunction behind a value: the value itself, its dereferenced
 * definition, or a disjunction one level down in a conjunction
 * (`string & ("a" | "b")`).
 */
function findDisjunction(
  value: ValueTree,
  definitions: Definitions
): ValueTree[] | undefined {
  const { expression } = value;
  if (expression.op === 'or') {
    return expression.args;
  }

  const definition = dereference(value, definitions);
  if (definition?.expression.op === 'or') {
    return definition.expression.args;
  }

  if (expression.op === 'and') {
    for (const arg of expression.args) {
      if (arg.expression.op === 'or') {
        return arg.expression.args;
      }
    }
  }

  return undefined;
}

function stringArm(arm: ValueTree): string | undefined {
  if (typeof arm.value === 'string') {
    return arm.value;
  }
  if (typeof arm.default === 'string') {
    return arm.default;
  }
  return undefined;
}

export function isEnum(value: ValueTree, definitions: Definitions): boolean {
  const arms = findDisjunction(value, definitions);
  if (!arms || arms.length < 2) {
    return false;
  }
  return arms.every(
    (arm) => effectiveKind(arm) === 'string' && stringArm(arm) !== undefined
  );
}

/**
 * Enum alternatives in declaration order.
 */
export function extractEnumValues(
  value: ValueTree,
  definitions: Definitions
): string[] {
  const arms = findDisjunction(value, definitions) ?? [];
  const values: string[] = [];
  for (const arm of arms) {
    const literal = stringArm(arm);
    if (literal !== undefined) {
      values.push(literal);
    }
  }
  return values;
}

// ============================================
// CONSTRAINTS
// ============================================

/**
 * Fold comparison constraints into a lower/upper pair. Later arguments of a
 * conjunction win over earlier ones.
 */
export function extractNumericBounds(value: ValueTree): NumericBounds {
  const bounds: NumericBounds = { ...value.bounds };
  const { expression } = value;

  switch (expression.op) {
    case 'and':
      for (const arg of expression.args) {
        const argBounds = extractNumericBounds(arg);
        if (argBounds.lower !== undefined) {
          bounds.lower = argBounds.lower;
        }
        if (argBounds.upper !== undefined) {
          bounds.upper = argBounds.upper;
        }
      }
      break;
    case 'bound':
      if (expression.comparator === '>=' || expression.comparator === '>') {
        bounds.lower = expression.limit;
      } else {
        bounds.upper = expression.limit;
      }
      break;
  }

  return bounds;
}

export function extractPattern(value: ValueTree): string | undefined {
  if (value.pattern) {
    return value.pattern;
  }

  const { expression } = value;
  if (expression.op === 'match') {
    return expression.pattern;
  }
  if (expression.op === 'and') {
    for (const arg of expression.args) {
      const pattern = extractPattern(arg);
      if (pattern) {
        return pattern;
      }
    }
  }

  return undefined;
}
