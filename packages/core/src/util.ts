/**
 * Own-property lookup for records keyed by ontology data, so a key such as
 * `constructor` never resolves to an inherited member.
 */
export function lookup<V>(
  record: Readonly<Record<string, V>>,
  key: string
): V | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * Copy of a map's entries as a plain object, keys in sorted order.
 */
export function sortedRecord<V>(
  entries: Iterable<[string, V]>
): Record<string, V> {
  const sorted = [...entries].sort(([a], [b]) => compareKeys(a, b));
  const record: Record<string, V> = {};
  for (const [key, value] of sorted) {
    record[key] = value;
  }
  return record;
}

/**
 * Code-unit ordering, independent of locale.
 */
export function compareKeys(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * First occurrence of each item, order kept.
 */
export function dedupe<T>(items: Iterable<T>): T[] {
  return [...new Set(items)];
}
