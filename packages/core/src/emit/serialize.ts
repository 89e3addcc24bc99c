import type { CompileResult } from '../compiler.js';
import { EmissionError, errorMessage } from '../errors.js';
import { compareKeys } from '../util.js';

export const SCHEMA_SUFFIX = '.schema.json';

/** Sorts before every entity document. */
export const ENUM_CATALOG_FILE = `_enums${SCHEMA_SUFFIX}`;

export interface EmittedFile {
  /** File name relative to the output directory. */
  name: string;
  contents: string;
}

/**
 * Two-space JSON with a trailing newline. Keys keep insertion order, so
 * callers build maps in sorted order.
 */
export function serializeDocument(name: string, document: unknown): string {
  try {
    return `${JSON.stringify(document, null, 2)}\n`;
  } catch (error) {
    throw new EmissionError(
      `Failed to serialize ${name}: ${errorMessage(error)}`,
      name,
      { cause: error }
    );
  }
}

/**
 * Every file a compilation produces, in name order: the shared enum catalog
 * first, then one document per entity.
 */
export function renderDocuments(
  result: Pick<CompileResult, 'schemas' | 'enums'>
): EmittedFile[] {
  const files: EmittedFile[] = [
    {
      name: ENUM_CATALOG_FILE,
      contents: serializeDocument(ENUM_CATALOG_FILE, result.enums),
    },
  ];
  for (const schema of result.schemas) {
    const name = `${schema.entity}${SCHEMA_SUFFIX}`;
    files.push({ name, contents: serializeDocument(name, schema) });
  }
  return files.sort((a, b) => compareKeys(a.name, b.name));
}
