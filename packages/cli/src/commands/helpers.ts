import * as fs from 'fs';
import * as path from 'path';
import {
  errorMessage,
  LoadError,
  OntoformError,
  parseLayoutCatalog,
  type LayoutCatalog,
  type SourceFormat,
} from '@ontoform/core';

export interface CommandOutput {
  log: (message: string) => void;
  error: (message: string) => void;
}

export interface OntologySource {
  content: string;
  format: SourceFormat;
}

/**
 * Read an ontology file. `.json` files are parsed as JSON, everything else
 * as YAML.
 */
export function readOntologyFile(file: string): OntologySource {
  let content: string;
  try {
    content = fs.readFileSync(file, 'utf-8');
  } catch (error) {
    throw new LoadError(
      `Failed to read ontology ${file}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
  const format = path.extname(file).toLowerCase() === '.json' ? 'json' : 'yaml';
  return { content, format };
}

/**
 * Read a `--layouts` file. Returns undefined when no file was given, so the
 * compiler falls back to its bundled layouts.
 */
export function readLayouts(file: string | undefined): LayoutCatalog | undefined {
  if (file === undefined) {
    return undefined;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new LoadError(
      `Failed to read layouts ${file}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
  return parseLayoutCatalog(raw);
}

/**
 * Print a compiler error and return the exit status. Anything that is not
 * an OntoformError is a bug and propagates.
 */
export function reportError(error: unknown, output: CommandOutput): number {
  if (error instanceof OntoformError) {
    output.error(`Error: ${error.message}`);
    return 1;
  }
  throw error;
}
