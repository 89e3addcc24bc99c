import type { ZodError } from 'zod';

/**
 * Base class for every error the compiler raises on purpose. Classification
 * never throws; only loading and emission do.
 */
export abstract class OntoformError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * The ontology could not be read, parsed or validated. Raised before any
 * classification runs.
 */
export class LoadError extends OntoformError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'LOAD_ERROR', options);
  }
}

/**
 * A schema document could not be serialized or written. The run stops at the
 * first one.
 */
export class EmissionError extends OntoformError {
  constructor(
    message: string,
    public readonly file?: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'EMISSION_ERROR', options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** One `  - path: message` line per zod issue. */
export function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}
