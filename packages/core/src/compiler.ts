import {
  DEFAULT_LAYOUTS,
  DEFAULT_VALUE_TYPES,
  type LayoutCatalog,
} from './catalog/index.js';
import {
  buildDisplayFieldIndex,
  buildReferenceTables,
  resolveCrossReferences,
} from './classify/resolver.js';
import type { ValueTypeCatalog } from './classify/types.js';
import {
  loadOntology,
  parseOntologyDocument,
  validateOntologyDocument,
  type SourceFormat,
} from './ontology/loader.js';
import type { OntologyDocumentInput } from './ontology/schema.js';
import type { Ontology } from './ontology/types.js';
import { buildSchemaDocument } from './schema/assembler.js';
import type {
  EnumCatalog,
  EnumDefinition,
  SchemaDocument,
} from './schema/types.js';
import { compareKeys, sortedRecord } from './util.js';

export interface CompilerOptions {
  /** Structured value types the classifier recognises. */
  valueTypes?: ValueTypeCatalog;
  /** Form templates and conditional constraints per entity. */
  layouts?: LayoutCatalog;
}

export interface CompileResult {
  /** One document per entity, sorted by entity id. */
  schemas: SchemaDocument[];
  /** Shared enum catalog, sorted by identifier. */
  enums: EnumCatalog;
  /** Fields the second pass turned into entity references. */
  resolvedReferences: number;
}

/**
 * Compiles an ontology into per-entity UI schema documents.
 *
 * @example
 * ```typescript
 * const compiler = new OntologyCompiler();
 * const result = compiler.compileSource(source, 'yaml');
 * writeDocuments('gen/ui/schema', renderDocuments(result));
 * ```
 */
export class OntologyCompiler {
  private readonly valueTypes: ValueTypeCatalog;
  private readonly layouts: LayoutCatalog;

  constructor(options: CompilerOptions = {}) {
    this.valueTypes = options.valueTypes ?? DEFAULT_VALUE_TYPES;
    this.layouts = options.layouts ?? DEFAULT_LAYOUTS;
  }

  compileSource(content: string, format: SourceFormat): CompileResult {
    return this.compileOntology(
      loadOntology(parseOntologyDocument(content, format), {
        valueTypes: this.valueTypes,
      })
    );
  }

  /**
   * Compile a parsed document. It is validated first, so plain objects
   * (or the output of another parser) are accepted.
   */
  compile(document: OntologyDocumentInput): CompileResult {
    return this.compileOntology(
      loadOntology(validateOntologyDocument(document), {
        valueTypes: this.valueTypes,
      })
    );
  }

  private compileOntology(ontology: Ontology): CompileResult {
    const entities = [...ontology.entities.values()];

    const references = buildReferenceTables(entities, ontology.relationships);
    const resolvedReferences = resolveCrossReferences(entities, {
      definitions: ontology.definitions,
      catalog: this.valueTypes,
      references,
    });

    const enumCatalog = new Map<string, EnumDefinition>();
    const context = {
      ontology,
      layouts: this.layouts,
      displayFields: buildDisplayFieldIndex(entities),
      enumCatalog,
    };

    const schemas = entities
      .sort((a, b) => compareKeys(a.name, b.name))
      .map((entity) => buildSchemaDocument(entity, context))
      .sort((a, b) => compareKeys(a.entity, b.entity));

    return {
      schemas,
      enums: sortedRecord(enumCatalog),
      resolvedReferences,
    };
  }
}

export function compile(
  content: string,
  format: SourceFormat,
  options?: CompilerOptions
): CompileResult {
  return new OntologyCompiler(options).compileSource(content, format);
}
