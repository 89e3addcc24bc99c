export {
  OntologyCompiler,
  compile,
  type CompilerOptions,
  type CompileResult,
} from './compiler.js';
export {
  OntoformError,
  LoadError,
  EmissionError,
  errorMessage,
} from './errors.js';

export {
  parseOntologyDocument,
  validateOntologyDocument,
  loadOntology,
  type SourceFormat,
} from './ontology/loader.js';
export {
  ontologyDocumentSchema,
  type OntologyDocument,
  type OntologyDocumentInput,
} from './ontology/schema.js';
export type {
  Cardinality,
  Entity,
  Ontology,
  Operation,
  OperationKind,
  Relationship,
  Service,
  StateMachine,
} from './ontology/types.js';

export {
  classifyField,
  resolveEntityReference,
} from './classify/field-classifier.js';
export {
  buildReferenceTables,
  resolveCrossReferences,
  buildDisplayFieldIndex,
} from './classify/resolver.js';
export {
  EMPTY_REFERENCE_TABLES,
  type ClassifiedField,
  type ClassifierContext,
  type FieldType,
  type MoneyVariant,
  type ReferenceTables,
  type ValueTypeCatalog,
} from './classify/types.js';

export * as introspect from './value/introspect.js';
export * as v from './value/builders.js';
export { valueTreeSchema } from './value/schema.js';
export type {
  Annotations,
  Expression,
  Literal,
  ValueKind,
  ValueTree,
} from './value/types.js';

export {
  DEFAULT_LAYOUTS,
  DEFAULT_VALUE_TYPES,
  parseLayoutCatalog,
  parseValueTypeCatalog,
  type ConstraintRule,
  type LayoutCatalog,
  type SectionTemplate,
} from './catalog/index.js';

export { buildSchemaDocument } from './schema/assembler.js';
export type * from './schema/types.js';

export { mergeEnum, registerEnum } from './emit/enum-catalog.js';
export {
  renderDocuments,
  serializeDocument,
  ENUM_CATALOG_FILE,
  SCHEMA_SUFFIX,
  type EmittedFile,
} from './emit/serialize.js';
export { writeDocuments, type WriteOptions } from './emit/writer.js';
export { checkDrift, hasDrift, type DriftReport } from './emit/drift.js';
