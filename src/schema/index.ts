export { SchemaRegistry, ValidationOutcome, createRegistry, getDefaultRegistry, toViolations } from './registry';
export { SchemaDocument, SCHEMA_BASE, schemaId, loadSchemaDocuments } from './loader';
export { registerFormats } from './formats';
