import Ajv2020, { ErrorObject, ValidateFunction } from 'ajv/dist/2020';
import { SchemaRegistrationError, Violation, errorMessage } from '../core/errors';
import { isObject } from '../core/json';
import { registerFormats } from './formats';
import { SchemaDocument, loadSchemaDocuments } from './loader';

export type ValidationOutcome<T = unknown> =
  | { valid: true; value: T }
  | { valid: false; violations: Violation[] };

function describe(error: ErrorObject): string {
  const message = error.message ?? error.keyword;
  switch (error.keyword) {
    case 'additionalProperties':
      return `${message} (${String(error.params.additionalProperty)})`;
    case 'unevaluatedProperties':
      return `${message} (${String(error.params.unevaluatedProperty)})`;
    default:
      return message;
  }
}

export function toViolations(errors: readonly ErrorObject[] | null | undefined): Violation[] {
  return (errors ?? []).map((error) => ({
    location: error.instancePath,
    message: describe(error),
    keyword: error.keyword,
  }));
}

/**
 * Top-level keys a schema declares directly or through `$ref`
 */
interface DeclaredKeys {
  names: Set<string>;
  patterns: RegExp[];
}

function resolvePointer(document: unknown, pointer: string): unknown {
  let node = document;
  for (const raw of pointer.split('/').slice(1)) {
    if (!isObject(node)) return undefined;
    node = node[raw.replace(/~1/g, '/').replace(/~0/g, '~')];
  }
  return node;
}

function collectDeclared(
  schema: unknown,
  base: string,
  byId: ReadonlyMap<string, SchemaDocument>,
  into: DeclaredKeys,
  depth = 0
): void {
  if (!isObject(schema) || depth > 8) return;
  if (isObject(schema.properties)) {
    Object.keys(schema.properties).forEach((key) => into.names.add(key));
  }
  if (isObject(schema.patternProperties)) {
    Object.keys(schema.patternProperties).forEach((p) => into.patterns.push(new RegExp(p, 'u')));
  }
  if (typeof schema.$ref === 'string') {
    const target = new URL(schema.$ref, base);
    const pointer = decodeURIComponent(target.hash.slice(1));
    target.hash = '';
    const document = byId.get(target.href);
    if (document) {
      collectDeclared(resolvePointer(document, pointer), target.href, byId, into, depth + 1);
    }
  }
}

/**
 * When a `$ref`'d core fails, Ajv treats every key it declares as
 * unevaluated. Those keys are valid or carry their own violation.
 */
function isShadowed(error: ErrorObject, keys: DeclaredKeys | undefined): boolean {
  if (!keys || error.keyword !== 'unevaluatedProperties' || error.instancePath !== '') {
    return false;
  }
  const property = String(error.params.unevaluatedProperty);
  return keys.names.has(property) || keys.patterns.some((p) => p.test(property));
}

/**
 * Compiled set of metadata schemas. Registration happens once; afterwards
 * the registry is read-only and validation never mutates the document.
 */
export class SchemaRegistry {
  private ajv?: Ajv2020;
  private registering = false;
  private readonly declared = new Map<string, DeclaredKeys>();

  /**
   * Add and compile a complete set of cross-referencing schema documents.
   * Fails on malformed schemas and dangling `$ref`s.
   */
  register(documents: readonly SchemaDocument[]): void {
    if (this.ajv || this.registering) {
      throw new SchemaRegistrationError('Schemas have already been registered');
    }
    this.registering = true;
    try {
      const ajv = new Ajv2020({ allErrors: true, strict: false });
      registerFormats(ajv);
      for (const document of documents) {
        ajv.addSchema(document);
      }
      for (const document of documents) {
        ajv.getSchema(document.$id);
      }
      const byId = new Map(documents.map((d): [string, SchemaDocument] => [d.$id, d]));
      for (const document of documents) {
        if (document.unevaluatedProperties === false) {
          const keys: DeclaredKeys = { names: new Set(), patterns: [] };
          collectDeclared(document, document.$id, byId, keys);
          this.declared.set(document.$id, keys);
        }
      }
      this.ajv = ajv;
    } catch (error) {
      this.declared.clear();
      if (error instanceof SchemaRegistrationError) throw error;
      const reason = errorMessage(error);
      throw new SchemaRegistrationError(`Schema compilation failed: ${reason}`);
    } finally {
      this.registering = false;
    }
  }

  get registered(): boolean {
    return this.ajv !== undefined;
  }

  has(id: string): boolean {
    return this.ajv?.getSchema(id) !== undefined;
  }

  /**
   * Evaluate a document against a registered schema
   */
  validate<T = unknown>(id: string, document: unknown): ValidationOutcome<T> {
    if (!this.ajv) {
      throw new SchemaRegistrationError('No schemas registered');
    }
    const validateFn: ValidateFunction<T> | undefined = this.ajv.getSchema<T>(id);
    if (!validateFn) {
      throw new RangeError(`Unknown schema ${id}`);
    }
    if ('$async' in validateFn) {
      throw new SchemaRegistrationError(`Schema ${id} is asynchronous`);
    }
    if (validateFn(document)) {
      return { valid: true, value: document };
    }
    const keys = this.declared.get(id);
    const errors = (validateFn.errors ?? []).filter((error) => !isShadowed(error, keys));
    return { valid: false, violations: toViolations(errors) };
  }
}

let defaultRegistry: SchemaRegistry | undefined;

/**
 * Build a registry from the schema documents in a directory
 */
export function createRegistry(schemaDir?: string): SchemaRegistry {
  const registry = new SchemaRegistry();
  registry.register(loadSchemaDocuments(schemaDir));
  return registry;
}

/**
 * Process-wide registry of the bundled schemas, compiled on first use
 */
export function getDefaultRegistry(): SchemaRegistry {
  if (!defaultRegistry) {
    defaultRegistry = createRegistry();
  }
  return defaultRegistry;
}
