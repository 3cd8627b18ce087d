import * as fs from 'fs';
import * as path from 'path';
import { resolveResource } from '../core/resources';
import { SchemaRegistrationError, errorMessage } from '../core/errors';
import { Generation } from '../types';

export interface SchemaDocument {
  $id: string;
  [key: string]: unknown;
}

export const SCHEMA_BASE = 'https://pgxn.org/meta';

/**
 * Schema identifier for a named schema of one generation
 */
export function schemaId(generation: Generation, name: string): string {
  return `${SCHEMA_BASE}/v${generation}/${name}.schema.json`;
}

function isSchemaDocument(value: unknown): value is SchemaDocument {
  return (
    typeof value === 'object' &&
    value !== null &&
    '$id' in value &&
    typeof value.$id === 'string'
  );
}

/**
 * Read every `*.schema.json` below `v1/` and `v2/` of a schema directory
 */
export function loadSchemaDocuments(schemaDir?: string): SchemaDocument[] {
  const root = schemaDir ?? resolveResource('schema');
  const documents: SchemaDocument[] = [];

  for (const generation of [Generation.Legacy, Generation.Current]) {
    const dir = path.join(root, `v${generation}`);
    if (!fs.existsSync(dir)) {
      throw new SchemaRegistrationError(`Schema directory ${dir} does not exist`);
    }
    const files = fs
      .readdirSync(dir)
      .filter((f) => f.endsWith('.schema.json'))
      .sort();
    for (const file of files) {
      const fullPath = path.join(dir, file);
      let parsed: unknown;
      try {
        parsed = JSON.parse(fs.readFileSync(fullPath, 'utf-8'));
      } catch (error) {
        const reason = errorMessage(error);
        throw new SchemaRegistrationError(`Cannot parse ${fullPath}: ${reason}`);
      }
      if (!isSchemaDocument(parsed)) {
        throw new SchemaRegistrationError(`${fullPath} has no $id`);
      }
      documents.push(parsed);
    }
  }

  return documents;
}
