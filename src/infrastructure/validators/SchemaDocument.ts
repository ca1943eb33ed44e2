import { readFile } from 'node:fs/promises';
import type { SchemaObject } from 'ajv';
import { SchemaLoadError } from '../../domain/errors/DatasetErrors.js';

/** A JSON Schema (Draft 2020-12) document. Loaded once per run and never mutated. */
export type SchemaDocument = SchemaObject | boolean;

function isSchemaDocument(value: unknown): value is SchemaDocument {
  return typeof value === 'boolean' || (typeof value === 'object' && value !== null && !Array.isArray(value));
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Read and parse a schema file. Every failure surfaces as `SchemaLoadError`. */
export async function loadSchemaDocument(schemaPath: string): Promise<SchemaDocument> {
  let text: string;
  try {
    text = await readFile(schemaPath, 'utf-8');
  } catch (error) {
    const detail = isMissingFile(error) ? 'file does not exist' : String(error);
    throw new SchemaLoadError(schemaPath, detail, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new SchemaLoadError(schemaPath, `invalid JSON (${detail})`, { cause: error });
  }

  if (!isSchemaDocument(parsed)) {
    throw new SchemaLoadError(schemaPath, 'a schema must be a JSON object or boolean');
  }
  return typeof parsed === 'boolean' ? parsed : Object.freeze(parsed);
}
