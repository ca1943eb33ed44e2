import Ajv2020 from 'ajv/dist/2020.js';
import addFormats from 'ajv-formats';
import type { ErrorObject, ValidateFunction } from 'ajv';
import type { DatasetRecord } from '../../domain/model/Record.js';
import type { ValidationVerdict } from '../../domain/model/ValidationVerdict.js';
import type { EmptyResultPolicy, RecordValidator } from '../../domain/ports/RecordValidator.js';
import { accepted, rejected } from '../../domain/model/ValidationVerdict.js';
import { SchemaLoadError } from '../../domain/errors/DatasetErrors.js';
import type { SchemaDocument } from './SchemaDocument.js';

export interface SchemaValidatorOptions {
  /** Enable `format` keyword checks (`email`, `date-time`, ...). Default: `true`. */
  readonly formats?: boolean;
  /** Where the schema came from, for error messages. Default: `'<inline schema>'`. */
  readonly source?: string;
}

/**
 * Validates records against a JSON Schema (Draft 2020-12) with Ajv.
 *
 * The schema is compiled once in the constructor. Evaluation stops at the
 * first violation, which becomes the rejection reason. An empty split is
 * reported but not fatal: callers cleaning a dataset iteratively may expect it.
 */
export class SchemaValidator implements RecordValidator {
  readonly name = 'schema';
  readonly emptyResultPolicy: EmptyResultPolicy = 'warn';
  private readonly check: ValidateFunction;

  constructor(schema: SchemaDocument, options?: SchemaValidatorOptions) {
    const formats = options?.formats ?? true;
    const ajv = new Ajv2020({ allErrors: false, strict: false, validateFormats: formats });
    if (formats) {
      addFormats(ajv);
    }

    try {
      this.check = ajv.compile(schema);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new SchemaLoadError(options?.source ?? '<inline schema>', detail, { cause: error });
    }
  }

  validate(record: DatasetRecord, lineNumber: number): ValidationVerdict {
    if (this.check(record)) {
      return accepted(record);
    }
    const first = this.check.errors?.[0];
    return rejected(lineNumber, first ? formatError(first) : 'does not match schema');
  }
}

function formatError(error: ErrorObject): string {
  let message = error.message ?? `failed '${error.keyword}'`;
  const extra: unknown = error.params['additionalProperty'];
  if (error.keyword === 'additionalProperties' && typeof extra === 'string') {
    message += ` '${extra}'`;
  }
  return error.instancePath === '' ? message : `${error.instancePath} ${message}`;
}
