/** Machine-readable codes for fatal pipeline conditions. */
export type DatasetErrorCode =
  | 'PARSE_ERROR'
  | 'MISSING_INPUT'
  | 'EMPTY_RESULT'
  | 'SCHEMA_LOAD_ERROR'
  | 'UNSUPPORTED_FORMAT'
  | 'INVALID_CONFIG'
  | 'OUTPUT_COLLISION'
  | 'CANCELLED';

/**
 * Base class for every fatal condition the pipeline raises.
 *
 * Per-record rejections are not errors: they travel as `RejectedVerdict`
 * values and never reach this hierarchy.
 */
export class DatasetError extends Error {
  readonly code: DatasetErrorCode;

  constructor(code: DatasetErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A line is not valid JSON. Aborts the split: later line-to-record correspondence cannot be trusted. */
export class ParseError extends DatasetError {
  readonly fileName: string;
  readonly lineNumber: number;
  readonly detail: string;

  constructor(fileName: string, lineNumber: number, detail: string, options?: ErrorOptions) {
    super('PARSE_ERROR', `${fileName}:${String(lineNumber)}: invalid JSON (${detail})`, options);
    this.fileName = fileName;
    this.lineNumber = lineNumber;
    this.detail = detail;
  }
}

export class MissingInputError extends DatasetError {
  readonly filePath: string;

  constructor(filePath: string, reason = 'file does not exist', options?: ErrorOptions) {
    super('MISSING_INPUT', `Input ${filePath}: ${reason}`, options);
    this.filePath = filePath;
  }
}

export class EmptyResultError extends DatasetError {
  readonly split: string;
  readonly fileName: string;
  readonly rejectedCount: number;

  constructor(split: string, fileName: string, rejectedCount: number) {
    super(
      'EMPTY_RESULT',
      `Split '${split}' (${fileName}) has no valid records (${String(rejectedCount)} rejected)`,
    );
    this.split = split;
    this.fileName = fileName;
    this.rejectedCount = rejectedCount;
  }
}

export class SchemaLoadError extends DatasetError {
  readonly schemaPath: string;

  constructor(schemaPath: string, detail: string, options?: ErrorOptions) {
    super('SCHEMA_LOAD_ERROR', `Cannot load schema ${schemaPath}: ${detail}`, options);
    this.schemaPath = schemaPath;
  }
}

export class UnsupportedFormatError extends DatasetError {
  readonly filePath: string;

  constructor(filePath: string, mimeType: string) {
    super('UNSUPPORTED_FORMAT', `Input ${filePath} is not line-delimited JSON (detected ${mimeType})`);
    this.filePath = filePath;
  }
}

export class ConfigError extends DatasetError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[], options?: ErrorOptions) {
    super('INVALID_CONFIG', `Invalid pipeline configuration: ${issues.join('; ')}`, options);
    this.issues = issues;
  }
}

export class OutputCollisionError extends DatasetError {
  readonly outputPath: string;

  constructor(outputPath: string, splits: readonly string[]) {
    super('OUTPUT_COLLISION', `Splits ${splits.join(', ')} would all be written to ${outputPath}`);
    this.outputPath = outputPath;
  }
}

export class PipelineCancelledError extends DatasetError {
  constructor(split?: string) {
    super('CANCELLED', split ? `Pipeline cancelled while processing split '${split}'` : 'Pipeline cancelled');
  }
}

export function isDatasetError(error: unknown): error is DatasetError {
  return error instanceof DatasetError;
}
