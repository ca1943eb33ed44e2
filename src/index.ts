// Main entry point
export { DatasetPipeline, createValidator } from './DatasetPipeline.js';
export type { DatasetPipelineConfig, DatasetPipelineOverrides } from './DatasetPipeline.js';

// Configuration
export { pipelineConfigSchema, parsePipelineConfig, loadPipelineConfig } from './config/PipelineConfig.js';
export type { PipelineConfig, PipelineConfigInput, ValidationConfig } from './config/PipelineConfig.js';

// Domain model
export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  DatasetRecord,
  NumberedRecord,
  ChatMessage,
  ChatRecord,
} from './domain/model/Record.js';
export { isJsonObject } from './domain/model/Record.js';
export type { ValidationVerdict, AcceptedVerdict, RejectedVerdict } from './domain/model/ValidationVerdict.js';
export { accepted, rejected, isAccepted } from './domain/model/ValidationVerdict.js';
export type {
  SplitName,
  SplitResult,
  SplitSummary,
  SplitReport,
  RejectionDiagnostic,
} from './domain/model/SplitResult.js';
export { summarizeSplit, isEmptyResult } from './domain/model/SplitResult.js';
export { PipelineStatus } from './domain/model/PipelineStatus.js';

// Errors
export {
  DatasetError,
  ParseError,
  MissingInputError,
  EmptyResultError,
  SchemaLoadError,
  UnsupportedFormatError,
  ConfigError,
  OutputCollisionError,
  PipelineCancelledError,
  isDatasetError,
} from './domain/errors/DatasetErrors.js';
export type { DatasetErrorCode } from './domain/errors/DatasetErrors.js';

// Domain services
export { StructuralValidator, REQUIRED_ROLES } from './domain/services/StructuralValidator.js';
export type { StructuralValidatorOptions } from './domain/services/StructuralValidator.js';
export { deriveOutputPath, DEFAULT_OUTPUT_NAMING } from './domain/services/OutputNaming.js';
export type { OutputNaming } from './domain/services/OutputNaming.js';

// Application
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorHook } from './application/EventBus.js';
export { PIPELINE_SPLITS } from './application/PipelineContext.js';
export type { PipelineSplit, SplitInput, SplitConcurrency } from './application/PipelineContext.js';
export type { PipelineResult } from './application/usecases/RunPipeline.js';
export type { ProcessSplitOptions } from './application/usecases/ProcessSplit.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { RecordValidator, EmptyResultPolicy } from './domain/ports/RecordValidator.js';
export type { RecordWriter, WriteReceipt } from './domain/ports/RecordWriter.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  PipelineStartedEvent,
  PipelineCompletedEvent,
  PipelineFailedEvent,
  InputUnrecognizedFormatEvent,
  SplitStartedEvent,
  RecordRejectedEvent,
  SplitValidatedEvent,
  SplitEmptyEvent,
  SplitWrittenEvent,
  SplitFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in)
export { JsonlReader } from './infrastructure/parsers/JsonlReader.js';
export { SchemaValidator } from './infrastructure/validators/SchemaValidator.js';
export type { SchemaValidatorOptions } from './infrastructure/validators/SchemaValidator.js';
export { loadSchemaDocument } from './infrastructure/validators/SchemaDocument.js';
export type { SchemaDocument } from './infrastructure/validators/SchemaDocument.js';
export { JsonlFileWriter } from './infrastructure/writers/JsonlFileWriter.js';
export type { JsonlFileWriterOptions } from './infrastructure/writers/JsonlFileWriter.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export type { BufferSourceOptions } from './infrastructure/sources/BufferSource.js';
export { detectMimeType, isLineDelimitedJson, NDJSON_MIME_TYPE } from './infrastructure/detectMimeType.js';
export { createLogger, resolveLogLevel } from './infrastructure/logging/createLogger.js';
export type { CreateLoggerOptions } from './infrastructure/logging/createLogger.js';
export { attachEventLogger, logEvent } from './infrastructure/logging/attachEventLogger.js';
export type { EventSource } from './infrastructure/logging/attachEventLogger.js';
