import type { Logger } from 'pino';
import type { DomainEvent, EventType, EventPayload } from './domain/events/DomainEvents.js';
import type { EmptyResultPolicy, RecordValidator } from './domain/ports/RecordValidator.js';
import type { RecordWriter } from './domain/ports/RecordWriter.js';
import type { OutputNaming } from './domain/services/OutputNaming.js';
import type { PipelineStatus } from './domain/model/PipelineStatus.js';
import type { PipelineSplit, SplitConcurrency, SplitInput } from './application/PipelineContext.js';
import type { PipelineResult } from './application/usecases/RunPipeline.js';
import type { ValidationConfig } from './config/PipelineConfig.js';
import { DEFAULT_OUTPUT_NAMING } from './domain/services/OutputNaming.js';
import { StructuralValidator } from './domain/services/StructuralValidator.js';
import { ConfigError } from './domain/errors/DatasetErrors.js';
import { EventBus } from './application/EventBus.js';
import { PipelineContext } from './application/PipelineContext.js';
import { RunPipeline } from './application/usecases/RunPipeline.js';
import { parsePipelineConfig } from './config/PipelineConfig.js';
import { SchemaValidator } from './infrastructure/validators/SchemaValidator.js';
import { loadSchemaDocument } from './infrastructure/validators/SchemaDocument.js';
import { JsonlFileWriter } from './infrastructure/writers/JsonlFileWriter.js';
import { attachEventLogger } from './infrastructure/logging/attachEventLogger.js';

export interface DatasetPipelineConfig {
  readonly train: SplitInput;
  readonly eval: SplitInput;
  /** Validation strategy. Fixed for the lifetime of the pipeline. */
  readonly validator: RecordValidator;
  /** How output files are named. Default: `{ suffix: 'valid' }` next to each input. */
  readonly output?: OutputNaming;
  /** Fail on inputs without a `.jsonl`/`.ndjson`/`.jsonlines` extension instead of warning. Default: `false`. */
  readonly strictFormat?: boolean;
  /** Run the two splits one after the other or at the same time. Default: `'sequential'`. */
  readonly concurrency?: SplitConcurrency;
  /** Override the validator's own policy for splits with no accepted records. */
  readonly emptyResult?: EmptyResultPolicy;
  /** Default: `JsonlFileWriter`. */
  readonly writer?: RecordWriter;
  /** When set, every domain event is logged through it. */
  readonly logger?: Logger;
}

/** Collaborators that cannot come from a JSON configuration file. */
export interface DatasetPipelineOverrides {
  readonly writer?: RecordWriter;
  readonly logger?: Logger;
}

/**
 * Validate, filter and cap the train/eval splits of a JSONL fine-tuning dataset.
 *
 * Each pipeline instance runs once.
 *
 * @example
 * ```ts
 * const pipeline = new DatasetPipeline({
 *   train: { path: 'data/train.jsonl', maxRecords: 1000 },
 *   eval: { path: 'data/eval.jsonl' },
 *   validator: new StructuralValidator(),
 * });
 * pipeline.on('record:rejected', (e) => console.warn(e.lineNumber, e.reason));
 * const { outputs } = await pipeline.run();
 * ```
 */
export class DatasetPipeline {
  private readonly ctx: PipelineContext;

  constructor(config: DatasetPipelineConfig) {
    assertSplitInput('train', config.train);
    assertSplitInput('eval', config.eval);

    const logger = config.logger;
    const eventBus = new EventBus((error, event) => {
      logger?.error({ err: error, event: event.type }, 'Event handler threw');
    });

    this.ctx = new PipelineContext({
      eventBus,
      validator: config.validator,
      writer: config.writer ?? new JsonlFileWriter(),
      splits: { train: config.train, eval: config.eval },
      naming: config.output ?? DEFAULT_OUTPUT_NAMING,
      strictFormat: config.strictFormat ?? false,
      concurrency: config.concurrency ?? 'sequential',
      emptyResultPolicy: config.emptyResult,
    });

    if (logger) {
      attachEventLogger(eventBus, logger);
    }
  }

  /**
   * Build a pipeline from a declarative configuration (see `pipelineConfigSchema`).
   *
   * Loads and compiles the schema document up front when the strategy is
   * `'schema'`, so a bad schema fails here rather than mid-run.
   */
  static async fromConfig(raw: unknown, overrides?: DatasetPipelineOverrides): Promise<DatasetPipeline> {
    const config = parsePipelineConfig(raw);
    const validator = await createValidator(config.validation);
    return new DatasetPipeline({
      train: config.train,
      eval: config.eval,
      validator,
      output: config.output,
      strictFormat: config.strictFormat,
      concurrency: config.concurrency,
      emptyResult: config.emptyResult,
      writer: overrides?.writer,
      logger: overrides?.logger,
    });
  }

  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Validate and write both splits. Rejects with a `DatasetError` on any fatal condition. */
  async run(options?: { readonly signal?: AbortSignal }): Promise<PipelineResult> {
    return new RunPipeline(this.ctx).execute(options?.signal);
  }

  getStatus(): PipelineStatus {
    return this.ctx.status;
  }

  getRunId(): string {
    return this.ctx.runId;
  }

  getValidator(): RecordValidator {
    return this.ctx.validator;
  }
}

/** Instantiate the validator a configuration asks for. */
export async function createValidator(config: ValidationConfig): Promise<RecordValidator> {
  if (config.strategy === 'structural') {
    return new StructuralValidator({ requiredRoles: config.requiredRoles });
  }
  const schema = await loadSchemaDocument(config.schemaPath);
  return new SchemaValidator(schema, { formats: config.formats, source: config.schemaPath });
}

function assertSplitInput(split: PipelineSplit, input: SplitInput): void {
  if (input.path === '') {
    throw new ConfigError([`${split}.path: must not be empty`]);
  }
  if (input.maxRecords !== undefined && (!Number.isInteger(input.maxRecords) || input.maxRecords <= 0)) {
    throw new ConfigError([`${split}.maxRecords: must be a positive integer`]);
  }
}
