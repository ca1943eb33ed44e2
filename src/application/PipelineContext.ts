import { randomUUID } from 'node:crypto';
import type { DomainEvent } from '../domain/events/DomainEvents.js';
import type { EmptyResultPolicy, RecordValidator } from '../domain/ports/RecordValidator.js';
import type { RecordWriter } from '../domain/ports/RecordWriter.js';
import type { OutputNaming } from '../domain/services/OutputNaming.js';
import type { PipelineStatus } from '../domain/model/PipelineStatus.js';
import { canTransition } from '../domain/model/PipelineStatus.js';
import type { EventBus } from './EventBus.js';

/** The two partitions every run processes, in processing order. */
export const PIPELINE_SPLITS = ['train', 'eval'] as const;

export type PipelineSplit = (typeof PIPELINE_SPLITS)[number];

export type SplitConcurrency = 'sequential' | 'parallel';

/** Where a split is read from, how much of it to keep, and an optional explicit output path. */
export interface SplitInput {
  readonly path: string;
  /** Keep at most this many accepted records. Unset means no limit. */
  readonly maxRecords?: number;
  /** Explicit output path. Default: derived from `path` with the run's `OutputNaming`. */
  readonly output?: string;
}

/** A split with its output path resolved. */
export interface SplitJob {
  readonly split: PipelineSplit;
  readonly inputPath: string;
  readonly outputPath: string;
  readonly maxRecords?: number;
}

/**
 * State shared by the use cases of a single validation run.
 *
 * Internal: not exported from the package entry point. `DatasetPipeline`
 * builds one per instance and hands it to each use case.
 */
export class PipelineContext {
  readonly runId: string;
  readonly eventBus: EventBus;
  readonly validator: RecordValidator;
  readonly writer: RecordWriter;
  readonly splits: Readonly<Record<PipelineSplit, SplitInput>>;
  readonly naming: OutputNaming;
  readonly strictFormat: boolean;
  readonly concurrency: SplitConcurrency;
  readonly emptyResultPolicy: EmptyResultPolicy;

  status: PipelineStatus = 'CREATED';

  constructor(init: {
    eventBus: EventBus;
    validator: RecordValidator;
    writer: RecordWriter;
    splits: Readonly<Record<PipelineSplit, SplitInput>>;
    naming: OutputNaming;
    strictFormat: boolean;
    concurrency: SplitConcurrency;
    emptyResultPolicy?: EmptyResultPolicy;
  }) {
    this.runId = randomUUID();
    this.eventBus = init.eventBus;
    this.validator = init.validator;
    this.writer = init.writer;
    this.splits = init.splits;
    this.naming = init.naming;
    this.strictFormat = init.strictFormat;
    this.concurrency = init.concurrency;
    this.emptyResultPolicy = init.emptyResultPolicy ?? init.validator.emptyResultPolicy;
  }

  emit(event: DomainEvent): void {
    this.eventBus.emit(event);
  }

  transitionTo(next: PipelineStatus): void {
    if (!canTransition(this.status, next)) {
      throw new Error(`Invalid state transition: ${this.status} → ${next}`);
    }
    this.status = next;
  }
}
