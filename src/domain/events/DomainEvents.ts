import type { RejectionDiagnostic, SplitSummary } from '../model/SplitResult.js';

/** Emitted once when `run()` starts. */
export interface PipelineStartedEvent {
  readonly type: 'pipeline:started';
  readonly runId: string;
  readonly validator: string;
  readonly splits: readonly string[];
  readonly timestamp: number;
}

/** Emitted when every split has been validated and written. */
export interface PipelineCompletedEvent {
  readonly type: 'pipeline:completed';
  readonly runId: string;
  readonly outputs: Readonly<Record<string, string>>;
  readonly summaries: readonly SplitSummary[];
  readonly timestamp: number;
}

/** Emitted when a fatal condition ends the run. */
export interface PipelineFailedEvent {
  readonly type: 'pipeline:failed';
  readonly runId: string;
  readonly error: string;
  readonly code?: string;
  readonly timestamp: number;
}

/** Emitted for an input whose extension is not a known line-delimited JSON variant. Non-fatal unless `strictFormat` is set. */
export interface InputUnrecognizedFormatEvent {
  readonly type: 'input:unrecognized-format';
  readonly runId: string;
  readonly split: string;
  readonly filePath: string;
  readonly mimeType: string;
  readonly timestamp: number;
}

/** Emitted when a split begins reading its input. */
export interface SplitStartedEvent {
  readonly type: 'split:started';
  readonly runId: string;
  readonly split: string;
  readonly inputPath: string;
  readonly maxRecords?: number;
  readonly timestamp: number;
}

/** Emitted for each record the validator rejects. Processing continues. */
export interface RecordRejectedEvent extends RejectionDiagnostic {
  readonly type: 'record:rejected';
  readonly runId: string;
  readonly split: string;
  readonly timestamp: number;
}

/** Emitted once a split's input has been read and filtered, before writing. */
export interface SplitValidatedEvent {
  readonly type: 'split:validated';
  readonly runId: string;
  readonly summary: SplitSummary;
  readonly timestamp: number;
}

/** Emitted when a split accepted nothing and the policy is to warn rather than fail. */
export interface SplitEmptyEvent {
  readonly type: 'split:empty';
  readonly runId: string;
  readonly split: string;
  readonly rejectedCount: number;
  readonly timestamp: number;
}

/** Emitted after the filtered copy of a split has been written. */
export interface SplitWrittenEvent {
  readonly type: 'split:written';
  readonly runId: string;
  readonly split: string;
  readonly outputPath: string;
  readonly recordCount: number;
  readonly timestamp: number;
}

/** Emitted when a split hits a fatal condition. No output is written for it. */
export interface SplitFailedEvent {
  readonly type: 'split:failed';
  readonly runId: string;
  readonly split: string;
  readonly error: string;
  readonly code?: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | PipelineStartedEvent
  | PipelineCompletedEvent
  | PipelineFailedEvent
  | InputUnrecognizedFormatEvent
  | SplitStartedEvent
  | RecordRejectedEvent
  | SplitValidatedEvent
  | SplitEmptyEvent
  | SplitWrittenEvent
  | SplitFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
