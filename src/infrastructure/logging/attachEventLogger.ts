import type { Logger } from 'pino';
import type { DomainEvent } from '../../domain/events/DomainEvents.js';

/** Anything that publishes domain events to wildcard subscribers (`DatasetPipeline`, `EventBus`). */
export interface EventSource {
  onAny(handler: (event: DomainEvent) => void): unknown;
}

/** Subscribe `logger` to every event of `source`. */
export function attachEventLogger(source: EventSource, logger: Logger): void {
  source.onAny((event) => {
    logEvent(logger, event);
  });
}

/** Write one log line for a domain event. */
export function logEvent(logger: Logger, event: DomainEvent): void {
  switch (event.type) {
    case 'pipeline:started':
      logger.info({ runId: event.runId, validator: event.validator, splits: event.splits }, 'Validation run started');
      break;
    case 'input:unrecognized-format':
      logger.warn(
        { runId: event.runId, split: event.split, file: event.filePath, mimeType: event.mimeType },
        `${event.filePath} does not look like line-delimited JSON; reading it anyway`,
      );
      break;
    case 'split:started':
      logger.debug(
        { runId: event.runId, split: event.split, file: event.inputPath, maxRecords: event.maxRecords },
        `Reading ${event.split} split`,
      );
      break;
    case 'record:rejected':
      logger.warn(
        { runId: event.runId, split: event.split, line: event.lineNumber, reason: event.reason },
        `Skipping invalid record at ${event.split}:${String(event.lineNumber)}: ${event.reason}`,
      );
      break;
    case 'split:validated':
      logger.info(
        { runId: event.runId, ...event.summary },
        `Validated ${event.summary.split}: ${String(event.summary.acceptedCount)} accepted, ${String(event.summary.rejectedCount)} rejected`,
      );
      break;
    case 'split:empty':
      logger.warn(
        { runId: event.runId, split: event.split, rejectedCount: event.rejectedCount },
        `Split ${event.split} has no valid records`,
      );
      break;
    case 'split:written':
      logger.debug(
        { runId: event.runId, split: event.split, file: event.outputPath, records: event.recordCount },
        `Wrote ${event.outputPath}`,
      );
      break;
    case 'split:failed':
      logger.error({ runId: event.runId, split: event.split, code: event.code }, event.error);
      break;
    case 'pipeline:completed':
      logger.info({ runId: event.runId, outputs: event.outputs }, 'Validation run completed');
      break;
    case 'pipeline:failed':
      logger.error({ runId: event.runId, code: event.code }, `Validation run failed: ${event.error}`);
      break;
  }
}
