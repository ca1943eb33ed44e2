import type { DataSource } from '../../domain/ports/DataSource.js';
import type { NumberedRecord } from '../../domain/model/Record.js';
import type { RejectionDiagnostic, SplitResult } from '../../domain/model/SplitResult.js';
import { summarizeSplit } from '../../domain/model/SplitResult.js';
import { PipelineCancelledError } from '../../domain/errors/DatasetErrors.js';
import { JsonlReader } from '../../infrastructure/parsers/JsonlReader.js';
import type { PipelineContext } from '../PipelineContext.js';

export interface ProcessSplitOptions {
  /** Stop reading once this many records have been accepted. */
  readonly maxRecords?: number;
  readonly signal?: AbortSignal;
  /** Name used in `ParseError`. Default: the source's own metadata. */
  readonly fileName?: string;
}

/**
 * Use case: read one split, validate every record and keep the accepted ones.
 *
 * Rejections are collected as diagnostics and emitted as `record:rejected`;
 * they never interrupt the split. A `ParseError` from the reader does, and
 * propagates unchanged.
 */
export class ProcessSplit {
  constructor(private readonly ctx: PipelineContext) {}

  async execute(split: string, source: DataSource, options?: ProcessSplitOptions): Promise<SplitResult> {
    const maxRecords = options?.maxRecords;
    const accepted: NumberedRecord[] = [];
    const diagnostics: RejectionDiagnostic[] = [];
    const atCap = (): boolean => maxRecords !== undefined && accepted.length >= maxRecords;
    let capReached = atCap();

    if (!capReached) {
      for await (const record of new JsonlReader(source, options?.fileName).records()) {
        if (options?.signal?.aborted) {
          throw new PipelineCancelledError(split);
        }

        const verdict = this.ctx.validator.validate(record.value, record.lineNumber);
        if (verdict.kind === 'rejected') {
          diagnostics.push({ lineNumber: verdict.lineNumber, reason: verdict.reason });
          this.ctx.emit({
            type: 'record:rejected',
            runId: this.ctx.runId,
            split,
            lineNumber: verdict.lineNumber,
            reason: verdict.reason,
            timestamp: Date.now(),
          });
          continue;
        }

        accepted.push(record);
        if (atCap()) {
          capReached = true;
          break;
        }
      }
    }

    const result: SplitResult = {
      split,
      accepted,
      rejectedCount: diagnostics.length,
      diagnostics,
      capReached,
    };

    this.ctx.emit({
      type: 'split:validated',
      runId: this.ctx.runId,
      summary: summarizeSplit(result),
      timestamp: Date.now(),
    });

    return result;
  }
}
