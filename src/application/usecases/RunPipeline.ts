import type { Stats } from 'node:fs';
import { stat } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import type { SplitReport } from '../../domain/model/SplitResult.js';
import { isEmptyResult, summarizeSplit } from '../../domain/model/SplitResult.js';
import {
  EmptyResultError,
  MissingInputError,
  OutputCollisionError,
  PipelineCancelledError,
  UnsupportedFormatError,
  isDatasetError,
} from '../../domain/errors/DatasetErrors.js';
import { deriveOutputPath } from '../../domain/services/OutputNaming.js';
import { FilePathSource } from '../../infrastructure/sources/FilePathSource.js';
import { detectMimeType, isLineDelimitedJson } from '../../infrastructure/detectMimeType.js';
import type { PipelineContext, PipelineSplit, SplitJob } from '../PipelineContext.js';
import { PIPELINE_SPLITS } from '../PipelineContext.js';
import { ProcessSplit } from './ProcessSplit.js';

/** Output of a completed run: where each filtered split went and what happened to it. */
export interface PipelineResult {
  readonly runId: string;
  readonly outputs: Readonly<Record<PipelineSplit, string>>;
  readonly splits: Readonly<Record<PipelineSplit, SplitReport>>;
}

/**
 * Use case: validate and write every split.
 *
 * Both inputs are checked before any record is read, so a missing eval file
 * fails the run before train output is produced. After that each split is
 * independent: it is written only once it has been fully read and passed the
 * empty-result policy.
 */
export class RunPipeline {
  constructor(private readonly ctx: PipelineContext) {}

  async execute(signal?: AbortSignal): Promise<PipelineResult> {
    this.ctx.transitionTo('RUNNING');
    this.ctx.emit({
      type: 'pipeline:started',
      runId: this.ctx.runId,
      validator: this.ctx.validator.name,
      splits: [...PIPELINE_SPLITS],
      timestamp: Date.now(),
    });

    try {
      const jobs = this.planJobs();
      for (const job of jobs) {
        await this.preflight(job);
      }

      const reports =
        this.ctx.concurrency === 'parallel' ? await this.runParallel(jobs, signal) : await this.runSequential(jobs, signal);

      const result: PipelineResult = {
        runId: this.ctx.runId,
        outputs: { train: reports.train.outputPath, eval: reports.eval.outputPath },
        splits: reports,
      };

      this.ctx.transitionTo('COMPLETED');
      this.ctx.emit({
        type: 'pipeline:completed',
        runId: this.ctx.runId,
        outputs: result.outputs,
        summaries: PIPELINE_SPLITS.map((split) => reports[split]),
        timestamp: Date.now(),
      });
      return result;
    } catch (error) {
      this.ctx.transitionTo(error instanceof PipelineCancelledError ? 'CANCELLED' : 'FAILED');
      this.ctx.emit({
        type: 'pipeline:failed',
        runId: this.ctx.runId,
        error: error instanceof Error ? error.message : String(error),
        code: isDatasetError(error) ? error.code : undefined,
        timestamp: Date.now(),
      });
      throw error;
    }
  }

  private planJobs(): SplitJob[] {
    const jobs = PIPELINE_SPLITS.map((split): SplitJob => {
      const input = this.ctx.splits[split];
      return {
        split,
        inputPath: input.path,
        outputPath: input.output ?? deriveOutputPath(input.path, this.ctx.naming),
        maxRecords: input.maxRecords,
      };
    });

    const inputs = new Set(PIPELINE_SPLITS.map((split) => resolve(this.ctx.splits[split].path)));
    const claimed = new Map<string, PipelineSplit>();
    for (const job of jobs) {
      const target = resolve(job.outputPath);
      const owner = claimed.get(target);
      if (owner !== undefined) {
        throw new OutputCollisionError(job.outputPath, [owner, job.split]);
      }
      if (inputs.has(target)) {
        throw new OutputCollisionError(job.outputPath, [job.split]);
      }
      claimed.set(target, job.split);
    }
    return jobs;
  }

  private async preflight(job: SplitJob): Promise<void> {
    let stats: Stats;
    try {
      stats = await stat(job.inputPath);
    } catch (error) {
      throw new MissingInputError(job.inputPath, 'file does not exist', { cause: error });
    }
    if (!stats.isFile()) {
      throw new MissingInputError(job.inputPath, 'not a regular file');
    }

    if (!isLineDelimitedJson(job.inputPath)) {
      const mimeType = detectMimeType(job.inputPath);
      if (this.ctx.strictFormat) {
        throw new UnsupportedFormatError(job.inputPath, mimeType);
      }
      this.ctx.emit({
        type: 'input:unrecognized-format',
        runId: this.ctx.runId,
        split: job.split,
        filePath: job.inputPath,
        mimeType,
        timestamp: Date.now(),
      });
    }
  }

  private async runSequential(
    jobs: readonly SplitJob[],
    signal?: AbortSignal,
  ): Promise<Record<PipelineSplit, SplitReport>> {
    const reports: Partial<Record<PipelineSplit, SplitReport>> = {};
    for (const job of jobs) {
      reports[job.split] = await this.runSplit(job, signal);
    }
    return this.collect(reports);
  }

  private async runParallel(
    jobs: readonly SplitJob[],
    signal?: AbortSignal,
  ): Promise<Record<PipelineSplit, SplitReport>> {
    // allSettled so a failing split never leaves the other one running unobserved.
    const settled = await Promise.allSettled(jobs.map((job) => this.runSplit(job, signal)));
    const reports: Partial<Record<PipelineSplit, SplitReport>> = {};
    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        throw outcome.reason;
      }
      reports[outcome.value.split] = outcome.value;
    }
    return this.collect(reports);
  }

  private collect(reports: Partial<Record<PipelineSplit, SplitReport>>): Record<PipelineSplit, SplitReport> {
    const { train, eval: evalReport } = reports;
    if (!train || !evalReport) {
      throw new Error('Split reports are incomplete');
    }
    return { train, eval: evalReport };
  }

  private async runSplit(job: SplitJob, signal?: AbortSignal): Promise<SplitReport & { split: PipelineSplit }> {
    this.ctx.emit({
      type: 'split:started',
      runId: this.ctx.runId,
      split: job.split,
      inputPath: job.inputPath,
      maxRecords: job.maxRecords,
      timestamp: Date.now(),
    });

    try {
      const result = await new ProcessSplit(this.ctx)
        .execute(job.split, new FilePathSource(job.inputPath), {
          maxRecords: job.maxRecords,
          signal,
          fileName: basename(job.inputPath),
        })
        .catch((error: unknown) => {
          // The input can still vanish between preflight and the first read.
          if (isMissingFile(error)) {
            throw new MissingInputError(job.inputPath, 'file does not exist', { cause: error });
          }
          throw error;
        });

      if (isEmptyResult(result)) {
        if (this.ctx.emptyResultPolicy === 'fatal') {
          throw new EmptyResultError(job.split, basename(job.inputPath), result.rejectedCount);
        }
        this.ctx.emit({
          type: 'split:empty',
          runId: this.ctx.runId,
          split: job.split,
          rejectedCount: result.rejectedCount,
          timestamp: Date.now(),
        });
      }

      if (signal?.aborted) {
        throw new PipelineCancelledError(job.split);
      }

      const receipt = await this.ctx.writer.write(result.accepted, job.outputPath);
      this.ctx.emit({
        type: 'split:written',
        runId: this.ctx.runId,
        split: job.split,
        outputPath: receipt.path,
        recordCount: receipt.recordCount,
        timestamp: Date.now(),
      });

      return {
        ...summarizeSplit(result),
        split: job.split,
        outputPath: receipt.path,
        diagnostics: result.diagnostics,
      };
    } catch (error) {
      this.ctx.emit({
        type: 'split:failed',
        runId: this.ctx.runId,
        split: job.split,
        error: error instanceof Error ? error.message : String(error),
        code: isDatasetError(error) ? error.code : undefined,
        timestamp: Date.now(),
      });
      throw error;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
