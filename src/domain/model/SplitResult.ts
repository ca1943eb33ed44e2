import type { NumberedRecord } from './Record.js';

/** Name of a dataset partition, e.g. `'train'` or `'eval'`. */
export type SplitName = string;

/** One rejected line, reported in input order. */
export interface RejectionDiagnostic {
  readonly lineNumber: number;
  readonly reason: string;
}

/** Outcome of filtering one split. */
export interface SplitResult {
  readonly split: SplitName;
  /** Accepted records in input line order. Never longer than the configured cap. */
  readonly accepted: readonly NumberedRecord[];
  readonly rejectedCount: number;
  readonly diagnostics: readonly RejectionDiagnostic[];
  /** `true` when reading stopped early because the cap was reached. */
  readonly capReached: boolean;
}

/** Final counts for a split. */
export interface SplitSummary {
  readonly split: SplitName;
  readonly acceptedCount: number;
  readonly rejectedCount: number;
  readonly capReached: boolean;
}

/** Summary plus where the filtered copy was written. */
export interface SplitReport extends SplitSummary {
  readonly outputPath: string;
  readonly diagnostics: readonly RejectionDiagnostic[];
}

export function summarizeSplit(result: SplitResult): SplitSummary {
  return {
    split: result.split,
    acceptedCount: result.accepted.length,
    rejectedCount: result.rejectedCount,
    capReached: result.capReached,
  };
}

/** A split with no accepted records. Whether this is fatal depends on the validation strategy. */
export function isEmptyResult(result: SplitResult): boolean {
  return result.accepted.length === 0;
}
