import type { DatasetRecord } from './Record.js';

/** The record passed every check and may be written to output. */
export interface AcceptedVerdict {
  readonly kind: 'accepted';
  readonly record: DatasetRecord;
}

/** The record failed a check. `reason` is the first failure found, in human-readable form. */
export interface RejectedVerdict {
  readonly kind: 'rejected';
  readonly lineNumber: number;
  readonly reason: string;
}

/** Outcome of validating one record. Acceptance is all-or-nothing. */
export type ValidationVerdict = AcceptedVerdict | RejectedVerdict;

export function accepted(record: DatasetRecord): AcceptedVerdict {
  return { kind: 'accepted', record };
}

export function rejected(lineNumber: number, reason: string): RejectedVerdict {
  return { kind: 'rejected', lineNumber, reason };
}

export function isAccepted(verdict: ValidationVerdict): verdict is AcceptedVerdict {
  return verdict.kind === 'accepted';
}
