import type { DatasetRecord } from '../model/Record.js';
import type { ValidationVerdict } from '../model/ValidationVerdict.js';

/**
 * What to do when a split ends with zero accepted records.
 *
 * - `'fatal'`: abort the run with `EmptyResultError`.
 * - `'warn'`: emit `split:empty` and write the (empty) output anyway.
 */
export type EmptyResultPolicy = 'fatal' | 'warn';

/**
 * Port for a record validation strategy.
 *
 * The pipeline only ever talks to this interface; the strategy's own
 * empty-result policy travels with it so nothing downstream needs to know
 * which implementation was chosen.
 */
export interface RecordValidator {
  /** Short strategy name used in events and logs. */
  readonly name: string;
  readonly emptyResultPolicy: EmptyResultPolicy;
  /** Pure function of the record. Must not throw for any JSON value. */
  validate(record: DatasetRecord, lineNumber: number): ValidationVerdict;
}
