import type { NumberedRecord } from '../model/Record.js';

export interface WriteReceipt {
  readonly path: string;
  readonly recordCount: number;
}

/** Port for persisting the accepted records of a split. */
export interface RecordWriter {
  /**
   * Write `records` to `destination`, one per line, as their original JSON text.
   *
   * Implementations must not leave a partially written file at `destination`
   * if writing fails.
   */
  write(records: Iterable<NumberedRecord>, destination: string): Promise<WriteReceipt>;
}
