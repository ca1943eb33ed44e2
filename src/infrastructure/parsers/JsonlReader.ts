import type { DataSource } from '../../domain/ports/DataSource.js';
import type { DatasetRecord, NumberedRecord } from '../../domain/model/Record.js';
import { ParseError } from '../../domain/errors/DatasetErrors.js';

const NEWLINE = 0x0a;
const BOM = '\uFEFF';

/**
 * Streams a JSONL source as `(lineNumber, value)` pairs.
 *
 * Line numbers are 1-based and count physical lines, so a blank line is
 * skipped but still advances the counter. Lines are split on raw bytes and
 * each one is decoded as strict UTF-8. The first line that is not valid
 * UTF-8 or not valid JSON throws `ParseError`; nothing after it is read.
 */
export class JsonlReader {
  private readonly source: DataSource;
  private readonly fileName: string;
  private readonly decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

  /** `fileName` is used in diagnostics. Without it the source's metadata is asked. */
  constructor(source: DataSource, fileName?: string) {
    this.source = source;
    this.fileName = fileName ?? source.metadata().fileName ?? 'input';
  }

  async *records(): AsyncGenerator<NumberedRecord, void, undefined> {
    let pending: Buffer = Buffer.alloc(0);
    let lineNumber = 0;

    for await (const chunk of this.source.read()) {
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
      pending = pending.length === 0 ? bytes : Buffer.concat([pending, bytes]);

      let start = 0;
      let newline = pending.indexOf(NEWLINE, start);
      while (newline !== -1) {
        lineNumber++;
        const record = this.parseLine(pending.subarray(start, newline), lineNumber);
        if (record !== undefined) yield record;
        start = newline + 1;
        newline = pending.indexOf(NEWLINE, start);
      }
      pending = pending.subarray(start);
    }

    if (pending.length > 0) {
      lineNumber++;
      const record = this.parseLine(pending, lineNumber);
      if (record !== undefined) yield record;
    }
  }

  private parseLine(bytes: Uint8Array, lineNumber: number): NumberedRecord | undefined {
    let line: string;
    try {
      line = this.decoder.decode(bytes);
    } catch (error) {
      throw new ParseError(this.fileName, lineNumber, 'invalid UTF-8', { cause: error });
    }

    if (line.endsWith('\r')) line = line.slice(0, -1);
    if (lineNumber === 1 && line.startsWith(BOM)) line = line.slice(BOM.length);
    const raw = line.trim();
    if (raw === '') return undefined;

    try {
      const value: DatasetRecord = JSON.parse(raw);
      return { lineNumber, value, raw };
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ParseError(this.fileName, lineNumber, detail, { cause: error });
    }
  }
}
