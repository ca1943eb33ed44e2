import { createWriteStream } from 'node:fs';
import { mkdir, rename, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { NumberedRecord } from '../../domain/model/Record.js';
import type { RecordWriter, WriteReceipt } from '../../domain/ports/RecordWriter.js';

export interface JsonlFileWriterOptions {
  /** Appended to the destination while writing. Default: `'.partial'`. */
  readonly partialSuffix?: string;
}

/**
 * Writes records as JSONL, UTF-8, one per line.
 *
 * Each line is the record's text exactly as it was read, so numbers outside
 * the double range and formatting such as `1.0` come out as they went in.
 *
 * Output goes to `<destination><partialSuffix>` first and is renamed into
 * place only once fully flushed, so a reader never sees a half-written file
 * under the final name.
 */
export class JsonlFileWriter implements RecordWriter {
  private readonly partialSuffix: string;

  constructor(options?: JsonlFileWriterOptions) {
    this.partialSuffix = options?.partialSuffix ?? '.partial';
  }

  async write(records: Iterable<NumberedRecord>, destination: string): Promise<WriteReceipt> {
    const partialPath = `${destination}${this.partialSuffix}`;
    let recordCount = 0;

    function* lines(): Generator<string> {
      for (const record of records) {
        recordCount++;
        yield `${record.raw}\n`;
      }
    }

    await mkdir(dirname(destination), { recursive: true });
    try {
      await pipeline(Readable.from(lines()), createWriteStream(partialPath, { encoding: 'utf-8' }));
      await rename(partialPath, destination);
    } catch (error) {
      await rm(partialPath, { force: true });
      throw error;
    }

    return { path: destination, recordCount };
  }
}
