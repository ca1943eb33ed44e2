import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { detectMimeType } from '../detectMimeType.js';

export interface BufferSourceOptions {
  /** Name reported in diagnostics. Default: `'buffer-input.jsonl'`. */
  readonly fileName?: string;
  /** Split the content into chunks of this many bytes. Default: one chunk. */
  readonly chunkSize?: number;
}

/** In-memory data source, for tests and for data that is already loaded. */
export class BufferSource implements DataSource {
  private readonly content: Buffer;
  private readonly meta: SourceMetadata;
  private readonly chunkSize: number | undefined;

  constructor(data: string | Buffer, options?: BufferSourceOptions) {
    this.content = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
    this.chunkSize = options?.chunkSize;
    const fileName = options?.fileName ?? 'buffer-input.jsonl';
    this.meta = {
      fileName,
      fileSize: this.content.length,
      mimeType: detectMimeType(fileName),
    };
  }

  async *read(): AsyncIterable<Buffer> {
    if (this.chunkSize === undefined || this.chunkSize <= 0) {
      yield await Promise.resolve(this.content);
      return;
    }
    for (let offset = 0; offset < this.content.length; offset += this.chunkSize) {
      yield await Promise.resolve(this.content.subarray(offset, offset + this.chunkSize));
    }
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
