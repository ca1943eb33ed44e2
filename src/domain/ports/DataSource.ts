/** Metadata about the data source (optional, for diagnostics and format detection). */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
  readonly mimeType?: string;
}

/**
 * Port for reading raw dataset bytes from any origin (local file, in-memory buffer).
 *
 * `read()` yields chunks lazily. Chunk boundaries are arbitrary: they may fall
 * in the middle of a line, and for `Buffer` chunks in the middle of a UTF-8
 * sequence. The reader is responsible for reassembling lines.
 */
export interface DataSource {
  /** Yield data chunks as strings or Buffers for streaming consumption. */
  read(): AsyncIterable<string | Buffer>;
  /** Return metadata about the source (file name, size, MIME type). */
  metadata(): SourceMetadata;
}
