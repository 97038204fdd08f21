/** Metadata about a data source, reported in mapper events. */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
}

/**
 * Port for reading tabular text from any origin (file, buffer, stream).
 *
 * The mapper consumes the whole source before decoding: chunks are joined in
 * order and tokenized once.
 */
export interface DataSource {
  /** Yield data chunks as strings or Buffers. */
  read(): AsyncIterable<string | Buffer>;
  /** Return metadata about the source (file name, size). */
  metadata(): SourceMetadata;
}
