/** Metadata about a data sink, reported in mapper events. */
export interface SinkMetadata {
  readonly fileName?: string;
}

/**
 * Port for persisting serialized tabular text.
 *
 * `write()` receives the complete content in one call and must either persist
 * all of it or reject.
 */
export interface DataSink {
  write(content: string): Promise<void>;
  metadata(): SinkMetadata;
}
