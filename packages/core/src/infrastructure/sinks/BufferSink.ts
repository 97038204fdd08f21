import type { DataSink, SinkMetadata } from '../../domain/ports/DataSink.js';

/** Data sink that keeps the written text in memory. */
export class BufferSink implements DataSink {
  private content: string | null = null;
  private readonly meta: SinkMetadata;

  constructor(metadata?: Partial<SinkMetadata>) {
    this.meta = { fileName: metadata?.fileName ?? 'buffer-output' };
  }

  write(content: string): Promise<void> {
    this.content = content;
    return Promise.resolve();
  }

  /** Text from the last `write()`, or `null` before anything was written. */
  getContent(): string | null {
    return this.content;
  }

  metadata(): SinkMetadata {
    return this.meta;
  }
}
