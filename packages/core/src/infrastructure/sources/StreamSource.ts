import { StringDecoder } from 'node:string_decoder';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

type ChunkStream = AsyncIterable<string | Buffer> | ReadableStream<string | Buffer>;

export interface StreamSourceOptions {
  /** File name for metadata. Default: 'stream-input'. */
  readonly fileName?: string;
  /** Size in bytes for metadata, if known. */
  readonly fileSize?: number;
  /** Encoding for converting Buffer chunks to string. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
}

/** Data source over an `AsyncIterable` or web `ReadableStream`, e.g. an HTTP upload. Readable once. */
export class StreamSource implements DataSource {
  private readonly meta: SourceMetadata;
  private readonly encoding: BufferEncoding;
  private consumed = false;

  constructor(
    private readonly stream: ChunkStream,
    options?: StreamSourceOptions,
  ) {
    this.encoding = options?.encoding ?? 'utf-8';
    this.meta = {
      fileName: options?.fileName ?? 'stream-input',
      fileSize: options?.fileSize,
    };
  }

  async *read(): AsyncIterable<string> {
    if (this.consumed) {
      throw new Error('StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;

    const iterable = isReadableStream(this.stream) ? fromReadableStream(this.stream) : this.stream;

    // Multi-byte characters may straddle Buffer chunks; the decoder holds the partial bytes.
    const decoder = new StringDecoder(this.encoding);
    for await (const chunk of iterable) {
      if (typeof chunk === 'string') {
        const pending = decoder.end();
        if (pending) yield pending;
        yield chunk;
      } else {
        const text = decoder.write(chunk);
        if (text) yield text;
      }
    }
    const rest = decoder.end();
    if (rest) yield rest;
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}

function isReadableStream(stream: ChunkStream): stream is ReadableStream<string | Buffer> {
  return 'getReader' in stream && typeof stream.getReader === 'function';
}

async function* fromReadableStream(stream: ReadableStream<string | Buffer>): AsyncIterable<string | Buffer> {
  const reader = stream.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      yield value;
    }
  } finally {
    reader.releaseLock();
  }
}
