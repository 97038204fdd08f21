import { createReadStream, statSync } from 'node:fs';
import { basename } from 'node:path';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

export interface FilePathSourceOptions {
  /** Encoding for reading the file. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/** Data source that streams a local file. Node.js only. */
export class FilePathSource implements DataSource {
  private readonly encoding: BufferEncoding;
  private readonly highWaterMark: number;

  constructor(
    private readonly filePath: string,
    options?: FilePathSourceOptions,
  ) {
    this.encoding = options?.encoding ?? 'utf-8';
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  async *read(): AsyncIterable<string> {
    const stream = createReadStream(this.filePath, {
      encoding: this.encoding,
      highWaterMark: this.highWaterMark,
    });

    for await (const chunk of stream) {
      yield typeof chunk === 'string' ? chunk : String(chunk);
    }
  }

  /** File name and size. `fileSize` is omitted while the file does not exist. */
  metadata(): SourceMetadata {
    const stats = statSync(this.filePath, { throwIfNoEntry: false });
    return {
      fileName: basename(this.filePath),
      fileSize: stats?.size,
    };
  }
}
