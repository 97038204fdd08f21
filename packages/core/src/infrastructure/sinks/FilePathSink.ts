import { randomUUID } from 'node:crypto';
import { rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import type { DataSink, SinkMetadata } from '../../domain/ports/DataSink.js';

export interface FilePathSinkOptions {
  /** Encoding for writing the file. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
}

/**
 * Data sink that replaces a local file. Content goes to a temporary file in
 * the same directory first and is renamed over the target, so readers never
 * observe a partially written file. Node.js only.
 */
export class FilePathSink implements DataSink {
  private readonly encoding: BufferEncoding;

  constructor(
    private readonly filePath: string,
    options?: FilePathSinkOptions,
  ) {
    this.encoding = options?.encoding ?? 'utf-8';
  }

  async write(content: string): Promise<void> {
    const tempPath = join(dirname(this.filePath), `.${basename(this.filePath)}.${randomUUID()}.tmp`);
    try {
      await writeFile(tempPath, content, { encoding: this.encoding });
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }

  metadata(): SinkMetadata {
    return { fileName: basename(this.filePath) };
  }
}
