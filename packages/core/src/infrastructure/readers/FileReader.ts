import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { basename } from 'node:path';
import type { PositionalReader, ReadResult, ReaderMetadata } from '../../domain/ports/PositionalReader.js';
import { createLogger } from '../../utils/logger.js';

/**
 * Positional reader over a local file. Node.js only.
 *
 * The file is opened on the first read and stays open until `close()`, which the
 * pipeline calls when the run ends.
 */
export class FileReader implements PositionalReader {
  private readonly filePath: string;
  private readonly log = createLogger('reader', { reader: 'file' });
  private handle: FileHandle | null = null;
  private size: number | null = null;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async readAt(buffer: Uint8Array, offset: number, signal?: AbortSignal): Promise<ReadResult> {
    signal?.throwIfAborted();

    const handle = await this.openHandle();
    const { bytesRead } = await handle.read(buffer, 0, buffer.length, offset);

    // A short read on a regular file means the end was reached.
    return { bytesRead, endOfStream: bytesRead < buffer.length };
  }

  async close(): Promise<void> {
    const handle = this.handle;
    if (!handle) return;
    this.handle = null;
    await handle.close();
    this.log.debug({ file: this.filePath }, 'File closed');
  }

  metadata(): ReaderMetadata {
    const name = basename(this.filePath);
    return this.size !== null ? { name, size: this.size } : { name };
  }

  private async openHandle(): Promise<FileHandle> {
    if (this.handle) return this.handle;

    const handle = await open(this.filePath, 'r');
    this.handle = handle;
    this.size = (await handle.stat()).size;
    this.log.debug({ file: this.filePath, size: this.size }, 'File opened');
    return handle;
  }
}
