import type { PositionalReader, ReadResult, ReaderMetadata } from '../../domain/ports/PositionalReader.js';

export interface BufferReaderOptions {
  /** Name reported in metadata and logs. Default: `'buffer'`. */
  readonly name?: string;
}

/** Positional reader over bytes already in memory. Strings are encoded as UTF-8. */
export class BufferReader implements PositionalReader {
  private readonly bytes: Uint8Array;
  private readonly name: string;

  constructor(data: Uint8Array | string, options?: BufferReaderOptions) {
    this.bytes = typeof data === 'string' ? new TextEncoder().encode(data) : data;
    this.name = options?.name ?? 'buffer';
  }

  readAt(buffer: Uint8Array, offset: number, signal?: AbortSignal): Promise<ReadResult> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    const available = Math.max(0, this.bytes.length - offset);
    const bytesRead = Math.min(available, buffer.length);
    buffer.set(this.bytes.subarray(offset, offset + bytesRead), 0);

    return Promise.resolve({ bytesRead, endOfStream: offset + bytesRead >= this.bytes.length });
  }

  metadata(): ReaderMetadata {
    return { name: this.name, size: this.bytes.length };
  }
}
