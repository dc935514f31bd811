import type { Chunk } from '../../domain/model/Chunk.js';
import type { PositionalReader, ReadResult } from '../../domain/ports/PositionalReader.js';
import { createChunk } from '../../domain/model/Chunk.js';
import { PipelineCancelledError, SourceReadError, errorMessage, toError } from '../../domain/errors/ChunklineError.js';
import type { Conduit } from '../Conduit.js';
import type { PipelineContext } from '../PipelineContext.js';

/** Settle with `promise`, or reject with the signal's reason as soon as it aborts. */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(resolve, reject).finally(() => {
      signal.removeEventListener('abort', onAbort);
    });
    if (signal.aborted) onAbort();
  });
}

/**
 * Use case: tile the source into fixed-size windows and publish them in order.
 *
 * A reader that ignores the signal cannot hold up cancellation: the pending read is
 * abandoned. Every outcome closes the conduit exactly once. A read failure closes it with the
 * `SourceReadError` so the consumer is released, then rejects with the same error.
 */
export class ProduceChunks {
  constructor(
    private readonly ctx: PipelineContext,
    private readonly conduit: Conduit<Chunk>,
  ) {}

  async execute(signal: AbortSignal): Promise<void> {
    const { reader } = this.ctx.requireSource();
    const { bufferSize } = this.ctx.config;
    const log = this.ctx.logger.child({ component: 'chunk-source' });

    let offset = 0;
    let index = 0;
    let failure: Error | undefined;

    try {
      for (;;) {
        if (signal.aborted) {
          log.debug({ offset }, 'Cancellation observed before read');
          break;
        }

        const buffer = new Uint8Array(bufferSize);
        const { bytesRead, endOfStream } = await this.read(reader, buffer, offset, signal);

        if (bytesRead > 0) {
          if (signal.aborted) {
            log.debug({ offset, bytesRead }, 'Cancellation observed before publish, dropping chunk');
            break;
          }

          const chunk = createChunk(index, offset, buffer.subarray(0, bytesRead));
          offset += bytesRead;
          this.ctx.chunks++;
          this.ctx.bytesRead += bytesRead;
          this.ctx.eventBus.emit({
            type: 'chunk:read',
            runId: this.ctx.runId,
            chunkIndex: chunk.index,
            offset: chunk.offset,
            byteLength: bytesRead,
            timestamp: Date.now(),
          });

          await this.conduit.send(chunk, signal);
          index++;
        }

        if (endOfStream) {
          log.debug({ offset, chunks: index }, 'End of stream');
          break;
        }
        if (bytesRead === 0) {
          log.debug({ offset, chunks: index }, 'Zero-byte read without end of stream, treating as end of stream');
          break;
        }
      }
    } catch (error) {
      if (error instanceof PipelineCancelledError) {
        log.debug({ offset }, 'Chunk source stopped by cancellation');
        return;
      }
      failure = toError(error);
      log.error({ err: failure, offset }, 'Chunk source failed');
      throw failure;
    } finally {
      this.conduit.close(failure);
    }
  }

  private async read(
    reader: PositionalReader,
    buffer: Uint8Array,
    offset: number,
    signal: AbortSignal,
  ): Promise<ReadResult> {
    let result: ReadResult;
    try {
      result = await untilAborted(reader.readAt(buffer, offset, signal), signal);
    } catch (error) {
      if (signal.aborted) {
        throw new PipelineCancelledError('Pipeline cancelled during read', { cause: error });
      }
      throw new SourceReadError(`Read failed at offset ${String(offset)}: ${errorMessage(error)}`, offset, {
        cause: error,
      });
    }

    const { bytesRead } = result;
    if (!Number.isSafeInteger(bytesRead) || bytesRead < 0 || bytesRead > buffer.length) {
      throw new SourceReadError(
        `Reader returned an invalid byte count (${String(bytesRead)}) at offset ${String(offset)}`,
        offset,
      );
    }
    return result;
  }
}
