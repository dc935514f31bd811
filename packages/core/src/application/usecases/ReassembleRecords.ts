import type { Logger } from 'pino';
import type { Chunk } from '../../domain/model/Chunk.js';
import type { RecordParser } from '../../domain/ports/RecordParser.js';
import type { RecordContext, RecordHandlerFn } from '../../domain/ports/RecordHandler.js';
import type { DeferReason, ParseStage } from '../../domain/events/DomainEvents.js';
import { PipelineCancelledError, RecordParseError, errorMessage } from '../../domain/errors/ChunklineError.js';
import {
  EMPTY_BYTES,
  concatBytes,
  isFlush,
  trailingFragmentStart,
} from '../../domain/services/RecordBoundary.js';
import { RecordReader, readRecords } from '../../domain/services/RecordReader.js';
import type { Conduit } from '../Conduit.js';
import type { PipelineContext } from '../PipelineContext.js';

/** How the consumer side of a run ended. */
export type ReassemblyOutcome = 'completed' | 'cancelled' | 'source-failed';

/**
 * Use case: turn the ordered chunk stream into ordered complete records.
 *
 * Per chunk, a bounded reader walks the chunk's own bytes. A record that ends on the
 * chunk's last byte cannot be confirmed, so it is moved to the carry buffer and resolved
 * by the next chunk's first record (or by the end-of-stream flush).
 */
export class ReassembleRecords {
  private readonly parser: RecordParser;
  private readonly minFields: number | null;
  private readonly log: Logger;
  private carry: Uint8Array = EMPTY_BYTES;
  private recordIndex = 0;
  private lastChunkIndex: number | null = null;

  constructor(
    private readonly ctx: PipelineContext,
    private readonly conduit: Conduit<Chunk>,
    private readonly handler: RecordHandlerFn,
  ) {
    this.parser = ctx.requireSource().parser;
    this.minFields = ctx.config.minFieldsPerRecord;
    this.log = ctx.logger.child({ component: 'record-reassembler' });
  }

  async execute(signal: AbortSignal): Promise<ReassemblyOutcome> {
    for (;;) {
      let chunk: Chunk | undefined;
      try {
        chunk = await this.conduit.receive(signal);
      } catch (error) {
        if (error instanceof PipelineCancelledError) {
          this.discardCarry('cancelled');
          return 'cancelled';
        }
        // Conduit closed with the producer's failure; the producer reports it to the run.
        this.log.debug({ reason: errorMessage(error) }, 'Stream ended by source failure');
        this.discardCarry('source failure');
        return 'source-failed';
      }

      if (!chunk) break;
      await this.processChunk(chunk, signal);
    }

    await this.flush(signal);
    return 'completed';
  }

  private async processChunk(chunk: Chunk, signal: AbortSignal): Promise<void> {
    const { bytes } = chunk;
    const reader = new RecordReader(bytes, this.parser);
    let recordCount = 0;
    let emitted = 0;
    let bufOffset = reader.inputOffset;
    this.lastChunkIndex = chunk.index;

    for (;;) {
      const lastOffset = bufOffset;
      const span = reader.nextSpan();

      if (!span) {
        if (recordCount === 0 && this.carry.length > 0) {
          // Only blank lines: their line feeds terminate the carried record.
          emitted += await this.reconstruct(concatBytes(this.carry, bytes), chunk.index, signal);
          this.setCarry(EMPTY_BYTES);
        }
        break;
      }

      recordCount++;
      bufOffset = span.next;

      if (recordCount === 1 && this.carry.length > 0) {
        if (span.terminated) {
          emitted += await this.reconstruct(concatBytes(this.carry, bytes.subarray(0, bufOffset)), chunk.index, signal);
          this.setCarry(EMPTY_BYTES);
          continue;
        }

        // No line feed anywhere in this chunk: the carried record is longer than a chunk.
        const combined = concatBytes(this.carry, bytes);
        const cut = trailingFragmentStart(combined);
        if (cut > 0) {
          emitted += await this.reconstruct(combined.subarray(0, cut), chunk.index, signal);
        }
        this.defer(combined.slice(cut), chunk.index, 'boundary');
        break;
      }

      if (isFlush(bufOffset, lastOffset, bytes.length)) {
        this.defer(bytes.slice(lastOffset), chunk.index, 'boundary');
        break;
      }

      let fields: string[];
      try {
        fields = reader.decode(span);
      } catch (error) {
        if (!(error instanceof RecordParseError)) throw error;
        this.reportParseError(error, chunk.index, 'chunk');
        // Keep the unterminated tail so the next chunk still starts on a record boundary.
        this.defer(bytes.slice(trailingFragmentStart(bytes)), chunk.index, 'parse-error');
        break;
      }

      if (this.minFields !== null && fields.length < this.minFields) {
        this.defer(bytes.slice(lastOffset), chunk.index, 'short-record');
        break;
      }

      await this.emit(fields, chunk.index, false, signal);
      emitted++;
    }

    this.ctx.eventBus.emit({
      type: 'chunk:processed',
      runId: this.ctx.runId,
      chunkIndex: chunk.index,
      emittedRecords: emitted,
      carryBytes: this.carry.length,
      timestamp: Date.now(),
    });
  }

  /** Parse carried bytes joined with their continuation and emit every record found. */
  private async reconstruct(bytes: Uint8Array, chunkIndex: number, signal: AbortSignal): Promise<number> {
    let emitted = 0;
    for (const result of readRecords(bytes, this.parser)) {
      if (result.ok) {
        await this.emit(result.fields, chunkIndex, true, signal);
        emitted++;
      } else {
        this.reportParseError(result.error, chunkIndex, 'reconstruct');
      }
    }
    return emitted;
  }

  /** End of stream: the carry can no longer grow, so it is accepted as-is. */
  private async flush(signal: AbortSignal): Promise<void> {
    if (this.carry.length === 0) return;

    this.log.debug({ carryBytes: this.carry.length }, 'Flushing carried bytes at end of stream');
    const pending = this.carry;
    this.setCarry(EMPTY_BYTES);

    for (const result of readRecords(pending, this.parser)) {
      if (result.ok) {
        await this.emit(result.fields, this.lastChunkIndex, true, signal);
      } else {
        this.reportParseError(result.error, this.lastChunkIndex, 'flush');
      }
    }
  }

  private async emit(
    fields: string[],
    chunkIndex: number | null,
    reconstructed: boolean,
    signal: AbortSignal,
  ): Promise<void> {
    const recordIndex = this.recordIndex++;
    const context: RecordContext = { runId: this.ctx.runId, recordIndex, chunkIndex, reconstructed, signal };

    this.ctx.records++;
    this.ctx.eventBus.emit({
      type: 'record:emitted',
      runId: this.ctx.runId,
      recordIndex,
      chunkIndex,
      fields,
      reconstructed,
      timestamp: Date.now(),
    });

    try {
      await this.handler(fields, context);
    } catch (error) {
      this.ctx.failedRecords++;
      this.log.warn({ err: error, recordIndex, chunkIndex }, 'Record handler failed');
      this.ctx.eventBus.emit({
        type: 'record:failed',
        runId: this.ctx.runId,
        recordIndex,
        chunkIndex,
        error: errorMessage(error),
        timestamp: Date.now(),
      });
    }
  }

  private defer(bytes: Uint8Array, chunkIndex: number, reason: DeferReason): void {
    this.setCarry(bytes);
    if (bytes.length === 0) return;

    this.log.debug({ chunkIndex, carryBytes: bytes.length, reason }, 'Deferred dangling bytes');
    this.ctx.eventBus.emit({
      type: 'record:deferred',
      runId: this.ctx.runId,
      chunkIndex,
      carryBytes: bytes.length,
      reason,
      timestamp: Date.now(),
    });
  }

  private reportParseError(error: RecordParseError, chunkIndex: number | null, stage: ParseStage): void {
    this.ctx.parseErrors++;
    this.log.warn({ err: error, chunkIndex, stage }, 'Record parse failed');
    this.ctx.eventBus.emit({
      type: 'parse:failed',
      runId: this.ctx.runId,
      chunkIndex,
      stage,
      error: error.message,
      timestamp: Date.now(),
    });
  }

  private discardCarry(cause: string): void {
    if (this.carry.length > 0) {
      this.log.warn({ carryBytes: this.carry.length, cause }, 'Discarding carried bytes');
    }
    this.ctx.discardedBytes = this.carry.length;
    this.setCarry(EMPTY_BYTES);
  }

  private setCarry(bytes: Uint8Array): void {
    this.carry = bytes;
    this.ctx.carryBytes = bytes.length;
  }
}
