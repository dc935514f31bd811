import type { Chunk } from './domain/model/Chunk.js';
import type { PipelineSummary } from './domain/model/Pipeline.js';
import type { PipelineConfig } from './domain/model/PipelineConfig.js';
import type { PositionalReader } from './domain/ports/PositionalReader.js';
import type { RecordParser } from './domain/ports/RecordParser.js';
import type { RecordHandlerFn } from './domain/ports/RecordHandler.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { resolvePipelineConfig } from './domain/model/PipelineConfig.js';
import { PipelineContext } from './application/PipelineContext.js';
import { RunPipeline } from './application/usecases/RunPipeline.js';
import { ReadChunks } from './application/usecases/ReadChunks.js';
import { CancelPipeline } from './application/usecases/CancelPipeline.js';
import { GetPipelineStatus } from './application/usecases/GetPipelineStatus.js';
import type { PipelineStatusResult } from './application/usecases/GetPipelineStatus.js';
import { createLogger } from './utils/logger.js';

/**
 * Facade that runs one chunked ingestion: positional reads → single-slot conduit → record reassembly.
 *
 * Delegates each operation to a dedicated use case in `application/usecases/`.
 * Holds the shared `PipelineContext` that all use cases operate on. A pipeline runs once.
 *
 * @example
 * ```typescript
 * const pipeline = new ChunkPipeline({ bufferSize: 64 * 1024 });
 * pipeline.from(new FileReader('./export.txt'), myParser);
 * const summary = await pipeline.start(async (fields) => { await db.insert(fields); });
 * ```
 */
export class ChunkPipeline {
  private readonly ctx: PipelineContext;

  /** @throws ConfigurationError when a configuration value is invalid. */
  constructor(config: PipelineConfig = {}) {
    this.ctx = new PipelineContext(resolvePipelineConfig(config), config.logger ?? createLogger('pipeline'));
  }

  /** Set the positional reader and the record parser. Returns `this` for chaining. */
  from(reader: PositionalReader, parser: RecordParser): this {
    this.ctx.reader = reader;
    this.ctx.parser = parser;
    return this;
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /**
   * Read the whole source and hand every record to `handler`, in stream order.
   *
   * Resolves with the run summary whether the run completed, was cancelled or failed.
   *
   * @throws InvalidStateError if `from()` was not called or the pipeline already ran.
   */
  async start(handler: RecordHandlerFn): Promise<PipelineSummary> {
    return new RunPipeline(this.ctx).execute(handler);
  }

  /**
   * Stream the raw chunks without reassembling records.
   *
   * Each chunk is read only when the loop asks for it. Breaking out of the loop
   * cancels the run; a source failure is thrown from the loop.
   *
   * @throws InvalidStateError if `from()` was not called or the pipeline already ran.
   */
  readChunks(): AsyncGenerator<Chunk, void, undefined> {
    this.ctx.assertCanStart();
    this.ctx.requireSource();
    return new ReadChunks(this.ctx).execute();
  }

  /** Cancel the run. A pipeline that has not started moves straight to `CANCELLED`. */
  cancel(): void {
    new CancelPipeline(this.ctx).execute();
  }

  /** Get current status and progress counters. */
  getStatus(): PipelineStatusResult {
    return new GetPipelineStatus(this.ctx).execute();
  }

  /** Get the unique run identifier (UUID). */
  getRunId(): string {
    return this.ctx.runId;
  }
}
