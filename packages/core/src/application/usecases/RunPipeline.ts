import type { Chunk } from '../../domain/model/Chunk.js';
import type { PipelineSummary } from '../../domain/model/Pipeline.js';
import type { RecordHandlerFn } from '../../domain/ports/RecordHandler.js';
import { PipelineStatus } from '../../domain/model/PipelineStatus.js';
import { toError } from '../../domain/errors/ChunklineError.js';
import { Conduit } from '../Conduit.js';
import type { PipelineContext } from '../PipelineContext.js';
import { ProduceChunks } from './ProduceChunks.js';
import { ReassembleRecords } from './ReassembleRecords.js';

/**
 * Use case: run the chunk source and the record reassembler side by side until the
 * stream is exhausted, cancelled or failed.
 *
 * Never rejects for run-time failures: the error is reported in the returned summary
 * and in the `pipeline:failed` event. Only misuse (no source, already started) throws.
 */
export class RunPipeline {
  constructor(private readonly ctx: PipelineContext) {}

  async execute(handler: RecordHandlerFn): Promise<PipelineSummary> {
    this.ctx.assertCanStart();
    const { reader } = this.ctx.requireSource();

    this.ctx.transitionTo(PipelineStatus.RUNNING);
    this.ctx.startedAt = Date.now();
    const disarm = this.ctx.armCancellation();

    // Yield to next microtask so handlers registered after start() on the same tick receive this event
    await Promise.resolve();

    this.ctx.eventBus.emit({
      type: 'pipeline:started',
      runId: this.ctx.runId,
      bufferSize: this.ctx.config.bufferSize,
      source: reader.metadata().name ?? 'unknown',
      timestamp: Date.now(),
    });
    this.ctx.logger.info({ bufferSize: this.ctx.config.bufferSize }, 'Pipeline started');

    const signal = this.ctx.signal;
    const conduit = new Conduit<Chunk>();
    const producer = new ProduceChunks(this.ctx, conduit).execute(signal);
    const consumer = new ReassembleRecords(this.ctx, conduit, handler).execute(signal).catch((error: unknown) => {
      // Release a producer blocked on the conduit before surfacing the failure.
      this.ctx.abort(error);
      throw error;
    });

    const [produced, consumed] = await Promise.allSettled([producer, consumer]);
    disarm();
    await this.ctx.closeReader();

    if (produced.status === 'rejected') {
      return this.ctx.finish(PipelineStatus.FAILED, toError(produced.reason));
    }
    if (consumed.status === 'rejected') {
      return this.ctx.finish(PipelineStatus.FAILED, toError(consumed.reason));
    }
    if (consumed.value === 'cancelled') {
      return this.ctx.finish(PipelineStatus.CANCELLED);
    }
    return this.ctx.finish(PipelineStatus.COMPLETED);
  }
}
