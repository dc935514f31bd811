import type { Chunk } from '../../domain/model/Chunk.js';
import { PipelineStatus } from '../../domain/model/PipelineStatus.js';
import { PipelineCancelledError, toError } from '../../domain/errors/ChunklineError.js';
import { Conduit } from '../Conduit.js';
import type { PipelineContext } from '../PipelineContext.js';
import { ProduceChunks } from './ProduceChunks.js';

/**
 * Use case: expose the raw chunk stream without reassembly.
 *
 * The caller is the consumer: the next read is not issued until the caller asks for
 * the next chunk. Leaving the loop early cancels the run. A source failure is thrown
 * from the iteration after the chunks read before it.
 */
export class ReadChunks {
  constructor(private readonly ctx: PipelineContext) {}

  async *execute(): AsyncGenerator<Chunk, void, undefined> {
    this.ctx.assertCanStart();
    const { reader } = this.ctx.requireSource();

    this.ctx.transitionTo(PipelineStatus.RUNNING);
    this.ctx.startedAt = Date.now();
    const disarm = this.ctx.armCancellation();

    await Promise.resolve();

    this.ctx.eventBus.emit({
      type: 'pipeline:started',
      runId: this.ctx.runId,
      bufferSize: this.ctx.config.bufferSize,
      source: reader.metadata().name ?? 'unknown',
      timestamp: Date.now(),
    });

    const signal = this.ctx.signal;
    const conduit = new Conduit<Chunk>();
    const settled = new ProduceChunks(this.ctx, conduit).execute(signal).then(
      () => null,
      (error: unknown) => toError(error),
    );

    let drained = false;
    let failure: Error | null = null;

    try {
      for (;;) {
        let chunk: Chunk | undefined;
        try {
          chunk = await conduit.receive(signal);
        } catch (error) {
          if (!(error instanceof PipelineCancelledError)) failure = toError(error);
          break;
        }
        if (!chunk) {
          drained = true;
          break;
        }
        yield chunk;
      }
    } finally {
      if (!drained && !failure) {
        this.ctx.abort(new PipelineCancelledError('Chunk stream closed by consumer'));
      }
      const produceError = await settled;
      disarm();
      await this.ctx.closeReader();

      failure = failure ?? produceError;
      if (failure) {
        this.ctx.finish(PipelineStatus.FAILED, failure);
      } else if (drained) {
        this.ctx.finish(PipelineStatus.COMPLETED);
      } else {
        this.ctx.finish(PipelineStatus.CANCELLED);
      }
    }

    if (failure) throw failure;
  }
}
