import { PipelineStatus } from '../../domain/model/PipelineStatus.js';
import { InvalidStateError, PipelineCancelledError } from '../../domain/errors/ChunklineError.js';
import type { PipelineContext } from '../PipelineContext.js';

/**
 * Use case: cancel the run. Terminal state, a cancelled pipeline cannot be restarted.
 *
 * A running pipeline stops at its next wait point; `start()` then resolves with a
 * `CANCELLED` summary.
 */
export class CancelPipeline {
  constructor(private readonly ctx: PipelineContext) {}

  execute(): void {
    const status = this.ctx.status;

    if (status === PipelineStatus.CREATED) {
      this.ctx.abort(new PipelineCancelledError('Pipeline cancelled before start'));
      this.ctx.finish(PipelineStatus.CANCELLED);
      return;
    }
    if (status === PipelineStatus.RUNNING) {
      this.ctx.logger.debug('Cancellation requested');
      this.ctx.abort(new PipelineCancelledError('Pipeline cancelled by caller'));
      return;
    }

    throw new InvalidStateError(`Cannot cancel pipeline from status '${status}'`);
  }
}
