import type { PipelineStatus } from '../../domain/model/PipelineStatus.js';
import type { PipelineProgress } from '../../domain/model/Pipeline.js';
import type { PipelineContext } from '../PipelineContext.js';

/** Result of querying pipeline status. */
export interface PipelineStatusResult {
  readonly runId: string;
  readonly status: PipelineStatus;
  readonly progress: PipelineProgress;
  /** Set once the run has failed. */
  readonly error: Error | null;
}

/** Use case: query the current status and counters of a pipeline. */
export class GetPipelineStatus {
  constructor(private readonly ctx: PipelineContext) {}

  execute(): PipelineStatusResult {
    return {
      runId: this.ctx.runId,
      status: this.ctx.status,
      progress: this.ctx.buildProgress(),
      error: this.ctx.error,
    };
  }
}
