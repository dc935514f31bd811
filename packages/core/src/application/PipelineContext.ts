import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { PipelineProgress, PipelineSummary } from '../domain/model/Pipeline.js';
import type { ResolvedPipelineConfig } from '../domain/model/PipelineConfig.js';
import type { PositionalReader } from '../domain/ports/PositionalReader.js';
import type { RecordParser } from '../domain/ports/RecordParser.js';
import { PipelineStatus, canTransition } from '../domain/model/PipelineStatus.js';
import { InvalidStateError, PipelineCancelledError, errorMessage } from '../domain/errors/ChunklineError.js';
import { logError } from '../utils/logger.js';
import { EventBus } from './EventBus.js';

/**
 * Mutable state shared by the use cases of a single run.
 *
 * Internal: not exported from the package entry point. The carry buffer itself is owned
 * by the reassembler; only its size is mirrored here for progress reporting.
 */
export class PipelineContext {
  readonly config: ResolvedPipelineConfig;
  readonly logger: Logger;
  readonly eventBus: EventBus;
  readonly runId: string;
  readonly abortController = new AbortController();

  reader: PositionalReader | null = null;
  parser: RecordParser | null = null;

  status: PipelineStatus = PipelineStatus.CREATED;
  startedAt: number | null = null;
  finishedAt: number | null = null;
  error: Error | null = null;

  chunks = 0;
  bytesRead = 0;
  records = 0;
  failedRecords = 0;
  parseErrors = 0;
  carryBytes = 0;
  discardedBytes = 0;

  constructor(config: ResolvedPipelineConfig, logger: Logger) {
    this.config = config;
    this.runId = randomUUID();
    this.logger = logger.child({ runId: this.runId });
    this.eventBus = new EventBus(this.logger);
  }

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  transitionTo(newStatus: PipelineStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new InvalidStateError(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }

  assertCanStart(): void {
    if (this.status !== PipelineStatus.CREATED) {
      throw new InvalidStateError(`Cannot start pipeline from status '${this.status}'`);
    }
  }

  requireSource(): { reader: PositionalReader; parser: RecordParser } {
    if (!this.reader || !this.parser) {
      throw new InvalidStateError('Reader and parser must be configured. Call .from(reader, parser) first.');
    }
    return { reader: this.reader, parser: this.parser };
  }

  /** Abort the run once; later calls keep the first reason. */
  abort(reason?: unknown): void {
    if (!this.abortController.signal.aborted) {
      this.abortController.abort(reason ?? new PipelineCancelledError());
    }
  }

  /**
   * Link the external signal and the deadline to this run's controller.
   * Returns a function that removes the listener and the timer.
   */
  armCancellation(): () => void {
    const cleanups: (() => void)[] = [];
    const external = this.config.signal;

    if (external) {
      if (external.aborted) {
        this.abort(external.reason);
      } else {
        const onAbort = (): void => {
          this.abort(external.reason);
        };
        external.addEventListener('abort', onAbort, { once: true });
        cleanups.push(() => {
          external.removeEventListener('abort', onAbort);
        });
      }
    }

    const timeoutMs = this.config.timeoutMs;
    if (timeoutMs !== null) {
      const timer = setTimeout(() => {
        this.logger.warn({ timeoutMs }, 'Pipeline deadline exceeded');
        this.abort(new PipelineCancelledError(`Deadline of ${String(timeoutMs)}ms exceeded`));
      }, timeoutMs);
      cleanups.push(() => {
        clearTimeout(timer);
      });
    }

    return () => {
      for (const cleanup of cleanups) cleanup();
    };
  }

  async closeReader(): Promise<void> {
    if (!this.reader?.close) return;
    try {
      await this.reader.close();
    } catch (error) {
      this.logger.warn({ err: error }, 'Failed to close reader');
    }
  }

  /** Move to a terminal status and publish the matching event. */
  finish(status: 'COMPLETED' | 'CANCELLED' | 'FAILED', error?: Error): PipelineSummary {
    this.transitionTo(status);
    this.finishedAt = Date.now();
    this.error = error ?? null;
    const summary = this.buildSummary();
    const timestamp = Date.now();

    if (status === PipelineStatus.COMPLETED) {
      this.logger.info({ records: summary.records, chunks: summary.chunks }, 'Pipeline completed');
      this.eventBus.emit({ type: 'pipeline:completed', runId: this.runId, summary, timestamp });
    } else if (status === PipelineStatus.CANCELLED) {
      this.logger.info({ records: summary.records, reason: errorMessage(this.signal.reason) }, 'Pipeline cancelled');
      this.eventBus.emit({ type: 'pipeline:cancelled', runId: this.runId, summary, timestamp });
    } else {
      logError(this.logger, error, { records: summary.records, chunks: summary.chunks });
      this.eventBus.emit({
        type: 'pipeline:failed',
        runId: this.runId,
        error: error ? error.message : 'Unknown error',
        summary,
        timestamp,
      });
    }

    return summary;
  }

  buildProgress(): PipelineProgress {
    const end = this.finishedAt ?? Date.now();
    return {
      chunks: this.chunks,
      bytesRead: this.bytesRead,
      records: this.records,
      failedRecords: this.failedRecords,
      parseErrors: this.parseErrors,
      carryBytes: this.carryBytes,
      elapsedMs: this.startedAt !== null ? end - this.startedAt : 0,
    };
  }

  buildSummary(): PipelineSummary {
    return {
      ...this.buildProgress(),
      runId: this.runId,
      status: this.status,
      discardedBytes: this.discardedBytes,
      ...(this.error ? { error: this.error } : {}),
    };
  }
}
