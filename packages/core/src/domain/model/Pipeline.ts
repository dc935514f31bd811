import type { PipelineStatus } from './PipelineStatus.js';

/** Live counters for a run in progress. */
export interface PipelineProgress {
  /** Chunks published by the chunk source. */
  readonly chunks: number;
  /** Bytes read from the source. */
  readonly bytesRead: number;
  /** Records handed to the record handler. */
  readonly records: number;
  /** Records whose handler threw or rejected. */
  readonly failedRecords: number;
  /** Parse failures reported (per chunk, reconstruction or final flush). */
  readonly parseErrors: number;
  /** Bytes currently held in the carry buffer. */
  readonly carryBytes: number;
  readonly elapsedMs: number;
}

/** Final report returned by `start()` and attached to the terminal event. */
export interface PipelineSummary extends PipelineProgress {
  readonly runId: string;
  readonly status: PipelineStatus;
  /** Carry bytes dropped because the run was cancelled or the source failed. */
  readonly discardedBytes: number;
  /** Set when the run ended in `FAILED`. */
  readonly error?: Error;
}
