/** Context passed to the record handler for each reassembled record. */
export interface RecordContext {
  /** Unique run identifier. */
  readonly runId: string;
  /** Zero-based record index within the whole stream. */
  readonly recordIndex: number;
  /** Index of the chunk that completed the record. */
  readonly chunkIndex: number | null;
  /** `true` when the record was rebuilt from carried bytes. */
  readonly reconstructed: boolean;
  /** Abort signal. Check `signal.aborted` to detect cancellation. */
  readonly signal: AbortSignal;
}

/**
 * Callback invoked once per record, strictly in stream order.
 *
 * A thrown error or rejected promise is reported and counted; it does not stop the
 * pipeline. Call `cancel()` on the pipeline for fail-fast behaviour.
 */
export type RecordHandlerFn = (fields: readonly string[], context: RecordContext) => void | Promise<void>;
