/** Outcome of one positional read. */
export interface ReadResult {
  /** Bytes written to the front of the buffer. */
  readonly bytesRead: number;
  /** `true` when the read reached the end of the source (`bytesRead` may still be > 0). */
  readonly endOfStream: boolean;
}

/** Metadata about the source (optional, for logging). */
export interface ReaderMetadata {
  readonly name?: string;
  readonly size?: number;
}

/**
 * Port for offset-addressed reads against any byte source (local file, remote object, memory).
 *
 * The chunk source is the only caller during a run and never issues two reads at once.
 * Implementations should honour `signal` so a cancelled run is not left waiting on I/O.
 */
export interface PositionalReader {
  /** Fill `buffer` from `offset` onwards, returning how many bytes were written. */
  readAt(buffer: Uint8Array, offset: number, signal?: AbortSignal): Promise<ReadResult>;
  /** Release underlying handles. Called once when the run ends. */
  close?(): Promise<void>;
  /** Return metadata about the source. */
  metadata(): ReaderMetadata;
}
