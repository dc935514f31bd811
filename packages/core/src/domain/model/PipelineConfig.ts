import type { Logger } from 'pino';
import { ConfigurationError } from '../errors/ChunklineError.js';

/** Read size used when none is configured. */
export const DEFAULT_BUFFER_SIZE = 400;

/** Longest delay a timer accepts; larger values fire immediately. */
export const MAX_TIMEOUT_MS = 2147483647;

/** Configuration accepted by `ChunkPipeline`. */
export interface PipelineConfig {
  /** Bytes requested per positional read. Must be a positive integer. Default: `400`. */
  readonly bufferSize?: number;
  /**
   * Records with fewer fields than this are treated as dangling and deferred to
   * the next chunk. Unset by default: only the chunk-boundary rule applies.
   */
  readonly minFieldsPerRecord?: number;
  /** External cancellation signal. */
  readonly signal?: AbortSignal;
  /** Deadline for the whole run, in milliseconds. At most `MAX_TIMEOUT_MS`. */
  readonly timeoutMs?: number;
  /** Logger for this pipeline. Default: the `pipeline` child of the package logger. */
  readonly logger?: Logger;
}

/** Configuration with defaults applied and values validated. */
export interface ResolvedPipelineConfig {
  readonly bufferSize: number;
  readonly minFieldsPerRecord: number | null;
  readonly signal: AbortSignal | null;
  readonly timeoutMs: number | null;
}

export function resolvePipelineConfig(config: PipelineConfig): ResolvedPipelineConfig {
  const bufferSize = config.bufferSize ?? DEFAULT_BUFFER_SIZE;
  if (!Number.isSafeInteger(bufferSize) || bufferSize <= 0) {
    throw new ConfigurationError(`bufferSize must be a positive integer, got ${String(bufferSize)}`);
  }

  const minFields = config.minFieldsPerRecord;
  if (minFields !== undefined && (!Number.isSafeInteger(minFields) || minFields < 1)) {
    throw new ConfigurationError(`minFieldsPerRecord must be a positive integer, got ${String(minFields)}`);
  }

  const timeoutMs = config.timeoutMs;
  if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs <= 0)) {
    throw new ConfigurationError(`timeoutMs must be a positive number, got ${String(timeoutMs)}`);
  }
  if (timeoutMs !== undefined && timeoutMs > MAX_TIMEOUT_MS) {
    throw new ConfigurationError(
      `timeoutMs must be at most ${String(MAX_TIMEOUT_MS)}, got ${String(timeoutMs)}; omit it for no deadline`,
    );
  }

  return {
    bufferSize,
    minFieldsPerRecord: minFields ?? null,
    signal: config.signal ?? null,
    timeoutMs: timeoutMs ?? null,
  };
}
