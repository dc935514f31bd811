/** Machine-readable error categories. */
export type ChunklineErrorCode =
  | 'CONFIGURATION'
  | 'SOURCE_READ'
  | 'RECORD_PARSE'
  | 'CANCELLED'
  | 'CONDUIT_MISUSE'
  | 'CONDUIT_CLOSED'
  | 'INVALID_STATE';

/** Base class for every error raised by the pipeline. */
export class ChunklineError extends Error {
  readonly code: ChunklineErrorCode;

  constructor(code: ChunklineErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    this.name = new.target.name;
  }
}

/** A configuration value was rejected at construction time. */
export class ConfigurationError extends ChunklineError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

/** The positional reader failed for a reason other than end of stream. */
export class SourceReadError extends ChunklineError {
  /** Byte offset of the read that failed. */
  readonly offset: number;

  constructor(message: string, offset: number, options?: ErrorOptions) {
    super('SOURCE_READ', message, options);
    this.offset = offset;
  }
}

/** Bytes that are not a boundary artifact could not be turned into a record. */
export class RecordParseError extends ChunklineError {
  /** Offset of the offending record within the bytes being parsed. */
  readonly byteOffset: number;

  constructor(message: string, byteOffset: number, options?: ErrorOptions) {
    super('RECORD_PARSE', message, options);
    this.byteOffset = byteOffset;
  }
}

/** A wait was abandoned because the run was cancelled or hit its deadline. */
export class PipelineCancelledError extends ChunklineError {
  constructor(message = 'Pipeline cancelled', options?: ErrorOptions) {
    super('CANCELLED', message, options);
  }
}

/** The conduit was used by more than one producer or consumer at a time. */
export class ConduitMisuseError extends ChunklineError {
  constructor(message: string) {
    super('CONDUIT_MISUSE', message);
  }
}

/** A chunk was published after the conduit was closed. */
export class ConduitClosedError extends ChunklineError {
  constructor(message = 'Conduit is closed') {
    super('CONDUIT_CLOSED', message);
  }
}

/** An operation is not allowed in the pipeline's current status. */
export class InvalidStateError extends ChunklineError {
  constructor(message: string) {
    super('INVALID_STATE', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Normalise a rejection value into an `Error`. */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
