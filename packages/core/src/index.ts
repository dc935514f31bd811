// Main entry point
export { ChunkPipeline } from './ChunkPipeline.js';

// Domain model
export type { Chunk } from './domain/model/Chunk.js';
export { createChunk } from './domain/model/Chunk.js';
export type { PipelineProgress, PipelineSummary } from './domain/model/Pipeline.js';
export type { PipelineConfig, ResolvedPipelineConfig } from './domain/model/PipelineConfig.js';
export { DEFAULT_BUFFER_SIZE, MAX_TIMEOUT_MS, resolvePipelineConfig } from './domain/model/PipelineConfig.js';
export { PipelineStatus, canTransition, isTerminal } from './domain/model/PipelineStatus.js';

// Use case result types
export type { PipelineStatusResult } from './application/usecases/GetPipelineStatus.js';

// Domain services (for one-pass parses and custom reassembly)
export {
  LINE_FEED,
  CARRIAGE_RETURN,
  EMPTY_BYTES,
  concatBytes,
  indexOfLineFeed,
  trailingFragmentStart,
  isFlush,
} from './domain/services/RecordBoundary.js';
export { RecordReader, readRecords } from './domain/services/RecordReader.js';
export type { RecordSpan, RecordReadResult } from './domain/services/RecordReader.js';

// Application building blocks
export { EventBus } from './application/EventBus.js';
export { Conduit } from './application/Conduit.js';

// Ports (for custom implementations)
export type { PositionalReader, ReadResult, ReaderMetadata } from './domain/ports/PositionalReader.js';
export type { RecordParser } from './domain/ports/RecordParser.js';
export type { RecordHandlerFn, RecordContext } from './domain/ports/RecordHandler.js';

// Events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  DeferReason,
  ParseStage,
  PipelineStartedEvent,
  PipelineCompletedEvent,
  PipelineCancelledEvent,
  PipelineFailedEvent,
  ChunkReadEvent,
  ChunkProcessedEvent,
  RecordDeferredEvent,
  RecordEmittedEvent,
  RecordFailedEvent,
  ParseFailedEvent,
} from './domain/events/DomainEvents.js';

// Errors
export {
  ChunklineError,
  ConfigurationError,
  SourceReadError,
  RecordParseError,
  PipelineCancelledError,
  ConduitMisuseError,
  ConduitClosedError,
  InvalidStateError,
  errorMessage,
  toError,
} from './domain/errors/ChunklineError.js';
export type { ChunklineErrorCode } from './domain/errors/ChunklineError.js';

// Infrastructure: readers
export { BufferReader } from './infrastructure/readers/BufferReader.js';
export type { BufferReaderOptions } from './infrastructure/readers/BufferReader.js';
export { FileReader } from './infrastructure/readers/FileReader.js';
export { HttpRangeReader, parseContentRange } from './infrastructure/readers/HttpRangeReader.js';
export type { HttpRangeReaderOptions } from './infrastructure/readers/HttpRangeReader.js';

// Logging
export { logger, createLogger, logError } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
