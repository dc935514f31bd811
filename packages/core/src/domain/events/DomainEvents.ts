import type { PipelineSummary } from '../model/Pipeline.js';

/** Emitted when `start()` or `readChunks()` begins reading. */
export interface PipelineStartedEvent {
  readonly type: 'pipeline:started';
  readonly runId: string;
  readonly bufferSize: number;
  readonly source: string;
  readonly timestamp: number;
}

/** Emitted when the source has been read to the end and every record was handed over. */
export interface PipelineCompletedEvent {
  readonly type: 'pipeline:completed';
  readonly runId: string;
  readonly summary: PipelineSummary;
  readonly timestamp: number;
}

/** Emitted when the run stops on cancellation or deadline. */
export interface PipelineCancelledEvent {
  readonly type: 'pipeline:cancelled';
  readonly runId: string;
  readonly summary: PipelineSummary;
  readonly timestamp: number;
}

/** Emitted when the source fails or the run hits an unexpected error. */
export interface PipelineFailedEvent {
  readonly type: 'pipeline:failed';
  readonly runId: string;
  readonly error: string;
  readonly summary: PipelineSummary;
  readonly timestamp: number;
}

/** Emitted by the chunk source before it offers a chunk to the conduit. */
export interface ChunkReadEvent {
  readonly type: 'chunk:read';
  readonly runId: string;
  readonly chunkIndex: number;
  readonly offset: number;
  readonly byteLength: number;
  readonly timestamp: number;
}

/** Emitted by the reassembler once it is done with a chunk. */
export interface ChunkProcessedEvent {
  readonly type: 'chunk:processed';
  readonly runId: string;
  readonly chunkIndex: number;
  /** Records handed to the handler while processing this chunk. */
  readonly emittedRecords: number;
  /** Carry size after the chunk. */
  readonly carryBytes: number;
  readonly timestamp: number;
}

/** Why bytes were moved to the carry buffer. */
export type DeferReason = 'boundary' | 'short-record' | 'parse-error';

/** Emitted when bytes are held back for the next chunk. */
export interface RecordDeferredEvent {
  readonly type: 'record:deferred';
  readonly runId: string;
  readonly chunkIndex: number;
  readonly carryBytes: number;
  readonly reason: DeferReason;
  readonly timestamp: number;
}

/** Emitted right before a record is handed to the handler. */
export interface RecordEmittedEvent {
  readonly type: 'record:emitted';
  readonly runId: string;
  readonly recordIndex: number;
  readonly chunkIndex: number | null;
  readonly fields: readonly string[];
  readonly reconstructed: boolean;
  readonly timestamp: number;
}

/** Emitted when the record handler throws or rejects. */
export interface RecordFailedEvent {
  readonly type: 'record:failed';
  readonly runId: string;
  readonly recordIndex: number;
  readonly chunkIndex: number | null;
  readonly error: string;
  readonly timestamp: number;
}

/** Where a parse failure happened. */
export type ParseStage = 'chunk' | 'reconstruct' | 'flush';

/** Emitted for each record that could not be parsed. */
export interface ParseFailedEvent {
  readonly type: 'parse:failed';
  readonly runId: string;
  readonly chunkIndex: number | null;
  readonly stage: ParseStage;
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | PipelineStartedEvent
  | PipelineCompletedEvent
  | PipelineCancelledEvent
  | PipelineFailedEvent
  | ChunkReadEvent
  | ChunkProcessedEvent
  | RecordDeferredEvent
  | RecordEmittedEvent
  | RecordFailedEvent
  | ParseFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
