import {
  ChunkPipeline,
  FileReader,
  type Chunk,
  type DomainEvent,
  type EventPayload,
  type EventType,
  type PipelineConfig,
  type PipelineStatusResult,
  type PipelineSummary,
  type PositionalReader,
  type RecordHandlerFn,
} from '@chunkline/core';
import { DelimitedParser } from './infrastructure/parsers/DelimitedParser.js';

/** Configuration for a delimited-text ingestion. */
export interface DelimitedIngestConfig extends PipelineConfig {
  /** Single-character field separator. Not `\n`, `\r` or `"`. Default: `'|'`. */
  readonly delimiter?: string;
}

/**
 * Facade for ingesting delimited text: chunked reads → record reassembly → field splitting.
 *
 * Wraps `ChunkPipeline` from `@chunkline/core` with a `DelimitedParser`.
 *
 * @example
 * ```typescript
 * const ingest = DelimitedIngest.fromFile('./accounts.txt', { delimiter: '|', minFieldsPerRecord: 8 });
 * const summary = await ingest.start(async (fields) => { await repository.save(fields); });
 * ```
 */
export class DelimitedIngest {
  private readonly pipeline: ChunkPipeline;
  private readonly parser: DelimitedParser;

  /** @throws ConfigurationError when the delimiter or a pipeline setting is invalid. */
  constructor(config: DelimitedIngestConfig = {}) {
    const { delimiter, ...pipelineConfig } = config;
    this.parser = new DelimitedParser(delimiter !== undefined ? { delimiter } : {});
    this.pipeline = new ChunkPipeline(pipelineConfig);
  }

  /** Create an ingestion reading a local file. */
  static fromFile(filePath: string, config?: DelimitedIngestConfig): DelimitedIngest {
    return new DelimitedIngest(config).from(new FileReader(filePath));
  }

  /** Set the positional reader. Returns `this` for chaining. */
  from(reader: PositionalReader): this {
    this.pipeline.from(reader, this.parser);
    return this;
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.pipeline.on(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.pipeline.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.pipeline.offAny(handler);
    return this;
  }

  /** Read the whole source and hand every record's fields to `handler`, in order. */
  async start(handler: RecordHandlerFn): Promise<PipelineSummary> {
    return this.pipeline.start(handler);
  }

  /** Stream the raw chunks without reassembly. */
  readChunks(): AsyncGenerator<Chunk, void, undefined> {
    return this.pipeline.readChunks();
  }

  cancel(): void {
    this.pipeline.cancel();
  }

  getStatus(): PipelineStatusResult {
    return this.pipeline.getStatus();
  }

  getRunId(): string {
    return this.pipeline.getRunId();
  }

  /** The field separator in use. */
  getDelimiter(): string {
    return this.parser.delimiter;
  }
}
