import { describe, it, expect, vi } from 'vitest';
import { ChunkPipeline } from '../../src/ChunkPipeline.js';
import { BufferReader } from '../../src/infrastructure/readers/BufferReader.js';
import { concatBytes } from '../../src/domain/services/RecordBoundary.js';
import { SourceReadError } from '../../src/domain/errors/ChunklineError.js';
import type { ParseFailedEvent, RecordFailedEvent } from '../../src/domain/events/DomainEvents.js';
import type { PipelineConfig } from '../../src/domain/model/PipelineConfig.js';
import type { PositionalReader } from '../../src/domain/ports/PositionalReader.js';
import type { RecordParser } from '../../src/domain/ports/RecordParser.js';
import { splitParser, strictParser } from '../fixtures/parsers.js';
import { failAt } from '../fixtures/readers.js';

const encode = (text: string): Uint8Array => new TextEncoder().encode(text);
const INVALID_UTF8 = new Uint8Array([0xff]);

async function run(reader: PositionalReader, config: PipelineConfig = {}, parser: RecordParser = splitParser) {
  const pipeline = new ChunkPipeline(config).from(reader, parser);
  const parseFailures: ParseFailedEvent[] = [];
  pipeline.on('parse:failed', (event) => {
    parseFailures.push(event);
  });
  const records: string[][] = [];
  const summary = await pipeline.start((fields) => {
    records.push([...fields]);
  });
  return { summary, records, parseFailures };
}

// ============================================================
// Malformed records
// ============================================================

describe('Failures: malformed records', () => {
  it('should skip a malformed record and continue with the next chunk', async () => {
    // Chunks of 10 bytes: "a|b\nc|d\ne|" / "f\nx|y\n\xff|\np" / "|q\nr|s\n"
    const bytes = [encode('a|b\nc|d\ne|f\nx|y\n'), INVALID_UTF8, encode('|\np|q\nr|s\n')].reduce(concatBytes);

    const { summary, records, parseFailures } = await run(new BufferReader(bytes), { bufferSize: 10 });

    expect(records).toEqual([
      ['a', 'b'],
      ['c', 'd'],
      ['e', 'f'],
      ['x', 'y'],
      ['p', 'q'],
      ['r', 's'],
    ]);
    expect(parseFailures).toHaveLength(1);
    expect(parseFailures[0]).toMatchObject({
      chunkIndex: 1,
      stage: 'chunk',
      error: 'Invalid UTF-8 in record at byte 6',
    });
    expect(summary).toMatchObject({ status: 'COMPLETED', parseErrors: 1 });
  });

  it('should drop the rest of the chunk after a malformed record', async () => {
    const { records, parseFailures } = await run(new BufferReader('a|b\nc!\nd|e\nf|g'), {}, strictParser);

    expect(records).toEqual([
      ['a', 'b'],
      ['f', 'g'],
    ]);
    expect(parseFailures.map((event) => event.stage)).toEqual(['chunk']);
  });

  it('should report a malformed reconstructed record', async () => {
    const { records, parseFailures } = await run(new BufferReader('a|b\nc!|d\ne|f\n'), { bufferSize: 4 }, strictParser);

    expect(records).toEqual([
      ['a', 'b'],
      ['e', 'f'],
    ]);
    expect(parseFailures).toHaveLength(1);
    expect(parseFailures[0]).toMatchObject({ chunkIndex: 2, stage: 'reconstruct' });
  });

  it('should report a final record that cannot be parsed once, at end of stream', async () => {
    const bytes = concatBytes(encode('a|b\n'), INVALID_UTF8);

    const { summary, records, parseFailures } = await run(new BufferReader(bytes));

    expect(records).toEqual([['a', 'b']]);
    expect(parseFailures).toHaveLength(1);
    expect(parseFailures[0]).toMatchObject({ chunkIndex: 0, stage: 'flush' });
    expect(summary.status).toBe('COMPLETED');
  });
});

// ============================================================
// Record handler errors
// ============================================================

describe('Failures: record handler', () => {
  it('should count a failing record and keep going', async () => {
    const pipeline = new ChunkPipeline().from(new BufferReader('a\nboom\nc\n'), splitParser);
    const failures: RecordFailedEvent[] = [];
    pipeline.on('record:failed', (event) => {
      failures.push(event);
    });
    const seen: string[] = [];

    const summary = await pipeline.start(async (fields) => {
      const value = fields[0] ?? '';
      seen.push(value);
      if (value === 'boom') {
        await Promise.resolve();
        throw new Error(`handler rejected ${value}`);
      }
    });

    expect(seen).toEqual(['a', 'boom', 'c']);
    expect(summary).toMatchObject({ status: 'COMPLETED', records: 3, failedRecords: 1 });
    expect(failures).toHaveLength(1);
    expect(failures[0]).toMatchObject({ recordIndex: 1, chunkIndex: 0, error: 'handler rejected boom' });
  });

  it('should not be disturbed by a throwing event subscriber', async () => {
    const pipeline = new ChunkPipeline({ bufferSize: 3 }).from(new BufferReader('a\nb\nc\n'), splitParser);
    pipeline.on('record:emitted', () => {
      throw new Error('subscriber broke');
    });
    const seen: string[] = [];

    const summary = await pipeline.start((fields) => {
      seen.push(fields[0] ?? '');
    });

    expect(seen).toEqual(['a', 'b', 'c']);
    expect(summary.failedRecords).toBe(0);
  });
});

// ============================================================
// Source failures
// ============================================================

describe('Failures: source', () => {
  it('should fail the run and release the reassembler when a read fails', async () => {
    const reader = failAt(new BufferReader('a|b\nc|d\n'), 6, new Error('disk gone'));
    const pipeline = new ChunkPipeline({ bufferSize: 6 }).from(reader, splitParser);
    const failedEvents: string[] = [];
    pipeline.on('pipeline:failed', (event) => {
      failedEvents.push(event.error);
    });
    const records: string[][] = [];

    const summary = await pipeline.start((fields) => {
      records.push([...fields]);
    });

    expect(records).toEqual([['a', 'b']]);
    expect(summary).toMatchObject({ status: 'FAILED', chunks: 1, bytesRead: 6, records: 1, discardedBytes: 2 });
    expect(summary.error).toBeInstanceOf(SourceReadError);
    expect(summary.error?.message).toBe('Read failed at offset 6: disk gone');
    expect(summary.error).toHaveProperty('offset', 6);
    expect(failedEvents).toEqual(['Read failed at offset 6: disk gone']);
    expect(pipeline.getStatus().error).toBe(summary.error);
  });

  it('should fail when a reader reports an impossible byte count', async () => {
    const reader: PositionalReader = {
      readAt: () => Promise.resolve({ bytesRead: 99, endOfStream: false }),
      metadata: () => ({}),
    };

    const { summary } = await run(reader, { bufferSize: 4 });

    expect(summary.status).toBe('FAILED');
    expect(summary.error?.message).toBe('Reader returned an invalid byte count (99) at offset 0');
  });

  it('should close the reader once whatever the outcome', async () => {
    const inner = new BufferReader('a\n');
    const close = vi.fn(() => Promise.resolve());
    const reader: PositionalReader = {
      readAt: (buffer, offset, signal) => inner.readAt(buffer, offset, signal),
      close,
      metadata: () => inner.metadata(),
    };

    await run(reader);

    expect(close).toHaveBeenCalledOnce();
  });

  it('should complete even when closing the reader fails', async () => {
    const inner = new BufferReader('a\n');
    const reader: PositionalReader = {
      readAt: (buffer, offset, signal) => inner.readAt(buffer, offset, signal),
      close: () => Promise.reject(new Error('close failed')),
      metadata: () => inner.metadata(),
    };

    const { summary, records } = await run(reader);

    expect(records).toEqual([['a']]);
    expect(summary.status).toBe('COMPLETED');
  });
});
