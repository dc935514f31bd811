import { describe, it, expect } from 'vitest';
import { ChunkPipeline } from '../../src/ChunkPipeline.js';
import { BufferReader } from '../../src/infrastructure/readers/BufferReader.js';
import { InvalidStateError } from '../../src/domain/errors/ChunklineError.js';
import type { PositionalReader, ReadResult } from '../../src/domain/ports/PositionalReader.js';
import { splitParser } from '../fixtures/parsers.js';
import { stalledReader, stallAt } from '../fixtures/readers.js';

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/** Reader whose reads wait until the signal aborts, then reject with its reason. */
function signalAwareStall(): PositionalReader {
  return {
    readAt: (_buffer, _offset, signal) =>
      new Promise<ReadResult>((_resolve, reject) => {
        signal?.addEventListener('abort', () => {
          reject(signal.reason);
        });
      }),
    metadata: () => ({ name: 'waiting' }),
  };
}

describe('Cancellation', () => {
  it('should stop a run blocked on a read that honours the signal', async () => {
    const pipeline = new ChunkPipeline().from(signalAwareStall(), splitParser);
    const running = pipeline.start(() => undefined);

    await sleep(10);
    pipeline.cancel();
    const summary = await running;

    expect(summary.status).toBe('CANCELLED');
    expect(summary.records).toBe(0);
    expect(summary.error).toBeUndefined();
    expect(pipeline.getStatus().status).toBe('CANCELLED');
  });

  it('should stop a run blocked on a read that ignores the signal', async () => {
    const pipeline = new ChunkPipeline().from(stalledReader(), splitParser);
    const running = pipeline.start(() => undefined);

    await sleep(10);
    pipeline.cancel();

    await expect(running).resolves.toMatchObject({ status: 'CANCELLED', chunks: 0 });
  });

  it('should cancel when the deadline passes', async () => {
    const pipeline = new ChunkPipeline({ timeoutMs: 20 }).from(stalledReader(), splitParser);
    const cancelled: string[] = [];
    pipeline.on('pipeline:cancelled', (event) => {
      cancelled.push(event.summary.status);
    });

    const summary = await pipeline.start(() => undefined);

    expect(summary.status).toBe('CANCELLED');
    expect(cancelled).toEqual(['CANCELLED']);
  });

  it('should not read at all when the external signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const pipeline = new ChunkPipeline({ signal: controller.signal }).from(new BufferReader('a|b\n'), splitParser);

    const summary = await pipeline.start(() => undefined);

    expect(summary).toMatchObject({ status: 'CANCELLED', chunks: 0, records: 0 });
  });

  it('should finish the in-flight chunk and discard the carry when the external signal aborts', async () => {
    const controller = new AbortController();
    const pipeline = new ChunkPipeline({ signal: controller.signal }).from(
      new BufferReader('a|b\nc|d\ne|f\n'),
      splitParser,
    );
    const records: string[][] = [];

    const summary = await pipeline.start((fields) => {
      records.push([...fields]);
      controller.abort();
    });

    expect(records).toEqual([
      ['a', 'b'],
      ['c', 'd'],
    ]);
    expect(summary).toMatchObject({ status: 'CANCELLED', records: 2, discardedBytes: 4, carryBytes: 0 });
  });

  it('should stop after cancel() from inside the handler', async () => {
    const pipeline = new ChunkPipeline({ bufferSize: 6 }).from(
      stallAt(new BufferReader('a|b\nc|d\n'), 6),
      splitParser,
    );
    const records: string[][] = [];

    const summary = await pipeline.start((fields) => {
      records.push([...fields]);
      pipeline.cancel();
    });

    expect(records).toEqual([['a', 'b']]);
    expect(summary).toMatchObject({ status: 'CANCELLED', records: 1, discardedBytes: 2 });
  });

  it('should hold at most one unconsumed chunk while the handler is slow', async () => {
    const content = Array.from({ length: 10 }, (_, i) => `r${String(i)}\n`).join('');
    const pipeline = new ChunkPipeline({ bufferSize: 3 }).from(new BufferReader(content), splitParser);
    let read = 0;
    let processed = 0;
    let maxAhead = 0;
    pipeline.on('chunk:read', () => {
      read++;
    });
    pipeline.on('chunk:processed', () => {
      processed++;
    });
    const records: string[] = [];

    await pipeline.start(async (fields) => {
      maxAhead = Math.max(maxAhead, read - processed);
      await sleep(2);
      records.push(fields[0] ?? '');
    });

    // One chunk in the reassembler, at most one more waiting in the conduit.
    expect(maxAhead).toBeLessThanOrEqual(2);
    expect(records).toEqual(['r0', 'r1', 'r2', 'r3', 'r4', 'r5', 'r6', 'r7', 'r8', 'r9']);
  });
});

describe('Pipeline lifecycle', () => {
  it('should move straight to CANCELLED when cancelled before start', async () => {
    const pipeline = new ChunkPipeline().from(new BufferReader('a\n'), splitParser);

    pipeline.cancel();

    expect(pipeline.getStatus().status).toBe('CANCELLED');
    await expect(pipeline.start(() => undefined)).rejects.toThrow("Cannot start pipeline from status 'CANCELLED'");
  });

  it('should reject cancel() once the run has finished', async () => {
    const pipeline = new ChunkPipeline().from(new BufferReader('a\n'), splitParser);
    await pipeline.start(() => undefined);

    expect(() => {
      pipeline.cancel();
    }).toThrow(InvalidStateError);
  });

  it('should run only once', async () => {
    const pipeline = new ChunkPipeline().from(new BufferReader('a\n'), splitParser);
    await pipeline.start(() => undefined);

    await expect(pipeline.start(() => undefined)).rejects.toThrow(InvalidStateError);
  });

  it('should require a reader and a parser', async () => {
    const pipeline = new ChunkPipeline();

    await expect(pipeline.start(() => undefined)).rejects.toThrow(
      'Reader and parser must be configured. Call .from(reader, parser) first.',
    );
  });

  it('should publish started and completed events with the run id', async () => {
    const pipeline = new ChunkPipeline({ bufferSize: 8 }).from(new BufferReader('a\n', { name: 'inline' }), splitParser);
    const running = pipeline.start(() => undefined);
    const types: string[] = [];
    const runIds = new Set<string>();
    let source = '';
    pipeline.onAny((event) => {
      types.push(event.type);
      runIds.add(event.runId);
    });
    pipeline.on('pipeline:started', (event) => {
      source = event.source;
    });

    const summary = await running;

    expect(types[0]).toBe('pipeline:started');
    expect(types[types.length - 1]).toBe('pipeline:completed');
    expect(source).toBe('inline');
    expect([...runIds]).toEqual([pipeline.getRunId()]);
    expect(summary.runId).toBe(pipeline.getRunId());
  });

  it('should report progress while running', async () => {
    const pipeline = new ChunkPipeline({ bufferSize: 4 }).from(new BufferReader('a|b\nc|d\n'), splitParser);
    const seen: string[] = [];

    await pipeline.start(() => {
      const { status, progress } = pipeline.getStatus();
      seen.push(`${status}:${String(progress.chunks)}`);
    });

    expect(seen).toEqual(['RUNNING:2', 'RUNNING:2']);
    expect(pipeline.getStatus().progress.records).toBe(2);
  });
});
