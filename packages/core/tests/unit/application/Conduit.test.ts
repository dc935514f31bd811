import { describe, it, expect } from 'vitest';
import { Conduit } from '../../../src/application/Conduit.js';
import {
  ConduitClosedError,
  ConduitMisuseError,
  PipelineCancelledError,
} from '../../../src/domain/errors/ChunklineError.js';

interface Item {
  readonly n: number;
}

describe('Conduit', () => {
  it('should settle send() only once the consumer takes the item', async () => {
    const conduit = new Conduit<Item>();
    let delivered = false;

    const sending = conduit.send({ n: 1 }).then(() => {
      delivered = true;
    });
    await Promise.resolve();

    expect(delivered).toBe(false);
    expect(conduit.pending).toBe(1);

    await expect(conduit.receive()).resolves.toEqual({ n: 1 });
    await sending;
    expect(delivered).toBe(true);
    expect(conduit.pending).toBe(0);
  });

  it('should hand an item straight to a waiting receiver', async () => {
    const conduit = new Conduit<Item>();
    const receiving = conduit.receive();

    await conduit.send({ n: 7 });

    await expect(receiving).resolves.toEqual({ n: 7 });
    expect(conduit.pending).toBe(0);
  });

  it('should resolve receive() with undefined once closed', async () => {
    const conduit = new Conduit<Item>();
    const receiving = conduit.receive();

    conduit.close();
    conduit.close();

    await expect(receiving).resolves.toBeUndefined();
    await expect(conduit.receive()).resolves.toBeUndefined();
    expect(conduit.isClosed).toBe(true);
  });

  it('should reject receive() with the close reason', async () => {
    const conduit = new Conduit<Item>();
    const failure = new Error('source failed');
    const receiving = conduit.receive();

    conduit.close(failure);

    await expect(receiving).rejects.toBe(failure);
    await expect(conduit.receive()).rejects.toBe(failure);
  });

  it('should reject a send that is still waiting when the conduit closes', async () => {
    const conduit = new Conduit<Item>();
    const sending = conduit.send({ n: 1 });

    conduit.close();

    await expect(sending).rejects.toBeInstanceOf(ConduitClosedError);
    expect(conduit.pending).toBe(0);
  });

  it('should reject send() after close()', async () => {
    const conduit = new Conduit<Item>();
    conduit.close();

    await expect(conduit.send({ n: 1 })).rejects.toBeInstanceOf(ConduitClosedError);
  });

  it('should reject a second concurrent send', async () => {
    const conduit = new Conduit<Item>();
    const first = conduit.send({ n: 1 });

    await expect(conduit.send({ n: 2 })).rejects.toBeInstanceOf(ConduitMisuseError);
    expect(conduit.pending).toBe(1);

    await expect(conduit.receive()).resolves.toEqual({ n: 1 });
    await first;
  });

  it('should reject a second concurrent receive', async () => {
    const conduit = new Conduit<Item>();
    const first = conduit.receive();

    await expect(conduit.receive()).rejects.toBeInstanceOf(ConduitMisuseError);

    conduit.close();
    await expect(first).resolves.toBeUndefined();
  });

  it('should release a blocked receive when its signal aborts', async () => {
    const conduit = new Conduit<Item>();
    const controller = new AbortController();
    const reason = new Error('deadline');
    const receiving = conduit.receive(controller.signal);

    controller.abort(reason);

    const error: unknown = await receiving.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(PipelineCancelledError);
    expect(error).toHaveProperty('cause', reason);
  });

  it('should release a blocked send when its signal aborts', async () => {
    const conduit = new Conduit<Item>();
    const controller = new AbortController();
    const sending = conduit.send({ n: 1 }, controller.signal);

    controller.abort();

    await expect(sending).rejects.toBeInstanceOf(PipelineCancelledError);
    expect(conduit.pending).toBe(0);
  });

  it('should reject immediately when the signal is already aborted', async () => {
    const conduit = new Conduit<Item>();
    const controller = new AbortController();
    controller.abort();

    await expect(conduit.send({ n: 1 }, controller.signal)).rejects.toBeInstanceOf(PipelineCancelledError);
    await expect(conduit.receive(controller.signal)).rejects.toBeInstanceOf(PipelineCancelledError);
  });

  it('should iterate items in order until closed', async () => {
    const conduit = new Conduit<Item>();
    const producing = (async () => {
      for (let n = 0; n < 3; n++) {
        await conduit.send({ n });
      }
      conduit.close();
    })();

    const received: number[] = [];
    for await (const item of conduit) {
      received.push(item.n);
    }
    await producing;

    expect(received).toEqual([0, 1, 2]);
  });
});
