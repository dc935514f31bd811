import { ConduitClosedError, ConduitMisuseError, PipelineCancelledError } from '../domain/errors/ChunklineError.js';

interface PendingSend<T> {
  readonly item: T;
  readonly resolve: () => void;
  readonly reject: (error: Error) => void;
}

interface PendingReceive<T> {
  readonly resolve: (item: T | undefined) => void;
  readonly reject: (error: Error) => void;
}

function cancelled(signal: AbortSignal): PipelineCancelledError {
  return new PipelineCancelledError('Pipeline cancelled', { cause: signal.reason });
}

/**
 * Unbuffered single-producer/single-consumer handoff.
 *
 * `send()` settles only once the consumer has taken the item, so at most one item is ever
 * in flight and a slow consumer holds the producer back. `close()` ends the stream;
 * closing with a reason makes the drained consumer's `receive()` reject with it.
 */
export class Conduit<T extends object> implements AsyncIterable<T> {
  private pendingSend: PendingSend<T> | null = null;
  private pendingReceive: PendingReceive<T> | null = null;
  private closed = false;
  private closeReason: Error | null = null;

  get isClosed(): boolean {
    return this.closed;
  }

  /** Items published but not yet taken by the consumer (0 or 1). */
  get pending(): number {
    return this.pendingSend ? 1 : 0;
  }

  send(item: T, signal?: AbortSignal): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ConduitClosedError());
    }
    if (signal?.aborted) {
      return Promise.reject(cancelled(signal));
    }
    if (this.pendingSend) {
      return Promise.reject(new ConduitMisuseError('Conduit: a send is already waiting, only one producer may publish'));
    }

    const receiver = this.pendingReceive;
    if (receiver) {
      this.pendingReceive = null;
      receiver.resolve(item);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        if (this.pendingSend === entry) {
          this.pendingSend = null;
        }
        if (signal) reject(cancelled(signal));
      };
      const entry: PendingSend<T> = {
        item,
        resolve: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
        reject: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      };
      this.pendingSend = entry;
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Resolve with the next item, or `undefined` once the conduit is closed and drained. */
  receive(signal?: AbortSignal): Promise<T | undefined> {
    if (signal?.aborted) {
      return Promise.reject(cancelled(signal));
    }

    const sender = this.pendingSend;
    if (sender) {
      this.pendingSend = null;
      sender.resolve();
      return Promise.resolve(sender.item);
    }

    if (this.closed) {
      return this.closeReason ? Promise.reject(this.closeReason) : Promise.resolve(undefined);
    }
    if (this.pendingReceive) {
      return Promise.reject(new ConduitMisuseError('Conduit: a receive is already waiting, only one consumer may read'));
    }

    return new Promise<T | undefined>((resolve, reject) => {
      const onAbort = (): void => {
        if (this.pendingReceive === entry) {
          this.pendingReceive = null;
        }
        if (signal) reject(cancelled(signal));
      };
      const entry: PendingReceive<T> = {
        resolve: (item) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(item);
        },
        reject: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      };
      this.pendingReceive = entry;
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Close the conduit. Later calls are ignored. */
  close(reason?: Error): void {
    if (this.closed) return;
    this.closed = true;
    this.closeReason = reason ?? null;

    const receiver = this.pendingReceive;
    this.pendingReceive = null;
    if (receiver) {
      if (reason) receiver.reject(reason);
      else receiver.resolve(undefined);
    }

    const sender = this.pendingSend;
    this.pendingSend = null;
    sender?.reject(new ConduitClosedError('Conduit closed before the item was taken'));
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    for (;;) {
      const item = await this.receive();
      if (item === undefined) return;
      yield item;
    }
  }
}
