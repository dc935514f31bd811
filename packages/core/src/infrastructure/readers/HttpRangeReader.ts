import type { PositionalReader, ReadResult, ReaderMetadata } from '../../domain/ports/PositionalReader.js';
import { createLogger } from '../../utils/logger.js';

export interface HttpRangeReaderOptions {
  /** Custom HTTP headers sent with every request (e.g. authorization for a signed URL). */
  readonly headers?: Readonly<Record<string, string>>;
  /** Per-request timeout in milliseconds. Default: `30000` (30 seconds). */
  readonly timeout?: number;
  /** Name for metadata. Default: extracted from the URL path. */
  readonly name?: string;
}

interface ContentRange {
  readonly start: number;
  readonly end: number;
  readonly total: number | null;
}

const CONTENT_RANGE = /^bytes (\d+)-(\d+)\/(\d+|\*)$/;

export function parseContentRange(header: string): ContentRange {
  const match = CONTENT_RANGE.exec(header.trim());
  if (!match) {
    throw new Error(`Invalid Content-Range: ${header}`);
  }
  const [, start = '', end = '', total = '*'] = match;
  return {
    start: Number(start),
    end: Number(end),
    total: total === '*' ? null : Number(total),
  };
}

/**
 * Positional reader over a remote object, one HTTP `Range` request per read.
 *
 * Handles partial responses (206) and reads past the end (416). A server that ignores
 * `Range` and answers 200 is rejected without reading the body. Requires a runtime with
 * global `fetch`.
 */
export class HttpRangeReader implements PositionalReader {
  private readonly url: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly timeout: number;
  private readonly nameOverride: string | undefined;
  private readonly log = createLogger('reader', { reader: 'http-range' });
  private size: number | null = null;

  constructor(url: string, options?: HttpRangeReaderOptions) {
    this.url = url;
    this.headers = options?.headers ?? {};
    this.timeout = options?.timeout ?? 30000;
    this.nameOverride = options?.name;
  }

  async readAt(buffer: Uint8Array, offset: number, signal?: AbortSignal): Promise<ReadResult> {
    if (this.size !== null && offset >= this.size) {
      return { bytesRead: 0, endOfStream: true };
    }

    const range = `bytes=${String(offset)}-${String(offset + buffer.length - 1)}`;
    return this.request({ Range: range }, signal, async (response): Promise<ReadResult> => {
      if (response.status === 416) {
        await response.body?.cancel();
        return { bytesRead: 0, endOfStream: true };
      }

      if (response.status === 206) {
        const contentRange = response.headers.get('Content-Range');
        const parsed = contentRange ? parseContentRange(contentRange) : null;
        if (parsed && parsed.start !== offset) {
          await response.body?.cancel();
          throw new Error(
            `HttpRangeReader: server returned range starting at ${String(parsed.start)}, expected ${String(offset)}`,
          );
        }
        if (parsed && parsed.total !== null) {
          this.size = parsed.total;
        }

        const body = new Uint8Array(await response.arrayBuffer());
        const bytesRead = Math.min(body.length, buffer.length);
        buffer.set(body.subarray(0, bytesRead), 0);

        const reachedTotal = this.size !== null && offset + bytesRead >= this.size;
        return { bytesRead, endOfStream: bytesRead < buffer.length || reachedTotal };
      }

      await response.body?.cancel();
      if (response.status === 200) {
        // The whole object came back; reading it would hold the full source in memory.
        this.log.warn({ url: this.url, offset }, 'Server ignored Range header');
        throw new Error(`HttpRangeReader: server does not support range requests for ${this.url}`);
      }
      throw new Error(`HttpRangeReader: HTTP ${String(response.status)} ${response.statusText} for ${this.url}`);
    });
  }

  metadata(): ReaderMetadata {
    const name = this.nameOverride ?? this.extractName();
    return this.size !== null ? { name, size: this.size } : { name };
  }

  /** One request whose timeout and abort link stay armed until `consume` has read the body. */
  private async request<T>(
    headerOverrides: Record<string, string>,
    signal: AbortSignal | undefined,
    consume: (response: Response) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort(new Error(`HttpRangeReader: request timed out after ${String(this.timeout)}ms`));
    }, this.timeout);
    const onAbort = (): void => {
      controller.abort(signal?.reason);
    };

    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const response = await fetch(this.url, {
        headers: { ...this.headers, ...headerOverrides },
        signal: controller.signal,
      });
      return await consume(response);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private extractName(): string {
    try {
      const segments = new URL(this.url).pathname.split('/');
      const last = segments[segments.length - 1];
      return last && last.length > 0 ? decodeURIComponent(last) : 'remote-object';
    } catch {
      return 'remote-object';
    }
  }
}
