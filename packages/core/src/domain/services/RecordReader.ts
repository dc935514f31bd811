import type { RecordParser } from '../ports/RecordParser.js';
import { RecordParseError, errorMessage } from '../errors/ChunklineError.js';
import { CARRIAGE_RETURN, indexOfLineFeed } from './RecordBoundary.js';

/** Location of one record inside the bytes being read. */
export interface RecordSpan {
  /** Offset of the first content byte. */
  readonly start: number;
  /** End of the content (exclusive), terminator and trailing `\r` removed. */
  readonly end: number;
  /** Input offset after the record, terminator included. */
  readonly next: number;
  /** `false` when end of input was reached before a line feed. */
  readonly terminated: boolean;
}

/** Result of reading one record in a one-pass parse. */
export type RecordReadResult =
  | { readonly ok: true; readonly fields: string[] }
  | { readonly ok: false; readonly error: RecordParseError };

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Bounded-input record reader over exactly one byte run.
 *
 * `nextSpan()` locates records without decoding them, so the caller can decide whether a
 * record is complete before paying for (or failing on) the decode. Terminated blank lines
 * are skipped. An unterminated tail is always returned, even when it holds only `\r`.
 */
export class RecordReader {
  private readonly bytes: Uint8Array;
  private readonly parser: RecordParser;
  private offset = 0;

  constructor(bytes: Uint8Array, parser: RecordParser) {
    this.bytes = bytes;
    this.parser = parser;
  }

  /** Bytes consumed so far. */
  get inputOffset(): number {
    return this.offset;
  }

  nextSpan(): RecordSpan | null {
    const length = this.bytes.length;

    while (this.offset < length) {
      const start = this.offset;
      const lineFeed = indexOfLineFeed(this.bytes, start);

      if (lineFeed === -1) {
        this.offset = length;
        return { start, end: this.stripCarriageReturn(start, length), next: length, terminated: false };
      }

      this.offset = lineFeed + 1;
      const end = this.stripCarriageReturn(start, lineFeed);
      if (end > start) {
        return { start, end, next: this.offset, terminated: true };
      }
    }

    return null;
  }

  /** Decode a span and split it into fields. */
  decode(span: RecordSpan): string[] {
    let text: string;
    try {
      text = utf8.decode(this.bytes.subarray(span.start, span.end));
    } catch (error) {
      throw new RecordParseError(`Invalid UTF-8 in record at byte ${String(span.start)}`, span.start, {
        cause: error,
      });
    }

    try {
      return this.parser.parseFields(text);
    } catch (error) {
      throw new RecordParseError(`Malformed record at byte ${String(span.start)}: ${errorMessage(error)}`, span.start, {
        cause: error,
      });
    }
  }

  private stripCarriageReturn(start: number, end: number): number {
    return end > start && this.bytes[end - 1] === CARRIAGE_RETURN ? end - 1 : end;
  }
}

/**
 * One-pass parse of a complete byte run: every line is a record, including an
 * unterminated last line. Used for carried-record reconstruction, the end-of-stream
 * flush, and as the whole-stream reference.
 */
export function* readRecords(bytes: Uint8Array, parser: RecordParser): Generator<RecordReadResult> {
  const reader = new RecordReader(bytes, parser);

  for (let span = reader.nextSpan(); span !== null; span = reader.nextSpan()) {
    if (span.end === span.start) continue;

    let result: RecordReadResult;
    try {
      result = { ok: true, fields: reader.decode(span) };
    } catch (error) {
      if (!(error instanceof RecordParseError)) throw error;
      result = { ok: false, error };
    }
    yield result;
  }
}
