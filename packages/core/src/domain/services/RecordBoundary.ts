/** Record terminator. A preceding carriage return is stripped from the record. */
export const LINE_FEED = 0x0a;
export const CARRIAGE_RETURN = 0x0d;

export const EMPTY_BYTES: Uint8Array = new Uint8Array(0);

/** Copy `head` followed by `tail` into a new array. Neither input is retained. */
export function concatBytes(head: Uint8Array, tail: Uint8Array): Uint8Array {
  const out = new Uint8Array(head.length + tail.length);
  out.set(head, 0);
  out.set(tail, head.length);
  return out;
}

export function indexOfLineFeed(bytes: Uint8Array, from = 0): number {
  return bytes.indexOf(LINE_FEED, from);
}

/** Offset of the first byte after the last line feed (0 when there is none). */
export function trailingFragmentStart(bytes: Uint8Array): number {
  return bytes.lastIndexOf(LINE_FEED) + 1;
}

/**
 * Whether a parse that moved from `lastOffset` to `bufOffset` ended on the last byte of
 * the input. Such a record cannot be confirmed without the bytes that follow it.
 */
export function isFlush(bufOffset: number, lastOffset: number, length: number): boolean {
  return bufOffset === length && lastOffset < bufOffset;
}
