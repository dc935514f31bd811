/**
 * One byte window read from the source.
 *
 * Order is carried by the conduit; `index` and `offset` are informational
 * (events and logs). The reassembler must not keep `bytes` past the
 * processing of this chunk: it copies whatever suffix it carries over.
 */
export interface Chunk {
  /** Zero-based position of the chunk in the stream. */
  readonly index: number;
  /** Byte offset of the first byte of the chunk within the source. */
  readonly offset: number;
  readonly bytes: Uint8Array;
}

export function createChunk(index: number, offset: number, bytes: Uint8Array): Chunk {
  return { index, offset, bytes };
}
