import type { RecordParseError } from '@chunkline/core';
import { readRecords } from '@chunkline/core';
import { DelimitedParser } from './infrastructure/parsers/DelimitedParser.js';
import type { DelimitedParserOptions } from './infrastructure/parsers/DelimitedParser.js';

/** Outcome of a one-pass parse. */
export interface DelimitedParseResult {
  readonly records: string[][];
  readonly errors: RecordParseError[];
}

/**
 * Parse a whole delimited text held in memory, without chunking.
 *
 * Yields the same records as a chunked run over the same bytes; useful for small
 * inputs and for checking a chunked run against it.
 */
export function parseDelimited(input: Uint8Array | string, options?: DelimitedParserOptions): DelimitedParseResult {
  const bytes = typeof input === 'string' ? new TextEncoder().encode(input) : input;
  const parser = new DelimitedParser(options);
  const records: string[][] = [];
  const errors: RecordParseError[] = [];

  for (const result of readRecords(bytes, parser)) {
    if (result.ok) {
      records.push(result.fields);
    } else {
      errors.push(result.error);
    }
  }

  return { records, errors };
}
