import Papa from 'papaparse';
import type { RecordParser } from '@chunkline/core';
import { ConfigurationError } from '@chunkline/core';

/** Field separator used when none is configured. */
export const DEFAULT_DELIMITER = '|';

// PapaParse silently falls back to delimiter detection for these.
const REJECTED_DELIMITERS: readonly string[] = ['\n', '\r', '"', '\uFEFF'];

export interface DelimitedParserOptions {
  /** Single-character field separator. Default: `'|'`. */
  readonly delimiter?: string;
}

/** @throws ConfigurationError when the delimiter is not a single usable character. */
export function validateDelimiter(delimiter: string): string {
  if ([...delimiter].length !== 1) {
    throw new ConfigurationError(`delimiter must be a single character, got ${JSON.stringify(delimiter)}`);
  }
  if (REJECTED_DELIMITERS.includes(delimiter)) {
    throw new ConfigurationError(`delimiter ${JSON.stringify(delimiter)} cannot separate fields`);
  }
  return delimiter;
}

/**
 * Field splitter adapter using PapaParse.
 *
 * Receives one record's text with the terminator already removed. Double-quoted fields
 * may contain the delimiter; an unbalanced quote is reported as a malformed record.
 */
export class DelimitedParser implements RecordParser {
  readonly delimiter: string;

  constructor(options?: DelimitedParserOptions) {
    this.delimiter = validateDelimiter(options?.delimiter ?? DEFAULT_DELIMITER);
  }

  parseFields(line: string): string[] {
    const result = Papa.parse<string[]>(line, {
      delimiter: this.delimiter,
      newline: '\n',
      header: false,
      skipEmptyLines: false,
      dynamicTyping: false,
    });

    const [error] = result.errors;
    if (error) {
      throw new Error(`${error.code}: ${error.message}`);
    }

    return result.data[0] ?? [''];
  }
}
