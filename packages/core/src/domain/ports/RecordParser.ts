/**
 * Port for splitting one complete record into its fields.
 *
 * The engine finds record boundaries and decodes UTF-8 itself; the parser only sees the
 * text of a single line with its terminator removed. Throw to report a malformed record.
 */
export interface RecordParser {
  parseFields(line: string): string[];
}
