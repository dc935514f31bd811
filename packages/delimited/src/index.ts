// Main entry point
export { DelimitedIngest } from './DelimitedIngest.js';
export type { DelimitedIngestConfig } from './DelimitedIngest.js';

// One-pass parse
export { parseDelimited } from './parseDelimited.js';
export type { DelimitedParseResult } from './parseDelimited.js';

// Infrastructure: parsers
export { DelimitedParser, DEFAULT_DELIMITER, validateDelimiter } from './infrastructure/parsers/DelimitedParser.js';
export type { DelimitedParserOptions } from './infrastructure/parsers/DelimitedParser.js';
