import type { ParseError } from './errors.js';
import type { RawTable } from './types.js';
import type { Result } from 'neverthrow';

export interface CsvParseOptions {
  delimiter: string;
}

/**
 * Turns uploaded text into a header-keyed table.
 */
export interface CsvParser {
  parse(content: string, options: CsvParseOptions): Result<RawTable, ParseError>;
}
