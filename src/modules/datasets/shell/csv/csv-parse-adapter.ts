/**
 * CSV parser backed by csv-parse.
 *
 * Headers come from the first record. Blank headers are named
 * `Unnamed: <index>` and repeated ones get a `.N` suffix. Short records are
 * padded with the missing marker; long records are a parse error.
 */

import { parse } from 'csv-parse/sync';
import { err, ok } from 'neverthrow';

import { dedupeColumnNames, parseNumeric } from '../../core/columns.js';
import { createParseError } from '../../core/errors.js';

import type { CsvParser } from '../../core/ports.js';
import type { Cell, Row } from '../../core/types.js';

const isStringMatrix = (value: unknown): value is string[][] =>
  Array.isArray(value) &&
  value.every(
    (record: unknown) =>
      Array.isArray(record) && record.every((field: unknown) => typeof field === 'string')
  );

const toCell = (field: string | undefined): Cell => {
  if (field === undefined || field === '') return null;
  return parseNumeric(field) ?? field;
};

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const makeCsvParser = (): CsvParser => ({
  parse(content, options) {
    let records: unknown;
    try {
      records = parse(content, {
        delimiter: options.delimiter,
        bom: true,
        skip_empty_lines: true,
        relax_column_count_less: true,
      });
    } catch (error) {
      return err(createParseError(`Error reading the file: ${errorMessage(error)}`, error));
    }

    if (!isStringMatrix(records)) {
      return err(createParseError('Error reading the file: unexpected parser output'));
    }

    const [header, ...body] = records;
    if (header === undefined) {
      return err(createParseError('Error reading the file: no columns to parse'));
    }

    const columns = dedupeColumnNames(
      header.map((name, index) => (name.trim() === '' ? `Unnamed: ${String(index)}` : name))
    );

    // fromEntries defines own properties, so a `__proto__` header stays a column
    const rows: Row[] = body.map((record) =>
      Object.fromEntries(
        columns.map((column, index): [string, Cell] => [column, toCell(record[index])])
      )
    );

    return ok({ columns, rows });
  },
});
