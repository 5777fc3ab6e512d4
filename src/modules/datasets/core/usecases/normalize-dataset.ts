import { err, ok, type Result } from 'neverthrow';

import { detectDatetimeColumn } from './classify-columns.js';
import { dedupeColumnNames } from '../columns.js';
import { parseDatetimeCell } from '../datetime.js';
import {
  createDatetimeConversionError,
  createNoDatetimeColumnError,
  type SchemaError,
} from '../errors.js';
import {
  CANONICAL_DATETIME_COLUMN,
  type Cell,
  type InferenceConfig,
  type NormalizedRow,
  type NormalizedTable,
  type RawTable,
  type Row,
} from '../types.js';

export type NormalizeOptions = Pick<InferenceConfig, 'keywords' | 'datetimeFormats'>;

/**
 * Produces the canonical table: lower-cased headers, the detected datetime
 * column parsed and renamed to `datetime`, every other column passed through.
 *
 * Rows whose datetime does not parse are dropped one by one; the call only
 * fails when no datetime column exists or no row survives.
 */
export const normalizeDataset = (
  raw: RawTable,
  options: NormalizeOptions
): Result<NormalizedTable, SchemaError> => {
  const lowered = dedupeColumnNames(raw.columns.map((column) => column.toLowerCase()));

  const datetimeColumn = detectDatetimeColumn(lowered, options.keywords.datetime);
  if (datetimeColumn === undefined) {
    return err(createNoDatetimeColumnError());
  }

  const datetimeIndex = lowered.indexOf(datetimeColumn);
  const sourceColumns = raw.columns.filter((_, index) => index !== datetimeIndex);
  const passThrough = dedupeColumnNames(
    lowered.filter((_, index) => index !== datetimeIndex),
    [CANONICAL_DATETIME_COLUMN]
  );
  const rawDatetimeColumn = raw.columns[datetimeIndex] ?? datetimeColumn;

  const columns = [...passThrough];
  columns.splice(datetimeIndex, 0, CANONICAL_DATETIME_COLUMN);

  const rows: NormalizedRow[] = [];
  let droppedRowCount = 0;

  for (const row of raw.rows) {
    const datetime = parseDatetimeCell(row[rawDatetimeColumn] ?? null, options.datetimeFormats);
    if (datetime === undefined) {
      droppedRowCount += 1;
      continue;
    }

    const cells: Row = Object.fromEntries(
      sourceColumns.map((source, index): [string, Cell] => [
        passThrough[index] ?? source,
        row[source] ?? null,
      ])
    );

    rows.push({ datetime, cells });
  }

  if (rows.length === 0) {
    return err(createDatetimeConversionError(datetimeColumn));
  }

  return ok({
    columns,
    rows,
    sourceDatetimeColumn: datetimeColumn,
    droppedRowCount,
  });
};
