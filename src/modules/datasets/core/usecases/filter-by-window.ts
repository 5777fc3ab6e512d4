import type { NormalizedTable, TimeWindow } from '../types.js';

/**
 * Rows with `start <= datetime <= end`, in their original order.
 * An empty result is a valid table, not an error.
 */
export const filterByWindow = (table: NormalizedTable, window: TimeWindow): NormalizedTable => {
  const start = window.start.getTime();
  const end = window.end.getTime();

  return {
    ...table,
    rows: table.rows.filter((row) => {
      const time = row.datetime.getTime();
      return time >= start && time <= end;
    }),
  };
};
