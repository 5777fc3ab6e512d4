import { generateTimeOptions } from '../time-grid.js';

import type { InferenceConfig, NormalizedTable, TimeParts, WindowOptions } from '../types.js';

export type WindowOptionsConfig = Pick<InferenceConfig, 'timeStepMinutes'>;

const MONTHS = Array.from({ length: 12 }, (_, index) => index + 1);
const DAYS = Array.from({ length: 31 }, (_, index) => index + 1);

/**
 * Values a caller may pick from when building a window.
 *
 * Years come from the data; months and days are the full calendar domains so
 * impossible combinations are rejected by `buildWindow`, not hidden here.
 */
export const getWindowOptions = (
  table: NormalizedTable,
  config: WindowOptionsConfig
): WindowOptions => {
  const times = generateTimeOptions(config.timeStepMinutes);

  let min: Date | undefined;
  let max: Date | undefined;
  const yearSet = new Set<number>();

  for (const { datetime } of table.rows) {
    yearSet.add(datetime.getUTCFullYear());
    if (min === undefined || datetime.getTime() < min.getTime()) min = datetime;
    if (max === undefined || datetime.getTime() > max.getTime()) max = datetime;
  }

  const years = [...yearSet].sort((a, b) => a - b);
  const firstYear = years[0] ?? new Date().getUTCFullYear();
  const lastYear = years[years.length - 1] ?? firstYear;

  const defaultStart: TimeParts = {
    year: firstYear,
    month: 1,
    day: 1,
    time: times[0] ?? '00:00:00',
  };
  const defaultEnd: TimeParts = {
    year: lastYear,
    month: 12,
    day: 31,
    time: times[times.length - 1] ?? '00:00:00',
  };

  return {
    years,
    months: MONTHS,
    days: DAYS,
    times,
    defaultStart,
    defaultEnd,
    range: min !== undefined && max !== undefined ? { min, max } : undefined,
  };
};
