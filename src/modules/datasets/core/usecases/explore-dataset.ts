import { buildWindow } from './build-window.js';
import { filterByWindow } from './filter-by-window.js';
import { getWindowOptions } from './get-window-options.js';
import { sanitizeGeo } from './sanitize-geo.js';

import type { InvalidDateError } from '../errors.js';
import type {
  GeoResult,
  InferenceConfig,
  NormalizedTable,
  TimeParts,
  TimeWindow,
  WindowOptions,
} from '../types.js';
import type { Result } from 'neverthrow';

export interface ExploreDatasetInput {
  table: NormalizedTable;
  /** Missing parts fall back to the default window of the table. */
  start?: Partial<TimeParts> | undefined;
  end?: Partial<TimeParts> | undefined;
}

export interface DatasetView {
  window: TimeWindow;
  options: WindowOptions;
  filtered: NormalizedTable;
  geo: GeoResult;
}

const withDefaults = (parts: Partial<TimeParts> | undefined, fallback: TimeParts): TimeParts => ({
  year: parts?.year ?? fallback.year,
  month: parts?.month ?? fallback.month,
  day: parts?.day ?? fallback.day,
  time: parts?.time ?? fallback.time,
});

/**
 * Window, filter and geo extraction over a normalized table.
 */
export const exploreDataset = (
  input: ExploreDatasetInput,
  config: Pick<InferenceConfig, 'timeStepMinutes'>
): Result<DatasetView, InvalidDateError> => {
  const options = getWindowOptions(input.table, config);
  const start = withDefaults(input.start, options.defaultStart);
  const end = withDefaults(input.end, options.defaultEnd);

  return buildWindow(start, end, config).map((window) => {
    const filtered = filterByWindow(input.table, window);
    return {
      window,
      options,
      filtered,
      geo: sanitizeGeo(filtered),
    };
  });
};
