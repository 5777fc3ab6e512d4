import { err, ok, type Result } from 'neverthrow';

import { createInvalidDateError, type InvalidDateError } from '../errors.js';
import { parseTimeOfDay } from '../time-grid.js';

import type { InferenceConfig, TimeParts, TimeWindow } from '../types.js';

export type BuildWindowOptions = Pick<InferenceConfig, 'timeStepMinutes'>;

const pad = (value: number): string => String(value).padStart(2, '0');

const describeParts = (parts: TimeParts): string =>
  `${String(parts.year)}-${pad(parts.month)}-${pad(parts.day)} ${parts.time}`;

const toInstant = (
  field: InvalidDateError['field'],
  parts: TimeParts,
  stepMinutes: number
): Result<Date, InvalidDateError> => {
  const { year, month, day } = parts;
  const inRange =
    Number.isInteger(year) &&
    Number.isInteger(month) &&
    Number.isInteger(day) &&
    year >= 1 &&
    year <= 9999 &&
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= 31;

  // setUTCFullYear keeps years below 100 as given and rolls April 31 over to May 1
  const instant = new Date(0);
  instant.setUTCFullYear(year, month - 1, day);

  if (!inRange || instant.getUTCMonth() !== month - 1 || instant.getUTCDate() !== day) {
    return err(
      createInvalidDateError(
        field,
        `Invalid date combination '${describeParts(parts)}'. Please select a valid year, month and day.`
      )
    );
  }

  const minutesOfDay = parseTimeOfDay(parts.time, stepMinutes);
  if (minutesOfDay === undefined) {
    return err(
      createInvalidDateError(
        field,
        `Invalid time '${parts.time}'. Expected HH:MM:SS in ${String(stepMinutes)} minute steps.`
      )
    );
  }

  instant.setUTCHours(Math.floor(minutesOfDay / 60), minutesOfDay % 60, 0, 0);
  return ok(instant);
};

/**
 * Builds an inclusive UTC window from calendar parts.
 *
 * Impossible dates (April 31, February 29 outside leap years) and inverted
 * ranges fail instead of being clamped.
 */
export const buildWindow = (
  startParts: TimeParts,
  endParts: TimeParts,
  options: BuildWindowOptions
): Result<TimeWindow, InvalidDateError> => {
  return toInstant('start', startParts, options.timeStepMinutes).andThen((start) =>
    toInstant('end', endParts, options.timeStepMinutes).andThen((end) => {
      if (end.getTime() < start.getTime()) {
        return err(
          createInvalidDateError(
            'end',
            `End ${describeParts(endParts)} is before start ${describeParts(startParts)}.`
          )
        );
      }
      return ok({ start, end });
    })
  );
};
