const MINUTES_PER_DAY = 24 * 60;

const TIME_RE = /^(\d{2}):(\d{2}):(\d{2})$/;

const pad = (value: number): string => String(value).padStart(2, '0');

export const formatTimeOfDay = (minutesOfDay: number): string =>
  `${pad(Math.floor(minutesOfDay / 60))}:${pad(minutesOfDay % 60)}:00`;

/**
 * Selectable times of day on a fixed step grid, e.g. 288 values
 * (`00:00:00` … `23:55:00`) for a 5 minute step.
 */
export const generateTimeOptions = (stepMinutes: number): string[] => {
  const options: string[] = [];
  for (let minutes = 0; minutes < MINUTES_PER_DAY; minutes += stepMinutes) {
    options.push(formatTimeOfDay(minutes));
  }
  return options;
};

/**
 * Minutes since midnight for an `HH:MM:SS` value on the step grid, or
 * `undefined` when the value is malformed or off the grid.
 */
export const parseTimeOfDay = (value: string, stepMinutes: number): number | undefined => {
  const match = TIME_RE.exec(value);
  if (match === null) return undefined;

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = Number(match[3]);
  if (hours > 23 || minutes > 59 || seconds !== 0) return undefined;

  const minutesOfDay = hours * 60 + minutes;
  return minutesOfDay % stepMinutes === 0 ? minutesOfDay : undefined;
};

/** Steps must divide an hour evenly. */
export const isValidTimeStep = (stepMinutes: number): boolean =>
  Number.isInteger(stepMinutes) && stepMinutes > 0 && 60 % stepMinutes === 0;
