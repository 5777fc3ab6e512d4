import { describe, expect, it } from 'vitest';

import { getWindowOptions } from '@/modules/datasets/core/usecases/get-window-options.js';

import { makeRow, makeTable } from '../../fixtures/builders.js';

describe('getWindowOptions', () => {
  it('offers the distinct years of the data in ascending order', () => {
    const table = makeTable([
      makeRow('2023-06-01T00:00:00Z'),
      makeRow('2021-02-01T00:00:00Z'),
      makeRow('2023-01-01T00:00:00Z'),
    ]);

    const options = getWindowOptions(table, { timeStepMinutes: 5 });

    expect(options.years).toEqual([2021, 2023]);
    expect(options.months).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
    expect(options.days).toHaveLength(31);
    expect(options.times).toHaveLength(288);
  });

  it('defaults to the whole span of the data years', () => {
    const table = makeTable([makeRow('2021-02-01T00:00:00Z'), makeRow('2023-06-01T00:00:00Z')]);

    const options = getWindowOptions(table, { timeStepMinutes: 5 });

    expect(options.defaultStart).toEqual({ year: 2021, month: 1, day: 1, time: '00:00:00' });
    expect(options.defaultEnd).toEqual({ year: 2023, month: 12, day: 31, time: '23:55:00' });
    expect(options.range?.min.toISOString()).toBe('2021-02-01T00:00:00.000Z');
    expect(options.range?.max.toISOString()).toBe('2023-06-01T00:00:00.000Z');
  });

  it('uses the configured time step', () => {
    const options = getWindowOptions(makeTable([makeRow('2024-01-01T00:00:00Z')]), {
      timeStepMinutes: 30,
    });

    expect(options.times).toHaveLength(48);
    expect(options.defaultEnd.time).toBe('23:30:00');
  });

  it('has no range for an empty table', () => {
    const options = getWindowOptions(makeTable([], ['datetime']), { timeStepMinutes: 5 });

    expect(options.years).toEqual([]);
    expect(options.range).toBeUndefined();
    expect(options.defaultStart.year).toBe(options.defaultEnd.year);
  });
});
