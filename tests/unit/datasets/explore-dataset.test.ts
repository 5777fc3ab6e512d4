import { describe, expect, it } from 'vitest';

import { exploreDataset } from '@/modules/datasets/core/usecases/explore-dataset.js';

import { makeRow, makeTable } from '../../fixtures/builders.js';

const table = makeTable(
  [
    makeRow('2024-01-05T10:00:00Z', { site: 'north', latitude: 45.5, longitude: -73.5 }),
    makeRow('2024-01-05T10:30:00Z', { site: 'east', latitude: 'N/A', longitude: 'N/A' }),
  ],
  ['datetime', 'site', 'latitude', 'longitude']
);

const config = { timeStepMinutes: 5 };

describe('exploreDataset', () => {
  it('uses the default window when no parts are given', () => {
    const view = exploreDataset({ table }, config)._unsafeUnwrap();

    expect(view.window.start.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(view.window.end.toISOString()).toBe('2024-12-31T23:55:00.000Z');
    expect(view.filtered.rows).toHaveLength(2);
  });

  it('filters by the requested window and extracts points', () => {
    const view = exploreDataset(
      {
        table,
        start: { year: 2024, month: 1, day: 5, time: '10:00:00' },
        end: { year: 2024, month: 1, day: 5, time: '10:30:00' },
      },
      config
    )._unsafeUnwrap();

    expect(view.filtered.rows).toHaveLength(2);
    expect(view.geo.status).toBe('Points');
    if (view.geo.status !== 'Points') return;
    expect(view.geo.points).toHaveLength(1);
    expect(view.geo.center).toEqual({ latitude: 45.5, longitude: -73.5 });
  });

  it('fills missing parts from the defaults', () => {
    const view = exploreDataset(
      { table, start: { day: 5, time: '10:05:00' }, end: { month: 1, day: 5 } },
      config
    )._unsafeUnwrap();

    expect(view.window.start.toISOString()).toBe('2024-01-05T10:05:00.000Z');
    expect(view.window.end.toISOString()).toBe('2024-01-05T23:55:00.000Z');
    expect(view.filtered.rows.map((row) => row.cells['site'])).toEqual(['east']);
    expect(view.geo.status).toBe('NoValidPoints');
  });

  it('returns an empty view for a window without rows', () => {
    const view = exploreDataset(
      {
        table,
        start: { year: 2024, month: 1, day: 6, time: '00:00:00' },
        end: { year: 2024, month: 1, day: 7, time: '00:00:00' },
      },
      config
    )._unsafeUnwrap();

    expect(view.filtered.rows).toEqual([]);
    expect(view.geo).toEqual({ status: 'NoValidPoints' });
  });

  it('fails on an impossible date', () => {
    const error = exploreDataset(
      { table, start: { year: 2024, month: 4, day: 31 } },
      config
    )._unsafeUnwrapErr();

    expect(error.type).toBe('InvalidDateError');
    expect(error.field).toBe('start');
  });
});
