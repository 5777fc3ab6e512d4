import { describe, expect, it } from 'vitest';

import {
  classifyColumns,
  detectDatetimeColumn,
  detectVolumeColumns,
} from '@/modules/datasets/core/usecases/classify-columns.js';

import type { ColumnKeywords } from '@/modules/datasets/core/types.js';

const keywords: ColumnKeywords = {
  datetime: ['datetime', 'date_time', 'timestamp', 'date'],
  volume: ['traffic_volume', 'volume', 'traffic', 'count'],
};

describe('detectDatetimeColumn', () => {
  it('returns the first header containing a keyword', () => {
    expect(detectDatetimeColumn(['id', 'Timestamp', 'date'], keywords.datetime)).toBe('Timestamp');
  });

  it('matches keywords as substrings', () => {
    expect(detectDatetimeColumn(['site', 'observation_date'], keywords.datetime)).toBe(
      'observation_date'
    );
  });

  it('returns undefined when nothing matches', () => {
    expect(detectDatetimeColumn(['site', 'latitude'], keywords.datetime)).toBeUndefined();
  });

  it('ignores empty keywords', () => {
    expect(detectDatetimeColumn(['site'], [''])).toBeUndefined();
  });
});

describe('detectVolumeColumns', () => {
  it('returns every matching header in order', () => {
    expect(
      detectVolumeColumns(['datetime', 'Traffic_Volume', 'site', 'car_count'], keywords.volume)
    ).toEqual(['Traffic_Volume', 'car_count']);
  });

  it('returns each header once', () => {
    expect(detectVolumeColumns(['volume', 'volume'], keywords.volume)).toEqual(['volume']);
  });

  it('returns an empty list when nothing matches', () => {
    expect(detectVolumeColumns(['datetime', 'site'], keywords.volume)).toEqual([]);
  });
});

describe('classifyColumns', () => {
  it('assigns roles to every header', () => {
    const result = classifyColumns(['date', 'traffic_volume', 'site'], keywords);

    expect(result.datetimeColumn).toBe('date');
    expect(result.volumeColumns).toEqual(['traffic_volume']);
    expect(result.columns).toEqual([
      { name: 'date', roles: ['Datetime'] },
      { name: 'traffic_volume', roles: ['VolumeCandidate'] },
      { name: 'site', roles: ['Other'] },
    ]);
  });

  it('gives a header both roles when it matches both tables', () => {
    const result = classifyColumns(['date_count'], keywords);

    expect(result.columns).toEqual([{ name: 'date_count', roles: ['Datetime', 'VolumeCandidate'] }]);
  });

  it('reports a missing datetime column without failing', () => {
    const result = classifyColumns(['site', 'count'], keywords);

    expect(result.datetimeColumn).toBeUndefined();
    expect(result.volumeColumns).toEqual(['count']);
  });

  it('uses a custom keyword table', () => {
    const result = classifyColumns(['recorded', 'flow'], { datetime: ['recorded'], volume: ['flow'] });

    expect(result.datetimeColumn).toBe('recorded');
    expect(result.volumeColumns).toEqual(['flow']);
  });
});
