import { describe, expect, it } from 'vitest';

import {
  generateTimeOptions,
  isValidTimeStep,
  parseTimeOfDay,
} from '@/modules/datasets/core/time-grid.js';

describe('generateTimeOptions', () => {
  it('produces 288 values for a 5 minute step', () => {
    const options = generateTimeOptions(5);

    expect(options).toHaveLength(288);
    expect(options[0]).toBe('00:00:00');
    expect(options[1]).toBe('00:05:00');
    expect(options[287]).toBe('23:55:00');
  });

  it('follows the configured step', () => {
    expect(generateTimeOptions(60)).toHaveLength(24);
    expect(generateTimeOptions(15).slice(0, 5)).toEqual([
      '00:00:00',
      '00:15:00',
      '00:30:00',
      '00:45:00',
      '01:00:00',
    ]);
  });
});

describe('parseTimeOfDay', () => {
  it('returns minutes since midnight for grid values', () => {
    expect(parseTimeOfDay('00:00:00', 5)).toBe(0);
    expect(parseTimeOfDay('13:45:00', 5)).toBe(825);
    expect(parseTimeOfDay('23:55:00', 5)).toBe(1435);
  });

  it('rejects values off the grid', () => {
    expect(parseTimeOfDay('10:07:00', 5)).toBeUndefined();
    expect(parseTimeOfDay('10:05:30', 5)).toBeUndefined();
  });

  it('rejects malformed values', () => {
    expect(parseTimeOfDay('24:00:00', 5)).toBeUndefined();
    expect(parseTimeOfDay('10:60:00', 5)).toBeUndefined();
    expect(parseTimeOfDay('9:00:00', 5)).toBeUndefined();
    expect(parseTimeOfDay('10:00', 5)).toBeUndefined();
  });
});

describe('isValidTimeStep', () => {
  it('accepts divisors of 60', () => {
    expect([1, 5, 10, 15, 30, 60].every(isValidTimeStep)).toBe(true);
  });

  it('rejects everything else', () => {
    expect(isValidTimeStep(0)).toBe(false);
    expect(isValidTimeStep(7)).toBe(false);
    expect(isValidTimeStep(2.5)).toBe(false);
    expect(isValidTimeStep(120)).toBe(false);
  });
});
