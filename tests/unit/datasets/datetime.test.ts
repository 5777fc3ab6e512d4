import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { parseDatetimeCell } from '@/modules/datasets/core/datetime.js';
import { DEFAULT_DATETIME_FORMATS } from '@/modules/datasets/core/types.js';

const parseIso = (cell: string | number | null): string | undefined =>
  parseDatetimeCell(cell, DEFAULT_DATETIME_FORMATS)?.toISOString();

describe('parseDatetimeCell', () => {
  describe('ISO 8601 values', () => {
    it('reads values without an offset as UTC', () => {
      expect(parseIso('2024-01-05 10:00:00')).toBe('2024-01-05T10:00:00.000Z');
      expect(parseIso('2024-01-05T10:30')).toBe('2024-01-05T10:30:00.000Z');
    });

    it('reads date-only values as UTC midnight', () => {
      expect(parseIso('2024-03-31')).toBe('2024-03-31T00:00:00.000Z');
    });

    it('keeps an explicit offset', () => {
      expect(parseIso('2024-01-05T10:00:00Z')).toBe('2024-01-05T10:00:00.000Z');
      expect(parseIso('2024-01-05T10:00:00+02:00')).toBe('2024-01-05T08:00:00.000Z');
    });

    it('rejects impossible dates', () => {
      expect(parseIso('2023-02-29')).toBeUndefined();
      expect(parseIso('2024-13-01 00:00:00')).toBeUndefined();
    });
  });

  describe('other formats', () => {
    it('reads slash separated year-first values', () => {
      expect(parseIso('2024/01/05 10:15:00')).toBe('2024-01-05T10:15:00.000Z');
      expect(parseIso('2024/01/05')).toBe('2024-01-05T00:00:00.000Z');
    });

    it('reads month-first values', () => {
      expect(parseIso('1/5/2024 10:15')).toBe('2024-01-05T10:15:00.000Z');
    });

    it('reads dotted day-first values', () => {
      expect(parseIso('5.1.2024')).toBe('2024-01-05T00:00:00.000Z');
    });

    it('reads month names', () => {
      expect(parseIso('5-Jan-2024')).toBe('2024-01-05T00:00:00.000Z');
      expect(parseIso('Jan 5, 2024')).toBe('2024-01-05T00:00:00.000Z');
    });

    it('trims surrounding whitespace', () => {
      expect(parseIso('  2024-01-05 10:00:00  ')).toBe('2024-01-05T10:00:00.000Z');
    });
  });

  describe('two-digit years', () => {
    it('reads month-first short dates in the current century', () => {
      expect(parseIso('1/5/24')).toBe('2024-01-05T00:00:00.000Z');
      expect(parseIso('1/5/24 10:15')).toBe('2024-01-05T10:15:00.000Z');
    });

    it('reads dotted day-first short dates in the current century', () => {
      expect(parseIso('5.1.24')).toBe('2024-01-05T00:00:00.000Z');
    });

    it('does not read short years as four-digit years', () => {
      expect(parseDatetimeCell('1/5/24', DEFAULT_DATETIME_FORMATS)?.getUTCFullYear()).toBe(2024);
    });
  });

  describe('host time zone', () => {
    const originalTz = process.env['TZ'];

    beforeAll(() => {
      // 2024-03-10 02:00-03:00 does not exist on New York wall clocks
      process.env['TZ'] = 'America/New_York';
    });

    afterAll(() => {
      if (originalTz === undefined) {
        delete process.env['TZ'];
      } else {
        process.env['TZ'] = originalTz;
      }
    });

    it('keeps wall-clock times inside a daylight saving gap', () => {
      expect(parseIso('2024-03-10 02:30:00')).toBe('2024-03-10T02:30:00.000Z');
      expect(parseIso('3/10/2024 02:30')).toBe('2024-03-10T02:30:00.000Z');
      expect(parseIso('2024/03/10 02:30:00')).toBe('2024-03-10T02:30:00.000Z');
    });

    it('keeps date-only values at UTC midnight', () => {
      expect(parseIso('2024-11-03')).toBe('2024-11-03T00:00:00.000Z');
      expect(parseIso('3-Nov-2024')).toBe('2024-11-03T00:00:00.000Z');
    });
  });

  describe('rejected values', () => {
    it('rejects missing and blank cells', () => {
      expect(parseIso(null)).toBeUndefined();
      expect(parseIso('')).toBeUndefined();
      expect(parseIso('   ')).toBeUndefined();
    });

    it('rejects numeric cells', () => {
      expect(parseIso(1704448800000)).toBeUndefined();
    });

    it('rejects free text', () => {
      expect(parseIso('not a date')).toBeUndefined();
      expect(parseIso('N/A')).toBeUndefined();
    });
  });
});
