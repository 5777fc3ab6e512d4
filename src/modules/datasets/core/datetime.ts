/**
 * Permissive datetime parsing for uploaded cells.
 *
 * Every instant is handled in UTC: values without an offset are read as UTC
 * wall-clock time, values with `Z` or `±HH:MM` keep their offset. Parsing runs
 * in the UTC context, so the host time zone never shifts a value.
 */

import { utc } from '@date-fns/utc';
import { isValid, parse, parseISO } from 'date-fns';

import type { Cell } from './types.js';

const ISO_RE =
  /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:[.,]\d{1,9})?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;

/** A standalone run of exactly four digits. */
const FOUR_DIGIT_RUN_RE = /(?:^|\D)\d{4}(?:\D|$)/;

const REFERENCE_DATE = new Date(Date.UTC(2000, 0, 1));

const toPlainDate = (parsed: Date): Date | undefined =>
  isValid(parsed) ? new Date(parsed.getTime()) : undefined;

const parseIsoValue = (value: string): Date | undefined => {
  if (!ISO_RE.test(value)) return undefined;

  return toPlainDate(
    parseISO(value.replace(/\s+(?=Z|[+-]\d{2}(?::?\d{2})?$)/i, ''), { in: utc })
  );
};

/**
 * `yyyy` accepts one to four digits in date-fns; only four-digit years match
 * it here, two-digit years go through the `yy` patterns.
 */
const canMatch = (value: string, format: string): boolean =>
  !format.includes('yyyy') || FOUR_DIGIT_RUN_RE.test(value);

/**
 * Parses one cell into a UTC `Date`, or `undefined` when the value is missing,
 * numeric, or matches none of the accepted encodings.
 */
export const parseDatetimeCell = (cell: Cell, formats: readonly string[]): Date | undefined => {
  if (typeof cell !== 'string') return undefined;

  const value = cell.trim();
  if (value === '') return undefined;

  const iso = parseIsoValue(value);
  if (iso !== undefined) return iso;

  for (const format of formats) {
    if (!canMatch(value, format)) continue;

    const parsed = toPlainDate(parse(value, format, REFERENCE_DATE, { in: utc }));
    if (parsed !== undefined) return parsed;
  }

  return undefined;
};
