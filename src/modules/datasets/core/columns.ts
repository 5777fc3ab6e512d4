import type { Cell, FieldValue, Row } from './types.js';

const NUMERIC_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Number for a plain decimal literal (`12`, `-3.5`, `1e3`), else `undefined`.
 */
export const parseNumeric = (value: string): number | undefined => {
  if (!NUMERIC_RE.test(value)) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

/**
 * Makes header names unique by suffixing repeats with `.1`, `.2`, …
 * First occurrences keep their name.
 */
export const dedupeColumnNames = (
  names: readonly string[],
  reserved: readonly string[] = []
): string[] => {
  const taken = new Set<string>(reserved);
  const counters = new Map<string, number>();

  return names.map((name) => {
    if (!taken.has(name)) {
      taken.add(name);
      return name;
    }

    let counter = counters.get(name) ?? 1;
    let candidate = `${name}.${String(counter)}`;
    while (taken.has(candidate)) {
      counter += 1;
      candidate = `${name}.${String(counter)}`;
    }
    counters.set(name, counter + 1);
    taken.add(candidate);
    return candidate;
  });
};

/**
 * Case-insensitive header lookup. Returns the header as stored.
 */
export const findColumn = (columns: readonly string[], name: string): string | undefined => {
  const target = name.toLowerCase();
  return columns.find((column) => column.toLowerCase() === target);
};

/**
 * Reads a column from a row without substituting anything for absence.
 * A column that exists but holds the missing marker is reported as missing.
 */
export const lookupField = (row: Row, column: string): FieldValue => {
  if (!Object.prototype.hasOwnProperty.call(row, column)) {
    return { present: false };
  }

  const value: Cell | undefined = row[column];
  if (value === undefined || value === null) {
    return { present: false };
  }

  return { present: true, value };
};
