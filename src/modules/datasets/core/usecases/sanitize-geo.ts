import { findColumn, parseNumeric } from '../columns.js';
import {
  LATITUDE_COLUMN,
  LONGITUDE_COLUMN,
  type Cell,
  type GeoResult,
  type LocatedRow,
  type NormalizedTable,
} from '../types.js';

/**
 * Numeric value of a cell, or `undefined` for anything non-numeric
 * (including blanks and placeholders such as `N/A`).
 */
export const toCoordinate = (cell: Cell | undefined): number | undefined => {
  if (typeof cell === 'number') {
    return Number.isFinite(cell) ? cell : undefined;
  }
  if (typeof cell !== 'string') return undefined;

  return parseNumeric(cell.trim());
};

const inRange = (latitude: number, longitude: number): boolean =>
  latitude >= -90 && latitude <= 90 && longitude >= -180 && longitude <= 180;

/**
 * Extracts plottable points from a (filtered) table.
 *
 * `MissingColumns` and `NoValidPoints` are distinct so callers can tell "no
 * coordinate columns" from "columns present, nothing usable". Rows dropped
 * here are only left out of the points; the table itself is untouched.
 */
export const sanitizeGeo = (table: NormalizedTable): GeoResult => {
  const latitudeColumn = findColumn(table.columns, LATITUDE_COLUMN);
  const longitudeColumn = findColumn(table.columns, LONGITUDE_COLUMN);

  if (latitudeColumn === undefined || longitudeColumn === undefined) {
    const missing: string[] = [];
    if (latitudeColumn === undefined) missing.push(LATITUDE_COLUMN);
    if (longitudeColumn === undefined) missing.push(LONGITUDE_COLUMN);
    return { status: 'MissingColumns', missing };
  }

  const points: LocatedRow[] = [];
  let latitudeSum = 0;
  let longitudeSum = 0;

  for (const row of table.rows) {
    const latitude = toCoordinate(row.cells[latitudeColumn]);
    const longitude = toCoordinate(row.cells[longitudeColumn]);
    if (latitude === undefined || longitude === undefined) continue;
    if (!inRange(latitude, longitude)) continue;

    latitudeSum += latitude;
    longitudeSum += longitude;
    points.push({ row, point: { latitude, longitude } });
  }

  if (points.length === 0) {
    return { status: 'NoValidPoints' };
  }

  return {
    status: 'Points',
    points,
    center: {
      latitude: latitudeSum / points.length,
      longitude: longitudeSum / points.length,
    },
  };
};
