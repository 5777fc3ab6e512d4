/**
 * Maps core results to JSON-friendly response shapes.
 *
 * Display fallbacks live here, not in the core: descriptive fields that are
 * absent on a row are simply left out of the feature properties.
 */

import { lookupField } from '../../core/columns.js';
import {
  CANONICAL_DATETIME_COLUMN,
  type Cell,
  type GeoResult,
  type NormalizedRow,
  type WindowOptions,
} from '../../core/types.js';

import type { GeoSection, InspectResponse, RowRecord } from './schemas.js';

/** Columns copied onto map features when a row has them. */
export const DESCRIPTIVE_FIELDS = ['region_id', 'region_name', 'area_name', 'city'] as const;

export const MISSING_COLUMNS_MESSAGE = 'Longitude and Latitude columns are missing.';
export const NO_VALID_POINTS_MESSAGE =
  'No valid geographical data to display. Ensure latitude and longitude values are correct.';

export const toRowRecord = (row: NormalizedRow, columns: readonly string[]): RowRecord =>
  Object.fromEntries(
    columns.map((column): [string, Cell] => [
      column,
      column === CANONICAL_DATETIME_COLUMN
        ? row.datetime.toISOString()
        : (row.cells[column] ?? null),
    ])
  );

export const toWindowOptionsDto = (
  options: WindowOptions
): InspectResponse['data']['windowOptions'] => ({
  years: [...options.years],
  months: [...options.months],
  days: [...options.days],
  times: [...options.times],
  defaultStart: { ...options.defaultStart },
  defaultEnd: { ...options.defaultEnd },
  range:
    options.range !== undefined
      ? { min: options.range.min.toISOString(), max: options.range.max.toISOString() }
      : null,
});

export const toGeoSection = (geo: GeoResult): GeoSection => {
  switch (geo.status) {
    case 'MissingColumns':
      return { status: geo.status, message: MISSING_COLUMNS_MESSAGE, missing: [...geo.missing] };
    case 'NoValidPoints':
      return { status: geo.status, message: NO_VALID_POINTS_MESSAGE };
    case 'Points':
      return {
        status: geo.status,
        center: { ...geo.center },
        featureCollection: {
          type: 'FeatureCollection',
          features: geo.points.map(({ row, point }) => {
            const properties: Record<string, Cell> = {
              [CANONICAL_DATETIME_COLUMN]: row.datetime.toISOString(),
            };
            for (const field of DESCRIPTIVE_FIELDS) {
              const value = lookupField(row.cells, field);
              if (value.present) {
                properties[field] = value.value;
              }
            }
            properties['latitude'] = point.latitude;
            properties['longitude'] = point.longitude;

            return {
              type: 'Feature' as const,
              geometry: {
                type: 'Point' as const,
                coordinates: [point.longitude, point.latitude],
              },
              properties,
            };
          }),
        },
      };
  }
};
