/**
 * Datasets Module REST API - TypeBox Schemas
 *
 * Request/response validation schemas for the REST API.
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_ROW_LIMIT = 1000;
export const MAX_ROW_LIMIT = 10_000;

const YearSchema = Type.Integer({ minimum: 1, maximum: 9999 });
const MonthSchema = Type.Integer({ minimum: 1, maximum: 12 });
const DaySchema = Type.Integer({ minimum: 1, maximum: 31 });
const TimeSchema = Type.String({
  pattern: '^\\d{2}:\\d{2}:\\d{2}$',
  description: 'Time of day (HH:MM:SS) on the configured step grid',
});

/**
 * Window selection for the explore endpoint. Every part is optional and
 * falls back to the default window of the uploaded data.
 */
export const ExploreQuerySchema = Type.Object(
  {
    startYear: Type.Optional(YearSchema),
    startMonth: Type.Optional(MonthSchema),
    startDay: Type.Optional(DaySchema),
    startTime: Type.Optional(TimeSchema),
    endYear: Type.Optional(YearSchema),
    endMonth: Type.Optional(MonthSchema),
    endDay: Type.Optional(DaySchema),
    endTime: Type.Optional(TimeSchema),
    limit: Type.Optional(
      Type.Integer({
        minimum: 0,
        maximum: MAX_ROW_LIMIT,
        default: DEFAULT_ROW_LIMIT,
        description: 'Maximum number of rows returned',
      })
    ),
  },
  { additionalProperties: false }
);

export type ExploreQuery = Static<typeof ExploreQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

const CellSchema = Type.Union([Type.String(), Type.Number(), Type.Null()]);

const RowRecordSchema = Type.Record(Type.String(), CellSchema);

const TimePartsSchema = Type.Object({
  year: Type.Integer(),
  month: Type.Integer(),
  day: Type.Integer(),
  time: Type.String(),
});

const WindowOptionsSchema = Type.Object({
  years: Type.Array(Type.Integer()),
  months: Type.Array(Type.Integer()),
  days: Type.Array(Type.Integer()),
  times: Type.Array(Type.String()),
  defaultStart: TimePartsSchema,
  defaultEnd: TimePartsSchema,
  range: Type.Union([
    Type.Object({
      min: Type.String({ format: 'date-time' }),
      max: Type.String({ format: 'date-time' }),
    }),
    Type.Null(),
  ]),
});

const ClassifiedColumnSchema = Type.Object({
  name: Type.String(),
  roles: Type.Array(
    Type.Union([Type.Literal('Datetime'), Type.Literal('VolumeCandidate'), Type.Literal('Other')])
  ),
});

const GeoPointSchema = Type.Object({
  latitude: Type.Number(),
  longitude: Type.Number(),
});

const FeatureCollectionSchema = Type.Object({
  type: Type.Literal('FeatureCollection'),
  features: Type.Array(
    Type.Object({
      type: Type.Literal('Feature'),
      geometry: Type.Object({
        type: Type.Literal('Point'),
        coordinates: Type.Array(Type.Number(), { minItems: 2, maxItems: 2 }),
      }),
      properties: RowRecordSchema,
    })
  ),
});

const GeoSectionSchema = Type.Object({
  status: Type.Union([
    Type.Literal('Points'),
    Type.Literal('MissingColumns'),
    Type.Literal('NoValidPoints'),
  ]),
  message: Type.Optional(Type.String({ description: 'User-facing explanation when no map' })),
  missing: Type.Optional(Type.Array(Type.String())),
  center: Type.Optional(GeoPointSchema),
  featureCollection: Type.Optional(FeatureCollectionSchema),
});

export const InspectResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    rawColumns: Type.Array(Type.String()),
    columns: Type.Array(ClassifiedColumnSchema),
    sourceDatetimeColumn: Type.String(),
    rowCount: Type.Integer(),
    droppedRowCount: Type.Integer(),
    volumeColumns: Type.Array(Type.String()),
    windowOptions: WindowOptionsSchema,
  }),
});

export type InspectResponse = Static<typeof InspectResponseSchema>;

export const ExploreResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    window: Type.Object({
      start: Type.String({ format: 'date-time' }),
      end: Type.String({ format: 'date-time' }),
    }),
    columns: Type.Array(Type.String()),
    totalRows: Type.Integer({ description: 'Rows inside the window' }),
    truncated: Type.Boolean(),
    rows: Type.Array(RowRecordSchema),
    volumeColumns: Type.Array(Type.String()),
    geo: GeoSectionSchema,
  }),
});

export type ExploreResponse = Static<typeof ExploreResponseSchema>;

export type GeoSection = Static<typeof GeoSectionSchema>;

export type RowRecord = Static<typeof RowRecordSchema>;

/**
 * Error response schema.
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String({ description: 'Error type' }),
  message: Type.Optional(Type.String({ description: 'Human-readable error message' })),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;
