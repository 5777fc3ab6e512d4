// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Name every detected datetime column is renamed to after normalization. */
export const CANONICAL_DATETIME_COLUMN = 'datetime';

export const LATITUDE_COLUMN = 'latitude';
export const LONGITUDE_COLUMN = 'longitude';

/** 300 MiB */
export const DEFAULT_MAX_UPLOAD_BYTES = 300 * 1024 * 1024;

export const DEFAULT_TIME_STEP_MINUTES = 5;

export const DEFAULT_DATETIME_KEYWORDS: readonly string[] = [
  'datetime',
  'date_time',
  'timestamp',
  'date',
];

export const DEFAULT_VOLUME_KEYWORDS: readonly string[] = [
  'traffic_volume',
  'volume',
  'traffic',
  'count',
];

/**
 * date-fns patterns tried, in order, for values that are not ISO 8601.
 * ISO strings are handled separately by `parseISO`. Two-digit `yy` years land
 * within 50 years of 2000.
 */
export const DEFAULT_DATETIME_FORMATS: readonly string[] = [
  'yyyy/MM/dd HH:mm:ss',
  'yyyy/MM/dd HH:mm',
  'yyyy/MM/dd',
  'M/d/yyyy HH:mm:ss',
  'M/d/yyyy HH:mm',
  'M/d/yyyy h:mm:ss a',
  'M/d/yyyy h:mm a',
  'M/d/yyyy',
  'M/d/yy HH:mm:ss',
  'M/d/yy HH:mm',
  'M/d/yy h:mm a',
  'M/d/yy',
  'd.M.yyyy HH:mm:ss',
  'd.M.yyyy HH:mm',
  'd.M.yyyy',
  'd.M.yy HH:mm',
  'd.M.yy',
  'd-MMM-yyyy HH:mm:ss',
  'd-MMM-yyyy HH:mm',
  'd-MMM-yyyy',
  'd MMM yyyy HH:mm',
  'd MMM yyyy',
  'd MMMM yyyy HH:mm',
  'd MMMM yyyy',
  'MMM d, yyyy HH:mm',
  'MMM d, yyyy',
  'MMMM d, yyyy HH:mm',
  'MMMM d, yyyy',
];

// ─────────────────────────────────────────────────────────────────────────────
// Tables
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A single CSV field. `null` is the missing marker (empty field or a row
 * shorter than the header).
 */
export type Cell = string | number | null;

export type Row = Readonly<Record<string, Cell>>;

/**
 * Table as read from the upload. Header case is preserved.
 */
export interface RawTable {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

export interface NormalizedRow {
  readonly datetime: Date;
  /** Every column except the canonical datetime one. */
  readonly cells: Row;
}

/**
 * Table with lower-cased headers and a guaranteed `datetime` column.
 */
export interface NormalizedTable {
  readonly columns: readonly string[];
  readonly rows: readonly NormalizedRow[];
  /** Lower-cased header that was renamed to `datetime`. */
  readonly sourceDatetimeColumn: string;
  /** Rows removed because their datetime value did not parse. */
  readonly droppedRowCount: number;
}

/**
 * Result of looking up a column on a row. Absence is explicit so that display
 * fallbacks stay with the caller.
 */
export type FieldValue =
  | { readonly present: true; readonly value: Cell }
  | { readonly present: false };

// ─────────────────────────────────────────────────────────────────────────────
// Classification
// ─────────────────────────────────────────────────────────────────────────────

export type ColumnRole = 'Datetime' | 'VolumeCandidate' | 'Other';

/**
 * Keyword table driving the classifier. Matching is a case-insensitive
 * substring test against the header.
 */
export interface ColumnKeywords {
  readonly datetime: readonly string[];
  readonly volume: readonly string[];
}

export interface ClassifiedColumn {
  readonly name: string;
  readonly roles: readonly ColumnRole[];
}

export interface ColumnClassification {
  readonly datetimeColumn: string | undefined;
  readonly volumeColumns: readonly string[];
  readonly columns: readonly ClassifiedColumn[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Time window
// ─────────────────────────────────────────────────────────────────────────────

export interface TimeParts {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  /** 1-31 */
  readonly day: number;
  /** HH:MM:SS on the configured step grid */
  readonly time: string;
}

/**
 * Inclusive range. `start <= end` holds for every window built by
 * `buildWindow`.
 */
export interface TimeWindow {
  readonly start: Date;
  readonly end: Date;
}

export interface WindowOptions {
  readonly years: readonly number[];
  readonly months: readonly number[];
  readonly days: readonly number[];
  readonly times: readonly string[];
  readonly defaultStart: TimeParts;
  readonly defaultEnd: TimeParts;
  /** Earliest and latest datetime present; undefined for an empty table. */
  readonly range: { readonly min: Date; readonly max: Date } | undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Geo
// ─────────────────────────────────────────────────────────────────────────────

export interface GeoPoint {
  readonly latitude: number;
  readonly longitude: number;
}

export interface LocatedRow {
  readonly row: NormalizedRow;
  readonly point: GeoPoint;
}

export type GeoResult =
  | { readonly status: 'Points'; readonly points: readonly LocatedRow[]; readonly center: GeoPoint }
  | { readonly status: 'MissingColumns'; readonly missing: readonly string[] }
  | { readonly status: 'NoValidPoints' };

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Settings the pipeline is called with. Built once at startup and passed to
 * every use case; never mutated.
 */
export interface InferenceConfig {
  readonly maxUploadBytes: number;
  readonly timeStepMinutes: number;
  readonly keywords: ColumnKeywords;
  readonly delimiter: string;
  readonly datetimeFormats: readonly string[];
}

export const DEFAULT_INFERENCE_CONFIG: InferenceConfig = {
  maxUploadBytes: DEFAULT_MAX_UPLOAD_BYTES,
  timeStepMinutes: DEFAULT_TIME_STEP_MINUTES,
  keywords: {
    datetime: DEFAULT_DATETIME_KEYWORDS,
    volume: DEFAULT_VOLUME_KEYWORDS,
  },
  delimiter: ',',
  datetimeFormats: DEFAULT_DATETIME_FORMATS,
};

/**
 * Upload handed to the ingest use case. `declaredSize` is the size the client
 * announced (e.g. Content-Length); the content length is used when absent.
 */
export interface DatasetUpload {
  readonly content: string;
  readonly declaredSize?: number | undefined;
}
