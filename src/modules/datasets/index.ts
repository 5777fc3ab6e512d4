// CSV adapter
export { makeCsvParser } from './shell/csv/csv-parse-adapter.js';
export type { CsvParser, CsvParseOptions } from './core/ports.js';

// Use cases
export {
  classifyColumns,
  detectDatetimeColumn,
  detectVolumeColumns,
} from './core/usecases/classify-columns.js';
export { normalizeDataset, type NormalizeOptions } from './core/usecases/normalize-dataset.js';
export {
  ingestDataset,
  checkPayloadSize,
  type IngestDatasetDeps,
  type IngestedDataset,
} from './core/usecases/ingest-dataset.js';
export { buildWindow, type BuildWindowOptions } from './core/usecases/build-window.js';
export { filterByWindow } from './core/usecases/filter-by-window.js';
export { getWindowOptions } from './core/usecases/get-window-options.js';
export { sanitizeGeo, toCoordinate } from './core/usecases/sanitize-geo.js';
export {
  exploreDataset,
  type DatasetView,
  type ExploreDatasetInput,
} from './core/usecases/explore-dataset.js';

// Helpers
export { lookupField, findColumn } from './core/columns.js';
export { parseDatetimeCell } from './core/datetime.js';
export { generateTimeOptions, isValidTimeStep } from './core/time-grid.js';

// REST
export { makeDatasetRoutes, type MakeDatasetRoutesDeps } from './shell/rest/routes.js';

// Types
export {
  CANONICAL_DATETIME_COLUMN,
  DEFAULT_DATETIME_FORMATS,
  DEFAULT_DATETIME_KEYWORDS,
  DEFAULT_INFERENCE_CONFIG,
  DEFAULT_MAX_UPLOAD_BYTES,
  DEFAULT_TIME_STEP_MINUTES,
  DEFAULT_VOLUME_KEYWORDS,
} from './core/types.js';
export type {
  Cell,
  Row,
  RawTable,
  NormalizedRow,
  NormalizedTable,
  FieldValue,
  ColumnRole,
  ColumnKeywords,
  ClassifiedColumn,
  ColumnClassification,
  TimeParts,
  TimeWindow,
  WindowOptions,
  GeoPoint,
  LocatedRow,
  GeoResult,
  InferenceConfig,
  DatasetUpload,
} from './core/types.js';

// Errors
export type {
  DatasetError,
  IngestError,
  ParseError,
  SchemaError,
  SchemaErrorReason,
  InvalidDateError,
  OversizeInputError,
} from './core/errors.js';
export { getHttpStatusForError } from './core/errors.js';
