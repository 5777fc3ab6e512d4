/**
 * Datasets Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Domain Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Upload could not be read as delimited tabular data.
 */
export interface ParseError {
  readonly type: 'ParseError';
  readonly message: string;
  readonly cause?: unknown;
}

export type SchemaErrorReason = 'NoDatetimeColumn' | 'DatetimeConversionFailed';

/**
 * Table parsed but has no usable datetime column.
 */
export interface SchemaError {
  readonly type: 'SchemaError';
  readonly message: string;
  readonly reason: SchemaErrorReason;
  readonly column?: string;
}

/**
 * Requested window part does not name a real calendar instant.
 */
export interface InvalidDateError {
  readonly type: 'InvalidDateError';
  readonly message: string;
  readonly field: 'start' | 'end';
}

/**
 * Payload is larger than the configured ceiling.
 */
export interface OversizeInputError {
  readonly type: 'OversizeInputError';
  readonly message: string;
  readonly size: number;
  readonly limit: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Unions
// ─────────────────────────────────────────────────────────────────────────────

export type IngestError = OversizeInputError | ParseError | SchemaError;

export type DatasetError = IngestError | InvalidDateError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createParseError = (message: string, cause?: unknown): ParseError => ({
  type: 'ParseError',
  message,
  cause,
});

export const createNoDatetimeColumnError = (): SchemaError => ({
  type: 'SchemaError',
  message:
    "The data must contain a column with datetime information (e.g. 'datetime', 'date_time', 'timestamp').",
  reason: 'NoDatetimeColumn',
});

export const createDatetimeConversionError = (column: string): SchemaError => ({
  type: 'SchemaError',
  message: `'${column}' could not be converted to datetime. Ensure the values are in a valid format.`,
  reason: 'DatetimeConversionFailed',
  column,
});

export const createInvalidDateError = (
  field: InvalidDateError['field'],
  message: string
): InvalidDateError => ({
  type: 'InvalidDateError',
  message,
  field,
});

export const createOversizeInputError = (size: number, limit: number): OversizeInputError => ({
  type: 'OversizeInputError',
  message: `File size of ${String(size)} bytes exceeds the limit of ${String(limit)} bytes. Please upload a smaller file.`,
  size,
  limit,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const DATASET_ERROR_HTTP_STATUS: Record<DatasetError['type'], number> = {
  ParseError: 400,
  SchemaError: 422,
  InvalidDateError: 400,
  OversizeInputError: 413,
};

export const getHttpStatusForError = (error: DatasetError): number => {
  return DATASET_ERROR_HTTP_STATUS[error.type];
};
