import { err, ok, type Result } from 'neverthrow';

import { detectVolumeColumns } from './classify-columns.js';
import { normalizeDataset } from './normalize-dataset.js';
import { createOversizeInputError, type IngestError, type OversizeInputError } from '../errors.js';

import type { CsvParser } from '../ports.js';
import type { DatasetUpload, InferenceConfig, NormalizedTable } from '../types.js';

export interface IngestDatasetDeps {
  csvParser: CsvParser;
}

export interface IngestedDataset {
  /** Headers as they appeared in the upload. */
  rawColumns: readonly string[];
  rawRowCount: number;
  table: NormalizedTable;
  /** Measurement-like columns of the normalized table, possibly empty. */
  volumeColumns: string[];
}

/**
 * Rejects payloads above the limit. Runs before any parsing.
 */
export const checkPayloadSize = (
  size: number,
  limit: number
): Result<number, OversizeInputError> => {
  if (size > limit) {
    return err(createOversizeInputError(size, limit));
  }
  return ok(size);
};

/**
 * Size guard, CSV parsing and normalization for one upload.
 *
 * Recomputes everything from the raw content on each call.
 */
export const ingestDataset = (
  deps: IngestDatasetDeps,
  upload: DatasetUpload,
  config: InferenceConfig
): Result<IngestedDataset, IngestError> => {
  const size = upload.declaredSize ?? Buffer.byteLength(upload.content, 'utf8');

  return checkPayloadSize(size, config.maxUploadBytes)
    .andThen(() => deps.csvParser.parse(upload.content, { delimiter: config.delimiter }))
    .andThen((raw) =>
      normalizeDataset(raw, config).map((table) => ({
        rawColumns: raw.columns,
        rawRowCount: raw.rows.length,
        table,
        volumeColumns: detectVolumeColumns(table.columns, config.keywords.volume),
      }))
    );
};
