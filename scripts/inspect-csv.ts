#!/usr/bin/env node
/**
 * Inspect a CSV file from the command line.
 *
 * Runs the same ingest and explore pipeline as the HTTP API over the default
 * window of the file and prints a JSON summary.
 *
 * Usage:
 *   npm run inspect -- ./data/traffic.csv
 */

import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';

import { parseEnv, createConfig } from '../src/infra/config/index.js';
import {
  checkPayloadSize,
  exploreDataset,
  ingestDataset,
  makeCsvParser,
} from '../src/modules/datasets/index.js';

const fileArg = process.argv[2];

const main = async (): Promise<void> => {
  if (typeof fileArg !== 'string' || fileArg.trim() === '') {
    console.error('Usage: inspect-csv <file.csv>');
    process.exit(1);
  }

  const filePath = path.resolve(fileArg);
  const config = createConfig(parseEnv(process.env)).datasets;

  // Size is checked from the file metadata so oversize files are never read
  const { size } = await stat(filePath);
  const sizeResult = checkPayloadSize(size, config.maxUploadBytes);
  if (sizeResult.isErr()) {
    console.error(sizeResult.error.message);
    process.exit(1);
  }

  const content = await readFile(filePath, 'utf8');
  const result = ingestDataset(
    { csvParser: makeCsvParser() },
    { content, declaredSize: size },
    config
  ).andThen((ingested) =>
    exploreDataset({ table: ingested.table }, config).map((view) => ({ ingested, view }))
  );

  if (result.isErr()) {
    console.error(`${result.error.type}: ${result.error.message}`);
    process.exit(1);
  }

  const { ingested, view } = result.value;
  const summary = {
    file: path.basename(filePath),
    rawColumns: ingested.rawColumns,
    columns: ingested.table.columns,
    sourceDatetimeColumn: ingested.table.sourceDatetimeColumn,
    rowCount: ingested.table.rows.length,
    droppedRowCount: ingested.table.droppedRowCount,
    volumeColumns: ingested.volumeColumns,
    range:
      view.options.range !== undefined
        ? { min: view.options.range.min.toISOString(), max: view.options.range.max.toISOString() }
        : null,
    geo:
      view.geo.status === 'Points'
        ? { status: view.geo.status, points: view.geo.points.length, center: view.geo.center }
        : view.geo,
  };

  console.log(JSON.stringify(summary, null, 2));
};

await main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
