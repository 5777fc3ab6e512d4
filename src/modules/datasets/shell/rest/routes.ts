/**
 * Datasets Module REST Routes
 *
 * Every request carries the whole CSV upload as its body and recomputes the
 * pipeline from scratch; nothing is stored between requests.
 * - POST /api/v1/datasets/inspect: Schema inference and window options
 * - POST /api/v1/datasets/explore: Time-window filtering and map points
 */

import { toGeoSection, toRowRecord, toWindowOptionsDto } from './presenters.js';
import {
  DEFAULT_ROW_LIMIT,
  ErrorResponseSchema,
  ExploreQuerySchema,
  ExploreResponseSchema,
  InspectResponseSchema,
  type ExploreQuery,
} from './schemas.js';
import { createParseError, getHttpStatusForError, type DatasetError } from '../../core/errors.js';
import { classifyColumns } from '../../core/usecases/classify-columns.js';
import { exploreDataset } from '../../core/usecases/explore-dataset.js';
import { getWindowOptions } from '../../core/usecases/get-window-options.js';
import { checkPayloadSize, ingestDataset } from '../../core/usecases/ingest-dataset.js';

import type { CsvParser } from '../../core/ports.js';
import type { InferenceConfig, TimeParts } from '../../core/types.js';
import type { FastifyBaseLogger, FastifyPluginAsync, FastifyReply } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for dataset routes.
 */
export interface MakeDatasetRoutesDeps {
  csvParser: CsvParser;
  config: InferenceConfig;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const CSV_CONTENT_TYPES = ['text/csv', 'application/csv'];

const errorResponseSchemas = {
  400: ErrorResponseSchema,
  413: ErrorResponseSchema,
  422: ErrorResponseSchema,
};

function sendError(reply: FastifyReply, log: FastifyBaseLogger, error: DatasetError) {
  log.warn({ errorType: error.type }, error.message);
  return reply.status(getHttpStatusForError(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
  });
}

const parseContentLength = (header: string | undefined): number | undefined => {
  if (header === undefined) return undefined;
  const value = Number.parseInt(header, 10);
  return Number.isNaN(value) ? undefined : value;
};

const pickParts = (
  year: number | undefined,
  month: number | undefined,
  day: number | undefined,
  time: string | undefined
): Partial<TimeParts> => ({
  ...(year !== undefined && { year }),
  ...(month !== undefined && { month }),
  ...(day !== undefined && { day }),
  ...(time !== undefined && { time }),
});

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates dataset REST routes.
 */
export const makeDatasetRoutes = (deps: MakeDatasetRoutesDeps): FastifyPluginAsync => {
  const { csvParser, config } = deps;

  const ingest = (body: unknown) => {
    if (typeof body !== 'string') {
      return undefined;
    }
    return ingestDataset({ csvParser }, { content: body }, config);
  };

  return async (fastify) => {
    fastify.addContentTypeParser(
      CSV_CONTENT_TYPES,
      { parseAs: 'string', bodyLimit: config.maxUploadBytes },
      (_request, body, done) => {
        done(null, body);
      }
    );

    // Declared size is checked before the body is read.
    fastify.addHook('onRequest', async (request, reply) => {
      const declared = parseContentLength(request.headers['content-length']);
      if (declared === undefined) return;

      const sizeResult = checkPayloadSize(declared, config.maxUploadBytes);
      if (sizeResult.isErr()) {
        return sendError(reply, request.log, sizeResult.error);
      }
    });

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/datasets/inspect - Infer schema and window options
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Body: unknown }>(
      '/api/v1/datasets/inspect',
      {
        schema: {
          response: {
            200: InspectResponseSchema,
            ...errorResponseSchemas,
          },
        },
      },
      async (request, reply) => {
        const result = ingest(request.body);
        if (result === undefined) {
          return sendError(reply, request.log, createParseError('Expected a CSV request body'));
        }
        if (result.isErr()) {
          return sendError(reply, request.log, result.error);
        }

        const { rawColumns, table, volumeColumns } = result.value;
        const classification = classifyColumns(table.columns, config.keywords);

        request.log.info(
          {
            rowCount: table.rows.length,
            droppedRowCount: table.droppedRowCount,
            sourceDatetimeColumn: table.sourceDatetimeColumn,
          },
          'Dataset inspected'
        );

        return reply.status(200).send({
          ok: true,
          data: {
            rawColumns: [...rawColumns],
            columns: classification.columns.map((column) => ({
              name: column.name,
              roles: [...column.roles],
            })),
            sourceDatetimeColumn: table.sourceDatetimeColumn,
            rowCount: table.rows.length,
            droppedRowCount: table.droppedRowCount,
            volumeColumns,
            windowOptions: toWindowOptionsDto(getWindowOptions(table, config)),
          },
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/datasets/explore - Filter by time window and extract points
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Body: unknown; Querystring: ExploreQuery }>(
      '/api/v1/datasets/explore',
      {
        schema: {
          querystring: ExploreQuerySchema,
          response: {
            200: ExploreResponseSchema,
            ...errorResponseSchemas,
          },
        },
      },
      async (request, reply) => {
        const result = ingest(request.body);
        if (result === undefined) {
          return sendError(reply, request.log, createParseError('Expected a CSV request body'));
        }
        if (result.isErr()) {
          return sendError(reply, request.log, result.error);
        }

        const query = request.query;
        const viewResult = exploreDataset(
          {
            table: result.value.table,
            start: pickParts(query.startYear, query.startMonth, query.startDay, query.startTime),
            end: pickParts(query.endYear, query.endMonth, query.endDay, query.endTime),
          },
          config
        );
        if (viewResult.isErr()) {
          return sendError(reply, request.log, viewResult.error);
        }

        const { window, filtered, geo } = viewResult.value;
        const limit = query.limit ?? DEFAULT_ROW_LIMIT;

        request.log.info(
          {
            totalRows: filtered.rows.length,
            geoStatus: geo.status,
            start: window.start.toISOString(),
            end: window.end.toISOString(),
          },
          'Dataset explored'
        );

        return reply.status(200).send({
          ok: true,
          data: {
            window: {
              start: window.start.toISOString(),
              end: window.end.toISOString(),
            },
            columns: [...filtered.columns],
            totalRows: filtered.rows.length,
            truncated: filtered.rows.length > limit,
            rows: filtered.rows.slice(0, limit).map((row) => toRowRecord(row, filtered.columns)),
            volumeColumns: result.value.volumeColumns,
            geo: toGeoSection(geo),
          },
        });
      }
    );
  };
};
