/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { registerCors, registerSecurityHeaders } from '../infra/plugins/index.js';
import { makeCsvParser, makeDatasetRoutes, type CsvParser } from '../modules/datasets/index.js';
import { makeHealthRoutes } from '../modules/health/index.js';

import type { AppConfig } from '../infra/config/env.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  /** CSV parser used for uploads (csv-parse adapter when omitted) */
  csvParser?: CsvParser;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps?: Partial<AppDeps>;
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps = {}, version } = options;

  if (deps.config === undefined) {
    throw new Error('Missing required dependencies: config');
  }

  const config = deps.config;
  const csvParser = deps.csvParser ?? makeCsvParser();

  // Create Fastify instance; uploads are bounded by the configured ceiling
  const app = fastifyLib({
    bodyLimit: config.datasets.maxUploadBytes,
    ...fastifyOptions,
  });

  // Error and not-found handlers are set before any route is registered
  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    // Handle validation errors
    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    // Body above bodyLimit (chunked uploads without Content-Length)
    if (error.code === 'FST_ERR_CTP_BODY_TOO_LARGE') {
      return reply.status(413).send({
        ok: false,
        error: 'OversizeInputError',
        message: `Request body exceeds the limit of ${String(config.datasets.maxUploadBytes)} bytes`,
      });
    }

    // Handle known HTTP errors
    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    // Handle unexpected errors
    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  await registerCors(app, config);
  await registerSecurityHeaders(app, config);

  // Register health routes
  await app.register(makeHealthRoutes({ ...(version !== undefined && { version }) }));

  // Register dataset routes
  await app.register(makeDatasetRoutes({ csvParser, config: config.datasets }));

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
