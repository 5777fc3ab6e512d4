/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { createLogger, PRETTY_TRANSPORT, SERVICE_NAME } from './infra/logger/index.js';

const getVersion = (): string | undefined => process.env['APP_VERSION'];

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const loggerConfig = {
    level: config.logger.level,
    name: SERVICE_NAME,
    pretty: config.logger.pretty,
  };
  const logger = createLogger(loggerConfig);

  logger.info(
    {
      config: {
        server: config.server,
        maxUploadBytes: config.datasets.maxUploadBytes,
        timeStepMinutes: config.datasets.timeStepMinutes,
        keywords: config.datasets.keywords,
      },
    },
    'Starting API server'
  );

  // Fastify creates its own request logger from the same settings
  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        name: SERVICE_NAME,
        ...(config.logger.pretty && { transport: PRETTY_TRANSPORT }),
      },
      disableRequestLogging: false,
    },
    deps: { config },
    version: getVersion(),
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
