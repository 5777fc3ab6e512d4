/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import { isValidTimeStep } from '../../modules/datasets/core/time-grid.js';
import {
  DEFAULT_DATETIME_FORMATS,
  DEFAULT_DATETIME_KEYWORDS,
  DEFAULT_MAX_UPLOAD_BYTES,
  DEFAULT_TIME_STEP_MINUTES,
  DEFAULT_VOLUME_KEYWORDS,
  type InferenceConfig,
} from '../../modules/datasets/core/types.js';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // CORS / embedding
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
  FRAME_ANCESTORS: Type.String({ default: '*' }),

  // Dataset pipeline
  MAX_UPLOAD_BYTES: Type.Integer({ minimum: 1, default: DEFAULT_MAX_UPLOAD_BYTES }),
  TIME_STEP_MINUTES: Type.Integer({ minimum: 1, maximum: 60, default: DEFAULT_TIME_STEP_MINUTES }),
  DATETIME_KEYWORDS: Type.String({ minLength: 1 }),
  VOLUME_KEYWORDS: Type.String({ minLength: 1 }),
  CSV_DELIMITER: Type.String({ minLength: 1, maxLength: 1, default: ',' }),
});

export type Env = Static<typeof EnvSchema>;

const parseInteger = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number.parseInt(value, 10) : fallback;

const splitList = (value: string): string[] =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseInteger(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
    FRAME_ANCESTORS: env['FRAME_ANCESTORS'] ?? '*',
    MAX_UPLOAD_BYTES: parseInteger(env['MAX_UPLOAD_BYTES'], DEFAULT_MAX_UPLOAD_BYTES),
    TIME_STEP_MINUTES: parseInteger(env['TIME_STEP_MINUTES'], DEFAULT_TIME_STEP_MINUTES),
    DATETIME_KEYWORDS: env['DATETIME_KEYWORDS'] ?? DEFAULT_DATETIME_KEYWORDS.join(','),
    VOLUME_KEYWORDS: env['VOLUME_KEYWORDS'] ?? DEFAULT_VOLUME_KEYWORDS.join(','),
    CSV_DELIMITER: env['CSV_DELIMITER'] ?? ',',
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  if (!isValidTimeStep(rawEnv.TIME_STEP_MINUTES)) {
    throw new Error(
      `Invalid environment configuration: /TIME_STEP_MINUTES: must divide 60, got ${String(rawEnv.TIME_STEP_MINUTES)}`
    );
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => {
  const datasets: InferenceConfig = {
    maxUploadBytes: env.MAX_UPLOAD_BYTES,
    timeStepMinutes: env.TIME_STEP_MINUTES,
    keywords: {
      datetime: splitList(env.DATETIME_KEYWORDS),
      volume: splitList(env.VOLUME_KEYWORDS),
    },
    delimiter: env.CSV_DELIMITER,
    datetimeFormats: DEFAULT_DATETIME_FORMATS,
  };

  return {
    server: {
      port: env.PORT,
      host: env.HOST,
      isDevelopment: env.NODE_ENV === 'development',
      isProduction: env.NODE_ENV === 'production',
      isTest: env.NODE_ENV === 'test',
    },
    logger: {
      level: env.LOG_LEVEL,
      pretty: env.NODE_ENV !== 'production',
    },
    cors: {
      allowedOrigins: env.ALLOWED_ORIGINS,
    },
    security: {
      /** Origins allowed to embed the API responses in a frame */
      frameAncestors: splitList(env.FRAME_ANCESTORS),
    },
    datasets,
  };
};

export type AppConfig = ReturnType<typeof createConfig>;
