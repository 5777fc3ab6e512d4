/**
 * Unit tests for configuration module
 */

import { describe, expect, it, beforeEach, afterEach } from 'vitest';

import { parseEnv, createConfig } from '@/infra/config/index.js';

describe('Configuration', () => {
  describe('parseEnv', () => {
    const originalEnv = process.env;

    beforeEach(() => {
      process.env = { ...originalEnv };
    });

    afterEach(() => {
      process.env = originalEnv;
    });

    it('returns default values when env is empty', () => {
      const env = parseEnv({});

      expect(env.NODE_ENV).toBe('development');
      expect(env.PORT).toBe(3000);
      expect(env.HOST).toBe('0.0.0.0');
      expect(env.LOG_LEVEL).toBe('info');
    });

    it('parses PORT as number', () => {
      const env = parseEnv({ PORT: '8080' });

      expect(env.PORT).toBe(8080);
      expect(typeof env.PORT).toBe('number');
    });

    it('accepts valid NODE_ENV values', () => {
      expect(parseEnv({ NODE_ENV: 'development' }).NODE_ENV).toBe('development');
      expect(parseEnv({ NODE_ENV: 'production' }).NODE_ENV).toBe('production');
      expect(parseEnv({ NODE_ENV: 'test' }).NODE_ENV).toBe('test');
    });

    it('accepts valid LOG_LEVEL values', () => {
      const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

      for (const level of levels) {
        const env = parseEnv({ LOG_LEVEL: level });
        expect(env.LOG_LEVEL).toBe(level);
      }
    });

    it('uses the dataset pipeline defaults', () => {
      const env = parseEnv({});

      expect(env.MAX_UPLOAD_BYTES).toBe(314572800);
      expect(env.TIME_STEP_MINUTES).toBe(5);
      expect(env.DATETIME_KEYWORDS).toBe('datetime,date_time,timestamp,date');
      expect(env.VOLUME_KEYWORDS).toBe('traffic_volume,volume,traffic,count');
      expect(env.CSV_DELIMITER).toBe(',');
      expect(env.FRAME_ANCESTORS).toBe('*');
      expect(env.ALLOWED_ORIGINS).toBeUndefined();
    });

    it('parses dataset pipeline overrides', () => {
      const env = parseEnv({
        MAX_UPLOAD_BYTES: '1024',
        TIME_STEP_MINUTES: '15',
        CSV_DELIMITER: ';',
      });

      expect(env.MAX_UPLOAD_BYTES).toBe(1024);
      expect(env.TIME_STEP_MINUTES).toBe(15);
      expect(env.CSV_DELIMITER).toBe(';');
    });

    it('throws on a time step that does not divide an hour', () => {
      expect(() => parseEnv({ TIME_STEP_MINUTES: '7' })).toThrow('must divide 60');
      expect(() => parseEnv({ TIME_STEP_MINUTES: '0' })).toThrow(
        'Invalid environment configuration'
      );
    });

    it('throws on a multi-character delimiter', () => {
      expect(() => parseEnv({ CSV_DELIMITER: ';;' })).toThrow('Invalid environment configuration');
    });

    it('throws on invalid PORT (non-numeric)', () => {
      expect(() => parseEnv({ PORT: 'invalid' })).toThrow('Invalid environment configuration');
    });
  });

  describe('createConfig', () => {
    it('creates server config with correct flags', () => {
      const devConfig = createConfig(parseEnv({ NODE_ENV: 'development' }));
      expect(devConfig.server.isDevelopment).toBe(true);
      expect(devConfig.server.isProduction).toBe(false);
      expect(devConfig.server.isTest).toBe(false);

      const prodConfig = createConfig(parseEnv({ NODE_ENV: 'production' }));
      expect(prodConfig.server.isDevelopment).toBe(false);
      expect(prodConfig.server.isProduction).toBe(true);
      expect(prodConfig.server.isTest).toBe(false);

      const testConfig = createConfig(parseEnv({ NODE_ENV: 'test' }));
      expect(testConfig.server.isDevelopment).toBe(false);
      expect(testConfig.server.isProduction).toBe(false);
      expect(testConfig.server.isTest).toBe(true);
    });

    it('sets pretty logging for non-production', () => {
      const devConfig = createConfig(parseEnv({ NODE_ENV: 'development' }));
      expect(devConfig.logger.pretty).toBe(true);

      const prodConfig = createConfig(parseEnv({ NODE_ENV: 'production' }));
      expect(prodConfig.logger.pretty).toBe(false);
    });

    it('splits keyword lists and frame ancestors', () => {
      const config = createConfig(
        parseEnv({
          DATETIME_KEYWORDS: 'recorded_at, , when',
          VOLUME_KEYWORDS: 'flow',
          FRAME_ANCESTORS: "'self', https://dashboard.example.com",
        })
      );

      expect(config.datasets.keywords).toEqual({ datetime: ['recorded_at', 'when'], volume: ['flow'] });
      expect(config.security.frameAncestors).toEqual(["'self'", 'https://dashboard.example.com']);
    });

    it('builds the inference config', () => {
      const config = createConfig(parseEnv({ MAX_UPLOAD_BYTES: '2048', TIME_STEP_MINUTES: '10' }));

      expect(config.datasets.maxUploadBytes).toBe(2048);
      expect(config.datasets.timeStepMinutes).toBe(10);
      expect(config.datasets.delimiter).toBe(',');
      expect(config.datasets.datetimeFormats.length).toBeGreaterThan(0);
    });

    it('passes through port and host', () => {
      const config = createConfig(parseEnv({ PORT: '8080', HOST: '127.0.0.1' }));

      expect(config.server.port).toBe(8080);
      expect(config.server.host).toBe('127.0.0.1');
    });
  });
});
