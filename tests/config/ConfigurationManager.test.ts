/**
 * Configuration Manager Tests
 */

import { ConfigurationManager, Environment, ConfigurationError } from '../../src/config';
import { logger } from '../../src/utils/logger';

jest.mock('../../src/utils/logger');

function load(env: NodeJS.ProcessEnv, sources?: Record<string, unknown>): ConfigurationManager {
  return ConfigurationManager.getInstance(sources ? { env, sources } : { env });
}

describe('ConfigurationManager', () => {
  beforeEach(() => {
    ConfigurationManager.reset();
  });

  afterEach(() => {
    ConfigurationManager.reset();
  });

  describe('Environment Detection', () => {
    it('should detect the test environment from JEST_WORKER_ID', () => {
      const config = load({ JEST_WORKER_ID: '1' }).getConfiguration();
      expect(config.environment).toBe(Environment.TEST);
    });

    it('should detect production from NODE_ENV', () => {
      const config = load({ NODE_ENV: 'Production' }).getConfiguration();
      expect(config.environment).toBe(Environment.PRODUCTION);
    });

    it('should default to development', () => {
      const config = load({}).getConfiguration();
      expect(config.environment).toBe(Environment.DEVELOPMENT);
    });

    it('should prefer an explicit environment option', () => {
      const config = ConfigurationManager.getInstance({
        environment: Environment.PRODUCTION,
        env: { NODE_ENV: 'test' },
      }).getConfiguration();
      expect(config.environment).toBe(Environment.PRODUCTION);
    });
  });

  describe('Defaults and profiles', () => {
    it('should apply defaults for a development boot', () => {
      const config = load({}).getConfiguration();

      expect(config.server).toEqual({
        host: '0.0.0.0',
        port: 8080,
        maxUploadBytes: 10 * 1024 * 1024,
        maxFiles: 10,
      });
      expect(config.storage).toEqual({
        type: 'sqlite',
        databasePath: './data/tasks.db',
        connectionTimeoutMs: 5000,
      });
      expect(config.blobStore.region).toBe('us-east-1');
      expect(config.health.memoryThresholdBytes).toBe(1024 * 1024 * 1024);
      expect(config.logging.level).toBe('debug');
    });

    it('should use memory storage and quiet logging under test', () => {
      const config = load({ NODE_ENV: 'test' }).getConfiguration();

      expect(config.storage.type).toBe('memory');
      expect(config.logging.level).toBe('error');
    });
  });

  describe('Environment variables', () => {
    it('should read and coerce environment variables', () => {
      const config = load({
        PORT: '3000',
        CORS_ORIGIN: 'https://tasks.test',
        DATABASE_PATH: '/tmp/tasks.db',
        AUTH_ISSUER: 'https://issuer.test/',
        AUTH_AUDIENCE: 'tasks-api',
        S3_BUCKET: 'task-images',
        LOG_LEVEL: 'warn',
        MEMORY_THRESHOLD_BYTES: '2048',
      }).getConfiguration();

      expect(config.server.port).toBe(3000);
      expect(config.server.corsOrigin).toBe('https://tasks.test');
      expect(config.storage.databasePath).toBe('/tmp/tasks.db');
      expect(config.auth).toEqual({ issuer: 'https://issuer.test/', audience: 'tasks-api' });
      expect(config.blobStore.bucket).toBe('task-images');
      expect(config.logging.level).toBe('warn');
      expect(config.health.memoryThresholdBytes).toBe(2048);
    });

    it('should ignore empty variables', () => {
      const config = load({ PORT: '', S3_BUCKET: '' }).getConfiguration();

      expect(config.server.port).toBe(8080);
      expect(config.blobStore.bucket).toBeUndefined();
    });

    it('should let explicit sources override environment variables', () => {
      const config = load({ PORT: '3000' }, { server: { port: 4000 } }).getConfiguration();

      expect(config.server.port).toBe(4000);
      expect(config.server.host).toBe('0.0.0.0');
    });

    it('should reject invalid values with a configuration error', () => {
      const manager = load({ PORT: 'not-a-port' });

      expect(() => manager.getConfiguration()).toThrow(ConfigurationError);
      expect(() => manager.getConfiguration()).toThrow(/server\.port/);
    });
  });

  describe('assertProductionReady', () => {
    it('should list settings production cannot do without', () => {
      const manager = load({ NODE_ENV: 'production', AUTH_AUDIENCE: 'tasks-api' });

      expect(() => manager.assertProductionReady()).toThrow(
        'Configuration error in auth.issuer, auth.jwksUri, blobStore.bucket: required in production',
      );
    });

    it('should pass outside production', () => {
      expect(() => load({}).assertProductionReady()).not.toThrow();
    });
  });

  it('should log a summary without secret values', () => {
    load({ IDENTITY_MANAGEMENT_TOKEN: 'test-secret' }).getConfiguration();

    expect(logger.info).toHaveBeenCalledWith(
      'Configuration loaded successfully %j',
      expect.objectContaining({ identity: { hasDomain: false, hasManagementToken: true } }),
    );
  });

  it('should return the same instance until reset', () => {
    const first = ConfigurationManager.getInstance();
    expect(ConfigurationManager.getInstance()).toBe(first);

    ConfigurationManager.reset();
    expect(ConfigurationManager.getInstance()).not.toBe(first);
  });
});
