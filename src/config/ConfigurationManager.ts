/**
 * Centralized Configuration Manager
 * Replaces scattered process.env usage with type-safe configuration management
 */

import { z } from 'zod';
import type {
  ApplicationConfig,
  ConfigLoadOptions,
  LoggingConfig,
  StorageSettings,
} from './types';
import {
  Environment,
  ConfigurationError,
  ApplicationConfigSchema,
} from './types';
import { logger } from '../utils/logger';

/**
 * Environment-specific configuration overrides
 */
type EnvironmentProfile = {
  logging?: Partial<LoggingConfig>;
  storage?: Partial<StorageSettings>;
};

const ENVIRONMENT_PROFILES: Record<Environment, EnvironmentProfile> = {
  [Environment.DEVELOPMENT]: {
    logging: {
      level: 'debug' as const,
    },
  },

  [Environment.TEST]: {
    logging: {
      level: 'error' as const,
    },
    storage: {
      type: 'memory' as const,
    },
  },

  [Environment.PRODUCTION]: {
    logging: {
      level: 'info' as const,
    },
  },
};

/**
 * Environment variable → configuration path
 */
const ENVIRONMENT_VARIABLES: ReadonlyArray<readonly [string, string, string]> = [
  ['HOST', 'server', 'host'],
  ['PORT', 'server', 'port'],
  ['CORS_ORIGIN', 'server', 'corsOrigin'],
  ['MAX_UPLOAD_BYTES', 'server', 'maxUploadBytes'],
  ['MAX_UPLOAD_FILES', 'server', 'maxFiles'],
  ['STORAGE_TYPE', 'storage', 'type'],
  ['DATABASE_PATH', 'storage', 'databasePath'],
  ['DB_CONNECTION_TIMEOUT_MS', 'storage', 'connectionTimeoutMs'],
  ['AUTH_ISSUER', 'auth', 'issuer'],
  ['AUTH_AUDIENCE', 'auth', 'audience'],
  ['AUTH_JWKS_URI', 'auth', 'jwksUri'],
  ['IDENTITY_DOMAIN', 'identity', 'domain'],
  ['IDENTITY_MANAGEMENT_TOKEN', 'identity', 'managementToken'],
  ['S3_BUCKET', 'blobStore', 'bucket'],
  ['S3_REGION', 'blobStore', 'region'],
  ['S3_ENDPOINT', 'blobStore', 'endpoint'],
  ['S3_ACCESS_KEY_ID', 'blobStore', 'accessKeyId'],
  ['S3_SECRET_ACCESS_KEY', 'blobStore', 'secretAccessKey'],
  ['S3_PUBLIC_URL_BASE', 'blobStore', 'publicUrlBase'],
  ['MEMORY_THRESHOLD_BYTES', 'health', 'memoryThresholdBytes'],
  ['LOG_LEVEL', 'logging', 'level'],
];

/**
 * Centralized Configuration Manager
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | null = null;
  private config: ApplicationConfig | null = null;
  private readonly loadOptions: ConfigLoadOptions;

  private constructor(options: ConfigLoadOptions = {}) {
    this.loadOptions = options;
  }

  /**
   * Get singleton instance of ConfigurationManager
   */
  public static getInstance(options?: ConfigLoadOptions): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager(options);
    }
    return ConfigurationManager.instance;
  }

  /**
   * Reset singleton instance (for testing)
   */
  public static reset(): void {
    ConfigurationManager.instance = null;
  }

  /**
   * Load and validate configuration from multiple sources
   */
  public loadConfiguration(): ApplicationConfig {
    if (this.config) {
      return this.config;
    }

    // 1. Detect environment
    const environment = this.detectEnvironment();

    // 2. Load base configuration from environment profile
    const profileConfig = ENVIRONMENT_PROFILES[environment];

    // 3. Load configuration from environment variables
    const envConfig = this.loadFromEnvironmentVariables();

    // 4. Sources override env vars, env vars override profile
    const rawConfig = this.deepMerge(
      { environment },
      profileConfig,
      envConfig,
      this.loadOptions.sources ?? {}
    );

    this.config = this.validateConfiguration(rawConfig);
    this.logConfigurationSummary();

    return this.config;
  }

  /**
   * Get current configuration (load if not already loaded)
   */
  public getConfiguration(): ApplicationConfig {
    return this.config ?? this.loadConfiguration();
  }

  /**
   * Fail fast when settings a production boot cannot do without are missing
   */
  public assertProductionReady(): void {
    const config = this.getConfiguration();
    if (config.environment !== Environment.PRODUCTION) {
      return;
    }

    const required: Array<[string, unknown]> = [
      ['auth.issuer', config.auth.issuer],
      ['auth.audience', config.auth.audience],
      ['auth.jwksUri', config.auth.jwksUri],
      ['blobStore.bucket', config.blobStore.bucket],
    ];

    const missing = required.filter(([, value]) => value === undefined).map(([field]) => field);
    if (missing.length > 0) {
      throw new ConfigurationError(missing.join(', '), 'required in production');
    }
  }

  /**
   * Detect current environment
   */
  private detectEnvironment(): Environment {
    if (this.loadOptions.environment) {
      return this.loadOptions.environment;
    }

    const env = this.loadOptions.env ?? process.env;
    const nodeEnv = env.NODE_ENV?.toLowerCase();

    if (env.JEST_WORKER_ID || nodeEnv === 'test') {
      return Environment.TEST;
    }

    if (nodeEnv === 'production') {
      return Environment.PRODUCTION;
    }

    return Environment.DEVELOPMENT;
  }

  /**
   * Load configuration from environment variables
   */
  private loadFromEnvironmentVariables(): Record<string, Record<string, string>> {
    const env = this.loadOptions.env ?? process.env;
    const result: Record<string, Record<string, string>> = {};

    for (const [variable, section, key] of ENVIRONMENT_VARIABLES) {
      const value = env[variable];
      if (value === undefined || value === '') {
        continue;
      }
      const target = result[section] ?? {};
      target[key] = value;
      result[section] = target;
    }

    return result;
  }

  /**
   * Deep merge multiple configuration objects
   */
  private deepMerge(...objects: Record<string, unknown>[]): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const obj of objects) {
      for (const key in obj) {
        if (!Object.prototype.hasOwnProperty.call(obj, key)) continue;

        const current = result[key];
        const incoming = obj[key];
        if (isPlainObject(current) && isPlainObject(incoming)) {
          result[key] = this.deepMerge(current, incoming);
        } else {
          result[key] = incoming;
        }
      }
    }

    return result;
  }

  /**
   * Validate configuration using Zod schema
   */
  private validateConfiguration(rawConfig: unknown): ApplicationConfig {
    const parsed = ApplicationConfigSchema.safeParse(rawConfig);
    if (parsed.success) {
      return parsed.data;
    }

    const errors = parsed.error.errors.map((err: z.ZodIssue) => ({
      path: err.path.join('.'),
      message: err.message,
    }));

    throw new ConfigurationError(
      'validation',
      `Configuration validation failed:\n${errors.map(e => `  - ${e.path}: ${e.message}`).join('\n')}`,
      { errors }
    );
  }

  /**
   * Log configuration summary without sensitive values
   */
  private logConfigurationSummary(): void {
    if (!this.config) return;

    const summary = {
      environment: this.config.environment,
      server: {
        host: this.config.server.host,
        port: this.config.server.port,
        hasCorsOrigin: !!this.config.server.corsOrigin,
      },
      storage: {
        type: this.config.storage.type,
        connectionTimeoutMs: this.config.storage.connectionTimeoutMs,
      },
      auth: {
        hasIssuer: !!this.config.auth.issuer,
        hasAudience: !!this.config.auth.audience,
        hasJwksUri: !!this.config.auth.jwksUri,
      },
      identity: {
        hasDomain: !!this.config.identity.domain,
        hasManagementToken: !!this.config.identity.managementToken,
      },
      blobStore: {
        hasBucket: !!this.config.blobStore.bucket,
        region: this.config.blobStore.region,
        hasCredentials: !!this.config.blobStore.accessKeyId,
      },
      logging: this.config.logging,
    };

    logger.info('Configuration loaded successfully %j', summary);
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Export singleton instance getter
export const getConfiguration = (): ApplicationConfig => ConfigurationManager.getInstance().getConfiguration();
