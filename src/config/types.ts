/**
 * Configuration Types and Schemas
 * Centralized configuration management for the task API server
 */

import { z } from 'zod';

// Environment type for configuration profiles
export enum Environment {
  DEVELOPMENT = 'development',
  TEST = 'test',
  PRODUCTION = 'production',
}

const MEBIBYTE = 1024 * 1024;

// HTTP Server Configuration Schema
export const ServerConfigSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().min(0).max(65535).default(8080),
  corsOrigin: z.string().optional(),
  maxUploadBytes: z.coerce.number().int().positive().default(10 * MEBIBYTE),
  maxFiles: z.coerce.number().int().positive().default(10),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

// Persistence Configuration Schema
export const StorageConfigSchema = z.object({
  type: z.enum(['sqlite', 'memory']).default('sqlite'),
  databasePath: z.string().min(1).default('./data/tasks.db'),
  connectionTimeoutMs: z.coerce.number().int().min(100).max(60000).default(5000),
});

export type StorageSettings = z.infer<typeof StorageConfigSchema>;

// Bearer Token Validation Configuration Schema
export const AuthConfigSchema = z.object({
  issuer: z.string().url().optional(),
  audience: z.string().min(1).optional(),
  jwksUri: z.string().url().optional(),
});

export type AuthConfig = z.infer<typeof AuthConfigSchema>;

// Identity Directory Configuration Schema
export const IdentityConfigSchema = z.object({
  domain: z.string().min(1).optional(),
  managementToken: z.string().min(1).optional(),
});

export type IdentityConfig = z.infer<typeof IdentityConfigSchema>;

// Blob Store Configuration Schema
export const BlobStoreConfigSchema = z.object({
  bucket: z.string().min(1).optional(),
  region: z.string().min(1).default('us-east-1'),
  endpoint: z.string().url().optional(),
  accessKeyId: z.string().min(1).optional(),
  secretAccessKey: z.string().min(1).optional(),
  publicUrlBase: z.string().url().optional(),
});

export type BlobStoreConfig = z.infer<typeof BlobStoreConfigSchema>;

// Health Check Configuration Schema
export const HealthConfigSchema = z.object({
  memoryThresholdBytes: z.coerce.number().int().positive().default(1024 * MEBIBYTE),
});

export type HealthConfig = z.infer<typeof HealthConfigSchema>;

// Logging Configuration Schema
export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// Complete Application Configuration Schema
export const ApplicationConfigSchema = z.object({
  environment: z.nativeEnum(Environment).default(Environment.DEVELOPMENT),
  server: ServerConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
  auth: AuthConfigSchema.default({}),
  identity: IdentityConfigSchema.default({}),
  blobStore: BlobStoreConfigSchema.default({}),
  health: HealthConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type ApplicationConfig = z.infer<typeof ApplicationConfigSchema>;

// Configuration Validation Error
export class ConfigurationError extends Error {
  constructor(
    public readonly field: string,
    message: string,
    public readonly value?: unknown
  ) {
    super(`Configuration error in ${field}: ${message}`);
    this.name = 'ConfigurationError';
  }
}

// Configuration Load Options
export interface ConfigLoadOptions {
  /** Override default environment detection */
  environment?: Environment;
  /** Environment variables to read instead of process.env */
  env?: NodeJS.ProcessEnv;
  /** Additional configuration sources, applied last */
  sources?: Record<string, unknown>;
}
