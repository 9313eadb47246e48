#!/usr/bin/env node

/**
 * Task API server
 * Entry point: configuration, storage, collaborators, HTTP listener
 */

import dotenv from 'dotenv';
import type { FastifyInstance } from 'fastify';

import { JwtTokenVerifier } from './auth/JwtTokenVerifier';
import { S3BlobStore } from './blob/S3BlobStore';
import { ConfigurationError, ConfigurationManager, Environment } from './config';
import { Auth0IdentityDirectory } from './identity/Auth0IdentityDirectory';
import { createServer } from './server';
import { HealthMonitor, StorageConnectionError, storageAdapterFactory } from './storage';
import type { StorageAdapter } from './storage';
import { LogLevel, logger, parseLogLevel } from './utils/logger';

// Load environment variables
dotenv.config({ quiet: true });

function requireSetting(value: string | undefined, field: string): string {
  if (value === undefined) {
    throw new ConfigurationError(field, 'is required');
  }
  return value;
}

/**
 * Open storage and fail when it cannot answer a health check in time
 */
async function openStorage(storage: StorageAdapter, timeoutMs: number): Promise<void> {
  await storage.initialize();

  const health = await new HealthMonitor({ timeoutMs }).checkHealth(storage);
  if (!health.healthy) {
    throw new StorageConnectionError(`Storage unreachable at startup: ${health.error ?? 'unknown error'}`);
  }
  logger.info('Storage ready (%dms)', health.durationMs);
}

export async function main(): Promise<FastifyInstance> {
  const manager = ConfigurationManager.getInstance();
  const config = manager.getConfiguration();
  manager.assertProductionReady();

  const level = parseLogLevel(config.logging.level);
  if (level !== undefined) {
    logger.setLevel(level);
  }

  const storage = storageAdapterFactory.createAdapter(
    {
      type: config.storage.type,
      databasePath: config.storage.databasePath,
      timeout: config.storage.connectionTimeoutMs,
      debug: level === LogLevel.DEBUG,
    },
    { fallbackToMemory: config.environment === Environment.DEVELOPMENT },
  );
  await openStorage(storage, config.storage.connectionTimeoutMs);

  const app = await createServer(
    {
      storage,
      blobStore: new S3BlobStore({
        ...config.blobStore,
        bucket: requireSetting(config.blobStore.bucket, 'blobStore.bucket'),
      }),
      identityDirectory: new Auth0IdentityDirectory({
        domain: requireSetting(config.identity.domain, 'identity.domain'),
        token: requireSetting(config.identity.managementToken, 'identity.managementToken'),
      }),
      tokenVerifier: new JwtTokenVerifier({
        issuer: requireSetting(config.auth.issuer, 'auth.issuer'),
        audience: requireSetting(config.auth.audience, 'auth.audience'),
        jwksUri: requireSetting(config.auth.jwksUri, 'auth.jwksUri'),
      }),
    },
    {
      corsOrigin: config.server.corsOrigin,
      maxUploadBytes: config.server.maxUploadBytes,
      maxFiles: config.server.maxFiles,
      memoryThresholdBytes: config.health.memoryThresholdBytes,
      healthCheckTimeoutMs: config.storage.connectionTimeoutMs,
    },
  );

  app.addHook('onClose', async () => {
    await storage.close();
  });

  await app.listen({ host: config.server.host, port: config.server.port });
  logger.info('Task API listening on %s:%d', config.server.host, config.server.port);

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.info('Received %s, shutting down', signal);
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Shutdown failed: %s', error instanceof Error ? error.message : String(error));
          process.exit(1);
        },
      );
    });
  }

  return app;
}

// Only start the server if not in test environment
if (process.env.NODE_ENV !== 'test' && !process.env.JEST_WORKER_ID) {
  main().catch((error: unknown) => {
    logger.error('Failed to start server: %s', error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
