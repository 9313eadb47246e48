/**
 * HTTP server composition
 *
 * Collaborators are passed in explicitly so tests can substitute fakes for
 * the blob store, identity directory and token verifier.
 */

import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import { createAuthenticate } from './auth/authenticate';
import type { TokenVerifier } from './auth/TokenVerifier';
import type { BlobStore } from './blob/BlobStore';
import type { IdentityDirectory } from './identity/IdentityDirectory';
import { registerStatusRoutes } from './routes/status';
import { registerTaskRoutes } from './routes/tasks';
import { registerUserRoutes } from './routes/users';
import { AuditLogService } from './services/AuditLogService';
import { TaskService } from './services/TaskService';
import { UserService } from './services/UserService';
import type { StorageAdapter } from './storage/interfaces';
import { HealthMonitor } from './storage/services/HealthMonitor';
import { toAppError, toResponseBody } from './utils/error-handler';
import { GcCounter } from './utils/gc-counter';
import type { GcCounts } from './utils/gc-counter';
import { logger } from './utils/logger';

export const CACHE_CONTROL = 'private, max-age=3600, must-revalidate';

export interface ServerDependencies {
  storage: StorageAdapter;
  blobStore: BlobStore;
  identityDirectory: IdentityDirectory;
  tokenVerifier: TokenVerifier;
  clock?: () => Date;
  generateId?: () => string;
  memoryUsage?: () => NodeJS.MemoryUsage;
  /** Defaults to a GcCounter observing this process for the server's lifetime */
  gcCounts?: () => GcCounts;
}

export interface ServerOptions {
  corsOrigin?: string;
  maxUploadBytes: number;
  maxFiles: number;
  memoryThresholdBytes: number;
  healthCheckTimeoutMs?: number;
}

export async function createServer(deps: ServerDependencies, options: ServerOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });

  if (options.corsOrigin) {
    await app.register(cors, {
      origin: options.corsOrigin,
      credentials: true,
    });
  }

  await app.register(multipart, {
    limits: {
      fileSize: options.maxUploadBytes,
      files: options.maxFiles,
    },
  });

  app.addHook('onSend', async (_request, reply, payload) => {
    if (!reply.hasHeader('cache-control')) {
      reply.header('Cache-Control', CACHE_CONTROL);
    }
    return payload;
  });

  app.addHook('onResponse', async (request, reply) => {
    logger.info(
      '%s %s %d %dms',
      request.method,
      request.url,
      reply.statusCode,
      Math.round(reply.elapsedTime),
    );
  });

  app.setErrorHandler(async (error, request, reply) => {
    const appError = toAppError(error);
    if (appError.statusCode >= 500) {
      const cause = appError.details?.cause;
      logger.error(
        '%s %s failed: %s',
        request.method,
        request.url,
        cause instanceof Error ? cause.message : appError.message,
      );
    } else {
      logger.debug('%s %s rejected with %s', request.method, request.url, appError.code);
    }

    reply.code(appError.statusCode);
    return toResponseBody(appError);
  });

  const audit = new AuditLogService();
  const authenticate = createAuthenticate(deps.tokenVerifier);

  registerTaskRoutes(app, {
    authenticate,
    tasks: new TaskService({
      storage: deps.storage,
      blobStore: deps.blobStore,
      audit,
      clock: deps.clock,
      generateId: deps.generateId,
    }),
  });

  registerUserRoutes(app, {
    authenticate,
    users: new UserService({
      storage: deps.storage,
      blobStore: deps.blobStore,
      directory: deps.identityDirectory,
      audit,
      clock: deps.clock,
    }),
  });

  let gcCounts = deps.gcCounts;
  if (!gcCounts) {
    const counter = new GcCounter();
    counter.start();
    app.addHook('onClose', async () => {
      counter.stop();
    });
    gcCounts = (): GcCounts => counter.snapshot();
  }

  registerStatusRoutes(app, {
    storage: deps.storage,
    healthMonitor: new HealthMonitor({ timeoutMs: options.healthCheckTimeoutMs }),
    memoryThresholdBytes: options.memoryThresholdBytes,
    gcCounts,
    memoryUsage: deps.memoryUsage,
  });

  return app;
}
