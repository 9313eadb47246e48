/**
 * Liveness report: process memory, garbage collection and storage connectivity
 */

import type { FastifyInstance } from 'fastify';
import type { StorageAdapter } from '../storage/interfaces';
import type { HealthMonitor } from '../storage/services/HealthMonitor';
import type { GcCounts } from '../utils/gc-counter';

export type HealthState = 'Healthy' | 'Degraded' | 'Unhealthy';

export interface HealthEntry {
  status: HealthState;
  description: string;
  data: Record<string, unknown>;
}

export interface StatusReport {
  status: HealthState;
  results: Record<string, HealthEntry>;
}

export interface StatusRoutesDeps {
  storage: StorageAdapter;
  healthMonitor: HealthMonitor;
  memoryThresholdBytes: number;
  gcCounts: () => GcCounts;
  memoryUsage?: () => NodeJS.MemoryUsage;
}

const SEVERITY: Record<HealthState, number> = {
  Healthy: 0,
  Degraded: 1,
  Unhealthy: 2,
};

export function memoryEntry(usage: NodeJS.MemoryUsage, thresholdBytes: number, gc: GcCounts): HealthEntry {
  return {
    status: usage.heapUsed >= thresholdBytes ? 'Degraded' : 'Healthy',
    description: `Reports degraded status if allocated bytes >= ${thresholdBytes}`,
    data: {
      allocated: usage.heapUsed,
      heapTotal: usage.heapTotal,
      rss: usage.rss,
      external: usage.external,
      minorCollections: gc.minor,
      majorCollections: gc.major,
      incrementalCollections: gc.incremental,
      weakCallbackCollections: gc.weakCallbacks,
    },
  };
}

export function overallStatus(entries: readonly HealthEntry[]): HealthState {
  return entries.reduce<HealthState>(
    (worst, entry) => (SEVERITY[entry.status] > SEVERITY[worst] ? entry.status : worst),
    'Healthy',
  );
}

async function storageEntry(storage: StorageAdapter, healthMonitor: HealthMonitor): Promise<HealthEntry> {
  const health = await healthMonitor.checkHealth(storage);
  const data = { ...health.details, durationMs: health.durationMs };
  if (!health.healthy) {
    return { status: 'Unhealthy', description: health.error ?? 'Storage is unreachable', data };
  }

  try {
    const stats = await storage.getStats();
    return { status: 'Healthy', description: 'Storage is reachable', data: { ...data, ...stats } };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    return { status: 'Degraded', description: `Storage statistics unavailable: ${message}`, data };
  }
}

export function registerStatusRoutes(app: FastifyInstance, deps: StatusRoutesDeps): void {
  const memoryUsage = deps.memoryUsage ?? ((): NodeJS.MemoryUsage => process.memoryUsage());

  app.get('/status', async (_request, reply): Promise<StatusReport> => {
    const results = {
      memory: memoryEntry(memoryUsage(), deps.memoryThresholdBytes, deps.gcCounts()),
      storage: await storageEntry(deps.storage, deps.healthMonitor),
    };
    const status = overallStatus(Object.values(results));

    reply.header('Cache-Control', 'no-store');
    reply.code(status === 'Unhealthy' ? 503 : 200);
    return { status, results };
  });
}
