/**
 * HealthMonitor - runs storage adapter health checks with a time limit
 *
 * Used by startup (fail fast when the database is unreachable) and by the
 * status endpoint.
 */

import { logger } from '../../utils/logger';
import type { StorageAdapter } from '../interfaces';

/**
 * Health monitoring result
 */
export interface HealthStatus {
  healthy: boolean;
  error?: string;
  details?: Record<string, unknown>;
  timestamp: Date;
  durationMs: number;
}

export interface HealthMonitorOptions {
  timeoutMs?: number;
  clock?: () => Date;
}

export class HealthMonitor {
  private readonly timeoutMs: number;
  private readonly clock: () => Date;

  constructor(options: HealthMonitorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.clock = options.clock ?? ((): Date => new Date());
  }

  /**
   * Check the health of a storage adapter; never rejects
   */
  async checkHealth(adapter: StorageAdapter): Promise<HealthStatus> {
    const timestamp = this.clock();
    const started = Date.now();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`Health check timed out after ${this.timeoutMs}ms`)),
        this.timeoutMs,
      );
    });

    try {
      const health = await Promise.race([adapter.healthCheck(), timeout]);
      return {
        ...health,
        timestamp,
        durationMs: Date.now() - started,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.warn('Storage health check failed: %s', message);

      return {
        healthy: false,
        error: message,
        timestamp,
        durationMs: Date.now() - started,
      };
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }
}
