/**
 * Storage adapter factory
 *
 * Builds the backend named by the configuration. An invalid configuration
 * either falls back to in-memory storage (development) or is reported as a
 * StorageInitializationError so startup stops before serving requests.
 */

import { logger } from '../../utils/logger';
import type { StorageAdapter, StorageConfig } from '../interfaces';
import { StorageInitializationError } from '../interfaces';
import { SQLiteStorageAdapter } from './SQLiteStorageAdapter';
import { InMemoryStorageAdapter } from './InMemoryStorageAdapter';

export interface CreateAdapterOptions {
  /** Use in-memory storage instead of failing on an invalid configuration */
  fallbackToMemory?: boolean;
}

export class DefaultStorageAdapterFactory {
  createAdapter(config: StorageConfig, options: CreateAdapterOptions = {}): StorageAdapter {
    const validation = this.validateConfig(config);
    if (!validation.valid) {
      if (options.fallbackToMemory) {
        logger.error(
          'Invalid storage configuration, falling back to memory storage: %s',
          validation.errors.join('; '),
        );
        return new InMemoryStorageAdapter();
      }
      throw new StorageInitializationError(
        `Invalid storage configuration: ${validation.errors.join('; ')}`,
      );
    }

    switch (config.type) {
      case 'sqlite':
        return this.createSQLiteAdapter(config);

      case 'memory':
        logger.info('Using in-memory storage; data is lost on restart');
        return new InMemoryStorageAdapter();
    }
  }

  getSupportedTypes(): string[] {
    return ['memory', 'sqlite'];
  }

  validateConfig(config: StorageConfig): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    const supportedTypes = this.getSupportedTypes();
    if (!supportedTypes.includes(config.type)) {
      errors.push(`Unsupported storage type: ${String(config.type)}. Supported types: ${supportedTypes.join(', ')}`);
    }

    if (config.type === 'sqlite' && !config.databasePath) {
      errors.push('Database path is required for SQLite storage');
    }

    if (config.timeout !== undefined && (config.timeout < 100 || config.timeout > 60000)) {
      errors.push('Timeout must be between 100 and 60000 milliseconds');
    }

    return {
      valid: errors.length === 0,
      errors,
    };
  }

  private createSQLiteAdapter(config: StorageConfig): StorageAdapter {
    const databasePath = config.databasePath;
    if (!databasePath) {
      throw new StorageInitializationError('Database path is required for SQLite storage');
    }

    const adapter = new SQLiteStorageAdapter({
      databasePath,
      timeout: config.timeout ?? 5000,
      debug: config.debug ?? false,
    });

    logger.info('Created SQLite storage adapter at %s', databasePath);
    return adapter;
  }
}

export const storageAdapterFactory = new DefaultStorageAdapterFactory();
