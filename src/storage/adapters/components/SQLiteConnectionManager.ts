/**
 * SQLite Connection Manager
 *
 * Manages the database connection lifecycle: opening, pragmas, health
 * checks and closing.
 */

import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdir } from 'fs/promises';
import { logger } from '../../../utils/logger';
import type { StorageHealth } from '../../interfaces';
import { StorageConnectionError, StorageInitializationError } from '../../interfaces';

export const IN_MEMORY_DATABASE = ':memory:';

/**
 * SQLite-specific storage configuration
 */
export interface SQLiteStorageConfig {
  databasePath: string;
  enableWAL?: boolean;
  timeout?: number;
  debug?: boolean;
}

export class SQLiteConnectionManager {
  private db: Database.Database | null = null;
  private readonly config: Required<SQLiteStorageConfig>;

  constructor(config: SQLiteStorageConfig) {
    this.config = {
      enableWAL: true,
      timeout: 5000,
      debug: false,
      ...config,
    };
  }

  /**
   * Open the database file, creating its directory when needed
   */
  async initialize(): Promise<Database.Database> {
    try {
      if (this.config.databasePath !== IN_MEMORY_DATABASE) {
        await mkdir(dirname(this.config.databasePath), { recursive: true });
      }

      const db = new Database(this.config.databasePath, {
        timeout: this.config.timeout,
        verbose: this.config.debug
          ? (message?: unknown, ...args: unknown[]): void => logger.debug(String(message), ...args)
          : undefined,
      });
      this.db = db;
      this.configureDatabase(db);

      logger.debug('SQLite connection initialized at %s', this.config.databasePath);
      return db;
    } catch (error) {
      throw new StorageInitializationError(
        `Failed to initialize SQLite connection: ${error instanceof Error ? error.message : 'Unknown error'}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Get the open connection
   * @throws StorageConnectionError if the connection is not open
   */
  getConnection(): Database.Database {
    if (!this.db) {
      throw new StorageConnectionError('Database connection not available');
    }
    return this.db;
  }

  isConnected(): boolean {
    return this.db !== null && this.db.open;
  }

  healthCheck(): StorageHealth {
    if (!this.db) {
      return {
        healthy: false,
        error: 'Database not initialized',
        details: { databasePath: this.config.databasePath },
      };
    }

    try {
      const result = this.db.prepare('SELECT 1 as test').get() as { test: number } | undefined;
      if (result?.test !== 1) {
        return { healthy: false, error: 'Database query returned unexpected result' };
      }

      const integrity = this.db.pragma('integrity_check', { simple: true });
      if (integrity !== 'ok') {
        logger.warn('Database integrity issues detected: %s', String(integrity));
        return {
          healthy: false,
          error: 'Database integrity check failed',
          details: { databasePath: this.config.databasePath, integrityCheckResult: integrity },
        };
      }

      return {
        healthy: true,
        details: {
          databasePath: this.config.databasePath,
          integrityStatus: 'ok',
        },
      };
    } catch (error) {
      return {
        healthy: false,
        error: error instanceof Error ? error.message : 'Unknown error',
        details: { databasePath: this.config.databasePath },
      };
    }
  }

  close(): void {
    if (!this.db) {
      return;
    }
    try {
      this.db.close();
      logger.debug('SQLite connection closed');
    } catch (error) {
      logger.warn('Error closing SQLite connection: %s', error instanceof Error ? error.message : String(error));
    } finally {
      this.db = null;
    }
  }

  private configureDatabase(db: Database.Database): void {
    if (this.config.enableWAL && this.config.databasePath !== IN_MEMORY_DATABASE) {
      db.pragma('journal_mode = WAL');
    }
    db.pragma('foreign_keys = ON');
    db.pragma('synchronous = NORMAL');
    db.pragma('temp_store = memory');
  }
}
