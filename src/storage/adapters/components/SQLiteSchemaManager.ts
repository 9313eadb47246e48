/**
 * SQLite Schema Manager
 *
 * Applies versioned migrations and records them in `schema_version`.
 */

import type Database from 'better-sqlite3';
import { logger } from '../../../utils/logger';
import { StorageInitializationError } from '../../interfaces';

export interface SchemaMigration {
  version: number;
  description: string;
  sql: string;
}

export interface SchemaInitResult {
  currentVersion: number;
  appliedMigrations: number;
}

const MIGRATIONS: readonly SchemaMigration[] = [
  {
    version: 1,
    description: 'Tasks, image registry and audit log',
    sql: `
      CREATE TABLE IF NOT EXISTS tasks (
        id TEXT PRIMARY KEY,
        owner TEXT NOT NULL,
        name TEXT NOT NULL,
        description TEXT NOT NULL,
        start_date TEXT,
        end_date TEXT NOT NULL,
        priority TEXT NOT NULL,
        completed INTEGER NOT NULL DEFAULT 0,
        images TEXT NOT NULL DEFAULT '[]',
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_tasks_owner_updated
      ON tasks(owner, updated_at DESC);

      CREATE TABLE IF NOT EXISTS images (
        id TEXT PRIMARY KEY,
        hash TEXT NOT NULL UNIQUE,
        key TEXT NOT NULL,
        url TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS logs (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        type TEXT NOT NULL,
        user TEXT NOT NULL,
        user_ip TEXT NOT NULL,
        model TEXT NOT NULL,
        previous_data TEXT,
        current_data TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_logs_model
      ON logs(model, seq)
    `,
  },
];

export class SQLiteSchemaManager {
  constructor(private readonly migrations: readonly SchemaMigration[] = MIGRATIONS) {}

  /**
   * Bring the schema up to the latest migration
   */
  applyMigrations(db: Database.Database): SchemaInitResult {
    try {
      db.exec(`
        CREATE TABLE IF NOT EXISTS schema_version (
          version INTEGER PRIMARY KEY,
          applied_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
          description TEXT
        );
      `);

      let currentVersion = this.getCurrentVersion(db);
      const pending = this.migrations.filter((m) => m.version > currentVersion);

      const apply = db.transaction((migration: SchemaMigration) => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO schema_version (version, description) VALUES (?, ?)')
          .run(migration.version, migration.description);
      });

      for (const migration of pending) {
        apply(migration);
        currentVersion = migration.version;
        logger.info('Applied database migration %d: %s', migration.version, migration.description);
      }

      return { currentVersion, appliedMigrations: pending.length };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      logger.error('Failed to apply database migrations: %s', errorMessage);

      throw new StorageInitializationError(
        `Failed to apply database migrations: ${errorMessage}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  getCurrentVersion(db: Database.Database): number {
    const result = db.prepare('SELECT MAX(version) as version FROM schema_version').get() as
      | { version: number | null }
      | undefined;
    return result?.version ?? 0;
  }
}
