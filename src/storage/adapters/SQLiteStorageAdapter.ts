/**
 * SQLite storage adapter
 *
 * Persists tasks, the image registry and the audit log with better-sqlite3.
 * Work is split across focused components:
 * - SQLiteConnectionManager opens the database and runs health checks
 * - SQLiteSchemaManager applies migrations
 * - SQLiteDataMapper converts rows to documents
 *
 * A WriteBatch is applied inside a single SQLite transaction.
 */

import type Database from 'better-sqlite3';
import { logger } from '../../utils/logger';
import type { Image, Log, Task } from '../../types/models';
import type { LogFilter, StorageAdapter, StorageHealth, StorageStats } from '../interfaces';
import { StorageConnectionError, StorageDataError, StorageInitializationError } from '../interfaces';
import type { WriteBatch, WriteOperation } from '../WriteBatch';
import { SQLiteConnectionManager } from './components/SQLiteConnectionManager';
import type { SQLiteStorageConfig } from './components/SQLiteConnectionManager';
import { SQLiteSchemaManager } from './components/SQLiteSchemaManager';
import { SQLiteDataMapper } from './components/SQLiteDataMapper';
import type { ImageRow, LogRow, TaskRow } from './components/SQLiteDataMapper';

export type { SQLiteStorageConfig } from './components/SQLiteConnectionManager';

interface CountRow {
  count: number;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && error.message.includes('UNIQUE constraint failed');
}

export class SQLiteStorageAdapter implements StorageAdapter {
  private db: Database.Database | null = null;
  private readonly connectionManager: SQLiteConnectionManager;
  private readonly schemaManager: SQLiteSchemaManager;

  constructor(
    private readonly config: SQLiteStorageConfig,
    components?: {
      connectionManager?: SQLiteConnectionManager;
      schemaManager?: SQLiteSchemaManager;
    },
  ) {
    this.connectionManager = components?.connectionManager ?? new SQLiteConnectionManager(config);
    this.schemaManager = components?.schemaManager ?? new SQLiteSchemaManager();
  }

  async initialize(): Promise<void> {
    try {
      const db = await this.connectionManager.initialize();
      const result = this.schemaManager.applyMigrations(db);
      this.db = db;

      logger.debug(
        'SQLite storage adapter initialized at %s (schema v%d)',
        this.config.databasePath,
        result.currentVersion,
      );
    } catch (error) {
      if (error instanceof StorageInitializationError) {
        throw error;
      }
      throw new StorageInitializationError(
        `Failed to initialize SQLite storage: ${describeError(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  findTask(owner: string, id: string): Promise<Task | null> {
    return this.read(`get task ${id}`, (db) => {
      const row = db
        .prepare<[string, string], TaskRow>('SELECT * FROM tasks WHERE owner = ? AND id = ?')
        .get(owner, id);
      return row ? SQLiteDataMapper.rowToTask(row) : null;
    });
  }

  listTasks(owner: string): Promise<Task[]> {
    return this.read('list tasks', (db) =>
      db
        .prepare<[string], TaskRow>('SELECT * FROM tasks WHERE owner = ? ORDER BY updated_at DESC, id ASC')
        .all(owner)
        .map((row) => SQLiteDataMapper.rowToTask(row)));
  }

  findImagesByHashes(hashes: readonly string[]): Promise<Image[]> {
    return this.selectImagesWhereIn('hash', hashes);
  }

  findImagesByIds(ids: readonly string[]): Promise<Image[]> {
    return this.selectImagesWhereIn('id', ids);
  }

  listLogs(filter: LogFilter = {}): Promise<Log[]> {
    return this.read('list logs', (db) => {
      const clauses: string[] = [];
      const params: string[] = [];
      if (filter.model !== undefined) {
        clauses.push('model = ?');
        params.push(filter.model);
      }
      if (filter.user !== undefined) {
        clauses.push('user = ?');
        params.push(filter.user);
      }
      if (filter.type !== undefined) {
        clauses.push('type = ?');
        params.push(filter.type);
      }

      const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
      return db
        .prepare<string[], LogRow>(`SELECT * FROM logs ${where} ORDER BY seq ASC`)
        .all(...params)
        .map((row) => SQLiteDataMapper.rowToLog(row));
    });
  }

  commit(batch: WriteBatch): Promise<void> {
    let db: Database.Database;
    try {
      db = this.getDatabase();
    } catch (error) {
      return Promise.reject(error);
    }

    const applyAll = db.transaction((operations: readonly WriteOperation[]) => {
      for (const operation of operations) {
        this.apply(db, operation);
      }
    });

    try {
      applyAll(batch.operations);
      return Promise.resolve();
    } catch (error) {
      if (error instanceof StorageDataError) {
        return Promise.reject(error);
      }
      if (isUniqueViolation(error)) {
        return Promise.reject(new StorageDataError(
          `Write rejected by a uniqueness constraint: ${describeError(error)}`,
          error instanceof Error ? error : undefined,
        ));
      }
      return Promise.reject(new StorageDataError(
        `Failed to commit ${batch.size} writes: ${describeError(error)}`,
        error instanceof Error ? error : undefined,
      ));
    }
  }

  getStats(): Promise<StorageStats> {
    return this.read('get storage stats', (db) => {
      const count = (table: 'tasks' | 'images' | 'logs'): number =>
        db.prepare<[], CountRow>(`SELECT COUNT(*) as count FROM ${table}`).get()?.count ?? 0;

      return {
        taskCount: count('tasks'),
        imageCount: count('images'),
        logCount: count('logs'),
        storageType: 'sqlite',
      };
    });
  }

  healthCheck(): Promise<StorageHealth> {
    const health = this.connectionManager.healthCheck();
    return Promise.resolve({
      ...health,
      details: {
        ...health.details,
        storageType: 'sqlite',
        initialized: this.db !== null,
      },
    });
  }

  close(): Promise<void> {
    this.connectionManager.close();
    this.db = null;
    logger.debug('SQLite storage adapter closed');
    return Promise.resolve();
  }

  private getDatabase(): Database.Database {
    if (!this.db) {
      throw new StorageConnectionError('Storage adapter not initialized');
    }
    return this.db;
  }

  private read<T>(operation: string, query: (db: Database.Database) => T): Promise<T> {
    try {
      return Promise.resolve(query(this.getDatabase()));
    } catch (error) {
      if (error instanceof StorageConnectionError || error instanceof StorageDataError) {
        return Promise.reject(error);
      }
      return Promise.reject(new StorageDataError(
        `Failed to ${operation}: ${describeError(error)}`,
        error instanceof Error ? error : undefined,
      ));
    }
  }

  private selectImagesWhereIn(column: 'id' | 'hash', values: readonly string[]): Promise<Image[]> {
    const unique = Array.from(new Set(values));
    if (unique.length === 0) {
      return Promise.resolve([]);
    }

    return this.read(`find images by ${column}`, (db) => {
      const placeholders = unique.map(() => '?').join(', ');
      return db
        .prepare<string[], ImageRow>(`SELECT * FROM images WHERE ${column} IN (${placeholders})`)
        .all(...unique)
        .map((row) => SQLiteDataMapper.rowToImage(row));
    });
  }

  private apply(db: Database.Database, operation: WriteOperation): void {
    switch (operation.kind) {
      case 'insertTask': {
        const row = SQLiteDataMapper.taskToRow(operation.task);
        db.prepare(`
          INSERT INTO tasks (
            id, owner, name, description, start_date, end_date,
            priority, completed, images, created_at, updated_at
          ) VALUES (
            @id, @owner, @name, @description, @start_date, @end_date,
            @priority, @completed, @images, @created_at, @updated_at
          )
        `).run(row);
        break;
      }

      case 'updateTask': {
        const row = SQLiteDataMapper.taskToRow(operation.task);
        const result = db.prepare(`
          UPDATE tasks
          SET name = @name, description = @description, start_date = @start_date,
              end_date = @end_date, priority = @priority, completed = @completed,
              images = @images, updated_at = @updated_at
          WHERE id = @id AND owner = @owner
        `).run(row);
        if (result.changes === 0) {
          throw new StorageDataError(`Task with id ${operation.task.id} not found`);
        }
        break;
      }

      case 'deleteTask': {
        const result = db
          .prepare('DELETE FROM tasks WHERE id = ? AND owner = ?')
          .run(operation.id, operation.owner);
        if (result.changes === 0) {
          throw new StorageDataError(`Task with id ${operation.id} not found`);
        }
        break;
      }

      case 'insertImage':
        db.prepare(`
          INSERT INTO images (id, hash, key, url, created_at, updated_at)
          VALUES (@id, @hash, @key, @url, @created_at, @updated_at)
        `).run(SQLiteDataMapper.imageToRow(operation.image));
        break;

      case 'deleteImage': {
        const result = db.prepare('DELETE FROM images WHERE id = ?').run(operation.id);
        if (result.changes === 0) {
          throw new StorageDataError(`Image with id ${operation.id} not found`);
        }
        break;
      }

      case 'insertLog':
        db.prepare(`
          INSERT INTO logs (
            id, type, user, user_ip, model, previous_data, current_data, created_at, updated_at
          ) VALUES (
            @id, @type, @user, @user_ip, @model, @previous_data, @current_data, @created_at, @updated_at
          )
        `).run(SQLiteDataMapper.logToRow(operation.log));
        break;
    }
  }
}
