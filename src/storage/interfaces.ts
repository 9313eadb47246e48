/**
 * Storage adapter interfaces for the task, image and log collections
 *
 * Reads go straight to the adapter. Writes are queued on a WriteBatch by the
 * workflow and applied together by `commit`, so a request's entity writes and
 * their audit entries succeed or fail as one.
 */

import type { Image, Log, LogType, Task } from '../types/models';
import type { WriteBatch } from './WriteBatch';

export interface LogFilter {
  model?: string;
  user?: string;
  type?: LogType;
}

export interface StorageStats {
  taskCount: number;
  imageCount: number;
  logCount: number;
  storageType: string;
}

export interface StorageHealth {
  healthy: boolean;
  error?: string;
  details?: Record<string, unknown>;
}

/**
 * Storage adapter interface that all persistence backends must implement
 */
export interface StorageAdapter {
  /**
   * Open connections and apply the schema
   * @throws StorageInitializationError if initialization fails
   */
  initialize(): Promise<void>;

  /**
   * Get a task by owner and id; tasks of other owners are never returned
   */
  findTask(owner: string, id: string): Promise<Task | null>;

  /**
   * List an owner's tasks, most recently updated first
   */
  listTasks(owner: string): Promise<Task[]>;

  /**
   * Get the registry records whose hash is in `hashes`
   */
  findImagesByHashes(hashes: readonly string[]): Promise<Image[]>;

  /**
   * Get the registry records whose id is in `ids`, in no particular order
   */
  findImagesByIds(ids: readonly string[]): Promise<Image[]>;

  /**
   * List audit log entries in the order they were written
   */
  listLogs(filter?: LogFilter): Promise<Log[]>;

  /**
   * Apply every queued write of a batch atomically
   * @throws StorageDataError if any write is rejected; nothing is applied then
   */
  commit(batch: WriteBatch): Promise<void>;

  getStats(): Promise<StorageStats>;

  /**
   * Test if the storage adapter is healthy and operational
   */
  healthCheck(): Promise<StorageHealth>;

  /**
   * Close the storage adapter and clean up resources
   */
  close(): Promise<void>;
}

/**
 * Configuration options for storage adapters
 */
export interface StorageConfig {
  /** Storage type identifier */
  type: 'memory' | 'sqlite';
  /** Database file path for SQLite; `:memory:` keeps it in process */
  databasePath?: string;
  /** Connection timeout in milliseconds */
  timeout?: number;
  /** Enable debug logging */
  debug?: boolean;
}

/**
 * Storage adapter error types
 */
export class StorageAdapterError extends Error {
  public readonly code: string;

  constructor(
    message: string,
    code: string,
    public override readonly cause?: Error,
  ) {
    super(message);
    this.name = 'StorageAdapterError';
    this.code = code;
  }
}

export class StorageInitializationError extends StorageAdapterError {
  constructor(message: string, cause?: Error) {
    super(message, 'STORAGE_INIT_ERROR', cause);
    this.name = 'StorageInitializationError';
  }
}

export class StorageConnectionError extends StorageAdapterError {
  constructor(message: string, cause?: Error) {
    super(message, 'STORAGE_CONNECTION_ERROR', cause);
    this.name = 'StorageConnectionError';
  }
}

export class StorageDataError extends StorageAdapterError {
  constructor(message: string, cause?: Error) {
    super(message, 'STORAGE_DATA_ERROR', cause);
    this.name = 'StorageDataError';
  }
}
