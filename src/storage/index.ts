/**
 * Storage module exports
 */

export type {
  LogFilter,
  StorageAdapter,
  StorageConfig,
  StorageHealth,
  StorageStats,
} from './interfaces';
export {
  StorageAdapterError,
  StorageConnectionError,
  StorageDataError,
  StorageInitializationError,
} from './interfaces';
export { WriteBatch } from './WriteBatch';
export type { WriteBatchOptions, WriteOperation } from './WriteBatch';
export { InMemoryStorageAdapter } from './adapters/InMemoryStorageAdapter';
export { SQLiteStorageAdapter } from './adapters/SQLiteStorageAdapter';
export { DefaultStorageAdapterFactory, storageAdapterFactory } from './adapters/factory';
export type { CreateAdapterOptions } from './adapters/factory';
export { HealthMonitor } from './services/HealthMonitor';
export type { HealthStatus } from './services/HealthMonitor';
