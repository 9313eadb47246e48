/**
 * Storage adapter factory tests
 */

import { DefaultStorageAdapterFactory } from '../../../src/storage/adapters/factory';
import { InMemoryStorageAdapter } from '../../../src/storage/adapters/InMemoryStorageAdapter';
import { SQLiteStorageAdapter } from '../../../src/storage/adapters/SQLiteStorageAdapter';
import { StorageInitializationError } from '../../../src/storage/interfaces';
import { logger } from '../../../src/utils/logger';

jest.mock('../../../src/utils/logger');

describe('DefaultStorageAdapterFactory', () => {
  const factory = new DefaultStorageAdapterFactory();

  it('should create a SQLite adapter for a sqlite configuration', () => {
    const adapter = factory.createAdapter({ type: 'sqlite', databasePath: ':memory:' });
    expect(adapter).toBeInstanceOf(SQLiteStorageAdapter);
  });

  it('should create a memory adapter for a memory configuration', () => {
    const adapter = factory.createAdapter({ type: 'memory' });
    expect(adapter).toBeInstanceOf(InMemoryStorageAdapter);
    expect(logger.info).toHaveBeenCalledWith('Using in-memory storage; data is lost on restart');
  });

  it('should require a database path for SQLite', () => {
    expect(factory.validateConfig({ type: 'sqlite' })).toEqual({
      valid: false,
      errors: ['Database path is required for SQLite storage'],
    });
    expect(() => factory.createAdapter({ type: 'sqlite' })).toThrow(StorageInitializationError);
  });

  it('should reject timeouts outside the allowed range', () => {
    const result = factory.validateConfig({ type: 'memory', timeout: 50 });
    expect(result.errors).toEqual(['Timeout must be between 100 and 60000 milliseconds']);
  });

  it('should fall back to memory for an invalid configuration when asked', () => {
    const adapter = factory.createAdapter({ type: 'sqlite' }, { fallbackToMemory: true });

    expect(adapter).toBeInstanceOf(InMemoryStorageAdapter);
    expect(logger.error).toHaveBeenCalledWith(
      'Invalid storage configuration, falling back to memory storage: %s',
      'Database path is required for SQLite storage',
    );
  });
});
