/**
 * InMemoryStorageAdapter tests
 */

import { InMemoryStorageAdapter } from '../../../src/storage/adapters/InMemoryStorageAdapter';
import { StorageDataError } from '../../../src/storage/interfaces';
import { WriteBatch } from '../../../src/storage/WriteBatch';
import { describeStorageAdapterContract } from './storage-contract';

describeStorageAdapterContract('InMemoryStorageAdapter', () => new InMemoryStorageAdapter());

describe('InMemoryStorageAdapter', () => {
  it('should reject commits before initialization', async () => {
    const adapter = new InMemoryStorageAdapter();
    await expect(adapter.commit(new WriteBatch())).rejects.toBeInstanceOf(StorageDataError);
  });

  it('should report unhealthy once closed', async () => {
    const adapter = new InMemoryStorageAdapter();
    await adapter.initialize();
    await adapter.close();

    await expect(adapter.healthCheck()).resolves.toEqual({
      healthy: false,
      error: 'Storage adapter not initialized',
    });
  });
});
