/**
 * In-memory storage adapter
 *
 * Keeps the three collections in maps. Used by tests and when no database
 * path is configured. Documents are cloned on the way in and out so callers
 * never share references with the store.
 */

import type { Image, Log, Task } from '../../types/models';
import type { LogFilter, StorageAdapter, StorageHealth, StorageStats } from '../interfaces';
import { StorageDataError } from '../interfaces';
import type { WriteBatch, WriteOperation } from '../WriteBatch';

export class InMemoryStorageAdapter implements StorageAdapter {
  private tasks: Map<string, Task> = new Map();
  private images: Map<string, Image> = new Map();
  private logs: Log[] = [];
  private initialized = false;

  initialize(): Promise<void> {
    this.initialized = true;
    return Promise.resolve();
  }

  findTask(owner: string, id: string): Promise<Task | null> {
    const task = this.tasks.get(id);
    return Promise.resolve(task && task.owner === owner ? structuredClone(task) : null);
  }

  listTasks(owner: string): Promise<Task[]> {
    const tasks = Array.from(this.tasks.values())
      .filter((task) => task.owner === owner)
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime() || a.id.localeCompare(b.id))
      .map((task) => structuredClone(task));
    return Promise.resolve(tasks);
  }

  findImagesByHashes(hashes: readonly string[]): Promise<Image[]> {
    const wanted = new Set(hashes);
    const images = Array.from(this.images.values())
      .filter((image) => wanted.has(image.hash))
      .map((image) => structuredClone(image));
    return Promise.resolve(images);
  }

  findImagesByIds(ids: readonly string[]): Promise<Image[]> {
    const images: Image[] = [];
    for (const id of new Set(ids)) {
      const image = this.images.get(id);
      if (image) {
        images.push(structuredClone(image));
      }
    }
    return Promise.resolve(images);
  }

  listLogs(filter: LogFilter = {}): Promise<Log[]> {
    const logs = this.logs
      .filter((log) =>
        (filter.model === undefined || log.model === filter.model) &&
        (filter.user === undefined || log.user === filter.user) &&
        (filter.type === undefined || log.type === filter.type))
      .map((log) => structuredClone(log));
    return Promise.resolve(logs);
  }

  commit(batch: WriteBatch): Promise<void> {
    if (!this.initialized) {
      return Promise.reject(new StorageDataError('Storage adapter not initialized'));
    }

    // Apply to copies first so a rejected write leaves the store untouched
    const tasks = new Map(this.tasks);
    const images = new Map(this.images);
    const logs = [...this.logs];

    try {
      for (const operation of batch.operations) {
        this.apply(operation, tasks, images, logs);
      }
    } catch (error) {
      return Promise.reject(error);
    }

    this.tasks = tasks;
    this.images = images;
    this.logs = logs;
    return Promise.resolve();
  }

  getStats(): Promise<StorageStats> {
    return Promise.resolve({
      taskCount: this.tasks.size,
      imageCount: this.images.size,
      logCount: this.logs.length,
      storageType: 'memory',
    });
  }

  healthCheck(): Promise<StorageHealth> {
    if (!this.initialized) {
      return Promise.resolve({ healthy: false, error: 'Storage adapter not initialized' });
    }

    return Promise.resolve({
      healthy: true,
      details: {
        storageType: 'memory',
        taskCount: this.tasks.size,
        imageCount: this.images.size,
      },
    });
  }

  close(): Promise<void> {
    this.initialized = false;
    return Promise.resolve();
  }

  private apply(
    operation: WriteOperation,
    tasks: Map<string, Task>,
    images: Map<string, Image>,
    logs: Log[],
  ): void {
    switch (operation.kind) {
      case 'insertTask':
        if (tasks.has(operation.task.id)) {
          throw new StorageDataError(`Task with id ${operation.task.id} already exists`);
        }
        tasks.set(operation.task.id, structuredClone(operation.task));
        break;

      case 'updateTask': {
        const existing = tasks.get(operation.task.id);
        if (!existing || existing.owner !== operation.task.owner) {
          throw new StorageDataError(`Task with id ${operation.task.id} not found`);
        }
        tasks.set(operation.task.id, structuredClone(operation.task));
        break;
      }

      case 'deleteTask': {
        const existing = tasks.get(operation.id);
        if (!existing || existing.owner !== operation.owner) {
          throw new StorageDataError(`Task with id ${operation.id} not found`);
        }
        tasks.delete(operation.id);
        break;
      }

      case 'insertImage':
        for (const image of images.values()) {
          if (image.hash === operation.image.hash) {
            throw new StorageDataError(`Image with hash ${operation.image.hash} already exists`);
          }
        }
        images.set(operation.image.id, structuredClone(operation.image));
        break;

      case 'deleteImage':
        if (!images.delete(operation.id)) {
          throw new StorageDataError(`Image with id ${operation.id} not found`);
        }
        break;

      case 'insertLog':
        logs.push(structuredClone(operation.log));
        break;
    }
  }
}
