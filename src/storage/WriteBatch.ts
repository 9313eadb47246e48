/**
 * Unit of work for a single request
 *
 * Writes are recorded in order and applied by `StorageAdapter.commit`.
 * Identifiers and timestamps are assigned when a write is queued so later
 * steps (and audit snapshots) can reference a document before it exists.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Image, Log, NewImage, NewLog, NewTask, Task } from '../types/models';

export type WriteOperation =
  | { kind: 'insertTask'; task: Task }
  | { kind: 'updateTask'; task: Task }
  | { kind: 'deleteTask'; id: string; owner: string }
  | { kind: 'insertImage'; image: Image }
  | { kind: 'deleteImage'; id: string }
  | { kind: 'insertLog'; log: Log };

export interface WriteBatchOptions {
  clock?: () => Date;
  generateId?: () => string;
}

export class WriteBatch {
  private readonly pending: WriteOperation[] = [];
  private readonly clock: () => Date;
  private readonly generateId: () => string;

  constructor(options: WriteBatchOptions = {}) {
    this.clock = options.clock ?? ((): Date => new Date());
    this.generateId = options.generateId ?? uuidv4;
  }

  get operations(): readonly WriteOperation[] {
    return this.pending;
  }

  get size(): number {
    return this.pending.length;
  }

  isEmpty(): boolean {
    return this.pending.length === 0;
  }

  insertTask(data: NewTask): Task {
    const now = this.clock();
    const task: Task = { ...data, images: [...data.images], id: this.generateId(), createdAt: now, updatedAt: now };
    this.pending.push({ kind: 'insertTask', task });
    return task;
  }

  /**
   * Queue a full replacement of an existing task; `updatedAt` is refreshed
   */
  updateTask(task: Task): Task {
    const updated: Task = { ...task, images: [...task.images], updatedAt: this.clock() };
    this.pending.push({ kind: 'updateTask', task: updated });
    return updated;
  }

  deleteTask(task: Task): void {
    this.pending.push({ kind: 'deleteTask', id: task.id, owner: task.owner });
  }

  insertImage(data: NewImage): Image {
    const now = this.clock();
    const image: Image = { ...data, id: this.generateId(), createdAt: now, updatedAt: now };
    this.pending.push({ kind: 'insertImage', image });
    return image;
  }

  deleteImage(image: Image): void {
    this.pending.push({ kind: 'deleteImage', id: image.id });
  }

  insertLog(data: NewLog): Log {
    const now = this.clock();
    const log: Log = { ...data, id: this.generateId(), createdAt: now, updatedAt: now };
    this.pending.push({ kind: 'insertLog', log });
    return log;
  }
}
