/**
 * Task mutation workflow
 *
 * Every operation is scoped to the caller's identity. Mutations validate the
 * form before any side effect, resolve images through the registry, queue the
 * task write and its audit entries on one WriteBatch and commit it. Blobs of
 * released images are deleted only after the commit succeeds.
 */

import type { BlobStore } from '../blob/BlobStore';
import type { StorageAdapter } from '../storage/interfaces';
import { WriteBatch } from '../storage/WriteBatch';
import { notFoundError } from '../types/errors';
import { taskSnapshot } from '../types/models';
import type { Image, ImageAttachment, Priority, RequestIdentity, Task } from '../types/models';
import { CreateTaskSchema, UpdateTaskSchema, validateTaskForm } from '../types/schemas/tasks';
import { logger } from '../utils/logger';
import { AuditLogService, AuditModel } from './AuditLogService';
import { diffImageSets } from './image-diff';
import { ImageRegistry, prepareAttachments } from './ImageRegistry';

export interface TaskServiceOptions {
  storage: StorageAdapter;
  blobStore: BlobStore;
  audit?: AuditLogService;
  clock?: () => Date;
  generateId?: () => string;
}

export interface TaskSummary {
  id: string;
  createdAt: Date;
  updatedAt: Date;
  name: string;
  description: string;
  startDate: Date | null;
  endDate: Date;
  priority: Priority;
  completed: boolean;
}

export interface TaskDetail extends TaskSummary {
  /** Image URLs in task order */
  images: string[];
}

export interface CreatedTask {
  id: string;
  createdAt: Date;
  updatedAt: Date;
  images: string[];
}

export interface UpdatedTask {
  images: string[];
}

function toSummary(task: Task): TaskSummary {
  return {
    id: task.id,
    createdAt: task.createdAt,
    updatedAt: task.updatedAt,
    name: task.name,
    description: task.description,
    startDate: task.startDate,
    endDate: task.endDate,
    priority: task.priority,
    completed: task.completed,
  };
}

function isDefined<T>(value: T | undefined): value is T {
  return value !== undefined;
}

export class TaskService {
  private readonly storage: StorageAdapter;
  private readonly audit: AuditLogService;
  private readonly registry: ImageRegistry;
  private readonly clock: () => Date;
  private readonly generateId: (() => string) | undefined;

  constructor(options: TaskServiceOptions) {
    this.storage = options.storage;
    this.audit = options.audit ?? new AuditLogService();
    this.registry = new ImageRegistry(options.storage, options.blobStore, this.audit);
    this.clock = options.clock ?? ((): Date => new Date());
    this.generateId = options.generateId;
  }

  async get(identity: RequestIdentity, id: string): Promise<TaskDetail> {
    const task = await this.storage.findTask(identity.subject, id);
    if (!task) {
      throw notFoundError('Task');
    }

    const images = await this.loadImages(task.images);
    return { ...toSummary(task), images: images.map((image) => image.url) };
  }

  async list(identity: RequestIdentity): Promise<TaskSummary[]> {
    const tasks = await this.storage.listTasks(identity.subject);
    return tasks.map(toSummary);
  }

  async create(identity: RequestIdentity, raw: unknown, attachments: readonly ImageAttachment[]): Promise<CreatedTask> {
    const form = validateTaskForm(CreateTaskSchema, raw, this.clock());
    const prepared = prepareAttachments(attachments);
    const batch = this.newBatch();

    const { images, uploaded } = await this.registry.resolve(prepared, batch, identity);
    const task = batch.insertTask({
      owner: identity.subject,
      name: form.name,
      description: form.description,
      startDate: form.startDate ?? null,
      endDate: form.endDate,
      priority: form.priority,
      completed: false,
      images: images.map((image) => image.id),
    });
    this.audit.recordInsert(batch, identity, AuditModel.TASK, taskSnapshot(task));

    await this.commit(batch, uploaded);
    logger.info('Created task %s with %d image(s), %d uploaded', task.id, images.length, uploaded.length);

    return {
      id: task.id,
      createdAt: task.createdAt,
      updatedAt: task.updatedAt,
      images: images.map((image) => image.url),
    };
  }

  /**
   * Replace a task's fields and its complete image set
   */
  async update(identity: RequestIdentity, raw: unknown, attachments: readonly ImageAttachment[]): Promise<UpdatedTask> {
    const form = validateTaskForm(UpdateTaskSchema, raw, this.clock());

    const existing = await this.storage.findTask(identity.subject, form.id);
    if (!existing) {
      throw notFoundError('Task');
    }

    const previous = await this.loadImages(existing.images);
    const prepared = prepareAttachments(attachments);
    const diff = diffImageSets(previous.map((image) => image.hash), prepared.map((item) => item.hash));
    logger.debug(
      'Task %s image diff: %d retained, %d to add, %d to delete',
      existing.id,
      diff.retained.length,
      diff.toAdd.length,
      diff.toDelete.length,
    );

    const batch = this.newBatch();
    const toAdd = new Set(diff.toAdd);
    const { images: added, uploaded } = await this.registry.resolve(
      prepared.filter((item) => toAdd.has(item.hash)),
      batch,
      identity,
    );

    const byHash = new Map([...previous, ...added].map((image) => [image.hash, image]));
    const finalImages = diff.final.map((hash) => byHash.get(hash)).filter(isDefined);

    const toDelete = new Set(diff.toDelete);
    const removed = previous.filter((image) => toDelete.has(image.hash));
    this.registry.release(removed, batch, identity);

    const updated = batch.updateTask({
      ...existing,
      name: form.name,
      description: form.description,
      startDate: form.startDate ?? null,
      endDate: form.endDate,
      priority: form.priority,
      completed: form.completed ?? existing.completed,
      images: finalImages.map((image) => image.id),
    });
    this.audit.recordUpdate(batch, identity, AuditModel.TASK, taskSnapshot(existing), taskSnapshot(updated));

    await this.commit(batch, uploaded);
    await this.registry.purgeBlobs(removed);
    logger.info('Updated task %s', updated.id);

    return { images: finalImages.map((image) => image.url) };
  }

  /**
   * Delete a task together with every image it references
   */
  async delete(identity: RequestIdentity, id: string): Promise<void> {
    const existing = await this.storage.findTask(identity.subject, id);
    if (!existing) {
      throw notFoundError('Task');
    }

    const images = await this.loadImages(existing.images);
    const batch = this.newBatch();
    this.registry.release(images, batch, identity);
    batch.deleteTask(existing);
    this.audit.recordDelete(batch, identity, AuditModel.TASK, taskSnapshot(existing));

    await this.commit(batch, []);
    await this.registry.purgeBlobs(images);
    logger.info('Deleted task %s and %d image(s)', existing.id, images.length);
  }

  private newBatch(): WriteBatch {
    return new WriteBatch({ clock: this.clock, generateId: this.generateId });
  }

  /**
   * Registry records for `ids` in the given order; ids without a record are skipped
   */
  private async loadImages(ids: readonly string[]): Promise<Image[]> {
    if (ids.length === 0) {
      return [];
    }
    const records = await this.storage.findImagesByIds(ids);
    const byId = new Map(records.map((image) => [image.id, image]));
    return ids.map((id) => byId.get(id)).filter(isDefined);
  }

  /**
   * A concurrent request that registered the same new image first makes the
   * unique hash reject this commit; the request fails and its upload is orphaned.
   */
  private async commit(batch: WriteBatch, uploaded: readonly Image[]): Promise<void> {
    try {
      await this.storage.commit(batch);
    } catch (error) {
      this.registry.reportOrphans(uploaded, 'the batch commit failed');
      throw error;
    }
  }
}
