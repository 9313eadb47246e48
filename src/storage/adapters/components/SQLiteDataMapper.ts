/**
 * SQLite Data Mapper Component
 *
 * Pure transformations between database rows and documents.
 */

import { LogType, Priority } from '../../../types/models';
import type { Image, Log, Snapshot, Task } from '../../../types/models';
import { StorageDataError } from '../../interfaces';

export interface TaskRow {
  id: string;
  owner: string;
  name: string;
  description: string;
  start_date: string | null;
  end_date: string;
  priority: string;
  completed: number; // SQLite boolean as integer
  images: string; // JSON array of image ids
  created_at: string;
  updated_at: string;
}

export interface ImageRow {
  id: string;
  hash: string;
  key: string;
  url: string;
  created_at: string;
  updated_at: string;
}

export interface LogRow {
  id: string;
  type: string;
  user: string;
  user_ip: string;
  model: string;
  previous_data: string | null;
  current_data: string | null;
  created_at: string;
  updated_at: string;
}

const PRIORITIES = new Set<string>(Object.values(Priority));
const LOG_TYPES = new Set<string>(Object.values(LogType));

function isPriority(value: string): value is Priority {
  return PRIORITIES.has(value);
}

function isLogType(value: string): value is LogType {
  return LOG_TYPES.has(value);
}

function parseImageIds(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new StorageDataError('Task images column is not an array');
  }
  return parsed.filter((value): value is string => typeof value === 'string');
}

function parseSnapshot(raw: string | null): Snapshot | null {
  if (raw === null) {
    return null;
  }
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new StorageDataError('Log snapshot is not an object');
  }
  return { ...parsed };
}

export class SQLiteDataMapper {
  static rowToTask(row: TaskRow): Task {
    if (!isPriority(row.priority)) {
      throw new StorageDataError(`Unknown task priority ${row.priority}`);
    }

    return {
      id: row.id,
      owner: row.owner,
      name: row.name,
      description: row.description,
      startDate: row.start_date === null ? null : new Date(row.start_date),
      endDate: new Date(row.end_date),
      priority: row.priority,
      completed: Boolean(row.completed),
      images: parseImageIds(row.images),
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }

  static taskToRow(task: Task): TaskRow {
    return {
      id: task.id,
      owner: task.owner,
      name: task.name,
      description: task.description,
      start_date: task.startDate ? task.startDate.toISOString() : null,
      end_date: task.endDate.toISOString(),
      priority: task.priority,
      completed: task.completed ? 1 : 0,
      images: JSON.stringify(task.images),
      created_at: task.createdAt.toISOString(),
      updated_at: task.updatedAt.toISOString(),
    };
  }

  static rowToImage(row: ImageRow): Image {
    return {
      id: row.id,
      hash: row.hash,
      key: row.key,
      url: row.url,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }

  static imageToRow(image: Image): ImageRow {
    return {
      id: image.id,
      hash: image.hash,
      key: image.key,
      url: image.url,
      created_at: image.createdAt.toISOString(),
      updated_at: image.updatedAt.toISOString(),
    };
  }

  static rowToLog(row: LogRow): Log {
    if (!isLogType(row.type)) {
      throw new StorageDataError(`Unknown log type ${row.type}`);
    }

    return {
      id: row.id,
      type: row.type,
      user: row.user,
      userIp: row.user_ip,
      model: row.model,
      previousData: parseSnapshot(row.previous_data),
      currentData: parseSnapshot(row.current_data),
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }

  static logToRow(log: Log): LogRow {
    return {
      id: log.id,
      type: log.type,
      user: log.user,
      user_ip: log.userIp,
      model: log.model,
      previous_data: log.previousData === null ? null : JSON.stringify(log.previousData),
      current_data: log.currentData === null ? null : JSON.stringify(log.currentData),
      created_at: log.createdAt.toISOString(),
      updated_at: log.updatedAt.toISOString(),
    };
  }
}
