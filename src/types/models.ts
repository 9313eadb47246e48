/**
 * Persisted document shapes for tasks, images and audit log entries
 */

export enum Priority {
  LOW = 'Low',
  MEDIUM = 'Medium',
  HIGH = 'High',
}

export enum LogType {
  INSERT = 'Insert',
  UPDATE = 'Update',
  DELETE = 'Delete',
}

/**
 * Opaque before/after state captured by the audit log
 */
export type Snapshot = Record<string, unknown>;

export interface Task {
  id: string;
  /** Identity subject of the creating user */
  owner: string;
  name: string;
  description: string;
  startDate: Date | null;
  endDate: Date;
  priority: Priority;
  completed: boolean;
  /** Ordered references into the image registry; images are shared, not owned */
  images: string[];
  createdAt: Date;
  updatedAt: Date;
}

export interface Image {
  id: string;
  /** Base64 MD5 of the image bytes, unique across the registry */
  hash: string;
  /** Blob store key */
  key: string;
  url: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface Log {
  id: string;
  type: LogType;
  user: string;
  userIp: string;
  model: string;
  previousData: Snapshot | null;
  currentData: Snapshot | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewTask = Omit<Task, 'id' | 'createdAt' | 'updatedAt'>;
export type NewImage = Omit<Image, 'id' | 'createdAt' | 'updatedAt'>;
export type NewLog = Omit<Log, 'id' | 'createdAt' | 'updatedAt'>;

/**
 * The authenticated caller of a request
 */
export interface RequestIdentity {
  subject: string;
  ip: string;
}

export function taskSnapshot(task: Task): Snapshot {
  return {
    id: task.id,
    owner: task.owner,
    name: task.name,
    description: task.description,
    startDate: task.startDate ? task.startDate.toISOString() : null,
    endDate: task.endDate.toISOString(),
    priority: task.priority,
    completed: task.completed,
    images: [...task.images],
    createdAt: task.createdAt.toISOString(),
    updatedAt: task.updatedAt.toISOString(),
  };
}

export function imageSnapshot(image: Image): Snapshot {
  return {
    id: image.id,
    hash: image.hash,
    key: image.key,
    url: image.url,
    createdAt: image.createdAt.toISOString(),
    updatedAt: image.updatedAt.toISOString(),
  };
}

/**
 * An uploaded file as received from a multipart form
 */
export interface ImageAttachment {
  filename: string;
  contentType: string;
  data: Buffer;
}
