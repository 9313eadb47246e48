/**
 * Audit log writer
 *
 * Entries are queued on the request's WriteBatch so they commit (or fail)
 * together with the entity writes they describe.
 */

import { LogType } from '../types/models';
import type { Log, RequestIdentity, Snapshot } from '../types/models';
import type { WriteBatch } from '../storage/WriteBatch';

/**
 * Model names recorded in the `model` column
 */
export const AuditModel = {
  TASK: 'Task',
  IMAGE: 'Image',
  USER_PICTURE: 'UserPicture',
} as const;

export type AuditModelName = typeof AuditModel[keyof typeof AuditModel];

export class AuditLogService {
  recordInsert(batch: WriteBatch, identity: RequestIdentity, model: AuditModelName, current: Snapshot): Log {
    return this.record(batch, identity, LogType.INSERT, model, null, current);
  }

  recordUpdate(
    batch: WriteBatch,
    identity: RequestIdentity,
    model: AuditModelName,
    previous: Snapshot,
    current: Snapshot,
  ): Log {
    return this.record(batch, identity, LogType.UPDATE, model, previous, current);
  }

  recordDelete(batch: WriteBatch, identity: RequestIdentity, model: AuditModelName, previous: Snapshot): Log {
    return this.record(batch, identity, LogType.DELETE, model, previous, null);
  }

  private record(
    batch: WriteBatch,
    identity: RequestIdentity,
    type: LogType,
    model: AuditModelName,
    previousData: Snapshot | null,
    currentData: Snapshot | null,
  ): Log {
    return batch.insertLog({
      type,
      user: identity.subject,
      userIp: identity.ip,
      model,
      previousData,
      currentData,
    });
  }
}
