/**
 * Profile operations against the identity directory
 */

import type { BlobStore } from '../blob/BlobStore';
import type { IdentityDirectory, UserProfile } from '../identity/IdentityDirectory';
import type { StorageAdapter } from '../storage/interfaces';
import { WriteBatch } from '../storage/WriteBatch';
import { notFoundError, validationError } from '../types/errors';
import type { ImageAttachment, RequestIdentity } from '../types/models';
import { logger } from '../utils/logger';
import { AuditLogService, AuditModel } from './AuditLogService';

export interface UserServiceOptions {
  storage: StorageAdapter;
  blobStore: BlobStore;
  directory: IdentityDirectory;
  audit?: AuditLogService;
  clock?: () => Date;
}

export class UserService {
  private readonly storage: StorageAdapter;
  private readonly blobStore: BlobStore;
  private readonly directory: IdentityDirectory;
  private readonly audit: AuditLogService;
  private readonly clock: () => Date;

  constructor(options: UserServiceOptions) {
    this.storage = options.storage;
    this.blobStore = options.blobStore;
    this.directory = options.directory;
    this.audit = options.audit ?? new AuditLogService();
    this.clock = options.clock ?? ((): Date => new Date());
  }

  async getProfile(identity: RequestIdentity): Promise<UserProfile> {
    const profile = await this.directory.getUser(identity.subject);
    if (!profile) {
      throw notFoundError('User');
    }
    return profile;
  }

  /**
   * Upload a new profile picture and point the directory at it
   */
  async setPicture(identity: RequestIdentity, attachment: ImageAttachment | undefined): Promise<{ picture: string }> {
    if (!attachment || attachment.data.length === 0) {
      throw validationError({ picture: ['A non-empty image file is required.'] });
    }

    const profile = await this.getProfile(identity);
    const stored = await this.blobStore.upload(attachment.data, attachment.contentType);

    try {
      await this.directory.setUserPicture(identity.subject, stored.url);
    } catch (error) {
      logger.error('Orphaned blob %s: profile picture update failed', stored.key);
      throw error;
    }

    const batch = new WriteBatch({ clock: this.clock });
    this.audit.recordUpdate(
      batch,
      identity,
      AuditModel.USER_PICTURE,
      { picture: profile.picture },
      { picture: stored.url },
    );
    await this.storage.commit(batch);

    logger.info('Updated profile picture for %s', identity.subject);
    return { picture: stored.url };
  }
}
