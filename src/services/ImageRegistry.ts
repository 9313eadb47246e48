/**
 * Image registry: content-addressed images shared across tasks
 *
 * Attachments are fingerprinted, matched against existing registry records
 * by hash, and only unseen content is uploaded. Registry writes and their
 * audit entries are queued on the caller's WriteBatch; blob deletions wait
 * until that batch has committed.
 */

import type { BlobStore, StoredBlob } from '../blob/BlobStore';
import { imageSnapshot } from '../types/models';
import type { Image, ImageAttachment, RequestIdentity } from '../types/models';
import type { StorageAdapter } from '../storage/interfaces';
import type { WriteBatch } from '../storage/WriteBatch';
import { fingerprint } from '../utils/hash';
import { logger } from '../utils/logger';
import type { AuditLogService } from './AuditLogService';
import { AuditModel } from './AuditLogService';

export interface PreparedImage extends ImageAttachment {
  hash: string;
}

export interface ResolvedImages {
  /** One record per prepared image, in the same order */
  images: Image[];
  /** Records created by this call; their blobs exist even if the batch never commits */
  uploaded: Image[];
}

/**
 * Drop empty attachments, fingerprint the rest and keep the first of each hash
 */
export function prepareAttachments(attachments: readonly ImageAttachment[]): PreparedImage[] {
  const seen = new Set<string>();
  const prepared: PreparedImage[] = [];

  for (const attachment of attachments) {
    if (attachment.data.length === 0) {
      continue;
    }
    const hash = fingerprint(attachment.data);
    if (seen.has(hash)) {
      continue;
    }
    seen.add(hash);
    prepared.push({ ...attachment, hash });
  }

  return prepared;
}

export class ImageRegistry {
  constructor(
    private readonly storage: StorageAdapter,
    private readonly blobStore: BlobStore,
    private readonly audit: AuditLogService,
  ) {}

  /**
   * Map prepared images to registry records, uploading content not seen before
   * @throws the blob store's error on the first failed upload
   */
  async resolve(
    prepared: readonly PreparedImage[],
    batch: WriteBatch,
    identity: RequestIdentity,
  ): Promise<ResolvedImages> {
    if (prepared.length === 0) {
      return { images: [], uploaded: [] };
    }

    const existing = await this.storage.findImagesByHashes(prepared.map((item) => item.hash));
    const byHash = new Map(existing.map((image) => [image.hash, image]));
    const images: Image[] = [];
    const uploaded: Image[] = [];

    for (const item of prepared) {
      const match = byHash.get(item.hash);
      if (match) {
        logger.debug('Reusing image %s for hash %s', match.id, item.hash);
        images.push(match);
        continue;
      }

      let stored: StoredBlob;
      try {
        stored = await this.blobStore.upload(item.data, item.contentType);
      } catch (error) {
        this.reportOrphans(uploaded, 'a later upload failed');
        throw error;
      }

      const image = batch.insertImage({ hash: item.hash, key: stored.key, url: stored.url });
      this.audit.recordInsert(batch, identity, AuditModel.IMAGE, imageSnapshot(image));
      byHash.set(item.hash, image);
      images.push(image);
      uploaded.push(image);
    }

    return { images, uploaded };
  }

  /**
   * Queue registry deletions (with audit entries) for images leaving a task
   */
  release(images: readonly Image[], batch: WriteBatch, identity: RequestIdentity): void {
    for (const image of images) {
      batch.deleteImage(image);
      this.audit.recordDelete(batch, identity, AuditModel.IMAGE, imageSnapshot(image));
    }
  }

  /**
   * Delete the blobs of released images once their registry rows are gone.
   * Failures leave orphaned blobs and are logged, not thrown: the request's
   * writes are already committed.
   */
  async purgeBlobs(images: readonly Image[]): Promise<void> {
    const results = await Promise.allSettled(images.map((image) => this.blobStore.delete(image.key)));

    results.forEach((result, index) => {
      const image = images[index];
      if (result.status === 'rejected' && image) {
        const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
        logger.error('Orphaned blob %s after registry delete of image %s: %s', image.key, image.id, reason);
      }
    });
  }

  /**
   * Log blobs uploaded for a request whose writes will not be committed
   */
  reportOrphans(uploaded: readonly Image[], reason: string): void {
    if (uploaded.length === 0) {
      return;
    }
    logger.error(
      'Orphaned %d uploaded blob(s) because %s: %s',
      uploaded.length,
      reason,
      uploaded.map((image) => image.key).join(', '),
    );
  }
}
