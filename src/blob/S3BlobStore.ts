/**
 * BlobStore backed by S3 (or an S3-compatible service via `endpoint`)
 */

import { DeleteObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type {
  DeleteObjectCommandOutput,
  PutObjectCommandOutput,
  S3ClientConfig,
} from '@aws-sdk/client-s3';
import { v4 as uuidv4 } from 'uuid';
import { dependencyError } from '../types/errors';
import { logger } from '../utils/logger';
import type { BlobStore, StoredBlob } from './BlobStore';

export interface S3BlobStoreOptions {
  bucket: string;
  region: string;
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  /** Base of the public object URL; defaults to the bucket's virtual-hosted address */
  publicUrlBase?: string;
  generateKey?: () => string;
}

/**
 * Client surface used by the store; S3Client satisfies it
 */
export interface S3CommandSender {
  send(command: PutObjectCommand): Promise<PutObjectCommandOutput>;
  send(command: DeleteObjectCommand): Promise<DeleteObjectCommandOutput>;
}

export function createS3Client(options: S3BlobStoreOptions): S3Client {
  const config: S3ClientConfig = { region: options.region };
  if (options.endpoint) {
    config.endpoint = options.endpoint;
    config.forcePathStyle = true;
  }
  if (options.accessKeyId && options.secretAccessKey) {
    config.credentials = {
      accessKeyId: options.accessKeyId,
      secretAccessKey: options.secretAccessKey,
    };
  }
  return new S3Client(config);
}

export class S3BlobStore implements BlobStore {
  private readonly bucket: string;
  private readonly publicUrlBase: string;
  private readonly generateKey: () => string;

  constructor(
    options: S3BlobStoreOptions,
    private readonly client: S3CommandSender = createS3Client(options),
  ) {
    this.bucket = options.bucket;
    this.publicUrlBase = (options.publicUrlBase ?? `https://${options.bucket}.s3.amazonaws.com`).replace(/\/+$/, '');
    this.generateKey = options.generateKey ?? uuidv4;
  }

  async upload(body: Buffer, contentType: string): Promise<StoredBlob> {
    const key = this.generateKey();

    try {
      await this.client.send(new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
        ACL: 'public-read',
      }));
    } catch (error) {
      logger.error('Blob upload to %s failed: %s', this.bucket, error instanceof Error ? error.message : String(error));
      throw dependencyError('blob-store', 'upload', error);
    }

    logger.debug('Uploaded blob %s (%d bytes)', key, body.length);
    return { key, url: `${this.publicUrlBase}/${key}` };
  }

  async delete(key: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({
        Bucket: this.bucket,
        Key: key,
      }));
    } catch (error) {
      logger.error('Blob delete of %s failed: %s', key, error instanceof Error ? error.message : String(error));
      throw dependencyError('blob-store', 'delete', error);
    }

    logger.debug('Deleted blob %s', key);
  }
}
