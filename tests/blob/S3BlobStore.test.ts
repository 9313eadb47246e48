/**
 * S3BlobStore tests against a recording command sender
 */

import { DeleteObjectCommand, PutObjectCommand } from '@aws-sdk/client-s3';
import type { DeleteObjectCommandOutput, PutObjectCommandOutput } from '@aws-sdk/client-s3';
import { S3BlobStore } from '../../src/blob/S3BlobStore';
import type { S3CommandSender } from '../../src/blob/S3BlobStore';
import { AppError, ErrorCode } from '../../src/types/errors';
import { logger } from '../../src/utils/logger';

jest.mock('../../src/utils/logger');

class RecordingSender implements S3CommandSender {
  readonly commands: Array<PutObjectCommand | DeleteObjectCommand> = [];
  failure: Error | null = null;

  send(command: PutObjectCommand): Promise<PutObjectCommandOutput>;
  send(command: DeleteObjectCommand): Promise<DeleteObjectCommandOutput>;
  send(command: PutObjectCommand | DeleteObjectCommand): Promise<PutObjectCommandOutput | DeleteObjectCommandOutput> {
    this.commands.push(command);
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return Promise.resolve({ $metadata: {} });
  }
}

describe('S3BlobStore', () => {
  let sender: RecordingSender;

  beforeEach(() => {
    sender = new RecordingSender();
  });

  it('should put a public object under a generated key', async () => {
    const store = new S3BlobStore(
      { bucket: 'task-images', region: 'us-east-1', generateKey: () => 'key-1' },
      sender,
    );

    const stored = await store.upload(Buffer.from('imgA'), 'image/png');

    expect(stored).toEqual({ key: 'key-1', url: 'https://task-images.s3.amazonaws.com/key-1' });
    const command = sender.commands[0];
    expect(command).toBeInstanceOf(PutObjectCommand);
    expect(command?.input).toEqual({
      Bucket: 'task-images',
      Key: 'key-1',
      Body: Buffer.from('imgA'),
      ContentType: 'image/png',
      ACL: 'public-read',
    });
  });

  it('should build URLs from a configured public base', async () => {
    const store = new S3BlobStore(
      {
        bucket: 'task-images',
        region: 'us-east-1',
        publicUrlBase: 'https://cdn.example.test/images/',
        generateKey: () => 'key-2',
      },
      sender,
    );

    await expect(store.upload(Buffer.from('x'), 'image/jpeg')).resolves.toEqual({
      key: 'key-2',
      url: 'https://cdn.example.test/images/key-2',
    });
  });

  it('should delete by key', async () => {
    const store = new S3BlobStore({ bucket: 'task-images', region: 'us-east-1' }, sender);

    await store.delete('key-1');

    const command = sender.commands[0];
    expect(command).toBeInstanceOf(DeleteObjectCommand);
    expect(command?.input).toEqual({ Bucket: 'task-images', Key: 'key-1' });
  });

  it('should report failures as dependency errors', async () => {
    const store = new S3BlobStore({ bucket: 'task-images', region: 'us-east-1', generateKey: () => 'key-1' }, sender);
    sender.failure = new Error('AccessDenied');

    const upload = await store.upload(Buffer.from('x'), 'image/png').catch((error: unknown) => error);
    expect(upload).toBeInstanceOf(AppError);
    expect(upload).toMatchObject({
      code: ErrorCode.DEPENDENCY_ERROR,
      message: 'blob-store failed during upload: AccessDenied',
    });
    expect(logger.error).toHaveBeenCalledWith('Blob upload to %s failed: %s', 'task-images', 'AccessDenied');

    await expect(store.delete('key-1')).rejects.toMatchObject({
      message: 'blob-store failed during delete: AccessDenied',
    });
  });
});
