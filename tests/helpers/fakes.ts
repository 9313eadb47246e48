/**
 * In-process stand-ins for the external collaborators
 */

import type { TokenVerifier, VerifiedToken } from '../../src/auth/TokenVerifier';
import type { BlobStore, StoredBlob } from '../../src/blob/BlobStore';
import type { IdentityDirectory, UserProfile } from '../../src/identity/IdentityDirectory';
import { AppError, ErrorCode } from '../../src/types/errors';
import type { ImageAttachment, RequestIdentity } from '../../src/types/models';

export const NOW = new Date('2030-06-15T10:00:00.000Z');
export const TOMORROW = '2030-06-16';
export const YESTERDAY = '2030-06-14';

export const ALICE: RequestIdentity = { subject: 'auth0|alice', ip: '127.0.0.1' };
export const BOB: RequestIdentity = { subject: 'auth0|bob', ip: '127.0.0.2' };

export function fixedClock(date: Date = NOW): () => Date {
  return () => new Date(date.getTime());
}

/**
 * Deterministic ids: `${prefix}-1`, `${prefix}-2`, ...
 */
export function idSequence(prefix = 'id'): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}

export function attachment(content: string, filename = `${content}.jpg`, contentType = 'image/jpeg'): ImageAttachment {
  return { filename, contentType, data: Buffer.from(content) };
}

export class FakeBlobStore implements BlobStore {
  readonly objects = new Map<string, { body: Buffer; contentType: string }>();
  readonly uploads: string[] = [];
  readonly deletes: string[] = [];
  uploadError: Error | null = null;
  deleteError: Error | null = null;
  private counter = 0;

  upload(body: Buffer, contentType: string): Promise<StoredBlob> {
    if (this.uploadError) {
      return Promise.reject(this.uploadError);
    }
    this.counter += 1;
    const key = `blob-${this.counter}`;
    this.objects.set(key, { body, contentType });
    this.uploads.push(key);
    return Promise.resolve({ key, url: `https://blobs.test/${key}` });
  }

  delete(key: string): Promise<void> {
    if (this.deleteError) {
      return Promise.reject(this.deleteError);
    }
    this.objects.delete(key);
    this.deletes.push(key);
    return Promise.resolve();
  }
}

export class FakeIdentityDirectory implements IdentityDirectory {
  readonly users = new Map<string, UserProfile>();

  getUser(id: string): Promise<UserProfile | null> {
    const user = this.users.get(id);
    return Promise.resolve(user ? { ...user } : null);
  }

  setUserPicture(id: string, url: string): Promise<void> {
    const user = this.users.get(id);
    if (user) {
      this.users.set(id, { ...user, picture: url });
    }
    return Promise.resolve();
  }
}

/**
 * Accepts tokens of the form `token-for:<subject>`
 */
export class FakeTokenVerifier implements TokenVerifier {
  verify(token: string): Promise<VerifiedToken> {
    const prefix = 'token-for:';
    if (!token.startsWith(prefix)) {
      return Promise.reject(new AppError(ErrorCode.AUTH_FAILED, 'Invalid or expired token'));
    }
    const subject = token.slice(prefix.length);
    return Promise.resolve({ subject, claims: { sub: subject } });
  }
}

export function bearer(identity: RequestIdentity): string {
  return `Bearer token-for:${identity.subject}`;
}
