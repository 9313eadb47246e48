import { createHash } from 'crypto';

/**
 * Base64 MD5 of the bytes, used as the image dedup key. Not a security
 * boundary: collisions are accepted.
 */
export function fingerprint(data: Buffer): string {
  return createHash('md5').update(data).digest('base64');
}
