/**
 * Object storage holding uploaded image bytes
 */

export interface StoredBlob {
  key: string;
  /** Publicly readable URL of the object */
  url: string;
}

export interface BlobStore {
  /**
   * Store bytes under a fresh unique key
   */
  upload(body: Buffer, contentType: string): Promise<StoredBlob>;

  /**
   * Remove the object stored under `key`
   */
  delete(key: string): Promise<void>;
}
