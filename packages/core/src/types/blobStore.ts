/**
 * Blob Store Contract
 * 
 * Where finished artifacts live. Implementations: local filesystem,
 * S3-compatible object storage, and a router that combines both.
 */

export interface BlobStore {
  /** Human readable target name for logs */
  readonly name: string;

  put(storageKey: string, localPath: string): Promise<void>;

  /** Removes the object; removing a missing object is not an error */
  delete(storageKey: string): Promise<void>;

  exists(storageKey: string): Promise<boolean>;

  size(storageKey: string): Promise<number | null>;

  /** Time-limited URL clients can stream from, or null when only local serving is possible */
  urlFor(storageKey: string, ttlSeconds: number): Promise<string | null>;

  /** Absolute path of a local copy, or null when the bytes are only remote */
  localPath(storageKey: string): Promise<string | null>;
}
