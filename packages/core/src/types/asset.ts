/**
 * Asset & Library Types
 * 
 * Uniform records returned by the repositories whatever engine backs them.
 */

/**
 * Canonical locator of an upstream asset; the deduplication key
 */
export type SourceIdentity = string;

export interface Asset {
  id: number;
  /** null for assets that were registered without an upstream source */
  sourceIdentity: SourceIdentity | null;
  title: string | null;
  /** File name in the blob store, unique */
  storageKey: string;
  byteSize: number | null;
  createdAt: Date;
}

export interface RegisterAssetInput {
  storageKey: string;
  sourceIdentity?: SourceIdentity | null;
  title?: string | null;
  byteSize?: number | null;
}

/**
 * Tenant-supplied metadata kept per library entry. `title` and `url` are always
 * present; anything else the client stores is carried through untouched.
 */
export interface LibraryMetadata {
  title: string;
  url: string | null;
  [key: string]: unknown;
}

export interface LibraryEntry {
  id: number;
  tenantId: string;
  assetId: number;
  metadata: LibraryMetadata;
}

/**
 * A library entry joined with the asset it points at
 */
export interface LibraryItem {
  entry: LibraryEntry;
  asset: Asset;
}
