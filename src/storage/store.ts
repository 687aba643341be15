/**
 * Storage layer interfaces.
 *
 * Two independent systems back the registry: a content-addressed blob store
 * for artifact bytes and a relational catalog for authoritative metadata.
 * Nothing spans both in one transaction; the upload coordinator stitches
 * them together with a pending/commit protocol.
 */

import { Readable } from 'stream';
import {
  BlobRecord,
  CatalogEntry,
  DownloadRecord,
  PackageDetail,
  PackageSummary,
} from '../domain/artifact';
import { notFoundError } from '../domain/errors';
import { classifyVersionSpec, maxSatisfying, parseRange } from '../domain/version';

/** Anything that yields bytes: a Node stream, a request, an async generator. */
export type ByteSource = AsyncIterable<Uint8Array>;

export interface StageOptions {
  /** Aborting discards the staged bytes. */
  signal?: AbortSignal;
  /** Staging fails with an IntegrityError once more bytes than this arrive. */
  maxBytes?: number;
}

/** Bytes written to a private staging location, not yet visible to readers. */
export interface StagedBlob {
  readonly contentHash: string;
  readonly sizeBytes: number;
  /** Atomically move the bytes to their content-addressed location (no-op if present). */
  promote(): Promise<BlobRecord>;
  /** Remove the staged bytes. Safe to call more than once. */
  discard(): Promise<void>;
}

/** A blob as seen by the collector. */
export interface StoredBlob {
  contentHash: string;
  sizeBytes: number;
  modifiedAt: Date;
}

/** A staging file left behind by an interrupted write. */
export interface StagedFile {
  name: string;
  modifiedAt: Date;
}

export interface BlobReadHandle {
  stream: Readable;
  sizeBytes: number;
}

/** Content-addressed, deduplicated artifact bytes. */
export interface BlobStore {
  stage(source: ByteSource, options?: StageOptions): Promise<StagedBlob>;
  /** stage + promote. */
  put(source: ByteSource, options?: StageOptions): Promise<BlobRecord>;
  get(contentHash: string): Promise<BlobReadHandle>;
  stat(contentHash: string): Promise<StoredBlob | null>;
  has(contentHash: string): Promise<boolean>;
  /** Re-hash the bytes on disk. */
  verify(contentHash: string): Promise<{ contentHash: string; sizeBytes: number }>;
  /** Idempotent; resolves false when the blob was already absent. */
  delete(contentHash: string): Promise<boolean>;
  list(): AsyncIterable<StoredBlob>;
  listStaged(): Promise<StagedFile[]>;
  removeStaged(name: string): Promise<boolean>;
}

export interface BeginPublishInput {
  name: string;
  version: string;
  contentHash: string;
  sizeBytes: number;
  uploadedBy?: string;
  now: Date;
}

export interface BeginPublishResult {
  entry: CatalogEntry;
  /** False when an entry with the same content already held the slot. */
  created: boolean;
}

export interface SoftDeleteOptions {
  reason?: string;
  now: Date;
}

/** Relational catalog of (name, version) → blob reference. */
export interface CatalogStore {
  beginPublish(input: BeginPublishInput): Promise<BeginPublishResult>;
  commitPublish(entryId: string, now: Date): Promise<CatalogEntry>;
  abortPublish(entryId: string): Promise<CatalogEntry>;
  /** Exact version or range; only published entries are visible. */
  resolve(name: string, versionOrRange: string): Promise<CatalogEntry>;
  getPublished(name: string, version: string): Promise<CatalogEntry | null>;
  softDelete(name: string, version: string, options: SoftDeleteOptions): Promise<CatalogEntry>;
  /** Hashes referenced by any row still present, whatever its state. */
  listReferencedHashes(): Promise<Set<string>>;
  isReferenced(contentHash: string): Promise<boolean>;
  /** Published versions, highest first. */
  listVersions(name: string): Promise<string[]>;
  listPending(createdBefore: Date): Promise<CatalogEntry[]>;
  /** Remove deleted rows whose deletion is older than the cutoff. */
  purgeDeleted(deletedBefore: Date): Promise<CatalogEntry[]>;
  getEntry(entryId: string): Promise<CatalogEntry | null>;
  getPackage(name: string): Promise<PackageDetail | null>;
  listPackages(): Promise<PackageSummary[]>;
  recordDownload(record: DownloadRecord): Promise<void>;
  close(): Promise<void>;
}

/**
 * Resolve a version-or-range spec against published entries. Exact specs
 * are looked up directly; ranges select the highest satisfying version.
 */
export async function resolveVersionSpec(
  catalog: Pick<CatalogStore, 'getPublished' | 'listVersions'>,
  name: string,
  spec: string,
): Promise<CatalogEntry> {
  const kind = classifyVersionSpec(spec);
  if (kind !== 'range') {
    const exact = await catalog.getPublished(name, spec);
    if (exact) return exact;
    if (kind === 'exact') throw notFoundError('Version', `${name}@${spec}`);
  }

  const range = parseRange(spec);
  const best = maxSatisfying(await catalog.listVersions(name), range);
  if (!best) throw notFoundError('Version', `${name}@${spec}`);

  const entry = await catalog.getPublished(name, best);
  if (!entry) throw notFoundError('Version', `${name}@${best}`);
  return entry;
}
