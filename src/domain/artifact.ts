/**
 * Artifact domain model.
 *
 * An artifact is a named, versioned unit of published content. Its bytes
 * live in the blob store under their SHA-256 digest; the catalog maps
 * (name, version) onto that digest.
 */

import { validationError } from './errors';

/** Catalog entry lifecycle states. */
export enum EntryState {
  Pending = 'pending',
  Published = 'published',
  Deleted = 'deleted',
}

/**
 * Valid state transitions. A pending row that is aborted and a deleted row
 * that is purged are removed rather than moved to another state.
 */
export const VALID_ENTRY_TRANSITIONS: Record<EntryState, EntryState[]> = {
  [EntryState.Pending]: [EntryState.Published],
  [EntryState.Published]: [EntryState.Deleted],
  [EntryState.Deleted]: [],
};

/** (name, version): unique together. */
export interface ArtifactIdentity {
  name: string;
  version: string;
}

/** A content-addressed blob. Immutable once promoted. */
export interface BlobRecord {
  contentHash: string;
  sizeBytes: number;
  storagePath: string;
}

/** Authoritative catalog row for one (name, version). */
export interface CatalogEntry extends ArtifactIdentity {
  id: string;
  contentHash: string;
  sizeBytes: number;
  state: EntryState;
  createdAt: string;
  publishedAt?: string;
  deletedAt?: string;
  deletedReason?: string;
  uploadedBy?: string;
}

/** One completed download, recorded for usage statistics. */
export interface DownloadRecord {
  entryId: string;
  downloadedAt: string;
  userAgent?: string;
  clientAddress?: string;
}

/** Per-version view of a package. */
export interface PackageVersionSummary {
  version: string;
  state: EntryState;
  contentHash: string;
  sizeBytes: number;
  createdAt: string;
  publishedAt?: string;
  deletedAt?: string;
  deletedReason?: string;
  uploadedBy?: string;
  downloadCount: number;
}

/** Package detail: every non-pending version, newest first. */
export interface PackageDetail {
  name: string;
  totalDownloads: number;
  versions: PackageVersionSummary[];
}

/** Row of the package listing. */
export interface PackageSummary {
  name: string;
  latestVersion: string;
  versionCount: number;
  totalDownloads: number;
}

export const HASH_ALGORITHM = 'sha256';

const HASH_PATTERN = /^[a-f0-9]{64}$/;
const NAME_PATTERN = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/;
const MAX_NAME_LENGTH = 214;

/** Lowercase and collapse runs of "_", "." and "-" into a single "-". */
export function normalizePackageName(raw: string): string {
  return raw.trim().toLowerCase().replace(/[-_.]+/g, '-');
}

/** Normalize and validate a package name. */
export function assertPackageName(raw: string): string {
  const name = normalizePackageName(raw);
  if (name.length === 0 || name.length > MAX_NAME_LENGTH || !NAME_PATTERN.test(name)) {
    throw validationError(`Invalid package name: "${raw}"`, { name: raw });
  }
  return name;
}

export function isContentHash(value: string): boolean {
  return HASH_PATTERN.test(value);
}

/** Lowercase and validate a SHA-256 hex digest, accepting an optional "sha256:" prefix. */
export function assertContentHash(raw: string): string {
  const value = raw.trim().toLowerCase().replace(/^sha256:/, '');
  if (!isContentHash(value)) {
    throw validationError(`Invalid ${HASH_ALGORITHM} digest: "${raw}"`, { contentHash: raw });
  }
  return value;
}

export function assertSizeBytes(value: number): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw validationError(`Invalid artifact size: ${value}`, { sizeBytes: value });
  }
  return value;
}
