/**
 * SQLite-backed metadata catalog.
 *
 * The `catalog_entries` table is the single point of mutual exclusion in
 * the registry: the UNIQUE (name, version) constraint decides every
 * same-slot race, and all state changes run inside IMMEDIATE transactions.
 * better-sqlite3 is synchronous; the async CatalogStore surface keeps the
 * door open for a networked database behind the same interface.
 */

import Database from 'better-sqlite3';
import { v4 as uuid } from 'uuid';
import {
  CatalogEntry,
  DownloadRecord,
  EntryState,
  PackageDetail,
  PackageSummary,
} from '../domain/artifact';
import {
  conflictError,
  deletedVersionConflictError,
  errorCode,
  invalidStateError,
  isRegistryError,
  notFoundError,
  transientStorageError,
} from '../domain/errors';
import { compareVersions, sortVersionsDescending } from '../domain/version';
import { isRemovableState, transitionEntryState } from '../engine/state-machine';
import { logger } from '../logger';
import {
  BeginPublishInput,
  BeginPublishResult,
  CatalogStore,
  SoftDeleteOptions,
  resolveVersionSpec,
} from './store';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS catalog_entries (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  version TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  size_bytes INTEGER NOT NULL,
  state TEXT NOT NULL CHECK (state IN ('pending', 'published', 'deleted')),
  created_at TEXT NOT NULL,
  published_at TEXT,
  deleted_at TEXT,
  deleted_reason TEXT,
  uploaded_by TEXT,
  UNIQUE (name, version)
);
CREATE INDEX IF NOT EXISTS idx_catalog_entries_state ON catalog_entries (state, created_at);
CREATE INDEX IF NOT EXISTS idx_catalog_entries_hash ON catalog_entries (content_hash);

CREATE TABLE IF NOT EXISTS download_logs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  entry_id TEXT NOT NULL REFERENCES catalog_entries (id) ON DELETE CASCADE,
  downloaded_at TEXT NOT NULL,
  user_agent TEXT,
  client_address TEXT
);
CREATE INDEX IF NOT EXISTS idx_download_logs_entry ON download_logs (entry_id);
`;

const TRANSIENT_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_IOERR', 'SQLITE_FULL']);
const UNIQUE_VIOLATION_CODES = new Set(['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY']);

interface EntryRow {
  id: string;
  name: string;
  version: string;
  content_hash: string;
  size_bytes: number;
  state: string;
  created_at: string;
  published_at: string | null;
  deleted_at: string | null;
  deleted_reason: string | null;
  uploaded_by: string | null;
}

interface VersionRow extends EntryRow {
  download_count: number;
}

function toEntryState(value: string): EntryState {
  switch (value) {
    case EntryState.Pending:
      return EntryState.Pending;
    case EntryState.Published:
      return EntryState.Published;
    case EntryState.Deleted:
      return EntryState.Deleted;
    default:
      throw new Error(`Unknown catalog entry state in database: ${value}`);
  }
}

function toEntry(row: EntryRow): CatalogEntry {
  return {
    id: row.id,
    name: row.name,
    version: row.version,
    contentHash: row.content_hash,
    sizeBytes: row.size_bytes,
    state: toEntryState(row.state),
    createdAt: row.created_at,
    publishedAt: row.published_at ?? undefined,
    deletedAt: row.deleted_at ?? undefined,
    deletedReason: row.deleted_reason ?? undefined,
    uploadedBy: row.uploaded_by ?? undefined,
  };
}

function openDatabase(filename: string): Database.Database {
  try {
    const db = new Database(filename);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.pragma('busy_timeout = 5000');
    db.exec(SCHEMA);
    return db;
  } catch (err) {
    throw transientStorageError('open catalog', err, { filename });
  }
}

export interface SqliteCatalogOptions {
  /** File path, or ":memory:" for an in-process database. */
  filename: string;
  /** Whether a deleted (name, version) may be republished before it is purged. */
  allowDeletedVersionReuse?: boolean;
}

export class SqliteCatalog implements CatalogStore {
  private readonly db: Database.Database;
  private readonly allowDeletedVersionReuse: boolean;
  private readonly log = logger.child({ component: 'catalog' });

  constructor(options: SqliteCatalogOptions) {
    this.allowDeletedVersionReuse = options.allowDeletedVersionReuse ?? true;
    this.db = openDatabase(options.filename);
  }

  async beginPublish(input: BeginPublishInput): Promise<BeginPublishResult> {
    const reserve = this.db.transaction((i: BeginPublishInput) => this.reserveSlot(i));
    return this.guard('beginPublish', () => {
      try {
        return reserve.immediate(input);
      } catch (err) {
        // Another connection won the insert between our read and write; the
        // second attempt sees its row and applies the same rules to it.
        if (UNIQUE_VIOLATION_CODES.has(errorCode(err) ?? '')) {
          this.log.debug('Unique constraint race on beginPublish, retrying', {
            name: input.name,
            version: input.version,
          });
          return reserve.immediate(input);
        }
        throw err;
      }
    });
  }

  private reserveSlot(input: BeginPublishInput): BeginPublishResult {
    const existing = this.db
      .prepare<[string, string], EntryRow>('SELECT * FROM catalog_entries WHERE name = ? AND version = ?')
      .get(input.name, input.version);

    if (existing) {
      if (toEntryState(existing.state) === EntryState.Deleted) {
        if (!this.allowDeletedVersionReuse) {
          throw deletedVersionConflictError(input.name, input.version);
        }
        this.db.prepare('DELETE FROM catalog_entries WHERE id = ?').run(existing.id);
        this.log.info('Reusing deleted version slot', {
          name: input.name,
          version: input.version,
          previousEntryId: existing.id,
        });
      } else if (existing.content_hash !== input.contentHash) {
        throw conflictError(input.name, input.version, existing.content_hash, input.contentHash);
      } else {
        return { entry: toEntry(existing), created: false };
      }
    }

    const row: EntryRow = {
      id: `ent_${uuid()}`,
      name: input.name,
      version: input.version,
      content_hash: input.contentHash,
      size_bytes: input.sizeBytes,
      state: EntryState.Pending,
      created_at: input.now.toISOString(),
      published_at: null,
      deleted_at: null,
      deleted_reason: null,
      uploaded_by: input.uploadedBy ?? null,
    };
    this.db
      .prepare(
        `INSERT INTO catalog_entries
           (id, name, version, content_hash, size_bytes, state, created_at,
            published_at, deleted_at, deleted_reason, uploaded_by)
         VALUES
           (@id, @name, @version, @content_hash, @size_bytes, @state, @created_at,
            @published_at, @deleted_at, @deleted_reason, @uploaded_by)`,
      )
      .run(row);
    return { entry: toEntry(row), created: true };
  }

  async commitPublish(entryId: string, now: Date): Promise<CatalogEntry> {
    return this.guard('commitPublish', () =>
      this.db
        .transaction(() => {
          // A missing row was aborted (and deleted) under the caller.
          const row = this.findEntry(entryId);
          if (!row) throw invalidStateError(entryId, 'aborted', EntryState.Published);
          const transition = transitionEntryState(entryId, toEntryState(row.state), EntryState.Published);
          if (transition.error) throw transition.error;
          const publishedAt = now.toISOString();
          this.db
            .prepare("UPDATE catalog_entries SET state = 'published', published_at = ? WHERE id = ?")
            .run(publishedAt, entryId);
          return toEntry({ ...row, state: EntryState.Published, published_at: publishedAt });
        })
        .immediate(),
    );
  }

  async abortPublish(entryId: string): Promise<CatalogEntry> {
    return this.guard('abortPublish', () =>
      this.db
        .transaction(() => {
          const row = this.requireEntry(entryId);
          if (!isRemovableState(toEntryState(row.state), 'abort')) {
            throw invalidStateError(entryId, row.state, 'aborted');
          }
          this.db.prepare('DELETE FROM catalog_entries WHERE id = ?').run(entryId);
          return toEntry(row);
        })
        .immediate(),
    );
  }

  async resolve(name: string, versionOrRange: string): Promise<CatalogEntry> {
    return resolveVersionSpec(this, name, versionOrRange);
  }

  async getPublished(name: string, version: string): Promise<CatalogEntry | null> {
    return this.guard('getPublished', () => {
      const row = this.db
        .prepare<[string, string], EntryRow>(
          "SELECT * FROM catalog_entries WHERE name = ? AND version = ? AND state = 'published'",
        )
        .get(name, version);
      return row ? toEntry(row) : null;
    });
  }

  async softDelete(name: string, version: string, options: SoftDeleteOptions): Promise<CatalogEntry> {
    return this.guard('softDelete', () =>
      this.db
        .transaction(() => {
          const row = this.db
            .prepare<[string, string], EntryRow>(
              "SELECT * FROM catalog_entries WHERE name = ? AND version = ? AND state = 'published'",
            )
            .get(name, version);
          if (!row) throw notFoundError('Version', `${name}@${version}`);
          const transition = transitionEntryState(row.id, EntryState.Published, EntryState.Deleted);
          if (transition.error) throw transition.error;
          const deletedAt = options.now.toISOString();
          const reason = options.reason ?? null;
          this.db
            .prepare(
              "UPDATE catalog_entries SET state = 'deleted', deleted_at = ?, deleted_reason = ? WHERE id = ?",
            )
            .run(deletedAt, reason, row.id);
          return toEntry({ ...row, state: EntryState.Deleted, deleted_at: deletedAt, deleted_reason: reason });
        })
        .immediate(),
    );
  }

  async listReferencedHashes(): Promise<Set<string>> {
    return this.guard('listReferencedHashes', () => {
      const rows = this.db
        .prepare<[], { content_hash: string }>('SELECT DISTINCT content_hash FROM catalog_entries')
        .all();
      return new Set(rows.map((row) => row.content_hash));
    });
  }

  async isReferenced(contentHash: string): Promise<boolean> {
    return this.guard('isReferenced', () => {
      const row = this.db
        .prepare<[string], { found: number }>(
          'SELECT 1 AS found FROM catalog_entries WHERE content_hash = ? LIMIT 1',
        )
        .get(contentHash);
      return row !== undefined;
    });
  }

  async listVersions(name: string): Promise<string[]> {
    return this.guard('listVersions', () => {
      const rows = this.db
        .prepare<[string], { version: string }>(
          "SELECT version FROM catalog_entries WHERE name = ? AND state = 'published'",
        )
        .all(name);
      return sortVersionsDescending(rows.map((row) => row.version));
    });
  }

  async listPending(createdBefore: Date): Promise<CatalogEntry[]> {
    return this.guard('listPending', () =>
      this.db
        .prepare<[string], EntryRow>(
          "SELECT * FROM catalog_entries WHERE state = 'pending' AND created_at < ? ORDER BY created_at",
        )
        .all(createdBefore.toISOString())
        .map(toEntry),
    );
  }

  async purgeDeleted(deletedBefore: Date): Promise<CatalogEntry[]> {
    return this.guard('purgeDeleted', () =>
      this.db
        .transaction(() => {
          const rows = this.db
            .prepare<[string], EntryRow>(
              "SELECT * FROM catalog_entries WHERE state = 'deleted' AND deleted_at < ? ORDER BY deleted_at",
            )
            .all(deletedBefore.toISOString())
            .filter((row) => isRemovableState(toEntryState(row.state), 'purge'));
          const remove = this.db.prepare('DELETE FROM catalog_entries WHERE id = ?');
          for (const row of rows) remove.run(row.id);
          return rows.map(toEntry);
        })
        .immediate(),
    );
  }

  async getEntry(entryId: string): Promise<CatalogEntry | null> {
    return this.guard('getEntry', () => {
      const row = this.findEntry(entryId);
      return row ? toEntry(row) : null;
    });
  }

  async getPackage(name: string): Promise<PackageDetail | null> {
    return this.guard('getPackage', () => {
      const rows = this.db
        .prepare<[string], VersionRow>(
          `SELECT e.*, (SELECT COUNT(*) FROM download_logs d WHERE d.entry_id = e.id) AS download_count
             FROM catalog_entries e
            WHERE e.name = ? AND e.state != 'pending'`,
        )
        .all(name);
      if (rows.length === 0) return null;
      const versions = rows
        .sort((a, b) => compareVersions(b.version, a.version))
        .map((row) => {
          const entry = toEntry(row);
          return {
            version: entry.version,
            state: entry.state,
            contentHash: entry.contentHash,
            sizeBytes: entry.sizeBytes,
            createdAt: entry.createdAt,
            publishedAt: entry.publishedAt,
            deletedAt: entry.deletedAt,
            deletedReason: entry.deletedReason,
            uploadedBy: entry.uploadedBy,
            downloadCount: row.download_count,
          };
        });
      return {
        name,
        totalDownloads: versions.reduce((sum, v) => sum + v.downloadCount, 0),
        versions,
      };
    });
  }

  async listPackages(): Promise<PackageSummary[]> {
    return this.guard('listPackages', () => {
      const rows = this.db
        .prepare<[], { name: string; version: string; download_count: number }>(
          `SELECT e.name, e.version,
                  (SELECT COUNT(*) FROM download_logs d WHERE d.entry_id = e.id) AS download_count
             FROM catalog_entries e
            WHERE e.state = 'published'
            ORDER BY e.name`,
        )
        .all();

      const byName = new Map<string, { versions: string[]; downloads: number }>();
      for (const row of rows) {
        const pkg = byName.get(row.name) ?? { versions: [], downloads: 0 };
        pkg.versions.push(row.version);
        pkg.downloads += row.download_count;
        byName.set(row.name, pkg);
      }

      return [...byName.entries()].map(([name, pkg]) => ({
        name,
        latestVersion: sortVersionsDescending(pkg.versions)[0],
        versionCount: pkg.versions.length,
        totalDownloads: pkg.downloads,
      }));
    });
  }

  async recordDownload(record: DownloadRecord): Promise<void> {
    this.guard('recordDownload', () => {
      this.db
        .prepare(
          'INSERT INTO download_logs (entry_id, downloaded_at, user_agent, client_address) VALUES (?, ?, ?, ?)',
        )
        .run(
          record.entryId,
          record.downloadedAt,
          record.userAgent?.slice(0, 255) ?? null,
          record.clientAddress?.slice(0, 64) ?? null,
        );
    });
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }

  private findEntry(entryId: string): EntryRow | undefined {
    return this.db
      .prepare<[string], EntryRow>('SELECT * FROM catalog_entries WHERE id = ?')
      .get(entryId);
  }

  private requireEntry(entryId: string): EntryRow {
    const row = this.findEntry(entryId);
    if (!row) throw notFoundError('Catalog entry', entryId);
    return row;
  }

  /** Run a catalog operation, mapping lock contention and I/O failures to transient errors. */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (isRegistryError(err)) throw err;
      const code = errorCode(err);
      if (code && (TRANSIENT_CODES.has(code) || code.startsWith('SQLITE_IOERR'))) {
        throw transientStorageError(operation, err);
      }
      throw err;
    }
  }
}
