/**
 * Read-through cache in front of a CatalogStore.
 *
 * Caches the published version list and published entries of each package.
 * The cache is created once by the application context and every mutation
 * routed through it invalidates the affected package. A per-package
 * generation counter stops a read that started before a mutation from
 * writing a stale value back after the invalidation.
 */

import {
  CatalogEntry,
  DownloadRecord,
  EntryState,
  PackageDetail,
  PackageSummary,
} from '../domain/artifact';
import {
  BeginPublishInput,
  BeginPublishResult,
  CatalogStore,
  SoftDeleteOptions,
  resolveVersionSpec,
} from './store';

interface PackageCacheEntry {
  versions?: string[];
  entries: Map<string, CatalogEntry>;
}

export interface CacheStats {
  hits: number;
  misses: number;
  invalidations: number;
  packages: number;
}

export class CachedCatalog implements CatalogStore {
  private readonly packages = new Map<string, PackageCacheEntry>();
  private readonly generations = new Map<string, number>();
  private epoch = 0;
  private hits = 0;
  private misses = 0;
  private invalidations = 0;

  constructor(private readonly inner: CatalogStore) {}

  /** Drop cached state for one package, or for all packages. */
  invalidate(name?: string): void {
    this.invalidations++;
    if (name === undefined) {
      this.epoch++;
      this.generations.clear();
      this.packages.clear();
      return;
    }
    this.bump(name);
    this.packages.delete(name);
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      invalidations: this.invalidations,
      packages: this.packages.size,
    };
  }

  // --- Mutations: delegate, then invalidate ---

  async beginPublish(input: BeginPublishInput): Promise<BeginPublishResult> {
    try {
      return await this.inner.beginPublish(input);
    } finally {
      this.invalidate(input.name);
    }
  }

  async commitPublish(entryId: string, now: Date): Promise<CatalogEntry> {
    const entry = await this.inner.commitPublish(entryId, now);
    this.invalidate(entry.name);
    return entry;
  }

  async abortPublish(entryId: string): Promise<CatalogEntry> {
    const entry = await this.inner.abortPublish(entryId);
    this.invalidate(entry.name);
    return entry;
  }

  async softDelete(name: string, version: string, options: SoftDeleteOptions): Promise<CatalogEntry> {
    try {
      return await this.inner.softDelete(name, version, options);
    } finally {
      this.invalidate(name);
    }
  }

  async purgeDeleted(deletedBefore: Date): Promise<CatalogEntry[]> {
    const purged = await this.inner.purgeDeleted(deletedBefore);
    for (const name of new Set(purged.map((entry) => entry.name))) this.invalidate(name);
    return purged;
  }

  // --- Cached reads ---

  async resolve(name: string, versionOrRange: string): Promise<CatalogEntry> {
    return resolveVersionSpec(this, name, versionOrRange);
  }

  async listVersions(name: string): Promise<string[]> {
    const cached = this.packages.get(name)?.versions;
    if (cached) {
      this.hits++;
      return [...cached];
    }
    this.misses++;
    const generation = this.generation(name);
    const versions = await this.inner.listVersions(name);
    if (this.generation(name) === generation) {
      this.packageEntry(name).versions = versions;
    }
    return [...versions];
  }

  async getPublished(name: string, version: string): Promise<CatalogEntry | null> {
    const cached = this.packages.get(name)?.entries.get(version);
    if (cached) {
      this.hits++;
      return { ...cached };
    }
    this.misses++;
    const generation = this.generation(name);
    const entry = await this.inner.getPublished(name, version);
    if (entry && entry.state === EntryState.Published && this.generation(name) === generation) {
      this.packageEntry(name).entries.set(version, entry);
    }
    return entry ? { ...entry } : null;
  }

  // --- Uncached passthroughs ---

  listReferencedHashes(): Promise<Set<string>> {
    return this.inner.listReferencedHashes();
  }

  isReferenced(contentHash: string): Promise<boolean> {
    return this.inner.isReferenced(contentHash);
  }

  listPending(createdBefore: Date): Promise<CatalogEntry[]> {
    return this.inner.listPending(createdBefore);
  }

  getEntry(entryId: string): Promise<CatalogEntry | null> {
    return this.inner.getEntry(entryId);
  }

  getPackage(name: string): Promise<PackageDetail | null> {
    return this.inner.getPackage(name);
  }

  listPackages(): Promise<PackageSummary[]> {
    return this.inner.listPackages();
  }

  recordDownload(record: DownloadRecord): Promise<void> {
    return this.inner.recordDownload(record);
  }

  async close(): Promise<void> {
    this.invalidate();
    await this.inner.close();
  }

  private generation(name: string): string {
    return `${this.epoch}:${this.generations.get(name) ?? 0}`;
  }

  private bump(name: string): void {
    this.generations.set(name, (this.generations.get(name) ?? 0) + 1);
  }

  private packageEntry(name: string): PackageCacheEntry {
    let entry = this.packages.get(name);
    if (!entry) {
      entry = { entries: new Map() };
      this.packages.set(name, entry);
    }
    return entry;
  }
}
