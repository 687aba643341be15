/**
 * Registry: the boundary the HTTP layer (or an embedding program) talks to.
 *
 * Wires the coordinator, resolver and maintenance components over one
 * catalog and one blob store. Names are normalized here so every lower
 * layer sees the canonical form.
 */

import { assertPackageName, PackageDetail, PackageSummary } from './domain/artifact';
import { notFoundError, validationError } from './domain/errors';
import { parseVersion } from './domain/version';
import { Clock, systemClock } from './clock';
import { logger } from './logger';
import { BlobStore, CatalogStore } from './storage/store';
import { GarbageCollector } from './engine/garbage-collector';
import { MaintenanceReport, MaintenanceScheduler } from './engine/maintenance';
import { Purger } from './engine/purger';
import { PendingReconciler } from './engine/reconciler';
import { DEFAULT_RETRY_POLICY, RetryPolicy } from './engine/retry';
import { FetchOptions, FetchResult, RetrievalResolver, VerifyMode } from './engine/retrieval-resolver';
import { PublishRequest, PublishResult, UploadCoordinator } from './engine/upload-coordinator';

export interface RegistryOptions {
  maxArtifactBytes: number;
  pendingTimeoutMs: number;
  gcGracePeriodMs: number;
  deletedRetentionMs: number;
  maintenanceIntervalMs: number;
  retry: RetryPolicy;
  verifyMode: VerifyMode;
  clock: Clock;
  /** Backoff sleep, replaceable in tests. */
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_OPTIONS: RegistryOptions = {
  maxArtifactBytes: 512 * 1024 * 1024,
  pendingTimeoutMs: 10 * 60 * 1000,
  gcGracePeriodMs: 60 * 60 * 1000,
  deletedRetentionMs: 7 * 24 * 60 * 60 * 1000,
  maintenanceIntervalMs: 5 * 60 * 1000,
  retry: DEFAULT_RETRY_POLICY,
  verifyMode: 'streaming',
  clock: systemClock,
};

const log = logger.child({ component: 'registry' });

export class Registry {
  readonly coordinator: UploadCoordinator;
  readonly resolver: RetrievalResolver;
  readonly reconciler: PendingReconciler;
  readonly purger: Purger;
  readonly collector: GarbageCollector;
  readonly scheduler: MaintenanceScheduler;
  private options: RegistryOptions;

  constructor(
    readonly catalog: CatalogStore,
    readonly blobs: BlobStore,
    options?: Partial<RegistryOptions>,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    const { clock } = this.options;
    this.coordinator = new UploadCoordinator(catalog, blobs, {
      maxArtifactBytes: this.options.maxArtifactBytes,
      retry: this.options.retry,
      clock,
      sleep: this.options.sleep,
    });
    this.resolver = new RetrievalResolver(catalog, blobs, { defaultVerify: this.options.verifyMode, clock });
    this.reconciler = new PendingReconciler(catalog, this.options.pendingTimeoutMs, clock);
    this.purger = new Purger(catalog, this.options.deletedRetentionMs, clock);
    this.collector = new GarbageCollector(catalog, blobs, this.options.gcGracePeriodMs, clock);
    this.scheduler = new MaintenanceScheduler(
      this.reconciler,
      this.purger,
      this.collector,
      this.options.maintenanceIntervalMs,
      clock,
    );
  }

  publish(request: PublishRequest): Promise<PublishResult> {
    return this.coordinator.publish(request);
  }

  fetch(name: string, versionOrRange: string, options?: FetchOptions): Promise<FetchResult> {
    return this.resolver.fetch(name, versionOrRange, options);
  }

  async delete(rawName: string, rawVersion: string, reason?: string): Promise<{ ok: true }> {
    const name = assertPackageName(rawName);
    const version = parseVersion(rawVersion.trim()).raw;
    if (reason !== undefined && reason.length > 1024) {
      throw validationError('Delete reason must be at most 1024 characters', { length: reason.length });
    }
    const entry = await this.catalog.softDelete(name, version, { reason, now: this.options.clock.now() });
    log.info('Version deleted', { name, version, entryId: entry.id, reason });
    return { ok: true };
  }

  async listVersions(rawName: string): Promise<string[]> {
    const name = assertPackageName(rawName);
    const versions = await this.catalog.listVersions(name);
    if (versions.length === 0) throw notFoundError('Package', name);
    return versions;
  }

  async getPackage(rawName: string): Promise<PackageDetail> {
    const name = assertPackageName(rawName);
    const detail = await this.catalog.getPackage(name);
    if (!detail) throw notFoundError('Package', name);
    return detail;
  }

  listPackages(): Promise<PackageSummary[]> {
    return this.catalog.listPackages();
  }

  /** One reconcile → purge → collect cycle. */
  maintenance(): Promise<MaintenanceReport> {
    return this.scheduler.runOnce();
  }

  async close(): Promise<void> {
    await this.scheduler.stop();
    await this.catalog.close();
  }
}
