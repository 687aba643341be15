/**
 * Upload Coordinator: the publish saga.
 *
 * The catalog and the blob store never share a transaction, so a publish
 * runs as a sequence of individually durable steps:
 *
 *   reserve (pending row) → stage bytes → verify → promote blob → commit
 *
 * The slot is reserved before any byte becomes durable, so a conflicting
 * publish fails before the body is read. A blob is only promoted once its
 * digest matches the declared one. A failure after the reservation either
 * releases it (when this call created it) or leaves it pending for the
 * reconciler.
 */

import { CatalogEntry, EntryState, assertContentHash, assertPackageName, assertSizeBytes } from '../domain/artifact';
import { abortedError, errorMessage, integrityError, isRegistryError, validationError } from '../domain/errors';
import { parseVersion } from '../domain/version';
import { Clock, systemClock } from '../clock';
import { logger } from '../logger';
import { BlobStore, ByteSource, CatalogStore, StagedBlob } from '../storage/store';
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from './retry';

export interface PublishRequest {
  name: string;
  version: string;
  source: ByteSource;
  declaredHash: string;
  declaredSize: number;
  uploadedBy?: string;
  signal?: AbortSignal;
}

export interface PublishResult {
  accepted: true;
  entryId: string;
  name: string;
  version: string;
  contentHash: string;
  sizeBytes: number;
  /** False when the same bytes were already published under this slot. */
  created: boolean;
}

export interface UploadCoordinatorConfig {
  maxArtifactBytes: number;
  retry: RetryPolicy;
  clock: Clock;
  /** Backoff sleep, replaceable in tests. */
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_CONFIG: UploadCoordinatorConfig = {
  maxArtifactBytes: 512 * 1024 * 1024,
  retry: DEFAULT_RETRY_POLICY,
  clock: systemClock,
};

const log = logger.child({ component: 'upload-coordinator' });

export class UploadCoordinator {
  private config: UploadCoordinatorConfig;

  constructor(
    private catalog: CatalogStore,
    private blobs: BlobStore,
    config?: Partial<UploadCoordinatorConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async publish(request: PublishRequest): Promise<PublishResult> {
    const name = assertPackageName(request.name);
    const version = parseVersion(request.version.trim()).raw;
    const contentHash = assertContentHash(request.declaredHash);
    const sizeBytes = assertSizeBytes(request.declaredSize);
    if (sizeBytes > this.config.maxArtifactBytes) {
      throw validationError(
        `Declared size ${sizeBytes} exceeds the maximum artifact size of ${this.config.maxArtifactBytes} bytes`,
        { sizeBytes, maxArtifactBytes: this.config.maxArtifactBytes },
      );
    }
    if (request.signal?.aborted) throw abortedError('Artifact upload');

    const { entry, created } = await this.retry('beginPublish', () =>
      this.catalog.beginPublish({
        name,
        version,
        contentHash,
        sizeBytes,
        uploadedBy: request.uploadedBy,
        now: this.config.clock.now(),
      }),
    );

    if (entry.state === EntryState.Published) {
      log.info('Publish is idempotent, version already present', { name, version, contentHash });
      return this.result(entry, false);
    }

    let staged: StagedBlob;
    try {
      staged = await this.blobs.stage(request.source, {
        signal: request.signal,
        maxBytes: sizeBytes,
      });
    } catch (err) {
      if (created) await this.release(entry, err);
      throw this.describeFailure(err, entry, !created);
    }

    try {
      if (staged.contentHash !== contentHash || staged.sizeBytes !== sizeBytes) {
        throw integrityError(`Uploaded bytes for ${name}@${version} do not match the declared checksum`, {
          name,
          version,
          declaredHash: contentHash,
          actualHash: staged.contentHash,
          declaredSize: sizeBytes,
          actualSize: staged.sizeBytes,
        });
      }
      if (request.signal?.aborted) throw abortedError('Artifact upload');
      await this.retry('promote', () => staged.promote());
    } catch (err) {
      await staged.discard();
      const keepPending = !created || isRegistryError(err, 'TransientStorageError');
      if (!keepPending) await this.release(entry, err);
      throw this.describeFailure(err, entry, keepPending);
    }

    const committed = await this.commit(entry);
    log.info('Artifact published', {
      name,
      version,
      contentHash,
      sizeBytes,
      entryId: committed.id,
    });
    return this.result(committed, created);
  }

  /**
   * pending → published. Losing the race to a concurrent publisher of the
   * same bytes still counts as success.
   */
  private async commit(entry: CatalogEntry): Promise<CatalogEntry> {
    try {
      return await this.retry('commitPublish', () =>
        this.catalog.commitPublish(entry.id, this.config.clock.now()),
      );
    } catch (err) {
      if (!isRegistryError(err, 'InvalidState')) throw this.describeFailure(err, entry, true);
      const current = await this.catalog.getEntry(entry.id);
      if (current && current.state === EntryState.Published && current.contentHash === entry.contentHash) {
        return current;
      }
      throw err;
    }
  }

  private async release(entry: CatalogEntry, cause: unknown): Promise<void> {
    try {
      await this.catalog.abortPublish(entry.id);
      log.info('Reservation released', {
        entryId: entry.id,
        name: entry.name,
        version: entry.version,
        reason: errorMessage(cause),
      });
    } catch (err) {
      log.warn('Could not release reservation, leaving it to the reconciler', {
        entryId: entry.id,
        error: errorMessage(err),
      });
    }
  }

  private describeFailure(err: unknown, entry: CatalogEntry, leftPending: boolean): unknown {
    if (isRegistryError(err, 'TransientStorageError') && leftPending) {
      log.error('Publish failed on storage, reservation left pending', {
        entryId: entry.id,
        name: entry.name,
        version: entry.version,
        error: err.message,
      });
    } else if (isRegistryError(err)) {
      log.warn('Publish rejected', { name: entry.name, version: entry.version, code: err.typedError.code });
    }
    return err;
  }

  private retry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(this.config.retry, { operation, logger: log, sleep: this.config.sleep }, fn);
  }

  private result(entry: CatalogEntry, created: boolean): PublishResult {
    return {
      accepted: true,
      entryId: entry.id,
      name: entry.name,
      version: entry.version,
      contentHash: entry.contentHash,
      sizeBytes: entry.sizeBytes,
      created,
    };
  }
}
