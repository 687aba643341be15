/**
 * Retrieval Resolver.
 *
 * Resolves an exact version or a range to a published catalog entry and
 * opens its blob. Every byte handed to a client is checked against the
 * digest recorded at publish time, either while it streams or up front.
 */

import { createHash } from 'crypto';
import { Readable, Transform, TransformCallback, pipeline } from 'stream';
import { CatalogEntry, assertPackageName } from '../domain/artifact';
import { errorMessage, integrityError, isRegistryError, validationError } from '../domain/errors';
import { Clock, systemClock } from '../clock';
import { logger } from '../logger';
import { BlobReadHandle, BlobStore, CatalogStore } from '../storage/store';

export type VerifyMode = 'streaming' | 'eager';

export interface FetchOptions {
  verify?: VerifyMode;
  userAgent?: string;
  clientAddress?: string;
}

export interface FetchResult {
  stream: Readable;
  entry: CatalogEntry;
  sizeBytes: number;
  contentHash: string;
}

export interface RetrievalResolverConfig {
  defaultVerify: VerifyMode;
  clock: Clock;
}

const DEFAULT_CONFIG: RetrievalResolverConfig = {
  defaultVerify: 'streaming',
  clock: systemClock,
};

const log = logger.child({ component: 'retrieval-resolver' });

/** Passes bytes through, checking digest and length when the source ends. */
class VerifyingStream extends Transform {
  private readonly hash = createHash('sha256');
  private bytes = 0;

  constructor(
    private readonly entry: CatalogEntry,
    private readonly checkDigest: boolean,
    private readonly onComplete: () => void,
  ) {
    super();
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.bytes += chunk.length;
    if (this.checkDigest) this.hash.update(chunk);
    callback(null, chunk);
  }

  _flush(callback: TransformCallback): void {
    const actualHash = this.checkDigest ? this.hash.digest('hex') : this.entry.contentHash;
    if (actualHash !== this.entry.contentHash || this.bytes !== this.entry.sizeBytes) {
      callback(corruptBlob(this.entry, actualHash, this.bytes));
      return;
    }
    this.onComplete();
    callback();
  }
}

function corruptBlob(entry: CatalogEntry, actualHash: string, actualSize: number) {
  const err = integrityError(`Stored bytes for ${entry.name}@${entry.version} do not match the catalog`, {
    name: entry.name,
    version: entry.version,
    expectedHash: entry.contentHash,
    actualHash,
    expectedSize: entry.sizeBytes,
    actualSize,
  });
  log.error('Integrity check failed on read', { entryId: entry.id, ...err.typedError.details });
  return err;
}

export class RetrievalResolver {
  private config: RetrievalResolverConfig;

  constructor(
    private catalog: CatalogStore,
    private blobs: BlobStore,
    config?: Partial<RetrievalResolverConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async fetch(rawName: string, versionOrRange: string, options: FetchOptions = {}): Promise<FetchResult> {
    const name = assertPackageName(rawName);
    const spec = versionOrRange.trim();
    const mode = options.verify ?? this.config.defaultVerify;
    if (mode !== 'streaming' && mode !== 'eager') {
      throw validationError(`Unknown verification mode: "${String(mode)}"`, { verify: mode });
    }

    const entry = await this.catalog.resolve(name, spec);

    if (mode === 'eager') {
      const actual = await this.verifyOnDisk(entry);
      if (actual.contentHash !== entry.contentHash || actual.sizeBytes !== entry.sizeBytes) {
        throw corruptBlob(entry, actual.contentHash, actual.sizeBytes);
      }
    }

    const handle = await this.open(entry);
    if (handle.sizeBytes !== entry.sizeBytes) {
      handle.stream.destroy();
      throw corruptBlob(entry, entry.contentHash, handle.sizeBytes);
    }

    const verifier = new VerifyingStream(entry, mode === 'streaming', () => {
      this.recordDownload(entry, options);
    });
    pipeline(handle.stream, verifier, (err) => {
      if (err && !isRegistryError(err, 'IntegrityError')) {
        log.debug('Download stream closed early', { entryId: entry.id, error: err.message });
      }
    });

    log.debug('Artifact resolved', { name, spec, version: entry.version, verify: mode });
    return { stream: verifier, entry, sizeBytes: entry.sizeBytes, contentHash: entry.contentHash };
  }

  /** A published entry whose blob is gone is corruption, not a missing package. */
  private async open(entry: CatalogEntry): Promise<BlobReadHandle> {
    try {
      return await this.blobs.get(entry.contentHash);
    } catch (err) {
      if (isRegistryError(err, 'NotFound')) throw corruptBlob(entry, '', 0);
      throw err;
    }
  }

  private async verifyOnDisk(entry: CatalogEntry): Promise<{ contentHash: string; sizeBytes: number }> {
    try {
      return await this.blobs.verify(entry.contentHash);
    } catch (err) {
      if (isRegistryError(err, 'NotFound')) throw corruptBlob(entry, '', 0);
      throw err;
    }
  }

  private recordDownload(entry: CatalogEntry, options: FetchOptions): void {
    this.catalog
      .recordDownload({
        entryId: entry.id,
        downloadedAt: this.config.clock.now().toISOString(),
        userAgent: options.userAgent,
        clientAddress: options.clientAddress,
      })
      .catch((err: unknown) => {
        log.warn('Failed to record download', {
          entryId: entry.id,
          error: errorMessage(err),
        });
      });
  }
}
