/**
 * Filesystem blob store.
 *
 * Layout under the storage root:
 *
 *   tmp/<uuid>.partial            staged writes, never read by anyone else
 *   blobs/<h0h1>/<h2h3>/<hash>    promoted, content-addressed blobs
 *
 * A blob only appears under blobs/ through rename(2) from tmp/, so a reader
 * never observes a half-written file. Two writers of identical bytes
 * converge on the same path; the second promotion is a no-op.
 */

import { createHash } from 'crypto';
import { WriteStream, createReadStream, createWriteStream } from 'fs';
import { mkdir, open, readdir, rename, rm, stat as statPath, utimes } from 'fs/promises';
import path from 'path';
import { Transform, TransformCallback } from 'stream';
import { pipeline } from 'stream/promises';
import { v4 as uuid } from 'uuid';
import { BlobRecord, assertContentHash, isContentHash } from '../domain/artifact';
import {
  abortedError,
  errorCode,
  errorMessage,
  errorName,
  errorSyscall,
  integrityError,
  isRegistryError,
  notFoundError,
  transientStorageError,
} from '../domain/errors';
import { logger } from '../logger';
import {
  BlobReadHandle,
  BlobStore,
  ByteSource,
  StageOptions,
  StagedBlob,
  StagedFile,
  StoredBlob,
} from './store';

const STAGING_SUFFIX = '.partial';
const CLIENT_ABORT_CODES = new Set(['ECONNRESET', 'ERR_STREAM_PREMATURE_CLOSE', 'ABORT_ERR']);

const log = logger.child({ component: 'blob-store' });

/** Counts and hashes bytes as they pass through. */
class DigestMeter extends Transform {
  private readonly hash = createHash('sha256');
  public bytes = 0;

  constructor(private readonly maxBytes?: number) {
    super();
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.bytes += chunk.length;
    if (this.maxBytes !== undefined && this.bytes > this.maxBytes) {
      callback(
        integrityError(`Artifact is larger than the allowed ${this.maxBytes} bytes`, {
          maxBytes: this.maxBytes,
          receivedBytes: this.bytes,
        }),
      );
      return;
    }
    this.hash.update(chunk);
    callback(null, chunk);
  }

  digest(): string {
    return this.hash.digest('hex');
  }
}

function isNotFound(err: unknown): boolean {
  return errorCode(err) === 'ENOENT';
}

/** Translate a failure while writing into the registry error taxonomy. */
function classifyWriteError(err: unknown, signal?: AbortSignal): unknown {
  if (isRegistryError(err)) return err;
  if (signal?.aborted) return abortedError('Artifact upload');
  const code = errorCode(err);
  if (errorName(err) === 'AbortError') return abortedError('Artifact upload');
  if (code && CLIENT_ABORT_CODES.has(code)) return abortedError('Artifact upload');
  if (errorSyscall(err)) return transientStorageError('stage', err);
  return err;
}

/** Resolves once the writer has released its descriptor; never rejects. */
function whenClosed(writer: WriteStream): Promise<void> {
  if (writer.closed) return Promise.resolve();
  return new Promise((resolve) => {
    const onError = (err: unknown) => {
      log.debug('Staging writer failed', { error: errorMessage(err) });
    };
    writer.on('error', onError);
    writer.once('close', () => {
      writer.off('error', onError);
      resolve();
    });
  });
}

/** fsync a directory so a rename or mkdir inside it survives a crash. */
async function syncDir(dir: string): Promise<void> {
  const handle = await open(dir, 'r');
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

export interface FsBlobStoreOptions {
  root: string;
}

export class FsBlobStore implements BlobStore {
  readonly root: string;
  private readonly blobsDir: string;
  private readonly stagingDir: string;

  constructor(options: FsBlobStoreOptions) {
    this.root = path.resolve(options.root);
    this.blobsDir = path.join(this.root, 'blobs');
    this.stagingDir = path.join(this.root, 'tmp');
  }

  /** Create the directory layout. Called once at startup. */
  async init(): Promise<void> {
    try {
      await mkdir(this.blobsDir, { recursive: true });
      await mkdir(this.stagingDir, { recursive: true });
    } catch (err) {
      throw transientStorageError('init', err, { root: this.root });
    }
  }

  blobPath(contentHash: string): string {
    return path.join(this.blobsDir, contentHash.slice(0, 2), contentHash.slice(2, 4), contentHash);
  }

  async stage(source: ByteSource, options: StageOptions = {}): Promise<StagedBlob> {
    const name = `${uuid()}${STAGING_SUFFIX}`;
    const stagedPath = path.join(this.stagingDir, name);
    const meter = new DigestMeter(options.maxBytes);
    if (options.signal?.aborted) throw abortedError('Artifact upload');
    const writer = createWriteStream(stagedPath, { flags: 'wx' });

    try {
      await pipeline(source, meter, writer, { signal: options.signal });
      const handle = await open(stagedPath, 'r');
      try {
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (err) {
      // The file may still be opening; remove it only once the writer is closed.
      await whenClosed(writer);
      await rm(stagedPath, { force: true }).catch((rmErr: unknown) => {
        log.warn('Could not remove staged file', { staged: name, error: errorMessage(rmErr) });
      });
      throw classifyWriteError(err, options.signal);
    }

    const contentHash = meter.digest();
    log.debug('Blob staged', { contentHash, sizeBytes: meter.bytes, staged: name });
    return this.stagedBlob(stagedPath, contentHash, meter.bytes);
  }

  async put(source: ByteSource, options?: StageOptions): Promise<BlobRecord> {
    const staged = await this.stage(source, options);
    try {
      return await staged.promote();
    } catch (err) {
      await staged.discard();
      throw err;
    }
  }

  async get(contentHash: string): Promise<BlobReadHandle> {
    const hash = assertContentHash(contentHash);
    const found = await this.stat(hash);
    if (!found) throw notFoundError('Blob', hash);
    return {
      stream: createReadStream(this.blobPath(hash)),
      sizeBytes: found.sizeBytes,
    };
  }

  async stat(contentHash: string): Promise<StoredBlob | null> {
    const hash = assertContentHash(contentHash);
    try {
      const info = await statPath(this.blobPath(hash));
      return { contentHash: hash, sizeBytes: info.size, modifiedAt: info.mtime };
    } catch (err) {
      if (isNotFound(err)) return null;
      throw transientStorageError('stat', err, { contentHash: hash });
    }
  }

  async has(contentHash: string): Promise<boolean> {
    return (await this.stat(contentHash)) !== null;
  }

  async verify(contentHash: string): Promise<{ contentHash: string; sizeBytes: number }> {
    const { stream } = await this.get(contentHash);
    const hash = createHash('sha256');
    let sizeBytes = 0;
    try {
      for await (const chunk of stream) {
        const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
        sizeBytes += bytes.length;
        hash.update(bytes);
      }
    } catch (err) {
      throw transientStorageError('verify', err, { contentHash });
    }
    return { contentHash: hash.digest('hex'), sizeBytes };
  }

  async delete(contentHash: string): Promise<boolean> {
    const hash = assertContentHash(contentHash);
    try {
      await rm(this.blobPath(hash));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw transientStorageError('delete', err, { contentHash: hash });
    }
  }

  async *list(): AsyncIterable<StoredBlob> {
    for (const outer of await this.readDir(this.blobsDir)) {
      const outerDir = path.join(this.blobsDir, outer);
      for (const inner of await this.readDir(outerDir)) {
        const innerDir = path.join(outerDir, inner);
        for (const name of await this.readDir(innerDir)) {
          if (!isContentHash(name)) continue;
          const found = await this.stat(name);
          if (found) yield found;
        }
      }
    }
  }

  async listStaged(): Promise<StagedFile[]> {
    const files: StagedFile[] = [];
    for (const name of await this.readDir(this.stagingDir)) {
      if (!name.endsWith(STAGING_SUFFIX)) continue;
      try {
        const info = await statPath(path.join(this.stagingDir, name));
        files.push({ name, modifiedAt: info.mtime });
      } catch (err) {
        if (!isNotFound(err)) throw transientStorageError('listStaged', err);
      }
    }
    return files;
  }

  async removeStaged(name: string): Promise<boolean> {
    if (path.basename(name) !== name || !name.endsWith(STAGING_SUFFIX)) return false;
    try {
      await rm(path.join(this.stagingDir, name));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw transientStorageError('removeStaged', err, { name });
    }
  }

  private async readDir(dir: string): Promise<string[]> {
    try {
      return (await readdir(dir)).sort();
    } catch (err) {
      if (isNotFound(err) || errorCode(err) === 'ENOTDIR') return [];
      throw transientStorageError('list', err, { dir });
    }
  }

  private stagedBlob(stagedPath: string, contentHash: string, sizeBytes: number): StagedBlob {
    let settled: 'promoted' | 'discarded' | undefined;
    const finalPath = this.blobPath(contentHash);
    const record: BlobRecord = { contentHash, sizeBytes, storagePath: finalPath };

    return {
      contentHash,
      sizeBytes,
      promote: async () => {
        if (settled === 'promoted') return record;
        if (settled === 'discarded') {
          throw transientStorageError('promote', new Error('staged blob was already discarded'), {
            contentHash,
          });
        }
        const shardDir = path.dirname(finalPath);
        try {
          const created = await mkdir(shardDir, { recursive: true });
          const existing = await this.stat(contentHash);
          if (existing) {
            // Dedup: keep the existing file, but make it young again so a
            // concurrent collection pass treats it as in flight.
            const now = new Date();
            await utimes(finalPath, now, now);
            await rm(stagedPath, { force: true });
            log.debug('Blob already present', { contentHash });
          } else {
            await rename(stagedPath, finalPath);
            await syncDir(shardDir);
            if (created !== undefined) {
              // New shard directories: their own entries must be durable too.
              const outerDir = path.dirname(shardDir);
              await syncDir(outerDir);
              if (created === outerDir) await syncDir(this.blobsDir);
            }
            log.info('Blob stored', { contentHash, sizeBytes });
          }
        } catch (err) {
          if (isRegistryError(err)) throw err;
          throw transientStorageError('promote', err, { contentHash });
        }
        settled = 'promoted';
        return record;
      },
      discard: async () => {
        if (settled) return;
        settled = 'discarded';
        await rm(stagedPath, { force: true });
      },
    };
  }
}
