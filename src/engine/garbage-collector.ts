/**
 * Garbage Collector.
 *
 * The catalog is the source of truth for liveness. A blob is deleted only
 * when no catalog row references it and it is older than the grace period.
 * The reference set is a snapshot, so each candidate is re-checked against
 * the catalog immediately before it is unlinked.
 */

import { ageMs, Clock, systemClock } from '../clock';
import { logger } from '../logger';
import { BlobStore, CatalogStore } from '../storage/store';

export interface CollectOptions {
  gracePeriodMs?: number;
}

export interface CollectResult {
  scanned: number;
  deleted: string[];
  retained: number;
  stagedRemoved: number;
}

const log = logger.child({ component: 'garbage-collector' });

export class GarbageCollector {
  constructor(
    private catalog: CatalogStore,
    private blobs: BlobStore,
    private gracePeriodMs: number,
    private clock: Clock = systemClock,
  ) {}

  async collect(now: Date = this.clock.now(), options: CollectOptions = {}): Promise<CollectResult> {
    const grace = options.gracePeriodMs ?? this.gracePeriodMs;
    const referenced = await this.catalog.listReferencedHashes();
    const result: CollectResult = { scanned: 0, deleted: [], retained: 0, stagedRemoved: 0 };

    for await (const blob of this.blobs.list()) {
      result.scanned++;
      if (referenced.has(blob.contentHash) || ageMs(blob.modifiedAt, now) < grace) {
        result.retained++;
        continue;
      }
      if (await this.catalog.isReferenced(blob.contentHash)) {
        result.retained++;
        continue;
      }
      if (await this.blobs.delete(blob.contentHash)) {
        result.deleted.push(blob.contentHash);
        log.info('Unreferenced blob deleted', { contentHash: blob.contentHash, sizeBytes: blob.sizeBytes });
      }
    }

    for (const staged of await this.blobs.listStaged()) {
      if (ageMs(staged.modifiedAt, now) < grace) continue;
      if (await this.blobs.removeStaged(staged.name)) result.stagedRemoved++;
    }

    if (result.deleted.length > 0 || result.stagedRemoved > 0) {
      log.info('Collection finished', {
        scanned: result.scanned,
        deleted: result.deleted.length,
        retained: result.retained,
        stagedRemoved: result.stagedRemoved,
      });
    }
    return result;
  }
}
