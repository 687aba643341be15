/**
 * Pending Reconciler.
 *
 * A publish that dies between reservation and commit leaves a pending row
 * behind. Rows older than the timeout are aborted here; their staged bytes
 * are removed by the collector.
 */

import { CatalogEntry } from '../domain/artifact';
import { isRegistryError } from '../domain/errors';
import { Clock, systemClock } from '../clock';
import { logger } from '../logger';
import { CatalogStore } from '../storage/store';

const log = logger.child({ component: 'pending-reconciler' });

export class PendingReconciler {
  constructor(
    private catalog: CatalogStore,
    private pendingTimeoutMs: number,
    private clock: Clock = systemClock,
  ) {}

  async reconcile(now: Date = this.clock.now()): Promise<CatalogEntry[]> {
    const cutoff = new Date(now.getTime() - this.pendingTimeoutMs);
    const aborted: CatalogEntry[] = [];

    for (const entry of await this.catalog.listPending(cutoff)) {
      try {
        aborted.push(await this.catalog.abortPublish(entry.id));
        log.warn('Stale reservation aborted', {
          entryId: entry.id,
          name: entry.name,
          version: entry.version,
          createdAt: entry.createdAt,
        });
      } catch (err) {
        // The publisher committed or aborted it since the listing.
        if (isRegistryError(err, 'NotFound') || isRegistryError(err, 'InvalidState')) continue;
        throw err;
      }
    }
    return aborted;
  }
}
