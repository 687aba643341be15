import { CatalogEntry } from '../domain/artifact';
import { Clock, systemClock } from '../clock';
import { logger } from '../logger';
import { CatalogStore } from '../storage/store';

const log = logger.child({ component: 'purger' });

/** Physically removes soft-deleted rows once their retention period has passed. */
export class Purger {
  constructor(
    private catalog: CatalogStore,
    private retentionMs: number,
    private clock: Clock = systemClock,
  ) {}

  async purge(now: Date = this.clock.now()): Promise<CatalogEntry[]> {
    const cutoff = new Date(now.getTime() - this.retentionMs);
    const purged = await this.catalog.purgeDeleted(cutoff);
    for (const entry of purged) {
      log.info('Deleted version purged', {
        entryId: entry.id,
        name: entry.name,
        version: entry.version,
        contentHash: entry.contentHash,
      });
    }
    return purged;
  }
}
