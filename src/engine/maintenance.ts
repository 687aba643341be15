/**
 * Maintenance Scheduler.
 *
 * Runs reconcile → purge → collect once at startup and then on a fixed
 * interval. Each step is isolated: a failing step is logged and the cycle
 * moves on. The timer is unref'd so it never holds the process open.
 */

import { errorMessage } from '../domain/errors';
import { Clock, systemClock } from '../clock';
import { logger } from '../logger';
import { CollectResult, GarbageCollector } from './garbage-collector';
import { Purger } from './purger';
import { PendingReconciler } from './reconciler';

export interface MaintenanceReport {
  startedAt: string;
  reconciled: number;
  purged: number;
  collected?: CollectResult;
  errors: Array<{ step: 'reconcile' | 'purge' | 'collect'; message: string }>;
}

const log = logger.child({ component: 'maintenance' });

export class MaintenanceScheduler {
  private timer?: NodeJS.Timeout;
  private running?: Promise<MaintenanceReport>;

  constructor(
    private reconciler: PendingReconciler,
    private purger: Purger,
    private collector: GarbageCollector,
    private intervalMs: number,
    private clock: Clock = systemClock,
  ) {}

  get started(): boolean {
    return this.timer !== undefined;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.intervalMs);
    this.timer.unref();
    void this.runOnce();
    log.info('Maintenance scheduled', { intervalMs: this.intervalMs });
  }

  /** Stop the timer and wait for an in-flight cycle to finish. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    if (this.running) await this.running;
  }

  /** Run one cycle. Overlapping calls share the cycle already in flight. */
  runOnce(): Promise<MaintenanceReport> {
    if (!this.running) {
      this.running = this.cycle().finally(() => {
        this.running = undefined;
      });
    }
    return this.running;
  }

  private async cycle(): Promise<MaintenanceReport> {
    const now = this.clock.now();
    const report: MaintenanceReport = { startedAt: now.toISOString(), reconciled: 0, purged: 0, errors: [] };

    try {
      report.reconciled = (await this.reconciler.reconcile(now)).length;
    } catch (err) {
      report.errors.push({ step: 'reconcile', message: errorMessage(err) });
    }
    try {
      report.purged = (await this.purger.purge(now)).length;
    } catch (err) {
      report.errors.push({ step: 'purge', message: errorMessage(err) });
    }
    try {
      report.collected = await this.collector.collect(now);
    } catch (err) {
      report.errors.push({ step: 'collect', message: errorMessage(err) });
    }

    for (const failure of report.errors) {
      log.error('Maintenance step failed', failure);
    }
    log.debug('Maintenance cycle finished', {
      reconciled: report.reconciled,
      purged: report.purged,
      blobsDeleted: report.collected?.deleted.length ?? 0,
    });
    return report;
  }
}
