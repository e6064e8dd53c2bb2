import { EventEmitter } from 'events';
import type {
  BucketSnapshot,
  IAggregationStore,
  SweeperConfig,
  SweepReport,
  SweepStats,
} from '@alert-buckets/types';

export const RETENTION_WINDOW_MS = 86_400_000;

const DEFAULTS = {
  INTERVAL_MS: 3_600_000,
};

/**
 * Periodic retention sweep.
 *
 * Every pass lists all buckets and evicts each member whose age has reached
 * the retention window. Age is computed against the clock at the moment the
 * member is evaluated. The store drops a bucket together with its last
 * member; a bucket listed with no members at all (left by an add that failed
 * after creating it) is removed with a conditional delete.
 *
 * Events: 'sweep' (SweepReport), 'evicted', 'error', 'started', 'stopped'.
 * A failed listing rejects sweep() instead of emitting 'error'.
 */
export class RetentionSweeper extends EventEmitter {
  private readonly store: IAggregationStore;
  private readonly retentionWindowMs: number;
  private readonly intervalMs: number;
  private readonly now: () => number;

  private running = false;
  private aborting = false;
  private sweeping: Promise<SweepReport> | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;

  private stats: SweepStats = {
    sweepCount: 0,
    lastSweepAt: undefined,
    lastRemoved: 0,
    totalRemoved: 0,
    errorCount: 0,
  };

  constructor(store: IAggregationStore, config: SweeperConfig = {}) {
    super();
    this.store = store;
    this.retentionWindowMs = config.retentionWindowMs ?? RETENTION_WINDOW_MS;
    this.intervalMs = config.intervalMs ?? DEFAULTS.INTERVAL_MS;
    this.now = config.now ?? Date.now;
  }

  /** Start sweeping on the configured interval. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.aborting = false;
    this.emit('started');
    this.scheduleSweep();
  }

  /** Stop the schedule and abandon the pass in flight at its next member. */
  async stop(): Promise<void> {
    this.running = false;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    if (this.sweeping) {
      this.aborting = true;
      await Promise.allSettled([this.sweeping]);
      this.aborting = false;
    }

    this.emit('stopped');
  }

  /**
   * Run one pass. A call made while a pass is in flight shares that pass.
   *
   * @throws StoreUnavailableError when the bucket listing fails
   */
  async sweep(): Promise<SweepReport> {
    if (this.sweeping) {
      return this.sweeping;
    }

    this.sweeping = this.doSweep();
    try {
      return await this.sweeping;
    } finally {
      this.sweeping = null;
    }
  }

  getStats(): Readonly<SweepStats> {
    return { ...this.stats };
  }

  // ─── Internal ────────────────────────────────────────────────────────────

  private scheduleSweep(): void {
    if (!this.running) return;

    this.timer = setTimeout(() => {
      void this.sweep()
        .catch((err) => this.report(err))
        .finally(() => this.scheduleSweep());
    }, this.intervalMs);
  }

  private async doSweep(): Promise<SweepReport> {
    const startedAt = new Date(this.now());
    let removed = 0;
    let bucketsDeleted = 0;
    let failures = 0;
    let aborted = false;

    let buckets: BucketSnapshot[];
    try {
      buckets = await this.store.listBuckets();
    } catch (err) {
      this.stats.errorCount++;
      throw err;
    }

    sweep: for (const bucket of buckets) {
      const key = { phenomenon: bucket.phenomenon, bucketId: bucket.bucketId };

      if (bucket.members.size === 0) {
        if (this.aborting) {
          aborted = true;
          break sweep;
        }
        try {
          if (await this.store.deleteBucketIfEmpty(key)) bucketsDeleted++;
        } catch (err) {
          failures++;
          this.stats.errorCount++;
          this.report(err);
        }
        continue;
      }

      for (const [memberId, member] of bucket.members) {
        if (this.aborting) {
          aborted = true;
          break sweep;
        }
        if (!Number.isFinite(member.timestamp)) continue;
        if (this.now() - member.timestamp < this.retentionWindowMs) continue;

        try {
          const result = await this.store.removeMember(key, memberId);
          if (!result.removed) continue;

          removed++;
          if (result.remaining === 0) bucketsDeleted++;
          this.emit('evicted', { ...key, memberId, bucketDeleted: result.remaining === 0 });
        } catch (err) {
          failures++;
          this.stats.errorCount++;
          this.report(err);
        }
      }
    }

    const finishedAt = new Date(this.now());
    try {
      await this.store.recordSweep({ timestamp: finishedAt.getTime(), removed });
    } catch (err) {
      this.stats.errorCount++;
      this.report(err);
    }

    this.stats.sweepCount++;
    this.stats.lastSweepAt = finishedAt;
    this.stats.lastRemoved = removed;
    this.stats.totalRemoved += removed;

    const report: SweepReport = { startedAt, finishedAt, removed, bucketsDeleted, failures, aborted };
    this.emit('sweep', report);
    return report;
  }

  /** 'error' without a listener would throw out of the sweep loop. */
  private report(err: unknown): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', err);
    }
  }
}
