import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { BucketMember, GeocodeResult } from '@alert-buckets/types';
import { RetentionSweeper, RETENTION_WINDOW_MS } from './sweeper';
import { MemoryAggregationStore } from './memory-store';
import { IngestionPipeline } from './ingestion';
import { deriveBucketId } from './bucket-key';

const HOUR = 3_600_000;
const NOW = Date.UTC(2024, 0, 15, 12, 0);

const BOUNDS = {
  northeast: { lat: 38, lng: 24 },
  southwest: { lat: 37, lng: 23 },
};

const KEY = { phenomenon: 'FLOOD', bucketId: 'abc123' };

function member(timestamp: number): BucketMember {
  return { location: { latitude: 37.98, longitude: 23.72 }, timestamp, time: '12:00' };
}

describe('RetentionSweeper', () => {
  let store: MemoryAggregationStore;
  let clock: number;

  beforeEach(() => {
    store = new MemoryAggregationStore();
    clock = NOW;
  });

  function createSweeper(overrides = {}) {
    return new RetentionSweeper(store, { now: () => clock, ...overrides });
  }

  describe('sweep', () => {
    it('should evict only members older than the retention window', async () => {
      await store.addMember(KEY, 'old', member(NOW - 25 * HOUR), BOUNDS);
      await store.addMember(KEY, 'fresh', member(NOW - HOUR), BOUNDS);

      const report = await createSweeper().sweep();

      expect(report.removed).toBe(1);
      expect(report.bucketsDeleted).toBe(0);
      expect(report.failures).toBe(0);
      expect(await store.getCounter(KEY)).toBe(1);

      const [bucket] = await store.listBuckets();
      expect([...bucket.members.keys()]).toEqual(['fresh']);
    });

    it('should evict a member exactly at the retention boundary', async () => {
      await store.addMember(KEY, 'edge', member(NOW - RETENTION_WINDOW_MS), BOUNDS);
      await store.addMember(KEY, 'inside', member(NOW - RETENTION_WINDOW_MS + 1), BOUNDS);

      const report = await createSweeper().sweep();

      expect(report.removed).toBe(1);
      const [bucket] = await store.listBuckets();
      expect([...bucket.members.keys()]).toEqual(['inside']);
    });

    it('should remove a bucket together with its last member', async () => {
      await store.addMember(KEY, 'a1', member(NOW - 30 * HOUR), BOUNDS);
      await store.addMember(KEY, 'a2', member(NOW - 26 * HOUR), BOUNDS);
      const other = { phenomenon: 'FIRE', bucketId: 'def456' };
      await store.addMember(other, 'b1', member(NOW - HOUR), BOUNDS);

      const report = await createSweeper().sweep();

      expect(report.removed).toBe(2);
      expect(report.bucketsDeleted).toBe(1);
      const buckets = await store.listBuckets();
      expect(buckets.map((b) => b.bucketId)).toEqual(['def456']);
      expect(await store.phenomenonExists('FLOOD')).toBe(false);
    });

    it('should clear a bucket left empty by an interrupted add', async () => {
      await store.createBucket(KEY, BOUNDS);
      const other = { phenomenon: 'FIRE', bucketId: 'def456' };
      await store.addMember(other, 'b1', member(NOW - HOUR), BOUNDS);

      const report = await createSweeper().sweep();

      expect(report.removed).toBe(0);
      expect(report.bucketsDeleted).toBe(1);
      expect(await store.bucketExists(KEY)).toBe(false);
      expect(await store.phenomenonExists('FLOOD')).toBe(false);
      expect(await store.getCounter(other)).toBe(1);
    });

    it('should keep an empty bucket that gains a member during the sweep', async () => {
      await store.createBucket(KEY, BOUNDS);
      const listBuckets = store.listBuckets.bind(store);
      vi.spyOn(store, 'listBuckets').mockImplementationOnce(async () => {
        const snapshot = await listBuckets();
        await store.addMember(KEY, 'late', member(NOW), BOUNDS);
        return snapshot;
      });

      const report = await createSweeper().sweep();

      expect(report.bucketsDeleted).toBe(0);
      expect(await store.getCounter(KEY)).toBe(1);
    });

    it('should count a failed empty-bucket delete and retry it next pass', async () => {
      await store.createBucket(KEY, BOUNDS);
      vi.spyOn(store, 'deleteBucketIfEmpty').mockRejectedValueOnce(new Error('timeout'));
      const sweeper = createSweeper();

      expect(await sweeper.sweep()).toMatchObject({ bucketsDeleted: 0, failures: 1 });
      expect(await sweeper.sweep()).toMatchObject({ bucketsDeleted: 1, failures: 0 });
      expect(await store.bucketExists(KEY)).toBe(false);
    });

    it('should honour a custom retention window', async () => {
      await store.addMember(KEY, 'a1', member(NOW - 2 * HOUR), BOUNDS);

      const report = await createSweeper({ retentionWindowMs: HOUR }).sweep();
      expect(report.removed).toBe(1);
    });

    it('should record the sweep time and removal count', async () => {
      await store.addMember(KEY, 'a1', member(NOW - 25 * HOUR), BOUNDS);

      const report = await createSweeper().sweep();

      expect(report.finishedAt.getTime()).toBe(NOW);
      expect(store.getLastSweep()).toEqual({ timestamp: NOW, removed: 1 });
    });

    it('should keep going when one eviction fails', async () => {
      await store.addMember(KEY, 'a1', member(NOW - 25 * HOUR), BOUNDS);
      await store.addMember(KEY, 'a2', member(NOW - 25 * HOUR), BOUNDS);
      vi.spyOn(store, 'removeMember').mockRejectedValueOnce(new Error('timeout'));

      const sweeper = createSweeper();
      const errors: unknown[] = [];
      sweeper.on('error', (err) => errors.push(err));

      const report = await sweeper.sweep();

      expect(report.removed).toBe(1);
      expect(report.failures).toBe(1);
      expect(errors).toHaveLength(1);
      expect(await store.getCounter(KEY)).toBe(1);
      expect(sweeper.getStats().errorCount).toBe(1);
    });

    it('should reject when the bucket listing fails', async () => {
      vi.spyOn(store, 'listBuckets').mockRejectedValueOnce(new Error('store down'));

      const sweeper = createSweeper();
      await expect(sweeper.sweep()).rejects.toThrow('store down');
      expect(sweeper.getStats().errorCount).toBe(1);
      expect(store.getLastSweep()).toBeNull();
    });

    it('should not evict a member added after the listing was taken', async () => {
      await store.addMember(KEY, 'old', member(NOW - 25 * HOUR), BOUNDS);
      const listBuckets = store.listBuckets.bind(store);
      vi.spyOn(store, 'listBuckets').mockImplementationOnce(async () => {
        const snapshot = await listBuckets();
        await store.addMember(KEY, 'late', member(NOW - 25 * HOUR), BOUNDS);
        return snapshot;
      });

      const report = await createSweeper().sweep();

      expect(report.removed).toBe(1);
      const [bucket] = await store.listBuckets();
      expect([...bucket.members.keys()]).toEqual(['late']);
      expect(bucket.counter).toBe(1);
    });

    it('should share a pass already in flight', async () => {
      await store.addMember(KEY, 'a1', member(NOW - 25 * HOUR), BOUNDS);
      const sweeper = createSweeper();
      const listSpy = vi.spyOn(store, 'listBuckets');

      const [first, second] = await Promise.all([sweeper.sweep(), sweeper.sweep()]);

      expect(first).toBe(second);
      expect(listSpy).toHaveBeenCalledOnce();
      expect(sweeper.getStats().sweepCount).toBe(1);
    });

    it('should emit evicted and sweep events', async () => {
      await store.addMember(KEY, 'a1', member(NOW - 25 * HOUR), BOUNDS);
      const sweeper = createSweeper();
      const evicted = vi.fn();
      const swept = vi.fn();
      sweeper.on('evicted', evicted);
      sweeper.on('sweep', swept);

      await sweeper.sweep();

      expect(evicted).toHaveBeenCalledWith({ ...KEY, memberId: 'a1', bucketDeleted: true });
      expect(swept).toHaveBeenCalledOnce();
      expect(swept.mock.calls[0][0]).toMatchObject({ removed: 1, bucketsDeleted: 1, aborted: false });
    });

    it('should accumulate stats across passes', async () => {
      await store.addMember(KEY, 'a1', member(NOW - 25 * HOUR), BOUNDS);
      const sweeper = createSweeper();

      await sweeper.sweep();
      await store.addMember(KEY, 'a2', member(NOW - 25 * HOUR), BOUNDS);
      await store.addMember(KEY, 'a3', member(NOW - 25 * HOUR), BOUNDS);
      await sweeper.sweep();

      const stats = sweeper.getStats();
      expect(stats.sweepCount).toBe(2);
      expect(stats.lastRemoved).toBe(2);
      expect(stats.totalRemoved).toBe(3);
      expect(stats.lastSweepAt?.getTime()).toBe(NOW);
    });
  });

  describe('end to end', () => {
    it('should expire an ingested alert one window later and then do nothing', async () => {
      const T = NOW;
      const place: GeocodeResult = { placeName: 'Kolonaki', bounds: BOUNDS };
      const pipeline = new IngestionPipeline({
        store,
        geocoder: { geocode: vi.fn().mockResolvedValue(place) },
        now: () => clock,
      });

      await pipeline.ingest('alert-1', {
        location: { latitude: 37.98, longitude: 23.72 },
        phenomenon: 'FLOOD',
        timestamp: T,
      });
      const key = { phenomenon: 'FLOOD', bucketId: deriveBucketId('Kolonaki', BOUNDS) };
      expect(await store.getCounter(key)).toBe(1);

      clock = T + 86_400_001;
      const sweeper = createSweeper();
      const first = await sweeper.sweep();
      expect(first.removed).toBe(1);
      expect(first.bucketsDeleted).toBe(1);
      expect(await store.listBuckets()).toEqual([]);

      const second = await sweeper.sweep();
      expect(second.removed).toBe(0);
      expect(second.failures).toBe(0);
    });
  });

  describe('schedule', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should sweep on every interval until stopped', async () => {
      const sweeper = createSweeper({ intervalMs: 1000 });
      const swept = vi.fn();
      sweeper.on('sweep', swept);

      sweeper.start();
      await vi.advanceTimersByTimeAsync(1000);
      expect(swept).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1000);
      expect(swept).toHaveBeenCalledTimes(2);

      await sweeper.stop();
      await vi.advanceTimersByTimeAsync(5000);
      expect(swept).toHaveBeenCalledTimes(2);
    });

    it('should report a failed scheduled pass and keep the schedule', async () => {
      vi.spyOn(store, 'listBuckets').mockRejectedValueOnce(new Error('store down'));
      const sweeper = createSweeper({ intervalMs: 1000 });
      const errors: unknown[] = [];
      const swept = vi.fn();
      sweeper.on('error', (err) => errors.push(err));
      sweeper.on('sweep', swept);

      sweeper.start();
      await vi.advanceTimersByTimeAsync(1000);
      expect(errors).toHaveLength(1);

      await vi.advanceTimersByTimeAsync(1000);
      expect(swept).toHaveBeenCalledOnce();

      await sweeper.stop();
    });

    it('should emit started and stopped events', async () => {
      const sweeper = createSweeper();
      const started = vi.fn();
      const stopped = vi.fn();
      sweeper.on('started', started);
      sweeper.on('stopped', stopped);

      sweeper.start();
      sweeper.start();
      expect(started).toHaveBeenCalledOnce();

      await sweeper.stop();
      expect(stopped).toHaveBeenCalledOnce();
    });
  });

  describe('stop', () => {
    it('should abandon the pass in flight at the next member', async () => {
      await store.addMember(KEY, 'a1', member(NOW - 25 * HOUR), BOUNDS);
      await store.addMember(KEY, 'a2', member(NOW - 25 * HOUR), BOUNDS);

      const sweeper = createSweeper();
      let release: () => void = () => {};
      const removeMember = store.removeMember.bind(store);
      vi.spyOn(store, 'removeMember').mockImplementationOnce(async (key, id) => {
        await new Promise<void>((resolve) => { release = resolve; });
        return removeMember(key, id);
      });

      const pass = sweeper.sweep();
      await new Promise((resolve) => setTimeout(resolve, 0));
      const stopping = sweeper.stop();
      release();

      const report = await pass;
      await stopping;

      expect(report.aborted).toBe(true);
      expect(report.removed).toBe(1);
      expect(await store.getCounter(KEY)).toBe(1);
    });
  });
});
