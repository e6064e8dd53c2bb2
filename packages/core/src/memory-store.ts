import type {
  AddMemberResult,
  Bounds,
  BucketKey,
  BucketMember,
  BucketSnapshot,
  IAggregationStore,
  RemoveMemberResult,
  SweepRecord,
} from '@alert-buckets/types';

interface MemoryBucket {
  bounds: Bounds;
  members: Map<string, BucketMember>;
  counter: number;
}

/**
 * In-process aggregation store.
 *
 * Each mutation runs in one synchronous block with no await inside it, so no
 * other caller can observe a member without its counter update.
 */
export class MemoryAggregationStore implements IAggregationStore {
  private phenomena = new Map<string, Map<string, MemoryBucket>>();
  private lastSweep: SweepRecord | null = null;

  async bucketExists(key: BucketKey): Promise<boolean> {
    return this.find(key) !== undefined;
  }

  async phenomenonExists(phenomenon: string): Promise<boolean> {
    return this.phenomena.has(phenomenon);
  }

  async createBucket(key: BucketKey, bounds: Bounds): Promise<boolean> {
    if (this.find(key)) return false;
    this.insert(key, bounds);
    return true;
  }

  async addMember(
    key: BucketKey,
    memberId: string,
    member: BucketMember,
    bounds: Bounds
  ): Promise<AddMemberResult> {
    const bucket = this.find(key) ?? this.insert(key, bounds);
    if (bucket.members.has(memberId)) {
      return { added: false, counter: bucket.counter };
    }
    bucket.members.set(memberId, structuredClone(member));
    bucket.counter++;
    return { added: true, counter: bucket.counter };
  }

  async removeMember(key: BucketKey, memberId: string): Promise<RemoveMemberResult> {
    const bucket = this.find(key);
    if (!bucket || !bucket.members.delete(memberId)) {
      return { removed: false, remaining: bucket?.counter ?? 0 };
    }
    bucket.counter--;
    if (bucket.counter <= 0) {
      this.drop(key);
      return { removed: true, remaining: 0 };
    }
    return { removed: true, remaining: bucket.counter };
  }

  async deleteBucket(key: BucketKey): Promise<boolean> {
    if (!this.find(key)) return false;
    this.drop(key);
    return true;
  }

  async deleteBucketIfEmpty(key: BucketKey): Promise<boolean> {
    const bucket = this.find(key);
    if (!bucket || bucket.members.size > 0) return false;
    this.drop(key);
    return true;
  }

  async listBuckets(): Promise<BucketSnapshot[]> {
    const snapshots: BucketSnapshot[] = [];
    for (const [phenomenon, buckets] of this.phenomena) {
      for (const [bucketId, bucket] of buckets) {
        snapshots.push({
          phenomenon,
          bucketId,
          bounds: structuredClone(bucket.bounds),
          members: structuredClone(bucket.members),
          counter: bucket.counter,
        });
      }
    }
    return snapshots;
  }

  async getCounter(key: BucketKey): Promise<number> {
    return this.find(key)?.counter ?? 0;
  }

  async recordSweep(record: SweepRecord): Promise<void> {
    this.lastSweep = { ...record };
  }

  /** Metrics written by the most recent sweep, if any. */
  getLastSweep(): SweepRecord | null {
    return this.lastSweep;
  }

  private find(key: BucketKey): MemoryBucket | undefined {
    return this.phenomena.get(key.phenomenon)?.get(key.bucketId);
  }

  private insert(key: BucketKey, bounds: Bounds): MemoryBucket {
    let buckets = this.phenomena.get(key.phenomenon);
    if (!buckets) {
      buckets = new Map();
      this.phenomena.set(key.phenomenon, buckets);
    }
    const bucket: MemoryBucket = { bounds: structuredClone(bounds), members: new Map(), counter: 0 };
    buckets.set(key.bucketId, bucket);
    return bucket;
  }

  private drop(key: BucketKey): void {
    const buckets = this.phenomena.get(key.phenomenon);
    if (!buckets) return;
    buckets.delete(key.bucketId);
    if (buckets.size === 0) {
      this.phenomena.delete(key.phenomenon);
    }
  }
}
