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
import { StoreUnavailableError, errorMessage } from './errors';
import { withTimeout } from './timeout';

const DEFAULT_TIMEOUT_MS = 5000;

export interface GuardedStoreOptions {
  /** Bound on every store call (ms). Default: 5000 */
  timeoutMs?: number;
}

/**
 * Wraps a store so that every call is bounded in time and every failure
 * surfaces as a StoreUnavailableError carrying the original as its cause.
 */
export class GuardedStore implements IAggregationStore {
  private readonly timeoutMs: number;

  constructor(private readonly inner: IAggregationStore, options: GuardedStoreOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  bucketExists(key: BucketKey): Promise<boolean> {
    return this.call('bucketExists', () => this.inner.bucketExists(key));
  }

  phenomenonExists(phenomenon: string): Promise<boolean> {
    return this.call('phenomenonExists', () => this.inner.phenomenonExists(phenomenon));
  }

  createBucket(key: BucketKey, bounds: Bounds): Promise<boolean> {
    return this.call('createBucket', () => this.inner.createBucket(key, bounds));
  }

  addMember(key: BucketKey, memberId: string, member: BucketMember, bounds: Bounds): Promise<AddMemberResult> {
    return this.call('addMember', () => this.inner.addMember(key, memberId, member, bounds));
  }

  removeMember(key: BucketKey, memberId: string): Promise<RemoveMemberResult> {
    return this.call('removeMember', () => this.inner.removeMember(key, memberId));
  }

  deleteBucket(key: BucketKey): Promise<boolean> {
    return this.call('deleteBucket', () => this.inner.deleteBucket(key));
  }

  deleteBucketIfEmpty(key: BucketKey): Promise<boolean> {
    return this.call('deleteBucketIfEmpty', () => this.inner.deleteBucketIfEmpty(key));
  }

  listBuckets(): Promise<BucketSnapshot[]> {
    return this.call('listBuckets', () => this.inner.listBuckets());
  }

  getCounter(key: BucketKey): Promise<number> {
    return this.call('getCounter', () => this.inner.getCounter(key));
  }

  recordSweep(record: SweepRecord): Promise<void> {
    return this.call('recordSweep', () => this.inner.recordSweep(record));
  }

  async initialize(): Promise<void> {
    const initialize = this.inner.initialize?.bind(this.inner);
    if (initialize) {
      await this.call('initialize', initialize);
    }
  }

  async close(): Promise<void> {
    if (this.inner.close) {
      await this.inner.close();
    }
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(
        fn(),
        this.timeoutMs,
        () => new StoreUnavailableError(`Store ${operation} timed out after ${this.timeoutMs}ms`)
      );
    } catch (err) {
      if (err instanceof StoreUnavailableError) throw err;
      throw new StoreUnavailableError(`Store ${operation} failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
