import type { Bounds, BucketKey, BucketMember, BucketSnapshot } from './core';

/**
 * Outcome of an addMember call.
 */
export interface AddMemberResult {
  /** False when the member id was already present (nothing changed) */
  added: boolean;

  /** Counter value after the call */
  counter: number;
}

/**
 * Outcome of a removeMember call.
 */
export interface RemoveMemberResult {
  /** False when the member was not there */
  removed: boolean;

  /** Counter value after the call. 0 after a removal means the bucket is gone. */
  remaining: number;
}

/**
 * Metrics persisted after each sweep.
 */
export interface SweepRecord {
  /** Sweep wall-clock time (epoch ms) */
  timestamp: number;

  /** Members evicted */
  removed: number;
}

/**
 * Core abstraction for aggregation backends.
 *
 * Every mutation is a single atomic operation against the backing store:
 * a member and its counter change together or not at all, so
 * `counter == |members|` holds whenever no call is in flight on a bucket.
 */
export interface IAggregationStore {
  /** True when the bucket exists (it may have zero members). */
  bucketExists(key: BucketKey): Promise<boolean>;

  /** True when at least one bucket exists for the phenomenon. */
  phenomenonExists(phenomenon: string): Promise<boolean>;

  /**
   * Create the bucket with the given bounds. Idempotent: an existing bucket
   * keeps the bounds it was created with.
   *
   * @returns true when this call created the bucket
   */
  createBucket(key: BucketKey, bounds: Bounds): Promise<boolean>;

  /**
   * Insert a member and increment the counter by one, atomically.
   *
   * A member id that is already present is a no-op. If the bucket was
   * removed since the caller checked for it, it is re-created with `bounds`
   * in the same step.
   *
   * @example
   * await store.addMember({ phenomenon: 'FLOOD', bucketId }, 'alert-1', member, bounds)
   */
  addMember(key: BucketKey, memberId: string, member: BucketMember, bounds: Bounds): Promise<AddMemberResult>;

  /**
   * Delete a member and decrement the counter, atomically. When the counter
   * reaches zero the whole bucket is deleted as part of the same operation.
   */
  removeMember(key: BucketKey, memberId: string): Promise<RemoveMemberResult>;

  /**
   * Delete the bucket with its bounds, members and counter.
   *
   * @returns false when there was no such bucket
   */
  deleteBucket(key: BucketKey): Promise<boolean>;

  /**
   * Delete the bucket only if it holds no members, checked and applied
   * atomically. Used to clear buckets left empty by an interrupted add.
   *
   * @returns true when this call deleted the bucket
   */
  deleteBucketIfEmpty(key: BucketKey): Promise<boolean>;

  /**
   * Snapshot of every bucket. May lag concurrent writers, but each member
   * in it is a complete record.
   */
  listBuckets(): Promise<BucketSnapshot[]>;

  /** Current counter for a bucket, or 0 if it does not exist. */
  getCounter(key: BucketKey): Promise<number>;

  /** Persist the metrics of the last sweep. */
  recordSweep(record: SweepRecord): Promise<void>;

  /**
   * Optional: Initialize store resources (indexes, connections, etc.)
   */
  initialize?(): Promise<void>;

  /**
   * Optional: Clean up resources on shutdown
   */
  close?(): Promise<void>;
}

/**
 * Place returned by reverse geocoding.
 */
export interface GeocodeResult {
  placeName: string;
  bounds: Bounds;
}

/**
 * Reverse-geocoding collaborator.
 */
export interface IGeocoder {
  /** Rejects when there is no usable result. */
  geocode(latitude: number, longitude: number): Promise<GeocodeResult>;
}
