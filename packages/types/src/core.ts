/**
 * Geographic point as submitted by the reporting app.
 */
export interface GeoPoint {
  latitude: number;
  longitude: number;
}

/** Corner coordinate in the geocoder's shape. */
export interface LatLng {
  lat: number;
  lng: number;
}

/**
 * Rectangular extent of a geocoded place.
 */
export interface Bounds {
  northeast: LatLng;
  southwest: LatLng;
}

/**
 * One citizen submission. Every field is fixed once the record exists.
 */
export interface AlertRecord {
  /** Caller-assigned identifier; also the idempotency key for ingestion */
  id: string;

  location: GeoPoint;

  /** Hazard category (e.g., 'FLOOD', 'FIRE') */
  phenomenon: string;

  /** Submission time (epoch ms). Drives eviction. */
  timestamp: number;

  /** Opaque payload fields, stored as submitted */
  criticalLevel?: unknown;
  message?: unknown;
  imageURL?: unknown;
}

/**
 * The part of an AlertRecord kept inside a bucket, keyed by record id.
 */
export interface BucketMember {
  location: GeoPoint;
  timestamp: number;

  /** Submission time as "HH:MM" in the display time zone */
  time: string;

  criticalLevel?: unknown;
  message?: unknown;
  imageURL?: unknown;
}

/**
 * Identity of a bucket.
 */
export interface BucketKey {
  phenomenon: string;
  bucketId: string;
}

/**
 * Point-in-time view of a bucket returned by a full listing.
 */
export interface BucketSnapshot extends BucketKey {
  bounds: Bounds | null;
  members: Map<string, BucketMember>;
  counter: number;
}

/**
 * Result of a single sweep pass
 */
export interface SweepReport {
  startedAt: Date;
  finishedAt: Date;

  /** Members evicted in this pass */
  removed: number;

  /** Buckets removed because their last member was evicted or they were already empty */
  bucketsDeleted: number;

  /** Members whose eviction failed; retried by the next pass */
  failures: number;

  /** True when the pass was abandoned by stop() before it finished */
  aborted: boolean;
}

/**
 * Sweep statistics for monitoring
 */
export interface SweepStats {
  sweepCount: number;
  lastSweepAt?: Date;
  lastRemoved: number;
  totalRemoved: number;
  errorCount: number;
}

/**
 * Ingestion statistics for monitoring
 */
export interface IngestStats {
  /** Stream entries read, malformed ones included */
  eventsReceived: number;
  added: number;
  duplicates: number;
  dropped: number;
  errorCount: number;
  lastEventAt?: Date;
}

/**
 * Configuration for the stream consumer that feeds the ingestion pipeline.
 */
export interface StreamConsumerConfig {
  /** Stream key name. Default: "alerts:created" */
  streamKey?: string;

  /** Consumer group name. Default: "alert-aggregation-group" */
  consumerGroup?: string;

  /** Unique consumer ID within the group. Default: auto-generated */
  consumerId?: string;

  /** Entries read per XREADGROUP call. Default: 100 */
  batchSize?: number;

  /** How long one read blocks waiting for entries (ms). Default: 1000 */
  blockMs?: number;

  /** Delay before entries that failed are re-read from the pending list (ms). Default: 5000 */
  pendingRetryMs?: number;
}

/**
 * Configuration for the retention sweeper.
 */
export interface SweeperConfig {
  /** Age (ms) at which a member is evicted. Default: 86400000 */
  retentionWindowMs?: number;

  /** Time between scheduled sweeps (ms). Default: 3600000 */
  intervalMs?: number;

  /** Clock override, mostly for tests. Default: Date.now */
  now?: () => number;
}
