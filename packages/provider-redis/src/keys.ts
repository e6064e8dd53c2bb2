import type { BucketKey } from '@alert-buckets/types';

/** Key builders for the aggregation namespace. */
export function createKeys(prefix = '') {
  const bucket = ({ phenomenon, bucketId }: BucketKey) => `${prefix}aggregation/${phenomenon}/${bucketId}`;

  return {
    bounds: (key: BucketKey) => `${bucket(key)}/bounds`,
    members: (key: BucketKey) => `${bucket(key)}/members`,
    counter: ({ phenomenon, bucketId }: BucketKey) =>
      `${prefix}aggregationCounts/${phenomenon}/${bucketId}/counter`,
    /** Set of phenomena that have at least one bucket */
    phenomena: () => `${prefix}aggregationIndex`,
    /** Set of bucket ids under one phenomenon */
    buckets: (phenomenon: string) => `${prefix}aggregationIndex/${phenomenon}`,
    lastCleanupTimestamp: () => `${prefix}aggregationMeta/lastCleanupTimestamp`,
    lastNumOfDeletedAlerts: () => `${prefix}aggregationMeta/lastNumOfDeletedAlerts`,
  };
}

export type AggregationKeys = ReturnType<typeof createKeys>;
