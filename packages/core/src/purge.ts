import type { BucketKey, IAggregationStore } from '@alert-buckets/types';
import { StoreUnavailableError } from './errors';
import { pathSegmentSchema } from './schema';

export type PurgeFailureReason =
  | 'invalid-request'
  | 'phenomenon-not-found'
  | 'bucket-not-found'
  | 'member-not-found'
  | 'store-unavailable';

export type PurgeResult =
  | { success: true }
  | { success: false; reason: PurgeFailureReason; message: string };

const MESSAGES: Record<PurgeFailureReason, string> = {
  'invalid-request': 'Invalid phenomenon, bucket or alert id',
  'phenomenon-not-found': 'Phenomenon not found',
  'bucket-not-found': 'Bucket not found',
  'member-not-found': 'Alert not found',
  'store-unavailable': 'Store unavailable',
};

function fail(reason: PurgeFailureReason): PurgeResult {
  return { success: false, reason, message: MESSAGES[reason] };
}

/**
 * Operator-initiated removal of a whole bucket or a single alert.
 *
 * Both calls are idempotent and report a missing target as a result, naming
 * the level of the key that was absent, instead of throwing.
 */
export class ManualPurge {
  constructor(private readonly store: IAggregationStore) {}

  /** Remove a bucket with all its members. An empty bucket purges fine. */
  async purgeBucket(phenomenon: string, bucketId: string): Promise<PurgeResult> {
    if (!isSegment(phenomenon) || !isSegment(bucketId)) return fail('invalid-request');
    const key: BucketKey = { phenomenon, bucketId };

    return this.guard(async () => {
      if (!(await this.store.phenomenonExists(phenomenon))) return fail('phenomenon-not-found');
      if (!(await this.store.deleteBucket(key))) return fail('bucket-not-found');
      return { success: true };
    });
  }

  /** Remove one alert; removing the last one also removes the bucket. */
  async purgeMember(phenomenon: string, bucketId: string, alertId: string): Promise<PurgeResult> {
    if (!isSegment(phenomenon) || !isSegment(bucketId) || !isSegment(alertId)) {
      return fail('invalid-request');
    }
    const key: BucketKey = { phenomenon, bucketId };

    return this.guard(async () => {
      if (!(await this.store.phenomenonExists(phenomenon))) return fail('phenomenon-not-found');
      if (!(await this.store.bucketExists(key))) return fail('bucket-not-found');

      const result = await this.store.removeMember(key, alertId);
      return result.removed ? { success: true } : fail('member-not-found');
    });
  }

  private async guard(fn: () => Promise<PurgeResult>): Promise<PurgeResult> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StoreUnavailableError) return fail('store-unavailable');
      throw err;
    }
  }
}

function isSegment(value: string): boolean {
  return pathSegmentSchema.safeParse(value).success;
}
