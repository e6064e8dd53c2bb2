import mongoose, { Model } from 'mongoose';
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
import { parseBounds, parseBucketMember } from '@alert-buckets/core';
import { getBucketModel, getSweepMetaModel, type IBucketDocument, type ISweepMetaDocument } from './schema';

export interface MongoAggregationStoreConfig {
  /** Existing Mongoose connection. If omitted, uses the default connection. */
  connection?: mongoose.Connection;
  /** Collection name for bucket documents. Default: "alert_buckets". */
  collectionName?: string;
}

const SWEEP_META_ID = 'sweep';
const MAX_ADD_ATTEMPTS = 3;

/**
 * MongoDB backend. Each bucket is one document holding its bounds, members
 * and counter, so every mutation is a single-document update.
 */
export class MongoAggregationStore implements IAggregationStore {
  private buckets: Model<IBucketDocument>;
  private meta: Model<ISweepMetaDocument>;

  constructor(config: MongoAggregationStoreConfig = {}) {
    this.buckets = getBucketModel(config.connection, config.collectionName);
    this.meta = getSweepMetaModel(config.connection, config.collectionName);
  }

  async bucketExists(key: BucketKey): Promise<boolean> {
    return (await this.buckets.exists(bucketFilter(key))) !== null;
  }

  async phenomenonExists(phenomenon: string): Promise<boolean> {
    return (await this.buckets.exists({ phenomenon })) !== null;
  }

  async createBucket(key: BucketKey, bounds: Bounds): Promise<boolean> {
    try {
      const result = await this.buckets.updateOne(
        bucketFilter(key),
        { $setOnInsert: { bounds, members: {}, counter: 0 } },
        { upsert: true }
      );
      return result.upsertedCount === 1;
    } catch (err) {
      // A concurrent create won the race
      if (isDuplicateKeyError(err)) return false;
      throw err;
    }
  }

  /**
   * Upsert guarded by `members.<id>: { $exists: false }`. When the filter
   * misses, the upsert collides with the unique index; that means either the
   * member is already there or another writer just created the bucket, in
   * which case the next attempt matches.
   */
  async addMember(
    key: BucketKey,
    memberId: string,
    member: BucketMember,
    bounds: Bounds
  ): Promise<AddMemberResult> {
    const path = `members.${memberId}`;

    for (let attempt = 0; attempt < MAX_ADD_ATTEMPTS; attempt++) {
      try {
        const doc = await this.buckets
          .findOneAndUpdate(
            { ...bucketFilter(key), [path]: { $exists: false } },
            { $set: { [path]: member }, $inc: { counter: 1 }, $setOnInsert: { bounds } },
            { upsert: true, new: true }
          )
          .select('counter')
          .lean();
        if (doc) return { added: true, counter: doc.counter };
      } catch (err) {
        if (!isDuplicateKeyError(err)) throw err;
      }

      const existing = await this.buckets.findOne(bucketFilter(key)).select(`counter ${path}`).lean();
      if (existing && hasMember(existing.members, memberId)) {
        return { added: false, counter: existing.counter };
      }
    }

    throw new Error(`Could not add ${memberId} to ${key.phenomenon}/${key.bucketId} after ${MAX_ADD_ATTEMPTS} attempts`);
  }

  async removeMember(key: BucketKey, memberId: string): Promise<RemoveMemberResult> {
    const path = `members.${memberId}`;
    const doc = await this.buckets
      .findOneAndUpdate(
        { ...bucketFilter(key), [path]: { $exists: true } },
        { $unset: { [path]: '' }, $inc: { counter: -1 } },
        { new: true }
      )
      .select('counter')
      .lean();

    if (!doc) {
      return { removed: false, remaining: await this.getCounter(key) };
    }

    if (doc.counter > 0) {
      return { removed: true, remaining: doc.counter };
    }

    // A member added in between keeps the bucket alive
    if (await this.deleteBucketIfEmpty(key)) {
      return { removed: true, remaining: 0 };
    }
    return { removed: true, remaining: await this.getCounter(key) };
  }

  async deleteBucket(key: BucketKey): Promise<boolean> {
    const result = await this.buckets.deleteOne(bucketFilter(key));
    return result.deletedCount === 1;
  }

  async deleteBucketIfEmpty(key: BucketKey): Promise<boolean> {
    const result = await this.buckets.deleteOne({ ...bucketFilter(key), counter: { $lte: 0 } });
    return result.deletedCount === 1;
  }

  async listBuckets(): Promise<BucketSnapshot[]> {
    const docs = await this.buckets.find({}).lean();

    return docs.map((doc) => {
      const members = new Map<string, BucketMember>();
      for (const [memberId, value] of Object.entries(doc.members ?? {})) {
        const member = parseBucketMember(value);
        if (member) members.set(memberId, member);
      }
      return {
        phenomenon: doc.phenomenon,
        bucketId: doc.bucketId,
        bounds: parseBounds(doc.bounds),
        members,
        counter: doc.counter,
      };
    });
  }

  async getCounter(key: BucketKey): Promise<number> {
    const doc = await this.buckets.findOne(bucketFilter(key)).select('counter').lean();
    return doc?.counter ?? 0;
  }

  async recordSweep(record: SweepRecord): Promise<void> {
    await this.meta.updateOne(
      { _id: SWEEP_META_ID },
      { $set: { lastCleanupTimestamp: record.timestamp, lastNumOfDeletedAlerts: record.removed } },
      { upsert: true }
    );
  }

  async initialize(): Promise<void> {
    await this.buckets.createIndexes();
  }

  async close(): Promise<void> {
    // The caller owns the connection
  }
}

function bucketFilter({ phenomenon, bucketId }: BucketKey) {
  return { phenomenon, bucketId };
}

function hasMember(members: Record<string, BucketMember> | undefined, memberId: string): boolean {
  return members !== undefined && Object.prototype.hasOwnProperty.call(members, memberId);
}

function isDuplicateKeyError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 11000;
}
