import Redis from 'ioredis';
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
import { parseBounds, parseBucketMember, parseJson } from '@alert-buckets/core';
import { createKeys, type AggregationKeys } from './keys';
import { ADD_MEMBER, CREATE_BUCKET, DELETE_BUCKET, DELETE_BUCKET_IF_EMPTY, REMOVE_MEMBER } from './scripts';

export interface RedisAggregationStoreConfig {
  /** Redis connection URL or ioredis instance. */
  redis: string | Redis;
  /** Prepended to every key, e.g. "prod:". Default: "". */
  keyPrefix?: string;
}

/**
 * Redis backend laid out as the aggregation hierarchy:
 *
 * ```
 * aggregation/<phenomenon>/<bucketId>/bounds        string (JSON)
 * aggregation/<phenomenon>/<bucketId>/members       hash   id -> member JSON
 * aggregationCounts/<phenomenon>/<bucketId>/counter string (integer)
 * ```
 *
 * Every mutation is one Lua script, so members, counter, bounds and the
 * indexes change together.
 */
export class RedisAggregationStore implements IAggregationStore {
  private redis: Redis;
  private ownsConnection: boolean;
  private keys: AggregationKeys;

  constructor(config: RedisAggregationStoreConfig) {
    if (typeof config.redis === 'string') {
      this.redis = new Redis(config.redis);
      this.ownsConnection = true;
    } else {
      this.redis = config.redis;
      this.ownsConnection = false;
    }
    this.keys = createKeys(config.keyPrefix);
  }

  async bucketExists(key: BucketKey): Promise<boolean> {
    return (await this.redis.sismember(this.keys.buckets(key.phenomenon), key.bucketId)) === 1;
  }

  async phenomenonExists(phenomenon: string): Promise<boolean> {
    return (await this.redis.scard(this.keys.buckets(phenomenon))) > 0;
  }

  async createBucket(key: BucketKey, bounds: Bounds): Promise<boolean> {
    const reply = await this.run(CREATE_BUCKET, key, JSON.stringify(bounds), key.bucketId, key.phenomenon);
    return toInteger(reply) === 1;
  }

  async addMember(
    key: BucketKey,
    memberId: string,
    member: BucketMember,
    bounds: Bounds
  ): Promise<AddMemberResult> {
    const reply = await this.run(
      ADD_MEMBER, key,
      memberId, JSON.stringify(member), JSON.stringify(bounds), key.bucketId, key.phenomenon
    );
    const [added, counter] = toPair(reply);
    return { added: added === 1, counter };
  }

  async removeMember(key: BucketKey, memberId: string): Promise<RemoveMemberResult> {
    const reply = await this.run(REMOVE_MEMBER, key, memberId, key.bucketId, key.phenomenon);
    const [removed, remaining] = toPair(reply);
    return { removed: removed === 1, remaining };
  }

  async deleteBucket(key: BucketKey): Promise<boolean> {
    const reply = await this.run(DELETE_BUCKET, key, key.bucketId, key.phenomenon);
    return toInteger(reply) === 1;
  }

  async deleteBucketIfEmpty(key: BucketKey): Promise<boolean> {
    const reply = await this.run(DELETE_BUCKET_IF_EMPTY, key, key.bucketId, key.phenomenon);
    return toInteger(reply) === 1;
  }

  /**
   * Walk the indexes, then read every bucket in one pipeline. Buckets removed
   * between the two steps are left out.
   */
  async listBuckets(): Promise<BucketSnapshot[]> {
    const keys: BucketKey[] = [];
    for (const phenomenon of await this.redis.smembers(this.keys.phenomena())) {
      for (const bucketId of await this.redis.smembers(this.keys.buckets(phenomenon))) {
        keys.push({ phenomenon, bucketId });
      }
    }
    if (keys.length === 0) return [];

    const pipeline = this.redis.pipeline();
    for (const key of keys) {
      pipeline.get(this.keys.bounds(key)).hgetall(this.keys.members(key)).get(this.keys.counter(key));
    }
    const results = (await pipeline.exec()) ?? [];

    const snapshots: BucketSnapshot[] = [];
    keys.forEach((key, i) => {
      const [boundsReply, membersReply, counterReply] = [0, 1, 2].map((offset) => {
        const [err, value] = results[i * 3 + offset] ?? [null, null];
        if (err) throw err;
        return value;
      });

      if (typeof boundsReply !== 'string') return;

      const members = new Map<string, BucketMember>();
      if (isStringRecord(membersReply)) {
        for (const [memberId, json] of Object.entries(membersReply)) {
          const member = parseBucketMember(parseJson(json));
          if (member) members.set(memberId, member);
        }
      }

      snapshots.push({
        ...key,
        bounds: parseBounds(parseJson(boundsReply)),
        members,
        counter: toInteger(counterReply),
      });
    });
    return snapshots;
  }

  async getCounter(key: BucketKey): Promise<number> {
    return toInteger(await this.redis.get(this.keys.counter(key)));
  }

  async recordSweep(record: SweepRecord): Promise<void> {
    await this.redis
      .multi()
      .set(this.keys.lastCleanupTimestamp(), String(record.timestamp))
      .set(this.keys.lastNumOfDeletedAlerts(), String(record.removed))
      .exec();
  }

  /** Close the Redis connection (only if this store created it). */
  async close(): Promise<void> {
    if (this.ownsConnection) {
      await this.redis.quit();
    }
  }

  private run(script: string, key: BucketKey, ...args: string[]): Promise<unknown> {
    return this.redis.eval(
      script, 5,
      this.keys.bounds(key),
      this.keys.members(key),
      this.keys.counter(key),
      this.keys.buckets(key.phenomenon),
      this.keys.phenomena(),
      ...args
    );
  }
}

function toInteger(value: unknown): number {
  const n = typeof value === 'number' ? value : typeof value === 'string' ? parseInt(value, 10) : NaN;
  return Number.isFinite(n) ? n : 0;
}

function toPair(reply: unknown): [number, number] {
  if (!Array.isArray(reply) || reply.length < 2) {
    throw new Error(`Unexpected script reply: ${JSON.stringify(reply)}`);
  }
  return [toInteger(reply[0]), toInteger(reply[1])];
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    && Object.values(value).every((v) => typeof v === 'string');
}
