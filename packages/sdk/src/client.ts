import Redis from 'ioredis';
import type { AlertRecord } from '@alert-buckets/types';

const DEFAULT_STREAM_KEY = 'alerts:created';
const DEFAULT_MAX_LEN = 100_000;

/** An alert as submitted; the id travels beside it. */
export type AlertSubmission = Omit<AlertRecord, 'id'>;

export interface AlertClientConfig {
  /** Redis connection URL or ioredis instance. */
  redis: string | Redis;
  /** Stream key name. Default: "alerts:created". */
  streamKey?: string;
  /** Approximate max stream length for auto-trimming. Default: 100000. Set to 0 to disable. */
  maxStreamLength?: number;
}

/**
 * Producer side of the alert stream. Each submission becomes one entry with
 * an `id` field and the alert as JSON in `record`.
 *
 * Usage:
 * ```ts
 * const alerts = new AlertClient({ redis: 'redis://localhost:6379' });
 * await alerts.submit('alert-1', {
 *   location: { latitude: 37.98, longitude: 23.72 },
 *   phenomenon: 'FLOOD',
 *   timestamp: Date.now(),
 * });
 * await alerts.close();
 * ```
 */
export class AlertClient {
  private redis: Redis;
  private streamKey: string;
  private maxStreamLength: number;
  private ownsConnection: boolean;

  constructor(config: AlertClientConfig) {
    if (typeof config.redis === 'string') {
      this.redis = new Redis(config.redis);
      this.ownsConnection = true;
    } else {
      this.redis = config.redis;
      this.ownsConnection = false;
    }
    this.streamKey = config.streamKey ?? DEFAULT_STREAM_KEY;
    this.maxStreamLength = config.maxStreamLength ?? DEFAULT_MAX_LEN;
  }

  /**
   * Append an alert to the stream.
   *
   * @returns the stream entry id
   */
  async submit(id: string, alert: AlertSubmission): Promise<string> {
    const fields = ['id', id, 'record', JSON.stringify(alert)];

    const entryId = this.maxStreamLength > 0
      ? await this.redis.xadd(this.streamKey, 'MAXLEN', '~', String(this.maxStreamLength), '*', ...fields)
      : await this.redis.xadd(this.streamKey, '*', ...fields);

    if (entryId === null) {
      throw new Error(`XADD to ${this.streamKey} returned no entry id`);
    }
    return entryId;
  }

  /** Close the Redis connection (only if this client created it). */
  async close(): Promise<void> {
    if (this.ownsConnection) {
      await this.redis.quit();
    }
  }
}
