import Redis from 'ioredis';
import { EventEmitter } from 'events';
import type { IngestStats, StreamConsumerConfig } from '@alert-buckets/types';
import type { IngestionPipeline, IngestOutcome } from './ingestion';
import { parseJson } from './schema';

const DEFAULTS = {
  STREAM_KEY: 'alerts:created',
  GROUP_NAME: 'alert-aggregation-group',
  BATCH_SIZE: 100,
  BLOCK_MS: 1000,
  RETRY_DELAY_MS: 1000,
  PENDING_RETRY_MS: 5000,
};

export interface AlertStreamConsumerConfig extends StreamConsumerConfig {
  /** Redis connection URL string or an ioredis client instance */
  redis: string | Redis;

  pipeline: IngestionPipeline;
}

/** One XREADGROUP entry: stream id plus flat field/value list. */
type StreamEntry = [id: string, fields: string[]];

/**
 * Feeds alert-creation events from a Redis Stream into the ingestion
 * pipeline, using a consumer group.
 *
 * Delivery is at-least-once: an entry is ACK'd only once its outcome is
 * final (added, duplicate or dropped). Entries that fail on the store stay
 * in the Pending Entries List; the whole list is re-read on start and again
 * `pendingRetryMs` after a batch with failures.
 */
export class AlertStreamConsumer extends EventEmitter {
  private redis: Redis;
  private pipeline: IngestionPipeline;
  private running = false;
  private reading: Promise<void> | null = null;
  private ownsConnection: boolean;
  private retryDueAt: number | null = null;

  private readonly streamKey: string;
  private readonly groupName: string;
  private readonly consumerName: string;
  private readonly batchSize: number;
  private readonly blockMs: number;
  private readonly pendingRetryMs: number;

  private stats: IngestStats = {
    eventsReceived: 0,
    added: 0,
    duplicates: 0,
    dropped: 0,
    errorCount: 0,
    lastEventAt: undefined,
  };

  constructor(config: AlertStreamConsumerConfig) {
    super();
    if (typeof config.redis === 'string') {
      this.redis = new Redis(config.redis);
      this.ownsConnection = true;
    } else {
      this.redis = config.redis;
      this.ownsConnection = false;
    }
    this.pipeline = config.pipeline;

    this.streamKey = config.streamKey ?? DEFAULTS.STREAM_KEY;
    this.groupName = config.consumerGroup ?? DEFAULTS.GROUP_NAME;
    this.consumerName = config.consumerId ?? `consumer-${process.pid}-${Date.now()}`;
    this.batchSize = config.batchSize ?? DEFAULTS.BATCH_SIZE;
    this.blockMs = config.blockMs ?? DEFAULTS.BLOCK_MS;
    this.pendingRetryMs = config.pendingRetryMs ?? DEFAULTS.PENDING_RETRY_MS;
  }

  /** Start consuming from the Redis Stream. */
  async start(): Promise<void> {
    if (this.running) return;

    // MKSTREAM creates the stream if needed
    try {
      await this.redis.xgroup('CREATE', this.streamKey, this.groupName, '0', 'MKSTREAM');
    } catch (err) {
      if (!(err instanceof Error) || !err.message.includes('BUSYGROUP')) throw err;
    }

    this.running = true;
    this.emit('started');

    // Entries left pending by a previous run go first
    await this.recoverPending();

    this.reading = this.readLoop();
  }

  /** Stop reading, wait for the batch in flight, and release the connection. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    if (this.reading) {
      await this.reading;
      this.reading = null;
    }

    if (this.ownsConnection) {
      await this.redis.quit();
    }
    this.emit('stopped');
  }

  getStats(): Readonly<IngestStats> {
    return { ...this.stats };
  }

  // ─── Internal ────────────────────────────────────────────────────────────

  /**
   * Page through this consumer's Pending Entries List, starting at ID '0'
   * and continuing after the last entry returned, until a read comes back
   * empty. Entries that fail again stay pending behind the cursor.
   */
  private async recoverPending(): Promise<void> {
    let cursor = '0';
    let entryCount = 0;

    try {
      while (this.running) {
        const reply = await this.redis.xreadgroup(
          'GROUP', this.groupName, this.consumerName,
          'COUNT', this.batchSize,
          'STREAMS', this.streamKey, cursor
        );

        const entries = parseStreamReply(reply);
        if (entries.length === 0) break;

        entryCount += entries.length;
        await this.processBatch(entries);
        cursor = entries[entries.length - 1][0];
      }
    } catch (err) {
      this.stats.errorCount++;
      this.emit('error', err);
    }

    if (entryCount > 0) {
      this.emit('recovery', { entryCount });
    }
  }

  private async readLoop(): Promise<void> {
    while (this.running) {
      if (this.retryDueAt !== null && Date.now() >= this.retryDueAt) {
        this.retryDueAt = null;
        await this.recoverPending();
        continue;
      }

      try {
        const reply = await this.redis.xreadgroup(
          'GROUP', this.groupName, this.consumerName,
          'COUNT', this.batchSize,
          'BLOCK', this.blockMs,
          'STREAMS', this.streamKey, '>'
        );

        const entries = parseStreamReply(reply);
        if (entries.length > 0) {
          await this.processBatch(entries);
        }
      } catch (err) {
        this.stats.errorCount++;
        this.emit('error', err);
        await this.sleep(DEFAULTS.RETRY_DELAY_MS);
      }
    }
  }

  /**
   * Ingest a batch concurrently and ACK every entry whose outcome is final.
   */
  private async processBatch(entries: StreamEntry[]): Promise<void> {
    const settled = await Promise.all(entries.map(([id, fields]) => this.processEntry(id, fields)));
    const idsToAck = entries.filter((_, i) => settled[i]).map(([id]) => id);

    if (idsToAck.length < entries.length) {
      this.retryDueAt ??= Date.now() + this.pendingRetryMs;
    }

    if (idsToAck.length > 0) {
      await this.redis.xack(this.streamKey, this.groupName, ...idsToAck);
    }
  }

  /** Returns true when the entry may be ACK'd. */
  private async processEntry(entryId: string, fields: string[]): Promise<boolean> {
    this.stats.eventsReceived++;
    this.stats.lastEventAt = new Date();

    const event = this.parseEvent(fields);
    if (!event) {
      this.stats.dropped++;
      return true;
    }

    let outcome: IngestOutcome;
    try {
      outcome = await this.pipeline.ingest(event.id, event.payload);
    } catch (err) {
      // Left un-ACK'd for the next pending-list pass
      this.stats.errorCount++;
      this.emit('error', err);
      return false;
    }

    switch (outcome.status) {
      case 'added':
        this.stats.added++;
        this.emit('ingested', outcome);
        break;
      case 'duplicate':
        this.stats.duplicates++;
        this.emit('duplicate', outcome);
        break;
      case 'dropped':
        this.stats.dropped++;
        this.emit('warn', {
          message: 'Dropped alert',
          entryId,
          alertId: outcome.id,
          reason: outcome.reason,
          error: outcome.error.message,
        });
        break;
    }
    return true;
  }

  /**
   * Parse stream fields into an alert event: `id` plus the JSON `record`.
   */
  private parseEvent(fields: string[]): { id: string; payload: unknown } | null {
    let id: string | undefined;
    let record: string | undefined;

    for (let i = 0; i < fields.length; i += 2) {
      switch (fields[i]) {
        case 'id': id = fields[i + 1]; break;
        case 'record': record = fields[i + 1]; break;
      }
    }

    const payload = parseJson(record);
    if (!id || payload === undefined) {
      this.emit('warn', { message: 'Dropped malformed event', fields });
      return null;
    }
    return { id, payload };
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Flatten an XREADGROUP reply (`[[stream, [[id, fields], ...]], ...]`) into
 * its entries, skipping anything that does not have that shape.
 */
export function parseStreamReply(reply: unknown): StreamEntry[] {
  if (!Array.isArray(reply)) return [];

  const entries: StreamEntry[] = [];
  for (const stream of reply) {
    if (!Array.isArray(stream) || !Array.isArray(stream[1])) continue;
    for (const entry of stream[1]) {
      if (!Array.isArray(entry)) continue;
      const [id, fields] = entry;
      if (typeof id !== 'string' || !Array.isArray(fields)) continue;
      entries.push([id, fields.filter((f): f is string => typeof f === 'string')]);
    }
  }
  return entries;
}
