import mongoose from 'mongoose';
import type { IAggregationStore } from '@alert-buckets/types';
import {
  AlertStreamConsumer,
  GuardedStore,
  IngestionPipeline,
  ManualPurge,
  MemoryAggregationStore,
  RetentionSweeper,
  errorMessage,
} from '@alert-buckets/core';
import { RedisAggregationStore } from '@alert-buckets/provider-redis';
import { MongoAggregationStore } from '@alert-buckets/provider-mongo';
import { GoogleGeocoder } from '@alert-buckets/geocoder';
import { loadConfig, type ValidatedConfig } from './config';
import { Logger } from './logger';
import { createHttpServer } from './http';
import { installShutdownHandlers } from './signals';

async function createStore(config: ValidatedConfig, logger: Logger): Promise<IAggregationStore> {
  switch (config.store.driver) {
    case 'mongo': {
      await mongoose.connect(config.mongodb.uri ?? '');
      logger.info('Connected to MongoDB');
      return new MongoAggregationStore({ collectionName: config.mongodb.collectionName });
    }
    case 'memory':
      logger.warn('Using the in-memory store; aggregations are lost on restart');
      return new MemoryAggregationStore();
    case 'redis':
      return new RedisAggregationStore({ redis: config.redis.url, keyPrefix: config.store.keyPrefix });
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new Logger(config.logging.level, { service: 'alert-buckets' });

  logger.info('Starting alert aggregation service', {
    store: config.store.driver,
    streamKey: config.stream.key,
    consumerGroup: config.stream.consumerGroup,
    consumerId: config.stream.consumerId,
  });

  // The consumer opens its own connection: XREADGROUP BLOCK holds it
  const store = new GuardedStore(await createStore(config, logger), {
    timeoutMs: config.store.timeoutMs,
  });
  await store.initialize();

  const pipeline = new IngestionPipeline({
    store,
    geocoder: new GoogleGeocoder({
      apiKey: config.geocoder.apiKey,
      timeoutMs: config.geocoder.timeoutMs,
      language: config.geocoder.language,
    }),
    geocodeTimeoutMs: config.geocoder.timeoutMs,
    timeZone: config.display.timeZone,
  });

  const consumer = new AlertStreamConsumer({
    redis: config.redis.url,
    pipeline,
    streamKey: config.stream.key,
    consumerGroup: config.stream.consumerGroup,
    consumerId: config.stream.consumerId,
    batchSize: config.stream.batchSize,
    blockMs: config.stream.blockMs,
    pendingRetryMs: config.stream.pendingRetryMs,
  });

  const sweeper = new RetentionSweeper(store, {
    retentionWindowMs: config.retention.windowMs,
    intervalMs: config.retention.sweepIntervalMs,
  });

  // Wire events to logger
  const ingestLog = logger.child({ component: 'consumer' });
  consumer.on('started', () => ingestLog.info('Consumer started'));
  consumer.on('stopped', () => ingestLog.info('Consumer stopped'));
  consumer.on('recovery', (info) => ingestLog.info('PEL recovery', info));
  consumer.on('ingested', (outcome) => ingestLog.debug('Alert aggregated', outcome));
  consumer.on('duplicate', (outcome) => ingestLog.debug('Duplicate alert', outcome));
  consumer.on('warn', (detail) => ingestLog.warn('Consumer warning', { detail }));
  consumer.on('error', (err) => ingestLog.error('Consumer error', { error: errorMessage(err) }));

  const sweepLog = logger.child({ component: 'sweeper' });
  sweeper.on('evicted', (info) => sweepLog.debug('Evicted alert', info));
  sweeper.on('sweep', (report) => sweepLog.info('Sweep completed', report));
  sweeper.on('error', (err) => sweepLog.error('Sweep error', { error: errorMessage(err) }));

  let httpServer: ReturnType<typeof createHttpServer> | undefined;
  if (config.http.enabled) {
    httpServer = createHttpServer({
      port: config.http.port,
      sweeper,
      purge: new ManualPurge(store),
      ingestStats: () => consumer.getStats(),
      logger: logger.child({ component: 'http' }),
    });
  }

  installShutdownHandlers({
    logger,
    onShutdown: async () => {
      logger.info('Shutting down...');
      await Promise.all([consumer.stop(), sweeper.stop()]);
      const server = httpServer;
      if (server) {
        await new Promise<void>((resolve) => server.close(() => resolve()));
      }
      await store.close();
      if (config.store.driver === 'mongo') {
        await mongoose.disconnect();
      }
      logger.info('Shutdown complete');
    },
  });

  await consumer.start();
  sweeper.start();
  logger.info('Alert aggregation service is running');
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
