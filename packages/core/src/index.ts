export { AlertStreamConsumer, parseStreamReply } from './consumer';
export type { AlertStreamConsumerConfig } from './consumer';
export { IngestionPipeline } from './ingestion';
export type { IngestionPipelineConfig, IngestOutcome } from './ingestion';
export { RetentionSweeper, RETENTION_WINDOW_MS } from './sweeper';
export { ManualPurge } from './purge';
export type { PurgeResult, PurgeFailureReason } from './purge';
export { deriveBucketId, formatCoordinate } from './bucket-key';
export { MemoryAggregationStore } from './memory-store';
export { GuardedStore } from './guarded-store';
export type { GuardedStoreOptions } from './guarded-store';
export {
  AggregationError,
  ValidationError,
  GeocodeError,
  StoreUnavailableError,
  errorMessage,
} from './errors';
export { withTimeout } from './timeout';
export {
  pathSegmentSchema,
  boundsSchema,
  bucketMemberSchema,
  parseAlertRecord,
  parseBucketMember,
  parseBounds,
  parseJson,
  formatLocalTime,
  toBucketMember,
} from './schema';

// Re-export types consumers need
export type {
  GeoPoint,
  LatLng,
  Bounds,
  AlertRecord,
  BucketMember,
  BucketKey,
  BucketSnapshot,
  SweepReport,
  SweepStats,
  IngestStats,
  StreamConsumerConfig,
  SweeperConfig,
  AddMemberResult,
  RemoveMemberResult,
  SweepRecord,
  IAggregationStore,
  GeocodeResult,
  IGeocoder,
} from '@alert-buckets/types';
