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
} from './core';

export type {
  AddMemberResult,
  RemoveMemberResult,
  SweepRecord,
  IAggregationStore,
  GeocodeResult,
  IGeocoder,
} from './provider';
