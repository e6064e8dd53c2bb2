export { RedisAggregationStore } from './provider';
export type { RedisAggregationStoreConfig } from './provider';
export { createKeys } from './keys';
export type { AggregationKeys } from './keys';
