export { MongoAggregationStore } from './provider';
export type { MongoAggregationStoreConfig } from './provider';
export { getBucketModel, getSweepMetaModel } from './schema';
export type { IBucketDocument, ISweepMetaDocument } from './schema';
