import mongoose, { Schema, Model } from 'mongoose';
import type { Bounds, BucketMember } from '@alert-buckets/types';

export interface IBucketDocument {
  phenomenon: string;
  bucketId: string;
  bounds: Bounds;
  /** Keyed by alert id */
  members: Record<string, BucketMember>;
  counter: number;
  updatedAt?: Date;
}

export interface ISweepMetaDocument {
  _id: string;
  lastCleanupTimestamp: number;
  lastNumOfDeletedAlerts: number;
}

const bucketSchema = new Schema<IBucketDocument>(
  {
    phenomenon: { type: String, required: true },
    bucketId: { type: String, required: true },
    bounds: { type: Schema.Types.Mixed, required: true },
    members: { type: Schema.Types.Mixed, default: {} },
    counter: { type: Number, required: true, default: 0 },
  },
  {
    timestamps: true,
    // An emptied bucket still has a members object until it is deleted
    minimize: false,
    collection: 'alert_buckets',
  }
);

bucketSchema.index({ phenomenon: 1, bucketId: 1 }, { unique: true });

const sweepMetaSchema = new Schema<ISweepMetaDocument>(
  {
    _id: { type: String, required: true },
    lastCleanupTimestamp: { type: Number, required: true },
    lastNumOfDeletedAlerts: { type: Number, required: true },
  },
  { collection: 'alert_buckets_meta' }
);

function getModel<T>(
  name: string,
  schema: Schema<T>,
  collectionName: string,
  connection?: mongoose.Connection
): Model<T> {
  if (connection) {
    try {
      return connection.model<T>(name);
    } catch {
      return connection.model<T>(name, withCollection(schema, collectionName));
    }
  }

  // Use default mongoose connection
  try {
    return mongoose.model<T>(name);
  } catch {
    return mongoose.model<T>(name, withCollection(schema, collectionName));
  }
}

function withCollection<T>(schema: Schema<T>, collectionName: string): Schema<T> {
  const clone = schema.clone();
  clone.set('collection', collectionName);
  return clone;
}

export function getBucketModel(
  connection?: mongoose.Connection,
  collectionName = 'alert_buckets'
): Model<IBucketDocument> {
  return getModel(`AlertBucket_${collectionName}`, bucketSchema, collectionName, connection);
}

/** Sweep metrics live beside the buckets in `<collectionName>_meta`. */
export function getSweepMetaModel(
  connection?: mongoose.Connection,
  collectionName = 'alert_buckets'
): Model<ISweepMetaDocument> {
  const metaCollection = `${collectionName}_meta`;
  return getModel(`AlertBucketMeta_${collectionName}`, sweepMetaSchema, metaCollection, connection);
}
