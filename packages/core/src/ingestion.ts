import type { AlertRecord, BucketKey, GeocodeResult, IAggregationStore, IGeocoder } from '@alert-buckets/types';
import { deriveBucketId } from './bucket-key';
import { GeocodeError, ValidationError, errorMessage } from './errors';
import { parseAlertRecord, toBucketMember } from './schema';
import { withTimeout } from './timeout';

const DEFAULTS = {
  GEOCODE_TIMEOUT_MS: 5000,
  TIME_ZONE: 'Europe/Athens',
};

export interface IngestionPipelineConfig {
  store: IAggregationStore;
  geocoder: IGeocoder;

  /** Bound on a single geocoding call (ms). Default: 5000 */
  geocodeTimeoutMs?: number;

  /** IANA zone used for the member's "HH:MM" time. Default: "Europe/Athens" */
  timeZone?: string;

  /** Clock used when an alert carries no timestamp. Default: Date.now */
  now?: () => number;
}

export type IngestOutcome =
  | { status: 'added'; id: string; key: BucketKey; placeName: string; counter: number; created: boolean }
  | { status: 'duplicate'; id: string; key: BucketKey; counter: number }
  | { status: 'dropped'; id: string; reason: 'validation' | 'geocode'; error: ValidationError | GeocodeError };

/**
 * Places newly created alerts into their (phenomenon, place) bucket.
 *
 * Safe to call more than once for the same alert: the record id is the
 * idempotency key, so a redelivered event never bumps the counter twice.
 * Validation and geocoding failures come back as `dropped` outcomes; store
 * failures are thrown as StoreUnavailableError for the trigger to retry.
 */
export class IngestionPipeline {
  private readonly store: IAggregationStore;
  private readonly geocoder: IGeocoder;
  private readonly geocodeTimeoutMs: number;
  private readonly timeZone: string;
  private readonly now: () => number;

  constructor(config: IngestionPipelineConfig) {
    this.store = config.store;
    this.geocoder = config.geocoder;
    this.geocodeTimeoutMs = config.geocodeTimeoutMs ?? DEFAULTS.GEOCODE_TIMEOUT_MS;
    this.timeZone = config.timeZone ?? DEFAULTS.TIME_ZONE;
    this.now = config.now ?? Date.now;
  }

  async ingest(id: string, payload: unknown): Promise<IngestOutcome> {
    let record: AlertRecord;
    try {
      record = parseAlertRecord(id, payload, this.now());
    } catch (err) {
      if (err instanceof ValidationError) {
        return { status: 'dropped', id, reason: 'validation', error: err };
      }
      throw err;
    }

    let place: GeocodeResult;
    try {
      place = await this.geocode(record);
    } catch (err) {
      const error = err instanceof GeocodeError
        ? err
        : new GeocodeError(`Geocoding failed for alert ${id}: ${errorMessage(err)}`, { cause: err });
      return { status: 'dropped', id, reason: 'geocode', error };
    }

    const key: BucketKey = {
      phenomenon: record.phenomenon,
      bucketId: deriveBucketId(place.placeName, place.bounds),
    };

    // A zero-member bucket left behind by an interrupted call is valid:
    // addMember fills it, or the sweeper's conditional delete clears it.
    let created = false;
    if (!(await this.store.bucketExists(key))) {
      created = await this.store.createBucket(key, place.bounds);
    }

    const member = toBucketMember(record, this.timeZone);
    const result = await this.store.addMember(key, record.id, member, place.bounds);

    if (!result.added) {
      return { status: 'duplicate', id, key, counter: result.counter };
    }
    return { status: 'added', id, key, placeName: place.placeName, counter: result.counter, created };
  }

  private async geocode(record: AlertRecord): Promise<GeocodeResult> {
    const { latitude, longitude } = record.location;
    return withTimeout(
      this.geocoder.geocode(latitude, longitude),
      this.geocodeTimeoutMs,
      () => new GeocodeError(`Geocoding timed out after ${this.geocodeTimeoutMs}ms`)
    );
  }
}
