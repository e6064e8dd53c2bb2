import { z } from 'zod';
import type { AlertRecord, Bounds, BucketMember, GeoPoint, LatLng } from '@alert-buckets/types';
import { ValidationError } from './errors';

/**
 * Identifiers double as store path segments, so they may not contain the
 * separators or reserved characters of a hierarchical key.
 */
export const pathSegmentSchema = z
  .string()
  .min(1)
  .max(256)
  .regex(/^[^.#$/[\]\u0000-\u001f\u007f]+$/, 'must not contain . # $ / [ ] or control characters');

const latLngSchema: z.ZodType<LatLng> = z.object({
  lat: z.number().finite(),
  lng: z.number().finite(),
});

export const boundsSchema: z.ZodType<Bounds> = z.object({
  northeast: latLngSchema,
  southwest: latLngSchema,
});

const geoPointSchema: z.ZodType<GeoPoint> = z.object({
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180),
});

// Carried through as submitted
const payloadFields = {
  criticalLevel: z.unknown(),
  message: z.unknown(),
  imageURL: z.unknown(),
};

export const bucketMemberSchema: z.ZodType<BucketMember> = z.object({
  location: geoPointSchema,
  timestamp: z.number().finite(),
  time: z.string(),
  ...payloadFields,
});

const alertPayloadSchema = z.object({
  location: geoPointSchema,
  phenomenon: pathSegmentSchema,
  timestamp: z.number().int().nonnegative().optional(),
  ...payloadFields,
});

/**
 * Validate an incoming alert event. A missing timestamp falls back to
 * `receivedAt`.
 *
 * @throws ValidationError
 */
export function parseAlertRecord(id: string, payload: unknown, receivedAt: number): AlertRecord {
  const idResult = pathSegmentSchema.safeParse(id);
  if (!idResult.success) {
    throw new ValidationError(`Invalid alert id: ${formatIssues(idResult.error)}`);
  }

  const result = alertPayloadSchema.safeParse(payload);
  if (!result.success) {
    throw new ValidationError(`Invalid alert ${id}: ${formatIssues(result.error)}`);
  }

  const { location, phenomenon, timestamp, criticalLevel, message, imageURL } = result.data;
  return {
    id,
    location,
    phenomenon,
    timestamp: timestamp ?? receivedAt,
    criticalLevel,
    message,
    imageURL,
  };
}

/**
 * Parse a stored member, returning null for anything that is not a
 * complete record.
 */
export function parseBucketMember(value: unknown): BucketMember | null {
  const result = bucketMemberSchema.safeParse(value);
  return result.success ? result.data : null;
}

export function parseBounds(value: unknown): Bounds | null {
  const result = boundsSchema.safeParse(value);
  return result.success ? result.data : null;
}

/** Parse a JSON string, returning undefined instead of throwing. */
export function parseJson(text: string | null | undefined): unknown {
  if (text === null || text === undefined) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Render an epoch-ms timestamp as "HH:MM" in the given IANA time zone. */
export function formatLocalTime(timestamp: number, timeZone: string): string {
  return new Intl.DateTimeFormat('en-GB', {
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
    timeZone,
  }).format(new Date(timestamp));
}

export function toBucketMember(record: AlertRecord, timeZone: string): BucketMember {
  const member: BucketMember = {
    location: record.location,
    timestamp: record.timestamp,
    time: formatLocalTime(record.timestamp, timeZone),
  };
  if (record.criticalLevel !== undefined) member.criticalLevel = record.criticalLevel;
  if (record.message !== undefined) member.message = record.message;
  if (record.imageURL !== undefined) member.imageURL = record.imageURL;
  return member;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
