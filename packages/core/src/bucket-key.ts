import { createHash } from 'crypto';
import type { Bounds } from '@alert-buckets/types';

const BUCKET_ID_LENGTH = 16;

/**
 * Derive the bucket id for a geocoded place: the first 16 hex characters of
 * SHA-256 over "<place>_<ne.lat>_<ne.lng>_<sw.lat>_<sw.lng>".
 *
 * The id follows the geocoder's bounds exactly, so two reports from the same
 * spot land in different buckets if the geocoder returns slightly different
 * bounds for them.
 */
export function deriveBucketId(placeName: string, bounds: Bounds): string {
  const keyString = [
    placeName,
    formatCoordinate(bounds.northeast.lat),
    formatCoordinate(bounds.northeast.lng),
    formatCoordinate(bounds.southwest.lat),
    formatCoordinate(bounds.southwest.lng),
  ].join('_');

  return createHash('sha256').update(keyString).digest('hex').slice(0, BUCKET_ID_LENGTH);
}

/**
 * Shortest round-trip rendering of a float, in the form bucket ids already in
 * the store were derived from: whole numbers keep a trailing ".0", negative
 * zero keeps its sign, and magnitudes below 1e-4 or from 1e16 up switch to an
 * exponent of at least two digits ("1.234e-05").
 *
 * A coordinate the geocoder sent as a JSON integer is indistinguishable from
 * its float form once parsed, so it renders as "38.0" too.
 */
export function formatCoordinate(value: number): string {
  if (Object.is(value, -0)) return '-0.0';

  const magnitude = Math.abs(value);
  if (magnitude !== 0 && (magnitude < 1e-4 || magnitude >= 1e16)) {
    return value.toExponential().replace(/e([+-])(\d)$/, (_, sign: string, digit: string) => `e${sign}0${digit}`);
  }
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}
