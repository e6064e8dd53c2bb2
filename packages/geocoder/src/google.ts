import { z } from 'zod';
import type { GeocodeResult, IGeocoder } from '@alert-buckets/types';
import { GeocodeError, boundsSchema, errorMessage } from '@alert-buckets/core';

export interface GoogleGeocoderConfig {
  apiKey: string;
  /** Request timeout (ms). Default: 5000 */
  timeoutMs?: number;
  /** Result language, e.g. "el". Default: the API's own choice */
  language?: string;
  /** Default: the public Geocoding API endpoint */
  endpoint?: string;
}

const DEFAULT_ENDPOINT = 'https://maps.googleapis.com/maps/api/geocode/json';

const responseSchema = z.object({
  status: z.string(),
  results: z
    .array(
      z.object({
        address_components: z.array(
          z.object({
            long_name: z.string(),
            types: z.array(z.string()),
          })
        ),
        geometry: z.object({
          bounds: boundsSchema.optional(),
          viewport: boundsSchema.optional(),
        }),
      })
    )
    .default([]),
});

type GeocodeResponse = z.infer<typeof responseSchema>;

const PLACE_TYPES = new Set(['neighborhood', 'locality']);

/**
 * Reverse geocoder backed by the Google Geocoding API.
 *
 * The place name is the first neighborhood or locality component, falling
 * back to the third address component. Bounds come from `geometry.bounds`,
 * or the viewport when the place has none.
 */
export class GoogleGeocoder implements IGeocoder {
  private apiKey: string;
  private timeoutMs: number;
  private language?: string;
  private endpoint: string;

  constructor(config: GoogleGeocoderConfig) {
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs ?? 5000;
    this.language = config.language;
    this.endpoint = config.endpoint ?? DEFAULT_ENDPOINT;
  }

  async geocode(latitude: number, longitude: number): Promise<GeocodeResult> {
    const body = await this.request(latitude, longitude);

    if (body.status !== 'OK') {
      throw new GeocodeError(`Geocoding failed: API status - ${body.status}`);
    }

    const [first] = body.results;
    if (!first) {
      throw new GeocodeError('Geocoding failed: no results');
    }

    const components = first.address_components;
    const component =
      components.find((c) => c.types.some((type) => PLACE_TYPES.has(type))) ?? components[2];
    if (!component) {
      throw new GeocodeError('Geocoding successful, but no place name found');
    }

    const bounds = first.geometry.bounds ?? first.geometry.viewport;
    if (!bounds) {
      throw new GeocodeError('Geocoding successful, but bounds/viewport not found');
    }

    return { placeName: component.long_name, bounds };
  }

  private async request(latitude: number, longitude: number): Promise<GeocodeResponse> {
    const url = new URL(this.endpoint);
    url.searchParams.set('latlng', `${latitude},${longitude}`);
    url.searchParams.set('key', this.apiKey);
    if (this.language) url.searchParams.set('language', this.language);

    let response: Response;
    try {
      response = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (err) {
      throw new GeocodeError(`Geocoding request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (response.status !== 200) {
      throw new GeocodeError(`Geocoding request failed: HTTP status - ${response.status}`);
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (err) {
      throw new GeocodeError(`Geocoding response is not JSON: ${errorMessage(err)}`, { cause: err });
    }

    const result = responseSchema.safeParse(json);
    if (!result.success) {
      throw new GeocodeError(`Unexpected geocoding response: ${result.error.issues[0]?.message ?? 'invalid'}`);
    }
    return result.data;
  }
}
