import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { GeocodeError } from '@alert-buckets/core';
import { GoogleGeocoder } from './google';

// ─── Helpers ─────────────────────────────────────────────────────────────────

const BOUNDS = {
  northeast: { lat: 37.9823, lng: 23.7512 },
  southwest: { lat: 37.9744, lng: 23.7391 },
};
const VIEWPORT = {
  northeast: { lat: 38.1, lng: 23.9 },
  southwest: { lat: 37.9, lng: 23.6 },
};

function component(longName: string, ...types: string[]) {
  return { long_name: longName, short_name: longName, types };
}

function okBody(overrides: Record<string, unknown> = {}) {
  return {
    status: 'OK',
    results: [
      {
        address_components: [
          component('12', 'street_number'),
          component('Skoufa', 'route'),
          component('Kolonaki', 'neighborhood', 'political'),
          component('Athina', 'locality', 'political'),
        ],
        geometry: { bounds: BOUNDS, viewport: VIEWPORT },
        ...overrides,
      },
    ],
  };
}

function respond(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('GoogleGeocoder', () => {
  const fetchMock = vi.fn();
  let geocoder: GoogleGeocoder;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    geocoder = new GoogleGeocoder({ apiKey: 'test-key' });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should request the reverse geocode for the point', async () => {
    fetchMock.mockResolvedValueOnce(respond(okBody()));

    await geocoder.geocode(37.98, 23.74);

    const [url, init] = fetchMock.mock.calls[0];
    expect(String(url)).toBe('https://maps.googleapis.com/maps/api/geocode/json?latlng=37.98%2C23.74&key=test-key');
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it('should pass the language when configured', async () => {
    geocoder = new GoogleGeocoder({ apiKey: 'test-key', language: 'el' });
    fetchMock.mockResolvedValueOnce(respond(okBody()));

    await geocoder.geocode(37.98, 23.74);

    const [url] = fetchMock.mock.calls[0];
    expect(new URL(String(url)).searchParams.get('language')).toBe('el');
  });

  it('should use the first neighborhood or locality and the bounds', async () => {
    fetchMock.mockResolvedValueOnce(respond(okBody()));

    await expect(geocoder.geocode(37.98, 23.74)).resolves.toEqual({ placeName: 'Kolonaki', bounds: BOUNDS });
  });

  it('should fall back to the third component', async () => {
    fetchMock.mockResolvedValueOnce(respond(okBody({
      address_components: [
        component('12', 'street_number'),
        component('Skoufa', 'route'),
        component('Central Athens', 'administrative_area_level_3'),
      ],
    })));

    const result = await geocoder.geocode(37.98, 23.74);
    expect(result.placeName).toBe('Central Athens');
  });

  it('should fall back to the viewport when there are no bounds', async () => {
    fetchMock.mockResolvedValueOnce(respond(okBody({ geometry: { viewport: VIEWPORT } })));

    const result = await geocoder.geocode(37.98, 23.74);
    expect(result.bounds).toEqual(VIEWPORT);
  });

  describe('failures', () => {
    it('should reject a non-200 response', async () => {
      fetchMock.mockResolvedValueOnce(respond({}, 503));
      await expect(geocoder.geocode(0, 0)).rejects.toThrow('Geocoding request failed: HTTP status - 503');
    });

    it('should reject an API status other than OK', async () => {
      fetchMock.mockResolvedValueOnce(respond({ status: 'ZERO_RESULTS', results: [] }));
      await expect(geocoder.geocode(0, 0)).rejects.toThrow('Geocoding failed: API status - ZERO_RESULTS');
    });

    it('should reject a result without bounds or viewport', async () => {
      fetchMock.mockResolvedValueOnce(respond(okBody({ geometry: {} })));
      await expect(geocoder.geocode(0, 0)).rejects.toThrow('Geocoding successful, but bounds/viewport not found');
    });

    it('should reject a result without a usable place name', async () => {
      fetchMock.mockResolvedValueOnce(respond(okBody({ address_components: [component('Greece', 'country')] })));
      await expect(geocoder.geocode(0, 0)).rejects.toThrow('Geocoding successful, but no place name found');
    });

    it('should reject a malformed body', async () => {
      fetchMock.mockResolvedValueOnce(respond({ results: 'nope' }));
      await expect(geocoder.geocode(0, 0)).rejects.toBeInstanceOf(GeocodeError);
    });

    it('should wrap network errors', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      const err = await geocoder.geocode(0, 0).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(GeocodeError);
      if (err instanceof GeocodeError) {
        expect(err.message).toBe('Geocoding request failed: fetch failed');
        expect(err.cause).toBeInstanceOf(TypeError);
      }
    });
  });
});
