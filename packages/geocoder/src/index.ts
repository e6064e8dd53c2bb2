export { GoogleGeocoder } from './google';
export type { GoogleGeocoderConfig } from './google';
