/**
 * Location labels for new records
 */

export {
  LocationResolver,
  coordinateKey,
  MIN_REQUEST_INTERVAL_MS,
  CACHE_TTL_MS,
} from './resolver.js';
export type { Coordinates, ReverseGeocoder, LocationResolverOptions } from './resolver.js';
export { NominatimGeocoder, formatAddress } from './nominatim.js';
export type { NominatimOptions, NominatimAddress } from './nominatim.js';
