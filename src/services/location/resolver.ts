/**
 * Reverse-geocoding front end
 *
 * Caches addresses per ~111 m cell (coordinates rounded to 3 decimals) for
 * one hour and spaces provider requests at least two seconds apart. A miss
 * that falls inside the rate-limit window resolves to null instead of waiting.
 */

import { logger } from '../../utils/logger.js';

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface ReverseGeocoder {
  reverse(coordinates: Coordinates): Promise<string | null>;
}

export interface LocationResolverOptions {
  minRequestIntervalMs?: number | undefined;
  cacheTtlMs?: number | undefined;
  now?: (() => number) | undefined;
}

interface CacheEntry {
  address: string;
  cachedAt: number;
}

export const MIN_REQUEST_INTERVAL_MS = 2_000;
export const CACHE_TTL_MS = 3_600_000;

/**
 * Cache key for a coordinate pair, e.g. "47.61,-122.333"
 */
export function coordinateKey({ latitude, longitude }: Coordinates): string {
  const lat = Math.round(latitude * 1000) / 1000;
  const lon = Math.round(longitude * 1000) / 1000;
  return `${lat},${lon}`;
}

export class LocationResolver {
  private readonly cache = new Map<string, CacheEntry>();
  private lastRequestAt: number | null = null;
  private readonly minRequestIntervalMs: number;
  private readonly cacheTtlMs: number;
  private readonly now: () => number;

  constructor(
    private readonly geocoder: ReverseGeocoder,
    options: LocationResolverOptions = {}
  ) {
    this.minRequestIntervalMs = options.minRequestIntervalMs ?? MIN_REQUEST_INTERVAL_MS;
    this.cacheTtlMs = options.cacheTtlMs ?? CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Address for the coordinates, or null when unavailable right now
   */
  async resolve(coordinates: Coordinates): Promise<string | null> {
    const key = coordinateKey(coordinates);

    const cached = this.getCached(key);
    if (cached !== null) {
      logger.debug(`Location cache hit: ${key}`);
      return cached;
    }

    if (!this.canRequest()) {
      logger.debug(`Location lookup rate limited: ${key}`);
      return null;
    }
    this.lastRequestAt = this.now();

    try {
      const address = await this.geocoder.reverse(coordinates);
      if (address) {
        const now = this.now();
        this.pruneExpired(now);
        this.cache.set(key, { address, cachedAt: now });
      }
      return address;
    } catch (error) {
      logger.warn(`Reverse geocoding failed for ${key}`, error);
      return null;
    }
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private getCached(key: string): string | null {
    const entry = this.cache.get(key);
    if (!entry) return null;

    if (this.now() - entry.cachedAt <= this.cacheTtlMs) {
      return entry.address;
    }
    this.cache.delete(key);
    return null;
  }

  private pruneExpired(now: number): void {
    for (const [key, entry] of this.cache) {
      if (now - entry.cachedAt > this.cacheTtlMs) {
        this.cache.delete(key);
      }
    }
  }

  private canRequest(): boolean {
    if (this.lastRequestAt === null) return true;
    return this.now() - this.lastRequestAt >= this.minRequestIntervalMs;
  }
}
