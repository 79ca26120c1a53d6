/**
 * OpenStreetMap Nominatim reverse geocoder
 */

import { z } from 'zod';
import type { Coordinates, ReverseGeocoder } from './resolver.js';

const reverseResponseSchema = z.object({
  address: z
    .object({
      road: z.string().optional(),
      pedestrian: z.string().optional(),
      city: z.string().optional(),
      town: z.string().optional(),
      village: z.string().optional(),
      state: z.string().optional(),
      country: z.string().optional(),
    })
    .optional(),
});

export type NominatimAddress = NonNullable<z.infer<typeof reverseResponseSchema>['address']>;

export interface NominatimOptions {
  endpoint: string;
  userAgent: string;
  fetchFn?: typeof fetch | undefined;
}

/**
 * "street, locality, state, country", skipping missing parts
 */
export function formatAddress(address: NominatimAddress): string {
  return [
    address.road ?? address.pedestrian,
    address.city ?? address.town ?? address.village,
    address.state,
    address.country,
  ]
    .filter((part): part is string => Boolean(part))
    .join(', ');
}

export class NominatimGeocoder implements ReverseGeocoder {
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: NominatimOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async reverse({ latitude, longitude }: Coordinates): Promise<string | null> {
    const url = new URL(this.options.endpoint);
    url.searchParams.set('format', 'jsonv2');
    url.searchParams.set('lat', String(latitude));
    url.searchParams.set('lon', String(longitude));

    const response = await this.fetchFn(url, {
      headers: { 'User-Agent': this.options.userAgent, Accept: 'application/json' },
    });
    if (!response.ok) {
      throw new Error(`Geocoding request failed with HTTP ${response.status}`);
    }

    const parsed = reverseResponseSchema.safeParse(await response.json());
    if (!parsed.success || !parsed.data.address) {
      return null;
    }

    const formatted = formatAddress(parsed.data.address);
    return formatted || null;
  }
}
