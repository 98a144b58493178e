/**
 * Google Geocoding reverse lookup
 * Never throws: any failure yields the "Address not available" sentinel.
 */

import { z } from 'zod';
import { fetchWithTimeout, type HttpFetcher } from '../../utils/fetch-with-timeout.js';
import { logger } from '../../lib/logger/structured-logger.js';
import {
  ADDRESS_NOT_AVAILABLE,
  type AddressComponents,
  type Coordinates,
  type GeocodingProvider,
  type ReverseGeocodeResult,
} from '../../services/places/types.js';

export const GEOCODING_URL = 'https://maps.googleapis.com/maps/api/geocode/json';

const geocodeResponseSchema = z.object({
  status: z.string(),
  results: z.array(z.object({
    formatted_address: z.string().optional(),
    address_components: z.array(z.object({
      long_name: z.string(),
      short_name: z.string(),
      types: z.array(z.string()),
    })).default([]),
  })).default([]),
});

type GoogleAddressComponent = z.infer<typeof geocodeResponseSchema>['results'][number]['address_components'][number];

const NOT_AVAILABLE: ReverseGeocodeResult = {
  formattedAddress: ADDRESS_NOT_AVAILABLE,
  components: {},
};

/**
 * First matching type wins per component, in the order listed
 */
export function extractAddressComponents(components: readonly GoogleAddressComponent[]): AddressComponents {
  const result: AddressComponents = {};

  for (const component of components) {
    const { types } = component;
    if (types.includes('street_number')) {
      result.streetNumber = component.long_name;
    } else if (types.includes('route')) {
      result.street = component.long_name;
    } else if (types.includes('locality')) {
      result.city = component.long_name;
    } else if (types.includes('administrative_area_level_1')) {
      result.state = component.long_name;
    } else if (types.includes('country')) {
      result.country = component.long_name;
      result.countryCode = component.short_name;
    } else if (types.includes('postal_code')) {
      result.postalCode = component.long_name;
    } else if (types.includes('sublocality_level_1')) {
      result.district = component.long_name;
    } else if (types.includes('administrative_area_level_2')) {
      result.county = component.long_name;
    }
  }

  return result;
}

export interface GoogleGeocodingClientOptions {
  apiKey?: string;
  timeoutMs: number;
  language?: string;
  fetcher?: HttpFetcher;
}

export class GoogleGeocodingClient implements GeocodingProvider {
  private readonly fetcher: HttpFetcher;

  constructor(private readonly options: GoogleGeocodingClientOptions) {
    this.fetcher = options.fetcher ?? fetchWithTimeout;
  }

  async reverseGeocode(position: Coordinates): Promise<ReverseGeocodeResult> {
    if (!this.options.apiKey) {
      logger.error({ event: 'geocoding_api_key_missing' }, '[Geocoding] GOOGLE_MAPS_API_KEY is not set');
      return NOT_AVAILABLE;
    }

    const params = new URLSearchParams({
      latlng: `${position.lat},${position.lng}`,
      key: this.options.apiKey,
      language: this.options.language ?? 'en',
    });

    try {
      const response = await this.fetcher(`${GEOCODING_URL}?${params.toString()}`, { method: 'GET' }, {
        timeoutMs: this.options.timeoutMs,
        provider: 'google_geocoding',
      });

      if (!response.ok) {
        logger.warn({ event: 'geocoding_http_error', status: response.status }, '[Geocoding] HTTP error');
        return NOT_AVAILABLE;
      }

      const parsed = geocodeResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        logger.warn({ event: 'geocoding_response_invalid' }, '[Geocoding] Unexpected response shape');
        return NOT_AVAILABLE;
      }

      const first = parsed.data.results[0];
      if (parsed.data.status !== 'OK' || !first) {
        logger.warn({ event: 'geocoding_no_result', status: parsed.data.status }, '[Geocoding] No result');
        return NOT_AVAILABLE;
      }

      return {
        formattedAddress: first.formatted_address ?? ADDRESS_NOT_AVAILABLE,
        components: extractAddressComponents(first.address_components),
      };
    } catch (error) {
      logger.warn({
        event: 'geocoding_failed',
        error: error instanceof Error ? error.message : String(error),
      }, '[Geocoding] Reverse geocode failed');
      return NOT_AVAILABLE;
    }
  }
}
