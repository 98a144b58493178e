/**
 * Google Places (New) nearby search client
 * One searchNearby request per included type; results are de-duplicated by id
 * in request order. A failed type is logged and skipped. Stops between
 * requests once the caller's signal aborts.
 */

import { fetchWithTimeout, UpstreamError, type HttpFetcher } from '../../utils/fetch-with-timeout.js';
import { logger } from '../../lib/logger/structured-logger.js';
import { mapGooglePlace, nearbySearchResponseSchema } from '../../services/places/place-normalizer.js';
import type { Coordinates, NearbyPlace, NearbySearchProvider } from '../../services/places/types.js';

export const PLACES_NEARBY_URL = 'https://places.googleapis.com/v1/places:searchNearby';

const FIELD_MASK = [
  'places.id',
  'places.displayName',
  'places.formattedAddress',
  'places.location',
  'places.types',
  'places.websiteUri',
].join(',');

export interface GooglePlacesClientOptions {
  /** Without a key every search yields no places */
  apiKey?: string;
  timeoutMs: number;
  languageCode?: string;
  fetcher?: HttpFetcher;
}

export class GooglePlacesClient implements NearbySearchProvider {
  private readonly fetcher: HttpFetcher;

  constructor(private readonly options: GooglePlacesClientOptions) {
    this.fetcher = options.fetcher ?? fetchWithTimeout;
  }

  async search(
    origin: Coordinates,
    radiusMeters: number,
    categories: readonly string[],
    signal?: AbortSignal
  ): Promise<NearbyPlace[]> {
    const { apiKey } = this.options;
    if (!apiKey) {
      logger.error({ event: 'places_api_key_missing' }, '[GooglePlaces] GOOGLE_MAPS_API_KEY is not set');
      return [];
    }

    const places: NearbyPlace[] = [];
    const seen = new Set<string>();

    for (const type of categories) {
      if (signal?.aborted) {
        break;
      }

      let batch: NearbyPlace[];
      try {
        batch = await this.searchType(apiKey, origin, radiusMeters, type, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        logger.error({
          event: 'places_type_failed',
          type,
          status: error instanceof UpstreamError ? error.status : undefined,
          error: error instanceof Error ? error.message : String(error),
        }, '[GooglePlaces] Nearby search failed for type, skipping');
        continue;
      }

      for (const place of batch) {
        if (seen.has(place.id)) continue;
        seen.add(place.id);
        places.push(place);
      }
    }

    logger.debug({
      event: 'places_nearby_done',
      radiusMeters,
      types: categories.length,
      count: places.length,
    }, '[GooglePlaces] Nearby search completed');

    return places;
  }

  private async searchType(
    apiKey: string,
    origin: Coordinates,
    radiusMeters: number,
    type: string,
    signal?: AbortSignal
  ): Promise<NearbyPlace[]> {
    const body = {
      locationRestriction: {
        circle: {
          center: { latitude: origin.lat, longitude: origin.lng },
          radius: radiusMeters,
        },
      },
      includedTypes: [type],
      languageCode: this.options.languageCode ?? 'en',
    };

    const response = await this.fetcher(PLACES_NEARBY_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'X-Goog-Api-Key': apiKey,
        'X-Goog-FieldMask': FIELD_MASK,
      },
      body: JSON.stringify(body),
    }, {
      timeoutMs: this.options.timeoutMs,
      provider: 'google_places',
      ...(signal && { signal }),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new UpstreamError(
        `Places API error for ${type}: ${response.status} - ${text.slice(0, 200)}`,
        'HTTP_ERROR',
        'google_places',
        new URL(PLACES_NEARBY_URL).host,
        response.status
      );
    }

    const parsed = nearbySearchResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      logger.warn({
        event: 'places_response_invalid',
        type,
        issues: parsed.error.issues.slice(0, 3).map((i) => `${i.path.join('.')}: ${i.message}`),
      }, '[GooglePlaces] Unexpected response shape');
      return [];
    }

    return (parsed.data.places ?? []).map((place) => mapGooglePlace(place, type));
  }
}
