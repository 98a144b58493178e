/**
 * Enrichment Service
 * Geocodes and translates a place the first time it is shown.
 *
 * A record is enriched once; later calls are no-ops. Concurrent calls for
 * the same (scope, place) share one in-flight operation; a different record
 * object with the same id is enriched on its own.
 */

import { RequestDeduplicator } from '../../lib/concurrency/request-deduplicator.js';
import { logger } from '../../lib/logger/structured-logger.js';
import {
  ADDRESS_NOT_AVAILABLE,
  isErrorText,
  type GeocodingProvider,
  type PlaceRecord,
  type ReverseGeocodeResult,
  type TranslationProvider,
} from './types.js';

/**
 * Translate, falling back to the source text on any failure
 */
export async function translateOrKeep(translator: TranslationProvider, text: string): Promise<string> {
  try {
    const result = await translator.translate(text);
    if (isErrorText(result)) {
      logger.debug({ event: 'translation_fallback', reason: result }, '[Enrichment] Keeping untranslated text');
      return text;
    }
    return result;
  } catch (error) {
    logger.warn({
      event: 'translation_threw',
      error: error instanceof Error ? error.message : String(error),
    }, '[Enrichment] Translator threw, keeping untranslated text');
    return text;
  }
}

export async function reverseGeocodeOrSentinel(
  geocoder: GeocodingProvider,
  position: PlaceRecord['position']
): Promise<ReverseGeocodeResult> {
  try {
    return await geocoder.reverseGeocode(position);
  } catch (error) {
    logger.warn({
      event: 'geocoding_threw',
      error: error instanceof Error ? error.message : String(error),
    }, '[Enrichment] Geocoder threw');
    return { formattedAddress: ADDRESS_NOT_AVAILABLE, components: {} };
  }
}

export class EnrichmentService {
  private readonly inFlight = new RequestDeduplicator<PlaceRecord>('enrichment');

  constructor(
    private readonly geocoder: GeocodingProvider,
    private readonly translator: TranslationProvider
  ) {}

  async enrich(place: PlaceRecord, scope: string): Promise<PlaceRecord> {
    if (place.enriched) {
      return place;
    }
    const shared = await this.inFlight.dedupe(`${scope}:${place.id}`, () => this.run(place));
    // A replaced session can hold another record with the same id
    if (shared === place || place.enriched) {
      return place;
    }
    return this.run(place);
  }

  private async run(place: PlaceRecord): Promise<PlaceRecord> {
    const startTime = Date.now();
    const geocoded = await reverseGeocodeOrSentinel(this.geocoder, place.position);

    if (place.originalTitle === undefined) {
      place.originalTitle = place.title;
    }
    place.originalAddress = geocoded.formattedAddress;

    const [title, address] = await Promise.all([
      translateOrKeep(this.translator, place.originalTitle),
      translateOrKeep(this.translator, geocoded.formattedAddress),
    ]);

    place.title = title;
    place.address = address;
    place.enriched = true;

    logger.debug({
      event: 'place_enriched',
      placeId: place.id,
      durationMs: Date.now() - startTime,
    }, '[Enrichment] Place enriched');

    return place;
  }
}
