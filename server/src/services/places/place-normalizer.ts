/**
 * Place Normalizer
 * Maps provider responses to NearbyPlace, and NearbyPlace to PlaceRecord.
 */

import { z } from 'zod';
import { UNKNOWN_NAME_SENTINEL } from '../../config/guide.config.js';
import { haversineMeters } from './distance.js';
import {
  ADDRESS_PLACEHOLDER,
  UNKNOWN_PLACE_TITLE,
  type Coordinates,
  type NearbyPlace,
  type PlaceRecord,
} from './types.js';

/**
 * Google Places API (New) place, restricted to the field mask we request:
 * places.id,places.displayName,places.formattedAddress,places.location,places.types,places.websiteUri
 */
const googlePlaceSchema = z.object({
  id: z.string().min(1),
  displayName: z.object({ text: z.string() }).partial().optional(),
  formattedAddress: z.string().optional(),
  location: z.object({
    latitude: z.number(),
    longitude: z.number(),
  }).partial().optional(),
  types: z.array(z.string()).optional(),
  websiteUri: z.string().optional(),
});

export const nearbySearchResponseSchema = z.object({
  places: z.array(googlePlaceSchema).optional(),
});

export type GooglePlace = z.infer<typeof googlePlaceSchema>;

/**
 * Extract place ID from resource name (places/ChIJxxx -> ChIJxxx)
 */
export function normalizePlaceId(rawId: string): string {
  return rawId.split('/').pop() || rawId;
}

/**
 * Map one Google place to NearbyPlace; `type` is the included type the request asked for
 */
export function mapGooglePlace(place: GooglePlace, type: string): NearbyPlace {
  const title = place.displayName?.text?.trim();
  const website = place.websiteUri?.trim();
  const formattedAddress = place.formattedAddress?.trim();

  return {
    id: normalizePlaceId(place.id),
    title: title || UNKNOWN_PLACE_TITLE,
    type,
    position: {
      lat: place.location?.latitude ?? 0,
      lng: place.location?.longitude ?? 0,
    },
    ...(formattedAddress ? { formattedAddress } : {}),
    ...(website ? { website } : {}),
  };
}

export function isUnknownName(title: string): boolean {
  return title.toLowerCase().includes(UNKNOWN_NAME_SENTINEL);
}

/**
 * A record counts as enriched only when it has an original title, a real
 * address and a title that went through translation. Evaluated once when the
 * record is built; afterwards the flag is owned by the enrichment step.
 */
export function deriveEnriched(place: Pick<PlaceRecord, 'title' | 'originalTitle' | 'address'>): boolean {
  return place.originalTitle !== undefined
    && place.address !== ADDRESS_PLACEHOLDER
    && place.title !== place.originalTitle;
}

export function toPlaceRecord(place: NearbyPlace, origin?: Coordinates): PlaceRecord {
  const record: PlaceRecord = {
    id: place.id,
    title: place.title,
    position: { ...place.position },
    address: place.formattedAddress ?? ADDRESS_PLACEHOLDER,
    type: place.type,
    distance: origin ? haversineMeters(origin, place.position) : 0,
    enriched: false,
    audioSent: false,
    logged: false,
  };

  if (place.website) {
    record.website = place.website;
  }

  record.enriched = deriveEnriched(record);
  return record;
}
