/**
 * Guide Configuration
 * Search tiers, timeouts and place-type mappings.
 */

export interface SearchTierConfig {
  /** Radius of the first, unbounded search */
  initialRadiusMeters: number;
  /** Radius of the background search started when tier 1 is thin */
  widerRadiusMeters: number;
  /** Radius of the last-resort search */
  widestRadiusMeters: number;
  /** Tier 2 starts when tier 1 returns fewer raw results than this */
  widerThreshold: number;
  /** Tier 3 runs when fewer usable candidates than this are accumulated */
  widestThreshold: number;
  /** Soft join deadline for tier 2 */
  widerJoinTimeoutMs: number;
  /** Hard ceiling for tier 3 */
  widestTimeoutMs: number;
  maxResults: number;
}

export const DEFAULT_SEARCH_CONFIG: SearchTierConfig = {
  initialRadiusMeters: 1_000,
  widerRadiusMeters: 5_000,
  widestRadiusMeters: 10_000,
  widerThreshold: 5,
  widestThreshold: 2,
  widerJoinTimeoutMs: 3_000,
  widestTimeoutMs: 4_000,
  maxResults: 5,
};

/** Minimum gap between two story requests for the same user and place */
export const STORY_COOLDOWN_MS = 300_000;

/** Voice messages above this size are not delivered */
export const MAX_AUDIO_BYTES = 50 * 1024 * 1024;

/** Case-insensitive substring marking unusable place names */
export const UNKNOWN_NAME_SENTINEL = 'unknown';

export const SUPPORTED_PLACE_TYPES = [
  'tourist_attraction',
  'museum',
  'art_gallery',
  'church',
  'hindu_temple',
  'mosque',
  'synagogue',
  'park',
  'amusement_park',
  'aquarium',
  'campground',
  'zoo',
] as const;

export type PlaceType = (typeof SUPPORTED_PLACE_TYPES)[number];

export const DEFAULT_PLACE_TYPES: readonly PlaceType[] = ['tourist_attraction', 'museum'];

export const PLACE_CATEGORIES = ['nature', 'religion', 'culture', 'history', 'must_visit'] as const;

export type PlaceCategory = (typeof PLACE_CATEGORIES)[number];

/**
 * User-facing categories → provider place types.
 * Unsupported types (point_of_interest) are dropped at search time.
 */
export const POI_CATEGORY_MAPPING: Record<PlaceCategory, readonly string[]> = {
  nature: ['park', 'amusement_park', 'aquarium', 'campground', 'zoo'],
  religion: ['church', 'hindu_temple', 'mosque', 'synagogue'],
  culture: ['art_gallery'],
  history: ['museum', 'tourist_attraction'],
  must_visit: ['point_of_interest', 'tourist_attraction'],
};

export function isSupportedPlaceType(value: string): value is PlaceType {
  return SUPPORTED_PLACE_TYPES.some((type) => type === value);
}
