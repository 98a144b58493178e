/**
 * Place discovery types
 * Provider contracts and the normalized place record.
 */

export interface Coordinates {
  lat: number;
  lng: number;
}

/** Address value of a record that has not been geocoded yet */
export const ADDRESS_PLACEHOLDER = 'Address will be fetched';

/** Geocoding fallback when no address could be resolved */
export const ADDRESS_NOT_AVAILABLE = 'Address not available';

export const UNKNOWN_PLACE_TITLE = 'Unknown Place';

/**
 * Place as returned by a nearby-search provider
 */
export interface NearbyPlace {
  id: string;
  title: string;
  type: string;
  position: Coordinates;
  formattedAddress?: string;
  website?: string;
}

/**
 * Normalized point of interest held in a search session.
 * title/address hold display values; originalTitle/originalAddress the
 * pre-translation values once enrichment ran.
 */
export interface PlaceRecord {
  id: string;
  title: string;
  originalTitle?: string;
  position: Coordinates;
  address: string;
  originalAddress?: string;
  type: string;
  website?: string;
  /** Meters from the search origin */
  distance: number;
  enriched: boolean;
  /** Generated story, set once */
  history?: string;
  audioSent: boolean;
  logged: boolean;
}

export interface AddressComponents {
  streetNumber?: string;
  street?: string;
  city?: string;
  state?: string;
  country?: string;
  countryCode?: string;
  postalCode?: string;
  district?: string;
  county?: string;
}

export interface ReverseGeocodeResult {
  formattedAddress: string;
  components: AddressComponents;
}

export interface NearbySearchProvider {
  search(
    origin: Coordinates,
    radiusMeters: number,
    categories: readonly string[],
    signal?: AbortSignal
  ): Promise<NearbyPlace[]>;
}

/**
 * Never throws; yields ADDRESS_NOT_AVAILABLE on failure
 */
export interface GeocodingProvider {
  reverseGeocode(position: Coordinates): Promise<ReverseGeocodeResult>;
}

/**
 * Returns the translation, or an Error:-prefixed string on failure
 */
export interface TranslationProvider {
  translate(text: string): Promise<string>;
}

export interface DescriptionRequest {
  city: string;
  street: string;
  placeName: string;
  placeAddress: string;
  originalName?: string;
}

/**
 * Returns the story, or an Error:-prefixed string on failure
 */
export interface DescriptionProvider {
  describe(request: DescriptionRequest): Promise<string>;
}

export interface SpeechSynthesizer {
  /** mp3 bytes, or null when synthesis failed */
  synthesize(text: string): Promise<Buffer | null>;
}

export interface PlaceViewEntry {
  userId: string;
  placeName: string;
  placeType: string;
  lat: number;
  lng: number;
  city?: string;
}

export interface StatsStore {
  logPlaceView(entry: PlaceViewEntry): Promise<void>;
}

export const ERROR_PREFIX = 'Error:';

export function isErrorText(text: string): boolean {
  return text.startsWith(ERROR_PREFIX);
}

export function toErrorText(reason: string): string {
  return `${ERROR_PREFIX} ${reason}`;
}
