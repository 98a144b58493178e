/**
 * Guide Service
 * Orchestrates a user's journey: share a location, page through places,
 * ask for a story about one of them.
 *
 * Transport-agnostic: returns typed outcomes with user-facing messages and
 * never surfaces raw provider errors.
 */

import { MAX_AUDIO_BYTES } from '../../config/guide.config.js';
import type { CooldownGuard } from '../../lib/concurrency/cooldown-guard.js';
import { logger } from '../../lib/logger/structured-logger.js';
import type { I18nService, Lang, MessageKey, TranslationVars } from '../i18n/index.js';
import {
  reverseGeocodeOrSentinel,
  translateOrKeep,
  type EnrichmentService,
} from '../places/enrichment.service.js';
import {
  buildPlaceCard,
  NUMBER_EMOJIS,
  renderPlaceCardHtml,
  type PlaceCard,
  type Translate,
} from '../places/pagination.js';
import type { ProgressiveSearchResult, SearchProgress } from '../places/progressive-search.js';
import type { SearchSession, SessionLocale, SessionStore } from '../places/session-store.js';
import {
  isErrorText,
  type Coordinates,
  type DescriptionProvider,
  type GeocodingProvider,
  type PlaceRecord,
  type PlaceViewEntry,
  type SpeechSynthesizer,
  type StatsStore,
  type TranslationProvider,
} from '../places/types.js';
import type { PreferencesStore } from './preferences.store.js';

export const UNKNOWN_STREET = 'Unknown Street';
export const UNKNOWN_CITY = 'Unknown City';

/** The part of ProgressiveNearbySearch the guide depends on */
export interface NearbySearch {
  search(
    origin: Coordinates,
    categories: readonly string[],
    options?: { onProgress?: (stage: SearchProgress) => void }
  ): Promise<ProgressiveSearchResult>;
}

export interface GuideServiceDeps {
  search: NearbySearch;
  enrichment: EnrichmentService;
  geocoder: GeocodingProvider;
  translator: TranslationProvider;
  describer: DescriptionProvider;
  /** null when speech is not configured */
  speech: SpeechSynthesizer | null;
  stats: StatsStore;
  sessions: SessionStore;
  preferences: PreferencesStore;
  guard: CooldownGuard;
  i18n: I18nService;
  now?: () => number;
}

export interface PlaceView {
  card: PlaceCard;
  html: string;
}

export type LocationOutcome =
  | { status: 'found'; message: string; count: number; view: PlaceView }
  | { status: 'no_categories'; message: string }
  | { status: 'no_results'; message: string };

export type ShowPlaceOutcome =
  | { status: 'shown'; index: number; view: PlaceView }
  | { status: 'lost_track'; message: string }
  | { status: 'error'; message: string };

export interface Story {
  index: number;
  heading: string;
  text: string;
  /** mp3 bytes; null when already delivered, too large or synthesis failed */
  audio: Buffer | null;
  audioTooLarge: boolean;
  /** Set when audio was expected but could not be produced */
  audioMessage?: string;
}

export type StoryOutcome =
  | { status: 'told'; story: Story }
  | { status: 'lost_track'; message: string }
  | { status: 'not_found'; message: string }
  | { status: 'in_progress'; message: string }
  | { status: 'cooling_down'; remainingSeconds: number; message: string }
  | { status: 'failed'; message: string };

export type AudioDeliveryOutcome =
  | { status: 'ok' }
  | { status: 'lost_track'; message: string }
  | { status: 'not_found'; message: string };

export function storyGuardKey(userId: string, index: number): string {
  return `${userId}:${index}`;
}

/**
 * Street is the first comma-separated part of the address; city comes from the locality component
 */
export function extractLocale(formattedAddress: string, city: string | undefined): SessionLocale {
  const street = formattedAddress.includes(',')
    ? formattedAddress.split(',')[0]?.trim() || UNKNOWN_STREET
    : UNKNOWN_STREET;
  return { street, city: city || UNKNOWN_CITY };
}

export class GuideService {
  private readonly now: () => number;

  constructor(private readonly deps: GuideServiceDeps) {
    this.now = deps.now ?? Date.now;
  }

  async handleLocation(
    userId: string,
    origin: Coordinates,
    onProgress?: (stage: SearchProgress) => void
  ): Promise<LocationOutcome> {
    const { preferences, sessions } = this.deps;
    const lang = preferences.getLanguage(userId);

    if (preferences.hasDisabledAllCategories(userId)) {
      return { status: 'no_categories', message: this.t('no_places_selected', lang) };
    }

    const placeTypes = preferences.selectedPlaceTypes(userId);
    logger.info({ event: 'location_received', userId, placeTypes: placeTypes.length }, '[Guide] Location received');

    const [locale, result] = await Promise.all([
      this.resolveLocale(origin),
      this.deps.search.search(origin, placeTypes, onProgress ? { onProgress } : {}),
    ]);

    if (result.status === 'no_results') {
      logger.info({ event: 'location_no_results', userId }, '[Guide] No places found');
      return { status: 'no_results', message: this.t('no_places', lang) };
    }

    const session: SearchSession = {
      userId,
      places: result.places,
      currentIndex: 0,
      origin,
      locale,
      createdAt: this.now(),
    };
    sessions.create(session);

    const view = await this.renderPlace(session, 0, lang);
    return {
      status: 'found',
      message: this.t('places_found', lang, { count: result.places.length }),
      count: result.places.length,
      view,
    };
  }

  /**
   * Reverse geocode the origin and translate street and city concurrently
   */
  async resolveLocale(origin: Coordinates): Promise<SessionLocale> {
    const geocoded = await reverseGeocodeOrSentinel(this.deps.geocoder, origin);
    const { street, city } = extractLocale(geocoded.formattedAddress, geocoded.components.city);

    const [englishStreet, englishCity] = await Promise.all([
      translateOrKeep(this.deps.translator, street),
      translateOrKeep(this.deps.translator, city),
    ]);
    return { street: englishStreet, city: englishCity };
  }

  async showPlace(userId: string, index: number): Promise<ShowPlaceOutcome> {
    const lang = this.deps.preferences.getLanguage(userId);
    const session = this.deps.sessions.get(userId);
    if (!session) {
      return { status: 'lost_track', message: this.t('lost_track', lang) };
    }

    const safeIndex = index >= 0 && index < session.places.length ? index : 0;

    try {
      const view = await this.renderPlace(session, safeIndex, lang);
      return { status: 'shown', index: safeIndex, view };
    } catch (error) {
      logger.error({
        event: 'show_place_failed',
        userId,
        index: safeIndex,
        error: error instanceof Error ? error.message : String(error),
      }, '[Guide] Failed to show place');
      return { status: 'error', message: this.t('error_showing_place', lang) };
    }
  }

  async tellMore(userId: string, index: number): Promise<StoryOutcome> {
    const lang = this.deps.preferences.getLanguage(userId);
    const session = this.deps.sessions.get(userId);
    if (!session) {
      return { status: 'lost_track', message: this.t('lost_track', lang) };
    }

    const place = session.places[index];
    if (!place) {
      return { status: 'not_found', message: this.t('error_showing_place', lang) };
    }

    try {
      const outcome = await this.deps.guard.run(storyGuardKey(userId, index), () =>
        this.buildStory(session, place, index, lang)
      );

      switch (outcome.status) {
        case 'completed':
          return outcome.value;
        case 'in_progress':
          return { status: 'in_progress', message: this.t('request_in_progress', lang) };
        case 'cooling_down':
          return {
            status: 'cooling_down',
            remainingSeconds: outcome.remainingSeconds,
            message: this.t('cooldown', lang, { seconds: outcome.remainingSeconds }),
          };
      }
    } catch (error) {
      logger.error({
        event: 'tell_more_failed',
        userId,
        index,
        error: error instanceof Error ? error.message : String(error),
      }, '[Guide] Story request failed');
      return { status: 'failed', message: this.t('forgot_to_say', lang) };
    }
  }

  /**
   * Called by the delivery layer once the voice message was sent
   */
  markAudioDelivered(userId: string, index: number): AudioDeliveryOutcome {
    const lang = this.deps.preferences.getLanguage(userId);
    const session = this.deps.sessions.get(userId);
    if (!session) {
      return { status: 'lost_track', message: this.t('lost_track', lang) };
    }

    const place = session.places[index];
    if (!place) {
      return { status: 'not_found', message: this.t('error_showing_place', lang) };
    }

    place.audioSent = true;
    return { status: 'ok' };
  }

  private async renderPlace(session: SearchSession, index: number, lang: Lang): Promise<PlaceView> {
    this.deps.sessions.replace(session.userId, { currentIndex: index });

    const place = session.places[index];
    if (!place) {
      throw new Error(`No place at index ${index}`);
    }

    await this.deps.enrichment.enrich(place, session.userId);
    this.logView(session, place);

    const card = buildPlaceCard(place, index, session.places.length, lang, this.translatorFor(lang));
    return { card, html: renderPlaceCardHtml(card) };
  }

  /**
   * Fire-and-forget: a slow stats store never delays the card
   */
  private logView(session: SearchSession, place: PlaceRecord): void {
    if (place.logged) return;
    place.logged = true;

    const entry: PlaceViewEntry = {
      userId: session.userId,
      placeName: place.title,
      placeType: place.type,
      lat: place.position.lat,
      lng: place.position.lng,
      city: session.locale.city,
    };

    Promise.resolve()
      .then(() => this.deps.stats.logPlaceView(entry))
      .catch((error: unknown) => {
        logger.warn({
          event: 'stats_log_failed',
          userId: session.userId,
          placeId: place.id,
          error: error instanceof Error ? error.message : String(error),
        }, '[Guide] Failed to record place view');
      });
  }

  private async buildStory(
    session: SearchSession,
    place: PlaceRecord,
    index: number,
    lang: Lang
  ): Promise<StoryOutcome> {
    await this.deps.enrichment.enrich(place, session.userId);

    const displayName = lang === 'ru' ? (place.originalTitle ?? place.title) : place.title;

    let text = place.history;
    if (text === undefined) {
      const generated = await this.deps.describer.describe({
        city: session.locale.city,
        street: session.locale.street,
        placeName: displayName,
        placeAddress: place.address,
        ...(place.originalTitle !== undefined && { originalName: place.originalTitle }),
      });

      if (isErrorText(generated)) {
        logger.warn({ event: 'story_generation_failed', userId: session.userId, placeId: place.id }, '[Guide] Story generation failed');
        return { status: 'failed', message: this.t('forgot_to_say', lang) };
      }
      place.history = generated;
      text = generated;
    }

    const emoji = NUMBER_EMOJIS[index] ?? String(index + 1);
    const story: Story = {
      index,
      heading: this.t('about_place', lang, { place_name: `${emoji} ${displayName}` }),
      text,
      audio: null,
      audioTooLarge: false,
    };

    if (!place.audioSent && this.deps.speech) {
      const audio = await this.synthesize(this.deps.speech, text);
      if (!audio) {
        story.audioMessage = this.t('voice_tired', lang);
      } else if (audio.length > MAX_AUDIO_BYTES) {
        story.audioTooLarge = true;
        story.audioMessage = this.t('audio_too_large', lang);
      } else {
        story.audio = audio;
      }
    }

    return { status: 'told', story };
  }

  private async synthesize(speech: SpeechSynthesizer, text: string): Promise<Buffer | null> {
    try {
      return await speech.synthesize(text);
    } catch (error) {
      logger.warn({
        event: 'speech_threw',
        error: error instanceof Error ? error.message : String(error),
      }, '[Guide] Speech synthesis threw');
      return null;
    }
  }

  private t(key: MessageKey, lang: Lang, vars?: TranslationVars): string {
    return this.deps.i18n.t(key, lang, vars);
  }

  private translatorFor(lang: Lang): Translate {
    return (key, vars) => this.t(key, lang, vars);
  }
}
