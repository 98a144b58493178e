/**
 * i18n Types
 * User-facing message keys and supported languages
 */

export const SUPPORTED_LANGS = ['en', 'ru'] as const;

export type Lang = (typeof SUPPORTED_LANGS)[number];

export type TranslationVars = Record<string, string | number>;

export const MESSAGE_KEYS = [
  // Search progress
  'searching_wider',
  'searching_farthest',
  'no_places',
  'places_found',
  'no_places_selected',
  // Place card
  'tell_more_btn',
  'show_maps_btn',
  'next_location',
  'back_to_first',
  'website_label',
  // Story
  'request_in_progress',
  'cooldown',
  'about_place',
  'audio_too_large',
  'voice_tired',
  'forgot_to_say',
  // Errors
  'lost_track',
  'try_again',
  'error_showing_place',
  // Preferences
  'nature',
  'religion',
  'culture',
  'history',
  'must_visit',
  'settings_saved_none',
  'settings_saved_with_prefs',
] as const;

export type MessageKey = (typeof MESSAGE_KEYS)[number];

export type Translations = Partial<Record<MessageKey, string>>;
