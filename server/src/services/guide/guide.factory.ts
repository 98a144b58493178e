/**
 * Composition root for the guide: builds providers from config and wires
 * them into GuideService.
 */

import type { Redis } from 'ioredis';
import type { AppConfig } from '../../config/env.js';
import { DEFAULT_SEARCH_CONFIG, STORY_COOLDOWN_MS } from '../../config/guide.config.js';
import { CooldownGuard } from '../../lib/concurrency/cooldown-guard.js';
import { OpenAiProvider } from '../../llm/openai.provider.js';
import type { LLMProvider } from '../../llm/types.js';
import { GoogleGeocodingClient } from '../../providers/google/geocoding.client.js';
import { GooglePlacesClient } from '../../providers/google/places.client.js';
import { SpeechKitClient } from '../../providers/yandex/speechkit.client.js';
import { getI18n } from '../i18n/index.js';
import { DescriptionService } from '../llm/description.service.js';
import { TranslationService } from '../llm/translation.service.js';
import { EnrichmentService } from '../places/enrichment.service.js';
import { ProgressiveNearbySearch } from '../places/progressive-search.js';
import { InMemorySessionStore } from '../places/session-store.js';
import { createRedisStatsStore, NoopStatsStore } from '../stats/stats.store.js';
import type { AppDeps } from '../../app.js';
import { GuideService } from './guide.service.js';
import { PreferencesStore } from './preferences.store.js';

export function createLLMProvider(config: AppConfig): LLMProvider | null {
  if (!config.llm.apiKey) return null;
  return new OpenAiProvider({
    apiKey: config.llm.apiKey,
    baseUrl: config.llm.baseUrl,
    defaultModel: config.llm.models[0] ?? 'deepseek-chat',
    timeoutMs: config.llm.timeoutMs,
  });
}

export function createGuideDeps(config: AppConfig, redis: Redis | null): AppDeps {
  const geocoder = new GoogleGeocodingClient({
    apiKey: config.google.apiKey,
    timeoutMs: config.httpTimeoutMs,
  });
  const places = new GooglePlacesClient({
    apiKey: config.google.apiKey,
    timeoutMs: config.google.placesTimeoutMs,
  });

  const llm = createLLMProvider(config);
  const translator = new TranslationService(llm);
  const describer = new DescriptionService(llm, config.llm.models);

  const speech = config.speech.apiKey
    ? new SpeechKitClient({
      apiKey: config.speech.apiKey,
      folderId: config.speech.catalogId,
      voice: config.speech.voice,
      lang: config.speech.lang,
      timeoutMs: config.httpTimeoutMs,
    })
    : null;

  const preferences = new PreferencesStore();
  const i18n = getI18n();

  const guide = new GuideService({
    search: new ProgressiveNearbySearch(places, DEFAULT_SEARCH_CONFIG),
    enrichment: new EnrichmentService(geocoder, translator),
    geocoder,
    translator,
    describer,
    speech,
    stats: redis ? createRedisStatsStore(redis) : new NoopStatsStore(),
    sessions: new InMemorySessionStore(),
    preferences,
    guard: new CooldownGuard({ cooldownMs: STORY_COOLDOWN_MS }),
    i18n,
  });

  return { guide, preferences, i18n };
}
