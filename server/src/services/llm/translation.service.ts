/**
 * Translation Service
 * Translates place names and addresses to English through the LLM provider.
 *
 * Never throws: failures come back as an Error:-prefixed string so callers can
 * fall back to the source text. Successful translations are cached.
 */

import { CacheManager } from '../../lib/cache/cache-manager.js';
import { logger } from '../../lib/logger/structured-logger.js';
import type { LLMProvider, Message } from '../../llm/types.js';
import {
  TRANSLATION_CACHE_SIZE,
  TRANSLATION_CACHE_TTL_MS,
  TRANSLATION_MAX_TOKENS,
  TRANSLATION_TEMPERATURE,
} from '../../config/index.js';
import { ADDRESS_NOT_AVAILABLE, toErrorText, type TranslationProvider } from '../places/types.js';

const SYSTEM_PROMPT =
  'You are a professional translator. Translate the given text to English. ' +
  'Preserve proper nouns but translate everything else. Keep the translation concise and accurate. ' +
  'Only respond with the translation, nothing else.';

/** Values that are returned as-is */
const PASSTHROUGH_TEXTS = new Set([ADDRESS_NOT_AVAILABLE, 'Address not specified']);

export class TranslationService implements TranslationProvider {
  private readonly cache: CacheManager<string>;

  constructor(
    private readonly llm: LLMProvider | null,
    cache?: CacheManager<string>
  ) {
    this.cache = cache ?? new CacheManager<string>(TRANSLATION_CACHE_SIZE, 'translation');
  }

  async translate(text: string): Promise<string> {
    if (!text.trim() || PASSTHROUGH_TEXTS.has(text)) {
      return text;
    }

    if (!this.llm) {
      return toErrorText('Translation provider is not configured');
    }

    const cached = this.cache.get(text);
    if (cached !== undefined) {
      return cached;
    }

    const messages: Message[] = [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: `Translate this to English: ${text}` },
    ];

    try {
      const result = (await this.llm.complete(messages, {
        temperature: TRANSLATION_TEMPERATURE,
        maxTokens: TRANSLATION_MAX_TOKENS,
      })).trim();

      if (!result) {
        return toErrorText('Empty translation');
      }

      this.cache.set(text, result, TRANSLATION_CACHE_TTL_MS);
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ event: 'translation_failed', chars: text.length, error: message }, '[Translation] LLM call failed');
      return toErrorText(message);
    }
  }
}
