/**
 * I18nService
 * Translation lookup for user-facing messages
 * Loads JSON per language and interpolates {{vars}}
 */

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { logger } from '../../lib/logger/structured-logger.js';
import {
  MESSAGE_KEYS,
  SUPPORTED_LANGS,
  type Lang,
  type MessageKey,
  type TranslationVars,
  type Translations,
} from './i18n.types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const translationFileSchema = z.record(z.string(), z.string());

export class I18nService {
  private translations = new Map<Lang, Translations>();

  constructor(private readonly directory: string = join(__dirname, 'translations')) {
    this.loadTranslations();
  }

  private loadTranslations(): void {
    for (const lang of SUPPORTED_LANGS) {
      try {
        const filePath = join(this.directory, `${lang}.json`);
        const raw = translationFileSchema.parse(JSON.parse(readFileSync(filePath, 'utf-8')));

        const translations: Translations = {};
        for (const key of MESSAGE_KEYS) {
          const value = raw[key];
          if (value !== undefined) {
            translations[key] = value;
          }
        }
        this.translations.set(lang, translations);
      } catch (error) {
        logger.warn({
          event: 'i18n_load_failed',
          lang,
          error: error instanceof Error ? error.message : String(error),
        }, `[I18n] Failed to load ${lang}.json, falling back to English`);
      }
    }
  }

  /**
   * Example: t('places_found', 'en', { count: 3 })
   */
  t(key: MessageKey, lang: Lang, vars?: TranslationVars): string {
    const value = this.translations.get(lang)?.[key]
      ?? (lang !== 'en' ? this.translations.get('en')?.[key] : undefined);

    if (value === undefined) {
      logger.warn({ event: 'i18n_missing_key', key, lang }, '[I18n] Missing translation key');
      return key;
    }

    return vars ? this.interpolate(value, vars) : value;
  }

  /**
   * "Found {{count}} places" + {count: 5} -> "Found 5 places"
   */
  private interpolate(template: string, vars: TranslationVars): string {
    return template.replace(/\{\{(\w+)\}\}/g, (match: string, key: string) => {
      const value = vars[key];
      return value !== undefined ? String(value) : match;
    });
  }

  getSupportedLanguages(): Lang[] {
    return Array.from(this.translations.keys());
  }
}

let i18nInstance: I18nService | null = null;

export function getI18n(): I18nService {
  if (!i18nInstance) {
    i18nInstance = new I18nService();
  }
  return i18nInstance;
}
