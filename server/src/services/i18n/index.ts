/**
 * i18n Module
 * User-facing messages in English and Russian
 */

export { I18nService, getI18n } from './i18n.service.js';
export type { Lang, MessageKey, TranslationVars, Translations } from './i18n.types.js';
export { SUPPORTED_LANGS, MESSAGE_KEYS } from './i18n.types.js';
