/**
 * Centralized LLM settings.
 * Values that change per deployment (keys, base URL, model list) come from env.ts.
 */

// === LLM Provider Settings ===

/** The maximum number of attempts for a failed LLM call. */
export const LLM_RETRY_ATTEMPTS = 3;

/** The backoff delays (in ms) before each attempt. Length should match LLM_RETRY_ATTEMPTS. */
export const LLM_RETRY_BACKOFF_MS = [0, 250, 750];

// === Translation ===

export const TRANSLATION_TEMPERATURE = 0.3;
export const TRANSLATION_MAX_TOKENS = 500;
export const TRANSLATION_CACHE_TTL_MS = 24 * 60 * 60 * 1000;
export const TRANSLATION_CACHE_SIZE = 2_000;

// === Place stories ===

export const DESCRIPTION_TEMPERATURE = 0.7;
export const DESCRIPTION_MAX_TOKENS = 500;
