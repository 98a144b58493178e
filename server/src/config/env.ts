import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  GOOGLE_MAPS_API_KEY: optionalString,
  GOOGLE_PLACES_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  LLM_API_KEY: optionalString,
  LLM_BASE_URL: z.string().url().default('https://api.deepseek.com/v1'),
  LLM_MODELS: z.string().default('deepseek-chat'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  YA_SPEECHKIT_API_KEY: optionalString,
  YA_CATALOG_ID: optionalString,
  SPEECH_VOICE: z.string().default('john'),
  SPEECH_LANG: z.string().default('en-US'),
  REDIS_URL: optionalString,
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  google: {
    apiKey?: string;
    placesTimeoutMs: number;
  };
  llm: {
    apiKey?: string;
    baseUrl: string;
    models: string[];
    timeoutMs: number;
  };
  speech: {
    apiKey?: string;
    catalogId?: string;
    voice: string;
    lang: string;
  };
  redisUrl?: string;
  httpTimeoutMs: number;
}

/**
 * Parse and validate environment into a typed config.
 * Throws ConfigError listing every invalid key.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const e = parsed.data;
  const models = e.LLM_MODELS.split(',').map((m) => m.trim()).filter(Boolean);

  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    google: {
      apiKey: e.GOOGLE_MAPS_API_KEY,
      placesTimeoutMs: e.GOOGLE_PLACES_TIMEOUT_MS,
    },
    llm: {
      apiKey: e.LLM_API_KEY,
      baseUrl: e.LLM_BASE_URL,
      models: models.length > 0 ? models : ['deepseek-chat'],
      timeoutMs: e.LLM_TIMEOUT_MS,
    },
    speech: {
      apiKey: e.YA_SPEECHKIT_API_KEY,
      catalogId: e.YA_CATALOG_ID,
      voice: e.SPEECH_VOICE,
      lang: e.SPEECH_LANG,
    },
    redisUrl: e.REDIS_URL,
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
  };
}

/**
 * Names of optional integrations that are not configured (for startup warnings)
 */
export function listMissingIntegrations(config: AppConfig): string[] {
  const missing: string[] = [];
  if (!config.google.apiKey) missing.push('GOOGLE_MAPS_API_KEY');
  if (!config.llm.apiKey) missing.push('LLM_API_KEY');
  if (!config.speech.apiKey) missing.push('YA_SPEECHKIT_API_KEY');
  if (!config.redisUrl) missing.push('REDIS_URL');
  return missing;
}
