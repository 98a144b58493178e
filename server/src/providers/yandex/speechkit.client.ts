/**
 * Yandex SpeechKit text-to-speech
 * Returns mp3 bytes, or null on any failure.
 */

import { fetchWithTimeout, type HttpFetcher } from '../../utils/fetch-with-timeout.js';
import { logger } from '../../lib/logger/structured-logger.js';
import type { SpeechSynthesizer } from '../../services/places/types.js';

export const SPEECHKIT_URL = 'https://tts.api.cloud.yandex.net/speech/v1/tts:synthesize';

export interface SpeechKitClientOptions {
  apiKey: string;
  folderId?: string;
  voice: string;
  lang: string;
  timeoutMs: number;
  fetcher?: HttpFetcher;
}

export class SpeechKitClient implements SpeechSynthesizer {
  private readonly fetcher: HttpFetcher;

  constructor(private readonly options: SpeechKitClientOptions) {
    this.fetcher = options.fetcher ?? fetchWithTimeout;
  }

  async synthesize(text: string): Promise<Buffer | null> {
    const form = new URLSearchParams({
      text,
      lang: this.options.lang,
      voice: this.options.voice,
      format: 'mp3',
    });
    if (this.options.folderId) {
      form.set('folderId', this.options.folderId);
    }

    try {
      const response = await this.fetcher(SPEECHKIT_URL, {
        method: 'POST',
        headers: {
          Authorization: `Api-Key ${this.options.apiKey}`,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: form.toString(),
      }, {
        timeoutMs: this.options.timeoutMs,
        provider: 'yandex_speechkit',
      });

      if (!response.ok) {
        const body = await response.text();
        logger.warn({
          event: 'speech_http_error',
          status: response.status,
          body: body.slice(0, 200),
        }, '[SpeechKit] Synthesis failed');
        return null;
      }

      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      logger.warn({
        event: 'speech_failed',
        error: error instanceof Error ? error.message : String(error),
      }, '[SpeechKit] Synthesis failed');
      return null;
    }
  }
}
