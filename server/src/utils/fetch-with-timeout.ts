/**
 * Fetch with Timeout Utility
 *
 * Wraps undici fetch with an AbortController so upstream calls never hang.
 * Uses the shared connection pool and clears the timer in finally.
 */

import { fetch, type RequestInit, type Response } from 'undici';
import { getHttpAgent } from '../lib/http/http-client.js';
import { logger } from '../lib/logger/structured-logger.js';

export type FetchErrorKind = 'TIMEOUT' | 'ABORT' | 'HTTP_ERROR' | 'NETWORK_ERROR';

export interface FetchWithTimeoutConfig {
  timeoutMs: number;
  provider?: string;
  /** Caller-owned cancellation; when aborted, the fetch is cancelled. */
  signal?: AbortSignal;
}

export class UpstreamError extends Error {
  constructor(
    message: string,
    public readonly errorKind: FetchErrorKind,
    public readonly provider: string,
    public readonly host: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'UpstreamError';
  }
}

export type HttpFetcher = (
  url: string,
  options: RequestInit,
  config: FetchWithTimeoutConfig
) => Promise<Response>;

/**
 * Fetch with automatic timeout using AbortController
 *
 * @throws UpstreamError with errorKind TIMEOUT, ABORT or NETWORK_ERROR
 */
export const fetchWithTimeout: HttpFetcher = async (url, options, config) => {
  const controller = new AbortController();
  const startTime = Date.now();
  const { host, pathname } = new URL(url);
  const provider = config.provider || 'unknown';
  let timedOut = false;

  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, config.timeoutMs);

  const onCallerAbort = () => controller.abort();
  if (config.signal) {
    if (config.signal.aborted) {
      controller.abort();
    } else {
      config.signal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }

  logger.debug({
    event: 'upstream_call_start',
    provider,
    method: options.method || 'GET',
    host,
    path: pathname,
    timeoutMs: config.timeoutMs,
  }, '[FETCH] Outbound request');

  try {
    const response = await fetch(url, {
      ...options,
      signal: controller.signal,
      dispatcher: getHttpAgent(),
    });

    logger.debug({
      event: 'upstream_call_done',
      provider,
      host,
      path: pathname,
      status: response.status,
      durationMs: Date.now() - startTime,
    }, '[FETCH] Response received');

    return response;
  } catch (err) {
    const durationMs = Date.now() - startTime;
    const errorKind: FetchErrorKind = timedOut
      ? 'TIMEOUT'
      : controller.signal.aborted
        ? 'ABORT'
        : 'NETWORK_ERROR';

    logger.warn({
      event: 'upstream_call_failed',
      provider,
      host,
      errorKind,
      durationMs,
      error: err instanceof Error ? err.message : String(err),
    }, '[FETCH] Request failed');

    throw new UpstreamError(
      `${provider} ${errorKind.toLowerCase().replace('_', ' ')} after ${durationMs}ms`,
      errorKind,
      provider,
      host
    );
  } finally {
    clearTimeout(timeoutId);
    config.signal?.removeEventListener('abort', onCallerAbort);
  }
};
