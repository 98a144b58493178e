/**
 * Retry Handler
 * Manages retry logic with backoff for LLM operations
 */

import { logger } from '../lib/logger/structured-logger.js';
import { sleep } from '../lib/reliability/timeout-guard.js';

/**
 * Error categorization result
 */
export interface ErrorCategory {
  type: 'abort_timeout' | 'transport_error' | 'auth_error' | 'unknown';
  isRetriable: boolean;
  reason: string;
  statusCode?: number | undefined;
}

export interface RetryConfig {
  maxAttempts: number;
  backoffMs: number[];
}

export function getErrorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export class RetryHandler {
  constructor(private config: RetryConfig) {}

  /**
   * Execute function with retry logic
   */
  async executeWithRetry<T>(
    fn: (attempt: number) => Promise<T>,
    opts?: { operation?: string }
  ): Promise<T> {
    const { maxAttempts, backoffMs } = this.config;
    const operation = opts?.operation ?? 'llm_call';
    let lastErr: unknown;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const backoff = backoffMs[attempt] ?? 0;
      if (attempt > 0 && backoff > 0) {
        await sleep(backoff);
      }

      try {
        return await fn(attempt);
      } catch (e) {
        lastErr = e;
        const category = this.categorizeError(e);

        if (!category.isRetriable) {
          logger.error({
            operation,
            status: category.statusCode,
            errorType: category.type,
            reason: category.reason,
          }, '[LLM] Non-retriable error, failing fast');
          throw e;
        }

        if (attempt === maxAttempts - 1) {
          logger.error({ operation, attempts: attempt + 1, errorType: category.type }, '[LLM] All retry attempts exhausted');
          throw e;
        }

        logger.warn({
          operation,
          attempt: attempt + 1,
          maxAttempts,
          status: category.statusCode,
          errorType: category.type,
        }, '[LLM] Retriable error, will retry with backoff');
      }
    }

    throw lastErr ?? new Error('LLM failed after all attempts');
  }

  /**
   * Categorize error for retry decision: 429, 5xx and timeouts retry; the rest fail fast
   */
  categorizeError(e: unknown): ErrorCategory {
    const status = getErrorStatus(e);
    const message = e instanceof Error ? e.message : String(e);
    const name = e instanceof Error ? e.name : '';

    if (status === 401 || status === 403) {
      return { type: 'auth_error', isRetriable: false, reason: `HTTP ${status}`, statusCode: status };
    }

    if (status === 429 || (status !== undefined && status >= 500)) {
      return { type: 'transport_error', isRetriable: true, reason: `HTTP ${status}`, statusCode: status };
    }

    const isAbortOrTimeout = name === 'AbortError'
      || name === 'TimeoutError'
      || /timed? ?out|aborted|connection error/i.test(message);

    if (isAbortOrTimeout) {
      return { type: 'abort_timeout', isRetriable: true, reason: 'Request aborted or timeout' };
    }

    return { type: 'unknown', isRetriable: false, reason: message || 'unknown', statusCode: status };
  }
}
