/**
 * Request Deduplicator
 * Prevents duplicate in-flight requests
 *
 * If multiple identical requests arrive while one is processing,
 * all subsequent requests share the same promise result.
 */

import { logger } from '../logger/structured-logger.js';

export class RequestDeduplicator<T> {
  private inFlight = new Map<string, Promise<T>>();
  private stats = {
    deduplicated: 0,
    unique: 0,
  };

  constructor(private readonly name: string = 'default') {}

  /**
   * Deduplicate request by key
   * Returns existing promise if request is in-flight, otherwise executes fn
   */
  dedupe(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inFlight.get(key);
    if (existing) {
      this.stats.deduplicated++;
      logger.debug({ event: 'request_deduped', deduplicator: this.name, key }, '[RequestDeduplicator] Deduped request');
      return existing;
    }

    this.stats.unique++;
    const promise = fn().finally(() => {
      this.inFlight.delete(key);
    });

    this.inFlight.set(key, promise);
    return promise;
  }

  isInFlight(key: string): boolean {
    return this.inFlight.has(key);
  }

  getStats() {
    const total = this.stats.unique + this.stats.deduplicated;
    return {
      ...this.stats,
      total,
      dedupeRate: total > 0 ? this.stats.deduplicated / total : 0,
    };
  }
}
