/**
 * Progressive Nearby Search
 *
 * Tiered radius expansion with per-tier deadlines:
 * - Tier 1 (initial radius) runs without an artificial timeout
 * - Tier 2 (wider radius) starts in the background when tier 1 is thin and
 *   is joined softly; a tier 2 that misses its join deadline is aborted and
 *   awaited so nothing keeps running after search() returns
 * - Tier 3 (widest radius) runs under a hard ceiling when too few usable
 *   candidates remain
 *
 * Merge order is tier 1, tier 2, tier 3; the first occurrence of an id wins.
 */

import {
  DEFAULT_PLACE_TYPES,
  DEFAULT_SEARCH_CONFIG,
  isSupportedPlaceType,
  type PlaceType,
  type SearchTierConfig,
} from '../../config/guide.config.js';
import { logger } from '../../lib/logger/structured-logger.js';
import {
  abortable,
  isTimeoutError,
  joinWithin,
  withTimeout,
} from '../../lib/reliability/timeout-guard.js';
import { rankByDistance } from './distance.js';
import { isUnknownName, toPlaceRecord } from './place-normalizer.js';
import type { Coordinates, NearbyPlace, NearbySearchProvider, PlaceRecord } from './types.js';

export type SearchProgress = 'searching_wider' | 'searching_farthest';

export type ProgressiveSearchResult =
  | { status: 'found'; places: PlaceRecord[] }
  | { status: 'no_results' };

export interface ProgressiveSearchOptions {
  maxResults?: number;
  onProgress?: (stage: SearchProgress) => void;
}

type Tier = 'initial' | 'wider' | 'widest';

/**
 * Keep supported place types (first occurrence order); fall back to the defaults when none remain
 */
export function resolveCategoryFilters(categories: readonly string[]): PlaceType[] {
  const resolved: PlaceType[] = [];
  for (const category of categories) {
    if (isSupportedPlaceType(category) && !resolved.includes(category)) {
      resolved.push(category);
    }
  }
  return resolved.length > 0 ? resolved : [...DEFAULT_PLACE_TYPES];
}

export class ProgressiveNearbySearch {
  private readonly config: SearchTierConfig;

  constructor(
    private readonly provider: NearbySearchProvider,
    config: Partial<SearchTierConfig> = {}
  ) {
    this.config = { ...DEFAULT_SEARCH_CONFIG, ...config };
  }

  async search(
    origin: Coordinates,
    categories: readonly string[],
    options: ProgressiveSearchOptions = {}
  ): Promise<ProgressiveSearchResult> {
    const startTime = Date.now();
    const filters = resolveCategoryFilters(categories);
    const maxResults = options.maxResults ?? this.config.maxResults;
    const candidates = new Map<string, PlaceRecord>();

    const initial = await this.safeSearch('initial', origin, this.config.initialRadiusMeters, filters);

    let wider: { task: Promise<NearbyPlace[]>; controller: AbortController } | null = null;
    if (initial.length < this.config.widerThreshold) {
      this.reportProgress(options, 'searching_wider');
      const controller = new AbortController();
      wider = {
        controller,
        task: this.safeSearch('wider', origin, this.config.widerRadiusMeters, filters, controller.signal),
      };
    }

    this.mergeCandidates(candidates, initial, origin);

    if (wider) {
      const joined = await joinWithin(wider.task, this.config.widerJoinTimeoutMs);
      if (joined.settled) {
        this.mergeCandidates(candidates, joined.value, origin);
      } else {
        logger.info({
          event: 'search_tier_cancelled',
          tier: 'wider',
          joinTimeoutMs: this.config.widerJoinTimeoutMs,
        }, '[ProgressiveSearch] Wider search missed join deadline, cancelling');
        wider.controller.abort();
        await wider.task;
      }
    }

    if (candidates.size < this.config.widestThreshold) {
      this.reportProgress(options, 'searching_farthest');
      const controller = new AbortController();
      try {
        const widest = await withTimeout(
          this.safeSearch('widest', origin, this.config.widestRadiusMeters, filters, controller.signal),
          this.config.widestTimeoutMs,
          'widest_search',
          () => controller.abort()
        );
        this.mergeCandidates(candidates, widest, origin);
      } catch (error) {
        if (!isTimeoutError(error)) {
          throw error;
        }
        logger.warn({
          event: 'search_tier_timeout',
          tier: 'widest',
          timeoutMs: this.config.widestTimeoutMs,
        }, '[ProgressiveSearch] Widest search timed out');
      }
    }

    logger.info({
      event: 'progressive_search_done',
      candidates: candidates.size,
      filters,
      durationMs: Date.now() - startTime,
    }, '[ProgressiveSearch] Search completed');

    if (candidates.size === 0) {
      return { status: 'no_results' };
    }

    return {
      status: 'found',
      places: rankByDistance([...candidates.values()], maxResults),
    };
  }

  /**
   * Provider failures count as zero results for the tier
   */
  private async safeSearch(
    tier: Tier,
    origin: Coordinates,
    radiusMeters: number,
    filters: readonly string[],
    signal?: AbortSignal
  ): Promise<NearbyPlace[]> {
    try {
      const places = await abortable(
        this.provider.search(origin, radiusMeters, filters, signal),
        signal,
        `${tier}_search`
      );
      logger.debug({ event: 'search_tier_done', tier, radiusMeters, count: places.length }, '[ProgressiveSearch] Tier completed');
      return places;
    } catch (error) {
      const aborted = signal?.aborted ?? false;
      logger[aborted ? 'debug' : 'warn']({
        event: aborted ? 'search_tier_aborted' : 'search_tier_failed',
        tier,
        radiusMeters,
        error: error instanceof Error ? error.message : String(error),
      }, `[ProgressiveSearch] Tier ${aborted ? 'aborted' : 'failed'}`);
      return [];
    }
  }

  private mergeCandidates(
    candidates: Map<string, PlaceRecord>,
    places: readonly NearbyPlace[],
    origin: Coordinates
  ): void {
    for (const place of places) {
      if (isUnknownName(place.title) || candidates.has(place.id)) {
        continue;
      }
      candidates.set(place.id, toPlaceRecord(place, origin));
    }
  }

  private reportProgress(options: ProgressiveSearchOptions, stage: SearchProgress): void {
    if (!options.onProgress) return;
    try {
      options.onProgress(stage);
    } catch (error) {
      logger.warn({
        event: 'search_progress_callback_failed',
        stage,
        error: error instanceof Error ? error.message : String(error),
      }, '[ProgressiveSearch] Progress callback threw');
    }
  }
}
