/**
 * Stats Store
 * Records which places users looked at.
 *
 * Redis layout:
 * - guide:views            LIST of JSON entries, newest first, capped
 * - guide:views:by_type    HASH place type -> count
 * - guide:views:by_city    HASH city -> count
 */

import type { Redis } from 'ioredis';
import { logger } from '../../lib/logger/structured-logger.js';
import type { PlaceViewEntry, StatsStore } from '../places/types.js';

export const VIEWS_KEY = 'guide:views';
export const VIEWS_BY_TYPE_KEY = 'guide:views:by_type';
export const VIEWS_BY_CITY_KEY = 'guide:views:by_city';
export const MAX_VIEW_LOG_ENTRIES = 10_000;

/** The commands the store needs; satisfied by ioredis and by test fakes */
export interface StatsRedisClient {
  lpush(key: string, value: string): Promise<unknown>;
  ltrim(key: string, start: number, stop: number): Promise<unknown>;
  hincrby(key: string, field: string, increment: number): Promise<unknown>;
}

export class RedisStatsStore implements StatsStore {
  constructor(
    private readonly redis: StatsRedisClient,
    private readonly now: () => number = Date.now
  ) {}

  async logPlaceView(entry: PlaceViewEntry): Promise<void> {
    const record = JSON.stringify({ ...entry, timestamp: new Date(this.now()).toISOString() });

    await this.redis.lpush(VIEWS_KEY, record);
    await this.redis.ltrim(VIEWS_KEY, 0, MAX_VIEW_LOG_ENTRIES - 1);
    await this.redis.hincrby(VIEWS_BY_TYPE_KEY, entry.placeType, 1);
    if (entry.city) {
      await this.redis.hincrby(VIEWS_BY_CITY_KEY, entry.city, 1);
    }

    logger.debug({ event: 'place_view_logged', userId: entry.userId, placeType: entry.placeType }, '[Stats] Place view logged');
  }
}

/**
 * Used when Redis is not configured or unreachable
 */
export class NoopStatsStore implements StatsStore {
  async logPlaceView(entry: PlaceViewEntry): Promise<void> {
    logger.debug({ event: 'place_view_skipped', userId: entry.userId }, '[Stats] Stats store disabled');
  }
}

export function createRedisStatsStore(redis: Redis): RedisStatsStore {
  return new RedisStatsStore({
    lpush: (key, value) => redis.lpush(key, value),
    ltrim: (key, start, stop) => redis.ltrim(key, start, stop),
    hincrby: (key, field, increment) => redis.hincrby(key, field, increment),
  });
}
