/**
 * Progressive Nearby Search Tests
 * Tier expansion, merge, deadlines and cancellation
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ProgressiveNearbySearch, resolveCategoryFilters, type SearchProgress } from './progressive-search.js';
import type { Coordinates, NearbyPlace, NearbySearchProvider } from './types.js';

const ORIGIN: Coordinates = { lat: 44.8024, lng: 20.4656 };

/** ~111 m per step north of the origin */
function place(id: string, steps: number, title = `Place ${id}`): NearbyPlace {
  return {
    id,
    title,
    type: 'museum',
    position: { lat: ORIGIN.lat + steps * 0.001, lng: ORIGIN.lng },
  };
}

type TierBehavior =
  | NearbyPlace[]
  | Error
  | { delayMs: number; places: NearbyPlace[] };

interface ProviderCall {
  radius: number;
  categories: readonly string[];
  signal?: AbortSignal;
}

class FakeNearbyProvider implements NearbySearchProvider {
  calls: ProviderCall[] = [];

  constructor(private readonly tiers: Record<number, TierBehavior>) {}

  async search(
    _origin: Coordinates,
    radiusMeters: number,
    categories: readonly string[],
    signal?: AbortSignal
  ): Promise<NearbyPlace[]> {
    this.calls.push({ radius: radiusMeters, categories, ...(signal && { signal }) });
    const behavior = this.tiers[radiusMeters] ?? [];

    if (behavior instanceof Error) {
      throw behavior;
    }
    if (Array.isArray(behavior)) {
      return behavior;
    }

    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(resolve, behavior.delayMs);
      signal?.addEventListener('abort', () => {
        clearTimeout(timer);
        reject(new Error('aborted by caller'));
      }, { once: true });
    });
    return behavior.places;
  }

  radii(): number[] {
    return this.calls.map((c) => c.radius);
  }
}

const FAST_CONFIG = { widerJoinTimeoutMs: 40, widestTimeoutMs: 40 };

describe('resolveCategoryFilters', () => {
  it('keeps supported types in first occurrence order', () => {
    assert.deepEqual(
      resolveCategoryFilters(['park', 'point_of_interest', 'park', 'museum']),
      ['park', 'museum']
    );
  });

  it('falls back to tourist_attraction and museum', () => {
    assert.deepEqual(resolveCategoryFilters([]), ['tourist_attraction', 'museum']);
    assert.deepEqual(resolveCategoryFilters(['point_of_interest']), ['tourist_attraction', 'museum']);
  });
});

describe('ProgressiveNearbySearch', () => {
  it('returns the five closest of six initial results without expanding', async () => {
    const provider = new FakeNearbyProvider({
      1000: [place('f', 6), place('b', 2), place('d', 4), place('a', 1), place('e', 5), place('c', 3)],
    });
    const progress: SearchProgress[] = [];
    const search = new ProgressiveNearbySearch(provider, FAST_CONFIG);

    const result = await search.search(ORIGIN, ['museum'], { onProgress: (s) => progress.push(s) });

    assert.ok(result.status === 'found');
    assert.deepEqual(result.places.map((p) => p.id), ['a', 'b', 'c', 'd', 'e']);
    assert.deepEqual(provider.radii(), [1000]);
    assert.deepEqual(progress, []);

    const distances = result.places.map((p) => p.distance);
    for (let i = 1; i < distances.length; i++) {
      assert.ok((distances[i] ?? 0) >= (distances[i - 1] ?? 0));
    }
    assert.ok(Math.abs((distances[0] ?? 0) - 111.19) < 0.1);
  });

  it('passes resolved filters to the provider', async () => {
    const provider = new FakeNearbyProvider({
      1000: [place('a', 1), place('b', 2), place('c', 3), place('d', 4), place('e', 5)],
    });
    await new ProgressiveNearbySearch(provider, FAST_CONFIG).search(ORIGIN, ['zoo', 'point_of_interest']);

    assert.deepEqual(provider.calls[0]?.categories, ['zoo']);
  });

  it('drops places with unknown names', async () => {
    const provider = new FakeNearbyProvider({
      1000: [
        place('a', 1),
        place('u1', 2, 'Unknown Place'),
        place('b', 3),
        place('u2', 4, 'Monument to the unknown'),
        place('c', 5),
      ],
    });

    const result = await new ProgressiveNearbySearch(provider, FAST_CONFIG).search(ORIGIN, []);

    assert.ok(result.status === 'found');
    assert.deepEqual(result.places.map((p) => p.id), ['a', 'b', 'c']);
    assert.deepEqual(provider.radii(), [1000]);
  });

  it('merges the wider tier when it finishes in time', async () => {
    const provider = new FakeNearbyProvider({
      1000: [place('a', 1), place('b', 3)],
      5000: [place('b', 3, 'Place b from wider'), place('c', 2)],
    });
    const progress: SearchProgress[] = [];

    const result = await new ProgressiveNearbySearch(provider, FAST_CONFIG)
      .search(ORIGIN, [], { onProgress: (s) => progress.push(s) });

    assert.ok(result.status === 'found');
    assert.deepEqual(result.places.map((p) => p.id), ['a', 'c', 'b']);
    assert.equal(result.places[2]?.title, 'Place b');
    assert.deepEqual(provider.radii(), [1000, 5000]);
    assert.deepEqual(progress, ['searching_wider']);
  });

  it('cancels a wider tier that misses its join deadline', async () => {
    const provider = new FakeNearbyProvider({
      1000: [place('a', 1), place('b', 2)],
      5000: { delayMs: 2_000, places: [place('late', 1)] },
    });
    const started = Date.now();

    const result = await new ProgressiveNearbySearch(provider, FAST_CONFIG).search(ORIGIN, []);

    assert.ok(Date.now() - started < 1_000);
    assert.ok(result.status === 'found');
    assert.deepEqual(result.places.map((p) => p.id), ['a', 'b']);
    assert.equal(provider.calls[1]?.signal?.aborted, true);
    assert.deepEqual(provider.radii(), [1000, 5000]);
  });

  it('runs the widest tier when fewer than two candidates remain', async () => {
    const provider = new FakeNearbyProvider({
      1000: [],
      5000: [place('a', 4)],
      10000: [place('a', 4), place('b', 8)],
    });
    const progress: SearchProgress[] = [];

    const result = await new ProgressiveNearbySearch(provider, FAST_CONFIG)
      .search(ORIGIN, [], { onProgress: (s) => progress.push(s) });

    assert.ok(result.status === 'found');
    assert.deepEqual(result.places.map((p) => p.id), ['a', 'b']);
    assert.deepEqual(provider.radii(), [1000, 5000, 10000]);
    assert.deepEqual(progress, ['searching_wider', 'searching_farthest']);
  });

  it('keeps what it has when the widest tier times out', async () => {
    const provider = new FakeNearbyProvider({
      1000: [place('a', 1)],
      5000: [],
      10000: { delayMs: 2_000, places: [place('far', 50)] },
    });
    const started = Date.now();

    const result = await new ProgressiveNearbySearch(provider, FAST_CONFIG).search(ORIGIN, []);

    assert.ok(Date.now() - started < 1_000);
    assert.ok(result.status === 'found');
    assert.deepEqual(result.places.map((p) => p.id), ['a']);
    assert.equal(provider.calls[2]?.signal?.aborted, true);
  });

  it('reports no_results when every tier is empty', async () => {
    const provider = new FakeNearbyProvider({});

    const result = await new ProgressiveNearbySearch(provider, FAST_CONFIG).search(ORIGIN, []);

    assert.deepEqual(result, { status: 'no_results' });
    assert.deepEqual(provider.radii(), [1000, 5000, 10000]);
  });

  it('treats a failing tier as empty', async () => {
    const provider = new FakeNearbyProvider({
      1000: new Error('quota exceeded'),
      5000: [place('a', 2), place('b', 1)],
    });

    const result = await new ProgressiveNearbySearch(provider, FAST_CONFIG).search(ORIGIN, []);

    assert.ok(result.status === 'found');
    assert.deepEqual(result.places.map((p) => p.id), ['b', 'a']);
    assert.deepEqual(provider.radii(), [1000, 5000]);
  });

  it('honours a smaller maxResults', async () => {
    const provider = new FakeNearbyProvider({
      1000: [place('c', 3), place('a', 1), place('b', 2), place('d', 4), place('e', 5)],
    });

    const result = await new ProgressiveNearbySearch(provider, FAST_CONFIG).search(ORIGIN, [], { maxResults: 2 });

    assert.ok(result.status === 'found');
    assert.deepEqual(result.places.map((p) => p.id), ['a', 'b']);
  });

  it('ignores a progress callback that throws', async () => {
    const provider = new FakeNearbyProvider({ 1000: [place('a', 1), place('b', 2)] });

    const result = await new ProgressiveNearbySearch(provider, FAST_CONFIG).search(ORIGIN, [], {
      onProgress: () => {
        throw new Error('chat message could not be edited');
      },
    });

    assert.ok(result.status === 'found');
    assert.equal(result.places.length, 2);
  });
});
