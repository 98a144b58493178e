/**
 * Distance Ranker
 * Great-circle distance and ordering of candidates.
 */

import type { Coordinates, PlaceRecord } from './types.js';

const EARTH_RADIUS_METERS = 6_371_000;

function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

/**
 * Haversine distance between two points, in meters
 */
export function haversineMeters(a: Coordinates, b: Coordinates): number {
  const dLat = toRadians(b.lat - a.lat);
  const dLng = toRadians(b.lng - a.lng);

  const h =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(a.lat)) *
    Math.cos(toRadians(b.lat)) *
    Math.sin(dLng / 2) *
    Math.sin(dLng / 2);

  return 2 * EARTH_RADIUS_METERS * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

/**
 * Sort ascending by distance (stable) and keep the first maxResults
 */
export function rankByDistance(places: readonly PlaceRecord[], maxResults: number): PlaceRecord[] {
  return [...places]
    .sort((a, b) => a.distance - b.distance)
    .slice(0, Math.max(0, maxResults));
}
