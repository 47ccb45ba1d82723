import type { Keypoint, KeypointSet, LandmarkName, Range } from '../types/contracts.js';
import { InsufficientKeypointsError } from '../lib/errors.js';

export type Vec2 = { x: number; y: number };

export function distance(a: Vec2, b: Vec2): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function midpoint(a: Vec2, b: Vec2): Vec2 {
  return { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 };
}

/** Length of the polyline through the given points. */
export function pathLength(points: Vec2[]): number {
  let total = 0;
  for (let i = 1; i < points.length; i += 1) {
    total += distance(points[i - 1], points[i]);
  }
  return total;
}

export function mean(values: number[]): number {
  if (values.length === 0) return Number.NaN;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function clamp(value: number, [low, high]: Range): number {
  return Math.min(high, Math.max(low, value));
}

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function isVisible(point: Keypoint | undefined, minVisibility: number): point is Keypoint {
  return (
    point !== undefined &&
    Number.isFinite(point.x) &&
    Number.isFinite(point.y) &&
    point.visibility >= minVisibility
  );
}

export type LandmarkLookup<N extends LandmarkName> = (name: N) => Keypoint;

/**
 * Checks that every requested landmark is present and visible, throwing with
 * the full list of those that are not. Returns a lookup restricted to them.
 */
export function requireLandmarks<N extends LandmarkName>(
  keypoints: KeypointSet,
  names: readonly N[],
  minVisibility: number,
  purpose: string
): LandmarkLookup<N> {
  const missing = names.filter(name => !isVisible(keypoints[name], minVisibility));
  if (missing.length > 0) {
    throw new InsufficientKeypointsError(purpose, missing);
  }

  return name => {
    const point = keypoints[name];
    if (!isVisible(point, minVisibility)) {
      throw new InsufficientKeypointsError(purpose, [name]);
    }
    return point;
  };
}
