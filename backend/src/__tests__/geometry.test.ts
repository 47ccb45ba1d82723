import { describe, it, expect } from 'vitest';
import {
  clamp,
  distance,
  isVisible,
  mean,
  midpoint,
  pathLength,
  requireLandmarks,
  round1
} from '../core/geometry.js';
import { InsufficientKeypointsError } from '../lib/errors.js';
import { standingPose, withVisibility, withoutLandmarks } from './fixtures/poses.js';

describe('geometry', () => {
  it('measures euclidean distance and midpoints', () => {
    expect(distance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
    expect(midpoint({ x: 2, y: 10 }, { x: 6, y: 20 })).toEqual({ x: 4, y: 15 });
  });

  it('sums polyline segments', () => {
    expect(pathLength([{ x: 0, y: 0 }, { x: 0, y: 10 }, { x: 6, y: 18 }])).toBe(20);
    expect(pathLength([{ x: 1, y: 1 }])).toBe(0);
  });

  it('returns NaN for the mean of nothing', () => {
    expect(mean([2, 4, 9])).toBe(5);
    expect(mean([])).toBeNaN();
  });

  it('clamps and rounds', () => {
    expect(clamp(5, [10, 20])).toBe(10);
    expect(clamp(25, [10, 20])).toBe(20);
    expect(clamp(12, [10, 20])).toBe(12);
    expect(round1(12.345)).toBe(12.3);
    expect(round1(7.96)).toBe(8);
  });

  describe('isVisible', () => {
    it('requires finite coordinates and enough visibility', () => {
      expect(isVisible({ x: 1, y: 1, visibility: 0.5 }, 0.5)).toBe(true);
      expect(isVisible({ x: 1, y: 1, visibility: 0.49 }, 0.5)).toBe(false);
      expect(isVisible({ x: Number.NaN, y: 1, visibility: 1 }, 0.5)).toBe(false);
      expect(isVisible(undefined, 0)).toBe(false);
    });
  });

  describe('requireLandmarks', () => {
    it('returns a lookup for visible landmarks', () => {
      const at = requireLandmarks(standingPose(), ['nose', 'left_hip'], 0.5, 'test');
      expect(at('nose')).toEqual({ x: 500, y: 100, visibility: 0.95 });
    });

    it('lists every missing or hidden landmark in one error', () => {
      const pose = withVisibility(withoutLandmarks(standingPose(), ['left_knee']), 'right_ankle', 0.1);
      let caught: unknown;
      try {
        requireLandmarks(pose, ['left_knee', 'right_knee', 'right_ankle'], 0.5, 'inseam');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InsufficientKeypointsError);
      if (caught instanceof InsufficientKeypointsError) {
        expect(caught.landmarks).toEqual(['left_knee', 'right_ankle']);
        expect(caught.kind).toBe('InsufficientKeypoints');
        expect(caught.message).toBe(
          'Cannot estimate inseam: left knee, right ankle not clearly visible. Retake the photo standing fully in frame.'
        );
      }
    });
  });
});
