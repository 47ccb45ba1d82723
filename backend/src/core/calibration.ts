import type { KeypointSet, LandmarkName } from '../types/contracts.js';
import { DEFAULT_CALIBRATION, USER_HEIGHT_LIMITS_CM, type CalibrationOptions } from '../config/body-model.js';
import { InsufficientKeypointsError } from '../lib/errors.js';
import { clamp, midpoint, requireLandmarks } from './geometry.js';

const CALIBRATION_LANDMARKS: readonly LandmarkName[] = [
  'nose',
  'left_hip',
  'right_hip',
  'left_ankle',
  'right_ankle'
];

export function clampHeight(heightCm: number): number {
  return clamp(heightCm, USER_HEIGHT_LIMITS_CM);
}

/**
 * Pixels per centimetre for one photo.
 *
 * Blends two anatomical spans so that noise in either landmark pair is damped:
 * nose→ankle against ~92% of standing height, and hip→ankle against ~45%.
 * Never falls back to a guessed scale; unusable keypoints throw.
 */
export function calibrate(
  keypoints: KeypointSet,
  userHeightCm?: number | null,
  options: Readonly<CalibrationOptions> = DEFAULT_CALIBRATION
): number {
  const at = requireLandmarks(keypoints, CALIBRATION_LANDMARKS, options.minVisibility, 'photo scale');

  const heightCm = userHeightCm ?? options.defaultHeightCm;
  if (!Number.isFinite(heightCm) || heightCm <= 0) {
    throw new RangeError(`Height must be a positive number of centimetres, got ${heightCm}`);
  }

  const ankle = midpoint(at('left_ankle'), at('right_ankle'));
  const hip = midpoint(at('left_hip'), at('right_hip'));

  const headToAnklePx = ankle.y - at('nose').y;
  const hipToAnklePx = ankle.y - hip.y;

  const methodA = headToAnklePx / (heightCm * options.headToAnkleRatio);
  const methodB = hipToAnklePx / (heightCm * options.hipToAnkleRatio);
  const scale = options.headToAnkleWeight * methodA + options.hipToAnkleWeight * methodB;

  if (headToAnklePx <= 0 || hipToAnklePx <= 0 || !Number.isFinite(scale) || scale <= 0) {
    throw new InsufficientKeypointsError(
      'photo scale',
      ['nose', 'left_ankle', 'right_ankle'],
      'the pose is not upright (ankles must be below the hips and head)'
    );
  }

  return scale;
}
