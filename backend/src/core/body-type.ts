import { BODY_TYPES, type BodyType, type KeypointSet } from '../types/contracts.js';
import {
  DEFAULT_BODY_TYPE,
  DEFAULT_BODY_TYPE_THRESHOLDS,
  type BodyTypeThresholds
} from '../config/body-model.js';
import { distance, isVisible, midpoint } from './geometry.js';

export type BodyProportions = {
  shoulderToHip: number;
  hipToTorso: number;
};

export function bodyProportions(
  keypoints: KeypointSet,
  minVisibility = DEFAULT_BODY_TYPE_THRESHOLDS.minVisibility
): BodyProportions | null {
  const { left_shoulder, right_shoulder, left_hip, right_hip } = keypoints;
  if (
    !isVisible(left_shoulder, minVisibility) ||
    !isVisible(right_shoulder, minVisibility) ||
    !isVisible(left_hip, minVisibility) ||
    !isVisible(right_hip, minVisibility)
  ) {
    return null;
  }

  const shoulderWidth = distance(left_shoulder, right_shoulder);
  const hipWidth = distance(left_hip, right_hip);
  const torsoLength = distance(midpoint(left_shoulder, right_shoulder), midpoint(left_hip, right_hip));

  const shoulderToHip = shoulderWidth / hipWidth;
  const hipToTorso = hipWidth / torsoLength;
  if (!Number.isFinite(shoulderToHip) || !Number.isFinite(hipToTorso) || shoulderToHip <= 0) {
    return null;
  }

  return { shoulderToHip, hipToTorso };
}

export function classifyProportions(
  proportions: BodyProportions | null,
  thresholds: Readonly<BodyTypeThresholds> = DEFAULT_BODY_TYPE_THRESHOLDS
): BodyType {
  if (!proportions) return DEFAULT_BODY_TYPE;

  if (proportions.shoulderToHip >= thresholds.athleticMinRatio) return 'athletic';
  if (proportions.shoulderToHip < thresholds.slimMaxRatio) {
    return proportions.hipToTorso >= thresholds.stockyMinHipToTorso ? 'stocky' : 'slim';
  }
  return DEFAULT_BODY_TYPE;
}

/** Total: anything ambiguous or undetectable classifies as the default build. */
export function classifyBodyType(
  keypoints: KeypointSet,
  thresholds: Readonly<BodyTypeThresholds> = DEFAULT_BODY_TYPE_THRESHOLDS
): BodyType {
  return classifyProportions(bodyProportions(keypoints, thresholds.minVisibility), thresholds);
}

const BODY_TYPE_ALIASES: ReadonlyArray<[pattern: RegExp, bodyType: BodyType]> = [
  [/slim|lean|thin|petite/, 'slim'],
  [/athletic|fit|muscular/, 'athletic'],
  [/stocky|heavy|broad|curvy|plus/, 'stocky'],
  [/average|medium|regular/, 'average']
];

/** Maps a free-form build label (e.g. from a vision model) onto the closed set. */
export function normalizeBodyType(label: string | null | undefined): BodyType {
  if (!label) return DEFAULT_BODY_TYPE;
  const lower = label.trim().toLowerCase();

  const exact = BODY_TYPES.find(type => type === lower);
  if (exact) return exact;

  for (const [pattern, bodyType] of BODY_TYPE_ALIASES) {
    if (pattern.test(lower)) return bodyType;
  }
  return DEFAULT_BODY_TYPE;
}
