import { LANDMARK_NAMES, type KeypointSet, type LandmarkName } from '../types/contracts.js';
import { isVisible } from './geometry.js';

export type ImageMetrics = {
  width: number;
  height: number;
  /** mean luminance, 0-255 */
  brightness: number;
  /** Laplacian standard deviation; higher is sharper */
  sharpness: number;
};

export type PoseMetrics = {
  averageVisibility: number;
  visibilityRatio: number;
  frontFacingScore: number;
  postureScore: number;
  missingParts: string[];
};

export type PhotoQuality = {
  score: number;
  warnings: string[];
};

const VISIBLE = 0.5;
const PRESENT = 0.3;
const MIN_BODY_WIDTH_PX = 20;

const FULL_BODY_PARTS: ReadonlyArray<[LandmarkName, string]> = [
  ['nose', 'head'],
  ['left_shoulder', 'left shoulder'],
  ['right_shoulder', 'right shoulder'],
  ['left_hip', 'left hip'],
  ['right_hip', 'right hip'],
  ['left_knee', 'left knee'],
  ['right_knee', 'right knee'],
  ['left_ankle', 'left ankle'],
  ['right_ankle', 'right ankle']
];

/** Symmetry of shoulder and hip spans plus left/right visibility balance. */
function frontFacingScore(keypoints: KeypointSet): number {
  const { left_shoulder, right_shoulder, left_hip, right_hip } = keypoints;
  if (!left_shoulder || !right_shoulder || !left_hip || !right_hip) return 0;

  const shoulderWidth = Math.abs(left_shoulder.x - right_shoulder.x);
  const hipWidth = Math.abs(left_hip.x - right_hip.x);
  if (shoulderWidth < MIN_BODY_WIDTH_PX || hipWidth < MIN_BODY_WIDTH_PX) return 0.3;

  const widthRatio = Math.min(shoulderWidth, hipWidth) / Math.max(shoulderWidth, hipWidth);
  const leftVisibility = (left_shoulder.visibility + left_hip.visibility) / 2;
  const rightVisibility = (right_shoulder.visibility + right_hip.visibility) / 2;
  const strongest = Math.max(leftVisibility, rightVisibility);
  const balance = strongest > 0 ? Math.min(leftVisibility, rightVisibility) / strongest : 0;

  return (widthRatio + balance) / 2;
}

/** 1 for level shoulders and hips over an upright torso; lower when tilted. */
function postureScore(keypoints: KeypointSet): number {
  const { left_shoulder, right_shoulder, left_hip, right_hip } = keypoints;
  if (!left_shoulder || !right_shoulder || !left_hip || !right_hip) return 0;

  if (left_shoulder.y >= left_hip.y || right_shoulder.y >= right_hip.y) return 0.3;

  const shoulderWidth = Math.abs(left_shoulder.x - right_shoulder.x);
  const hipWidth = Math.abs(left_hip.x - right_hip.x);
  const shoulderTilt = shoulderWidth > 0 ? Math.abs(left_shoulder.y - right_shoulder.y) / shoulderWidth : 1;
  const hipTilt = hipWidth > 0 ? Math.abs(left_hip.y - right_hip.y) / hipWidth : 1;
  const maxTilt = Math.max(shoulderTilt, hipTilt);

  if (maxTilt > 0.3) return 0.5;
  return Math.max(0, 1 - maxTilt);
}

export function assessPose(keypoints: KeypointSet): PoseMetrics {
  const visibilities = LANDMARK_NAMES.map(name => keypoints[name]?.visibility ?? 0);
  const visibleCount = visibilities.filter(v => v > VISIBLE).length;

  return {
    averageVisibility: visibilities.reduce((sum, v) => sum + v, 0) / visibilities.length,
    visibilityRatio: visibleCount / visibilities.length,
    frontFacingScore: frontFacingScore(keypoints),
    postureScore: postureScore(keypoints),
    missingParts: FULL_BODY_PARTS.filter(([name]) => !isVisible(keypoints[name], PRESENT)).map(([, part]) => part)
  };
}

/** Combined 0-100 photo quality, with advice for the person retaking it. */
export function scorePhotoQuality(pose: PoseMetrics, image?: ImageMetrics | null): PhotoQuality {
  let score = 100;
  const warnings: string[] = [];

  if (image) {
    if (image.brightness < 60 || image.brightness > 200) score -= 20;
    if (image.brightness < 80) warnings.push('Photo could be brighter for better accuracy');
  }

  if (pose.visibilityRatio < 0.9) score -= Math.trunc((0.9 - pose.visibilityRatio) * 100);
  if (pose.frontFacingScore < 0.9) score -= Math.trunc((0.9 - pose.frontFacingScore) * 50);
  if (pose.postureScore < 0.9) score -= Math.trunc((0.9 - pose.postureScore) * 30);
  score -= pose.missingParts.length * 10;

  if (pose.frontFacingScore < 0.85) warnings.push('Face the camera more directly for improved measurements');
  if (pose.visibilityRatio < 0.85) warnings.push('Some body parts are partially hidden');
  if (pose.postureScore < 0.85) warnings.push('Stand straight with your shoulders level');
  if (pose.missingParts.length > 0) warnings.push(`Not visible: ${pose.missingParts.join(', ')}`);

  return { score: Math.max(0, Math.min(100, score)), warnings };
}
