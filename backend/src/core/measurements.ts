import {
  MEASUREMENT_NAMES,
  type BodyType,
  type KeypointSet,
  type MeasurementName,
  type MeasurementSet,
  type PipelineWarning,
  type Range
} from '../types/contracts.js';
import {
  DEFAULT_CALIBRATION,
  DEFAULT_MULTIPLIERS,
  MEASUREMENT_RANGES,
  type MultiplierTable
} from '../config/body-model.js';
import { clamp, distance, mean, midpoint, pathLength, requireLandmarks, round1 } from './geometry.js';

export type EstimateOptions = {
  multipliers: Readonly<MultiplierTable>;
  ranges: Readonly<Record<MeasurementName, Range>>;
  correctionFactors: Readonly<Partial<Record<MeasurementName, number>>>;
  minVisibility: number;
};

const DEFAULT_ESTIMATE_OPTIONS: EstimateOptions = {
  multipliers: DEFAULT_MULTIPLIERS,
  ranges: MEASUREMENT_RANGES,
  correctionFactors: {},
  minVisibility: DEFAULT_CALIBRATION.minVisibility
};

export type MeasurementEstimate = {
  measurements: MeasurementSet;
  warnings: PipelineWarning[];
};

/**
 * Derives the 15 body measurements (cm) from pixel keypoints.
 *
 * Limb lengths average both sides to cancel the bias of a body not square to
 * the camera, and leg length follows hip→knee→ankle rather than the vertical
 * span so a bent knee does not distort it. Values are clamped to their sane
 * range; anything that needed clamping is reported as a warning.
 */
export function estimateMeasurements(
  keypoints: KeypointSet,
  scale: number,
  bodyType: BodyType,
  options: Partial<EstimateOptions> = {}
): MeasurementEstimate {
  if (!Number.isFinite(scale) || scale <= 0) {
    throw new RangeError(`Scale must be a positive number of pixels per cm, got ${scale}`);
  }

  const { multipliers, ranges, correctionFactors, minVisibility } = { ...DEFAULT_ESTIMATE_OPTIONS, ...options };
  const cm = (px: number) => px / scale;

  const torso = requireLandmarks(
    keypoints,
    ['left_shoulder', 'right_shoulder', 'left_hip', 'right_hip'],
    minVisibility,
    'chest, waist and hips'
  );
  const shoulderMid = midpoint(torso('left_shoulder'), torso('right_shoulder'));
  const hipMid = midpoint(torso('left_hip'), torso('right_hip'));
  const shoulderWidth = cm(distance(torso('left_shoulder'), torso('right_shoulder')));
  const hipWidth = cm(distance(torso('left_hip'), torso('right_hip')));
  const shoulderEdgeWidth = shoulderWidth * multipliers.edgeCorrection;
  const hipEdgeWidth = hipWidth * multipliers.edgeCorrection;

  const arms = requireLandmarks(
    keypoints,
    ['left_shoulder', 'right_shoulder', 'left_elbow', 'right_elbow', 'left_wrist', 'right_wrist'],
    minVisibility,
    'arm, bicep and wrist'
  );
  const upperArm = cm(
    mean([
      distance(arms('left_shoulder'), arms('left_elbow')),
      distance(arms('right_shoulder'), arms('right_elbow'))
    ])
  );
  const forearm = cm(
    mean([distance(arms('left_elbow'), arms('left_wrist')), distance(arms('right_elbow'), arms('right_wrist'))])
  );
  const armPath = cm(
    mean([
      pathLength([arms('left_shoulder'), arms('left_elbow'), arms('left_wrist')]),
      pathLength([arms('right_shoulder'), arms('right_elbow'), arms('right_wrist')])
    ])
  );

  const legs = requireLandmarks(
    keypoints,
    ['left_hip', 'right_hip', 'left_knee', 'right_knee', 'left_ankle', 'right_ankle'],
    minVisibility,
    'inseam, calf and ankle'
  );
  const legPath = cm(
    mean([
      pathLength([legs('left_hip'), legs('left_knee'), legs('left_ankle')]),
      pathLength([legs('right_hip'), legs('right_knee'), legs('right_ankle')])
    ])
  );
  const shin = cm(
    mean([distance(legs('left_knee'), legs('left_ankle')), distance(legs('right_knee'), legs('right_ankle'))])
  );

  const torsoLength = cm(distance(shoulderMid, hipMid));
  const riseSpan = cm(Math.abs(hipMid.y - shoulderMid.y)) * multipliers.waistLevelRatio;

  const raw: MeasurementSet = {
    chest: shoulderWidth * multipliers.chest[bodyType],
    waist: hipWidth * multipliers.waist,
    hips: hipWidth * multipliers.hips,
    shoulder: shoulderWidth,
    arm: armPath * multipliers.arm,
    inseam: legPath * multipliers.inseam,
    neck: shoulderEdgeWidth * multipliers.neck,
    bicep: upperArm * multipliers.bicep,
    wrist: forearm * multipliers.wrist,
    thigh: hipEdgeWidth * multipliers.thigh,
    calf: shin * multipliers.calf,
    ankle: shin * multipliers.ankle,
    torso_length: torsoLength,
    back_width: shoulderEdgeWidth * multipliers.back_width,
    rise: riseSpan * multipliers.rise
  };

  return clampMeasurements(applyCorrections(raw, correctionFactors), ranges);
}

export function applyCorrections(
  measurements: MeasurementSet,
  factors: Readonly<Partial<Record<MeasurementName, number>>>
): MeasurementSet {
  const out = { ...measurements };
  for (const name of MEASUREMENT_NAMES) {
    const factor = factors[name];
    if (factor !== undefined) out[name] = measurements[name] * factor;
  }
  return out;
}

export function clampMeasurements(
  measurements: MeasurementSet,
  ranges: Readonly<Record<MeasurementName, Range>> = MEASUREMENT_RANGES
): MeasurementEstimate {
  const clamped = { ...measurements };
  const warnings: PipelineWarning[] = [];

  for (const name of MEASUREMENT_NAMES) {
    const value = measurements[name];
    const range = ranges[name];
    const bounded = clamp(value, range);
    if (bounded !== value || Number.isNaN(value)) {
      clamped[name] = Number.isNaN(value) ? range[0] : bounded;
      warnings.push({
        kind: 'OutOfRangeMeasurement',
        message: `${name} estimate ${round1(value)}cm is outside ${range[0]}-${range[1]}cm; clamped to ${clamped[name]}cm`
      });
    }
  }

  return { measurements: clamped, warnings };
}

export function roundMeasurements(measurements: MeasurementSet): MeasurementSet {
  const out = { ...measurements };
  for (const name of MEASUREMENT_NAMES) out[name] = round1(measurements[name]);
  return out;
}

/**
 * Correction factors that map estimates onto known tape measurements.
 * Names without a usable estimate are left out.
 */
export function deriveCorrectionFactors(
  estimated: MeasurementSet,
  actual: Partial<Record<MeasurementName, number>>
): Partial<Record<MeasurementName, number>> {
  const factors: Partial<Record<MeasurementName, number>> = {};
  for (const name of MEASUREMENT_NAMES) {
    const target = actual[name];
    const estimate = estimated[name];
    if (target !== undefined && target > 0 && estimate > 0) {
      factors[name] = target / estimate;
    }
  }
  return factors;
}
