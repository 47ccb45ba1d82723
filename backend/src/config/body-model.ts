import type {
  BodyType,
  Garment,
  GarmentWeights,
  MeasurementName,
  Range,
  ViewAngle
} from '../types/contracts.js';

/**
 * Anthropometric tables driving calibration, classification and estimation.
 * These are empirically tuned defaults, not physical constants: recalibrate
 * them here rather than in the estimator.
 */

export type CalibrationOptions = {
  minVisibility: number;
  defaultHeightCm: number;
  /** Nose-to-ankle span as a share of standing height. */
  headToAnkleRatio: number;
  /** Hip-to-ankle span as a share of standing height. */
  hipToAnkleRatio: number;
  headToAnkleWeight: number;
  hipToAnkleWeight: number;
};

export const DEFAULT_CALIBRATION: Readonly<CalibrationOptions> = {
  minVisibility: 0.5,
  defaultHeightCm: 170,
  headToAnkleRatio: 0.92,
  hipToAnkleRatio: 0.45,
  headToAnkleWeight: 0.7,
  hipToAnkleWeight: 0.3
};

export const USER_HEIGHT_LIMITS_CM: Range = [100, 250];

export type BodyTypeThresholds = {
  /** shoulder/hip at or above this reads as a broad, athletic frame */
  athleticMinRatio: number;
  /** shoulder/hip below this reads as narrow-shouldered */
  slimMaxRatio: number;
  /** hip width / torso length separating stocky from slim among narrow-shouldered builds */
  stockyMinHipToTorso: number;
  minVisibility: number;
};

export const DEFAULT_BODY_TYPE_THRESHOLDS: Readonly<BodyTypeThresholds> = {
  athleticMinRatio: 1.45,
  slimMaxRatio: 1.1,
  stockyMinHipToTorso: 0.55,
  minVisibility: 0.5
};

export const DEFAULT_BODY_TYPE: BodyType = 'average';

export type MultiplierTable = {
  chest: Record<BodyType, number>;
  waist: number;
  hips: number;
  arm: number;
  inseam: number;
  neck: number;
  bicep: number;
  wrist: number;
  thigh: number;
  calf: number;
  ankle: number;
  back_width: number;
  rise: number;
  /** joint-to-joint width to outer-edge width */
  edgeCorrection: number;
  /** waist level as a share of the hip-to-shoulder vertical span */
  waistLevelRatio: number;
};

export const DEFAULT_MULTIPLIERS: Readonly<MultiplierTable> = {
  chest: { slim: 1.95, athletic: 2.15, average: 2.05, stocky: 2.25 },
  waist: 3.0,
  hips: 3.3,
  arm: 0.88,
  inseam: 0.95,
  neck: 0.9,
  bicep: 1.0,
  wrist: 0.62,
  thigh: 1.5,
  calf: 0.9,
  ankle: 0.52,
  back_width: 0.85,
  rise: 1.15,
  edgeCorrection: 1.17,
  waistLevelRatio: 0.4
};

export const MEASUREMENT_RANGES: Readonly<Record<MeasurementName, Range>> = {
  chest: [60, 160],
  waist: [50, 150],
  hips: [60, 160],
  shoulder: [25, 65],
  arm: [40, 80],
  inseam: [55, 100],
  neck: [30, 50],
  bicep: [20, 50],
  wrist: [10, 25],
  thigh: [40, 80],
  calf: [25, 50],
  ankle: [15, 30],
  torso_length: [35, 75],
  back_width: [25, 60],
  rise: [8, 35]
};

export const GARMENT_WEIGHTS: Readonly<Record<Garment, Readonly<GarmentWeights>>> = {
  shirt: { chest: 3.5, shoulder: 2.5, arm: 1.5, waist: 0, hips: 0, inseam: 0 },
  jacket: { chest: 3, shoulder: 2.5, arm: 2, back_width: 1 },
  pants: { waist: 3, hips: 2, inseam: 2.5, thigh: 1, rise: 1 },
  full: { chest: 2, waist: 1.8, hips: 1.5, inseam: 1, shoulder: 1.2, arm: 0.8 }
};

/** Measurements each camera angle can estimate. Front sees everything. */
export const VIEW_COVERAGE: Readonly<Record<Exclude<ViewAngle, 'front'>, readonly MeasurementName[]>> = {
  back: [
    'waist',
    'hips',
    'shoulder',
    'arm',
    'inseam',
    'bicep',
    'wrist',
    'thigh',
    'calf',
    'ankle',
    'torso_length',
    'back_width',
    'rise'
  ],
  side: ['arm', 'inseam', 'bicep', 'wrist', 'calf', 'ankle', 'torso_length', 'rise']
};

export type EnhancementLimits = {
  maxDeviationCm: number;
  maxConfidenceDelta: number;
};

export const DEFAULT_ENHANCEMENT_LIMITS: Readonly<EnhancementLimits> = {
  maxDeviationCm: 30,
  maxConfidenceDelta: 20
};

export type PipelineConfig = {
  calibration: Readonly<CalibrationOptions>;
  bodyTypeThresholds: Readonly<BodyTypeThresholds>;
  multipliers: Readonly<MultiplierTable>;
  ranges: Readonly<Record<MeasurementName, Range>>;
  correctionFactors: Readonly<Partial<Record<MeasurementName, number>>>;
  garmentWeights: Readonly<Record<Garment, Readonly<GarmentWeights>>>;
  enhancement: Readonly<EnhancementLimits>;
  /** percent spread between views above which a conflict warning is raised */
  conflictThresholdPercent: number;
  minQualityScore: number;
  detectionTimeoutMs: number;
  enhancementTimeoutMs: number;
};

export const DEFAULT_PIPELINE_CONFIG: Readonly<PipelineConfig> = {
  calibration: DEFAULT_CALIBRATION,
  bodyTypeThresholds: DEFAULT_BODY_TYPE_THRESHOLDS,
  multipliers: DEFAULT_MULTIPLIERS,
  ranges: MEASUREMENT_RANGES,
  correctionFactors: {},
  garmentWeights: GARMENT_WEIGHTS,
  enhancement: DEFAULT_ENHANCEMENT_LIMITS,
  conflictThresholdPercent: 20,
  minQualityScore: 40,
  detectionTimeoutMs: 10_000,
  enhancementTimeoutMs: 8_000
};
