export const LANDMARK_NAMES = [
  'nose',
  'left_shoulder',
  'right_shoulder',
  'left_elbow',
  'right_elbow',
  'left_wrist',
  'right_wrist',
  'left_hip',
  'right_hip',
  'left_knee',
  'right_knee',
  'left_ankle',
  'right_ankle'
] as const;

export type LandmarkName = (typeof LANDMARK_NAMES)[number];

export type Keypoint = {
  x: number;
  y: number;
  visibility: number;
};

/** Pixel-space landmarks of one photo. Absent entries were not detected. */
export type KeypointSet = Partial<Record<LandmarkName, Keypoint>>;

export const BODY_TYPES = ['slim', 'athletic', 'average', 'stocky'] as const;
export type BodyType = (typeof BODY_TYPES)[number];

export const MEASUREMENT_NAMES = [
  'chest',
  'waist',
  'hips',
  'shoulder',
  'arm',
  'inseam',
  'neck',
  'bicep',
  'wrist',
  'thigh',
  'calf',
  'ankle',
  'torso_length',
  'back_width',
  'rise'
] as const;

export type MeasurementName = (typeof MEASUREMENT_NAMES)[number];
export type MeasurementSet = Record<MeasurementName, number>;

export type Range = readonly [low: number, high: number];

export type SizeDefinition = {
  label: string;
  ranges: Partial<Record<MeasurementName, Range>>;
};

/** Sizes in chart order; the order breaks score ties. */
export type SizeChart = readonly SizeDefinition[];

export type Gender = 'male' | 'female' | 'unisex';
export type Garment = 'shirt' | 'jacket' | 'pants' | 'full';
export type ViewAngle = 'front' | 'back' | 'side';

export type GarmentWeights = Partial<Record<MeasurementName, number>>;

export type WarningKind =
  | 'OutOfRangeMeasurement'
  | 'EnhancementUnavailable'
  | 'ViewDiscarded'
  | 'MeasurementConflict'
  | 'PhotoQuality';

export type PipelineWarning = {
  kind: WarningKind;
  message: string;
};

export type FitVerdict = 'good' | 'snug' | 'loose';

export type MeasurementFit = {
  measurement: MeasurementName;
  value: number;
  range: Range;
  score: number;
  fit: FitVerdict;
};

export type SizeRecommendation = {
  recommended_size: string;
  score: number;
  all_size_scores: Record<string, number>;
  fit_breakdown: MeasurementFit[];
  runner_up: string | null;
  explanation: string;
};

export type RecommendationResult = {
  request_id: string;
  recommended_size: string;
  confidence: number;
  base_score: number;
  explanation: string;
  measurements: MeasurementSet;
  all_size_scores: Record<string, number>;
  fit_breakdown: MeasurementFit[];
  ai_enhanced: boolean;
  body_type: BodyType;
  body_type_source: 'classifier' | 'ai';
  views_used: ViewAngle[];
  quality_score: number | null;
  warnings: PipelineWarning[];
};
