import { randomUUID } from 'node:crypto';
import {
  MEASUREMENT_NAMES,
  type BodyType,
  type Garment,
  type Gender,
  type KeypointSet,
  type MeasurementSet,
  type PipelineWarning,
  type RecommendationResult,
  type SizeChart,
  type ViewAngle
} from '../types/contracts.js';
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from '../config/body-model.js';
import { standardChart } from '../config/size-charts.js';
import {
  EnhancementUnavailableError,
  InvalidSizeChartError,
  LowPhotoQualityError,
  NoPersonDetectedError,
  errorMessage
} from '../lib/errors.js';
import { withTimeout } from '../lib/timeout.js';
import type { ImageInput, KeypointProvider } from '../services/keypoints.js';
import type { EnhancementResult, MeasurementEnhancer } from '../services/enhancer.js';
import { classifyBodyType, normalizeBodyType } from './body-type.js';
import { calibrate, clampHeight } from './calibration.js';
import { detectConflicts, fuseMeasurements } from './fusion.js';
import { clampMeasurements, estimateMeasurements, roundMeasurements } from './measurements.js';
import { assessPose, scorePhotoQuality, type ImageMetrics } from './pose-quality.js';
import { recommendSize } from './size-recommender.js';

const DETECTION_ATTEMPTS = 2;

export type ViewInput = {
  image: ImageInput;
  /** Landmarks from an on-device detector; skips the provider. */
  keypoints?: KeypointSet | null;
  imageMetrics?: ImageMetrics | null;
  /** Why the photo failed the image checks; such a view is never measured. */
  rejection?: string | null;
};

export type AnalysisRequest = {
  requestId?: string;
  front: ViewInput;
  back?: ViewInput | null;
  side?: ViewInput | null;
  gender: Gender;
  garment: Garment;
  heightCm?: number | null;
  /** Store chart; defaults to the standard chart for `gender`. */
  sizeChart?: SizeChart | null;
};

export type PipelineDependencies = {
  keypoints: KeypointProvider;
  enhancer: MeasurementEnhancer;
};

/**
 * Detects keypoints with one retry on the same image. An empty result, an
 * error and a timeout all count as a failed attempt.
 */
export async function detectKeypoints(
  provider: KeypointProvider,
  image: ImageInput,
  timeoutMs: number
): Promise<KeypointSet> {
  for (let attempt = 1; attempt <= DETECTION_ATTEMPTS; attempt += 1) {
    try {
      const keypoints = await withTimeout(signal => provider.detect(image, signal), timeoutMs, 'Keypoint detection');
      if (keypoints && Object.keys(keypoints).length > 0) {
        return keypoints;
      }
    } catch (error: unknown) {
      console.warn(`Keypoint detection attempt ${attempt} failed: ${errorMessage(error)}`);
    }
  }

  throw new NoPersonDetectedError();
}

async function viewKeypoints(view: ViewInput, deps: PipelineDependencies, config: PipelineConfig): Promise<KeypointSet> {
  return view.keypoints ?? detectKeypoints(deps.keypoints, view.image, config.detectionTimeoutMs);
}

function measureView(
  keypoints: KeypointSet,
  bodyType: BodyType,
  heightCm: number | null,
  config: PipelineConfig
) {
  const scale = calibrate(keypoints, heightCm, config.calibration);
  return estimateMeasurements(keypoints, scale, bodyType, {
    multipliers: config.multipliers,
    ranges: config.ranges,
    correctionFactors: config.correctionFactors,
    minVisibility: config.calibration.minVisibility
  });
}

async function measureOptionalView(
  angle: Exclude<ViewAngle, 'front'>,
  view: ViewInput,
  bodyType: BodyType,
  heightCm: number | null,
  deps: PipelineDependencies,
  config: PipelineConfig
): Promise<{ measurements: MeasurementSet | null; warnings: PipelineWarning[] }> {
  const discard = (reason: string) => ({
    measurements: null,
    warnings: [{ kind: 'ViewDiscarded' as const, message: `${angle} photo ignored: ${reason}` }]
  });
  if (view.rejection) {
    return discard(view.rejection);
  }
  try {
    const keypoints = await viewKeypoints(view, deps, config);
    return measureView(keypoints, bodyType, heightCm, config);
  } catch (error: unknown) {
    return discard(errorMessage(error));
  }
}

/**
 * Applies accepted replacements: each within the allowed deviation from its
 * estimate, then clamped to its sane range.
 */
function mergeEnhancement(
  measurements: MeasurementSet,
  enhancement: EnhancementResult,
  config: PipelineConfig
): { measurements: MeasurementSet; warnings: PipelineWarning[] } {
  const merged = { ...measurements };
  for (const name of MEASUREMENT_NAMES) {
    const proposed = enhancement.measurements[name];
    if (proposed === undefined || !Number.isFinite(proposed)) continue;
    if (Math.abs(proposed - measurements[name]) <= config.enhancement.maxDeviationCm) {
      merged[name] = proposed;
    }
  }
  return clampMeasurements(merged, config.ranges);
}

function clampDelta(delta: number, limit: number): number {
  if (!Number.isFinite(delta)) return 0;
  return Math.max(-limit, Math.min(limit, delta));
}

/**
 * Photo(s) in, size recommendation out. Fatal problems (no person, missing
 * landmarks, bad chart, poor photo) throw a PipelineError; everything else is
 * reported through `warnings` and never interrupts processing.
 */
export async function analyzeBody(
  request: AnalysisRequest,
  deps: PipelineDependencies,
  config: Readonly<PipelineConfig> = DEFAULT_PIPELINE_CONFIG
): Promise<RecommendationResult> {
  const chart = request.sizeChart ?? standardChart(request.gender);
  if (chart.length === 0) {
    throw new InvalidSizeChartError('the chart has no sizes');
  }
  const weights = config.garmentWeights[request.garment];
  const heightCm = request.heightCm == null ? null : clampHeight(request.heightCm);
  const warnings: PipelineWarning[] = [];

  const frontKeypoints = await viewKeypoints(request.front, deps, config);

  const quality = scorePhotoQuality(assessPose(frontKeypoints), request.front.imageMetrics);
  if (quality.score < config.minQualityScore) {
    throw new LowPhotoQualityError(quality.score, quality.warnings);
  }
  for (const message of quality.warnings) warnings.push({ kind: 'PhotoQuality', message });

  const classifiedBodyType = classifyBodyType(frontKeypoints, config.bodyTypeThresholds);
  const front = measureView(frontKeypoints, classifiedBodyType, heightCm, config);
  warnings.push(...front.warnings);

  const viewsUsed: ViewAngle[] = ['front'];
  let back: MeasurementSet | null = null;
  let side: MeasurementSet | null = null;

  if (request.back) {
    const result = await measureOptionalView('back', request.back, classifiedBodyType, heightCm, deps, config);
    warnings.push(...result.warnings);
    back = result.measurements;
    if (back) viewsUsed.push('back');
  }
  if (request.side) {
    const result = await measureOptionalView('side', request.side, classifiedBodyType, heightCm, deps, config);
    warnings.push(...result.warnings);
    side = result.measurements;
    if (side) viewsUsed.push('side');
  }

  let measurements = front.measurements;
  if (back || side) {
    const views = { front: front.measurements, back, side };
    measurements = fuseMeasurements(views);
    warnings.push(...detectConflicts(views, config.conflictThresholdPercent));
  }

  let aiEnhanced = false;
  let confidenceDelta = 0;
  let aiBodyType: string | null = null;
  try {
    const enhancement = await withTimeout(
      signal =>
        deps.enhancer.enhance(
          { image: request.front.image, measurements, bodyType: classifiedBodyType, gender: request.gender },
          signal
        ),
      config.enhancementTimeoutMs,
      'AI enhancement'
    );
    const merged = mergeEnhancement(measurements, enhancement, config);
    measurements = merged.measurements;
    warnings.push(...merged.warnings);
    confidenceDelta = clampDelta(enhancement.confidenceDelta, config.enhancement.maxConfidenceDelta);
    aiBodyType = enhancement.bodyType;
    aiEnhanced = true;
  } catch (error: unknown) {
    const reason = error instanceof EnhancementUnavailableError ? error.message : `AI enhancement failed: ${errorMessage(error)}`;
    console.warn(`[${deps.enhancer.name}] ${reason}`);
    warnings.push({ kind: 'EnhancementUnavailable', message: reason });
  }

  const finalMeasurements = Object.freeze(roundMeasurements(measurements));
  const recommendation = recommendSize(finalMeasurements, chart, weights);
  const confidence = Math.floor(Math.max(0, Math.min(100, recommendation.score + confidenceDelta)));

  let explanation = recommendation.explanation;
  const explain = deps.enhancer.explain?.bind(deps.enhancer);
  if (aiEnhanced && explain) {
    try {
      explanation = await withTimeout(
        signal =>
          explain(
            {
              measurements: finalMeasurements,
              recommendedSize: recommendation.recommended_size,
              confidence,
              allSizeScores: recommendation.all_size_scores,
              runnerUp: recommendation.runner_up,
              gender: request.gender,
              garment: request.garment
            },
            signal
          ),
        config.enhancementTimeoutMs,
        'AI explanation'
      );
    } catch (error: unknown) {
      console.warn(`[${deps.enhancer.name}] AI explanation failed, keeping template: ${errorMessage(error)}`);
    }
  }

  const bodyType = aiBodyType ? normalizeBodyType(aiBodyType) : classifiedBodyType;

  const result: RecommendationResult = {
    request_id: request.requestId ?? randomUUID(),
    recommended_size: recommendation.recommended_size,
    confidence,
    base_score: Math.round(recommendation.score * 10) / 10,
    explanation,
    measurements: finalMeasurements,
    all_size_scores: recommendation.all_size_scores,
    fit_breakdown: recommendation.fit_breakdown,
    ai_enhanced: aiEnhanced,
    body_type: bodyType,
    body_type_source: aiBodyType ? 'ai' : 'classifier',
    views_used: viewsUsed,
    quality_score: quality.score,
    warnings
  };
  return Object.freeze(result);
}
