import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from '../config/body-model.js';
import { analyzeBody, detectKeypoints, type AnalysisRequest, type PipelineDependencies } from '../core/pipeline.js';
import {
  InsufficientKeypointsError,
  InvalidSizeChartError,
  LowPhotoQualityError,
  NoPersonDetectedError
} from '../lib/errors.js';
import { DisabledEnhancer, type MeasurementEnhancer } from '../services/enhancer.js';
import { StaticKeypointProvider, type KeypointProvider } from '../services/keypoints.js';
import { OpenAIEnhancer } from '../services/openai.js';
import type { KeypointSet } from '../types/contracts.js';
import { narrowShoulderPose, standingPose, withVisibility, withoutLandmarks } from './fixtures/poses.js';

const image = { buffer: Buffer.alloc(0), mimeType: 'image/png' };

const config: PipelineConfig = { ...DEFAULT_PIPELINE_CONFIG, detectionTimeoutMs: 20, enhancementTimeoutMs: 20 };

function request(overrides: Partial<AnalysisRequest> = {}): AnalysisRequest {
  return { requestId: 'req-1', front: { image }, gender: 'male', garment: 'shirt', heightCm: 170, ...overrides };
}

function deps(overrides: Partial<PipelineDependencies> = {}): PipelineDependencies {
  return {
    keypoints: new StaticKeypointProvider(standingPose()),
    enhancer: new DisabledEnhancer(),
    ...overrides
  };
}

function never<T>(signal: AbortSignal): Promise<T> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(new Error('aborted')));
  });
}

class ScriptedProvider implements KeypointProvider {
  calls = 0;

  constructor(private readonly steps: Array<(signal: AbortSignal) => Promise<KeypointSet | null>>) {}

  detect(_image: unknown, signal: AbortSignal): Promise<KeypointSet | null> {
    const step = this.steps[Math.min(this.calls, this.steps.length - 1)];
    this.calls += 1;
    return step(signal);
  }
}

describe('analyzeBody', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('recommends a size from a single front photo', async () => {
    const result = await analyzeBody(request(), deps(), config);

    expect(result.request_id).toBe('req-1');
    expect(result.recommended_size).toBe('L');
    expect(result.base_score).toBe(88.9);
    expect(result.confidence).toBe(88);
    expect(result.all_size_scores).toEqual({ XS: 38.5, S: 72.5, M: 63.8, L: 88.9, XL: 54.9, XXL: 26 });
    expect(result.measurements.chest).toBe(95.9);
    expect(result.measurements.shoulder).toBe(46.8);
    expect(result.body_type).toBe('average');
    expect(result.body_type_source).toBe('classifier');
    expect(result.views_used).toEqual(['front']);
    expect(result.quality_score).toBe(100);
    expect(result.ai_enhanced).toBe(false);
    expect(result.explanation).toBe(
      'Size L is a good fit for your measurements. It may feel loose around the shoulder (46.8cm vs from 48cm).'
    );
    expect(result.warnings).toEqual([{ kind: 'EnhancementUnavailable', message: 'AI enhancement is disabled' }]);
    expect(Object.isFrozen(result)).toBe(true);
  });

  it("sizes narrower shoulders down on the men's chart", async () => {
    const narrow = deps({ keypoints: new StaticKeypointProvider(narrowShoulderPose()) });
    const result = await analyzeBody(request(), narrow, config);

    expect(result.body_type).toBe('average');
    expect(result.measurements.shoulder).toBe(45);
    expect(result.measurements.waist).toBe(114);
    expect(result.measurements.hips).toBe(125.4);
    expect(result.recommended_size).toBe('S');
    expect(result.base_score).toBe(92.4);
    expect(result.confidence).toBe(92);
  });

  it('generates a request id when none is given', async () => {
    const result = await analyzeBody(request({ requestId: undefined }), deps(), config);
    expect(result.request_id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('uses supplied keypoints without calling the provider', async () => {
    const provider = new ScriptedProvider([async () => null]);
    const result = await analyzeBody(
      request({ front: { image, keypoints: standingPose() } }),
      deps({ keypoints: provider }),
      config
    );
    expect(result.recommended_size).toBe('L');
    expect(provider.calls).toBe(0);
  });

  it('adds the mock enhancer boost and explanation', async () => {
    const result = await analyzeBody(request(), deps({ enhancer: new OpenAIEnhancer(null) }), config);

    expect(result.ai_enhanced).toBe(true);
    expect(result.confidence).toBe(93);
    expect(result.base_score).toBe(88.9);
    expect(result.explanation).toBe('Size L should suit you well. Try S if you prefer a different fit.');
    expect(result.warnings).toEqual([]);
  });

  it('accepts plausible enhancer values and bounds its confidence delta', async () => {
    const enhancer: MeasurementEnhancer = {
      name: 'fake',
      enhance: async () => ({
        measurements: { shoulder: 48.5, chest: 200 },
        confidenceDelta: 50,
        bodyType: 'Muscular build',
        reason: 'test'
      }),
      explain: async input => `AI says ${input.recommendedSize}`
    };
    const result = await analyzeBody(request(), deps({ enhancer }), config);

    expect(result.measurements.shoulder).toBe(48.5);
    expect(result.measurements.chest).toBe(95.9);
    expect(result.recommended_size).toBe('L');
    expect(result.base_score).toBe(76.2);
    expect(result.confidence).toBe(96);
    expect(result.body_type).toBe('athletic');
    expect(result.body_type_source).toBe('ai');
    expect(result.explanation).toBe('AI says L');
  });

  it('falls back to its own estimates when the enhancer fails', async () => {
    const enhancer: MeasurementEnhancer = {
      name: 'fake',
      enhance: async () => {
        throw new Error('boom');
      }
    };
    const result = await analyzeBody(request(), deps({ enhancer }), config);

    expect(result.ai_enhanced).toBe(false);
    expect(result.confidence).toBe(88);
    expect(result.warnings).toEqual([{ kind: 'EnhancementUnavailable', message: 'AI enhancement failed: boom' }]);
    expect(console.warn).toHaveBeenCalledWith('[fake] AI enhancement failed: boom');
  });

  it('gives up on a slow enhancer', async () => {
    const enhancer: MeasurementEnhancer = { name: 'slow', enhance: (_input, signal) => never(signal) };
    const result = await analyzeBody(request(), deps({ enhancer }), config);

    expect(result.ai_enhanced).toBe(false);
    expect(result.warnings).toEqual([
      { kind: 'EnhancementUnavailable', message: 'AI enhancement failed: AI enhancement timed out after 20ms' }
    ]);
  });

  it('keeps the template explanation when the AI explanation fails', async () => {
    const enhancer: MeasurementEnhancer = {
      name: 'fake',
      enhance: async () => ({ measurements: {}, confidenceDelta: 0, bodyType: null, reason: null }),
      explain: async () => {
        throw new Error('no words');
      }
    };
    const result = await analyzeBody(request(), deps({ enhancer }), config);

    expect(result.ai_enhanced).toBe(true);
    expect(result.explanation).toBe(
      'Size L is a good fit for your measurements. It may feel loose around the shoulder (46.8cm vs from 48cm).'
    );
  });

  it('only recommends sizes from a custom chart', async () => {
    const sizeChart = [
      { label: 'S', ranges: { chest: [80, 90], shoulder: [40, 44] } },
      { label: 'L', ranges: { chest: [100, 110], shoulder: [48, 52] } }
    ] as const;
    const result = await analyzeBody(request({ sizeChart }), deps(), config);

    expect(['S', 'L']).toContain(result.recommended_size);
    expect(Object.keys(result.all_size_scores)).toEqual(['S', 'L']);
  });

  it('weights measurements by garment', async () => {
    const result = await analyzeBody(request({ garment: 'pants' }), deps(), config);
    expect(result.fit_breakdown.map(fit => fit.measurement)).toEqual(['waist', 'hips', 'inseam']);
  });

  it('measures larger for a taller stated height', async () => {
    const result = await analyzeBody(request({ heightCm: 180 }), deps(), config);

    expect(result.measurements.chest).toBeGreaterThan(95.9);
    expect(result.measurements.neck).toBe(50);
    expect(result.warnings).toContainEqual({
      kind: 'OutOfRangeMeasurement',
      message: 'neck estimate 52.2cm is outside 30-50cm; clamped to 50cm'
    });
  });

  it('fuses a back photo and discards an unusable side photo', async () => {
    const result = await analyzeBody(
      request({
        back: { image, keypoints: standingPose() },
        side: { image, keypoints: withoutLandmarks(standingPose(), ['left_ankle', 'right_ankle']) }
      }),
      deps(),
      config
    );

    expect(result.views_used).toEqual(['front', 'back']);
    expect(result.recommended_size).toBe('L');
    expect(result.warnings).toContainEqual({
      kind: 'ViewDiscarded',
      message:
        'side photo ignored: Cannot estimate photo scale: left ankle, right ankle not clearly visible. Retake the photo standing fully in frame.'
    });
    expect(result.warnings.some(warning => warning.kind === 'MeasurementConflict')).toBe(false);
  });

  it('discards a photo that failed the image checks without detecting on it', async () => {
    const provider = new ScriptedProvider([async () => standingPose()]);
    const result = await analyzeBody(
      request({ front: { image, keypoints: standingPose() }, back: { image, rejection: 'Image is too dark.' } }),
      deps({ keypoints: provider }),
      config
    );

    expect(provider.calls).toBe(0);
    expect(result.views_used).toEqual(['front']);
    expect(result.warnings).toContainEqual({ kind: 'ViewDiscarded', message: 'back photo ignored: Image is too dark.' });
  });

  it('rejects an empty chart before detecting anything', async () => {
    const provider = new ScriptedProvider([async () => standingPose()]);
    await expect(analyzeBody(request({ sizeChart: [] }), deps({ keypoints: provider }), config)).rejects.toThrow(
      InvalidSizeChartError
    );
    expect(provider.calls).toBe(0);
  });

  it('rejects a photo of poor quality', async () => {
    const pose = withoutLandmarks(standingPose(), [
      'nose',
      'left_elbow',
      'right_elbow',
      'left_wrist',
      'right_wrist',
      'left_knee',
      'right_knee'
    ]);
    const attempt = analyzeBody(request(), deps({ keypoints: new StaticKeypointProvider(pose) }), config);

    await expect(attempt).rejects.toBeInstanceOf(LowPhotoQualityError);
    await expect(attempt).rejects.toThrow(
      'Photo quality too low for accurate measurements (27/100). Some body parts are partially hidden. Not visible: head, left knee, right knee.'
    );
  });

  it('rejects a photo whose scale cannot be measured', async () => {
    const pose = withVisibility(standingPose(), 'left_ankle', 0.2);
    await expect(
      analyzeBody(request(), deps({ keypoints: new StaticKeypointProvider(pose) }), config)
    ).rejects.toThrow(InsufficientKeypointsError);
  });
});

describe('detectKeypoints', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('retries once after a failure', async () => {
    const provider = new ScriptedProvider([
      async () => {
        throw new Error('flaky');
      },
      async () => standingPose()
    ]);

    await expect(detectKeypoints(provider, image, 20)).resolves.toEqual(standingPose());
    expect(provider.calls).toBe(2);
    expect(console.warn).toHaveBeenCalledWith('Keypoint detection attempt 1 failed: flaky');
  });

  it('reports no person after two empty results', async () => {
    const provider = new ScriptedProvider([async () => null]);
    await expect(detectKeypoints(provider, image, 20)).rejects.toBeInstanceOf(NoPersonDetectedError);
    expect(provider.calls).toBe(2);
  });

  it('times out a hanging detector', async () => {
    const provider = new ScriptedProvider([signal => never(signal)]);
    await expect(detectKeypoints(provider, image, 20)).rejects.toBeInstanceOf(NoPersonDetectedError);
    expect(provider.calls).toBe(2);
    expect(console.warn).toHaveBeenCalledWith('Keypoint detection attempt 2 failed: Keypoint detection timed out after 20ms');
  });
});
