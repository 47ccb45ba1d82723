import { afterEach, describe, it, expect, vi } from 'vitest';
import { buildDependencies } from '../app.js';
import { loadEnv } from '../config/env.js';
import { analyzeBody } from '../core/pipeline.js';
import { standingPose } from './fixtures/poses.js';

describe('loadEnv', () => {
  it('fills in defaults', () => {
    expect(loadEnv({})).toEqual({
      PORT: 3001,
      OPENAI_API_KEY: '',
      OPENAI_MODEL: 'gpt-4o-mini',
      MOCK_AI: true,
      ENABLE_AI_ENHANCEMENT: true,
      AI_TIMEOUT_MS: 8000,
      DETECTION_TIMEOUT_MS: 10000,
      MIN_QUALITY_SCORE: 40,
      RATE_LIMIT_MAX: 30
    });
  });

  it('coerces numbers and flags', () => {
    const env = loadEnv({ PORT: '8080', MOCK_AI: 'no', ENABLE_AI_ENHANCEMENT: 'On', MIN_QUALITY_SCORE: '55' });
    expect(env.PORT).toBe(8080);
    expect(env.MOCK_AI).toBe(false);
    expect(env.ENABLE_AI_ENHANCEMENT).toBe(true);
    expect(env.MIN_QUALITY_SCORE).toBe(55);
  });

  it('rejects malformed values', () => {
    expect(() => loadEnv({ PORT: 'abc' })).toThrow(/^Invalid environment configuration: PORT: /);
  });
});

describe('buildDependencies', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs in mock mode when asked to', () => {
    const deps = buildDependencies(loadEnv({ MOCK_AI: 'true', AI_TIMEOUT_MS: '500', MIN_QUALITY_SCORE: '60' }));
    expect(deps.enhancer.name).toBe('mock');
    expect(deps.config.enhancementTimeoutMs).toBe(500);
    expect(deps.config.minQualityScore).toBe(60);
    expect(deps.rateLimitMax).toBe(30);
  });

  it('leaves results unenhanced when there is no API key', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const deps = buildDependencies(loadEnv({ MOCK_AI: 'false', OPENAI_API_KEY: '' }));
    expect(deps.enhancer.name).toBe('disabled');

    const result = await analyzeBody(
      {
        front: { image: { buffer: Buffer.alloc(0), mimeType: 'image/png' }, keypoints: standingPose() },
        gender: 'male',
        garment: 'shirt',
        heightCm: 170
      },
      deps,
      deps.config
    );

    expect(result.ai_enhanced).toBe(false);
    expect(result.base_score).toBe(88.9);
    expect(result.confidence).toBe(88);
    expect(result.warnings).toContainEqual({
      kind: 'EnhancementUnavailable',
      message: 'AI enhancement unavailable: OPENAI_API_KEY is not set'
    });
  });

  it('uses the model when a key is set and mocking is off', () => {
    const deps = buildDependencies(loadEnv({ MOCK_AI: 'false', OPENAI_API_KEY: 'test-secret' }));
    expect(deps.enhancer.name).toBe('openai');
  });

  it('can switch enhancement off', () => {
    const deps = buildDependencies(loadEnv({ ENABLE_AI_ENHANCEMENT: 'false' }));
    expect(deps.enhancer.name).toBe('disabled');
  });
});
