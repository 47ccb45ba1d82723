import express, { type Express } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import OpenAI from 'openai';
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from './config/body-model.js';
import type { AppEnv } from './config/env.js';
import { createAnalyzeRouter } from './routes/analyze.js';
import { DisabledEnhancer, type MeasurementEnhancer } from './services/enhancer.js';
import type { KeypointProvider } from './services/keypoints.js';
import { OpenAIEnhancer, OpenAIPoseDetector, createOpenAIVisionModel, type VisionModel } from './services/openai.js';

export type AppDependencies = {
  keypoints: KeypointProvider;
  enhancer: MeasurementEnhancer;
  config: Readonly<PipelineConfig>;
  rateLimitMax?: number;
};

// Canned enhancement only when mock mode is asked for; a missing key means no enhancement.
function selectEnhancer(env: AppEnv, model: VisionModel | null): MeasurementEnhancer {
  if (!env.ENABLE_AI_ENHANCEMENT) return new DisabledEnhancer();
  if (model) return new OpenAIEnhancer(model);
  if (env.MOCK_AI) return new OpenAIEnhancer(null);
  return new DisabledEnhancer('AI enhancement unavailable: OPENAI_API_KEY is not set');
}

export function buildDependencies(env: AppEnv): AppDependencies {
  const client = env.OPENAI_API_KEY ? new OpenAI({ apiKey: env.OPENAI_API_KEY }) : null;
  const model = env.MOCK_AI || !client ? null : createOpenAIVisionModel(client, env.OPENAI_MODEL);

  return {
    keypoints: new OpenAIPoseDetector(model),
    enhancer: selectEnhancer(env, model),
    config: {
      ...DEFAULT_PIPELINE_CONFIG,
      minQualityScore: env.MIN_QUALITY_SCORE,
      detectionTimeoutMs: env.DETECTION_TIMEOUT_MS,
      enhancementTimeoutMs: env.AI_TIMEOUT_MS
    },
    rateLimitMax: env.RATE_LIMIT_MAX
  };
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.use(
    rateLimit({
      windowMs: 60_000,
      max: deps.rateLimitMax ?? 30
    })
  );

  app.get('/health', (_req, res) => res.json({ ok: true }));
  app.use('/analyze', createAnalyzeRouter(deps));

  return app;
}
