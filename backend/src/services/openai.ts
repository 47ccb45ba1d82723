import OpenAI from 'openai';
import sharp from 'sharp';
import { z } from 'zod';
import {
  LANDMARK_NAMES,
  MEASUREMENT_NAMES,
  type KeypointSet,
  type LandmarkName
} from '../types/contracts.js';
import type { ImageInput, KeypointProvider } from './keypoints.js';
import type {
  EnhancementInput,
  EnhancementResult,
  ExplanationInput,
  MeasurementEnhancer
} from './enhancer.js';

/** The one model capability the services need: text out for text (and optionally an image) in. */
export interface VisionModel {
  complete(args: { prompt: string; image?: ImageInput; signal?: AbortSignal }): Promise<string>;
}

function toDataUrl(image: ImageInput): string {
  return `data:${image.mimeType};base64,${image.buffer.toString('base64')}`;
}

export function createOpenAIVisionModel(client: OpenAI, model: string): VisionModel {
  return {
    async complete({ prompt, image, signal }) {
      const resp = await client.responses.create(
        {
          model,
          input: [
            {
              role: 'user',
              content: image
                ? [
                    { type: 'input_text', text: prompt },
                    { type: 'input_image', image_url: toDataUrl(image), detail: 'auto' }
                  ]
                : [{ type: 'input_text', text: prompt }]
            }
          ]
        },
        { signal }
      );

      return resp.output_text;
    }
  };
}

/**
 * Schemas: validate that the model returns exactly what our API expects.
 * This prevents malformed model output from breaking the pipeline.
 */
const NormalizedLandmarkSchema = z.object({
  x: z.number().min(0).max(1),
  y: z.number().min(0).max(1),
  visibility: z.number().min(0).max(1)
});

const PoseSchema = z.object({
  person_detected: z.boolean(),
  landmarks: z.record(z.enum(LANDMARK_NAMES), NormalizedLandmarkSchema).default({})
});

const EnhancementSchema = z.object({
  measurements: z.record(z.enum(MEASUREMENT_NAMES), z.number().positive()).default({}),
  confidence_boost: z.number().default(0),
  body_type: z.string().nullable().optional(),
  adjustment_reason: z.string().nullable().optional()
});

export function safeParseJsonFromModel(text: string): unknown {
  const trimmed = text.trim();
  // Best case: the model returns pure JSON.
  try {
    return JSON.parse(trimmed);
  } catch {
    // Common failure case: extra text or a code fence around JSON.
    const first = trimmed.indexOf('{');
    const last = trimmed.lastIndexOf('}');
    if (first >= 0 && last > first) {
      return JSON.parse(trimmed.slice(first, last + 1));
    }
    throw new Error('Model output is not valid JSON');
  }
}

function parseModelOutput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, text: string, what: string): T {
  const validated = schema.safeParse(safeParseJsonFromModel(text));
  if (!validated.success) {
    throw new Error(`${what} response did not match schema: ${validated.error.message}`);
  }
  return validated.data;
}

// Relaxed front-facing stance, normalised to the image frame.
const MOCK_POSE: Record<LandmarkName, [x: number, y: number]> = {
  nose: [0.5, 0.1],
  left_shoulder: [0.66, 0.22],
  right_shoulder: [0.34, 0.22],
  left_elbow: [0.69, 0.37],
  right_elbow: [0.31, 0.37],
  left_wrist: [0.7, 0.5],
  right_wrist: [0.3, 0.5],
  left_hip: [0.62, 0.52],
  right_hip: [0.38, 0.52],
  left_knee: [0.61, 0.72],
  right_knee: [0.39, 0.72],
  left_ankle: [0.6, 0.92],
  right_ankle: [0.4, 0.92]
};

function toPixelSpace(
  landmarks: Partial<Record<LandmarkName, { x: number; y: number; visibility: number }>>,
  width: number,
  height: number
): KeypointSet {
  const keypoints: KeypointSet = {};
  for (const name of LANDMARK_NAMES) {
    const landmark = landmarks[name];
    if (!landmark) continue;
    keypoints[name] = { x: landmark.x * width, y: landmark.y * height, visibility: landmark.visibility };
  }
  return keypoints;
}

async function imageSize(buffer: Buffer): Promise<{ width: number; height: number }> {
  const metadata = await sharp(buffer).metadata();
  if (!metadata.width || !metadata.height) {
    throw new Error('Unable to read image dimensions for keypoint detection');
  }
  return { width: metadata.width, height: metadata.height };
}

const POSE_PROMPT = `
Locate the body landmarks of the single person in this photo.

OUTPUT:
Return STRICT JSON ONLY in this format:

{
  "person_detected": true,
  "landmarks": {
    "nose": { "x": 0.0, "y": 0.0, "visibility": 0.0 }
  }
}

RULES:
- landmarks: ${LANDMARK_NAMES.join(', ')}
- left/right are the person's own left and right
- x and y are normalised to the image (0..1, origin top-left)
- visibility is between 0 and 1; omit landmarks you cannot see
- if there is no person, return {"person_detected": false, "landmarks": {}}
- No markdown, no commentary, JSON only
`;

/**
 * Keypoint detection through a vision model. Without a model (mock mode) it
 * returns a canned standing pose scaled to the image.
 */
export class OpenAIPoseDetector implements KeypointProvider {
  constructor(private readonly model: VisionModel | null) {}

  async detect(image: ImageInput, signal: AbortSignal): Promise<KeypointSet | null> {
    const { width, height } = await imageSize(image.buffer);

    if (!this.model) {
      const landmarks: Partial<Record<LandmarkName, { x: number; y: number; visibility: number }>> = {};
      for (const name of LANDMARK_NAMES) {
        const [x, y] = MOCK_POSE[name];
        landmarks[name] = { x, y, visibility: 0.95 };
      }
      return toPixelSpace(landmarks, width, height);
    }

    const rawText = await this.model.complete({ prompt: POSE_PROMPT, image, signal });
    const pose = parseModelOutput(PoseSchema, rawText, 'Pose');
    if (!pose.person_detected || Object.keys(pose.landmarks).length === 0) {
      return null;
    }

    return toPixelSpace(pose.landmarks, width, height);
  }
}

function enhancementPrompt(input: EnhancementInput): string {
  return `You are an expert fashion consultant analyzing body measurements from a photo.

Initial measurements (cm) calculated from body keypoint detection for a ${input.gender} customer
with an estimated ${input.bodyType} build:
${JSON.stringify(input.measurements, null, 2)}

Refine these measurements considering:
1. Actual body shape and proportions visible in the image
2. Whether clothing is loose or tight (affects measurement accuracy)
3. Camera angle and perspective distortion
4. Posture and stance

Keep a measurement out of the output if it already looks accurate.

Respond ONLY with valid JSON (no markdown):
{
  "measurements": { "<name>": <number> },
  "confidence_boost": <number -20 to +20>,
  "body_type": "<slim|athletic|average|stocky>",
  "adjustment_reason": "<brief explanation if measurements were changed>"
}`;
}

function explanationPrompt(input: ExplanationInput): string {
  return `You are a helpful fashion stylist. A customer just got sized for a ${input.garment}:

Measurements (cm): ${JSON.stringify(input.measurements, null, 2)}
Recommended size: ${input.recommendedSize}
Confidence: ${input.confidence}%
Gender category: ${input.gender}
Alternative size: ${input.runnerUp ?? 'none'}

Write a friendly explanation (2-3 sentences) that confirms the size, mentions borderline
measurements and suggests the alternative for a looser or tighter fit.

Respond with just the explanation text (no JSON, no extra formatting).`;
}

/**
 * Measurement refinement and explanations from a vision model. Without a model
 * it runs in mock mode: measurements pass through with a small confidence boost.
 */
export class OpenAIEnhancer implements MeasurementEnhancer {
  readonly name: string;

  constructor(private readonly model: VisionModel | null) {
    this.name = model ? 'openai' : 'mock';
  }

  async enhance(input: EnhancementInput, signal: AbortSignal): Promise<EnhancementResult> {
    if (!this.model) {
      return { measurements: {}, confidenceDelta: 5, bodyType: null, reason: 'mock enhancement' };
    }

    const rawText = await this.model.complete({ prompt: enhancementPrompt(input), image: input.image, signal });
    const data = parseModelOutput(EnhancementSchema, rawText, 'Enhancement');

    return {
      measurements: data.measurements,
      confidenceDelta: data.confidence_boost,
      bodyType: data.body_type ?? null,
      reason: data.adjustment_reason ?? null
    };
  }

  async explain(input: ExplanationInput, signal: AbortSignal): Promise<string> {
    if (!this.model) {
      const alternative = input.runnerUp ? ` Try ${input.runnerUp} if you prefer a different fit.` : '';
      return `Size ${input.recommendedSize} should suit you well.${alternative}`;
    }

    const text = await this.model.complete({ prompt: explanationPrompt(input), signal });
    const explanation = text.replaceAll('```', '').trim();
    if (!explanation) {
      throw new Error('Explanation response was empty');
    }
    return explanation;
  }
}
