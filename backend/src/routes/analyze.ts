import { type Request, type RequestHandler, type Response, Router } from 'express';
import multer from 'multer';
import { z } from 'zod';
import type { KeypointSet } from '../types/contracts.js';
import type { AppDependencies } from '../app.js';
import { parseSizeChartJson } from '../config/size-charts.js';
import { analyzeBody, detectKeypoints, type ViewInput } from '../core/pipeline.js';
import { ApiError, PipelineError, type PipelineErrorKind } from '../lib/errors.js';
import { measureImage, validateImage } from '../services/image-quality.js';
import { KeypointSetSchema } from '../services/keypoints.js';
import { renderPoseOverlay } from '../services/overlay.js';

const MAX_IMAGE_SIZE_BYTES = 8 * 1024 * 1024;
const ALLOWED_IMAGE_TYPES = new Set(['image/jpeg', 'image/png', 'image/webp']);

const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: MAX_IMAGE_SIZE_BYTES },
  fileFilter: (_req, file, cb) => {
    if (!ALLOWED_IMAGE_TYPES.has(file.mimetype)) {
      cb(
        new ApiError(
          400,
          'UNSUPPORTED_IMAGE_TYPE',
          `Unsupported image type "${file.mimetype}". Use one of: ${Array.from(ALLOWED_IMAGE_TYPES).join(', ')}`
        )
      );
      return;
    }

    cb(null, true);
  }
});

const analyzeUpload = upload.fields([
  { name: 'image', maxCount: 1 },
  { name: 'back_image', maxCount: 1 },
  { name: 'side_image', maxCount: 1 }
]);
const overlayUpload = upload.single('image');

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function lowerCase(value: unknown): unknown {
  const blank = blankToUndefined(value);
  return typeof blank === 'string' ? blank.trim().toLowerCase() : blank;
}

const AnalyzeFieldsSchema = z.object({
  gender: z.preprocess(lowerCase, z.enum(['male', 'female', 'unisex']).default('unisex')),
  garment: z.preprocess(lowerCase, z.enum(['shirt', 'jacket', 'pants', 'full']).default('shirt')),
  height_cm: z.preprocess(blankToUndefined, z.coerce.number().finite().positive().optional()),
  size_chart: z.preprocess(blankToUndefined, z.string().optional()),
  keypoints: z.preprocess(blankToUndefined, z.string().optional())
});

const STATUS_BY_KIND: Record<PipelineErrorKind, [status: number, code: string]> = {
  NoPersonDetected: [422, 'NO_PERSON_DETECTED'],
  InsufficientKeypoints: [422, 'INSUFFICIENT_KEYPOINTS'],
  LowPhotoQuality: [422, 'LOW_PHOTO_QUALITY'],
  InvalidSizeChart: [400, 'INVALID_SIZE_CHART'],
  EnhancementUnavailable: [503, 'ENHANCEMENT_UNAVAILABLE']
};

function runUpload(middleware: RequestHandler, req: Request, res: Response): Promise<void> {
  return new Promise((resolve, reject) => {
    middleware(req, res, (err?: unknown) => {
      if (err) return reject(err);
      return resolve();
    });
  });
}

function uploadedFile(req: Request, field: string): Express.Multer.File | undefined {
  if (!req.files || Array.isArray(req.files)) return undefined;
  return req.files[field]?.[0];
}

function parseKeypointsField(raw: string | undefined): KeypointSet | null {
  if (raw === undefined) return null;

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ApiError(400, 'INVALID_KEYPOINTS', 'keypoints is not valid JSON');
  }

  const parsed = KeypointSetSchema.safeParse(json);
  if (!parsed.success) {
    throw new ApiError(400, 'INVALID_KEYPOINTS', `Invalid keypoints: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  return parsed.data;
}

async function toView(file: Express.Multer.File, keypoints: KeypointSet | null = null): Promise<ViewInput> {
  const imageMetrics = await measureImage(file.buffer);
  validateImage(imageMetrics);
  return {
    image: { buffer: file.buffer, mimeType: file.mimetype },
    keypoints,
    imageMetrics
  };
}

// Back and side photos that fail the image checks are passed on as rejected, not fatal.
async function toOptionalView(file: Express.Multer.File): Promise<ViewInput> {
  try {
    return await toView(file);
  } catch (error: unknown) {
    if (!(error instanceof ApiError)) throw error;
    return { image: { buffer: file.buffer, mimeType: file.mimetype }, rejection: error.message };
  }
}

export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }

  if (error instanceof PipelineError) {
    const [status, code] = STATUS_BY_KIND[error.kind];
    return new ApiError(status, code, error.message);
  }

  if (error instanceof multer.MulterError) {
    if (error.code === 'LIMIT_FILE_SIZE') {
      return new ApiError(
        413,
        'IMAGE_TOO_LARGE',
        `Image exceeds limit of ${Math.floor(MAX_IMAGE_SIZE_BYTES / (1024 * 1024))}MB`
      );
    }

    return new ApiError(400, 'UPLOAD_ERROR', error.message);
  }

  console.error(error);
  return new ApiError(500, 'INTERNAL_ERROR', 'Internal error');
}

function sendError(res: Response, error: unknown) {
  const apiError = toApiError(error);
  return res.status(apiError.status).json({
    error: {
      code: apiError.code,
      message: apiError.message
    }
  });
}

export function createAnalyzeRouter(deps: AppDependencies): Router {
  const analyzeRouter = Router();

  analyzeRouter.post('/overlay', async (req, res) => {
    try {
      await runUpload(overlayUpload, req, res);
      if (!req.file) {
        throw new ApiError(400, 'MISSING_IMAGE', 'Missing image file field "image"');
      }

      const fields = AnalyzeFieldsSchema.pick({ keypoints: true }).safeParse(req.body ?? {});
      if (!fields.success) {
        throw new ApiError(400, 'INVALID_REQUEST', fields.error.issues[0]?.message ?? 'Invalid request');
      }

      const image = { buffer: req.file.buffer, mimeType: req.file.mimetype };
      const keypoints =
        parseKeypointsField(fields.data.keypoints) ??
        (await detectKeypoints(deps.keypoints, image, deps.config.detectionTimeoutMs));

      const overlay = await renderPoseOverlay(req.file.buffer, keypoints);
      return res.type('png').send(overlay);
    } catch (error: unknown) {
      return sendError(res, error);
    }
  });

  analyzeRouter.post('/', async (req, res) => {
    try {
      await runUpload(analyzeUpload, req, res);

      const front = uploadedFile(req, 'image');
      if (!front) {
        throw new ApiError(400, 'MISSING_IMAGE', 'Missing image file field "image"');
      }

      const fields = AnalyzeFieldsSchema.safeParse(req.body ?? {});
      if (!fields.success) {
        const issue = fields.error.issues[0];
        throw new ApiError(400, 'INVALID_REQUEST', `${issue?.path.join('.') ?? 'request'}: ${issue?.message ?? 'invalid'}`);
      }
      const { gender, garment, height_cm, size_chart, keypoints } = fields.data;

      // Charts and keypoints are rejected before any image work.
      const sizeChart = size_chart === undefined ? null : parseSizeChartJson(size_chart);
      const frontKeypoints = parseKeypointsField(keypoints);

      const backFile = uploadedFile(req, 'back_image');
      const sideFile = uploadedFile(req, 'side_image');

      const result = await analyzeBody(
        {
          front: await toView(front, frontKeypoints),
          back: backFile ? await toOptionalView(backFile) : null,
          side: sideFile ? await toOptionalView(sideFile) : null,
          gender,
          garment,
          heightCm: height_cm ?? null,
          sizeChart
        },
        { keypoints: deps.keypoints, enhancer: deps.enhancer },
        deps.config
      );

      return res.json(result);
    } catch (error: unknown) {
      return sendError(res, error);
    }
  });

  return analyzeRouter;
}
