import sharp from 'sharp';
import { ApiError, errorMessage } from '../lib/errors.js';
import type { ImageMetrics } from '../core/pose-quality.js';

export type ImageLimits = {
  minWidth: number;
  minHeight: number;
  minSharpness: number;
  minBrightness: number;
  maxBrightness: number;
};

export const DEFAULT_IMAGE_LIMITS: ImageLimits = {
  minWidth: 400,
  minHeight: 600,
  minSharpness: 10,
  minBrightness: 40,
  maxBrightness: 220
};

async function readImage(buffer: Buffer): Promise<{ metadata: sharp.Metadata; stats: sharp.Stats }> {
  try {
    const image = sharp(buffer);
    return { metadata: await image.metadata(), stats: await image.stats() };
  } catch (error: unknown) {
    throw new ApiError(400, 'INVALID_IMAGE', `Invalid image file: ${errorMessage(error)}`);
  }
}

export async function measureImage(buffer: Buffer): Promise<ImageMetrics> {
  const { metadata, stats } = await readImage(buffer);
  const { width, height } = metadata;

  if (!width || !height) {
    throw new ApiError(400, 'INVALID_IMAGE', 'Unable to read image dimensions');
  }

  const [r, g, b] = stats.channels;
  const brightness = r && g && b ? 0.299 * r.mean + 0.587 * g.mean + 0.114 * b.mean : (r?.mean ?? 0);

  return { width, height, brightness, sharpness: stats.sharpness };
}

/** Rejects photos that cannot give usable measurements. */
export function validateImage(metrics: ImageMetrics, limits: ImageLimits = DEFAULT_IMAGE_LIMITS): void {
  if (metrics.width < limits.minWidth || metrics.height < limits.minHeight) {
    throw new ApiError(
      400,
      'IMAGE_TOO_SMALL',
      `Image resolution too low. Minimum ${limits.minWidth}x${limits.minHeight} required, got ${metrics.width}x${metrics.height}.`
    );
  }
  if (metrics.sharpness < limits.minSharpness) {
    throw new ApiError(400, 'IMAGE_TOO_BLURRY', 'Image is too blurry. Please take a clearer photo in good lighting.');
  }
  if (metrics.brightness < limits.minBrightness) {
    throw new ApiError(400, 'IMAGE_TOO_DARK', 'Image is too dark. Please take a photo in better lighting.');
  }
  if (metrics.brightness > limits.maxBrightness) {
    throw new ApiError(400, 'IMAGE_OVEREXPOSED', 'Image is overexposed. Please avoid direct sunlight or flash.');
  }
}
