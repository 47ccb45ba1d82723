import type { LandmarkName } from '../types/contracts.js';

export type PipelineErrorKind =
  | 'NoPersonDetected'
  | 'InsufficientKeypoints'
  | 'InvalidSizeChart'
  | 'LowPhotoQuality'
  | 'EnhancementUnavailable';

/**
 * Failure raised by the measurement pipeline. `kind` is machine-readable and
 * stable; `message` is meant for the person taking the photo.
 */
export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string) {
    super(message);
    this.name = kind;
    this.kind = kind;
  }
}

export class NoPersonDetectedError extends PipelineError {
  constructor(message = 'No person detected in the photo. Retake it with your full body in frame.') {
    super('NoPersonDetected', message);
  }
}

export class InsufficientKeypointsError extends PipelineError {
  readonly purpose: string;
  readonly landmarks: LandmarkName[];

  constructor(purpose: string, landmarks: LandmarkName[], detail?: string) {
    const reason = detail ?? `${landmarks.map(name => name.replace('_', ' ')).join(', ')} not clearly visible`;
    super('InsufficientKeypoints', `Cannot estimate ${purpose}: ${reason}. Retake the photo standing fully in frame.`);
    this.purpose = purpose;
    this.landmarks = landmarks;
  }
}

export class InvalidSizeChartError extends PipelineError {
  constructor(message: string) {
    super('InvalidSizeChart', `Invalid size chart: ${message}`);
  }
}

export class LowPhotoQualityError extends PipelineError {
  readonly score: number;

  constructor(score: number, warnings: string[]) {
    const hint = warnings.length > 0 ? ` ${warnings.join('. ')}.` : '';
    super('LowPhotoQuality', `Photo quality too low for accurate measurements (${score}/100).${hint}`);
    this.score = score;
  }
}

export class EnhancementUnavailableError extends PipelineError {
  constructor(message: string) {
    super('EnhancementUnavailable', message);
  }
}

export class ApiError extends Error {
  status: number;
  code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.status = status;
    this.code = code;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
