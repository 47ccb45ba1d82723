import type { BodyType, Garment, Gender, MeasurementName, MeasurementSet } from '../types/contracts.js';
import { EnhancementUnavailableError } from '../lib/errors.js';
import type { ImageInput } from './keypoints.js';

export type EnhancementInput = {
  image: ImageInput;
  measurements: MeasurementSet;
  bodyType: BodyType;
  gender: Gender;
};

export type EnhancementResult = {
  /** Replacement values; measurements left out keep their estimate. */
  measurements: Partial<Record<MeasurementName, number>>;
  confidenceDelta: number;
  bodyType: string | null;
  reason: string | null;
};

export type ExplanationInput = {
  measurements: MeasurementSet;
  recommendedSize: string;
  confidence: number;
  allSizeScores: Record<string, number>;
  runnerUp: string | null;
  gender: Gender;
  garment: Garment;
};

/**
 * Optional refinement step. Implementations may be slow or fail; the pipeline
 * bounds every call and falls back to its own estimates.
 */
export interface MeasurementEnhancer {
  readonly name: string;
  enhance(input: EnhancementInput, signal: AbortSignal): Promise<EnhancementResult>;
  explain?(input: ExplanationInput, signal: AbortSignal): Promise<string>;
}

export class DisabledEnhancer implements MeasurementEnhancer {
  readonly name = 'disabled';

  constructor(private readonly reason = 'AI enhancement is disabled') {}

  async enhance(): Promise<EnhancementResult> {
    throw new EnhancementUnavailableError(this.reason);
  }
}
