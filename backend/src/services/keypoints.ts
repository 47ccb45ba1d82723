import { z } from 'zod';
import { LANDMARK_NAMES, type KeypointSet } from '../types/contracts.js';

export type ImageInput = {
  buffer: Buffer;
  mimeType: string;
};

/**
 * Source of body landmarks for a photo. Resolves to null when no person is
 * found; rejects on transport or model failures.
 */
export interface KeypointProvider {
  detect(image: ImageInput, signal: AbortSignal): Promise<KeypointSet | null>;
}

export const KeypointSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  visibility: z.number().min(0).max(1)
});

export const KeypointSetSchema = z.record(z.enum(LANDMARK_NAMES), KeypointSchema);

/** Keypoints computed elsewhere, e.g. by an on-device pose model. */
export class StaticKeypointProvider implements KeypointProvider {
  constructor(private readonly keypoints: KeypointSet | null) {}

  async detect(): Promise<KeypointSet | null> {
    return this.keypoints;
  }
}
