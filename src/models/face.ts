/**
 * Face Model
 *
 * Identities, embedding vectors and detected face boxes as they cross the
 * boundary with the external feature extractor.
 */

import { z } from 'zod';

/**
 * Unique key for an enrolled person
 */
export type Identity = string;

/**
 * Identity reported for a face that matches nobody
 */
export const UNKNOWN_IDENTITY = 'Unknown';

/**
 * Fixed-length face feature vector produced by the extractor
 */
export type EmbeddingVector = readonly number[];

/**
 * Face location in pixel coordinates, in the order the extractor reports it
 */
export interface BoundingBox {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export const BoundingBoxSchema = z.object({
  top: z.number().int().nonnegative(),
  right: z.number().int().nonnegative(),
  bottom: z.number().int().nonnegative(),
  left: z.number().int().nonnegative(),
});

export const EmbeddingVectorSchema = z
  .array(z.number().finite())
  .min(1)
  .describe('Face embedding vector');

/**
 * One face found by an upstream extractor, with its vector when encoding succeeded
 */
export interface DetectedFace {
  box: BoundingBox;
  vector: EmbeddingVector | null;
}

export const DetectedFaceSchema = z.object({
  box: BoundingBoxSchema,
  vector: EmbeddingVectorSchema.nullable(),
});

/**
 * Extractor output for one captured image, as exchanged in
 * `*.faces.json` documents
 */
export interface FaceDetections {
  capturedAt?: string;
  faces: DetectedFace[];
}

export const FaceDetectionsSchema = z.object({
  capturedAt: z.string().datetime().optional(),
  faces: z.array(DetectedFaceSchema),
});

/**
 * Input accepted by recognition and enrollment: either a precomputed
 * vector, or an image the extractor still has to process
 */
export type FaceInput<TImage> = { vector: EmbeddingVector } | { image: TImage };

/**
 * Normalizes an identity and reports why it cannot be used, if so
 */
export function checkIdentity(raw: string): { identity: Identity } | { reason: string } {
  const identity = raw.trim();
  if (identity.length === 0) {
    return { reason: 'identity must not be empty' };
  }
  if (identity === UNKNOWN_IDENTITY) {
    return { reason: `"${UNKNOWN_IDENTITY}" is reserved for unmatched faces` };
  }
  return { identity };
}

/**
 * One stored enrollment sample, the unit a registry rebuild consumes
 */
export interface FaceSample<TImage> {
  identity: Identity;
  image: TImage;
}

/**
 * Parse a `*.faces.json` document
 *
 * @returns The detections, or the validation problems
 */
export function parseFaceDetections(raw: string): { detections: FaceDetections } | { problems: string } {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    return { problems: `not valid JSON (${error instanceof Error ? error.message : String(error)})` };
  }

  const parsed = FaceDetectionsSchema.safeParse(json);
  if (!parsed.success) {
    return {
      problems: parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; '),
    };
  }
  return { detections: parsed.data };
}
