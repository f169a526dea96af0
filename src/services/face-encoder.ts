/**
 * Feature extractor boundary
 *
 * Face detection and encoding happen outside this package (a native
 * recognition library, a browser model, a remote service). The core only
 * sees boxes and vectors through this interface.
 */

import type { BoundingBox, EmbeddingVector, FaceDetections } from '../models/face.js';

export interface FaceEncoder<TImage> {
  /**
   * Locate faces in an image
   */
  detectFaces(image: TImage): Promise<BoundingBox[]>;

  /**
   * Encode the face inside `box`
   *
   * @returns The vector, or null when no vector could be produced
   */
  encodeFace(image: TImage, box: BoundingBox): Promise<EmbeddingVector | null>;
}

/**
 * Encoder over detections computed upstream (`*.faces.json` documents):
 * detection returns the recorded boxes and encoding looks up the vector
 * recorded for the same box.
 */
export class PrecomputedFaceEncoder implements FaceEncoder<FaceDetections> {
  async detectFaces(image: FaceDetections): Promise<BoundingBox[]> {
    return image.faces.map((face) => ({ ...face.box }));
  }

  async encodeFace(image: FaceDetections, box: BoundingBox): Promise<EmbeddingVector | null> {
    const face = image.faces.find((candidate) => sameBox(candidate.box, box));
    return face?.vector ?? null;
  }
}

export function sameBox(a: BoundingBox, b: BoundingBox): boolean {
  return a.top === b.top && a.right === b.right && a.bottom === b.bottom && a.left === b.left;
}

/**
 * Vector of the first detected face that encodes
 *
 * @returns null when no face was found or none could be encoded
 */
export async function encodeFirstFace<TImage>(
  encoder: FaceEncoder<TImage>,
  image: TImage
): Promise<EmbeddingVector | null> {
  const boxes = await encoder.detectFaces(image);

  for (const box of boxes) {
    const vector = await encoder.encodeFace(image, box);
    if (vector !== null) {
      return vector;
    }
  }

  return null;
}
