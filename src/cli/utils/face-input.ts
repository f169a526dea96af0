/**
 * Parsing of command-line face inputs and date bounds
 */

import { promises as fs } from 'fs';
import type { EmbeddingVector, FaceDetections, FaceInput } from '../../models/face.js';
import { parseFaceDetections } from '../../models/face.js';
import { InputError } from '../../lib/errors/AttendanceErrors.js';

export interface FaceInputOptions {
  image?: string;
  vector?: string;
}

/**
 * Parse a comma-separated vector such as "0.1,0.2,0.3"
 */
export function parseVector(text: string): EmbeddingVector {
  const parts = text.split(',').map(part => part.trim());
  const vector = parts.map(Number);

  if (parts.some(part => part === '') || vector.some(value => !Number.isFinite(value))) {
    throw new InputError(`Invalid vector "${text}": expected comma-separated finite numbers`);
  }
  return vector;
}

export async function readFaceDetections(file: string): Promise<FaceDetections> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (error) {
    throw new InputError(`Cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const checked = parseFaceDetections(raw);
  if ('problems' in checked) {
    throw new InputError(`Unsupported face document ${file}: ${checked.problems}`);
  }
  return checked.detections;
}

/**
 * Exactly one of --image and --vector
 */
export async function readFaceInput(options: FaceInputOptions): Promise<FaceInput<FaceDetections>> {
  if (options.image !== undefined && options.vector !== undefined) {
    throw new InputError('Pass either --image or --vector, not both');
  }
  if (options.vector !== undefined) {
    return { vector: parseVector(options.vector) };
  }
  if (options.image !== undefined) {
    return { image: await readFaceDetections(options.image) };
  }
  throw new InputError('One of --image or --vector is required');
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 86_400_000;

/**
 * Parse a query bound. A bare date covers the whole UTC day: as a lower
 * bound it starts at 00:00:00.000, as an upper bound it ends at 23:59:59.999.
 */
export function parseDateBound(text: string, bound: 'from' | 'to'): Date {
  const date = new Date(DATE_ONLY.test(text) ? `${text}T00:00:00.000Z` : text);
  if (Number.isNaN(date.getTime())) {
    throw new InputError(`Invalid --${bound} date "${text}"`);
  }

  if (bound === 'to' && DATE_ONLY.test(text)) {
    return new Date(date.getTime() + DAY_MS - 1);
  }
  return date;
}
