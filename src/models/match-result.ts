/**
 * Match Result Model
 */

import type { BoundingBox, EmbeddingVector, Identity } from './face.js';

/**
 * Distance reported when there was nothing to compare against
 */
export const NO_CANDIDATE_DISTANCE = 1.0;

/**
 * Distance metric; the threshold is only meaningful under the metric it
 * was tuned for, so both travel together in a MatchPolicy
 */
export type DistanceMetric = 'euclidean';

export interface MatchPolicy {
  metric: DistanceMetric;
  /** Maximum accepted distance (inclusive) */
  threshold: number;
}

export const DEFAULT_MATCH_POLICY: MatchPolicy = {
  metric: 'euclidean',
  threshold: 0.5,
};

/**
 * Outcome of matching one face vector
 */
export interface MatchResult {
  /** Matched identity, or UNKNOWN_IDENTITY */
  identity: Identity;
  /** Distance to the nearest enrolled vector */
  distance: number;
  /** Source face location, when the vector came from a detected face */
  box?: BoundingBox;
}

/**
 * Immutable copy of the registry the matcher works from
 */
export interface RegistrySnapshot {
  /** Registry version the snapshot was taken at (0 when empty/unbuilt) */
  version: number;
  /** Vector dimension, null while the registry holds no vectors */
  dimension: number | null;
  entries: ReadonlyArray<readonly [Identity, EmbeddingVector]>;
}
