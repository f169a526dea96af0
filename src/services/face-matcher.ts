/**
 * FaceMatcher Service
 *
 * Brute-force nearest-neighbour search over an immutable registry snapshot.
 *
 * Algorithm:
 * 1. Compute the Euclidean distance from the query to every snapshot vector
 * 2. Take the minimum (first index wins on ties)
 * 3. Accept the identity iff distance <= threshold, otherwise report
 *    UNKNOWN_IDENTITY with the same minimum distance
 *
 * Performance: O(n·d) per query, for n identities of dimension d.
 */

import type { BoundingBox, EmbeddingVector, Identity } from '../models/face.js';
import { UNKNOWN_IDENTITY } from '../models/face.js';
import {
  NO_CANDIDATE_DISTANCE,
  type MatchPolicy,
  type MatchResult,
  type RegistrySnapshot,
} from '../models/match-result.js';
import { DimensionMismatchError, InputError } from '../lib/errors/AttendanceErrors.js';
import { argmin, euclideanDistance, isFiniteVector } from '../lib/embedding-utils.js';

export class FaceMatcher {
  readonly version: number;
  readonly policy: Readonly<MatchPolicy>;
  private readonly identities: readonly Identity[];
  private readonly vectors: readonly Float64Array[];
  private readonly dimension: number | null;

  /**
   * @param snapshot - Registry snapshot; copied, later registry writes are not observed
   * @param policy - Metric and threshold, validated together
   */
  constructor(snapshot: RegistrySnapshot, policy: MatchPolicy) {
    if (!Number.isFinite(policy.threshold) || policy.threshold < 0) {
      throw new InputError(`Match threshold must be a non-negative number (got ${policy.threshold})`);
    }

    this.version = snapshot.version;
    this.policy = Object.freeze({ ...policy });
    this.identities = Object.freeze(snapshot.entries.map(([identity]) => identity));
    this.vectors = Object.freeze(snapshot.entries.map(([, vector]) => Float64Array.from(vector)));
    this.dimension = snapshot.entries[0]?.[1].length ?? snapshot.dimension;
  }

  /**
   * Number of identities in the snapshot
   */
  get size(): number {
    return this.identities.length;
  }

  /**
   * Match one face vector
   *
   * @throws DimensionMismatchError if the query dimension differs from the snapshot's
   */
  match(query: EmbeddingVector): MatchResult {
    if (this.identities.length === 0) {
      return { identity: UNKNOWN_IDENTITY, distance: NO_CANDIDATE_DISTANCE };
    }

    if (this.dimension !== null && query.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, query.length);
    }
    if (!isFiniteVector(query)) {
      throw new InputError('Query vector must contain finite values only');
    }

    const distances = this.vectors.map((vector) => euclideanDistance(vector, query));
    const best = argmin(distances);
    const identity = this.identities[best];
    const distance = distances[best];

    if (identity === undefined || distance === undefined) {
      return { identity: UNKNOWN_IDENTITY, distance: NO_CANDIDATE_DISTANCE };
    }

    return distance <= this.policy.threshold
      ? { identity, distance }
      : { identity: UNKNOWN_IDENTITY, distance };
  }

  /**
   * Match several faces of one image; results are index-aligned with `boxes`
   *
   * @throws InputError if queries and boxes differ in length
   */
  matchBatch(queries: ReadonlyArray<EmbeddingVector>, boxes: ReadonlyArray<BoundingBox>): MatchResult[] {
    if (queries.length !== boxes.length) {
      throw new InputError(
        `Expected one bounding box per query vector (got ${queries.length} vectors and ${boxes.length} boxes)`
      );
    }

    return queries.map((query, i) => {
      const box = boxes[i];
      const result = this.match(query);
      return box === undefined ? result : { ...result, box: { ...box } };
    });
  }
}
