/**
 * AttendanceSession Service
 *
 * Entry point for the presentation layer: recognition, enrollment and
 * attendance logging over one registry, one ledger and one feature
 * extractor.
 *
 * The matcher is an immutable snapshot. It is built lazily on first use and
 * replaced as a whole after every enrollment or rebuild; a refresh that
 * started earlier never replaces the matcher installed by a later one.
 */

import type { EmbeddingRegistry } from './embedding-registry.js';
import type { AttendanceLedger } from './attendance/attendance-ledger.js';
import type { FaceEncoder } from './face-encoder.js';
import type { SampleStore } from './sample-store.js';
import { FaceMatcher } from './face-matcher.js';
import type { EmbeddingVector, FaceInput, Identity } from '../models/face.js';
import { UNKNOWN_IDENTITY, checkIdentity } from '../models/face.js';
import { DEFAULT_MATCH_POLICY, type MatchPolicy, type MatchResult } from '../models/match-result.js';
import type {
  AttendanceQuery,
  AttendanceRecord,
  AttendanceSource,
  LogOutcome,
} from '../models/attendance-record.js';
import {
  EmbeddingsUnavailableError,
  EncodingFailedError,
  InputError,
  InvalidIdentityError,
  NotFoundError,
} from '../lib/errors/AttendanceErrors.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';

export interface AttendanceSessionOptions<TImage> {
  registry: EmbeddingRegistry<TImage>;
  ledger: AttendanceLedger;
  encoder: FaceEncoder<TImage>;
  /** Where enrollment images are kept; required for rebuild() */
  samples?: SampleStore<TImage>;
  matchPolicy?: MatchPolicy;
  logger?: Logger;
}

export interface EnrollResult {
  identity: Identity;
  /** Registry version after the enrollment */
  version: number;
  /** Stored sample, when the enrollment carried an image */
  sampleRef?: string;
}

export interface CheckInResult extends MatchResult {
  /** Whether an attendance record was written for this face */
  logged: boolean;
}

export interface IdentitySummary {
  identity: Identity;
  sampleCount: number;
}

export interface SessionStatus {
  embeddingsLoaded: boolean;
  snapshotVersion: number | null;
  knownIdentities: number;
  metric: MatchPolicy['metric'];
  threshold: number;
  dedupPolicy: string;
}

export class AttendanceSession<TImage> {
  private registry: EmbeddingRegistry<TImage>;
  private ledger: AttendanceLedger;
  private encoder: FaceEncoder<TImage>;
  private samples: SampleStore<TImage> | undefined;
  private matchPolicy: MatchPolicy;
  private logger: Logger;

  private matcher: FaceMatcher | null = null;
  private refreshTicket = 0;
  private appliedTicket = 0;

  constructor(options: AttendanceSessionOptions<TImage>) {
    this.registry = options.registry;
    this.ledger = options.ledger;
    this.encoder = options.encoder;
    this.samples = options.samples;
    this.matchPolicy = { ...(options.matchPolicy ?? DEFAULT_MATCH_POLICY) };
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Identify every face of an image, or a single precomputed vector
   *
   * Does not log attendance; see checkIn().
   *
   * @throws EmbeddingsUnavailableError if the registry was never built
   * @throws EncodingFailedError if a detected face cannot be encoded
   */
  async recognize(input: FaceInput<TImage>): Promise<MatchResult[]> {
    const matcher = await this.ensureMatcher();

    if ('vector' in input) {
      return [matcher.match(input.vector)];
    }

    const boxes = await this.encoder.detectFaces(input.image);
    const vectors: EmbeddingVector[] = [];

    for (const [i, box] of boxes.entries()) {
      const vector = await this.encoder.encodeFace(input.image, box);
      if (vector === null) {
        throw new EncodingFailedError(`face ${i + 1} of ${boxes.length} could not be encoded`);
      }
      vectors.push(vector);
    }

    return matcher.matchBatch(vectors, boxes);
  }

  /**
   * Enroll or re-enroll an identity
   *
   * The vector is checked against the registry before anything is written.
   * With an image, the sample is then stored before the vector is upserted
   * and removed again if the upsert fails.
   *
   * @throws InvalidIdentityError, InputError, DimensionMismatchError before anything is written
   * @throws EncodingFailedError if the image yields no vector
   */
  async enroll(rawIdentity: string, input: FaceInput<TImage>): Promise<EnrollResult> {
    const identity = validIdentity(rawIdentity);

    let vector: EmbeddingVector;
    let sampleRef: string | undefined;

    if ('vector' in input) {
      vector = input.vector;
    } else {
      this.samples?.validate(input.image);
      vector = await this.encodeEnrollmentFace(input.image);
    }

    await this.registry.assertCompatible(vector);

    if ('image' in input && this.samples) {
      sampleRef = await this.samples.save(identity, input.image);
    }

    let version: number;
    try {
      version = await this.registry.upsert(identity, vector);
    } catch (error) {
      if (sampleRef !== undefined) {
        await this.discardSample(sampleRef);
      }
      throw error;
    }

    await this.refresh();
    this.logger.info('Identity enrolled', { identity, version });

    return { identity, version, sampleRef };
  }

  /**
   * Remove an enrolled identity together with its stored samples, so a
   * later rebuild does not bring it back. Attendance records are kept.
   *
   * @returns Number of samples deleted
   * @throws NotFoundError if the identity is not enrolled
   */
  async remove(rawIdentity: string): Promise<number> {
    const identity = validIdentity(rawIdentity);
    const version = await this.registry.remove(identity);
    const removedSamples = this.samples ? await this.samples.removeIdentity(identity) : 0;

    await this.refresh();
    this.logger.info('Identity removed', { identity, version, removedSamples });

    return removedSamples;
  }

  /**
   * Record attendance for an identity under the ledger's session policy
   */
  logAttendance(identity: string, source?: AttendanceSource): Promise<LogOutcome> {
    return this.ledger.logAttempt(identity, source);
  }

  queryAttendance(filters: AttendanceQuery = {}): AsyncIterable<AttendanceRecord> {
    return this.ledger.query(filters);
  }

  /**
   * Enrolled identities with the number of stored samples each
   */
  async listIdentities(): Promise<IdentitySummary[]> {
    const identities = await this.registry.listIdentities();
    const counts = this.samples ? await this.samples.countByIdentity() : new Map<Identity, number>();

    return identities.map((identity) => ({
      identity,
      sampleCount: counts.get(identity) ?? 0,
    }));
  }

  /**
   * Recognize, then log attendance for every recognized identity
   */
  async checkIn(input: FaceInput<TImage>, source: AttendanceSource = 'camera'): Promise<CheckInResult[]> {
    const results = await this.recognize(input);
    const checkedIn: CheckInResult[] = [];

    for (const result of results) {
      if (result.identity === UNKNOWN_IDENTITY) {
        checkedIn.push({ ...result, logged: false });
        continue;
      }

      const outcome = await this.ledger.logAttempt(result.identity, source);
      checkedIn.push({ ...result, logged: outcome.logged });
    }

    return checkedIn;
  }

  /**
   * Re-derive the registry from every stored sample and swap the matcher
   *
   * @returns Number of identities in the rebuilt registry
   */
  async rebuild(): Promise<number> {
    if (!this.samples) {
      throw new InputError('No sample store configured; nothing to rebuild from');
    }

    const snapshot = await this.registry.rebuildAll(this.samples.samples());
    await this.refresh();
    return snapshot.entries.length;
  }

  /**
   * Build a matcher from the current registry and install it, unless a
   * refresh that started later already installed a newer one
   *
   * @throws EmbeddingsUnavailableError if the registry was never built
   */
  async refresh(): Promise<FaceMatcher> {
    const ticket = ++this.refreshTicket;

    let matcher: FaceMatcher;
    try {
      matcher = new FaceMatcher(await this.registry.snapshot(), this.matchPolicy);
    } catch (error) {
      if (error instanceof NotFoundError && !(error instanceof EmbeddingsUnavailableError)) {
        throw new EmbeddingsUnavailableError();
      }
      throw error;
    }

    if (ticket > this.appliedTicket) {
      this.matcher = matcher;
      this.appliedTicket = ticket;
      this.logger.debug('Matcher snapshot installed', { version: matcher.version, identities: matcher.size });
    }

    return this.matcher ?? matcher;
  }

  async status(): Promise<SessionStatus> {
    const matcher = this.matcher;
    const knownIdentities = matcher ? matcher.size : (await this.registry.listIdentities()).length;

    return {
      embeddingsLoaded: matcher !== null,
      snapshotVersion: matcher ? matcher.version : null,
      knownIdentities,
      metric: this.matchPolicy.metric,
      threshold: this.matchPolicy.threshold,
      dedupPolicy: this.ledger.sessionPolicy.describe(),
    };
  }

  private async ensureMatcher(): Promise<FaceMatcher> {
    return this.matcher ?? this.refresh();
  }

  private async encodeEnrollmentFace(image: TImage): Promise<EmbeddingVector> {
    const boxes = await this.encoder.detectFaces(image);
    if (boxes.length === 0) {
      throw new EncodingFailedError('no face detected in image');
    }

    for (const box of boxes) {
      const vector = await this.encoder.encodeFace(image, box);
      if (vector !== null) {
        return vector;
      }
    }

    throw new EncodingFailedError('no detected face could be encoded');
  }

  private async discardSample(ref: string): Promise<void> {
    try {
      await this.samples?.remove(ref);
    } catch (error) {
      // Logged only; the caller rethrows the upsert failure
      this.logger.error('Failed to roll back enrollment sample', {
        ref,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

function validIdentity(raw: string): Identity {
  const checked = checkIdentity(raw);
  if ('reason' in checked) {
    throw new InvalidIdentityError(raw, checked.reason);
  }
  return checked.identity;
}
