/**
 * Enrollment sample storage
 *
 * Keeps every enrollment sample per identity so the registry can be
 * re-derived from them, and answers how many samples each identity has.
 */

import { promises as fs, type Dirent } from 'fs';
import { join } from 'path';
import { randomUUID } from 'crypto';
import type { FaceDetections, FaceSample, Identity } from '../models/face.js';
import { parseFaceDetections } from '../models/face.js';
import { BackingStoreError, InputError } from '../lib/errors/AttendanceErrors.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';

export interface SampleStore<TImage> {
  /**
   * Reject an image this store cannot persist
   *
   * @throws InputError
   */
  validate(image: TImage): void;

  /**
   * Persist a sample
   *
   * @returns Reference for remove()
   */
  save(identity: Identity, image: TImage): Promise<string>;

  remove(ref: string): Promise<void>;

  /**
   * Delete every sample of an identity
   *
   * @returns Number of samples deleted
   */
  removeIdentity(identity: Identity): Promise<number>;

  /**
   * All samples, grouped by identity, oldest first within an identity
   */
  samples(): AsyncIterable<FaceSample<TImage>>;

  countByIdentity(): Promise<Map<Identity, number>>;
}

const SAMPLE_SUFFIX = '.faces.json';

/**
 * Stores `FaceDetections` documents as
 * `<root>/<identity>/<timestamp>-<id>.faces.json`
 */
export class FileSampleStore implements SampleStore<FaceDetections> {
  private readonly root: string;
  private logger: Logger;
  private clock: () => Date;

  constructor(root: string, options: { logger?: Logger; clock?: () => Date } = {}) {
    this.root = root;
    this.logger = options.logger ?? defaultLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  validate(image: FaceDetections): void {
    const checked = parseFaceDetections(JSON.stringify(image));
    if ('problems' in checked) {
      throw new InputError(`Unsupported face sample: ${checked.problems}`);
    }
  }

  async save(identity: Identity, image: FaceDetections): Promise<string> {
    this.validate(image);

    const dir = join(this.root, encodeURIComponent(identity));
    const stamp = this.clock().toISOString().replace(/[-:.]/g, '');
    const ref = join(dir, `${stamp}-${randomUUID().slice(0, 8)}${SAMPLE_SUFFIX}`);

    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(ref, JSON.stringify(image, null, 2), 'utf-8');
    } catch (error) {
      this.logger.logStorageError('saveSample', error, { additionalContext: { identity } });
      throw new BackingStoreError('saveSample', error);
    }

    return ref;
  }

  async remove(ref: string): Promise<void> {
    try {
      await fs.rm(ref, { force: true });
    } catch (error) {
      this.logger.logStorageError('removeSample', error, { additionalContext: { ref } });
      throw new BackingStoreError('removeSample', error);
    }
  }

  async removeIdentity(identity: Identity): Promise<number> {
    const dir = join(this.root, encodeURIComponent(identity));
    const count = (await this.sampleFiles(dir)).length;

    try {
      await fs.rm(dir, { recursive: true, force: true });
    } catch (error) {
      this.logger.logStorageError('removeSamples', error, { additionalContext: { identity } });
      throw new BackingStoreError('removeSamples', error);
    }

    return count;
  }

  async *samples(): AsyncIterable<FaceSample<FaceDetections>> {
    for (const [identity, dir] of await this.identityDirs()) {
      for (const file of await this.sampleFiles(dir)) {
        const raw = await this.readSample(join(dir, file));
        const checked = parseFaceDetections(raw);

        if ('problems' in checked) {
          this.logger.warn('Skipping unreadable sample', { identity, file, problems: checked.problems });
          continue;
        }

        yield { identity, image: checked.detections };
      }
    }
  }

  async countByIdentity(): Promise<Map<Identity, number>> {
    const counts = new Map<Identity, number>();

    for (const [identity, dir] of await this.identityDirs()) {
      counts.set(identity, (await this.sampleFiles(dir)).length);
    }

    return counts;
  }

  private async identityDirs(): Promise<Array<[Identity, string]>> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.root, { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      this.logger.logStorageError('listSamples', error);
      throw new BackingStoreError('listSamples', error);
    }

    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort()
      .map((name): [Identity, string] => [decodeURIComponent(name), join(this.root, name)]);
  }

  /**
   * Sample file names in `dir`; none when the directory does not exist
   */
  private async sampleFiles(dir: string): Promise<string[]> {
    let files: string[];
    try {
      files = await fs.readdir(dir);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      this.logger.logStorageError('listSamples', error, { additionalContext: { dir } });
      throw new BackingStoreError('listSamples', error);
    }
    return files.filter((file) => file.endsWith(SAMPLE_SUFFIX)).sort();
  }

  private async readSample(file: string): Promise<string> {
    try {
      return await fs.readFile(file, 'utf-8');
    } catch (error) {
      this.logger.logStorageError('readSample', error, { additionalContext: { file } });
      throw new BackingStoreError('readSample', error);
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
