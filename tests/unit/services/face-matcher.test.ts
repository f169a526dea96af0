import { describe, it, expect } from 'vitest';
import { FaceMatcher } from '../../../src/services/face-matcher.js';
import { UNKNOWN_IDENTITY } from '../../../src/models/face.js';
import type { RegistrySnapshot } from '../../../src/models/match-result.js';
import { DimensionMismatchError, InputError } from '../../../src/lib/errors/AttendanceErrors.js';

function snapshotOf(entries: Array<[string, number[]]>, version: number = 1): RegistrySnapshot {
  return {
    version,
    dimension: entries[0]?.[1].length ?? null,
    entries,
  };
}

const euclidean = (threshold: number) => ({ metric: 'euclidean' as const, threshold });

describe('FaceMatcher', () => {
  it('should accept a match exactly at the threshold', () => {
    const matcher = new FaceMatcher(snapshotOf([['alice', [0.1, 0.2, 0]]]), euclidean(0.6));

    const result = matcher.match([0.1, 0.2, 0.6]);

    expect(result).toEqual({ identity: 'alice', distance: 0.6 });
  });

  it('should report Unknown with the minimum distance above the threshold', () => {
    const matcher = new FaceMatcher(snapshotOf([['alice', [0.1, 0.2, 0]]]), euclidean(0.5));

    expect(matcher.match([0.1, 0.2, 0.6])).toEqual({ identity: UNKNOWN_IDENTITY, distance: 0.6 });
  });

  it('should pick the nearest identity', () => {
    const matcher = new FaceMatcher(
      snapshotOf([
        ['alice', [0, 0]],
        ['bob', [1, 0]],
      ]),
      euclidean(0.5)
    );

    expect(matcher.match([0.9, 0])).toEqual({ identity: 'bob', distance: expect.closeTo(0.1, 10) });
  });

  it('should resolve equal distances to the first snapshot entry', () => {
    const matcher = new FaceMatcher(
      snapshotOf([
        ['alice', [0, 1]],
        ['bob', [0, -1]],
      ]),
      euclidean(2)
    );

    expect(matcher.match([0, 0])).toEqual({ identity: 'alice', distance: 1 });
  });

  it('should only accept exact copies with a zero threshold', () => {
    const matcher = new FaceMatcher(snapshotOf([['alice', [0.25, 0.5]]]), euclidean(0));

    expect(matcher.match([0.25, 0.5])).toEqual({ identity: 'alice', distance: 0 });
    expect(matcher.match([0.25, 0.75]).identity).toBe(UNKNOWN_IDENTITY);
  });

  it('should report Unknown at distance 1.0 for an empty snapshot', () => {
    const matcher = new FaceMatcher({ version: 3, dimension: null, entries: [] }, euclidean(0.5));

    expect(matcher.match([0.3, 0.3, 0.3])).toEqual({ identity: UNKNOWN_IDENTITY, distance: 1 });
    expect(matcher.size).toBe(0);
  });

  it('should reject a query of the wrong dimension', () => {
    const matcher = new FaceMatcher(snapshotOf([['alice', [0, 0, 0]]]), euclidean(0.5));

    expect(() => matcher.match([0, 0])).toThrow(DimensionMismatchError);
  });

  it('should reject a non-finite query', () => {
    const matcher = new FaceMatcher(snapshotOf([['alice', [0, 0]]]), euclidean(0.5));

    expect(() => matcher.match([0, NaN])).toThrow(InputError);
  });

  it('should reject a negative threshold', () => {
    expect(() => new FaceMatcher(snapshotOf([]), euclidean(-0.1))).toThrow(InputError);
  });

  it('should not observe changes to the snapshot it was built from', () => {
    const vector = [0, 0];
    const matcher = new FaceMatcher(snapshotOf([['alice', vector]]), euclidean(0.5));

    vector[0] = 5;

    expect(matcher.match([0, 0])).toEqual({ identity: 'alice', distance: 0 });
  });

  describe('matchBatch', () => {
    it('should return one result per face with its box', () => {
      const matcher = new FaceMatcher(snapshotOf([['alice', [0, 0]]]), euclidean(0.5));
      const boxA = { top: 0, right: 10, bottom: 10, left: 0 };
      const boxB = { top: 0, right: 30, bottom: 10, left: 20 };

      const results = matcher.matchBatch([[0, 0], [3, 4]], [boxA, boxB]);

      expect(results).toEqual([
        { identity: 'alice', distance: 0, box: boxA },
        { identity: UNKNOWN_IDENTITY, distance: 5, box: boxB },
      ]);
    });

    it('should reject mismatched lengths', () => {
      const matcher = new FaceMatcher(snapshotOf([['alice', [0, 0]]]), euclidean(0.5));

      expect(() => matcher.matchBatch([[0, 0]], [])).toThrow(InputError);
    });
  });
});
