/**
 * @fileoverview Tests for ranking and reason selection
 */

import { describe, it, expect } from 'vitest';
import { FALLBACK_REASON, chooseReason, finalScore, rankCandidates } from '../ranker.js';
import type { Candidate, CandidateMap } from '../aggregator.js';
import { SIMILARITY_REASON } from '../../sources/embedding_source.js';
import { unsafeEntityId } from '../../core/contracts.js';

function candidate(entity: string, score: number, reasons: string[] = [], quality = 0): Candidate {
  return { entityId: unsafeEntityId(entity), aggregatedScore: score, reasons: new Set(reasons), qualitySignal: quality };
}

describe('chooseReason', () => {
  it('prefers a structured reason over a similarity reason', () => {
    expect(chooseReason([SIMILARITY_REASON, "shares the genre 'drama'"])).toBe("shares the genre 'drama'");
  });

  it('falls back to the similarity reason when it is the only one', () => {
    expect(chooseReason([SIMILARITY_REASON])).toBe(SIMILARITY_REASON);
  });

  it('uses a generic reason when there is none', () => {
    expect(chooseReason([])).toBe(FALLBACK_REASON);
  });
});

describe('rankCandidates', () => {
  it('adds the weighted quality signal to the aggregated score', () => {
    expect(finalScore(candidate('A', 2, [], 8), 0.02)).toBeCloseTo(2.16, 10);
  });

  it('lets the rating break ties but not outrank a stronger match', () => {
    const map: CandidateMap = new Map([
      [unsafeEntityId('weak'), candidate('weak', 0.04, [], 9.5)],
      [unsafeEntityId('strong'), candidate('strong', 1.0, [], 0)],
      [unsafeEntityId('tie-low'), candidate('tie-low', 0.5, [], 6)],
      [unsafeEntityId('tie-high'), candidate('tie-high', 0.5, [], 7)],
    ]);

    const ranked = rankCandidates(map, 0.02);

    expect(ranked.map((entry) => entry.entityId)).toEqual(['strong', 'tie-high', 'tie-low', 'weak']);
  });

  it('keeps insertion order for equal final scores', () => {
    const map: CandidateMap = new Map([
      [unsafeEntityId('first'), candidate('first', 1)],
      [unsafeEntityId('second'), candidate('second', 1)],
    ]);

    expect(rankCandidates(map, 0.02).map((entry) => entry.entityId)).toEqual(['first', 'second']);
  });

  it('attaches the chosen reason', () => {
    const map: CandidateMap = new Map([
      [unsafeEntityId('A'), candidate('A', 1, [SIMILARITY_REASON, 'it matches your preferences'])],
    ]);

    expect(rankCandidates(map, 0.02)).toEqual([
      { entityId: 'A', finalScore: 1, reason: 'it matches your preferences' },
    ]);
  });
});
