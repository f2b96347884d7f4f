/**
 * @fileoverview Ranking
 *
 * final score = aggregated score + quality signal * ratingWeight.
 * Sorting is stable: equal final scores keep candidate insertion order
 * (graph seed matches, then embedding neighbors, then preference matches).
 */

import type { EntityId } from '../core/contracts.js';
import type { Candidate, CandidateMap } from './aggregator.js';

export interface RankedEntry {
  readonly entityId: EntityId;
  readonly finalScore: number;
  readonly reason: string;
}

/** Reasons containing this marker come from embedding similarity. */
export const SIMILARITY_MARKER = 'similar to';

export const FALLBACK_REASON = 'is a potential match';

/**
 * First structured reason, else the first reason of any kind.
 */
export function chooseReason(reasons: Iterable<string>): string {
  let fallback: string | undefined;
  for (const reason of reasons) {
    if (!reason.includes(SIMILARITY_MARKER)) return reason;
    if (fallback === undefined) fallback = reason;
  }
  return fallback ?? FALLBACK_REASON;
}

export function finalScore(candidate: Candidate, ratingWeight: number): number {
  return candidate.aggregatedScore + candidate.qualitySignal * ratingWeight;
}

export function rankCandidates(candidates: CandidateMap, ratingWeight: number): RankedEntry[] {
  const ranked: RankedEntry[] = [];
  for (const candidate of candidates.values()) {
    ranked.push({
      entityId: candidate.entityId,
      finalScore: finalScore(candidate, ratingWeight),
      reason: chooseReason(candidate.reasons),
    });
  }
  return ranked.sort((a, b) => b.finalScore - a.finalScore);
}
