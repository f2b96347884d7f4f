/**
 * @fileoverview Maximal Marginal Relevance selection
 *
 * Greedy re-ordering of a ranked list that trades relevance against
 * similarity to what has already been picked:
 *
 *   mmr = lambda * relevance - (1 - lambda) * max cosine(candidate, selected)
 *
 * Relevance is the final score divided by the list's maximum. The top-ranked
 * entry is always picked first; after that only entries with an embedding
 * can be picked. Entries keep their original final score.
 */

import type { EntityId } from '../core/contracts.js';
import { Errors } from '../core/errors.js';
import { degraded, full, type Outcome } from '../core/result.js';
import type { VectorIndex } from '../sources/types.js';
import { createLogger } from '../telemetry/logger.js';
import type { RankedEntry } from './ranker.js';

const log = createLogger('diversity');

export type EmbeddingLookup = Pick<VectorIndex, 'embeddingOf' | 'cosineSimilarity'>;

interface PoolEntry {
  readonly entry: RankedEntry;
  readonly relevance: number;
  readonly vector: Float32Array;
}

export function selectDiverse(
  ranked: readonly RankedEntry[],
  k: number,
  embeddings: EmbeddingLookup,
  lambda: number
): Outcome<RankedEntry[]> {
  if (ranked.length <= k) {
    return full([...ranked]);
  }

  try {
    return full(runMmr(ranked, k, embeddings, lambda));
  } catch (error) {
    log.warn('MMR failed; falling back to top-k', {
      error: error instanceof Error ? error.message : String(error),
    });
    return degraded(ranked.slice(0, Math.max(0, k)), Errors.diversification(error));
  }
}

function runMmr(
  ranked: readonly RankedEntry[],
  k: number,
  embeddings: EmbeddingLookup,
  lambda: number
): RankedEntry[] {
  const [top, ...rest] = ranked;
  if (top === undefined || k <= 0) return [];

  const maxScore = Math.max(...ranked.map((entry) => entry.finalScore));
  const relevanceOf = (score: number): number => (maxScore > 0 ? score / maxScore : score);

  const pool: PoolEntry[] = [];
  const unembedded: EntityId[] = [];
  for (const entry of rest) {
    const vector = embeddings.embeddingOf(entry.entityId);
    if (!vector) {
      unembedded.push(entry.entityId);
      continue;
    }
    pool.push({ entry, relevance: relevanceOf(entry.finalScore), vector });
  }
  if (unembedded.length > 0) {
    log.debug('Entries without embeddings left out of diversification', { count: unembedded.length });
  }

  const selected: RankedEntry[] = [top];
  const selectedVectors: Float32Array[] = [];
  const topVector = embeddings.embeddingOf(top.entityId);
  if (topVector) selectedVectors.push(topVector);

  while (selected.length < k && pool.length > 0) {
    let bestIndex = -1;
    let bestMmr = Number.NEGATIVE_INFINITY;

    pool.forEach((candidate, index) => {
      let maxSimilarity = 0;
      for (const vector of selectedVectors) {
        maxSimilarity = Math.max(maxSimilarity, embeddings.cosineSimilarity(candidate.vector, vector));
      }
      const mmr = lambda * candidate.relevance - (1 - lambda) * maxSimilarity;
      if (mmr > bestMmr) {
        bestMmr = mmr;
        bestIndex = index;
      }
    });

    if (bestIndex < 0) {
      throw new Error('no candidate produced a comparable MMR score');
    }
    const [picked] = pool.splice(bestIndex, 1);
    if (!picked) break;
    selected.push(picked.entry);
    selectedVectors.push(picked.vector);
  }

  return selected;
}
