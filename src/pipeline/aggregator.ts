/**
 * @fileoverview Candidate aggregation
 *
 * Merges per-source candidate maps into one, scaling each source's score by
 * its trust weight. Accumulation rules: score sums, reasons union, quality
 * takes the max.
 *
 * A source that adds up scores over several seeds has its weight divided by
 * the seed count for that request: an embedding neighbor contributes at
 * most the embedding weight however many seeds reach it.
 */

import type { EntityId } from '../core/contracts.js';
import type { SourceName } from '../core/errors.js';
import type { SourceWeights } from '../config/recommender_config.js';
import type { SourceCandidateMap, SourceResult } from '../sources/types.js';

export interface Candidate {
  readonly entityId: EntityId;
  aggregatedScore: number;
  readonly reasons: Set<string>;
  qualitySignal: number;
}

export type CandidateMap = Map<EntityId, Candidate>;

export class CandidateAggregator {
  constructor(private readonly weights: SourceWeights) {}

  weightOf(source: SourceName): number {
    switch (source) {
      case 'graph_preference':
        return this.weights.preference;
      case 'graph_seed':
        return this.weights.seedGraph;
      case 'embedding':
        return this.weights.embedding;
    }
  }

  /**
   * Weight applied to `result` in this request.
   */
  weightFor(result: SourceResult): number {
    return this.weightOf(result.source) / Math.max(1, result.accumulatedSeeds ?? 1);
  }

  /**
   * Fold `sourceMap` into `main` in place.
   */
  merge(
    main: CandidateMap,
    sourceMap: SourceCandidateMap,
    source: SourceName,
    weight: number = this.weightOf(source)
  ): void {
    for (const [entityId, incoming] of sourceMap) {
      let candidate = main.get(entityId);
      if (!candidate) {
        candidate = { entityId, aggregatedScore: 0, reasons: new Set<string>(), qualitySignal: 0 };
        main.set(entityId, candidate);
      }
      candidate.aggregatedScore += incoming.score * weight;
      for (const reason of incoming.reasons) {
        candidate.reasons.add(reason);
      }
      candidate.qualitySignal = Math.max(candidate.qualitySignal, incoming.qualitySignal);
    }
  }

  aggregate(results: readonly SourceResult[]): CandidateMap {
    const main: CandidateMap = new Map();
    for (const result of results) {
      this.merge(main, result.candidates, result.source, this.weightFor(result));
    }
    return main;
  }
}
