/**
 * @fileoverview Embedding candidate source
 *
 * Nearest neighbors of every seed that has a vector. Similarities of an
 * entity reached from several seeds add up, and the result carries the
 * number of seeds that answered. The index knows nothing about
 * constraints, so results may violate them; the constraint filter restores
 * validity later.
 */

import type { EntityId } from '../core/contracts.js';
import { Errors, type MarqueeError } from '../core/errors.js';
import { safeAsync } from '../core/result.js';
import { createLogger } from '../telemetry/logger.js';
import { withTimeout } from '../utils/async.js';
import { candidateEntry, type SourceCandidateMap, type SourceResult, type VectorIndex } from './types.js';

const log = createLogger('embedding-source');

export const SIMILARITY_REASON = "it's similar to movies you like";

export interface EmbeddingCandidateSourceOptions {
  neighborsPerSeed: number;
  timeoutMs?: number;
}

export class EmbeddingCandidateSource {
  constructor(
    private readonly index: VectorIndex,
    private readonly options: EmbeddingCandidateSourceOptions
  ) {}

  async fromSeeds(seeds: ReadonlySet<EntityId>, exclude: ReadonlySet<EntityId>): Promise<SourceResult> {
    const candidates: SourceCandidateMap = new Map();
    const failures: MarqueeError[] = [];

    const embedded: EntityId[] = [];
    const missing: EntityId[] = [];
    for (const seed of seeds) {
      if (this.index.embeddingOf(seed)) {
        embedded.push(seed);
      } else {
        missing.push(seed);
      }
    }
    if (missing.length > 0) {
      log.debug('Seeds without embeddings skipped', { seeds: missing });
      failures.push(Errors.embeddingMissing(missing));
    }

    const lookups = await Promise.all(
      embedded.map((seed) =>
        safeAsync(() =>
          withTimeout(
            () => this.index.nearestNeighbors(seed, this.options.neighborsPerSeed),
            this.options.timeoutMs,
            `neighbors of ${seed}`
          )
        )
      )
    );

    lookups.forEach((lookup, index) => {
      if (!lookup.ok) {
        log.warn('Neighbor lookup failed; skipping seed', {
          seed: embedded[index],
          error: lookup.error.message,
        });
        failures.push(Errors.source('embedding', lookup.error));
        return;
      }
      for (const neighbor of lookup.value) {
        if (exclude.has(neighbor.entityId)) continue;
        const entry = candidateEntry(candidates, neighbor.entityId);
        entry.score += neighbor.similarity;
        entry.reasons.add(SIMILARITY_REASON);
      }
    });

    const answered = lookups.filter((lookup) => lookup.ok).length;
    log.debug('Embedding candidates generated', { seeds: answered, candidates: candidates.size });
    return { source: 'embedding', candidates, failures, accumulatedSeeds: Math.max(answered, 1) };
  }
}
