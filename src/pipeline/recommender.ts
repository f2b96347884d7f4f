/**
 * @fileoverview Recommendation pipeline
 *
 * session -> graph + embedding sources (in parallel) -> aggregation ->
 * constraint verification -> ranking -> MMR selection -> labels.
 *
 * No stage failure reaches the caller. Every fallback taken is reported in
 * the response's `degradations`, so callers can tell a full answer from a
 * degraded one.
 */

import { resolveFilters, type EntityId } from '../core/contracts.js';
import {
  DiversificationError,
  EmbeddingMissingError,
  FilterVerificationError,
  type MarqueeError,
} from '../core/errors.js';
import { isDegraded, safeAsync } from '../core/result.js';
import type { RecommenderConfig } from '../config/recommender_config.js';
import type { SessionView } from '../session/session.js';
import { EmbeddingCandidateSource } from '../sources/embedding_source.js';
import { GraphCandidateSource } from '../sources/graph_source.js';
import type { GraphStore, LabelResolver, VectorIndex } from '../sources/types.js';
import { createLogger } from '../telemetry/logger.js';
import { withTimeout } from '../utils/async.js';
import { CandidateAggregator } from './aggregator.js';
import { ConstraintFilter } from './constraint_filter.js';
import { selectDiverse } from './diversity.js';
import { rankCandidates, type RankedEntry } from './ranker.js';

const log = createLogger('recommender');

// ============================================================================
// TYPES
// ============================================================================

export type DegradationKind =
  | 'source_unavailable'
  | 'filter_verification_failed'
  | 'embedding_missing'
  | 'diversification_failed';

export interface Degradation {
  readonly kind: DegradationKind;
  readonly message: string;
}

export interface Recommendation {
  readonly id: EntityId;
  readonly label: string;
  readonly score: number;
  readonly reason: string;
  readonly imageId?: string;
}

/**
 * `no_input`: the session has neither seeds nor preferences.
 * `empty`: the search ran and nothing survived.
 */
export type RecommendationResponse =
  | { readonly status: 'no_input'; readonly degradations: readonly Degradation[] }
  | { readonly status: 'empty'; readonly degradations: readonly Degradation[] }
  | {
      readonly status: 'ok';
      readonly recommendations: readonly Recommendation[];
      readonly degradations: readonly Degradation[];
    };

export interface RecommenderDeps {
  graphStore: GraphStore;
  vectorIndex: VectorIndex;
  labels: LabelResolver;
  config: RecommenderConfig;
}

export function degradationOf(error: MarqueeError): Degradation {
  if (error instanceof EmbeddingMissingError) {
    return { kind: 'embedding_missing', message: error.message };
  }
  if (error instanceof FilterVerificationError) {
    return { kind: 'filter_verification_failed', message: error.message };
  }
  if (error instanceof DiversificationError) {
    return { kind: 'diversification_failed', message: error.message };
  }
  return { kind: 'source_unavailable', message: error.message };
}

// ============================================================================
// RECOMMENDER
// ============================================================================

export class Recommender {
  private readonly graphSource: GraphCandidateSource;
  private readonly embeddingSource: EmbeddingCandidateSource;
  private readonly aggregator: CandidateAggregator;
  private readonly constraintFilter: ConstraintFilter;

  constructor(private readonly deps: RecommenderDeps) {
    const { config } = deps;
    this.graphSource = new GraphCandidateSource(deps.graphStore, {
      sharedProperties: config.sharedProperties,
      vocabulary: config.vocabulary,
      queryLimit: config.graphQueryLimit,
      preferenceQueryLimit: config.preferenceQueryLimit,
      preferenceMatchScore: config.preferenceMatchScore,
      timeoutMs: config.externalCallTimeoutMs,
    });
    this.embeddingSource = new EmbeddingCandidateSource(deps.vectorIndex, {
      neighborsPerSeed: config.neighborsPerSeed,
      timeoutMs: config.externalCallTimeoutMs,
    });
    this.aggregator = new CandidateAggregator(config.weights);
    this.constraintFilter = new ConstraintFilter(deps.graphStore, {
      cap: config.verificationCap,
      timeoutMs: config.externalCallTimeoutMs,
    });
  }

  /**
   * Up to `k` labelled recommendations for the session, best first.
   */
  async getRecommendations(session: SessionView, k: number = this.deps.config.defaultTopK): Promise<RecommendationResponse> {
    const { config } = this.deps;
    if (!session.hasRecommendationInput()) {
      return { status: 'no_input', degradations: [] };
    }

    const exclude = session.getExcludeList();
    const { filters, unresolved } = resolveFilters(
      session.constraints.values(),
      session.negations.entries(),
      config.vocabulary,
      session.negatedConstraints.values()
    );
    if (unresolved.length > 0) {
      log.warn('Negations with unknown kinds ignored', { userId: session.userId, kinds: unresolved });
    }

    const [seedResult, embeddingResult, preferenceResult] = await Promise.all([
      this.graphSource.fromSeeds(session.seedEntities, filters, exclude),
      this.embeddingSource.fromSeeds(session.seedEntities, exclude),
      this.graphSource.fromPreferences(session.preferences, filters, exclude),
    ]);
    const sourceResults = [seedResult, embeddingResult, preferenceResult];

    const failures: MarqueeError[] = sourceResults.flatMap((result) => [...result.failures]);
    const merged = this.aggregator.aggregate(sourceResults);
    log.debug('Candidates aggregated', { userId: session.userId, candidates: merged.size });

    const filtered = await this.constraintFilter.apply(merged, filters);
    if (isDegraded(filtered)) failures.push(filtered.reason);

    const ranked = rankCandidates(filtered.value, config.ratingWeight);
    const selected = selectDiverse(ranked, k, this.deps.vectorIndex, config.mmrLambda);
    if (isDegraded(selected)) failures.push(selected.reason);

    const recommendations = await this.present(selected.value);
    const degradations = failures.map(degradationOf);
    if (degradations.length > 0) {
      log.warn('Recommendations produced in degraded mode', {
        userId: session.userId,
        kinds: degradations.map((degradation) => degradation.kind),
      });
    }

    log.info('Recommendations ready', {
      userId: session.userId,
      candidates: merged.size,
      returned: recommendations.length,
    });
    if (recommendations.length === 0) {
      return { status: 'empty', degradations };
    }
    return { status: 'ok', recommendations, degradations };
  }

  /**
   * Attach labels and images. Entries without a resolvable label are
   * dropped.
   */
  private async present(entries: readonly RankedEntry[]): Promise<Recommendation[]> {
    const { labels, config } = this.deps;
    const timeoutMs = config.externalCallTimeoutMs;

    const resolved = await Promise.all(
      entries.map(async (entry): Promise<Recommendation | null> => {
        const label = await safeAsync(() => withTimeout(() => labels.labelOf(entry.entityId), timeoutMs, 'label'));
        if (!label.ok) {
          log.warn('Label lookup failed; dropping recommendation', {
            entityId: entry.entityId,
            error: label.error.message,
          });
          return null;
        }
        if (label.value === undefined) {
          log.debug('No label; dropping recommendation', { entityId: entry.entityId });
          return null;
        }

        const recommendation: Recommendation = {
          id: entry.entityId,
          label: label.value,
          score: entry.finalScore,
          reason: entry.reason,
        };
        if (!labels.imageOf) return recommendation;

        const imageOf = labels.imageOf.bind(labels);
        const image = await safeAsync(() => withTimeout(() => imageOf(entry.entityId), timeoutMs, 'image'));
        if (!image.ok) {
          log.debug('Image lookup failed', { entityId: entry.entityId, error: image.error.message });
          return recommendation;
        }
        return image.value === undefined ? recommendation : { ...recommendation, imageId: image.value };
      })
    );

    return resolved.filter((recommendation): recommendation is Recommendation => recommendation !== null);
  }
}
