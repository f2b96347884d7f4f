/**
 * @fileoverview Interfaces of the external collaborators and the shape of
 * per-source candidate maps.
 */

import type { EntityId, FilterSet, PredicateRef, PropertyMatch } from '../core/contracts.js';
import type { MarqueeError, SourceName } from '../core/errors.js';

// ============================================================================
// GRAPH STORE
// ============================================================================

export type GraphPattern =
  /** Entities sharing a `predicate` value with any of `seeds`. */
  | {
      readonly kind: 'shared_property';
      readonly seeds: readonly EntityId[];
      readonly predicate: PredicateRef;
      readonly limit: number;
    }
  /** Entities holding every one of `required`. */
  | {
      readonly kind: 'all_properties';
      readonly required: readonly PropertyMatch[];
      readonly limit: number;
    };

export interface GraphRow {
  readonly entity: EntityId;
  /** Display form of the shared value (shared_property only). */
  readonly matchedValue?: string;
  readonly qualitySignal?: number;
}

export interface GraphStore {
  /**
   * Run a recommendation pattern. Implementations apply `filters` and the
   * "is recommendable" type check in the query and never return members of
   * `exclude`.
   */
  query(pattern: GraphPattern, filters: FilterSet, exclude: ReadonlySet<EntityId>): Promise<GraphRow[]>;

  /**
   * Return the subset of `ids` that are recommendable and satisfy `filters`.
   */
  verifyMembership(ids: readonly EntityId[], filters: FilterSet): Promise<Set<EntityId>>;
}

// ============================================================================
// VECTOR INDEX
// ============================================================================

export interface Neighbor {
  readonly entityId: EntityId;
  readonly similarity: number;
}

export interface VectorIndex {
  /** k nearest neighbors of `entityId` by cosine similarity, best first. */
  nearestNeighbors(entityId: EntityId, k: number): Promise<Neighbor[]>;
  embeddingOf(entityId: EntityId): Float32Array | undefined;
  cosineSimilarity(a: Float32Array, b: Float32Array): number;
}

// ============================================================================
// LABELS
// ============================================================================

export interface LabelResolver {
  labelOf(entityId: EntityId): Promise<string | undefined>;
  imageOf?(entityId: EntityId): Promise<string | undefined>;
}

// ============================================================================
// SOURCE OUTPUT
// ============================================================================

export interface SourceCandidate {
  score: number;
  readonly reasons: Set<string>;
  qualitySignal: number;
}

export type SourceCandidateMap = Map<EntityId, SourceCandidate>;

export interface SourceResult {
  readonly source: SourceName;
  readonly candidates: SourceCandidateMap;
  /** Failures the source recovered from; each cost it some candidates. */
  readonly failures: readonly MarqueeError[];
  /**
   * Seeds whose scores were added up into `candidates`. The aggregator
   * spreads the source weight over them. Absent means 1.
   */
  readonly accumulatedSeeds?: number;
}

export function emptySourceCandidate(): SourceCandidate {
  return { score: 0, reasons: new Set<string>(), qualitySignal: 0 };
}

/**
 * Fetch-or-create the entry for `entityId`.
 */
export function candidateEntry(map: SourceCandidateMap, entityId: EntityId): SourceCandidate {
  let entry = map.get(entityId);
  if (!entry) {
    entry = emptySourceCandidate();
    map.set(entityId, entry);
  }
  return entry;
}
