/**
 * @fileoverview Graph candidate source
 *
 * Two ways of asking the graph store for candidates:
 * - from seeds: one query per shared-property category, each match adding
 *   that category's weight and a reason naming the shared value;
 * - from preferences: one query requiring every preferred property at once,
 *   each match scoring `preferenceMatchScore`.
 *
 * A failing query costs only its own candidates.
 */

import type {
  EntityId,
  FilterSet,
  PredicateRef,
  PreferenceKind,
  PropertyMatch,
} from '../core/contracts.js';
import { Errors, type MarqueeError } from '../core/errors.js';
import { safeAsync } from '../core/result.js';
import type { SharedPropertyCategory } from '../config/recommender_config.js';
import { createLogger } from '../telemetry/logger.js';
import { withTimeout } from '../utils/async.js';
import {
  candidateEntry,
  type GraphRow,
  type GraphStore,
  type SourceCandidateMap,
  type SourceResult,
} from './types.js';

const log = createLogger('graph-source');

export const PREFERENCE_MATCH_REASON = 'it matches your preferences';
export const UNNAMED_SHARED_VALUE = 'a shared property';

export interface GraphCandidateSourceOptions {
  sharedProperties: readonly SharedPropertyCategory[];
  vocabulary: Readonly<Record<PreferenceKind, PredicateRef>>;
  queryLimit: number;
  preferenceQueryLimit: number;
  preferenceMatchScore: number;
  timeoutMs?: number;
}

export class GraphCandidateSource {
  constructor(
    private readonly store: GraphStore,
    private readonly options: GraphCandidateSourceOptions
  ) {}

  async fromSeeds(
    seeds: ReadonlySet<EntityId>,
    filters: FilterSet,
    exclude: ReadonlySet<EntityId>
  ): Promise<SourceResult> {
    const candidates: SourceCandidateMap = new Map();
    const failures: MarqueeError[] = [];
    if (seeds.size === 0) {
      return { source: 'graph_seed', candidates, failures };
    }

    const seedList = [...seeds];
    const outcomes = await Promise.all(
      this.options.sharedProperties.map((category) =>
        safeAsync(() =>
          withTimeout(
            () =>
              this.store.query(
                { kind: 'shared_property', seeds: seedList, predicate: category.predicate, limit: this.options.queryLimit },
                filters,
                exclude
              ),
            this.options.timeoutMs,
            `shared ${category.kind} query`
          )
        )
      )
    );

    // Accumulate in table order so reasons are inserted deterministically.
    outcomes.forEach((outcome, index) => {
      const category = this.options.sharedProperties[index];
      if (!category) return;
      if (!outcome.ok) {
        log.warn('Shared-property query failed; skipping category', {
          kind: category.kind,
          predicate: category.predicate,
          error: outcome.error.message,
        });
        failures.push(Errors.source('graph_seed', outcome.error));
        return;
      }
      this.accumulateShared(candidates, outcome.value, category, exclude);
    });

    log.debug('Seed candidates generated', { seeds: seeds.size, candidates: candidates.size });
    return { source: 'graph_seed', candidates, failures };
  }

  async fromPreferences(
    preferences: ReadonlyMap<PreferenceKind, EntityId>,
    filters: FilterSet,
    exclude: ReadonlySet<EntityId>
  ): Promise<SourceResult> {
    const candidates: SourceCandidateMap = new Map();
    const failures: MarqueeError[] = [];

    const required: PropertyMatch[] = [];
    for (const [kind, value] of preferences) {
      const predicate = this.options.vocabulary[kind];
      if (predicate === undefined) {
        log.debug('Preference kind has no predicate; ignoring', { kind });
        continue;
      }
      required.push({ predicate, value });
    }
    if (required.length === 0) {
      return { source: 'graph_preference', candidates, failures };
    }

    const outcome = await safeAsync(() =>
      withTimeout(
        () =>
          this.store.query(
            { kind: 'all_properties', required, limit: this.options.preferenceQueryLimit },
            filters,
            exclude
          ),
        this.options.timeoutMs,
        'preference query'
      )
    );
    if (!outcome.ok) {
      log.warn('Preference query failed', { error: outcome.error.message });
      failures.push(Errors.source('graph_preference', outcome.error));
      return { source: 'graph_preference', candidates, failures };
    }

    for (const row of outcome.value) {
      if (exclude.has(row.entity)) continue;
      const entry = candidateEntry(candidates, row.entity);
      entry.score += this.options.preferenceMatchScore;
      entry.reasons.add(PREFERENCE_MATCH_REASON);
      entry.qualitySignal = Math.max(entry.qualitySignal, row.qualitySignal ?? 0);
    }

    log.debug('Preference candidates generated', { required: required.length, candidates: candidates.size });
    return { source: 'graph_preference', candidates, failures };
  }

  private accumulateShared(
    candidates: SourceCandidateMap,
    rows: readonly GraphRow[],
    category: SharedPropertyCategory,
    exclude: ReadonlySet<EntityId>
  ): void {
    for (const row of rows) {
      // Enforced here as well as in the store query.
      if (exclude.has(row.entity)) continue;
      const entry = candidateEntry(candidates, row.entity);
      entry.score += category.weight;
      entry.reasons.add(`${category.reason} '${row.matchedValue ?? UNNAMED_SHARED_VALUE}'`);
      entry.qualitySignal = Math.max(entry.qualitySignal, row.qualitySignal ?? 0);
    }
  }
}
