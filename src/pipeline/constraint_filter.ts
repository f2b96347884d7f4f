/**
 * @fileoverview Constraint re-validation
 *
 * The embedding source cannot apply constraints, so the merged candidates
 * are checked again against the graph store in one batched query. Only the
 * `cap` highest-scoring candidates are sent; the rest are dropped before
 * verification. When verification fails the input is passed through
 * unchanged (fail open).
 */

import type { EntityId, FilterSet } from '../core/contracts.js';
import { Errors } from '../core/errors.js';
import { degraded, full, safeAsync, type Outcome } from '../core/result.js';
import type { GraphStore } from '../sources/types.js';
import { createLogger } from '../telemetry/logger.js';
import { withTimeout } from '../utils/async.js';
import type { Candidate, CandidateMap } from './aggregator.js';

const log = createLogger('constraint-filter');

export interface ConstraintFilterOptions {
  cap: number;
  timeoutMs?: number;
}

/**
 * The `cap` highest-scoring candidates, best first. Equal scores keep map
 * insertion order.
 */
export function selectForVerification(candidates: CandidateMap, cap: number): Candidate[] {
  const ordered = [...candidates.values()].sort((a, b) => b.aggregatedScore - a.aggregatedScore);
  return ordered.slice(0, Math.max(0, cap));
}

export class ConstraintFilter {
  constructor(
    private readonly store: GraphStore,
    private readonly options: ConstraintFilterOptions
  ) {}

  async apply(candidates: CandidateMap, filters: FilterSet): Promise<Outcome<CandidateMap>> {
    if (candidates.size === 0) {
      return full(new Map());
    }

    const shortlisted = selectForVerification(candidates, this.options.cap);
    if (shortlisted.length < candidates.size) {
      log.debug('Truncated candidates before verification', {
        from: candidates.size,
        to: shortlisted.length,
      });
    }

    const ids: EntityId[] = shortlisted.map((candidate) => candidate.entityId);
    const verified = await safeAsync(() =>
      withTimeout(
        () => this.store.verifyMembership(ids, filters),
        this.options.timeoutMs,
        'constraint verification'
      )
    );

    if (!verified.ok) {
      log.warn('Constraint verification failed; passing candidates through unfiltered', {
        candidates: candidates.size,
        error: verified.error.message,
      });
      return degraded(candidates, Errors.filterVerification(ids.length, verified.error));
    }

    const surviving: CandidateMap = new Map();
    for (const candidate of shortlisted) {
      if (verified.value.has(candidate.entityId)) {
        surviving.set(candidate.entityId, candidate);
      }
    }

    log.debug('Candidates verified', { checked: ids.length, surviving: surviving.size });
    return full(surviving);
  }
}
