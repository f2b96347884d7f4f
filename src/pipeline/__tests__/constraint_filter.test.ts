/**
 * @fileoverview Tests for constraint re-validation
 */

import { describe, it, expect, vi } from 'vitest';
import { ConstraintFilter, selectForVerification } from '../constraint_filter.js';
import type { Candidate, CandidateMap } from '../aggregator.js';
import type { GraphStore } from '../../sources/types.js';
import { EMPTY_FILTERS, unsafeEntityId, type EntityId, type FilterSet } from '../../core/contracts.js';
import { FilterVerificationError } from '../../core/errors.js';

const id = (raw: string): EntityId => unsafeEntityId(raw);

function candidate(entity: string, score: number): Candidate {
  return { entityId: id(entity), aggregatedScore: score, reasons: new Set(), qualitySignal: 0 };
}

function candidateMap(entries: readonly Candidate[]): CandidateMap {
  return new Map(entries.map((entry) => [entry.entityId, entry]));
}

function storeVerifying(valid: readonly string[]) {
  const verifyMembership = vi.fn(async (ids: readonly EntityId[], _filters: FilterSet) =>
    new Set(ids.filter((entity) => valid.includes(entity)))
  );
  const store: GraphStore = { query: vi.fn(async () => []), verifyMembership };
  return { store, verifyMembership };
}

describe('selectForVerification', () => {
  it('keeps the highest scores, best first', () => {
    const map = candidateMap([candidate('A', 1), candidate('B', 3), candidate('C', 2)]);

    expect(selectForVerification(map, 2).map((entry) => entry.entityId)).toEqual(['B', 'C']);
  });

  it('keeps insertion order among equal scores', () => {
    const map = candidateMap([candidate('A', 1), candidate('B', 1), candidate('C', 1)]);

    expect(selectForVerification(map, 2).map((entry) => entry.entityId)).toEqual(['A', 'B']);
  });
});

describe('ConstraintFilter', () => {
  it('keeps only candidates the store verifies', async () => {
    const { store, verifyMembership } = storeVerifying(['A', 'C']);
    const filter = new ConstraintFilter(store, { cap: 200 });
    const filters: FilterSet = { constraints: [{ kind: 'min_rating', rating: 7 }], negated: [] };

    const outcome = await filter.apply(candidateMap([candidate('A', 1), candidate('B', 2), candidate('C', 3)]), filters);

    expect(outcome.status).toBe('ok');
    expect([...outcome.value.keys()]).toEqual(['C', 'A']);
    expect(verifyMembership).toHaveBeenCalledWith(['C', 'B', 'A'], filters);
  });

  it('sends exactly the cap highest-scoring candidates of a large pool', async () => {
    const { store, verifyMembership } = storeVerifying([]);
    const filter = new ConstraintFilter(store, { cap: 200 });
    const pool = Array.from({ length: 500 }, (_, i) => candidate(`M${i}`, (i * 37) % 500));

    await filter.apply(candidateMap(pool), EMPTY_FILTERS);

    const sent = verifyMembership.mock.calls[0]?.[0] ?? [];
    const expected = [...pool]
      .sort((a, b) => b.aggregatedScore - a.aggregatedScore)
      .slice(0, 200)
      .map((entry) => entry.entityId);
    expect(sent).toHaveLength(200);
    expect(new Set(sent)).toEqual(new Set(expected));
    const lowestSent = Math.min(...sent.map((entity) => Number(entity.slice(1)) * 37 % 500));
    expect(lowestSent).toBe(300);
  });

  it('passes the input through unchanged when verification fails', async () => {
    const store: GraphStore = {
      query: vi.fn(async () => []),
      verifyMembership: vi.fn(async () => {
        throw new Error('endpoint down');
      }),
    };
    const filter = new ConstraintFilter(store, { cap: 2 });
    const input = candidateMap([candidate('A', 1), candidate('B', 2), candidate('C', 3)]);

    const outcome = await filter.apply(input, EMPTY_FILTERS);

    expect(outcome.status).toBe('degraded');
    expect(outcome.value).toBe(input);
    expect([...outcome.value.keys()]).toEqual(['A', 'B', 'C']);
    if (outcome.status === 'degraded') {
      expect(outcome.reason).toBeInstanceOf(FilterVerificationError);
    }
  });

  it('returns the same survivors when applied twice', async () => {
    const { store } = storeVerifying(['B']);
    const filter = new ConstraintFilter(store, { cap: 200 });
    const input = candidateMap([candidate('A', 1), candidate('B', 2)]);

    const first = await filter.apply(input, EMPTY_FILTERS);
    const second = await filter.apply(input, EMPTY_FILTERS);

    expect([...second.value.keys()]).toEqual([...first.value.keys()]);
    expect([...first.value.keys()]).toEqual(['B']);
  });

  it('does not call the store for an empty candidate map', async () => {
    const { store, verifyMembership } = storeVerifying([]);
    const filter = new ConstraintFilter(store, { cap: 200 });

    const outcome = await filter.apply(new Map(), EMPTY_FILTERS);

    expect(outcome).toEqual({ status: 'ok', value: new Map() });
    expect(verifyMembership).not.toHaveBeenCalled();
  });
});
