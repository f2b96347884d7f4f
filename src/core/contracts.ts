/**
 * @fileoverview Canonical types and contracts for the recommender
 *
 * Branded types keep entity IDs and graph predicates from being mixed up
 * with each other or with free text at the boundaries.
 */

import { Result, Ok, Err } from './result.js';
import { ValidationError } from './errors.js';

// ============================================================================
// BRANDED TYPES
// ============================================================================

/**
 * Brand a type to make it nominally distinct
 */
type Brand<T, B extends string> = T & { readonly __brand: B };

/**
 * Entity ID - identifies a node of the external graph, e.g. "Q11424"
 */
export type EntityId = Brand<string, 'EntityId'>;

/**
 * Predicate reference - identifies a graph relation, e.g. "P136"
 */
export type PredicateRef = Brand<string, 'PredicateRef'>;

// ============================================================================
// SESSION VOCABULARY
// ============================================================================

/**
 * Kind of a preference or negation ("genre", "director", "actor", ...).
 * Kinds are resolved to predicates through the configured vocabulary.
 */
export type PreferenceKind = string;

export type ComparisonOperator = '<' | '<=' | '=' | '>=' | '>';

export const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ['<', '<=', '=', '>=', '>'];

export type Constraint =
  | { readonly kind: 'year'; readonly operator: ComparisonOperator; readonly year: number }
  | { readonly kind: 'year_range'; readonly start: number; readonly end: number }
  | { readonly kind: 'language'; readonly language: EntityId }
  | { readonly kind: 'min_rating'; readonly rating: number };

export type ConstraintKind = Constraint['kind'];

/** A predicate/value pair that must (or must not) hold for an entity. */
export interface PropertyMatch {
  readonly predicate: PredicateRef;
  readonly value: EntityId;
}

/**
 * Hard filters handed to the graph store: typed constraints, the negations
 * already resolved to predicates, and constraints that must not hold
 * ("not from the 90s").
 */
export interface FilterSet {
  readonly constraints: readonly Constraint[];
  readonly negated: readonly PropertyMatch[];
  readonly negatedConstraints?: readonly Constraint[];
}

export const EMPTY_FILTERS: FilterSet = Object.freeze({ constraints: [], negated: [], negatedConstraints: [] });

/**
 * Output of the (external) intent parser for one user message.
 */
export interface ParsedIntent {
  readonly intent: 'recommendation' | 'other';
  readonly seedEntities?: readonly EntityId[];
  readonly preferences?: Readonly<Record<PreferenceKind, EntityId>>;
  readonly constraints?: readonly Constraint[];
  readonly negations?: Readonly<Record<PreferenceKind, EntityId>>;
  readonly negatedConstraints?: readonly Constraint[];
  readonly isFollowUp?: boolean;
}

// ============================================================================
// CONSTRUCTORS
// ============================================================================

/**
 * Create a validated EntityId
 */
export function createEntityId(raw: string): Result<EntityId, ValidationError> {
  const trimmed = raw.trim();
  if (!trimmed) {
    return Err(new ValidationError('entityId', 'non-empty string', 'empty'));
  }
  if (/\s/.test(trimmed)) {
    return Err(new ValidationError('entityId', 'no whitespace', JSON.stringify(trimmed)));
  }
  return Ok(trimmed as EntityId);
}

/**
 * Create EntityId without validation (for ids read back from a store)
 */
export function unsafeEntityId(raw: string): EntityId {
  return raw as EntityId;
}

/**
 * Create a PredicateRef
 */
export function createPredicateRef(raw: string): PredicateRef {
  return raw.trim() as PredicateRef;
}

export function isComparisonOperator(value: string): value is ComparisonOperator {
  return (COMPARISON_OPERATORS as readonly string[]).includes(value);
}

/**
 * Resolve preference-shaped negations to predicate matches. Kinds missing
 * from the vocabulary cannot be expressed against the graph and are returned
 * separately so callers can report them.
 */
export function resolveFilters(
  constraints: Iterable<Constraint>,
  negations: Iterable<readonly [PreferenceKind, EntityId]>,
  vocabulary: Readonly<Record<PreferenceKind, PredicateRef>>,
  negatedConstraints: Iterable<Constraint> = []
): { filters: FilterSet; unresolved: PreferenceKind[] } {
  const negated: PropertyMatch[] = [];
  const unresolved: PreferenceKind[] = [];
  for (const [kind, value] of negations) {
    const predicate = vocabulary[kind];
    if (predicate === undefined) {
      unresolved.push(kind);
      continue;
    }
    negated.push({ predicate, value });
  }
  return {
    filters: { constraints: [...constraints], negated, negatedConstraints: [...negatedConstraints] },
    unresolved,
  };
}
