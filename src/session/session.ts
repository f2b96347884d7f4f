/**
 * @fileoverview Conversational session state
 *
 * A session is the per-user memory the recommender reads: seed entities,
 * preferences, constraints, negations and what was already recommended.
 */

import type {
  Constraint,
  ConstraintKind,
  EntityId,
  ParsedIntent,
  PreferenceKind,
} from '../core/contracts.js';
import { createLogger } from '../telemetry/logger.js';

const log = createLogger('session');

export interface ConversationTurn {
  readonly user: string;
  readonly reply: string;
  readonly at: number;
}

/**
 * Read-only view of a session, as consumed by the recommendation pipeline.
 */
export interface SessionView {
  readonly userId: string;
  readonly seedEntities: ReadonlySet<EntityId>;
  readonly preferences: ReadonlyMap<PreferenceKind, EntityId>;
  readonly constraints: ReadonlyMap<ConstraintKind, Constraint>;
  readonly negations: ReadonlyMap<PreferenceKind, EntityId>;
  readonly negatedConstraints: ReadonlyMap<ConstraintKind, Constraint>;
  readonly recommendedEntities: ReadonlySet<EntityId>;
  getExcludeList(): Set<EntityId>;
  hasRecommendationInput(): boolean;
}

export class Session implements SessionView {
  readonly seedEntities = new Set<EntityId>();
  readonly preferences = new Map<PreferenceKind, EntityId>();
  readonly constraints = new Map<ConstraintKind, Constraint>();
  readonly negations = new Map<PreferenceKind, EntityId>();
  readonly negatedConstraints = new Map<ConstraintKind, Constraint>();
  readonly recommendedEntities = new Set<EntityId>();
  readonly history: ConversationTurn[] = [];

  constructor(readonly userId: string) {}

  /**
   * Merge a parsed intent. Seeds are unioned; preferences, constraints and
   * negations are overwritten per kind (newest wins). A follow-up without
   * new seeds promotes the previous recommendations to seeds and empties
   * the recommended set.
   */
  update(intent: ParsedIntent): void {
    const newSeeds = intent.seedEntities ?? [];
    for (const seed of newSeeds) {
      this.seedEntities.add(seed);
    }

    for (const [kind, value] of Object.entries(intent.preferences ?? {})) {
      this.preferences.set(kind, value);
    }

    for (const constraint of intent.constraints ?? []) {
      this.constraints.set(constraint.kind, constraint);
    }

    for (const [kind, value] of Object.entries(intent.negations ?? {})) {
      this.negations.set(kind, value);
    }

    for (const constraint of intent.negatedConstraints ?? []) {
      this.negatedConstraints.set(constraint.kind, constraint);
    }

    if (intent.isFollowUp && newSeeds.length === 0 && this.recommendedEntities.size > 0) {
      log.info('Promoting previous recommendations to seeds', {
        userId: this.userId,
        promoted: this.recommendedEntities.size,
      });
      for (const id of this.recommendedEntities) {
        this.seedEntities.add(id);
      }
      this.recommendedEntities.clear();
    }

    log.debug('Session updated', {
      userId: this.userId,
      seeds: this.seedEntities.size,
      preferences: this.preferences.size,
      constraints: this.constraints.size,
      negations: this.negations.size + this.negatedConstraints.size,
    });
  }

  addRecommendations(ids: Iterable<EntityId>): void {
    for (const id of ids) {
      this.recommendedEntities.add(id);
    }
  }

  /**
   * Seeds and prior recommendations, computed on every call.
   */
  getExcludeList(): Set<EntityId> {
    return new Set([...this.seedEntities, ...this.recommendedEntities]);
  }

  recordTurn(user: string, reply: string): void {
    this.history.push({ user, reply, at: Date.now() });
  }

  hasRecommendationInput(): boolean {
    return this.seedEntities.size > 0 || this.preferences.size > 0;
  }

  clear(): void {
    log.info('Clearing session', { userId: this.userId });
    this.seedEntities.clear();
    this.preferences.clear();
    this.constraints.clear();
    this.negations.clear();
    this.negatedConstraints.clear();
    this.recommendedEntities.clear();
    this.history.length = 0;
  }
}
