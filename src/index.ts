/**
 * @fileoverview Marquee - recommendation core of a conversational movie assistant
 *
 * Given per-user conversation state (movies mentioned, preferences,
 * constraints, exclusions) it produces a short, diverse, ranked list of
 * movies with a reason for each.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createMarquee } from 'marquee';
 *
 * const marquee = await createMarquee({ dbPath: 'data/graph.sqlite' });
 * const turn = await marquee.handleTurn('user-1', {
 *   text: 'Recommend something like Heat',
 *   intent: { intent: 'recommendation', seedEntities: [heatId] },
 * });
 * console.log(turn.reply);
 * ```
 *
 * @packageDocumentation
 */

// Facade
export { Marquee, createMarquee, type MarqueeOptions } from './api/marquee.js';

// Core types
export {
  createEntityId,
  unsafeEntityId,
  createPredicateRef,
  isComparisonOperator,
  resolveFilters,
  COMPARISON_OPERATORS,
  EMPTY_FILTERS,
  type EntityId,
  type PredicateRef,
  type PreferenceKind,
  type ComparisonOperator,
  type Constraint,
  type ConstraintKind,
  type PropertyMatch,
  type FilterSet,
  type ParsedIntent,
} from './core/contracts.js';
export * from './core/errors.js';
export * from './core/result.js';

// Configuration
export * from './config/index.js';

// Session state
export { Session, type SessionView, type ConversationTurn } from './session/session.js';
export { SessionManager } from './session/session_manager.js';

// Candidate sources
export type {
  GraphPattern,
  GraphRow,
  GraphStore,
  Neighbor,
  VectorIndex,
  LabelResolver,
  SourceCandidate,
  SourceCandidateMap,
  SourceResult,
} from './sources/types.js';
export { GraphCandidateSource, type GraphCandidateSourceOptions } from './sources/graph_source.js';
export { EmbeddingCandidateSource, type EmbeddingCandidateSourceOptions } from './sources/embedding_source.js';

// Pipeline
export { CandidateAggregator, type Candidate, type CandidateMap } from './pipeline/aggregator.js';
export { ConstraintFilter, selectForVerification, type ConstraintFilterOptions } from './pipeline/constraint_filter.js';
export { rankCandidates, chooseReason, finalScore, type RankedEntry } from './pipeline/ranker.js';
export { selectDiverse, type EmbeddingLookup } from './pipeline/diversity.js';
export {
  Recommender,
  degradationOf,
  type Degradation,
  type DegradationKind,
  type Recommendation,
  type RecommendationResponse,
  type RecommenderDeps,
} from './pipeline/recommender.js';

// Storage
export {
  SqliteGraphStore,
  DEFAULT_GRAPH_VOCABULARY,
  type GraphVocabulary,
  type Triple,
} from './storage/sqlite_graph_store.js';
export { InMemoryVectorIndex, type VectorIndexItem } from './storage/vector_index.js';

// Conversation
export { TurnHandler, type TurnInput, type TurnKind, type TurnResult } from './conversation/turn_handler.js';
export * from './conversation/replies.js';

// Utilities
export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from './telemetry/logger.js';
export { withTimeout, TimeoutError } from './utils/async.js';
export { KeyedMutex } from './utils/keyed_mutex.js';
