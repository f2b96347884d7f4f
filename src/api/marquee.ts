/**
 * @fileoverview Marquee facade
 *
 * Wires configuration, the SQLite graph, the vector index, the session map
 * and the turn handler into one object for hosts (a chat transport, a CLI).
 *
 * @example
 * ```typescript
 * const marquee = await createMarquee({ dbPath: 'data/graph.sqlite' });
 * marquee.loadEmbeddings(vectors);
 * const turn = await marquee.handleTurn('user-1', { text: 'like Heat', intent });
 * await marquee.shutdown();
 * ```
 */

import { resolveRecommenderConfig, loadRecommenderConfig, type RecommenderConfig } from '../config/recommender_config.js';
import { Errors } from '../core/errors.js';
import { TurnHandler, type TurnInput, type TurnResult } from '../conversation/turn_handler.js';
import { Recommender, type RecommendationResponse } from '../pipeline/recommender.js';
import { SessionManager } from '../session/session_manager.js';
import { SqliteGraphStore, type GraphVocabulary, type Triple } from '../storage/sqlite_graph_store.js';
import { InMemoryVectorIndex, type VectorIndexItem } from '../storage/vector_index.js';
import { createLogger } from '../telemetry/logger.js';

const log = createLogger('marquee');

export interface MarqueeOptions {
  /** SQLite file holding the graph; defaults to an in-memory database. */
  dbPath?: string;
  /** YAML configuration file; falls back to MARQUEE_CONFIG. */
  configPath?: string;
  /** Overrides applied on top of the defaults when no file is used. */
  config?: unknown;
  graphVocabulary?: Partial<GraphVocabulary>;
}

export class Marquee {
  private store: SqliteGraphStore | null = null;
  private readonly vectors = new InMemoryVectorIndex();
  private readonly sessions = new SessionManager();
  private config: RecommenderConfig | null = null;
  private recommender: Recommender | null = null;
  private turns: TurnHandler | null = null;

  constructor(private readonly options: MarqueeOptions = {}) {}

  async initialize(): Promise<void> {
    if (this.recommender) return;

    const config =
      this.options.config !== undefined
        ? resolveRecommenderConfig(this.options.config)
        : await loadRecommenderConfig(this.options.configPath);

    const store = new SqliteGraphStore(this.options.dbPath ?? ':memory:', this.options.graphVocabulary);
    await store.initialize();

    const recommender = new Recommender({ graphStore: store, vectorIndex: this.vectors, labels: store, config });
    this.store = store;
    this.config = config;
    this.recommender = recommender;
    this.turns = new TurnHandler(this.sessions, recommender, { topK: config.defaultTopK });
    log.info('Marquee initialized', { dbPath: this.options.dbPath ?? ':memory:' });
  }

  getConfig(): RecommenderConfig {
    return this.ensureReady().config;
  }

  loadTriples(triples: Iterable<Triple>): number {
    return this.ensureReady().store.addTriples(triples);
  }

  /** Replace the embedding index contents. */
  loadEmbeddings(items: Iterable<VectorIndexItem>): void {
    this.vectors.load(items);
    log.info('Embeddings loaded', { count: this.vectors.size() });
  }

  handleTurn(userId: string, input: TurnInput): Promise<TurnResult> {
    return this.ensureReady().turns.handleTurn(userId, input);
  }

  /**
   * Recommendations for the user's current session without a conversational
   * turn. The results are not remembered as recommended.
   */
  recommend(userId: string, k?: number): Promise<RecommendationResponse> {
    const { recommender } = this.ensureReady();
    return this.sessions.withSession(userId, (session) => recommender.getRecommendations(session, k));
  }

  clearSession(userId: string): Promise<void> {
    return this.sessions.clear(userId);
  }

  sessionCount(): number {
    return this.sessions.size();
  }

  async shutdown(): Promise<void> {
    if (this.store) {
      await this.store.close();
      this.store = null;
    }
    this.recommender = null;
    this.turns = null;
    this.config = null;
  }

  private ensureReady(): {
    store: SqliteGraphStore;
    config: RecommenderConfig;
    recommender: Recommender;
    turns: TurnHandler;
  } {
    const { store, config, recommender, turns } = this;
    if (!store || !config || !recommender || !turns) {
      throw Errors.graphStore('open', 'Marquee not initialized. Call initialize() first.');
    }
    return { store, config, recommender, turns };
  }
}

export async function createMarquee(options: MarqueeOptions = {}): Promise<Marquee> {
  const marquee = new Marquee(options);
  await marquee.initialize();
  return marquee;
}
