/**
 * @fileoverview SQLite-backed graph store
 *
 * Holds the movie graph as `(subject, predicate, object)` triples and answers
 * the recommendation patterns, constraint verification and label lookups
 * with plain SQL. Literal objects are stored as text: publication dates as
 * ISO dates, ratings as decimal strings.
 *
 * @packageDocumentation
 */

import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs/promises';
import {
  createPredicateRef,
  isComparisonOperator,
  unsafeEntityId,
  type Constraint,
  type EntityId,
  type FilterSet,
  type PredicateRef,
} from '../core/contracts.js';
import { Errors, GraphStoreError } from '../core/errors.js';
import type { GraphPattern, GraphRow, GraphStore, LabelResolver } from '../sources/types.js';
import { createLogger } from '../telemetry/logger.js';

const log = createLogger('sqlite-graph-store');

// ============================================================================
// TYPES
// ============================================================================

/**
 * Predicates and classes the store itself relies on.
 */
export interface GraphVocabulary {
  /** "instance of" */
  instanceOf: PredicateRef;
  /** Class an entity must be an instance of to be recommended. */
  recommendableClass: EntityId;
  publicationDate: PredicateRef;
  language: PredicateRef;
  rating: PredicateRef;
  label: PredicateRef;
  image: PredicateRef;
}

export const DEFAULT_GRAPH_VOCABULARY: Readonly<GraphVocabulary> = Object.freeze({
  instanceOf: createPredicateRef('P31'),
  recommendableClass: unsafeEntityId('Q11424'),
  publicationDate: createPredicateRef('P577'),
  language: createPredicateRef('P407'),
  rating: createPredicateRef('ddis:rating'),
  label: createPredicateRef('rdfs:label'),
  image: createPredicateRef('P18'),
});

export interface Triple {
  subject: string;
  predicate: string;
  object: string;
}

type SqlValue = string | number;

interface SqlFragment {
  sql: string[];
  params: SqlValue[];
}

interface SharedRow {
  entity: string;
  matchedValue: string | null;
  quality: number | null;
}

interface EntityRow {
  entity: string;
  quality: number | null;
}

// ============================================================================
// SQLITE GRAPH STORE
// ============================================================================

export class SqliteGraphStore implements GraphStore, LabelResolver {
  private db: Database.Database | null = null;
  private readonly vocabulary: GraphVocabulary;

  /**
   * @param dbPath - Database file, or ':memory:' for a process-local graph
   */
  constructor(
    private readonly dbPath: string = ':memory:',
    vocabulary: Partial<GraphVocabulary> = {}
  ) {
    this.vocabulary = { ...DEFAULT_GRAPH_VOCABULARY, ...vocabulary };
  }

  /**
   * Open the database and create the triples table if needed.
   */
  async initialize(): Promise<void> {
    if (this.db) return;

    const inMemory = this.dbPath === ':memory:';
    if (!inMemory) {
      await fs.mkdir(path.dirname(this.dbPath), { recursive: true });
    }

    try {
      this.db = new Database(this.dbPath);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw Errors.graphStore('open', `cannot open ${this.dbPath}: ${cause.message}`, false, cause);
    }
    if (!inMemory) {
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS triples (
        subject TEXT NOT NULL,
        predicate TEXT NOT NULL,
        object TEXT NOT NULL,
        PRIMARY KEY (subject, predicate, object)
      );
      CREATE INDEX IF NOT EXISTS idx_triples_predicate_object ON triples(predicate, object);
    `);
    log.debug('Graph store opened', { dbPath: this.dbPath });
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private ensureDb(): Database.Database {
    if (!this.db) {
      throw Errors.graphStore('open', 'SqliteGraphStore not initialized. Call initialize() first.');
    }
    return this.db;
  }

  /**
   * Insert triples in one transaction. Duplicates are ignored.
   * @returns Number of triples actually inserted
   */
  addTriples(triples: Iterable<Triple>): number {
    const db = this.ensureDb();
    const insert = db.prepare('INSERT OR IGNORE INTO triples (subject, predicate, object) VALUES (?, ?, ?)');
    const insertAll = db.transaction((rows: Iterable<Triple>) => {
      let inserted = 0;
      for (const row of rows) {
        inserted += insert.run(row.subject, row.predicate, row.object).changes;
      }
      return inserted;
    });
    return insertAll(triples);
  }

  tripleCount(): number {
    const row = this.ensureDb().prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM triples').get();
    return row?.count ?? 0;
  }

  // --------------------------------------------------------------------------
  // GraphStore
  // --------------------------------------------------------------------------

  async query(pattern: GraphPattern, filters: FilterSet, exclude: ReadonlySet<EntityId>): Promise<GraphRow[]> {
    const db = this.ensureDb();
    try {
      if (pattern.kind === 'shared_property') {
        return this.querySharedProperty(db, pattern, filters, exclude);
      }
      return this.queryAllProperties(db, pattern, filters, exclude);
    } catch (error) {
      throw this.wrap('query', error);
    }
  }

  async verifyMembership(ids: readonly EntityId[], filters: FilterSet): Promise<Set<EntityId>> {
    if (ids.length === 0) return new Set();
    const db = this.ensureDb();
    try {
      const restrictions = this.filterClauses('t.subject', filters);
      const sql = `
        SELECT t.subject AS entity
        FROM triples t
        WHERE t.predicate = ? AND t.object = ?
          AND t.subject IN (${placeholders(ids.length)})
          ${andAll(restrictions.sql)}
      `;
      const params: SqlValue[] = [
        this.vocabulary.instanceOf,
        this.vocabulary.recommendableClass,
        ...ids,
        ...restrictions.params,
      ];
      const rows = db.prepare<SqlValue[], { entity: string }>(sql).all(...params);
      return new Set(rows.map((row) => unsafeEntityId(row.entity)));
    } catch (error) {
      throw this.wrap('verify', error);
    }
  }

  // --------------------------------------------------------------------------
  // LabelResolver
  // --------------------------------------------------------------------------

  async labelOf(entityId: EntityId): Promise<string | undefined> {
    return this.firstObject(entityId, this.vocabulary.label);
  }

  async imageOf(entityId: EntityId): Promise<string | undefined> {
    return this.firstObject(entityId, this.vocabulary.image);
  }

  // --------------------------------------------------------------------------
  // Query builders
  // --------------------------------------------------------------------------

  private querySharedProperty(
    db: Database.Database,
    pattern: Extract<GraphPattern, { kind: 'shared_property' }>,
    filters: FilterSet,
    exclude: ReadonlySet<EntityId>
  ): GraphRow[] {
    if (pattern.seeds.length === 0) return [];

    const excluded = [...new Set<string>([...pattern.seeds, ...exclude])];
    const restrictions = this.filterClauses('m.subject', filters);
    const sql = `
      SELECT m.subject AS entity,
        (SELECT MIN(vl.object) FROM triples vl WHERE vl.subject = s.object AND vl.predicate = ?) AS matchedValue,
        (SELECT MAX(CAST(r.object AS REAL)) FROM triples r WHERE r.subject = m.subject AND r.predicate = ?) AS quality
      FROM triples s
      JOIN triples m ON m.predicate = s.predicate AND m.object = s.object
      WHERE s.predicate = ?
        AND s.subject IN (${placeholders(pattern.seeds.length)})
        AND m.subject NOT IN (${placeholders(excluded.length)})
        AND ${this.recommendableClause('m.subject')}
        ${andAll(restrictions.sql)}
      GROUP BY m.subject, s.object
      ORDER BY COUNT(DISTINCT s.subject) DESC, m.subject
      LIMIT ?
    `;
    const params: SqlValue[] = [
      this.vocabulary.label,
      this.vocabulary.rating,
      pattern.predicate,
      ...pattern.seeds,
      ...excluded,
      this.vocabulary.instanceOf,
      this.vocabulary.recommendableClass,
      ...restrictions.params,
      pattern.limit,
    ];

    const rows = db.prepare<SqlValue[], SharedRow>(sql).all(...params);
    return rows.map((row) => ({
      entity: unsafeEntityId(row.entity),
      matchedValue: row.matchedValue ?? undefined,
      qualitySignal: row.quality ?? undefined,
    }));
  }

  private queryAllProperties(
    db: Database.Database,
    pattern: Extract<GraphPattern, { kind: 'all_properties' }>,
    filters: FilterSet,
    exclude: ReadonlySet<EntityId>
  ): GraphRow[] {
    if (pattern.required.length === 0) return [];

    const required: SqlFragment = { sql: [], params: [] };
    for (const match of pattern.required) {
      required.sql.push(
        'EXISTS (SELECT 1 FROM triples p WHERE p.subject = t.subject AND p.predicate = ? AND p.object = ?)'
      );
      required.params.push(match.predicate, match.value);
    }
    const excluded = [...exclude];
    const restrictions = this.filterClauses('t.subject', filters);
    const sql = `
      SELECT t.subject AS entity,
        (SELECT MAX(CAST(r.object AS REAL)) FROM triples r WHERE r.subject = t.subject AND r.predicate = ?) AS quality
      FROM triples t
      WHERE t.predicate = ? AND t.object = ?
        ${andAll(required.sql)}
        ${excluded.length > 0 ? `AND t.subject NOT IN (${placeholders(excluded.length)})` : ''}
        ${andAll(restrictions.sql)}
      ORDER BY quality IS NULL, quality DESC, t.subject
      LIMIT ?
    `;
    const params: SqlValue[] = [
      this.vocabulary.rating,
      this.vocabulary.instanceOf,
      this.vocabulary.recommendableClass,
      ...required.params,
      ...excluded,
      ...restrictions.params,
      pattern.limit,
    ];

    const rows = db.prepare<SqlValue[], EntityRow>(sql).all(...params);
    return rows.map((row) => ({
      entity: unsafeEntityId(row.entity),
      qualitySignal: row.quality ?? undefined,
    }));
  }

  private recommendableClause(subject: string): string {
    return `EXISTS (SELECT 1 FROM triples c WHERE c.subject = ${subject} AND c.predicate = ? AND c.object = ?)`;
  }

  /**
   * SQL restrictions for `filters`, applied to the entity in `subject`.
   * Constraints need the matching literal to exist: an entity without a
   * publication date fails a year constraint. A negated constraint only
   * drops entities whose literal matches, so undated entities pass
   * "not from the 90s".
   */
  private filterClauses(subject: string, filters: FilterSet): SqlFragment {
    const fragment: SqlFragment = { sql: [], params: [] };
    for (const constraint of filters.constraints) {
      const clause = this.constraintClause(subject, constraint);
      fragment.sql.push(clause.sql);
      fragment.params.push(...clause.params);
    }
    for (const constraint of filters.negatedConstraints ?? []) {
      const clause = this.constraintClause(subject, constraint);
      fragment.sql.push(`NOT ${clause.sql}`);
      fragment.params.push(...clause.params);
    }
    for (const negation of filters.negated) {
      fragment.sql.push(
        `NOT EXISTS (SELECT 1 FROM triples n WHERE n.subject = ${subject} AND n.predicate = ? AND n.object = ?)`
      );
      fragment.params.push(negation.predicate, negation.value);
    }
    return fragment;
  }

  /**
   * An `EXISTS (...)` clause true when the entity satisfies `constraint`.
   */
  private constraintClause(subject: string, constraint: Constraint): { sql: string; params: SqlValue[] } {
    const yearOf = 'CAST(substr(d.object, 1, 4) AS INTEGER)';
    switch (constraint.kind) {
      case 'year': {
        if (!isComparisonOperator(constraint.operator)) {
          throw Errors.validation('constraint.operator', 'comparison operator', String(constraint.operator));
        }
        return {
          sql: `EXISTS (SELECT 1 FROM triples d WHERE d.subject = ${subject} AND d.predicate = ? AND ${yearOf} ${constraint.operator} ?)`,
          params: [this.vocabulary.publicationDate, constraint.year],
        };
      }
      case 'year_range':
        return {
          sql: `EXISTS (SELECT 1 FROM triples d WHERE d.subject = ${subject} AND d.predicate = ? AND ${yearOf} BETWEEN ? AND ?)`,
          params: [this.vocabulary.publicationDate, constraint.start, constraint.end],
        };
      case 'language':
        return {
          sql: `EXISTS (SELECT 1 FROM triples l WHERE l.subject = ${subject} AND l.predicate = ? AND l.object = ?)`,
          params: [this.vocabulary.language, constraint.language],
        };
      case 'min_rating':
        return {
          sql: `EXISTS (SELECT 1 FROM triples q WHERE q.subject = ${subject} AND q.predicate = ? AND CAST(q.object AS REAL) >= ?)`,
          params: [this.vocabulary.rating, constraint.rating],
        };
    }
  }

  private firstObject(entityId: EntityId, predicate: PredicateRef): string | undefined {
    try {
      const row = this.ensureDb()
        .prepare<[string, string], { object: string }>(
          'SELECT object FROM triples WHERE subject = ? AND predicate = ? ORDER BY object LIMIT 1'
        )
        .get(entityId, predicate);
      return row?.object;
    } catch (error) {
      throw this.wrap('label', error);
    }
  }

  private wrap(operation: 'query' | 'verify' | 'label', error: unknown): GraphStoreError {
    if (error instanceof GraphStoreError) return error;
    const cause = error instanceof Error ? error : new Error(String(error));
    const retryable = /SQLITE_BUSY|database is locked/i.test(cause.message);
    return Errors.graphStore(operation, cause.message, retryable, cause);
  }
}

function placeholders(count: number): string {
  return new Array<string>(count).fill('?').join(', ');
}

function andAll(clauses: readonly string[]): string {
  return clauses.map((clause) => `AND ${clause}`).join('\n');
}
