/**
 * @fileoverview Recommender configuration
 *
 * Every tunable of the pipeline lives here: source trust weights, the
 * shared-property table, the preference vocabulary and the stage limits.
 * Defaults are in code; a YAML file may override any subset of them.
 */

import * as fs from 'fs/promises';
import yaml from 'yaml';
import { z } from 'zod';
import { createPredicateRef, type PredicateRef, type PreferenceKind } from '../core/contracts.js';
import { ConfigurationError, Errors } from '../core/errors.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * One row of the shared-property table: candidates sharing `predicate` with
 * a seed gain `weight` and a reason built from `reason` and the shared value.
 */
export interface SharedPropertyCategory {
  kind: string;
  predicate: PredicateRef;
  weight: number;
  reason: string;
}

export interface SourceWeights {
  /** Candidates matching every explicit preference. */
  preference: number;
  /** Candidates sharing a property with a seed. */
  seedGraph: number;
  /** Embedding neighbors of a seed. */
  embedding: number;
}

export interface RecommenderConfig {
  weights: SourceWeights;
  /** Bonus per rating point added at ranking time. */
  ratingWeight: number;
  /** Score a preference match carries before weighting. */
  preferenceMatchScore: number;
  sharedProperties: SharedPropertyCategory[];
  /** Preference/negation kind -> graph predicate. */
  vocabulary: Record<PreferenceKind, PredicateRef>;
  /** Nearest neighbors fetched per seed. */
  neighborsPerSeed: number;
  graphQueryLimit: number;
  preferenceQueryLimit: number;
  /** Highest-scoring candidates sent to constraint verification. */
  verificationCap: number;
  mmrLambda: number;
  defaultTopK: number;
  externalCallTimeoutMs: number;
}

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_SHARED_PROPERTIES: readonly SharedPropertyCategory[] = Object.freeze([
  { kind: 'genre', predicate: createPredicateRef('P136'), weight: 1.0, reason: 'shares the genre' },
  { kind: 'director', predicate: createPredicateRef('P57'), weight: 0.8, reason: 'has the same director' },
  { kind: 'cast member', predicate: createPredicateRef('P161'), weight: 0.5, reason: 'shares an actor' },
  { kind: 'part of series', predicate: createPredicateRef('P179'), weight: 0.9, reason: 'is in the same series as' },
  { kind: 'based on', predicate: createPredicateRef('P4969'), weight: 0.7, reason: 'is based on similar work as' },
]);

export const DEFAULT_VOCABULARY: Readonly<Record<PreferenceKind, PredicateRef>> = Object.freeze({
  genre: createPredicateRef('P136'),
  director: createPredicateRef('P57'),
  actor: createPredicateRef('P161'),
  'cast member': createPredicateRef('P161'),
  screenwriter: createPredicateRef('P58'),
  composer: createPredicateRef('P86'),
  producer: createPredicateRef('P162'),
  country: createPredicateRef('P495'),
  language: createPredicateRef('P407'),
  'part of series': createPredicateRef('P179'),
  'based on': createPredicateRef('P4969'),
});

/** Ratings are on a 0-10 scale. */
export const MAX_RATING = 10;

export function createDefaultConfig(): RecommenderConfig {
  return {
    weights: { preference: 2.0, seedGraph: 1.0, embedding: 0.1 },
    ratingWeight: 0.02,
    preferenceMatchScore: 2.0,
    sharedProperties: DEFAULT_SHARED_PROPERTIES.map((category) => ({ ...category })),
    vocabulary: { ...DEFAULT_VOCABULARY },
    neighborsPerSeed: 20,
    graphQueryLimit: 20,
    preferenceQueryLimit: 50,
    verificationCap: 200,
    mmrLambda: 0.7,
    defaultTopK: 5,
    externalCallTimeoutMs: 5000,
  };
}

// ============================================================================
// SCHEMA
// ============================================================================

const positive = z.number().finite().positive();
const nonNegative = z.number().finite().nonnegative();
const positiveInt = z.number().int().positive();

const ConfigOverridesSchema = z
  .object({
    weights: z
      .object({ preference: positive, seedGraph: positive, embedding: nonNegative })
      .partial()
      .strict(),
    ratingWeight: nonNegative,
    preferenceMatchScore: positive,
    sharedProperties: z
      .array(
        z
          .object({
            kind: z.string().min(1),
            predicate: z.string().min(1),
            weight: positive,
            reason: z.string().min(1),
          })
          .strict()
      )
      .min(1),
    vocabulary: z.record(z.string().min(1)),
    neighborsPerSeed: positiveInt,
    graphQueryLimit: positiveInt,
    preferenceQueryLimit: positiveInt,
    verificationCap: positiveInt,
    mmrLambda: z.number().min(0).max(1),
    defaultTopK: positiveInt,
    externalCallTimeoutMs: nonNegative,
  })
  .partial()
  .strict();

export type RecommenderConfigOverrides = z.input<typeof ConfigOverridesSchema>;

// ============================================================================
// RESOLUTION
// ============================================================================

/**
 * Merge `overrides` over the defaults and validate the result. Unknown keys,
 * wrong types and weight orderings that would let a weak signal outrank a
 * strong one raise ConfigurationError.
 */
export function resolveRecommenderConfig(overrides: unknown = {}): RecommenderConfig {
  const parsed = ConfigOverridesSchema.safeParse(overrides ?? {});
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    const key = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
    throw Errors.config(key, issue?.message ?? 'invalid configuration');
  }

  const input = parsed.data;
  const defaults = createDefaultConfig();
  const vocabulary: Record<PreferenceKind, PredicateRef> = { ...defaults.vocabulary };
  for (const [kind, predicate] of Object.entries(input.vocabulary ?? {})) {
    vocabulary[kind] = createPredicateRef(predicate);
  }

  const config: RecommenderConfig = {
    ...defaults,
    ...input,
    weights: { ...defaults.weights, ...input.weights },
    sharedProperties: input.sharedProperties
      ? input.sharedProperties.map((category) => ({
          ...category,
          predicate: createPredicateRef(category.predicate),
        }))
      : defaults.sharedProperties,
    vocabulary,
  };

  validateWeightOrdering(config);
  return config;
}

function validateWeightOrdering(config: RecommenderConfig): void {
  const { preference, seedGraph, embedding } = config.weights;
  if (!(preference > seedGraph)) {
    throw new ConfigurationError('weights.preference', `must exceed weights.seedGraph (${seedGraph})`);
  }
  if (!(seedGraph > embedding)) {
    throw new ConfigurationError('weights.seedGraph', `must exceed weights.embedding (${embedding})`);
  }

  const weights = config.sharedProperties.map((category) => category.weight);
  const minShared = Math.min(...weights);
  const maxShared = Math.max(...weights);
  // Embedding scores are spread over the seeds that reached them, so a
  // neighbor contributes at most `embedding` (similarity <= 1).
  if (!(embedding < minShared * seedGraph)) {
    throw new ConfigurationError(
      'weights.embedding',
      `a single embedding neighbor (${embedding}) must stay below the weakest shared-property match (${minShared * seedGraph})`
    );
  }
  if (!(config.ratingWeight * MAX_RATING < minShared * seedGraph)) {
    throw new ConfigurationError(
      'ratingWeight',
      `a top rating (${config.ratingWeight * MAX_RATING}) must stay below the weakest shared-property match (${minShared * seedGraph})`
    );
  }
  if (!(config.preferenceMatchScore > maxShared)) {
    throw new ConfigurationError(
      'preferenceMatchScore',
      `must exceed the strongest shared-property weight (${maxShared})`
    );
  }
}

/**
 * Load configuration from a YAML file. Without a path, `MARQUEE_CONFIG` is
 * consulted; with neither, the defaults are returned.
 */
export async function loadRecommenderConfig(
  configPath: string | undefined = process.env.MARQUEE_CONFIG
): Promise<RecommenderConfig> {
  if (!configPath) {
    return resolveRecommenderConfig({});
  }

  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw Errors.config(configPath, `cannot read config file: ${message}`);
  }

  let document: unknown;
  try {
    document = yaml.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw Errors.config(configPath, `invalid YAML: ${message}`);
  }

  return resolveRecommenderConfig(document ?? {});
}
