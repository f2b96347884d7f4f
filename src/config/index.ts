/**
 * @fileoverview Recommender configuration
 */

export {
  createDefaultConfig,
  resolveRecommenderConfig,
  loadRecommenderConfig,
  DEFAULT_SHARED_PROPERTIES,
  DEFAULT_VOCABULARY,
  type RecommenderConfig,
  type RecommenderConfigOverrides,
  type SharedPropertyCategory,
  type SourceWeights,
} from './recommender_config.js';
