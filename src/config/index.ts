/**
 * @fileoverview Discovery configuration
 */

export {
  DEFAULT_DISCOVERY_CONFIG,
  DiscoveryConfigSchema,
  DiscoveryConfigInputSchema,
  ScoringWeightsSchema,
  SEARCH_STRATEGIES,
  CANDIDATE_STRATEGIES,
  EVICTION_POLICIES,
  PADDING_POLICIES,
  type DiscoveryConfig,
  type DiscoveryConfigInput,
  type SearchStrategy,
  type CandidateStrategy,
  type EvictionPolicy,
  type PaddingPolicy,
} from './schema.js';

export { resolveDiscoveryConfig, mergeConfig, parseDiscoveryConfig, loadDiscoveryConfig } from './loader.js';
