/**
 * @fileoverview Discovery configuration schema
 *
 * One validated struct covers every tunable: scoring weights and dictionary
 * extensions, search defaults, cache capacity and eviction, inversion
 * bounds, enumeration parameters and the assembly padding policy. Partial
 * input is merged over {@link DEFAULT_DISCOVERY_CONFIG}; weight sums are
 * checked separately by the scorer so that the failure is InvalidWeights.
 */

import { z } from 'zod';
import { DEFAULT_WEIGHTS } from '../scoring/types.js';

export const SEARCH_STRATEGIES = ['exact', 'fragments', 'ngram', 'inversion', 'auto'] as const;
export type SearchStrategy = (typeof SEARCH_STRATEGIES)[number];

export const CANDIDATE_STRATEGIES = ['exact', 'fragments', 'ngram', 'inversion'] as const;
export type CandidateStrategy = (typeof CANDIDATE_STRATEGIES)[number];

export const EVICTION_POLICIES = ['lru', 'fifo'] as const;
export type EvictionPolicy = (typeof EVICTION_POLICIES)[number];

export const PADDING_POLICIES = ['strict', 'pad'] as const;
export type PaddingPolicy = (typeof PADDING_POLICIES)[number];

const nonNegativeInt = z.number().int().nonnegative();
const positiveInt = z.number().int().positive();

export const ScoringWeightsSchema = z
  .object({
    englishDensity: z.number(),
    sentenceStructure: z.number(),
    punctuationScore: z.number(),
    phraseMatch: z.number(),
    wordDistribution: z.number(),
    charEntropy: z.number(),
  })
  .strict();

export const DiscoveryConfigSchema = z
  .object({
    scoring: z
      .object({
        weights: ScoringWeightsSchema,
        dictionaryExtensions: z.array(z.string().min(1)),
      })
      .strict(),
    search: z
      .object({
        defaultMinCoherence: z.number().finite(),
        defaultStrategy: z.enum(SEARCH_STRATEGIES),
        defaultMaxCandidates: positiveInt,
        snippetLength: positiveInt,
      })
      .strict(),
    cache: z
      .object({
        maxEntries: nonNegativeInt,
        eviction: z.enum(EVICTION_POLICIES),
      })
      .strict(),
    inversion: z
      .object({
        windowSize: nonNegativeInt,
        maxIterations: nonNegativeInt,
        maxMatches: positiveInt,
        timeBudgetMs: nonNegativeInt,
      })
      .strict(),
    enumeration: z
      .object({
        minFragmentLength: positiveInt,
        ngramSize: positiveInt,
        salt: z.number().int(),
      })
      .strict(),
    assembly: z
      .object({
        padding: z.enum(PADDING_POLICIES),
        poolMultiplier: positiveInt,
        defaultBookSize: positiveInt,
      })
      .strict(),
  })
  .strict();

export type DiscoveryConfig = z.infer<typeof DiscoveryConfigSchema>;

export type DiscoveryConfigInput = {
  [K in keyof DiscoveryConfig]?: Partial<DiscoveryConfig[K]>;
};

export const DEFAULT_DISCOVERY_CONFIG: DiscoveryConfig = {
  scoring: {
    weights: { ...DEFAULT_WEIGHTS },
    dictionaryExtensions: [],
  },
  search: {
    defaultMinCoherence: 30,
    defaultStrategy: 'fragments',
    defaultMaxCandidates: 10,
    snippetLength: 100,
  },
  cache: {
    maxEntries: 1024,
    eviction: 'lru',
  },
  inversion: {
    windowSize: 5000,
    maxIterations: 10000,
    maxMatches: 1,
    timeBudgetMs: 0,
  },
  enumeration: {
    minFragmentLength: 3,
    ngramSize: 3,
    salt: 0,
  },
  assembly: {
    padding: 'strict',
    poolMultiplier: 3,
    defaultBookSize: 32,
  },
};

/**
 * Input schema: every section and every field optional, unknown keys rejected.
 */
export const DiscoveryConfigInputSchema = z
  .object({
    scoring: DiscoveryConfigSchema.shape.scoring.partial(),
    search: DiscoveryConfigSchema.shape.search.partial(),
    cache: DiscoveryConfigSchema.shape.cache.partial(),
    inversion: DiscoveryConfigSchema.shape.inversion.partial(),
    enumeration: DiscoveryConfigSchema.shape.enumeration.partial(),
    assembly: DiscoveryConfigSchema.shape.assembly.partial(),
  })
  .partial()
  .strict();
