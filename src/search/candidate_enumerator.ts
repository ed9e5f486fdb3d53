/**
 * @fileoverview Candidate address enumeration
 *
 * Turns a query phrase into an ordered, deduplicated list of addresses worth
 * generating. Strategies are a closed set dispatched through a table; each is
 * deterministic for a given phrase and parameters.
 */

import { InvalidStrategyError } from '../core/errors.js';
import { addressFromDigest } from '../generator/address.js';
import { invertSubstring, type InversionReport } from '../generator/inversion.js';
import { normalizePhrase } from '../scoring/coherence_scorer.js';
import { logDebug } from '../telemetry/logger.js';
import {
  CANDIDATE_STRATEGIES,
  DEFAULT_DISCOVERY_CONFIG,
  SEARCH_STRATEGIES,
  type CandidateStrategy,
  type DiscoveryConfig,
  type SearchStrategy,
} from '../config/schema.js';

// ============================================================================
// TYPES
// ============================================================================

export interface Candidate {
  address: string;
  strategy: CandidateStrategy;
  /** Prior likelihood in (0, 1] that the page is relevant */
  prior: number;
  /** Fragment or n-gram the address was derived from */
  fragment?: string;
}

export interface EnumerationOptions {
  minFragmentLength: number;
  ngramSize: number;
  salt: number;
  inversion: DiscoveryConfig['inversion'];
  now?: () => number;
}

type StrategyHandler = (phrase: string, options: EnumerationOptions) => Candidate[];

// ============================================================================
// PHRASE DECOMPOSITION
// ============================================================================

/**
 * Words of at least `minLength` characters, then consecutive word pairs, then
 * word triples, in phrase order.
 */
export function splitPhraseToFragments(phrase: string, minLength = 3): string[] {
  const words = normalizePhrase(phrase).split(' ').filter((word) => word.length > 0);
  const fragments: string[] = [];

  for (const word of words) {
    if (word.length >= minLength) fragments.push(word);
  }
  for (let i = 0; i + 1 < words.length; i++) {
    const pair = `${words[i]} ${words[i + 1]}`;
    if (pair.length >= minLength) fragments.push(pair);
  }
  for (let i = 0; i + 2 < words.length; i++) {
    fragments.push(`${words[i]} ${words[i + 1]} ${words[i + 2]}`);
  }

  return [...new Set(fragments)];
}

/**
 * Distinct character n-grams of the normalized phrase, in first-seen order.
 */
export function generateNgrams(phrase: string, size = 3): string[] {
  const text = normalizePhrase(phrase);
  const grams = new Set<string>();
  for (let i = 0; i + size <= text.length; i++) {
    grams.add(text.slice(i, i + size));
  }
  return [...grams];
}

// ============================================================================
// STRATEGIES
// ============================================================================

function fromExact(phrase: string, options: EnumerationOptions): Candidate[] {
  return [{ address: addressFromDigest(phrase, options.salt), strategy: 'exact', prior: 1, fragment: phrase }];
}

function fromFragments(phrase: string, options: EnumerationOptions): Candidate[] {
  return splitPhraseToFragments(phrase, options.minFragmentLength).map((fragment): Candidate => ({
    address: addressFromDigest(fragment, options.salt),
    strategy: 'fragments',
    prior: Math.min(1, fragment.length / phrase.length),
    fragment,
  }));
}

function fromNgrams(phrase: string, options: EnumerationOptions): Candidate[] {
  return generateNgrams(phrase, options.ngramSize).map((gram): Candidate => ({
    address: addressFromDigest(gram, options.salt),
    strategy: 'ngram',
    prior: Math.min(1, gram.length / phrase.length),
    fragment: gram,
  }));
}

function fromInversion(phrase: string, options: EnumerationOptions): Candidate[] {
  const report: InversionReport = invertSubstring(phrase, {
    windowSize: options.inversion.windowSize,
    maxIterations: options.inversion.maxIterations,
    maxMatches: options.inversion.maxMatches,
    timeBudgetMs: options.inversion.timeBudgetMs,
    salt: options.salt,
    now: options.now,
  });
  logDebug('[enumerator] inversion scan finished', {
    iterations: report.iterations,
    hits: report.hits.length,
    stoppedBy: report.stoppedBy,
  });
  return report.hits.map((hit): Candidate => ({ address: hit.address, strategy: 'inversion', prior: 1, fragment: phrase }));
}

const STRATEGY_HANDLERS: Record<CandidateStrategy, StrategyHandler> = {
  exact: fromExact,
  fragments: fromFragments,
  ngram: fromNgrams,
  inversion: fromInversion,
};

const KNOWN_STRATEGIES = new Set<string>(SEARCH_STRATEGIES);

export function isSearchStrategy(value: string): value is SearchStrategy {
  return KNOWN_STRATEGIES.has(value);
}

export function assertSearchStrategy(value: string): SearchStrategy {
  if (!isSearchStrategy(value)) {
    throw new InvalidStrategyError('search', value, SEARCH_STRATEGIES);
  }
  return value;
}

/**
 * First occurrence of each address wins, so earlier strategies and earlier
 * fragments keep their attribution.
 */
export function dedupeCandidates(candidates: readonly Candidate[]): Candidate[] {
  const seen = new Set<string>();
  const unique: Candidate[] = [];
  for (const candidate of candidates) {
    if (seen.has(candidate.address)) continue;
    seen.add(candidate.address);
    unique.push(candidate);
  }
  return unique;
}

// ============================================================================
// ENUMERATOR
// ============================================================================

export class CandidateEnumerator {
  private readonly options: EnumerationOptions;

  constructor(config: Pick<DiscoveryConfig, 'enumeration' | 'inversion'> = DEFAULT_DISCOVERY_CONFIG, now?: () => number) {
    this.options = { ...config.enumeration, inversion: { ...config.inversion }, now };
  }

  /**
   * Candidates for `phrase` under `strategy`; `auto` is the union of every
   * strategy in declaration order. An empty phrase yields no candidates.
   */
  enumerate(phrase: string, strategy: string): Candidate[] {
    const checked = assertSearchStrategy(strategy);
    const normalized = normalizePhrase(phrase);
    if (normalized.length === 0) return [];

    const strategies: readonly CandidateStrategy[] = checked === 'auto' ? CANDIDATE_STRATEGIES : [checked];
    const candidates: Candidate[] = [];
    for (const name of strategies) {
      candidates.push(...STRATEGY_HANDLERS[name](normalized, this.options));
    }

    const unique = dedupeCandidates(candidates);
    logDebug('[enumerator] candidates enumerated', { strategy: checked, raw: candidates.length, unique: unique.length });
    return unique;
  }
}
