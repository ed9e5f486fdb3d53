/**
 * @fileoverview Query search over generated pages
 *
 * Pipeline: validate -> enumerate candidates -> fetch pages from the page
 * source -> rescore with the query as target phrase -> filter by
 * minCoherence -> rank (score desc, address asc) -> truncate -> snippet.
 *
 * All validation happens before the first page is generated. A query with
 * no qualifying page is an empty outcome, not an error.
 */

import { InvalidQueryError, ValidationError } from '../core/errors.js';
import { compareAddresses } from '../generator/address.js';
import { normalizePhrase, type CoherenceScorer } from '../scoring/coherence_scorer.js';
import { logDebug } from '../telemetry/logger.js';
import { DEFAULT_DISCOVERY_CONFIG, type DiscoveryConfig, type SearchStrategy } from '../config/schema.js';
import {
  assertSearchStrategy,
  splitPhraseToFragments,
  type Candidate,
  type CandidateEnumerator,
} from './candidate_enumerator.js';
import type { PageSource } from './page_source.js';
import type { Page, SearchOutcome, SearchRequest, SearchResult } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ValidatedSearchRequest {
  query: string;
  strategy: SearchStrategy;
  maxCandidates: number;
  minCoherence: number;
}

export interface RankedPage {
  /** The page rescored against the query */
  page: Page;
  candidate: Candidate;
}

export interface RankOutcome {
  request: ValidatedSearchRequest;
  ranked: RankedPage[];
  candidates: number;
}

// ============================================================================
// VALIDATION
// ============================================================================

export function validateSearchRequest(
  request: SearchRequest,
  defaults: DiscoveryConfig['search'] = DEFAULT_DISCOVERY_CONFIG.search,
): ValidatedSearchRequest {
  const query = normalizePhrase(request.query);
  if (query.length === 0) {
    throw new InvalidQueryError(request.query);
  }

  const strategy = assertSearchStrategy(request.strategy ?? defaults.defaultStrategy);

  const maxCandidates = request.maxCandidates ?? defaults.defaultMaxCandidates;
  if (!Number.isInteger(maxCandidates)) {
    throw new ValidationError('maxCandidates', 'an integer', String(maxCandidates));
  }

  const minCoherence = request.minCoherence ?? defaults.defaultMinCoherence;
  if (!Number.isFinite(minCoherence)) {
    throw new ValidationError('minCoherence', 'a finite number', String(minCoherence));
  }

  return { query, strategy, maxCandidates, minCoherence };
}

// ============================================================================
// RANKING AND SNIPPETS
// ============================================================================

export function compareRanked(a: RankedPage, b: RankedPage): number {
  if (a.page.coherenceScore !== b.page.coherenceScore) {
    return b.page.coherenceScore - a.page.coherenceScore;
  }
  return compareAddresses(a.page.address, b.page.address);
}

function clampWindowStart(start: number, textLength: number, length: number): number {
  return Math.max(0, Math.min(start, textLength - length));
}

/**
 * A `length`-character excerpt: centered on the first exact hit of `query`
 * when there is one, else the window starting at a fragment occurrence that
 * covers the most distinct fragments (earliest wins), else the page start.
 */
export function buildSnippet(text: string, query: string, fragments: readonly string[], length: number): string {
  if (text.length <= length) return text;
  const lower = text.toLowerCase();

  const hit = query.length > 0 ? lower.indexOf(query) : -1;
  if (hit !== -1) {
    const lead = Math.floor(Math.max(0, length - query.length) / 2);
    const start = clampWindowStart(hit - lead, text.length, length);
    return text.slice(start, start + length);
  }

  let bestStart = 0;
  let bestCount = 0;
  for (const fragment of fragments) {
    if (fragment.length === 0) continue;
    for (let at = lower.indexOf(fragment); at !== -1; at = lower.indexOf(fragment, at + 1)) {
      const start = clampWindowStart(at, text.length, length);
      const window = lower.slice(start, start + length);
      const count = fragments.filter((f) => f.length > 0 && window.includes(f)).length;
      if (count > bestCount || (count === bestCount && start < bestStart)) {
        bestStart = start;
        bestCount = count;
      }
    }
  }
  return text.slice(bestStart, bestStart + length);
}

// ============================================================================
// SEARCHER
// ============================================================================

export class Searcher {
  private readonly config: Pick<DiscoveryConfig, 'search' | 'enumeration'>;

  constructor(
    private readonly pages: PageSource,
    private readonly scorer: CoherenceScorer,
    private readonly enumerator: CandidateEnumerator,
    config: Pick<DiscoveryConfig, 'search' | 'enumeration'> = DEFAULT_DISCOVERY_CONFIG,
  ) {
    this.config = config;
  }

  /**
   * Every qualifying page, rescored against the query and ranked, without
   * truncation. The engine draws book pools from this.
   */
  rank(request: SearchRequest): RankOutcome {
    const validated = validateSearchRequest(request, this.config.search);
    if (validated.maxCandidates <= 0) {
      return { request: validated, ranked: [], candidates: 0 };
    }

    const candidates = this.enumerator.enumerate(validated.query, validated.strategy);
    const ranked: RankedPage[] = [];
    for (const candidate of candidates) {
      const base = this.pages.getPage(candidate.address);
      const { composite, submetrics } = this.scorer.score(base.text, validated.query);
      if (composite < validated.minCoherence) continue;
      ranked.push({
        page: Object.freeze({ ...base, coherenceScore: composite, submetrics: Object.freeze(submetrics) }),
        candidate,
      });
    }
    ranked.sort(compareRanked);

    logDebug('[searcher] candidates ranked', {
      query: validated.query,
      strategy: validated.strategy,
      candidates: candidates.length,
      qualifying: ranked.length,
    });
    return { request: validated, ranked, candidates: candidates.length };
  }

  search(request: SearchRequest): SearchOutcome {
    const { request: validated, ranked, candidates } = this.rank(request);
    const fragments = splitPhraseToFragments(validated.query, this.config.enumeration.minFragmentLength);
    const results = ranked.slice(0, Math.max(0, validated.maxCandidates)).map(
      ({ page, candidate }): SearchResult => ({
        address: page.address,
        snippet: buildSnippet(page.text, validated.query, fragments, this.config.search.snippetLength),
        compositeScore: page.coherenceScore,
        submetrics: page.submetrics,
        strategy: candidate.strategy,
        prior: candidate.prior,
      }),
    );

    return {
      query: validated.query,
      strategy: validated.strategy,
      status: results.length > 0 ? 'ok' : 'empty',
      results,
      candidates,
    };
  }
}
