/**
 * @fileoverview Page and search result types
 */

import type { CandidateStrategy, SearchStrategy } from '../config/schema.js';
import type { Submetrics } from '../scoring/types.js';

/**
 * A generated page with the score it earned in the context it was scored in:
 * no phrase when fetched directly, the query when produced by a search.
 */
export interface Page {
  readonly address: string;
  readonly text: string;
  readonly coherenceScore: number;
  readonly submetrics: Readonly<Submetrics>;
  /** First 16 hex chars of SHA-256 over the text */
  readonly contentHash: string;
}

export interface SearchRequest {
  query: string;
  /** Defaults to `search.defaultStrategy` */
  strategy?: string;
  /** Defaults to `search.defaultMaxCandidates`; zero or less returns nothing */
  maxCandidates?: number;
  /** Defaults to `search.defaultMinCoherence` */
  minCoherence?: number;
}

export interface SearchResult {
  address: string;
  snippet: string;
  compositeScore: number;
  submetrics: Readonly<Submetrics>;
  strategy: CandidateStrategy;
  prior: number;
}

export type SearchStatus = 'ok' | 'empty';

export interface SearchOutcome {
  /** Normalized query */
  query: string;
  strategy: SearchStrategy;
  status: SearchStatus;
  results: SearchResult[];
  /** Distinct candidates generated and scored */
  candidates: number;
}

export interface SearchProvenance {
  query: string;
  strategy: SearchStrategy;
  timestamp: string;
}

export interface SearchMetadata {
  elapsedMs: number;
  cacheHits: number;
  cacheMisses: number;
  candidates: number;
  provenance: SearchProvenance;
}

export interface SearchResponse extends SearchOutcome {
  metadata: SearchMetadata;
}
