/**
 * @fileoverview babel-discovery - deterministic page space with coherence search
 *
 * Every hexadecimal address names a fixed 3200-character page produced by a
 * linear congruential recurrence. This package searches that space for
 * readable text and binds what it finds into verifiable books.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { DiscoveryEngine } from 'babel-discovery';
 *
 * const engine = new DiscoveryEngine({ config: { cache: { maxEntries: 256 } } });
 *
 * const page = engine.getPage('00000001');
 * const response = engine.search({ query: 'the river', strategy: 'auto', minCoherence: 20 });
 * const book = engine.assembleBook({ query: 'the river', method: 'coherence_threshold', bookSize: 4 });
 * await engine.exportBook(book, './out/river.txt', 'text');
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// PRIMARY ENTRY POINT
// ============================================================================

export { DiscoveryEngine } from './engine/discovery_engine.js';
export type { DiscoveryEngineOptions, BookRequest, ExportReceipt } from './engine/discovery_engine.js';
export { PageCache } from './engine/page_cache.js';
export type { PageCacheStats, CacheLookup } from './engine/page_cache.js';

// ============================================================================
// GENERATION
// ============================================================================

export {
  CHARSET,
  PAGE_LENGTH,
  MULTIPLIER,
  INCREMENT,
  PageGenerator,
  generatePage,
  generateFromSeed,
  computeContentHash,
  isCharsetText,
} from './generator/page_generator.js';
export {
  MODULUS,
  isValidAddress,
  normalizeAddress,
  parseAddress,
  addressFromSeed,
  compareAddresses,
  seedFromDigest,
  addressFromDigest,
} from './generator/address.js';
export { invertSubstring } from './generator/inversion.js';
export type { InversionOptions, InversionReport, InversionHit, InversionStopReason } from './generator/inversion.js';

// ============================================================================
// SCORING
// ============================================================================

export { CoherenceScorer, validateWeights, tokenize, normalizePhrase } from './scoring/coherence_scorer.js';
export type { CoherenceScorerOptions } from './scoring/coherence_scorer.js';
export { EnglishDictionary } from './scoring/dictionary.js';
export { PassageExtractor } from './scoring/passages.js';
export type { DecodeOptions, DecodedPage, Passage, PassageOptions } from './scoring/passages.js';
export { DEFAULT_WEIGHTS, SUBMETRIC_NAMES } from './scoring/types.js';
export type { CoherenceScore, ScoringWeights, Submetrics, SubmetricName } from './scoring/types.js';

// ============================================================================
// SEARCH
// ============================================================================

export { CandidateEnumerator, splitPhraseToFragments, generateNgrams } from './search/candidate_enumerator.js';
export type { Candidate } from './search/candidate_enumerator.js';
export { Searcher, validateSearchRequest } from './search/searcher.js';
export { DirectPageSource, createPage } from './search/page_source.js';
export type { PageSource } from './search/page_source.js';
export type {
  Page,
  SearchRequest,
  SearchResult,
  SearchOutcome,
  SearchResponse,
  SearchMetadata,
  SearchStatus,
} from './search/types.js';

// ============================================================================
// BOOKS
// ============================================================================

export { BookAssembler, verifyBookIntegrity, computeIntegrityHash } from './assembly/book_assembler.js';
export { renderBook, summarizeBook, EXPORT_FORMATS } from './assembly/book_export.js';
export type { ExportFormat, BookSummary, PageSummary } from './assembly/book_export.js';
export { ASSEMBLY_METHODS } from './assembly/types.js';
export type { AssemblyMethod, AssemblyRequest, Book, BookMetadata, BookProvenance } from './assembly/types.js';

// ============================================================================
// CONFIGURATION, ERRORS, LOGGING
// ============================================================================

export * from './config/index.js';
export * from './core/errors.js';
export { Ok, Err, unwrap, mapResult } from './core/result.js';
export type { Result } from './core/result.js';
export { setLogLevel, getLogLevel } from './telemetry/logger.js';
export type { LogLevel } from './telemetry/logger.js';
