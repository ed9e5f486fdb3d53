/**
 * @fileoverview Discovery engine
 *
 * The public entry point. Owns the page cache and wires the generator,
 * scorer, enumerator, searcher and assembler together under one validated
 * configuration. Everything except `exportBook` is synchronous: a cache
 * lookup and its fill run to completion before any other request can touch
 * the cache.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
  ExportFormatUnsupportedError,
  isDiscoveryError,
  ValidationError,
  type DiscoveryError,
} from '../core/errors.js';
import { captureResult, type Result } from '../core/result.js';
import { resolveDiscoveryConfig } from '../config/loader.js';
import type { DiscoveryConfig } from '../config/schema.js';
import { normalizeAddress } from '../generator/address.js';
import { PageGenerator } from '../generator/page_generator.js';
import { CoherenceScorer } from '../scoring/coherence_scorer.js';
import { PassageExtractor, type DecodeOptions, type DecodedPage, type Passage, type PassageOptions } from '../scoring/passages.js';
import { CandidateEnumerator } from '../search/candidate_enumerator.js';
import { createPage, type PageSource } from '../search/page_source.js';
import { Searcher } from '../search/searcher.js';
import type { Page, SearchRequest, SearchResponse } from '../search/types.js';
import { BookAssembler, validateAssemblyParameters, validateCustomAddresses } from '../assembly/book_assembler.js';
import { EXPORT_FORMATS, isExportFormat, renderBook, type ExportFormat } from '../assembly/book_export.js';
import type { Book, ProvenanceValue } from '../assembly/types.js';
import { logInfo } from '../telemetry/logger.js';
import { PageCache, type PageCacheStats } from './page_cache.js';

// ============================================================================
// TYPES
// ============================================================================

export interface DiscoveryEngineOptions {
  /** Partial configuration merged over the defaults and validated */
  config?: unknown;
  generator?: PageGenerator;
  /** Replaces the scorer built from `scoring.weights` and extensions */
  scorer?: CoherenceScorer;
  /** Wall clock in epoch milliseconds, for timings and timestamps */
  now?: () => number;
}

export interface BookRequest {
  query: string;
  method: string;
  /** Defaults to `assembly.defaultBookSize` */
  bookSize?: number;
  coherenceThreshold?: number;
  /** Candidate strategy for the page pool; defaults to `search.defaultStrategy` */
  strategy?: string;
  targetPhrase?: string;
  title?: string;
  /** Pages for the `custom` method, in book order; skips the search */
  addresses?: readonly string[];
}

export interface ExportReceipt {
  target: string;
  format: ExportFormat;
  bytes: number;
}

// ============================================================================
// ENGINE
// ============================================================================

export class DiscoveryEngine implements PageSource {
  readonly config: DiscoveryConfig;
  private readonly generator: PageGenerator;
  private readonly scorer: CoherenceScorer;
  private readonly cache: PageCache;
  private readonly searcher: Searcher;
  private readonly assembler: BookAssembler;
  private readonly passages: PassageExtractor;
  private readonly now: () => number;

  constructor(options: DiscoveryEngineOptions = {}) {
    this.config = resolveDiscoveryConfig(options.config ?? {});
    this.now = options.now ?? Date.now;
    this.generator = options.generator ?? new PageGenerator();
    this.scorer =
      options.scorer ??
      new CoherenceScorer({
        weights: this.config.scoring.weights,
        dictionaryExtensions: this.config.scoring.dictionaryExtensions,
      });
    this.cache = new PageCache(this.config.cache.maxEntries, this.config.cache.eviction);
    this.searcher = new Searcher(this, this.scorer, new CandidateEnumerator(this.config, this.now), this.config);
    this.assembler = new BookAssembler(this.config, this.now);
    this.passages = new PassageExtractor(this.scorer);
  }

  /**
   * Page for `address`, scored without a target phrase. Served from the cache
   * when present.
   */
  getPage(address: string): Page {
    const canonical = normalizeAddress(address);
    return this.cache.getOrCompute(canonical, (key) => createPage(key, this.generator, this.scorer)).page;
  }

  search(request: SearchRequest): SearchResponse {
    const before = this.cache.stats();
    const startedAt = this.now();
    const outcome = this.searcher.search(request);
    const after = this.cache.stats();
    const elapsedMs = this.now() - startedAt;

    logInfo('[engine] search complete', {
      query: outcome.query,
      strategy: outcome.strategy,
      results: outcome.results.length,
      elapsedMs,
    });

    return {
      ...outcome,
      metadata: {
        elapsedMs,
        cacheHits: after.hits - before.hits,
        cacheMisses: after.misses - before.misses,
        candidates: outcome.candidates,
        provenance: {
          query: outcome.query,
          strategy: outcome.strategy,
          timestamp: new Date(startedAt).toISOString(),
        },
      },
    };
  }

  trySearch(request: SearchRequest): Result<SearchResponse, DiscoveryError> {
    return captureResult(() => this.search(request), isDiscoveryError);
  }

  /**
   * Search for a pool of `bookSize x assembly.poolMultiplier` pages at zero
   * minimum coherence, then assemble. `custom` books take their pages from
   * `addresses` instead.
   */
  assembleBook(request: BookRequest): Book {
    const bookSize = request.bookSize ?? this.config.assembly.defaultBookSize;
    const method = validateAssemblyParameters(request.method, bookSize);
    if (request.coherenceThreshold !== undefined && !Number.isFinite(request.coherenceThreshold)) {
      throw new ValidationError('coherenceThreshold', 'a finite number', String(request.coherenceThreshold));
    }

    let pages: readonly Page[];
    const parameters: Record<string, ProvenanceValue> = {};
    if (method === 'custom') {
      if (!request.addresses) {
        throw new ValidationError('addresses', 'page addresses for a custom book', 'none');
      }
      pages = validateCustomAddresses(request.addresses, bookSize).map((address) => this.getPage(address));
    } else {
      const poolSize = bookSize * this.config.assembly.poolMultiplier;
      const { request: validated, ranked } = this.searcher.rank({
        query: request.query,
        strategy: request.strategy,
        maxCandidates: poolSize,
        minCoherence: 0,
      });
      pages = ranked.slice(0, poolSize).map(({ page }) => page);
      parameters['strategy'] = validated.strategy;
      parameters['poolSize'] = poolSize;
    }

    return this.assembler.assemble({
      pages,
      method,
      bookSize,
      coherenceThreshold: request.coherenceThreshold,
      targetPhrase: request.targetPhrase,
      query: request.query,
      title: request.title,
      parameters,
    });
  }

  renderBook(book: Book, format: string): string {
    return renderBook(book, format);
  }

  /**
   * Render and write `book` to `target`, creating parent directories.
   * Nothing is written for an unsupported format.
   */
  async exportBook(book: Book, target: string, format: string = 'text'): Promise<ExportReceipt> {
    if (!isExportFormat(format)) {
      throw new ExportFormatUnsupportedError(format, EXPORT_FORMATS);
    }
    const content = renderBook(book, format);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, 'utf8');

    const receipt: ExportReceipt = { target, format, bytes: Buffer.byteLength(content, 'utf8') };
    logInfo('[engine] book exported', { id: book.id, target, format, bytes: receipt.bytes });
    return receipt;
  }

  extractPassages(address: string, options?: PassageOptions): Passage[] {
    return this.passages.extractCoherentPassages(this.getPage(address).text, options);
  }

  decodePages(addresses: readonly string[], options?: DecodeOptions): DecodedPage[] {
    const canonical = addresses.map(normalizeAddress);
    return this.passages.decodePages(
      canonical.map((address) => this.getPage(address)),
      options,
    );
  }

  getCacheStats(): PageCacheStats {
    return this.cache.stats();
  }

  clearCache(): void {
    this.cache.clear();
  }
}
