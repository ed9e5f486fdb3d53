/**
 * @fileoverview Book assembly
 *
 * Groups already-scored pages into an ordered, immutable Book under one of
 * four methods:
 * - address_adjacency: numeric address order
 * - coherence_threshold: pages at or above a threshold, best first
 * - phrase_relevance: phrase match, then composite, then address
 * - custom: caller order, checked for size and uniqueness only
 *
 * The integrity hash covers every page's address and text in book order, so
 * any reordering or edit is detectable with {@link verifyBookIntegrity}.
 */

import { createHash } from 'node:crypto';
import { InsufficientPagesError, InvalidStrategyError, ValidationError } from '../core/errors.js';
import { compareAddresses, normalizeAddress, parseAddress } from '../generator/address.js';
import { computeContentHash } from '../generator/page_generator.js';
import { scorePhraseMatch } from '../scoring/coherence_scorer.js';
import { logInfo, logWarning } from '../telemetry/logger.js';
import { DEFAULT_DISCOVERY_CONFIG, type DiscoveryConfig } from '../config/schema.js';
import type { Page } from '../search/types.js';
import {
  ASSEMBLY_METHODS,
  type AssemblyMethod,
  type AssemblyRequest,
  type Book,
  type BookMetadata,
  type ProvenanceValue,
} from './types.js';

// ============================================================================
// HELPERS
// ============================================================================

const KNOWN_METHODS = new Set<string>(ASSEMBLY_METHODS);

export function isAssemblyMethod(value: string): value is AssemblyMethod {
  return KNOWN_METHODS.has(value);
}

/**
 * Method and size checks, shared with callers that gather pages first.
 */
export function validateAssemblyParameters(method: string, bookSize: number): AssemblyMethod {
  if (!isAssemblyMethod(method)) {
    throw new InvalidStrategyError('assembly', method, ASSEMBLY_METHODS);
  }
  if (!Number.isInteger(bookSize) || bookSize <= 0) {
    throw new ValidationError('bookSize', 'a positive integer', String(bookSize));
  }
  return method;
}

/**
 * Canonical addresses for a `custom` book: every address valid, exactly
 * `bookSize` of them, none repeated.
 */
export function validateCustomAddresses(addresses: readonly string[], bookSize: number): string[] {
  const canonical = addresses.map(normalizeAddress);
  if (canonical.length < bookSize) {
    throw new InsufficientPagesError('custom', bookSize, canonical.length);
  }
  if (canonical.length > bookSize) {
    throw new ValidationError('pages', `exactly ${bookSize} pages`, String(canonical.length));
  }
  const seen = new Set<string>();
  for (const address of canonical) {
    if (seen.has(address)) {
      throw new ValidationError('pages', 'unique addresses', `duplicate address ${address}`);
    }
    seen.add(address);
  }
  return canonical;
}

function assertPageAddresses(pages: readonly Page[]): void {
  for (const page of pages) {
    const parsed = parseAddress(page.address);
    if (!parsed.ok) throw parsed.error;
  }
}

export function computeIntegrityHash(pages: readonly Pick<Page, 'address' | 'text'>[]): string {
  const hash = createHash('sha256');
  for (const page of pages) {
    hash.update(`${page.address}\n${page.text}\n`, 'utf8');
  }
  return hash.digest('hex');
}

export function computeBookId(addresses: readonly string[]): string {
  return createHash('sha256').update(addresses.join(','), 'utf8').digest('hex').slice(0, 16);
}

/**
 * Recompute the integrity hash and every page's content hash.
 */
export function verifyBookIntegrity(book: Book): boolean {
  if (computeIntegrityHash(book.pages) !== book.integrityHash) return false;
  return book.pages.every((page) => computeContentHash(page.text) === page.contentHash);
}

function dedupeByAddress(pages: readonly Page[]): Page[] {
  const seen = new Set<string>();
  return pages.filter((page) => {
    if (seen.has(page.address)) return false;
    seen.add(page.address);
    return true;
  });
}

function byScoreThenAddress(a: Page, b: Page): number {
  if (a.coherenceScore !== b.coherenceScore) return b.coherenceScore - a.coherenceScore;
  return compareAddresses(a.address, b.address);
}

function freezePage(page: Page): Page {
  return Object.freeze({ ...page, submetrics: Object.freeze({ ...page.submetrics }) });
}

function truncateLabel(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max)}...` : value;
}

function buildMetadata(pages: readonly Page[], paddedPages: number): BookMetadata {
  const first = pages[0];
  const last = pages[pages.length - 1];
  const values = pages.map((page) => BigInt(`0x${page.address}`));
  let min = values[0] ?? 0n;
  let max = min;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return Object.freeze({
    firstAddress: first?.address ?? '',
    lastAddress: last?.address ?? '',
    addressRange: (max - min).toString(),
    pageCount: pages.length,
    totalLength: pages.reduce((sum, page) => sum + page.text.length, 0),
    paddedPages,
  });
}

// ============================================================================
// ASSEMBLER
// ============================================================================

interface Selection {
  pages: Page[];
  paddedPages: number;
  title: string;
  parameters: Record<string, ProvenanceValue>;
}

export class BookAssembler {
  private readonly config: Pick<DiscoveryConfig, 'assembly' | 'search'>;
  private readonly now: () => number;

  constructor(config: Pick<DiscoveryConfig, 'assembly' | 'search'> = DEFAULT_DISCOVERY_CONFIG, now: () => number = Date.now) {
    this.config = config;
    this.now = now;
  }

  assemble(request: AssemblyRequest): Book {
    const method = validateAssemblyParameters(request.method, request.bookSize);
    assertPageAddresses(request.pages);

    const selection = this.select(method, request);
    const pages = Object.freeze(selection.pages.map(freezePage));
    const addresses = pages.map((page) => page.address);
    const coherenceScore = pages.reduce((sum, page) => sum + page.coherenceScore, 0) / pages.length;

    const book: Book = Object.freeze({
      id: computeBookId(addresses),
      title: selection.title,
      method,
      pages,
      coherenceScore,
      integrityHash: computeIntegrityHash(pages),
      provenance: Object.freeze({
        query: request.query ?? null,
        method,
        parameters: Object.freeze({
          ...request.parameters,
          ...selection.parameters,
          bookSize: request.bookSize,
          padding: this.config.assembly.padding,
          paddedPages: selection.paddedPages,
        }),
        createdAt: new Date(this.now()).toISOString(),
      }),
      metadata: buildMetadata(pages, selection.paddedPages),
    });

    logInfo('[assembler] book assembled', {
      id: book.id,
      method,
      pages: pages.length,
      coherence: Number(coherenceScore.toFixed(2)),
    });
    return book;
  }

  private select(method: AssemblyMethod, request: AssemblyRequest): Selection {
    switch (method) {
      case 'address_adjacency':
        return this.byAddressAdjacency(request);
      case 'coherence_threshold':
        return this.byCoherenceThreshold(request);
      case 'phrase_relevance':
        return this.byPhraseRelevance(request);
      case 'custom':
        return this.asCustom(request);
    }
  }

  private byAddressAdjacency(request: AssemblyRequest): Selection {
    const pool = dedupeByAddress(request.pages).sort((a, b) => compareAddresses(a.address, b.address));
    if (pool.length < request.bookSize) {
      throw new InsufficientPagesError('address_adjacency', request.bookSize, pool.length);
    }
    const pages = pool.slice(0, request.bookSize);
    const first = pages[0]?.address ?? '';
    return { pages, paddedPages: 0, title: `Book at Address ${truncateLabel(first, 8)}`, parameters: {} };
  }

  private byCoherenceThreshold(request: AssemblyRequest): Selection {
    const threshold = request.coherenceThreshold ?? this.config.search.defaultMinCoherence;
    if (!Number.isFinite(threshold)) {
      throw new ValidationError('coherenceThreshold', 'a finite number', String(threshold));
    }

    const pool = dedupeByAddress(request.pages).sort(byScoreThenAddress);
    const qualifying = pool.filter((page) => page.coherenceScore >= threshold);
    let pages = qualifying.slice(0, request.bookSize);
    let paddedPages = 0;

    if (pages.length < request.bookSize) {
      if (this.config.assembly.padding === 'strict' || pool.length < request.bookSize) {
        throw new InsufficientPagesError('coherence_threshold', request.bookSize, qualifying.length);
      }
      const fillers = pool.filter((page) => page.coherenceScore < threshold);
      paddedPages = request.bookSize - pages.length;
      pages = [...pages, ...fillers.slice(0, paddedPages)];
      logWarning('[assembler] padded book with below-threshold pages', {
        threshold,
        qualifying: qualifying.length,
        paddedPages,
      });
    }

    const mean = pages.reduce((sum, page) => sum + page.coherenceScore, 0) / pages.length;
    return {
      pages,
      paddedPages,
      title: `Coherent Collection (Score: ${mean.toFixed(1)})`,
      parameters: { coherenceThreshold: threshold },
    };
  }

  private byPhraseRelevance(request: AssemblyRequest): Selection {
    const phrase = request.targetPhrase ?? request.query ?? '';
    const relevance = (page: Page): number =>
      phrase.trim().length > 0 ? scorePhraseMatch(page.text, phrase) : page.submetrics.phraseMatch;

    const pool = dedupeByAddress(request.pages)
      .map((page) => ({ page, relevance: relevance(page) }))
      .sort((a, b) => {
        if (a.relevance !== b.relevance) return b.relevance - a.relevance;
        return byScoreThenAddress(a.page, b.page);
      });
    if (pool.length < request.bookSize) {
      throw new InsufficientPagesError('phrase_relevance', request.bookSize, pool.length);
    }

    const label = phrase.trim().length > 0 ? phrase.trim() : 'phrase';
    return {
      pages: pool.slice(0, request.bookSize).map(({ page }) => page),
      paddedPages: 0,
      title: `Collection: "${truncateLabel(label, 50)}"`,
      parameters: { targetPhrase: phrase.trim().length > 0 ? phrase : null },
    };
  }

  private asCustom(request: AssemblyRequest): Selection {
    validateCustomAddresses(
      request.pages.map((page) => page.address),
      request.bookSize,
    );
    return { pages: [...request.pages], paddedPages: 0, title: request.title ?? 'Custom Collection', parameters: {} };
  }
}
