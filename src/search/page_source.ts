/**
 * @fileoverview Where the searcher gets pages from
 *
 * The engine implements PageSource over its cache; DirectPageSource
 * generates and scores on every call.
 */

import { PageGenerator, computeContentHash } from '../generator/page_generator.js';
import { normalizeAddress } from '../generator/address.js';
import type { CoherenceScorer } from '../scoring/coherence_scorer.js';
import type { Page } from './types.js';

export interface PageSource {
  /** Page for `address`, scored without a target phrase */
  getPage(address: string): Page;
}

export function createPage(address: string, generator: PageGenerator, scorer: CoherenceScorer): Page {
  const canonical = normalizeAddress(address);
  const text = generator.generate(canonical);
  const { composite, submetrics } = scorer.score(text);
  return Object.freeze({
    address: canonical,
    text,
    coherenceScore: composite,
    submetrics: Object.freeze(submetrics),
    contentHash: computeContentHash(text),
  });
}

export class DirectPageSource implements PageSource {
  constructor(
    private readonly scorer: CoherenceScorer,
    private readonly generator: PageGenerator = new PageGenerator(),
  ) {}

  getPage(address: string): Page {
    return createPage(address, this.generator, this.scorer);
  }
}
