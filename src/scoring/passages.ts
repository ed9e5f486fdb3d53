/**
 * @fileoverview Batch page decoding and passage extraction
 */

import { compareAddresses } from '../generator/address.js';
import type { CoherenceScorer } from './coherence_scorer.js';
import type { CoherenceScore } from './types.js';

export const COHERENT_PAGE_SCORE = 50;

export interface DecodeOptions {
  /** Pages scoring below this are dropped (default 30) */
  minScore?: number;
  targetPhrase?: string;
}

export interface DecodedPage {
  address: string;
  text: string;
  score: CoherenceScore;
  isCoherent: boolean;
}

export interface PassageOptions {
  /** Shorter sentences are skipped (default 50) */
  minLength?: number;
  /** default 60 */
  minCoherence?: number;
}

export interface Passage {
  text: string;
  /** Sentence index within the page */
  index: number;
  length: number;
  coherence: number;
}

// A sentence keeps its terminal punctuation so it can earn structure credit.
const SENTENCE_PATTERN = /[^.!?]+[.!?]*/g;

export class PassageExtractor {
  constructor(private readonly scorer: CoherenceScorer) {}

  /**
   * Score (address, text) pairs, keep those at or above `minScore`, best
   * first with address order breaking ties.
   */
  decodePages(pages: readonly { address: string; text: string }[], options: DecodeOptions = {}): DecodedPage[] {
    const minScore = options.minScore ?? 30;
    const decoded: DecodedPage[] = [];
    for (const { address, text } of pages) {
      const score = this.scorer.score(text, options.targetPhrase);
      if (score.composite < minScore) continue;
      decoded.push({ address, text, score, isCoherent: score.composite >= COHERENT_PAGE_SCORE });
    }
    return decoded.sort((a, b) => {
      if (a.score.composite !== b.score.composite) return b.score.composite - a.score.composite;
      return compareAddresses(a.address, b.address);
    });
  }

  extractCoherentPassages(text: string, options: PassageOptions = {}): Passage[] {
    const minLength = options.minLength ?? 50;
    const minCoherence = options.minCoherence ?? 60;
    const passages: Passage[] = [];

    let index = 0;
    for (const match of text.matchAll(SENTENCE_PATTERN)) {
      const sentence = match[0].trim();
      const current = index++;
      if (sentence.length < minLength) continue;
      const { composite } = this.scorer.score(sentence);
      if (composite >= minCoherence) {
        passages.push({ text: sentence, index: current, length: sentence.length, coherence: composite });
      }
    }
    return passages;
  }
}
