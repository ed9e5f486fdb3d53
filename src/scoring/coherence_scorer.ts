/**
 * @fileoverview Multi-signal coherence scorer
 *
 * Combines six independent text heuristics into a 0-100 composite:
 * 1. English density (dictionary hit rate over tokens)
 * 2. Sentence structure (terminals, sentence length, capitalization, run-ons)
 * 3. Punctuation density (peak band 2%-8%)
 * 4. Phrase match (exact target phrase, else trigram overlap)
 * 5. Word distribution (type/token ratio away from both extremes)
 * 6. Character entropy (relative to a uniform 29-symbol source)
 *
 * Scoring is a pure function of (text, phrase, dictionary, weights). Every
 * submetric is reported so callers can explain a score.
 */

import { InvalidWeightsError } from '../core/errors.js';
import { EnglishDictionary } from './dictionary.js';
import {
  DEFAULT_WEIGHTS,
  SUBMETRIC_NAMES,
  type CoherenceScore,
  type ScoringWeights,
  type Submetrics,
} from './types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

const PUNCTUATION_PATTERN = /[!-\/:-@\[-`{-~]/g;
const TERMINAL_PATTERN = /[.!?]/g;
const RUN_BREAK_PATTERN = /[.,!?;:]/;

export const PUNCTUATION_BAND = { min: 0.02, max: 0.08, zeroAbove: 0.2 } as const;
export const LONG_RUN_LENGTH = 150;
export const PARTIAL_PHRASE_CREDIT = 0.9;
export const PHRASE_GRAM_SIZE = 3;
export const WEIGHT_SUM_TOLERANCE = 1e-6;

const MAX_ENTROPY_BITS = Math.log2(29);

const KNOWN_SUBMETRICS = new Set<string>(SUBMETRIC_NAMES);

// ============================================================================
// TEXT HELPERS
// ============================================================================

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function normalizePhrase(phrase: string): string {
  return phrase.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Whitespace-delimited tokens with ASCII punctuation removed, lower-cased.
 */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  for (const raw of text.split(/\s+/)) {
    const token = raw.replace(PUNCTUATION_PATTERN, '').toLowerCase();
    if (token.length > 0) tokens.push(token);
  }
  return tokens;
}

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

// ============================================================================
// SUBMETRICS
// ============================================================================

export function scoreEnglishDensity(tokens: readonly string[], dictionary: EnglishDictionary): number {
  if (tokens.length === 0) return 0;
  let known = 0;
  for (const token of tokens) {
    if (dictionary.has(token)) known++;
  }
  return known / tokens.length;
}

export function scorePunctuation(text: string): number {
  if (text.length === 0) return 0;
  const ratio = countMatches(text, PUNCTUATION_PATTERN) / text.length;
  if (ratio < PUNCTUATION_BAND.min) {
    return clamp01(ratio / PUNCTUATION_BAND.min);
  }
  if (ratio > PUNCTUATION_BAND.max) {
    return clamp01(1 - (ratio - PUNCTUATION_BAND.max) / (PUNCTUATION_BAND.zeroAbove - PUNCTUATION_BAND.max));
  }
  return 1;
}

function sentenceLengthScore(textLength: number, terminals: number): number {
  if (terminals === 0) return 0;
  const average = textLength / terminals;
  if (average >= 50 && average <= 200) return 1;
  if (average >= 30 && average <= 300) return 0.5;
  return 0;
}

/**
 * Share of characters sitting in punctuation-free runs longer than
 * {@link LONG_RUN_LENGTH}.
 */
export function longRunShare(text: string): number {
  if (text.length === 0) return 0;
  let longChars = 0;
  for (const segment of text.split(RUN_BREAK_PATTERN)) {
    if (segment.length > LONG_RUN_LENGTH) longChars += segment.length;
  }
  return longChars / text.length;
}

export function capitalizationRatio(text: string): number {
  let boundaries = 0;
  let capitalized = 0;
  for (const match of text.matchAll(/[.!?]+\s*(\S)/g)) {
    const next = match[1];
    if (!/\p{L}/u.test(next)) continue;
    boundaries++;
    if (next !== next.toLowerCase()) capitalized++;
  }
  return boundaries === 0 ? 0 : capitalized / boundaries;
}

export function scoreSentenceStructure(text: string): number {
  if (text.trim().length === 0) return 0;
  const terminals = countMatches(text, TERMINAL_PATTERN);
  const raw =
    0.3 * (terminals > 0 ? 1 : 0) +
    0.4 * sentenceLengthScore(text.length, terminals) +
    0.3 * capitalizationRatio(text);
  return clamp01(raw * (1 - longRunShare(text)));
}

export function scoreWordDistribution(tokens: readonly string[]): number {
  if (tokens.length < 10) return 0.5;

  const counts = new Map<string, number>();
  let topCount = 0;
  for (const token of tokens) {
    const count = (counts.get(token) ?? 0) + 1;
    counts.set(token, count);
    if (count > topCount) topCount = count;
  }

  const uniqueRatio = counts.size / tokens.length;
  let score: number;
  if (uniqueRatio < 0.3) {
    score = uniqueRatio / 0.3;
  } else if (uniqueRatio > 0.7) {
    score = (1 - uniqueRatio) / 0.3;
  } else {
    score = 1;
  }

  if (topCount / tokens.length > 0.2) {
    score *= 0.5;
  }
  return clamp01(score);
}

function characterGrams(text: string, size: number): string[] {
  const grams = new Set<string>();
  for (let i = 0; i + size <= text.length; i++) {
    grams.add(text.slice(i, i + size));
  }
  return [...grams];
}

export function scorePhraseMatch(text: string, phrase?: string): number {
  const target = phrase ? normalizePhrase(phrase) : '';
  if (target.length === 0) return 0;

  const lower = text.toLowerCase();
  if (lower.includes(target)) return 1;

  const grams = characterGrams(target.replace(/\s+/g, ''), PHRASE_GRAM_SIZE);
  if (grams.length === 0) return 0;
  const compact = lower.replace(/\s+/g, '');
  const hits = grams.filter((gram) => compact.includes(gram)).length;
  return PARTIAL_PHRASE_CREDIT * (hits / grams.length);
}

export function scoreCharEntropy(text: string): number {
  if (text.length === 0) return 0;
  const counts = new Map<string, number>();
  for (const ch of text.toLowerCase()) {
    counts.set(ch, (counts.get(ch) ?? 0) + 1);
  }
  const total = [...counts.values()].reduce((sum, count) => sum + count, 0);
  let entropy = 0;
  for (const count of counts.values()) {
    const p = count / total;
    entropy -= p * Math.log2(p);
  }
  return clamp01(entropy / MAX_ENTROPY_BITS);
}

// ============================================================================
// WEIGHTS
// ============================================================================

/**
 * Check that every submetric has a finite, non-negative weight and that the
 * weights sum to 1.0.
 */
export function validateWeights(weights: Readonly<Record<string, number>>): ScoringWeights {
  for (const key of Object.keys(weights)) {
    if (!KNOWN_SUBMETRICS.has(key)) {
      throw new InvalidWeightsError(`unknown submetric "${key}"`, weights);
    }
  }

  const validated: ScoringWeights = { ...DEFAULT_WEIGHTS };
  let sum = 0;
  for (const name of SUBMETRIC_NAMES) {
    const weight = weights[name];
    if (weight === undefined) {
      throw new InvalidWeightsError(`missing weight for ${name}`, weights);
    }
    if (!Number.isFinite(weight) || weight < 0) {
      throw new InvalidWeightsError(`weight for ${name} must be a non-negative number, got ${weight}`, weights);
    }
    validated[name] = weight;
    sum += weight;
  }

  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new InvalidWeightsError(`weights must sum to 1.0, got ${sum}`, weights);
  }
  return validated;
}

export function compositeScore(submetrics: Submetrics, weights: ScoringWeights): number {
  let total = 0;
  for (const name of SUBMETRIC_NAMES) {
    total += weights[name] * submetrics[name];
  }
  return Math.min(100, Math.max(0, total * 100));
}

// ============================================================================
// SCORER
// ============================================================================

export interface CoherenceScorerOptions {
  dictionary?: EnglishDictionary;
  /** Words merged into the dictionary */
  dictionaryExtensions?: readonly string[];
  weights?: Readonly<Record<string, number>>;
}

export class CoherenceScorer {
  readonly dictionary: EnglishDictionary;
  readonly weights: Readonly<ScoringWeights>;

  constructor(options: CoherenceScorerOptions = {}) {
    // Weights first: a bad configuration fails before any word list I/O.
    this.weights = Object.freeze(validateWeights(options.weights ?? DEFAULT_WEIGHTS));
    const extensions = options.dictionaryExtensions ?? [];
    this.dictionary = options.dictionary
      ? extensions.length > 0
        ? options.dictionary.extend(extensions)
        : options.dictionary
      : new EnglishDictionary(undefined, extensions);
  }

  score(text: string, targetPhrase?: string): CoherenceScore {
    const submetrics = this.submetrics(text, targetPhrase);
    return { composite: compositeScore(submetrics, this.weights), submetrics };
  }

  submetrics(text: string, targetPhrase?: string): Submetrics {
    const tokens = tokenize(text);
    return {
      englishDensity: scoreEnglishDensity(tokens, this.dictionary),
      sentenceStructure: scoreSentenceStructure(text),
      punctuationScore: scorePunctuation(text),
      phraseMatch: scorePhraseMatch(text, targetPhrase),
      wordDistribution: scoreWordDistribution(tokens),
      charEntropy: scoreCharEntropy(text),
    };
  }
}
