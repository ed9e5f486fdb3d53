/**
 * @fileoverview English word list used by the english-density submetric
 *
 * The base list ships in data/english_words.json at the package root;
 * configured extensions are merged in at construction.
 */

import { existsSync, readFileSync } from 'node:fs';
import { ConfigurationError } from '../core/errors.js';

const WORD_LIST_FILE = 'english_words.json';

// Sources live in src/scoring, compiled output in dist/src/scoring.
const WORD_LIST_CANDIDATES = [`../../data/${WORD_LIST_FILE}`, `../../../data/${WORD_LIST_FILE}`];

let baseWords: readonly string[] | null = null;

function resolveWordListUrl(): URL {
  for (const candidate of WORD_LIST_CANDIDATES) {
    const url = new URL(candidate, import.meta.url);
    if (existsSync(url)) return url;
  }
  throw new ConfigurationError('base word list not found', WORD_LIST_CANDIDATES, WORD_LIST_FILE);
}

export function loadBaseWords(): readonly string[] {
  if (baseWords) return baseWords;
  const raw: unknown = JSON.parse(readFileSync(resolveWordListUrl(), 'utf8'));
  if (!Array.isArray(raw) || !raw.every((entry): entry is string => typeof entry === 'string')) {
    throw new ConfigurationError('base word list must be a JSON array of strings', [], WORD_LIST_FILE);
  }
  baseWords = Object.freeze(raw.map((word) => word.toLowerCase()));
  return baseWords;
}

export class EnglishDictionary {
  private readonly words: Set<string>;

  /**
   * @param words - Replaces the base list when given
   */
  constructor(words?: Iterable<string>, extensions: Iterable<string> = []) {
    this.words = new Set<string>();
    this.addWords(words ?? loadBaseWords());
    this.addWords(extensions);
  }

  has(word: string): boolean {
    return this.words.has(word.toLowerCase());
  }

  addWords(words: Iterable<string>): void {
    for (const word of words) {
      const normalized = word.trim().toLowerCase();
      if (normalized.length > 0) {
        this.words.add(normalized);
      }
    }
  }

  /** A copy holding these words plus `extensions`; this dictionary is unchanged */
  extend(extensions: Iterable<string>): EnglishDictionary {
    return new EnglishDictionary(this.words, extensions);
  }

  get size(): number {
    return this.words.size;
  }
}
