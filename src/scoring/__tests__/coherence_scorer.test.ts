/**
 * @fileoverview Tests for the coherence scorer
 *
 * Exercises each submetric on hand-built text, the weighted composite, the
 * weight validation rules and the [0, 100] range property over generated
 * pages.
 */

import { describe, it, expect } from 'vitest';
import {
  CoherenceScorer,
  capitalizationRatio,
  compositeScore,
  longRunShare,
  normalizePhrase,
  scoreCharEntropy,
  scorePhraseMatch,
  scorePunctuation,
  scoreSentenceStructure,
  scoreWordDistribution,
  tokenize,
  validateWeights,
} from '../coherence_scorer.js';
import { EnglishDictionary } from '../dictionary.js';
import { DEFAULT_WEIGHTS, type ScoringWeights } from '../types.js';
import { InvalidWeightsError } from '../../core/errors.js';
import { generatePage } from '../../generator/page_generator.js';

const ENGLISH_TEXT =
  'The old man walked to the river. He sat by the water and thought about his life. ' +
  'The sun was low and the air was cold. Then he stood up, took his book, and went back home.';

describe('tokenize', () => {
  it('splits on whitespace, strips punctuation and lower-cases', () => {
    expect(tokenize("Hello, world! It's  fine.")).toEqual(['hello', 'world', 'its', 'fine']);
  });

  it('drops tokens made only of punctuation', () => {
    expect(tokenize('. , ..')).toEqual([]);
  });
});

describe('normalizePhrase', () => {
  it('lower-cases and collapses whitespace', () => {
    expect(normalizePhrase('  Thalos   PRIME ')).toBe('thalos prime');
  });
});

describe('scorePunctuation', () => {
  it('peaks inside the 2%-8% band', () => {
    expect(scorePunctuation('abcdefghijklmnopqrstuvwx,')).toBe(1);
  });

  it('degrades linearly below the band', () => {
    expect(scorePunctuation(`${'a'.repeat(99)},`)).toBeCloseTo(0.5, 10);
    expect(scorePunctuation('abcdefghij')).toBe(0);
  });

  it('degrades linearly above the band and clamps at zero', () => {
    expect(scorePunctuation('abcdefghi,')).toBeCloseTo(0.8333333333, 8);
    expect(scorePunctuation(`${'a,'.repeat(10)}${'b'.repeat(30)}`)).toBe(0);
    expect(scorePunctuation(',,,,')).toBe(0);
  });

  it('scores empty text as zero', () => {
    expect(scorePunctuation('')).toBe(0);
  });
});

describe('scoreSentenceStructure', () => {
  it('rewards terminals, readable sentence length and capitalized starts', () => {
    // 4 terminals over 171 chars (avg 42.75 -> half credit), 3 of 3 capitalized starts
    expect(ENGLISH_TEXT).toHaveLength(171);
    expect(scoreSentenceStructure(ENGLISH_TEXT)).toBeCloseTo(0.8, 10);
  });

  it('gives no capitalization credit to lower-case sentence starts', () => {
    expect(capitalizationRatio('one. two. Three.')).toBeCloseTo(0.5, 10);
    expect(capitalizationRatio('no terminals here')).toBe(0);
  });

  it('penalizes long punctuation-free runs', () => {
    const runOn = 'a'.repeat(300);
    expect(longRunShare(runOn)).toBe(1);
    expect(scoreSentenceStructure(runOn)).toBe(0);
    expect(longRunShare('short. runs, only')).toBe(0);
  });

  it('scores whitespace-only text as zero', () => {
    expect(scoreSentenceStructure('   ')).toBe(0);
  });
});

describe('scoreWordDistribution', () => {
  it('returns the neutral value for fewer than ten tokens', () => {
    expect(scoreWordDistribution(['a', 'b'])).toBe(0.5);
  });

  it('penalizes near-total repetition', () => {
    const tokens = Array.from({ length: 20 }, () => 'same');
    // unique ratio 0.05 -> 1/6, halved for the dominant token
    expect(scoreWordDistribution(tokens)).toBeCloseTo(1 / 12, 10);
  });

  it('penalizes near-total uniqueness', () => {
    const tokens = Array.from({ length: 20 }, (_, i) => `word${i}`);
    expect(scoreWordDistribution(tokens)).toBe(0);
  });

  it('gives full credit inside the 30%-70% band', () => {
    const tokens = Array.from({ length: 20 }, (_, i) => `word${i % 10}`);
    expect(scoreWordDistribution(tokens)).toBe(1);
  });
});

describe('scorePhraseMatch', () => {
  it('is 1 for an exact case-insensitive substring', () => {
    expect(scorePhraseMatch(ENGLISH_TEXT, 'WENT back   home')).toBe(1);
  });

  it('gives partial trigram credit below 1', () => {
    // grams of "backtohome": bac ack ckt kto toh oho hom ome; 4 of 8 present
    expect(scorePhraseMatch(ENGLISH_TEXT, 'back to home')).toBeCloseTo(0.45, 10);
  });

  it('is 0 without a phrase', () => {
    expect(scorePhraseMatch(ENGLISH_TEXT)).toBe(0);
    expect(scorePhraseMatch(ENGLISH_TEXT, '   ')).toBe(0);
  });

  it('is 0 when a non-matching phrase is too short for trigrams', () => {
    expect(scorePhraseMatch('abc', 'zz')).toBe(0);
  });
});

describe('scoreCharEntropy', () => {
  it('is 0 for a single repeated character', () => {
    expect(scoreCharEntropy('aaaa')).toBe(0);
  });

  it('is 1 for a uniform spread over the 29 symbols', () => {
    expect(scoreCharEntropy(' abcdefghijklmnopqrstuvwxyz,.')).toBeCloseTo(1, 10);
  });

  it('is close to 1 for a generated page', () => {
    expect(scoreCharEntropy(generatePage('00000001'))).toBeCloseTo(0.99853498, 6);
  });
});

describe('validateWeights', () => {
  it('accepts the defaults', () => {
    expect(validateWeights(DEFAULT_WEIGHTS)).toEqual(DEFAULT_WEIGHTS);
  });

  it('rejects weights summing to 0.9', () => {
    expect(() => validateWeights({ ...DEFAULT_WEIGHTS, englishDensity: 0.25 })).toThrow(InvalidWeightsError);
  });

  it('rejects a negative weight even when the sum is 1.0', () => {
    expect(() =>
      validateWeights({ ...DEFAULT_WEIGHTS, englishDensity: 0.6, sentenceStructure: -0.05 }),
    ).toThrow(/non-negative/);
  });

  it('rejects missing and unknown submetrics', () => {
    const { charEntropy: _unused, ...missing } = DEFAULT_WEIGHTS;
    expect(() => validateWeights(missing)).toThrow(/missing weight for charEntropy/);
    expect(() => validateWeights({ ...DEFAULT_WEIGHTS, vibes: 0 })).toThrow(/unknown submetric "vibes"/);
  });

  it('reports the INVALID_WEIGHTS code', () => {
    try {
      validateWeights({ ...DEFAULT_WEIGHTS, phraseMatch: 0.05 });
      expect.unreachable('validateWeights should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidWeightsError);
      if (error instanceof InvalidWeightsError) {
        expect(error.code).toBe('INVALID_WEIGHTS');
        expect(error.toJSON().retryable).toBe(false);
      }
    }
  });
});

describe('CoherenceScorer', () => {
  const scorer = new CoherenceScorer();

  it('fails construction with invalid weights', () => {
    expect(() => new CoherenceScorer({ weights: { ...DEFAULT_WEIGHTS, charEntropy: -0.05, englishDensity: 0.45 } })).toThrow(
      InvalidWeightsError,
    );
    expect(() => new CoherenceScorer({ weights: { ...DEFAULT_WEIGHTS, englishDensity: 0.25 } })).toThrow(
      InvalidWeightsError,
    );
  });

  it('scores readable English with the full breakdown', () => {
    const result = scorer.score(ENGLISH_TEXT);

    expect(result.submetrics.englishDensity).toBeCloseTo(34 / 37, 10);
    expect(result.submetrics.sentenceStructure).toBeCloseTo(0.8, 10);
    expect(result.submetrics.punctuationScore).toBe(1);
    expect(result.submetrics.phraseMatch).toBe(0);
    expect(result.submetrics.wordDistribution).toBeCloseTo(0.8108108108, 8);
    expect(result.submetrics.charEntropy).toBeCloseTo(0.8276182167, 8);
    expect(result.composite).toBeCloseTo(75.4083613540, 6);
  });

  it('adds phrase credit when the target phrase is present', () => {
    expect(scorer.score(ENGLISH_TEXT, 'went back home').composite).toBeCloseTo(90.4083613540, 6);
  });

  it('scores random generated text far below English', () => {
    const page = scorer.score(generatePage('00000001'));
    expect(page.composite).toBeCloseTo(26.8063232027, 6);
    expect(page.composite).toBeLessThan(scorer.score(ENGLISH_TEXT).composite);
  });

  it('scores empty text with only the neutral word-distribution credit', () => {
    expect(scorer.score('').composite).toBeCloseTo(5, 10);
  });

  it('is a pure function of its inputs', () => {
    const first = scorer.score(ENGLISH_TEXT, 'river');
    const second = scorer.score(ENGLISH_TEXT, 'river');
    expect(second).toEqual(first);
  });

  it('applies dictionary extensions', () => {
    const extended = new CoherenceScorer({
      dictionary: new EnglishDictionary(['prime']),
      dictionaryExtensions: ['Thalos'],
    });
    expect(extended.score('thalos prime').submetrics.englishDensity).toBe(1);
    expect(new CoherenceScorer({ dictionary: new EnglishDictionary(['prime']) }).score('thalos prime').submetrics.englishDensity).toBe(0.5);
  });

  it('leaves a shared dictionary unchanged when extending it', () => {
    const shared = new EnglishDictionary(['prime']);
    const extended = new CoherenceScorer({ dictionary: shared, dictionaryExtensions: ['thalos'] });
    const plain = new CoherenceScorer({ dictionary: shared });

    expect(extended.dictionary).not.toBe(shared);
    expect(shared.has('thalos')).toBe(false);
    expect(shared.size).toBe(1);
    expect(plain.score('thalos prime').submetrics.englishDensity).toBe(0.5);
    expect(extended.score('thalos prime').submetrics.englishDensity).toBe(1);
  });

  it('honours custom weights', () => {
    const weights: ScoringWeights = {
      englishDensity: 0,
      sentenceStructure: 0,
      punctuationScore: 0,
      phraseMatch: 1,
      wordDistribution: 0,
      charEntropy: 0,
    };
    const phraseOnly = new CoherenceScorer({ weights });
    expect(phraseOnly.score(ENGLISH_TEXT, 'the river').composite).toBe(100);
    expect(phraseOnly.score(ENGLISH_TEXT).composite).toBe(0);
  });

  it('keeps every composite within [0, 100]', () => {
    const configs: ScoringWeights[] = [
      { ...DEFAULT_WEIGHTS },
      { englishDensity: 0.5, sentenceStructure: 0.1, punctuationScore: 0.1, phraseMatch: 0.1, wordDistribution: 0.1, charEntropy: 0.1 },
      { englishDensity: 0, sentenceStructure: 0, punctuationScore: 0, phraseMatch: 0, wordDistribution: 0, charEntropy: 1 },
    ];
    const texts = [
      '',
      '....',
      ENGLISH_TEXT,
      ENGLISH_TEXT.toUpperCase(),
      'a'.repeat(5000),
      ...Array.from({ length: 25 }, (_, i) => generatePage(i.toString(16))),
    ];

    for (const weights of configs) {
      const custom = new CoherenceScorer({ weights });
      for (const text of texts) {
        const { composite } = custom.score(text, 'the river');
        expect(composite).toBeGreaterThanOrEqual(0);
        expect(composite).toBeLessThanOrEqual(100);
      }
    }
  });
});

describe('compositeScore', () => {
  it('clamps rounding overshoot to 100', () => {
    const perfect = {
      englishDensity: 1,
      sentenceStructure: 1,
      punctuationScore: 1,
      phraseMatch: 1,
      wordDistribution: 1,
      charEntropy: 1,
    };
    expect(compositeScore(perfect, DEFAULT_WEIGHTS)).toBeLessThanOrEqual(100);
    expect(compositeScore(perfect, DEFAULT_WEIGHTS)).toBeCloseTo(100, 10);
  });
});
