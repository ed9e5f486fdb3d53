/**
 * @fileoverview Coherence scoring types
 */

export const SUBMETRIC_NAMES = [
  'englishDensity',
  'sentenceStructure',
  'punctuationScore',
  'phraseMatch',
  'wordDistribution',
  'charEntropy',
] as const;

export type SubmetricName = (typeof SUBMETRIC_NAMES)[number];

/** Each submetric is normalized to [0, 1]. */
export type Submetrics = Record<SubmetricName, number>;

/** Non-negative weights that sum to 1.0. */
export type ScoringWeights = Record<SubmetricName, number>;

export interface CoherenceScore {
  /** Weighted composite in [0, 100] */
  composite: number;
  submetrics: Submetrics;
}

export const DEFAULT_WEIGHTS: Readonly<ScoringWeights> = Object.freeze({
  englishDensity: 0.35,
  sentenceStructure: 0.2,
  punctuationScore: 0.15,
  phraseMatch: 0.15,
  wordDistribution: 0.1,
  charEntropy: 0.05,
});
