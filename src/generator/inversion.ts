/**
 * @fileoverview Bounded substring inversion
 *
 * The recurrence cannot be inverted from its output, so "inversion" here is a
 * brute-force scan over a fixed window of consecutive seeds starting at a
 * digest-derived base seed. The scan checks its iteration cap and time budget
 * on every step and stops cooperatively.
 */

import { logWarning } from '../telemetry/logger.js';
import { addressFromSeed, MODULUS_NUMBER, seedFromDigest } from './address.js';
import { generateFromSeed, isCharsetText } from './page_generator.js';

export interface InversionOptions {
  /** Number of consecutive seeds in the window (default 5000) */
  windowSize?: number;
  /** Hard cap on pages generated, whatever the window size (default 10000) */
  maxIterations?: number;
  /** Stop after this many hits (default 1: the first matching address) */
  maxMatches?: number;
  /** Cooperative wall-clock budget in milliseconds; 0 disables it */
  timeBudgetMs?: number;
  /** Explicit base seed; defaults to the digest of the substring */
  baseSeed?: number;
  /** Salt for the digest-derived base seed */
  salt?: number;
  now?: () => number;
}

export interface InversionHit {
  address: string;
  /** Offset of the first occurrence within the page */
  position: number;
}

export type InversionStopReason = 'exhausted' | 'matches' | 'iterations' | 'time' | 'unrepresentable';

export interface InversionReport {
  substring: string;
  baseSeed: number;
  hits: InversionHit[];
  iterations: number;
  stoppedBy: InversionStopReason;
}

export const DEFAULT_INVERSION_WINDOW = 5000;
export const DEFAULT_INVERSION_MAX_ITERATIONS = 10000;

export function invertSubstring(substring: string, options: InversionOptions = {}): InversionReport {
  const target = substring.toLowerCase();
  const baseSeed = options.baseSeed ?? seedFromDigest(target, options.salt ?? 0);
  const report: InversionReport = { substring: target, baseSeed, hits: [], iterations: 0, stoppedBy: 'exhausted' };

  // No page can contain text outside the alphabet.
  if (target.length === 0 || !isCharsetText(target)) {
    report.stoppedBy = 'unrepresentable';
    return report;
  }

  const windowSize = Math.max(0, Math.floor(options.windowSize ?? DEFAULT_INVERSION_WINDOW));
  const maxIterations = Math.max(0, Math.floor(options.maxIterations ?? DEFAULT_INVERSION_MAX_ITERATIONS));
  const maxMatches = Math.max(1, Math.floor(options.maxMatches ?? 1));
  const now = options.now ?? (() => Date.now());
  const budget = options.timeBudgetMs ?? 0;
  const deadline = budget > 0 ? now() + budget : Number.POSITIVE_INFINITY;

  for (let offset = 0; offset < windowSize; offset++) {
    if (report.iterations >= maxIterations) {
      report.stoppedBy = 'iterations';
      break;
    }
    if (now() >= deadline) {
      report.stoppedBy = 'time';
      break;
    }

    const seed = (baseSeed + offset) % MODULUS_NUMBER;
    report.iterations++;
    const position = generateFromSeed(seed).indexOf(target);
    if (position !== -1) {
      report.hits.push({ address: addressFromSeed(seed), position });
      if (report.hits.length >= maxMatches) {
        report.stoppedBy = 'matches';
        break;
      }
    }
  }

  if (report.stoppedBy === 'iterations' || report.stoppedBy === 'time') {
    logWarning('[inversion] scan cut off before the window was exhausted', {
      substring: target,
      iterations: report.iterations,
      windowSize,
      stoppedBy: report.stoppedBy,
    });
  }

  return report;
}
