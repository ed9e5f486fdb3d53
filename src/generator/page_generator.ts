/**
 * @fileoverview Deterministic page generator
 *
 * Every address maps to exactly one 3200-character page. The seed is the
 * address read as an unbounded integer; each character comes from one step of
 * a linear congruential recurrence:
 *
 *   state = (state * 1103515245 + 12345) mod 2^31
 *   char  = CHARSET[state mod 29]
 *
 * The constants, the modulus and the charset order are a compatibility
 * contract. Changing any of them changes every page.
 *
 * @packageDocumentation
 */

import { createHash } from 'node:crypto';
import { unwrap } from '../core/result.js';
import { MODULUS, parseAddress } from './address.js';

export const CHARSET = ' abcdefghijklmnopqrstuvwxyz,.';
export const CHARSET_SIZE = CHARSET.length;
export const PAGE_LENGTH = 3200;
export const MULTIPLIER = 1103515245;
export const INCREMENT = 12345;

const STATE_MASK = 0x7fffffff;

const CHARSET_MEMBERS = new Set(CHARSET);

export function isCharsetText(text: string): boolean {
  for (const ch of text) {
    if (!CHARSET_MEMBERS.has(ch)) return false;
  }
  return true;
}

/**
 * Advance the recurrence one step.
 *
 * The modulus is a power of two, so only the low 31 bits of the product
 * matter; Math.imul keeps the low 32 bits exactly.
 */
export function nextState(state: number): number {
  return (Math.imul(state, MULTIPLIER) + INCREMENT) & STATE_MASK;
}

/**
 * Generate the page text for an already-reduced seed in [0, 2^31).
 */
export function generateFromSeed(seed: number): string {
  let state = seed;
  const chars = new Array<string>(PAGE_LENGTH);
  for (let i = 0; i < PAGE_LENGTH; i++) {
    state = nextState(state);
    chars[i] = CHARSET[state % CHARSET_SIZE];
  }
  return chars.join('');
}

/**
 * Reduce an unbounded seed into the recurrence's state space.
 */
export function reduceSeed(seed: bigint): number {
  return Number(seed % MODULUS);
}

/**
 * Pure page generation. Throws InvalidAddressError for malformed hex.
 */
export function generatePage(address: string): string {
  return generateFromSeed(reduceSeed(unwrap(parseAddress(address))));
}

export function computeContentHash(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex').slice(0, 16);
}

/**
 * Injectable wrapper around {@link generatePage}, so callers (and tests) can
 * observe or replace generation without touching the recurrence.
 */
export class PageGenerator {
  readonly pageLength = PAGE_LENGTH;
  readonly charset = CHARSET;

  generate(address: string): string {
    return generatePage(address);
  }
}
