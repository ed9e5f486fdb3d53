/**
 * @fileoverview Page addresses
 *
 * An address is a lowercase hexadecimal string naming an unbounded
 * non-negative integer seed. Leading zeros are kept: "01" and "1" select the
 * same page text but are distinct addresses.
 */

import { createHash } from 'node:crypto';
import { InvalidAddressError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';

export const MODULUS = 2n ** 31n;
export const MODULUS_NUMBER = 0x80000000;

const HEX_PATTERN = /^[0-9a-f]+$/;

export function isValidAddress(address: string): boolean {
  return HEX_PATTERN.test(address.toLowerCase());
}

export function normalizeAddress(address: string): string {
  const lowered = address.toLowerCase();
  if (!HEX_PATTERN.test(lowered)) {
    throw new InvalidAddressError(address);
  }
  return lowered;
}

export function parseAddress(address: string): Result<bigint, InvalidAddressError> {
  const lowered = address.toLowerCase();
  if (!HEX_PATTERN.test(lowered)) {
    return Err(new InvalidAddressError(address));
  }
  return Ok(BigInt(`0x${lowered}`));
}

export function addressFromSeed(seed: bigint | number): string {
  const value = typeof seed === 'number' ? BigInt(seed) : seed;
  if (value < 0n) {
    throw new InvalidAddressError(value.toString());
  }
  return value.toString(16);
}

/**
 * Numeric order first; equal values ("01" vs "1") fall back to string order
 * so the comparison stays total.
 */
export function compareAddresses(a: string, b: string): number {
  const left = BigInt(`0x${a}`);
  const right = BigInt(`0x${b}`);
  if (left < right) return -1;
  if (left > right) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Stable digest-to-seed mapping: the first 32 bits of the MD5 digest of
 * `text`, offset by `salt`, reduced into the recurrence's seed range.
 */
export function seedFromDigest(text: string, salt = 0): number {
  const digest = createHash('md5').update(text, 'utf8').digest('hex');
  const base = BigInt(`0x${digest.slice(0, 8)}`);
  const offset = BigInt(Math.trunc(salt));
  return Number((((base + offset) % MODULUS) + MODULUS) % MODULUS);
}

export function addressFromDigest(text: string, salt = 0): string {
  return addressFromSeed(seedFromDigest(text, salt));
}
