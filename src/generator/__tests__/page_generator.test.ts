/**
 * @fileoverview Tests for the deterministic page generator
 *
 * Covers the conformance fixture, page shape, address parsing and the
 * arbitrary-precision seed path.
 */

import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import {
  CHARSET,
  PAGE_LENGTH,
  PageGenerator,
  computeContentHash,
  generatePage,
  isCharsetText,
  nextState,
} from '../page_generator.js';
import {
  addressFromDigest,
  addressFromSeed,
  compareAddresses,
  normalizeAddress,
  parseAddress,
  seedFromDigest,
} from '../address.js';
import { InvalidAddressError } from '../../core/errors.js';

const GOLDEN_PAGE = readFileSync(new URL('./fixtures/page_00000001.txt', import.meta.url), 'utf8');

describe('generatePage', () => {
  it('matches the conformance fixture for address 00000001', () => {
    expect(GOLDEN_PAGE).toHaveLength(PAGE_LENGTH);
    expect(generatePage('00000001')).toBe(GOLDEN_PAGE);
  });

  it('starts with the expected characters for small seeds', () => {
    expect(generatePage('0').slice(0, 10)).toBe('tmibcesgbm');
    expect(generatePage('1').slice(0, 10)).toBe('olzokkxswk');
  });

  it('is byte-identical across repeated calls', () => {
    const first = generatePage('deadbeef');
    const second = generatePage('deadbeef');
    expect(second).toBe(first);
  });

  it('produces exactly 3200 characters from the 29-symbol alphabet', () => {
    for (const address of ['0', '1', 'ff', '7fffffff', 'abcdef0123456789']) {
      const page = generatePage(address);
      expect(page).toHaveLength(3200);
      expect(isCharsetText(page)).toBe(true);
    }
  });

  it('treats upper-case hex digits like lower-case ones', () => {
    expect(generatePage('DEADBEEF')).toBe(generatePage('deadbeef'));
  });

  it('accepts addresses wider than a machine word', () => {
    const wide = 'ffffffffffffffffffffffff1';
    const reduced = addressFromSeed(BigInt(`0x${wide}`) % 2n ** 31n);
    expect(generatePage(wide)).toBe(generatePage(reduced));
  });

  it('wraps seeds that differ by the modulus onto the same page', () => {
    expect(generatePage('80000001')).toBe(generatePage('1'));
  });

  it('rejects malformed hex with InvalidAddressError', () => {
    for (const bad of ['', 'xyz', '0x10', '-1', ' 10', '12 34']) {
      expect(() => generatePage(bad)).toThrow(InvalidAddressError);
    }
  });
});

describe('nextState', () => {
  it('matches the recurrence computed with BigInt arithmetic', () => {
    let state = 123456789;
    let reference = 123456789n;
    for (let i = 0; i < 50; i++) {
      state = nextState(state);
      reference = (reference * 1103515245n + 12345n) % 2n ** 31n;
      expect(state).toBe(Number(reference));
    }
  });

  it('keeps the charset order space, a-z, comma, period', () => {
    expect(CHARSET).toBe(' abcdefghijklmnopqrstuvwxyz,.');
    expect(CHARSET).toHaveLength(29);
  });
});

describe('PageGenerator', () => {
  it('delegates to generatePage', () => {
    const generator = new PageGenerator();
    expect(generator.generate('00000001')).toBe(GOLDEN_PAGE);
    expect(generator.pageLength).toBe(3200);
  });
});

describe('addresses', () => {
  it('parses valid hex into a bigint seed', () => {
    const parsed = parseAddress('ff');
    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      expect(parsed.value).toBe(255n);
    }
  });

  it('returns an error result for malformed hex', () => {
    const parsed = parseAddress('zz');
    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.error).toBeInstanceOf(InvalidAddressError);
      expect(parsed.error.code).toBe('INVALID_ADDRESS');
    }
  });

  it('normalizes to lower case and keeps leading zeros', () => {
    expect(normalizeAddress('00AbC')).toBe('00abc');
  });

  it('orders addresses numerically with a lexical tie-break', () => {
    const sorted = ['10', '02', '2', '01', 'a'].sort(compareAddresses);
    expect(sorted).toEqual(['01', '02', '2', 'a', '10']);
  });

  it('derives seeds from the md5 digest plus salt', () => {
    expect(seedFromDigest('thalos prime')).toBe(1590093481);
    expect(seedFromDigest('thalos prime', 2)).toBe(1590093483);
    expect(addressFromDigest('thalos prime')).toBe('5ec6e6a9');
    expect(addressFromDigest('prime')).toBe('10f12151');
  });

  it('reduces salted seeds into the seed range', () => {
    expect(seedFromDigest('thalos prime', 2 ** 31)).toBe(1590093481);
  });
});

describe('computeContentHash', () => {
  it('returns 16 hex characters and is stable', () => {
    const hash = computeContentHash(GOLDEN_PAGE);
    expect(hash).toMatch(/^[0-9a-f]{16}$/);
    expect(computeContentHash(GOLDEN_PAGE)).toBe(hash);
  });
});
