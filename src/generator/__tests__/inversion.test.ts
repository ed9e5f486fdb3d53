import { describe, it, expect, vi, afterEach } from 'vitest';
import { invertSubstring } from '../inversion.js';
import { generatePage } from '../page_generator.js';
import { seedFromDigest } from '../address.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('invertSubstring', () => {
  // generatePage('1') contains "ooikvoma.m" at offset 100; seed 0 does not.
  const NEEDLE = generatePage('1').slice(100, 110);

  it('returns the first address in the window whose page contains the substring', () => {
    expect(NEEDLE).toBe('ooikvoma.m');

    const report = invertSubstring(NEEDLE, { baseSeed: 0, windowSize: 10 });

    expect(report.hits).toEqual([{ address: '1', position: 100 }]);
    expect(report.iterations).toBe(2);
    expect(report.stoppedBy).toBe('matches');
  });

  it('lower-cases the substring before scanning', () => {
    const report = invertSubstring('OOIKVOMA.M', { baseSeed: 0, windowSize: 10 });
    expect(report.hits[0]?.address).toBe('1');
  });

  it('wraps the window around the end of the seed range', () => {
    const report = invertSubstring(NEEDLE, { baseSeed: 2 ** 31 - 1, windowSize: 3 });
    expect(report.hits).toEqual([{ address: '1', position: 100 }]);
    expect(report.iterations).toBe(3);
  });

  it('stops at the iteration cap even when the window is larger', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    const report = invertSubstring('zzzzzzzzzz', { baseSeed: 0, windowSize: 100, maxIterations: 5 });

    expect(report.hits).toEqual([]);
    expect(report.iterations).toBe(5);
    expect(report.stoppedBy).toBe('iterations');
  });

  it('stops cooperatively when the time budget runs out', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    let tick = 0;
    const now = () => tick++;

    const report = invertSubstring('zzzzzzzzzz', { baseSeed: 0, windowSize: 100, timeBudgetMs: 3, now });

    expect(report.iterations).toBe(2);
    expect(report.stoppedBy).toBe('time');
  });

  it('exhausts a small window without hits', () => {
    const report = invertSubstring('zzzzzzzzzz', { baseSeed: 0, windowSize: 10 });
    expect(report.hits).toEqual([]);
    expect(report.iterations).toBe(10);
    expect(report.stoppedBy).toBe('exhausted');
  });

  it('skips scanning for text outside the alphabet or empty text', () => {
    expect(invertSubstring('hello!').stoppedBy).toBe('unrepresentable');
    expect(invertSubstring('hello!').iterations).toBe(0);
    expect(invertSubstring('').hits).toEqual([]);
  });

  it('defaults the base seed to the digest of the lower-cased substring', () => {
    const report = invertSubstring('Thalos Prime', { windowSize: 0 });
    expect(report.baseSeed).toBe(seedFromDigest('thalos prime'));
  });
});
