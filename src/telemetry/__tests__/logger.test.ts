import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getLogLevel, logDebug, logError, logInfo, logWarning, setLogLevel } from '../logger.js';

describe('telemetry logger', () => {
  let previous = getLogLevel();

  beforeEach(() => {
    previous = getLogLevel();
    setLogLevel('debug');
  });

  afterEach(() => {
    setLogLevel(previous);
    vi.restoreAllMocks();
  });

  const cases = [
    { fn: logInfo, level: 'info' as const, method: 'error' as const },
    { fn: logWarning, level: 'warn' as const, method: 'warn' as const },
    { fn: logError, level: 'error' as const, method: 'error' as const },
    { fn: logDebug, level: 'debug' as const, method: 'error' as const },
  ];

  for (const { fn, level, method } of cases) {
    it(`logs message only for ${level} when context is empty`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello', {});

      expect(spy).toHaveBeenCalledWith('hello');
    });

    it(`logs message and context for ${level} when context has keys`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});
      const context = { address: '00000001' };

      fn('hello', context);

      expect(spy).toHaveBeenCalledWith('hello', context);
    });
  }

  it('drops messages below the configured level', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('warn');

    logDebug('debug message');
    logInfo('info message');
    logWarning('warn message');

    expect(errorSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith('warn message');
  });

  it('silences everything at the silent level', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('silent');

    logError('boom');

    expect(errorSpy).not.toHaveBeenCalled();
  });
});
