import { afterEach, describe, expect, it, vi } from 'vitest';
import { logDebug, logError, logInfo, logWarning, parseLogLevel, resolveLogLevel } from '../logger.js';

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

describe('telemetry logger', () => {
  const cases = [
    { fn: logInfo, level: 'INFO', method: 'error' as const },
    { fn: logWarning, level: 'WARN', method: 'warn' as const },
    { fn: logError, level: 'ERROR', method: 'error' as const },
    { fn: logDebug, level: 'DEBUG', method: 'error' as const },
  ];

  for (const { fn, level, method } of cases) {
    it(`logs message only for ${level} when context is undefined`, () => {
      vi.stubEnv('DOCINTEL_LOG_LEVEL', 'debug');
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello');

      expect(spy).toHaveBeenCalledWith(`[docintel] ${level} hello`);
    });

    it(`logs message only for ${level} when context is empty`, () => {
      vi.stubEnv('DOCINTEL_LOG_LEVEL', 'debug');
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello', {});

      expect(spy).toHaveBeenCalledWith(`[docintel] ${level} hello`);
    });

    it(`logs message and context for ${level} when context has keys`, () => {
      vi.stubEnv('DOCINTEL_LOG_LEVEL', 'debug');
      const spy = vi.spyOn(console, method).mockImplementation(() => {});
      const context = { requestId: 'req-123' };

      fn('hello', context);

      expect(spy).toHaveBeenCalledWith(`[docintel] ${level} hello`, context);
    });
  }

  it('drops messages below the configured level', () => {
    vi.stubEnv('DOCINTEL_LOG_LEVEL', 'warn');
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    logInfo('hidden');
    logDebug('hidden');
    logWarning('shown');

    expect(errorSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('logs nothing when silent', () => {
    vi.stubEnv('DOCINTEL_LOG_LEVEL', 'silent');
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logError('hidden');

    expect(errorSpy).not.toHaveBeenCalled();
  });
});

describe('parseLogLevel', () => {
  it('defaults to info for missing or unknown values', () => {
    expect(parseLogLevel(undefined)).toBe('info');
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel('toString')).toBe('info');
  });

  it('accepts levels case-insensitively', () => {
    expect(parseLogLevel(' DEBUG ')).toBe('debug');
  });

  it('ignores the environment', () => {
    vi.stubEnv('DOCINTEL_LOG_LEVEL', 'silent');
    expect(parseLogLevel(undefined)).toBe('info');
  });
});

describe('resolveLogLevel', () => {
  it('reads DOCINTEL_LOG_LEVEL on each call', () => {
    vi.stubEnv('DOCINTEL_LOG_LEVEL', 'error');
    expect(resolveLogLevel()).toBe('error');

    vi.stubEnv('DOCINTEL_LOG_LEVEL', 'nonsense');
    expect(resolveLogLevel()).toBe('info');
  });
});
