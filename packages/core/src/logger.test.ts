import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { rootLogger } from './logging/pino-setup.js';
import { logEvent } from './logger.js';

describe('logEvent', () => {
  const originalLevel = rootLogger.level;

  beforeEach(() => {
    rootLogger.level = 'debug';
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rootLogger.level = originalLevel;
  });

  it('merges object payloads beside the event name', () => {
    const spy = vi.spyOn(rootLogger, 'info').mockImplementation(() => {});

    logEvent('info', 'auth:token_acquired', { issuer: 'https://a.example' });

    expect(spy).toHaveBeenCalledWith(
      { event: 'auth:token_acquired', issuer: 'https://a.example' },
      'auth:token_acquired',
    );
  });

  it('wraps scalar payloads under data', () => {
    const spy = vi.spyOn(rootLogger, 'warn').mockImplementation(() => {});

    logEvent('warn', 'auth:odd', 42);

    expect(spy).toHaveBeenCalledWith(
      { event: 'auth:odd', data: 42 },
      'auth:odd',
    );
  });

  it('skips disabled levels', () => {
    rootLogger.level = 'error';
    const spy = vi.spyOn(rootLogger, 'info').mockImplementation(() => {});

    logEvent('info', 'auth:quiet');

    expect(spy).not.toHaveBeenCalled();
  });
});
