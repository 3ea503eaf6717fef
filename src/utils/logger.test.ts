import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, isLogLevel, setLogLevel } from './logger';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('silent');
    vi.restoreAllMocks();
  });

  it('recognises log levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });

  it('prefixes lines with the scope and appends meta', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    setLogLevel('info');

    createLogger('SessionStore').info('Created session', { sessionId: 'abc' });

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0]?.[0]).toMatch(/^\S+ \[SessionStore\] Created session {"sessionId":"abc"}$/);
  });

  it('drops messages below the current level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    setLogLevel('warn');

    const log = createLogger('Test');
    log.debug('hidden');
    log.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('stays quiet when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogLevel('silent');

    createLogger('Test').error('nothing');

    expect(error).not.toHaveBeenCalled();
  });
});
