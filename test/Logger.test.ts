import { afterEach, describe, it, expect } from 'vitest';
import { getLogger, resolveLogLevel, setLogLevel } from '../src/index.js';

describe('Logger', () => {
  afterEach(() => {
    setLogLevel(resolveLogLevel());
  });

  it('takes LOG_LEVEL first', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'info', NODE_ENV: 'test', GLL_DEBUG: 'true' })).toBe('info');
  });

  it('stays quiet under test unless TEST_LOG_LEVEL is set', () => {
    expect(resolveLogLevel({ NODE_ENV: 'test' })).toBe('error');
    expect(resolveLogLevel({ NODE_ENV: 'test', TEST_LOG_LEVEL: 'debug' })).toBe('debug');
  });

  it('turns on debug output with GLL_DEBUG', () => {
    expect(resolveLogLevel({ GLL_DEBUG: 'true' })).toBe('debug');
    expect(resolveLogLevel({ GLL_DEBUG: '1' })).toBe('warn');
  });

  it('defaults to warn', () => {
    expect(resolveLogLevel({})).toBe('warn');
  });

  it('applies a new level to every component logger', () => {
    setLogLevel('debug');
    expect(getLogger('grammar').isDebugEnabled()).toBe(true);
    expect(getLogger('engine').isDebugEnabled()).toBe(true);
    setLogLevel('error');
    expect(getLogger('rewriter').isWarnEnabled()).toBe(false);
    expect(getLogger('extractor').isErrorEnabled()).toBe(true);
  });
});
