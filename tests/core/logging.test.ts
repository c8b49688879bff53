import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { clearLogs, createLogger, errorMessage, getLogs, loadConfig, setLogLevel } from '@corroborate/core';

describe('logging', () => {
  beforeEach(() => {
    clearLogs();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('records entries per component', () => {
    const log = createLogger('Test');
    log.info('first');
    log.warn('second', { code: 1 });

    const entries = getLogs();
    expect(entries.map((e) => [e.component, e.level, e.message])).toEqual([
      ['Test', 'info', 'first'],
      ['Test', 'warn', 'second'],
    ]);
    expect(entries[1]?.detail).toEqual({ code: 1 });
  });

  it('returns only entries after the given id', () => {
    const log = createLogger('Test');
    log.info('a');
    log.info('b');
    log.info('c');
    const [first] = getLogs();
    expect(getLogs(first?.id).map((e) => e.message)).toEqual(['b', 'c']);
  });

  it('keeps the newest 500 entries', () => {
    const log = createLogger('Test');
    for (let i = 0; i < 510; i++) log.debug(`entry ${i}`);
    const entries = getLogs();
    expect(entries).toHaveLength(500);
    expect(entries[0]?.message).toBe('entry 10');
  });

  afterEach(() => {
    setLogLevel(null);
    vi.restoreAllMocks();
  });

  it('gates console output by the configured level', () => {
    setLogLevel(loadConfig({ LOG_LEVEL: 'warn' }).logLevel);
    const log = createLogger('Test');
    log.info('quiet');
    log.warn('loud');

    expect(console.log).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledWith('[Test] [WARN] loud');
    expect(getLogs().map((e) => e.message)).toEqual(['quiet', 'loud']);
  });

  it('prints debug entries when the configured level is debug', () => {
    setLogLevel('debug');
    createLogger('Test').debug('details');
    expect(console.log).toHaveBeenCalledWith('[Test] [DEBUG] details');
  });

  it('always prints errors', () => {
    createLogger('Test').error('boom');
    expect(console.error).toHaveBeenCalledWith('[Test] [ERROR] boom');
  });

  it('formats unknown errors', () => {
    expect(errorMessage(new Error('bad'))).toBe('bad');
    expect(errorMessage('plain')).toBe('plain');
  });
});
