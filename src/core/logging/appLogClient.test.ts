/**
 * src/core/logging/appLogClient.test.ts
 *
 * Tests for the application log buffer and sink.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  clearAppLogs,
  getRecentAppLogs,
  logAppDebug,
  logAppError,
  logAppInfo,
  logAppWarn,
  setAppLogSink,
  type AppLogEntry,
} from './appLogClient';

describe('appLogClient', () => {
  let entries: AppLogEntry[];
  let restoreSink: () => void;

  beforeEach(() => {
    entries = [];
    restoreSink = setAppLogSink((entry) => entries.push(entry));
    clearAppLogs();
  });

  afterEach(() => {
    restoreSink();
    clearAppLogs();
  });

  it('forwards trimmed entries with their level and source', () => {
    logAppDebug(' fetching ', 'CollectionStore');
    logAppInfo('published', 'CollectionStore');
    logAppWarn('slow', 'IdentityStore');
    logAppError('broken');

    expect(entries.map(({ level, message, source }) => ({ level, message, source }))).toEqual([
      { level: 'debug', message: 'fetching', source: 'CollectionStore' },
      { level: 'info', message: 'published', source: 'CollectionStore' },
      { level: 'warn', message: 'slow', source: 'IdentityStore' },
      { level: 'error', message: 'broken', source: 'Frontend' },
    ]);
  });

  it('skips blank messages', () => {
    logAppInfo('   ', 'CollectionStore');

    expect(entries).toEqual([]);
    expect(getRecentAppLogs()).toEqual([]);
  });

  it('filters the buffer by source', () => {
    logAppInfo('one', 'CollectionStore');
    logAppInfo('two', 'IdentityStore');

    expect(getRecentAppLogs('IdentityStore').map((entry) => entry.message)).toEqual(['two']);
    expect(getRecentAppLogs()).toHaveLength(2);
  });

  it('keeps only the most recent entries', () => {
    for (let index = 0; index < 205; index += 1) {
      logAppDebug(`entry ${index}`, 'CollectionStore');
    }

    const buffered = getRecentAppLogs();
    expect(buffered).toHaveLength(200);
    expect(buffered[0].message).toBe('entry 5');
  });

  it('keeps logging when the sink throws', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const restoreThrowing = setAppLogSink(() => {
      throw new Error('sink offline');
    });

    logAppWarn('still buffered', 'CollectionStore');
    restoreThrowing();

    expect(getRecentAppLogs().map((entry) => entry.message)).toEqual(['still buffered']);
    expect(consoleError).toHaveBeenCalledTimes(1);
    consoleError.mockRestore();
  });
});
