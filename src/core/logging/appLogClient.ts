/**
 * src/core/logging/appLogClient.ts
 *
 * Helpers for application logging. Entries are kept in a bounded buffer for
 * diagnostics views and forwarded to a pluggable sink (the console by default).
 */

export type AppLogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AppLogEntry {
  level: AppLogLevel;
  message: string;
  source: string;
  timestamp: number;
}

export type AppLogSink = (entry: AppLogEntry) => void;

const MAX_BUFFERED_ENTRIES = 200;

const consoleSink: AppLogSink = (entry) => {
  const line = `[${entry.source}] ${entry.message}`;
  switch (entry.level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      console.error(line);
  }
};

let sink: AppLogSink = consoleSink;
let buffer: AppLogEntry[] = [];

const logToApp = (level: AppLogLevel, message: string, source?: string): void => {
  const trimmed = message.trim();
  if (!trimmed) {
    return;
  }
  const entry: AppLogEntry = {
    level,
    message: trimmed,
    source: (source ?? '').trim() || 'Frontend',
    timestamp: Date.now(),
  };

  buffer.push(entry);
  if (buffer.length > MAX_BUFFERED_ENTRIES) {
    buffer = buffer.slice(buffer.length - MAX_BUFFERED_ENTRIES);
  }

  try {
    sink(entry);
  } catch (err) {
    console.error('[AppLog] sink failed:', err);
  }
};

export const logAppDebug = (message: string, source?: string): void => {
  logToApp('debug', message, source);
};

export const logAppInfo = (message: string, source?: string): void => {
  logToApp('info', message, source);
};

export const logAppWarn = (message: string, source?: string): void => {
  logToApp('warn', message, source);
};

export const logAppError = (message: string, source?: string): void => {
  logToApp('error', message, source);
};

/**
 * Replaces the active sink and returns a function restoring the previous one.
 */
export const setAppLogSink = (next: AppLogSink): (() => void) => {
  const previous = sink;
  sink = next;
  return () => {
    sink = previous;
  };
};

export const getRecentAppLogs = (source?: string): AppLogEntry[] =>
  source ? buffer.filter((entry) => entry.source === source) : [...buffer];

export const clearAppLogs = (): void => {
  buffer = [];
};
