/**
 * src/index.ts
 *
 * Public entry point.
 */

export * from './core/collections';
export * from './core/identity';
export { EventBus, eventBus, useEventBus, type AppEvents, type UnsubscribeFn } from './core/events';
export {
  getCollectionCacheConfig,
  hydrateAppPreferences,
  setCollectionsFetchTimeoutMs,
  setCollectionsTtlSeconds,
} from './core/settings/appPreferences';
export {
  getRecentAppLogs,
  setAppLogSink,
  type AppLogEntry,
  type AppLogLevel,
  type AppLogSink,
} from './core/logging/appLogClient';
export {
  ErrorCategory,
  ErrorSeverity,
  errorHandler,
  subscribeToErrors,
  type ErrorDetails,
} from './utils/errorHandler';
export { formatAge } from './utils/ageFormatter';
