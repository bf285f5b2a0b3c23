export * from './lib/geo/geohash';
export * from './lib/geo/viewport';
export * from './lib/geo/coverage-planner';
export * from './lib/traces/types';
export * from './lib/traces/schemas';
export * from './lib/traces/cell-cache';
export * from './lib/traces/fetch-orchestrator';
export * from './lib/traces/viewport-gate';
export * from './lib/traces/result-cache';
export * from './lib/traces/trace-map-session';
export * from './lib/traces/region-summaries';
export * from './lib/traces/trace-writer';
export * from './lib/traces/supabase-trace-store';
export * from './lib/reports/report-service';
export * from './lib/location/approximate-location';
export * from './lib/errors';
export { withTimeout, TimeoutError, isTimeoutError, DEFAULT_TIMEOUTS } from './lib/timeout-wrapper';
export { withRetry, isTransientError, type RetryOptions } from './lib/retry';
export { createStoreClient } from './lib/supabase';
export { logger, redactSensitive, type LogLevel, type LogMeta } from './lib/logger';
export { engineConfig, features, serverEnv, type EngineConfig } from './lib/env';
