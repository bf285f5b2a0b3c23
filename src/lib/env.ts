/**
 * Centralized environment validation using Zod
 * Validates the store credentials and engine tuning variables at startup
 * Fails fast in production if the configuration is invalid
 */

import { z } from 'zod';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

// Schema for server-side environment variables
const serverEnvSchema = z.object({
  // Remote store (optional - the engine can run against any TraceReader)
  SUPABASE_URL: z.string().url('SUPABASE_URL must be a valid URL').optional(),
  SUPABASE_ANON_KEY: z.string().min(1).optional(),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

  // Viewport engine tuning
  TRACE_DEBOUNCE_MS: positiveInt(200),
  TRACE_CELL_QUERY_TIMEOUT_MS: positiveInt(5000),
  TRACE_GLOBAL_SAMPLE_LIMIT: positiveInt(25),
  TRACE_CELL_CACHE_TTL_MS: positiveInt(30_000),

  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

// Type exports for use throughout the library
export type ServerEnv = z.infer<typeof serverEnvSchema>;

/**
 * Validates server environment variables
 * Call this at startup to fail fast on missing configuration
 */
function validateServerEnv(): ServerEnv {
  const result = serverEnvSchema.safeParse(process.env);

  if (result.success) {
    return result.data;
  }

  const errors = result.error.issues
    .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
    .join('\n');

  console.error('Environment validation failed:\n' + errors);

  // In production, fail fast. Elsewhere, warn and continue on defaults
  if (process.env.NODE_ENV === 'production') {
    throw new Error('Invalid environment configuration. Check logs for details.');
  }

  return serverEnvSchema.parse({ NODE_ENV: 'development' });
}

// Validated environment - import this instead of using process.env directly
export const serverEnv = validateServerEnv();

export interface EngineConfig {
  /** Settling delay for camera-change bursts */
  debounceMs: number;
  /** Upper bound for a single geohash cell query */
  cellQueryTimeoutMs: number;
  /** Size of the last-resort "most recent traces" query */
  globalSampleLimit: number;
  /** How long a fetched cell stays reusable within a session */
  cellCacheTtlMs: number;
}

export const engineConfig: EngineConfig = {
  debounceMs: serverEnv.TRACE_DEBOUNCE_MS,
  cellQueryTimeoutMs: serverEnv.TRACE_CELL_QUERY_TIMEOUT_MS,
  globalSampleLimit: serverEnv.TRACE_GLOBAL_SAMPLE_LIMIT,
  cellCacheTtlMs: serverEnv.TRACE_CELL_CACHE_TTL_MS,
};

// Helper to check if a feature is available
export const features = {
  store: !!(serverEnv.SUPABASE_URL && serverEnv.SUPABASE_ANON_KEY),
} as const;
