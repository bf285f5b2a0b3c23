/**
 * Structured logging utility for the viewport engine
 * Outputs JSON logs in production, readable lines elsewhere
 *
 * SECURITY: Implements automatic redaction of sensitive fields
 */

import { getCycleContext } from './cycle-context';
import { serverEnv } from './env';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  cycleId?: string;
  sequence?: number;
  viewportKey?: string;
  service: string;
  environment: string;
  [key: string]: unknown;
}

export type LogMeta = Record<string, unknown>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// Minimum log level based on environment, unless LOG_LEVEL overrides it
const MIN_LOG_LEVEL: LogLevel =
  serverEnv.LOG_LEVEL ?? (serverEnv.NODE_ENV === 'production' ? 'info' : 'debug');

// Fields to redact from logs (case-insensitive matching)
const REDACTED_FIELDS = new Set([
  'password',
  'token',
  'secret',
  'apikey',
  'api_key',
  'anonkey',
  'anon_key',
  'authorization',
  'cookie',
  'accesstoken',
  'refreshtoken',
  'bearer',
  'credential',
]);

// Patterns to redact from string values
const REDACT_PATTERNS = [
  /Bearer\s+[A-Za-z0-9\-_]+\.[A-Za-z0-9\-_]+\.[A-Za-z0-9\-_]+/gi, // JWT tokens
  /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g, // Email addresses
];

/**
 * Redact sensitive information from log metadata
 */
function redactSensitive(obj: unknown, depth = 0): unknown {
  if (depth > 10) return '[MAX_DEPTH]';

  if (obj === null || obj === undefined) return obj;

  if (typeof obj === 'string') {
    let result = obj;
    for (const pattern of REDACT_PATTERNS) {
      result = result.replace(pattern, '[REDACTED]');
    }
    return result;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => redactSensitive(item, depth + 1));
  }

  if (obj instanceof Date) {
    return obj.toISOString();
  }

  if (typeof obj === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (REDACTED_FIELDS.has(key.toLowerCase())) {
        redacted[key] = '[REDACTED]';
      } else {
        redacted[key] = redactSensitive(value, depth + 1);
      }
    }
    return redacted;
  }

  return obj;
}

function redactMeta(meta?: LogMeta): LogMeta | undefined {
  if (!meta) return undefined;
  const redacted: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    redacted[key] = REDACTED_FIELDS.has(key.toLowerCase())
      ? '[REDACTED]'
      : redactSensitive(value, 1);
  }
  return redacted;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[MIN_LOG_LEVEL];
}

function formatLogEntry(level: LogLevel, message: string, meta?: LogMeta): LogEntry {
  const context = getCycleContext();

  return {
    timestamp: new Date().toISOString(),
    level,
    message,
    cycleId: context?.cycleId,
    sequence: context?.sequence,
    viewportKey: context?.viewportKey,
    service: 'tracemap',
    environment: serverEnv.NODE_ENV,
    ...redactMeta(meta),
  };
}

function write(level: LogLevel, entry: LogEntry, meta?: LogMeta): void {
  // In production, output JSON for log aggregation
  if (serverEnv.NODE_ENV === 'production') {
    const output = JSON.stringify(entry);
    switch (level) {
      case 'error':
        console.error(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      default:
        console.log(output);
    }
    return;
  }

  // Development: human-readable format
  const prefix = `[${entry.timestamp}] [${level.toUpperCase()}]`;
  const cycleInfo = entry.sequence !== undefined ? ` [cycle:${entry.sequence}]` : '';
  const safeMeta = redactMeta(meta);

  switch (level) {
    case 'error':
      console.error(`${prefix}${cycleInfo}`, entry.message, safeMeta || '');
      break;
    case 'warn':
      console.warn(`${prefix}${cycleInfo}`, entry.message, safeMeta || '');
      break;
    case 'debug':
      console.debug(`${prefix}${cycleInfo}`, entry.message, safeMeta || '');
      break;
    default:
      console.log(`${prefix}${cycleInfo}`, entry.message, safeMeta || '');
  }
}

function logSync(level: LogLevel, message: string, meta?: LogMeta): void {
  if (!shouldLog(level)) return;
  write(level, formatLogEntry(level, message, meta), meta);
}

async function log(level: LogLevel, message: string, meta?: LogMeta): Promise<void> {
  logSync(level, message, meta);
}

/**
 * Structured logger with fetch-cycle correlation
 *
 * Provides both async (default) and sync methods:
 * - Async methods (`logger.info`, etc.) for use inside async flows
 * - Sync methods (`logger.sync.info`, etc.) for catch blocks and timers
 *
 * @example
 * ```ts
 * await logger.info('Viewport fetched', { prefixCount: 6 });
 * logger.sync.warn('Cell query failed', { prefix: '9q8y' });
 *
 * const storeLogger = logger.child({ component: 'supabase-trace-store' });
 * storeLogger.sync.debug('Prefix query', { prefix: '9q8' });
 * ```
 */
export const logger = {
  debug: (message: string, meta?: LogMeta) => log('debug', message, meta),
  info: (message: string, meta?: LogMeta) => log('info', message, meta),
  warn: (message: string, meta?: LogMeta) => log('warn', message, meta),
  error: (message: string, meta?: LogMeta) => log('error', message, meta),

  /**
   * Log with custom level
   */
  log: (level: LogLevel, message: string, meta?: LogMeta) => log(level, message, meta),

  /**
   * Synchronous logging methods for catch blocks
   */
  sync: {
    debug: (message: string, meta?: LogMeta) => logSync('debug', message, meta),
    info: (message: string, meta?: LogMeta) => logSync('info', message, meta),
    warn: (message: string, meta?: LogMeta) => logSync('warn', message, meta),
    error: (message: string, meta?: LogMeta) => logSync('error', message, meta),
  },

  /**
   * Create a child logger with preset metadata
   */
  child: (defaultMeta: LogMeta) => ({
    debug: (message: string, meta?: LogMeta) => log('debug', message, { ...defaultMeta, ...meta }),
    info: (message: string, meta?: LogMeta) => log('info', message, { ...defaultMeta, ...meta }),
    warn: (message: string, meta?: LogMeta) => log('warn', message, { ...defaultMeta, ...meta }),
    error: (message: string, meta?: LogMeta) => log('error', message, { ...defaultMeta, ...meta }),
    sync: {
      debug: (message: string, meta?: LogMeta) => logSync('debug', message, { ...defaultMeta, ...meta }),
      info: (message: string, meta?: LogMeta) => logSync('info', message, { ...defaultMeta, ...meta }),
      warn: (message: string, meta?: LogMeta) => logSync('warn', message, { ...defaultMeta, ...meta }),
      error: (message: string, meta?: LogMeta) => logSync('error', message, { ...defaultMeta, ...meta }),
    },
  }),
};

/**
 * Export redaction utility for use in other modules
 */
export { redactSensitive };
