/**
 * Simple retry utility with exponential backoff for store writes.
 * Retries on transient failures (connection resets, timeouts, serialization conflicts).
 */

import { logger } from './logger';
import { isDataError } from './errors';
import { isTimeoutError } from './timeout-wrapper';

const TRANSIENT_ERROR_CODES = new Set([
  '40001', // Postgres: serialization failure
  '40P01', // Postgres: deadlock detected
  '57014', // Postgres: statement timeout
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
]);

function readCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') return error.code;
  return undefined;
}

export function isTransientError(error: unknown): boolean {
  if (isTimeoutError(error)) return true;
  if (isDataError(error)) {
    if (error.code === 'CONNECTION_ERROR') return true;
    if (error.cause && isTransientError(error.cause)) return true;
  }
  if (error instanceof Error) {
    const code = readCode(error);
    if (code && TRANSIENT_ERROR_CODES.has(code)) return true;
    if (error.message.includes('deadlock')) return true;
    if (error.message.includes('connection') && error.message.includes('timeout')) return true;
  }
  return false;
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  context?: string;
}

/**
 * Retry an async operation with exponential backoff.
 * Only retries on transient errors (connection issues, deadlocks, timeouts).
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const { maxAttempts = 3, baseDelayMs = 500, context = 'operation' } = options;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const isLast = attempt === maxAttempts;

      if (isLast || !isTransientError(error)) {
        throw error;
      }

      const delay = baseDelayMs * Math.pow(2, attempt - 1);
      logger.sync.warn(`[Retry] ${context} attempt ${attempt}/${maxAttempts} failed, retrying in ${delay}ms`, {
        error: error instanceof Error ? error.message : 'Unknown error',
        attempt,
        maxAttempts,
      });

      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  // Unreachable, but TypeScript needs it
  throw new Error(`${context}: exhausted all ${maxAttempts} retry attempts`);
}
