/**
 * Timeout wrapper utility
 * Bounds every store query so a hung cell cannot stall a fetch cycle.
 */

/**
 * Custom error for timeout failures
 */
export class TimeoutError extends Error {
  public readonly code = 'TIMEOUT_ERROR';
  public readonly operation: string;
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Type guard to check if an error is a TimeoutError
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

/**
 * Wraps a promise with a timeout, rejecting if the operation takes too long.
 * The underlying operation is not cancelled; its late result is ignored.
 *
 * @example
 * ```typescript
 * const rows = await withTimeout(
 *   store.fetchByGeohashPrefix({ prefix: '9q8y', limit: 50 }),
 *   5000,
 *   'cell query 9q8y'
 * );
 * ```
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);

    promise
      .then((result) => {
        clearTimeout(timeoutId);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timeoutId);
        reject(error);
      });
  });
}

/**
 * Default timeout values for different operation types (in milliseconds)
 */
export const DEFAULT_TIMEOUTS = {
  /** One geohash prefix range query */
  CELL_QUERY: 5000,
  /** Region head-count aggregate */
  REGION_COUNT: 8000,
  /** IP geolocation lookup for the initial viewport */
  LOCATION_LOOKUP: 3000,
} as const;
