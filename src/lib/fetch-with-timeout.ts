/**
 * Fetch wrapper with timeout support using AbortController
 * Keeps auxiliary HTTP lookups (IP geolocation) from delaying map startup
 */

export class FetchTimeoutError extends Error {
  constructor(
    public readonly url: string,
    public readonly timeout: number
  ) {
    super(`Request to ${url} timed out after ${timeout}ms`);
    this.name = 'FetchTimeoutError';
  }
}

export interface FetchWithTimeoutOptions extends RequestInit {
  /** Timeout in milliseconds. Default: 10000 (10 seconds) */
  timeout?: number;
}

/**
 * Fetch with automatic timeout support
 *
 * @throws FetchTimeoutError if request times out
 */
export async function fetchWithTimeout(
  url: string,
  options: FetchWithTimeoutOptions = {}
): Promise<Response> {
  const { timeout = 10000, signal: existingSignal, ...fetchOptions } = options;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  // If an existing signal was provided, link it to our controller
  if (existingSignal) {
    existingSignal.addEventListener('abort', () => controller.abort());
  }

  try {
    return await fetch(url, {
      ...fetchOptions,
      signal: controller.signal,
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new FetchTimeoutError(url, timeout);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Fetch a JSON body with timeout. The payload is returned unparsed-by-type;
 * callers validate it with a schema.
 */
export async function fetchJsonWithTimeout(
  url: string,
  options: FetchWithTimeoutOptions = {}
): Promise<unknown> {
  const response = await fetchWithTimeout(url, {
    ...options,
    headers: {
      Accept: 'application/json',
      ...options.headers,
    },
  });

  if (!response.ok) {
    throw new Error(`HTTP ${response.status} from ${url}`);
  }

  const body: unknown = await response.json();
  return body;
}
