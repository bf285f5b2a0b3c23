/**
 * Approximate user location from IP geolocation, used only to pick the first viewport.
 */

import { z } from 'zod';
import { fetchJsonWithTimeout } from '../fetch-with-timeout';
import { CoordinateSchema, type Coordinate, type Viewport } from '../geo/viewport';
import { logger } from '../logger';
import { DEFAULT_TIMEOUTS } from '../timeout-wrapper';

export const IP_LOCATION_URL = 'http://ip-api.com/json';

/** Initial zoom: 0.1° in both directions */
export const INITIAL_SPAN = { latDelta: 0.1, lonDelta: 0.1 } as const;

/** Used when the lookup fails */
export const DEFAULT_CENTER: Coordinate = { latitude: 37.7749, longitude: -122.4194 };

const IpLocationSchema = z.object({
  lat: z.number(),
  lon: z.number(),
});

export async function fetchApproximateLocation(
  url: string = IP_LOCATION_URL,
  timeoutMs: number = DEFAULT_TIMEOUTS.LOCATION_LOOKUP,
): Promise<Coordinate | null> {
  try {
    const body = await fetchJsonWithTimeout(url, { timeout: timeoutMs });
    const { lat, lon } = IpLocationSchema.parse(body);
    const parsed = CoordinateSchema.safeParse({ latitude: lat, longitude: lon });
    if (!parsed.success) {
      logger.sync.warn('IP location out of range', { lat, lon });
      return null;
    }
    return parsed.data;
  } catch (error) {
    logger.sync.warn('IP location lookup failed', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    return null;
  }
}

export async function resolveInitialViewport(
  lookup: () => Promise<Coordinate | null> = () => fetchApproximateLocation(),
): Promise<Viewport> {
  const center = (await lookup()) ?? DEFAULT_CENTER;
  return { center, span: { ...INITIAL_SPAN } };
}
