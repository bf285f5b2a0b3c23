/**
 * Continent-scale summary mode: one aggregate count per fixed region instead of a cell fan-out.
 */

import type { BoundingBox, Coordinate, Span } from '../geo/viewport';
import { spanMagnitude } from '../geo/viewport';
import { logger } from '../logger';
import { DEFAULT_TIMEOUTS, withTimeout } from '../timeout-wrapper';
import { wrapDatabaseError } from '../errors';
import type { TraceRegionCounter } from './types';

/** Spans at or above this many degrees show region summaries instead of individual traces */
export const REGION_SUMMARY_MIN_SPAN = 20;

export interface GeographicRegion {
  name: string;
  bounds: BoundingBox;
  center: Coordinate;
}

export interface RegionSummary {
  region: string;
  count: number;
  center: Coordinate;
}

export const GEOGRAPHIC_REGIONS: readonly GeographicRegion[] = [
  {
    name: 'North America',
    bounds: { minLat: 15, maxLat: 75, minLon: -170, maxLon: -50 },
    center: { latitude: 45, longitude: -100 },
  },
  {
    name: 'South America',
    bounds: { minLat: -55, maxLat: 15, minLon: -85, maxLon: -35 },
    center: { latitude: -15, longitude: -60 },
  },
  {
    name: 'Europe',
    bounds: { minLat: 35, maxLat: 70, minLon: -10, maxLon: 40 },
    center: { latitude: 50, longitude: 10 },
  },
  {
    name: 'Africa',
    bounds: { minLat: -35, maxLat: 35, minLon: -20, maxLon: 50 },
    center: { latitude: 0, longitude: 20 },
  },
  {
    name: 'Asia',
    bounds: { minLat: 10, maxLat: 75, minLon: 40, maxLon: 180 },
    center: { latitude: 35, longitude: 100 },
  },
  {
    name: 'Australia',
    bounds: { minLat: -45, maxLat: -10, minLon: 110, maxLon: 180 },
    center: { latitude: -25, longitude: 135 },
  },
  {
    name: 'Antarctica',
    bounds: { minLat: -90, maxLat: -60, minLon: -180, maxLon: 180 },
    center: { latitude: -75, longitude: 0 },
  },
];

export function shouldUseRegionSummaries(span: Span): boolean {
  return spanMagnitude(span) >= REGION_SUMMARY_MIN_SPAN;
}

/**
 * Counts traces per region concurrently. Regions with no traces, and regions whose
 * count failed, are left out.
 */
export async function fetchRegionSummaries(
  store: TraceRegionCounter,
  regions: readonly GeographicRegion[] = GEOGRAPHIC_REGIONS,
  timeoutMs: number = DEFAULT_TIMEOUTS.REGION_COUNT,
): Promise<RegionSummary[]> {
  const settled = await Promise.allSettled(
    regions.map((region) =>
      withTimeout(store.countInRegion(region.bounds), timeoutMs, `region count ${region.name}`),
    ),
  );

  const summaries: RegionSummary[] = [];
  settled.forEach((outcome, index) => {
    const region = regions[index];
    if (outcome.status === 'rejected') {
      const error = wrapDatabaseError(outcome.reason, `region count ${region.name}`);
      logger.sync.warn('Region count failed', { region: region.name, errorCode: error.code });
      return;
    }
    if (outcome.value > 0) {
      summaries.push({ region: region.name, count: outcome.value, center: region.center });
    }
  });

  return summaries;
}
