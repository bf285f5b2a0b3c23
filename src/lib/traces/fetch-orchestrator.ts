/**
 * Fan-out fetch orchestrator
 *
 * One bounded range query per prefix, all in flight at once, joined with
 * Promise.allSettled. A failed or timed-out cell contributes nothing; the cycle
 * only ever resolves. Flow:
 * 1. Query the planner's cover set, merge by id, keep records inside the exact box
 * 2. If empty, probe the 8-neighborhood of the center at the same precision
 * 3. If still empty and the view is continent scale or wider, take the global recent sample
 * 4. Otherwise return empty
 *
 * Completions are merged after the join, so the accumulator has a single writer.
 */

import { planCoverage, neighborPrefixes, type CoveragePlan } from '../geo/coverage-planner';
import {
  boundingBox,
  containsCoordinate,
  parseViewport,
  spanMagnitude,
  type BoundingBox,
  type Viewport,
} from '../geo/viewport';
import { wrapDatabaseError } from '../errors';
import { logger } from '../logger';
import { DEFAULT_TIMEOUTS, withTimeout } from '../timeout-wrapper';
import type { CellCache } from './cell-cache';
import type { TraceReader, TraceRecord } from './types';

/** Spans at or above this (degrees) count as continent/world zoom for the global sample */
export const GLOBAL_SAMPLE_MIN_SPAN = 15;

export const DEFAULT_GLOBAL_SAMPLE_LIMIT = 25;

export type FetchStage = 'primary' | 'neighbors' | 'global-sample' | 'empty';

export interface FetchOptions {
  cellQueryTimeoutMs?: number;
  globalSampleLimit?: number;
  /** Session-owned cell cache; omitted means every cell is queried */
  cellCache?: CellCache;
  /** Precomputed plan, replacing planCoverage() for this call */
  plan?: CoveragePlan;
  maxPrefixes?: number;
}

export interface PrefixFetchOutcome {
  records: Map<string, TraceRecord>;
  failedPrefixes: string[];
  cachedPrefixes: number;
}

export interface ViewportFetchResult {
  records: TraceRecord[];
  stage: FetchStage;
  plan: CoveragePlan;
  /** Cell queries issued or served from cache, across all stages */
  queriedCells: number;
  /** Of queriedCells, how many were served by the cell cache */
  cachedCells: number;
  failedCells: number;
  /** True when at least one query failed, so an empty result may be an outage */
  degraded: boolean;
}

/**
 * Runs every prefix query concurrently and merges the survivors by record id
 */
export async function fetchPrefixes(
  store: TraceReader,
  prefixes: readonly string[],
  perCellLimit: number,
  options: Pick<FetchOptions, 'cellQueryTimeoutMs' | 'cellCache'> = {},
): Promise<PrefixFetchOutcome> {
  const { cellQueryTimeoutMs = DEFAULT_TIMEOUTS.CELL_QUERY, cellCache } = options;
  let cachedPrefixes = 0;

  const settled = await Promise.allSettled(
    prefixes.map(async (prefix) => {
      const cached = cellCache?.get(prefix, perCellLimit);
      if (cached) {
        cachedPrefixes++;
        return cached;
      }

      const records = await withTimeout(
        store.fetchByGeohashPrefix({ prefix, limit: perCellLimit }),
        cellQueryTimeoutMs,
        `cell query ${prefix}`,
      );
      cellCache?.set(prefix, perCellLimit, records);
      return records;
    }),
  );

  const records = new Map<string, TraceRecord>();
  const failedPrefixes: string[] = [];

  settled.forEach((outcome, index) => {
    const prefix = prefixes[index];
    if (outcome.status === 'fulfilled') {
      for (const record of outcome.value) {
        records.set(record.id, record);
      }
      return;
    }

    failedPrefixes.push(prefix);
    const error = wrapDatabaseError(outcome.reason, `cell query ${prefix}`);
    logger.sync.warn('Cell query failed, treating as empty', {
      prefix,
      errorCode: error.code,
      error: error.cause?.message ?? error.message,
    });
  });

  return { records, failedPrefixes, cachedPrefixes };
}

export function filterToBoundingBox(records: Iterable<TraceRecord>, box: BoundingBox): TraceRecord[] {
  const kept: TraceRecord[] = [];
  for (const record of records) {
    if (containsCoordinate(box, record.coordinate)) {
      kept.push(record);
    }
  }
  return kept;
}

/**
 * Newest first; ties broken by id so equal inputs always yield the same order
 */
export function sortByRecency(records: TraceRecord[]): TraceRecord[] {
  return records.sort((a, b) => {
    const delta = b.createdAt.getTime() - a.createdAt.getTime();
    if (delta !== 0) return delta;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  });
}

async function fetchGlobalSample(
  store: TraceReader,
  limit: number,
  timeoutMs: number,
): Promise<{ records: TraceRecord[]; failed: boolean }> {
  try {
    const records = await withTimeout(store.fetchRecent(limit), timeoutMs, 'global sample');
    return { records, failed: false };
  } catch (error) {
    const wrapped = wrapDatabaseError(error, 'global sample');
    logger.sync.warn('Global sample query failed', {
      errorCode: wrapped.code,
      error: wrapped.cause?.message ?? wrapped.message,
    });
    return { records: [], failed: true };
  }
}

/**
 * Fetches the records visible in a viewport, walking the fallback ladder when the
 * primary cover comes back empty.
 *
 * @throws InvalidViewportError before any query when the viewport is malformed
 */
export async function fetchViewportTraces(
  store: TraceReader,
  input: Viewport,
  options: FetchOptions = {},
): Promise<ViewportFetchResult> {
  const viewport = parseViewport(input);
  const {
    cellQueryTimeoutMs = DEFAULT_TIMEOUTS.CELL_QUERY,
    globalSampleLimit = DEFAULT_GLOBAL_SAMPLE_LIMIT,
    cellCache,
  } = options;

  const plan = options.plan ?? planCoverage(viewport, { maxPrefixes: options.maxPrefixes });
  const box = boundingBox(viewport);
  const queryOptions = { cellQueryTimeoutMs, cellCache };

  // 1. Primary cover
  const primary = await fetchPrefixes(store, plan.prefixes, plan.perCellLimit, queryOptions);
  let queriedCells = plan.prefixes.length;
  let failedCells = primary.failedPrefixes.length;
  let cachedCells = primary.cachedPrefixes;

  const finish = (records: TraceRecord[], stage: FetchStage) => {
    const result: ViewportFetchResult = {
      records: sortByRecency(records),
      stage,
      plan,
      queriedCells,
      cachedCells,
      failedCells,
      degraded: failedCells > 0,
    };
    logger.sync.debug('Viewport fetch complete', {
      stage,
      precision: plan.precision,
      prefixCount: plan.prefixes.length,
      queriedCells,
      cachedCells,
      failedCells,
      records: result.records.length,
    });
    return result;
  };

  const visible = filterToBoundingBox(primary.records.values(), box);
  if (visible.length > 0) {
    return finish(visible, 'primary');
  }

  // 2. Neighbor probe; cells that already answered are not asked again
  const failed = new Set(primary.failedPrefixes);
  const answered = new Set(plan.prefixes.filter((prefix) => !failed.has(prefix)));
  const neighbors = neighborPrefixes(viewport.center, plan.precision).filter(
    (prefix) => !answered.has(prefix),
  );

  if (neighbors.length > 0) {
    const probe = await fetchPrefixes(store, neighbors, plan.perCellLimit, queryOptions);
    queriedCells += neighbors.length;
    failedCells += probe.failedPrefixes.length;
    cachedCells += probe.cachedPrefixes;

    const nearby = filterToBoundingBox(probe.records.values(), box);
    if (nearby.length > 0) {
      return finish(nearby, 'neighbors');
    }
  }

  // 3. Global sample at continent/world zoom only
  if (spanMagnitude(viewport.span) >= GLOBAL_SAMPLE_MIN_SPAN) {
    const sample = await fetchGlobalSample(store, globalSampleLimit, cellQueryTimeoutMs);
    if (sample.failed) failedCells++;

    const sampled = filterToBoundingBox(sample.records, box);
    if (sampled.length > 0) {
      return finish(sampled, 'global-sample');
    }
  }

  // 4. Sparse region (or outage): empty is a valid outcome
  return finish([], 'empty');
}
