/**
 * Coverage Planner
 *
 * Turns a viewport into a bounded set of geohash prefixes to query, trading recall
 * for query count as the zoom changes:
 * - choosePrecision / chooseFetchCaps: span-keyed step tables
 * - estimateCellCount: analytic pre-selection without materializing cells
 * - coverBoundingBox: sampled walk of the box, coarsening until the cap holds
 * - neighborPrefixes: fixed-offset 8-neighborhood used by the fallback ladder
 */

import { logger } from '../logger';
import { cellSize, encode, TRACE_WRITE_PRECISION } from './geohash';
import {
  boundingBox,
  clampLatitude,
  clampLongitude,
  spanMagnitude,
  type BoundingBox,
  type Coordinate,
  type Span,
  type Viewport,
} from './viewport';

/** Coarsest precision the planner will retry down to */
export const PLANNER_FLOOR_PRECISION = 1;

/** Longitude sampling never gets sparser than this share of the cosine factor */
const MIN_COSINE_FACTOR = 0.3;

export interface FetchCaps {
  /** Upper bound on prefixes (= concurrent cell queries) per cycle */
  maxPrefixes: number;
  /** Record limit applied to each cell query */
  perCellLimit: number;
}

export interface CoverSet {
  /** Precision actually used, after any coarsening retries */
  precision: number;
  prefixes: ReadonlySet<string>;
  /** True only when the floor precision still exceeded the cap */
  truncated: boolean;
}

export interface CoveragePlan extends FetchCaps {
  precision: number;
  prefixes: string[];
  truncated: boolean;
}

export interface PlanCoverageOptions {
  /** Overrides the span-keyed prefix cap */
  maxPrefixes?: number;
}

// Ordered coarse → fine; first row whose minSpan the span reaches wins.
const PRECISION_STEPS: ReadonlyArray<{ minSpan: number; precision: number }> = [
  { minSpan: 40, precision: 1 },
  { minSpan: 10, precision: 2 },
  { minSpan: 1.5, precision: 3 },
  { minSpan: 0.3, precision: 4 },
  { minSpan: 0.05, precision: 5 },
  { minSpan: 0.01, precision: 6 },
  { minSpan: 0.002, precision: 7 },
];

const FETCH_CAP_STEPS: ReadonlyArray<{ minSpan: number; caps: FetchCaps }> = [
  { minSpan: 40, caps: { maxPrefixes: 32, perCellLimit: 10 } },
  { minSpan: 15, caps: { maxPrefixes: 24, perCellLimit: 20 } },
  { minSpan: 5, caps: { maxPrefixes: 16, perCellLimit: 40 } },
  { minSpan: 1, caps: { maxPrefixes: 12, perCellLimit: 80 } },
  { minSpan: 0, caps: { maxPrefixes: 9, perCellLimit: 150 } },
];

function clampPrecision(precision: number): number {
  return Math.min(Math.max(Math.round(precision), PLANNER_FLOOR_PRECISION), TRACE_WRITE_PRECISION);
}

/**
 * Monotone step function of the span: larger spans select shorter geohashes.
 * Clamped to [floor, write precision]; finer prefixes than the write precision never match.
 */
export function choosePrecision(span: Span): number {
  const magnitude = spanMagnitude(span);
  const step = PRECISION_STEPS.find((row) => magnitude >= row.minSpan);
  return clampPrecision(step ? step.precision : TRACE_WRITE_PRECISION);
}

/**
 * Zooming in loosens the per-cell record cap and tightens the prefix cap.
 */
export function chooseFetchCaps(span: Span): FetchCaps {
  const magnitude = spanMagnitude(span);
  const step = FETCH_CAP_STEPS.find((row) => magnitude >= row.minSpan);
  const caps = step ? step.caps : FETCH_CAP_STEPS[FETCH_CAP_STEPS.length - 1].caps;
  return { ...caps };
}

function cosineFactor(latitude: number): number {
  return Math.max(Math.cos((latitude * Math.PI) / 180), MIN_COSINE_FACTOR);
}

/**
 * Longitude sampling step at a latitude. Cells are a fixed number of degrees wide, but
 * their ground width shrinks with cos(lat); sampling densifies by the same factor so
 * high-latitude rows are never under-covered.
 */
function longitudeStep(lonWidth: number, latitude: number): number {
  return lonWidth * cosineFactor(latitude);
}

/**
 * Analytic cell count: ceil(latSpan / cellLat) * ceil(lonSpan / correctedCellLon).
 * Uses the most poleward edge of the box, so it errs high. Heuristic only.
 */
export function estimateCellCount(viewport: Viewport, precision: number): number {
  const box = boundingBox(viewport);
  const { latHeight, lonWidth } = cellSize(clampPrecision(precision));
  const worstLatitude = Math.max(Math.abs(box.minLat), Math.abs(box.maxLat));

  const rows = Math.max(1, Math.ceil((box.maxLat - box.minLat) / latHeight));
  const cols = Math.max(1, Math.ceil((box.maxLon - box.minLon) / longitudeStep(lonWidth, worstLatitude)));
  return rows * cols;
}

// Lattice min + k*step below max, then max itself. Consecutive samples are at most
// one step apart, so every band of width >= step that meets [min, max] is sampled.
function samplePoints(min: number, max: number, step: number): number[] {
  const points: number[] = [];
  for (let k = 0; min + k * step < max; k++) {
    points.push(min + k * step);
  }
  points.push(max);
  return points;
}

function walkCells(
  box: BoundingBox,
  precision: number,
  cap: number
): { prefixes: Set<string>; overflowed: boolean } {
  const { latHeight, lonWidth } = cellSize(precision);
  const prefixes = new Set<string>();

  for (const latitude of samplePoints(box.minLat, box.maxLat, latHeight)) {
    const step = longitudeStep(lonWidth, latitude);
    for (const longitude of samplePoints(box.minLon, box.maxLon, step)) {
      const prefix = encode({ latitude, longitude }, precision);
      if (prefixes.has(prefix)) continue;
      if (prefixes.size >= cap) {
        return { prefixes, overflowed: true };
      }
      prefixes.add(prefix);
    }
  }

  return { prefixes, overflowed: false };
}

/**
 * Cover the viewport's bounding box with at most `cap` prefixes.
 * Coarsens one precision at a time until the cover fits; at the floor precision
 * the set is truncated to `cap` rather than queried unbounded.
 */
export function coverBoundingBox(viewport: Viewport, precision: number, cap: number): CoverSet {
  const box = boundingBox(viewport);
  const limit = Math.max(1, Math.floor(cap));

  for (let current = clampPrecision(precision); ; current--) {
    const { prefixes, overflowed } = walkCells(box, current, limit);

    if (!overflowed) {
      return { precision: current, prefixes, truncated: false };
    }

    if (current <= PLANNER_FLOOR_PRECISION) {
      logger.sync.warn('Coverage exceeds prefix cap at floor precision, truncating', {
        precision: current,
        cap: limit,
        box,
      });
      return { precision: current, prefixes, truncated: true };
    }
  }
}

/**
 * Full plan for one fetch cycle: caps from the span, precision pre-selected with the
 * analytic estimate, then the materialized cover.
 */
export function planCoverage(viewport: Viewport, options: PlanCoverageOptions = {}): CoveragePlan {
  const caps = chooseFetchCaps(viewport.span);
  const maxPrefixes = Math.max(1, Math.floor(options.maxPrefixes ?? caps.maxPrefixes));

  let precision = choosePrecision(viewport.span);
  while (precision > PLANNER_FLOOR_PRECISION && estimateCellCount(viewport, precision) > maxPrefixes) {
    precision--;
  }

  const cover = coverBoundingBox(viewport, precision, maxPrefixes);

  return {
    precision: cover.precision,
    prefixes: [...cover.prefixes],
    truncated: cover.truncated,
    maxPrefixes,
    perCellLimit: caps.perCellLimit,
  };
}

/**
 * The center's own cell plus the cells one step away in each compass direction.
 * Fixed coordinate offsets approximate true adjacency; offsets are clamped at the
 * poles and the antimeridian, and duplicates collapse.
 */
export function neighborPrefixes(center: Coordinate, precision: number): string[] {
  const p = clampPrecision(precision);
  const { latHeight, lonWidth } = cellSize(p);
  const prefixes = new Set<string>([encode(center, p)]);

  for (const dLat of [1, 0, -1]) {
    for (const dLon of [-1, 0, 1]) {
      if (dLat === 0 && dLon === 0) continue;
      prefixes.add(
        encode(
          {
            latitude: clampLatitude(center.latitude + dLat * latHeight),
            longitude: clampLongitude(center.longitude + dLon * lonWidth),
          },
          p
        )
      );
    }
  }

  return [...prefixes];
}
