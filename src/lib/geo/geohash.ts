/**
 * Geohash codec.
 * Interleaved binary partitioning of the lon/lat plane, five bits per base-32 symbol,
 * longitude first. Pure functions only.
 */

import { InvalidCoordinateError } from '../errors';
import type { BoundingBox, Coordinate } from './viewport';

/** Base-32 alphabet (digits plus lowercase letters without a, i, l, o) */
export const GEOHASH_ALPHABET = '0123456789bcdefghjkmnpqrstuvwxyz';

/** Sorts after every alphabet symbol, so `[prefix, prefix + SENTINEL)` is exactly the prefix subtree */
export const PREFIX_SENTINEL = '~';

export const MIN_PRECISION = 1;
export const MAX_PRECISION = 12;

/** Precision the writer stores on every trace; readers can never query finer than this */
export const TRACE_WRITE_PRECISION = 8;

const SYMBOL_INDEX: ReadonlyMap<string, number> = new Map(
  [...GEOHASH_ALPHABET].map((symbol, index) => [symbol, index])
);

export interface CellSize {
  /** Cell height in degrees of latitude */
  latHeight: number;
  /** Cell width in degrees of longitude (the same at every latitude) */
  lonWidth: number;
}

function assertPrecision(precision: number): void {
  if (!Number.isInteger(precision) || precision < MIN_PRECISION || precision > MAX_PRECISION) {
    throw new InvalidCoordinateError(
      `Geohash precision must be an integer in [${MIN_PRECISION}, ${MAX_PRECISION}], got ${precision}`
    );
  }
}

function assertCoordinate({ latitude, longitude }: Coordinate): void {
  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    throw new InvalidCoordinateError(`Latitude out of range: ${latitude}`);
  }
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new InvalidCoordinateError(`Longitude out of range: ${longitude}`);
  }
}

/**
 * Encode a coordinate at the given precision.
 * Out-of-range input is rejected; callers clamp first.
 */
export function encode(coordinate: Coordinate, precision: number): string {
  assertPrecision(precision);
  assertCoordinate(coordinate);

  let minLat = -90, maxLat = 90;
  let minLon = -180, maxLon = 180;
  let hash = '';
  let bit = 0;
  let symbol = 0;
  let isLon = true;

  while (hash.length < precision) {
    if (isLon) {
      const mid = (minLon + maxLon) / 2;
      if (coordinate.longitude >= mid) {
        symbol |= 1 << (4 - bit);
        minLon = mid;
      } else {
        maxLon = mid;
      }
    } else {
      const mid = (minLat + maxLat) / 2;
      if (coordinate.latitude >= mid) {
        symbol |= 1 << (4 - bit);
        minLat = mid;
      } else {
        maxLat = mid;
      }
    }
    isLon = !isLon;
    bit++;
    if (bit === 5) {
      hash += GEOHASH_ALPHABET[symbol];
      bit = 0;
      symbol = 0;
    }
  }

  return hash;
}

/**
 * Bounds of the cell a geohash denotes. Min edges are inclusive, max edges exclusive
 * (except at 90°N / 180°E).
 */
export function decodeBounds(geohash: string): BoundingBox {
  let minLat = -90, maxLat = 90;
  let minLon = -180, maxLon = 180;
  let isLon = true;

  for (const ch of geohash) {
    const index = SYMBOL_INDEX.get(ch);
    if (index === undefined) {
      throw new InvalidCoordinateError(`Invalid geohash symbol '${ch}' in '${geohash}'`);
    }
    for (let n = 4; n >= 0; n--) {
      const bitSet = ((index >> n) & 1) === 1;
      if (isLon) {
        const mid = (minLon + maxLon) / 2;
        if (bitSet) minLon = mid;
        else maxLon = mid;
      } else {
        const mid = (minLat + maxLat) / 2;
        if (bitSet) minLat = mid;
        else maxLat = mid;
      }
      isLon = !isLon;
    }
  }

  return { minLat, maxLat, minLon, maxLon };
}

/**
 * Center point of a geohash cell
 */
export function decode(geohash: string): Coordinate {
  const { minLat, maxLat, minLon, maxLon } = decodeBounds(geohash);
  return {
    latitude: (minLat + maxLat) / 2,
    longitude: (minLon + maxLon) / 2,
  };
}

/**
 * Cell dimensions derived from the bit allocation:
 * ceil(5P/2) bits halve longitude, floor(5P/2) bits halve latitude.
 */
export function cellSize(precision: number): CellSize {
  assertPrecision(precision);
  const totalBits = 5 * precision;
  const lonBits = Math.ceil(totalBits / 2);
  const latBits = Math.floor(totalBits / 2);

  return {
    latHeight: 180 / Math.pow(2, latBits),
    lonWidth: 360 / Math.pow(2, lonBits),
  };
}

export function isValidGeohash(value: string): boolean {
  if (value.length < MIN_PRECISION || value.length > MAX_PRECISION) return false;
  for (const ch of value) {
    if (!SYMBOL_INDEX.has(ch)) return false;
  }
  return true;
}

/**
 * Half-open string range selecting every geohash that starts with `prefix`
 */
export function prefixRange(prefix: string): { start: string; end: string } {
  return { start: prefix, end: prefix + PREFIX_SENTINEL };
}
