/**
 * Viewport model: center + span, derived bounding box, validation and clamping.
 */

import { z } from 'zod';
import { InvalidViewportError } from '../errors';

export interface Coordinate {
  readonly latitude: number;
  readonly longitude: number;
}

export interface Span {
  readonly latDelta: number;
  readonly lonDelta: number;
}

export interface Viewport {
  readonly center: Coordinate;
  readonly span: Span;
}

export interface BoundingBox {
  readonly minLat: number;
  readonly maxLat: number;
  readonly minLon: number;
  readonly maxLon: number;
}

const finite = z.number().finite();

export const CoordinateSchema = z.object({
  latitude: finite.min(-90).max(90),
  longitude: finite.min(-180).max(180),
});

export const ViewportSchema = z.object({
  center: CoordinateSchema,
  span: z.object({
    latDelta: finite.positive(),
    lonDelta: finite.positive(),
  }),
});

/**
 * Validate a renderer-supplied viewport.
 * @throws InvalidViewportError listing every offending field
 */
export function parseViewport(input: unknown): Viewport {
  const result = ViewportSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidViewportError(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
  return result.data;
}

export function clampLatitude(latitude: number): number {
  return Math.min(Math.max(latitude, -90), 90);
}

export function clampLongitude(longitude: number): number {
  return Math.min(Math.max(longitude, -180), 180);
}

/**
 * Bounding box of a viewport, clamped to valid coordinate ranges.
 * Spans crossing the antimeridian are clamped, not wrapped.
 */
export function boundingBox({ center, span }: Viewport): BoundingBox {
  return {
    minLat: clampLatitude(center.latitude - span.latDelta / 2),
    maxLat: clampLatitude(center.latitude + span.latDelta / 2),
    minLon: clampLongitude(center.longitude - span.lonDelta / 2),
    maxLon: clampLongitude(center.longitude + span.lonDelta / 2),
  };
}

/** Inclusive on every edge */
export function containsCoordinate(box: BoundingBox, { latitude, longitude }: Coordinate): boolean {
  return (
    latitude >= box.minLat &&
    latitude <= box.maxLat &&
    longitude >= box.minLon &&
    longitude <= box.maxLon
  );
}

/**
 * Zoom magnitude used by every span-keyed table: the larger of the two deltas.
 */
export function spanMagnitude(span: Span): number {
  return Math.max(span.latDelta, span.lonDelta);
}
