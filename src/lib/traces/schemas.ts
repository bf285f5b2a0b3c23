/**
 * Typed decode step at the store boundary.
 * Rows either become a TraceRecord or are skipped and counted; they never throw.
 */

import { z } from 'zod';
import { isValidGeohash } from '../geo/geohash';
import { logger } from '../logger';
import type { NewTraceRow, TraceRecord } from './types';

export const TRACES_TABLE = 'traces';
export const TRACE_COLUMNS = 'id, name, lat, lng, geohash, audio_url, image_url, created_at';

export const TraceRowSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]).transform(String),
  name: z.string(),
  lat: z.number().min(-90).max(90), // Strict geo-bounds
  lng: z.number().min(-180).max(180),
  geohash: z.string().refine(isValidGeohash, 'geohash must use the base-32 alphabet'),
  audio_url: z.string().url(),
  image_url: z.string().url(),
  created_at: z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value)),
});

export type TraceRow = z.input<typeof TraceRowSchema>;

/**
 * Running counters for one store instance
 */
export class DecodeStats {
  decoded = 0;
  failures = 0;

  reset(): void {
    this.decoded = 0;
    this.failures = 0;
  }
}

export function decodeTraceRow(row: unknown): TraceRecord | null {
  const result = TraceRowSchema.safeParse(row);
  if (!result.success) return null;

  const { id, name, lat, lng, geohash, audio_url, image_url, created_at } = result.data;
  return {
    id,
    name,
    coordinate: { latitude: lat, longitude: lng },
    geohash,
    mediaRefs: { audioUrl: audio_url, imageUrl: image_url },
    createdAt: created_at,
  };
}

export function decodeTraceRows(rows: readonly unknown[], stats?: DecodeStats): TraceRecord[] {
  const records: TraceRecord[] = [];
  let skipped = 0;

  for (const row of rows) {
    const record = decodeTraceRow(row);
    if (record) {
      records.push(record);
    } else {
      skipped++;
    }
  }

  if (stats) {
    stats.decoded += records.length;
    stats.failures += skipped;
  }
  if (skipped > 0) {
    logger.sync.warn('Skipped undecodable trace rows', { skipped, received: rows.length });
  }

  return records;
}

/**
 * Insert payload for the traces table
 */
export function toTraceRow(row: NewTraceRow): Omit<TraceRow, 'id'> {
  return {
    name: row.name,
    lat: row.coordinate.latitude,
    lng: row.coordinate.longitude,
    geohash: row.geohash,
    audio_url: row.mediaRefs.audioUrl,
    image_url: row.mediaRefs.imageUrl,
    created_at: row.createdAt.toISOString(),
  };
}
