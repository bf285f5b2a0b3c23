/**
 * Write path for new traces. The geohash is computed here, once, at the fixed
 * write precision the reader's planner is clamped to.
 */

import { z } from 'zod';
import { encode, TRACE_WRITE_PRECISION } from '../geo/geohash';
import { CoordinateSchema } from '../geo/viewport';
import { logger } from '../logger';
import { withRetry } from '../retry';
import type { NewTraceRow, TraceRecord, TraceWriter } from './types';

export const TRACE_NAME_MAX_LENGTH = 80;

export const NewTraceInputSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(TRACE_NAME_MAX_LENGTH),
  coordinate: CoordinateSchema,
  audioUrl: z.string().url(),
  imageUrl: z.string().url(),
});

export type NewTraceInput = z.input<typeof NewTraceInputSchema>;

/**
 * Validates the input and builds the row to insert.
 * @throws ZodError when the input is invalid
 */
export function buildTraceInsert(input: NewTraceInput, now: Date = new Date()): NewTraceRow {
  const { name, coordinate, audioUrl, imageUrl } = NewTraceInputSchema.parse(input);
  return {
    name,
    coordinate,
    geohash: encode(coordinate, TRACE_WRITE_PRECISION),
    mediaRefs: { audioUrl, imageUrl },
    createdAt: now,
  };
}

export async function saveTrace(writer: TraceWriter, input: NewTraceInput): Promise<TraceRecord> {
  const row = buildTraceInsert(input);
  const record = await withRetry(() => writer.insertTrace(row), { context: 'insertTrace' });
  await logger.info('Trace saved', { traceId: record.id, geohash: record.geohash });
  return record;
}
