/**
 * Content reports filed against a trace
 */

import { z } from 'zod';
import { logger } from '../logger';
import { withRetry } from '../retry';
import type { TraceRecord } from '../traces/types';

export const REPORT_CATEGORIES = [
  'Inappropriate Content',
  'Spam/Fake Content',
  'Technical Issue',
  'Other',
] as const;

export type ReportCategory = (typeof REPORT_CATEGORIES)[number];

export const REPORT_DESCRIPTION_MAX_LENGTH = 500;

const ReportInputSchema = z.object({
  category: z.enum(REPORT_CATEGORIES),
  description: z.string().trim().max(REPORT_DESCRIPTION_MAX_LENGTH),
});

/** Row shape of the `reports` table */
export interface ReportRow {
  trace_id: string;
  trace_name: string;
  latitude: number;
  longitude: number;
  geohash: string;
  category: ReportCategory;
  description: string;
  created_at: string;
}

export interface ReportWriter {
  insertReport(report: ReportRow): Promise<void>;
}

export function buildReport(
  trace: TraceRecord,
  category: ReportCategory,
  description: string,
  now: Date = new Date(),
): ReportRow {
  const input = ReportInputSchema.parse({ category, description });
  return {
    trace_id: trace.id,
    trace_name: trace.name,
    latitude: trace.coordinate.latitude,
    longitude: trace.coordinate.longitude,
    geohash: trace.geohash,
    category: input.category,
    description: input.description,
    created_at: now.toISOString(),
  };
}

/**
 * @throws ZodError for an unknown category or an over-long description
 */
export async function submitReport(
  writer: ReportWriter,
  trace: TraceRecord,
  category: ReportCategory,
  description: string,
): Promise<ReportRow> {
  const report = buildReport(trace, category, description);
  await withRetry(() => writer.insertReport(report), { context: 'insertReport' });
  await logger.info('Report submitted', { traceId: trace.id, category });
  return report;
}
