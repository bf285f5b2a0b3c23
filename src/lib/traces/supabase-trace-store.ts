/**
 * Supabase-backed trace store
 *
 * The geohash column must sort byte-wise (COLLATE "C") for the
 * `prefix <= geohash < prefix + "~"` range to select exactly the prefix's descendants.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { wrapDatabaseError, DataTransformError } from '../errors';
import { prefixRange } from '../geo/geohash';
import type { BoundingBox } from '../geo/viewport';
import { logger } from '../logger';
import type { ReportRow, ReportWriter } from '../reports/report-service';
import {
  DecodeStats,
  TRACE_COLUMNS,
  TRACES_TABLE,
  decodeTraceRow,
  decodeTraceRows,
  toTraceRow,
} from './schemas';
import type {
  NewTraceRow,
  PrefixQuery,
  TraceReader,
  TraceRecord,
  TraceRegionCounter,
  TraceWriter,
} from './types';

export const REPORTS_TABLE = 'reports';

const storeLogger = logger.child({ component: 'supabase-trace-store' });

export class SupabaseTraceStore implements TraceReader, TraceRegionCounter, TraceWriter, ReportWriter {
  readonly decodeStats = new DecodeStats();

  constructor(private readonly client: SupabaseClient) {}

  async fetchByGeohashPrefix({ prefix, limit }: PrefixQuery): Promise<TraceRecord[]> {
    const { start, end } = prefixRange(prefix);
    const { data, error } = await this.client
      .from(TRACES_TABLE)
      .select(TRACE_COLUMNS)
      .gte('geohash', start)
      .lt('geohash', end)
      .order('created_at', { ascending: false })
      .limit(limit);

    if (error) {
      throw wrapDatabaseError(error, `fetchByGeohashPrefix(${prefix})`);
    }

    const rows: unknown[] = data ?? [];
    storeLogger.sync.debug('Prefix query', { prefix, limit, rows: rows.length });
    return decodeTraceRows(rows, this.decodeStats);
  }

  async fetchRecent(limit: number): Promise<TraceRecord[]> {
    const { data, error } = await this.client
      .from(TRACES_TABLE)
      .select(TRACE_COLUMNS)
      .order('created_at', { ascending: false })
      .limit(limit);

    if (error) {
      throw wrapDatabaseError(error, 'fetchRecent');
    }

    const rows: unknown[] = data ?? [];
    return decodeTraceRows(rows, this.decodeStats);
  }

  async countInRegion(box: BoundingBox): Promise<number> {
    const { count, error } = await this.client
      .from(TRACES_TABLE)
      .select('id', { count: 'exact', head: true })
      .gte('lat', box.minLat)
      .lte('lat', box.maxLat)
      .gte('lng', box.minLon)
      .lte('lng', box.maxLon);

    if (error) {
      throw wrapDatabaseError(error, 'countInRegion');
    }

    return count ?? 0;
  }

  async insertTrace(row: NewTraceRow): Promise<TraceRecord> {
    const { data, error } = await this.client
      .from(TRACES_TABLE)
      .insert(toTraceRow(row))
      .select(TRACE_COLUMNS)
      .single();

    if (error) {
      throw wrapDatabaseError(error, 'insertTrace');
    }

    const record = decodeTraceRow(data);
    if (!record) {
      throw new DataTransformError('insertTrace');
    }
    return record;
  }

  async insertReport(report: ReportRow): Promise<void> {
    const { error } = await this.client.from(REPORTS_TABLE).insert(report);

    if (error) {
      throw wrapDatabaseError(error, 'insertReport');
    }
  }
}
