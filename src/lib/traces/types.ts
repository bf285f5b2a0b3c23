/**
 * Trace domain types and the store seams the engine reads and writes through.
 */

import type { BoundingBox, Coordinate } from '../geo/viewport';

/** Opaque media locations; the engine never interprets them */
export interface MediaRefs {
  readonly audioUrl: string;
  readonly imageUrl: string;
}

/**
 * A geotagged contribution. Immutable once written; `geohash` is the encoding of
 * `coordinate` at the write precision, computed by the writer and used only as an index key.
 */
export interface TraceRecord {
  readonly id: string;
  readonly name: string;
  readonly coordinate: Coordinate;
  readonly geohash: string;
  readonly mediaRefs: MediaRefs;
  readonly createdAt: Date;
}

export interface PrefixQuery {
  prefix: string;
  limit: number;
}

/**
 * Read side of the remote store: a string-range query on `geohash` plus a recency sample.
 */
export interface TraceReader {
  /** Records with `prefix <= geohash < prefix + "~"`, newest first, at most `limit` */
  fetchByGeohashPrefix(query: PrefixQuery): Promise<TraceRecord[]>;
  /** The newest `limit` records anywhere */
  fetchRecent(limit: number): Promise<TraceRecord[]>;
}

/**
 * Aggregate count over a lat/lng box (region summary mode)
 */
export interface TraceRegionCounter {
  countInRegion(box: BoundingBox): Promise<number>;
}

export interface NewTraceRow {
  name: string;
  coordinate: Coordinate;
  geohash: string;
  mediaRefs: MediaRefs;
  createdAt: Date;
}

export interface TraceWriter {
  insertTrace(row: NewTraceRow): Promise<TraceRecord>;
}
