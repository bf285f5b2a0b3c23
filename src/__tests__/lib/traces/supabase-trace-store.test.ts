/**
 * Tests for the Supabase trace store against a chainable query-builder mock
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { SupabaseTraceStore } from '@/lib/traces/supabase-trace-store';
import { TRACE_COLUMNS } from '@/lib/traces/schemas';
import { ConnectionError, DataTransformError, QueryError } from '@/lib/errors';
import type { ReportRow } from '@/lib/reports/report-service';
import { createSupabaseMock } from '../../utils/supabase-query-mock';

jest.mock('@/lib/logger', () => ({
  logger: {
    sync: {
      debug: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
    },
    child: () => ({
      sync: {
        debug: jest.fn(),
        warn: jest.fn(),
      },
    }),
  },
}));

const row = (id: string, createdAt: string) => ({
  id,
  name: `Trace ${id}`,
  lat: 37.77,
  lng: -122.42,
  geohash: '9q8yy7b6',
  audio_url: `https://media.example.com/${id}.m4a`,
  image_url: `https://media.example.com/${id}.jpg`,
  created_at: createdAt,
});

function storeWith(response: Parameters<typeof createSupabaseMock>[0]) {
  const mock = createSupabaseMock(response);
  const store = new SupabaseTraceStore(mock.client as unknown as SupabaseClient);
  return { store, ...mock };
}

describe('SupabaseTraceStore', () => {
  describe('fetchByGeohashPrefix', () => {
    it('queries the prefix range newest first and decodes rows', async () => {
      const { store, client, builder } = storeWith({
        data: [row('b', '2024-05-02T00:00:00.000+00:00'), row('a', '2024-05-01T00:00:00.000+00:00')],
      });

      const records = await store.fetchByGeohashPrefix({ prefix: '9q8', limit: 50 });

      expect(records.map((record) => record.id)).toEqual(['b', 'a']);
      expect(client.from).toHaveBeenCalledWith('traces');
      expect(builder.select).toHaveBeenCalledWith(TRACE_COLUMNS);
      expect(builder.gte).toHaveBeenCalledWith('geohash', '9q8');
      expect(builder.lt).toHaveBeenCalledWith('geohash', '9q8~');
      expect(builder.order).toHaveBeenCalledWith('created_at', { ascending: false });
      expect(builder.limit).toHaveBeenCalledWith(50);
    });

    it('skips undecodable rows and counts them', async () => {
      const { store } = storeWith({
        data: [row('a', '2024-05-01T00:00:00.000+00:00'), { id: 'broken' }],
      });

      const records = await store.fetchByGeohashPrefix({ prefix: '9q8', limit: 50 });

      expect(records).toHaveLength(1);
      expect(store.decodeStats.failures).toBe(1);
    });

    it('treats null data as no rows', async () => {
      const { store } = storeWith({ data: null });

      await expect(store.fetchByGeohashPrefix({ prefix: '9q8', limit: 50 })).resolves.toEqual([]);
    });

    it('wraps store errors', async () => {
      const { store } = storeWith({ error: { message: 'permission denied for table traces', code: '42501' } });

      const pending = store.fetchByGeohashPrefix({ prefix: '9q8', limit: 50 });

      await expect(pending).rejects.toBeInstanceOf(QueryError);
      await expect(pending).rejects.toThrow('Store query failed: fetchByGeohashPrefix(9q8)');
    });
  });

  describe('fetchRecent', () => {
    it('orders by recency without a spatial filter', async () => {
      const { store, builder } = storeWith({ data: [row('a', '2024-05-01T00:00:00.000+00:00')] });

      const records = await store.fetchRecent(25);

      expect(records).toHaveLength(1);
      expect(builder.gte).not.toHaveBeenCalled();
      expect(builder.limit).toHaveBeenCalledWith(25);
    });

    it('classifies network failures as connection errors', async () => {
      const { store } = storeWith({ error: { message: 'TypeError: fetch failed' } });

      await expect(store.fetchRecent(25)).rejects.toBeInstanceOf(ConnectionError);
    });
  });

  describe('countInRegion', () => {
    it('runs an exact head count over the box', async () => {
      const { store, builder } = storeWith({ count: 7 });

      const count = await store.countInRegion({ minLat: 35, maxLat: 70, minLon: -10, maxLon: 40 });

      expect(count).toBe(7);
      expect(builder.select).toHaveBeenCalledWith('id', { count: 'exact', head: true });
      expect(builder.gte).toHaveBeenCalledWith('lat', 35);
      expect(builder.lte).toHaveBeenCalledWith('lat', 70);
      expect(builder.gte).toHaveBeenCalledWith('lng', -10);
      expect(builder.lte).toHaveBeenCalledWith('lng', 40);
    });

    it('reads a null count as zero', async () => {
      const { store } = storeWith({ count: null });

      await expect(store.countInRegion({ minLat: 0, maxLat: 1, minLon: 0, maxLon: 1 })).resolves.toBe(0);
    });
  });

  describe('insertTrace', () => {
    const newRow = {
      name: 'Trace n',
      coordinate: { latitude: 37.77, longitude: -122.42 },
      geohash: '9q8yy7b6',
      mediaRefs: { audioUrl: 'https://media.example.com/n.m4a', imageUrl: 'https://media.example.com/n.jpg' },
      createdAt: new Date('2024-05-03T00:00:00.000Z'),
    };

    it('inserts the row and decodes the stored record', async () => {
      const { store, builder } = storeWith({ data: row('n', '2024-05-03T00:00:00.000+00:00') });

      const record = await store.insertTrace(newRow);

      expect(record.id).toBe('n');
      expect(builder.insert).toHaveBeenCalledWith({
        name: 'Trace n',
        lat: 37.77,
        lng: -122.42,
        geohash: '9q8yy7b6',
        audio_url: 'https://media.example.com/n.m4a',
        image_url: 'https://media.example.com/n.jpg',
        created_at: '2024-05-03T00:00:00.000Z',
      });
      expect(builder.single).toHaveBeenCalled();
    });

    it('throws a transform error when the stored row does not decode', async () => {
      const { store } = storeWith({ data: { id: 'n' } });

      await expect(store.insertTrace(newRow)).rejects.toBeInstanceOf(DataTransformError);
    });
  });

  describe('insertReport', () => {
    it('writes to the reports table', async () => {
      const { store, client, builder } = storeWith({});
      const report: ReportRow = {
        trace_id: 'a',
        trace_name: 'Trace a',
        latitude: 1,
        longitude: 2,
        geohash: 's0000000',
        category: 'Spam/Fake Content',
        description: '',
        created_at: '2024-05-01T00:00:00.000Z',
      };

      await store.insertReport(report);

      expect(client.from).toHaveBeenCalledWith('reports');
      expect(builder.insert).toHaveBeenCalledWith(report);
    });
  });
});
