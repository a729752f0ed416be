import { cellToBoundary, latLngToCell } from 'h3-js';
import { describe, expect, it } from 'vitest';
import { HexAggregator } from '../lib/aggregate.js';
import { NdjsonSink, hexRing, toHexFeature, toPlainFeature, toRawFeature } from '../lib/emit.js';
import { resolveTimestamp } from '../lib/time.js';
import { fireFeature, hangingUpStream, memoryStream, utc } from './fixtures.js';

const cell = latLngToCell(37.98, 23.73, 4);

describe('hexRing', () => {
  it('closes the ring in lon/lat order', () => {
    const ring = hexRing(cell);
    const boundary = cellToBoundary(cell);
    expect(ring).toHaveLength(boundary.length + 1);
    expect(ring[0]).toEqual([boundary[0][1], boundary[0][0]]);
    expect(ring[ring.length - 1]).toEqual(ring[0]);
  });
});

describe('toHexFeature', () => {
  it('rounds statistics only on the way out', () => {
    const agg = new HexAggregator(4);
    const base = { lonLat: [23.73, 37.98] as [number, number], epoch: utc(2024, 7, 1, 10), rawTime: '2024-07-01T10:00:00Z' };
    agg.observe({ ...base, fireId: 'A', frp: 1.0004 });
    agg.observe({ ...base, fireId: 'B', frp: 1.0004 });
    agg.observe({ ...base, fireId: 'C', frp: 1.0004, fros: 0.33333 });
    const [bucket] = [...agg.buckets()];
    const feature = toHexFeature(bucket, 4);

    expect(feature.type).toBe('Feature');
    expect(feature.geometry.type).toBe('Polygon');
    expect(feature.geometry.coordinates[0]).toEqual(hexRing(cell));
    expect(feature.properties).toEqual({
      cell,
      res: 4,
      count: 3,
      frp_sum: 3.001,
      frp_max: 1,
      frp_avg: 1,
      fre_sum_mj: 1800.72,
      fre_mean_mj: 600.24,
      last_time: '2024-07-01T10:00:00Z',
      time_min: '2024-07-01',
      time_max: '2024-07-01',
      time_min_ts: utc(2024, 7, 1),
      time_max_ts: utc(2024, 7, 2),
      day_start_ts: utc(2024, 7, 1),
      day_end_ts: utc(2024, 7, 2),
      day_label: '2024-07-01',
      fros_sum: 0.333,
      fros_max: 0.333,
      fros_avg: 0.333,
      fros_count: 1,
      tippecanoe: { minzoom: 0, maxzoom: 4 }
    });
  });

  it('reports no FROS average without a valid FROS observation', () => {
    const agg = new HexAggregator(4);
    agg.observe({ fireId: 'A', lonLat: [23.73, 37.98], epoch: utc(2024, 7, 1, 10), frp: 3 });
    const feature = toHexFeature([...agg.buckets()][0], 6);
    expect(feature.properties.fros_avg).toBeNull();
    expect(feature.properties.fros_max).toBeNull();
    expect(feature.properties.last_time).toBeNull();
    expect(feature.properties.tippecanoe).toEqual({ minzoom: 0, maxzoom: 6 });
  });
});

describe('raw features', () => {
  const point = { type: 'Point' as const, coordinates: [23.73, 37.98] as [number, number] };

  it('tags raw features with the high zoom minzoom and time buckets', () => {
    const feature = fireFeature({
      id_fire_event: '12',
      frp: 8,
      fros: -999,
      duration: 600,
      time_floor: '2024-07-01T10:00:00Z',
      time: '2024-07-01T10:04:31Z'
    }, point);
    const record = toRawFeature(feature, '12', resolveTimestamp(feature.properties), 5);
    expect(record).toEqual({
      type: 'Feature',
      properties: {
        id_fire_event: '12',
        frp: 8,
        fros: -999,
        duration: 600,
        time: '2024-07-01T10:00:00Z',
        time_ts: utc(2024, 7, 1, 10),
        day_start_ts: utc(2024, 7, 1),
        day_end_ts: utc(2024, 7, 2),
        tippecanoe: { minzoom: 5 }
      },
      geometry: point
    });
  });

  it('fills the time range from stats without overwriting the feature', () => {
    const feature = fireFeature({ id_fire_event: '12', time: 'unknown', time_min: '2024-06-30T00:00:00Z' }, point);
    const record = toRawFeature(feature, '12', resolveTimestamp(feature.properties), 5, {
      timeStart: '2024-06-01T00:00:00Z',
      timeEnd: '2024-07-09T00:00:00Z',
      timeStartTs: utc(2024, 6, 1),
      timeEndTs: utc(2024, 7, 9)
    });
    expect(record.properties).toEqual({
      id_fire_event: '12',
      time: 'unknown',
      time_min: '2024-06-30T00:00:00Z',
      time_max: '2024-07-09T00:00:00Z',
      time_min_ts: utc(2024, 6, 1),
      time_max_ts: utc(2024, 7, 9),
      tippecanoe: { minzoom: 5 }
    });
  });

  it('has no zoom hint in the plain stream', () => {
    const feature = fireFeature({ id_fire_event: '3', timestamp: '2024-07-01T10:00:00Z' }, point);
    expect(toPlainFeature(feature, '3', resolveTimestamp(feature.properties)).properties).toEqual({
      id_fire_event: '3',
      timestamp: '2024-07-01T10:00:00Z',
      time_ts: utc(2024, 7, 1, 10),
      day_start_ts: utc(2024, 7, 1),
      day_end_ts: utc(2024, 7, 2)
    });
  });
});

describe('NdjsonSink', () => {
  const record = toPlainFeature(fireFeature({ id_fire_event: '1' }, null), '1', {});

  it('writes one compact record per line', async () => {
    const { out, lines } = memoryStream();
    const sink = new NdjsonSink(out);
    await sink.write(record);
    await sink.write(record);
    expect(lines()).toEqual([
      '{"type":"Feature","properties":{"id_fire_event":"1"},"geometry":null}',
      '{"type":"Feature","properties":{"id_fire_event":"1"},"geometry":null}'
    ]);
    expect(sink.written).toBe(2);
  });

  it('closes quietly when the reader hangs up', async () => {
    const sink = new NdjsonSink(hangingUpStream(2));
    expect(await sink.write(record)).toBe(true);
    expect(await sink.write(record)).toBe(true);
    expect(await sink.write(record)).toBe(false);
    expect(sink.isClosed).toBe(true);
    expect(await sink.write(record)).toBe(false);
    expect(sink.written).toBe(2);
  });
});
