import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { MissingInputDirError } from '../lib/errors.js';
import { fileEntityId, fileTimeRange, listSourceFiles, readFeatures } from '../lib/readers.js';
import { collect, collection, pointFeature, sliceDir, utc } from './fixtures.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('source files', () => {
  it('lists GeoJSON slices in lexical order', async () => {
    const dir = await sliceDir({
      'gdf_10.geojson': collection([]),
      'gdf_2.geojson': collection([]),
      'a.geojson': collection([]),
      'notes.txt': 'ignored'
    });
    expect(await listSourceFiles(dir)).toEqual(['a.geojson', 'gdf_10.geojson', 'gdf_2.geojson']);
  });

  it('fails for a missing directory', async () => {
    await expect(listSourceFiles(path.join('/nonexistent', 'slices'))).rejects.toBeInstanceOf(MissingInputDirError);
  });

  it('takes the fire id from slice names', () => {
    expect(fileEntityId('gdf_123.geojson')).toBe('123');
    expect(fileEntityId('gdf_12a.geojson')).toBeUndefined();
    expect(fileEntityId('fires.geojson')).toBeUndefined();
  });

  it('computes the time range of a slice', () => {
    expect(fileTimeRange([
      { properties: { time: '2024-07-01T12:00:00Z' }, geometry: null },
      { properties: { time_floor: '2024-07-01T09:50:00Z', time: '2024-07-01T09:59:00Z' }, geometry: null },
      { properties: { time: 'n/a' }, geometry: null }
    ])).toEqual({
      minIso: '2024-07-01T09:50:00Z',
      minTs: utc(2024, 7, 1, 9, 50),
      maxIso: '2024-07-01T12:00:00Z',
      maxTs: utc(2024, 7, 1, 12)
    });
    expect(fileTimeRange([{ properties: {}, geometry: null }])).toBeUndefined();
  });
});

describe('readFeatures', () => {
  it('assigns the slice id and time range to features without an id', async () => {
    const dir = await sliceDir({
      'gdf_7.geojson': collection([
        pointFeature([23.7, 38], { frp: 4, time: '2024-07-01T10:00:00Z' }),
        pointFeature([23.8, 38], { id_fire_event: 99, frp: '6.5', time: '2024-07-01T10:10:00Z' })
      ])
    });
    const features = await collect(readFeatures(dir));
    expect(features).toHaveLength(2);
    expect(features[0].properties).toEqual({
      id_fire_event: '7',
      frp: 4,
      time: '2024-07-01T10:00:00Z',
      time_min: '2024-07-01T10:00:00Z',
      time_max: '2024-07-01T10:10:00Z',
      time_min_ts: utc(2024, 7, 1, 10),
      time_max_ts: utc(2024, 7, 1, 10, 10)
    });
    expect(features[1].properties).toEqual({ id_fire_event: '99', frp: 6.5, time: '2024-07-01T10:10:00Z' });
  });

  it('drops properties outside the schema and marks bad numbers', async () => {
    const dir = await sliceDir({
      'fires.geojson': collection([pointFeature([1, 2], { id_fire_event: 'x', frp: 'lots', colour: 'red' })])
    });
    const [feature] = await collect(readFeatures(dir));
    expect(feature.properties).toEqual({ id_fire_event: 'x', frp: null });
  });

  it('reprojects once per file', async () => {
    const dir = await sliceDir({
      'mercator.geojson': collection(
        [pointFeature([1113194.9079327357, 1118889.9748579594], { id_fire_event: 'm' })],
        'urn:ogc:def:crs:EPSG::3857'
      )
    });
    const [feature] = await collect(readFeatures(dir));
    if (feature.geometry?.type !== 'Point') throw new Error('expected a point');
    expect(feature.geometry.coordinates[0]).toBeCloseTo(10, 6);
    expect(feature.geometry.coordinates[1]).toBeCloseTo(10, 6);
  });

  it('skips unreadable slices and carries on', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const dir = await sliceDir({
      'a_broken.geojson': '{"type": "FeatureCollection", "features": [',
      'b_unknown_crs.geojson': collection([pointFeature([1, 2], { id_fire_event: 'u' })], 'EPSG:99999'),
      'c_ok.geojson': collection([pointFeature([1, 2], { id_fire_event: 'ok' }), 'not a feature'])
    });
    const features = await collect(readFeatures(dir));
    expect(features.map(f => f.properties.id_fire_event)).toEqual(['ok']);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(String(warn.mock.calls[0][0])).toMatch(/^Skipping a_broken\.geojson: /);
    expect(warn.mock.calls[1][0]).toBe('Skipping b_unknown_crs.geojson: No projection definition for EPSG:99999');
  });

  it('keeps features with unusable geometry for the raw layer', async () => {
    const dir = await sliceDir({
      'odd.geojson': collection([{ type: 'Feature', properties: { id_fire_event: 'g' }, geometry: { type: 'Point', coordinates: ['a'] } }])
    });
    const [feature] = await collect(readFeatures(dir));
    expect(feature.geometry).toBeNull();
  });
});
