import { describe, it, expect } from 'vitest';
import { UnreadableSourceError, UnsupportedCrsError } from './errors.js';
import { resolveExtent } from './extent-resolver.js';
import { fakeReaders } from './test-helpers.js';

const readers = fakeReaders({
  vector: {
    'roads.parquet': {
      crs: { id: { authority: 'EPSG', code: 2180 } },
      records: [
        {
          geometry: { type: 'LineString', coordinates: [[500000, 400000], [500500, 400100]] },
          properties: { updated: '2021-05-01T10:00:00Z' },
        },
        {
          geometry: null,
          bbox: { xmin: 499000, ymin: 399000, xmax: 499500, ymax: 399500 },
          properties: { updated: '2020-01-01T00:00:00Z' },
        },
        { geometry: null, properties: { updated: 'not a date' } },
      ],
    },
    'empty.parquet': { crs: undefined, records: [{ geometry: null, properties: {} }] },
    'broken.parquet': new Error('Invalid parquet footer'),
  },
  raster: {
    'tile.tif': { bbox: { xmin: 7500000, ymin: 5800000, xmax: 7501000, ymax: 5801000 }, crs: 'EPSG:2178' },
    'custom.tif': { bbox: { xmin: 0, ymin: 0, xmax: 1, ymax: 1 }, crs: 'user-defined' },
  },
});

describe('resolveExtent', () => {
  it('should envelope vector records in their own CRS', async () => {
    const extent = await resolveExtent(
      { kind: 'vector', ref: 'bdot/roads.parquet', path: '/data/bdot/roads.parquet', datetimeColumn: 'updated' },
      readers
    );
    expect(extent).toEqual({
      bbox: { xmin: 499000, ymin: 399000, xmax: 500500, ymax: 400100 },
      crs: 'EPSG:2180',
      temporal: { start: '2020-01-01T00:00:00.000Z', end: '2021-05-01T10:00:00.000Z' },
    });
  });

  it('should leave out time when no column is named', async () => {
    const extent = await resolveExtent({ kind: 'vector', ref: 'roads', path: 'roads.parquet' }, readers);
    expect(extent.temporal).toBeUndefined();
  });

  it('should refuse vector sources without geometry', async () => {
    await expect(resolveExtent({ kind: 'vector', ref: 'empty', path: 'empty.parquet' }, readers)).rejects.toThrow(
      'Could not read source empty: no records with a geometry'
    );
  });

  it('should wrap reader failures', async () => {
    const result = resolveExtent({ kind: 'vector', ref: 'broken', path: 'broken.parquet' }, readers);
    await expect(result).rejects.toBeInstanceOf(UnreadableSourceError);
    await expect(result).rejects.toThrow('Could not read source broken: Invalid parquet footer');
  });

  it('should take the raster box and CRS', async () => {
    const extent = await resolveExtent({ kind: 'raster', ref: 'tile', path: 'tile.tif' }, readers);
    expect(extent).toEqual({
      bbox: { xmin: 7500000, ymin: 5800000, xmax: 7501000, ymax: 5801000 },
      crs: 'EPSG:2178',
    });
  });

  it('should pass CRS errors through', async () => {
    await expect(resolveExtent({ kind: 'raster', ref: 'custom', path: 'custom.tif' }, readers)).rejects.toBeInstanceOf(
      UnsupportedCrsError
    );
  });

  it('should use declared extents', async () => {
    const extent = await resolveExtent(
      {
        kind: 'declared',
        ref: 'wms#Raster',
        bbox: { xmin: 14, ymin: 49, xmax: 24, ymax: 55 },
        crs: 'EPSG:4326',
        temporal: { start: '2020-01-01', end: null },
      },
      readers
    );
    expect(extent.temporal).toEqual({ start: '2020-01-01T00:00:00.000Z', end: null });
  });

  it('should refuse declared sources without a box', async () => {
    await expect(
      resolveExtent({ kind: 'declared', ref: 'wms#Raster', bbox: null, crs: undefined }, readers)
    ).rejects.toThrow('no declared bounding box');
  });
});
