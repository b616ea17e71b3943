import { existsSync } from 'node:fs';
import { readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { convert, exitCodeFor } from './convert.js';
import type { ConvertOptions } from './convert.js';
import type { RasterInfo, Readers, VectorRecord } from './readers/types.js';
import { SHEET_KEYWORDS, SHEET_PARENT_TEXT } from './sheet-index.js';
import {
  fakeReaders,
  makeTempDir,
  PARQUET_BYTES,
  readTree,
  removeTempDir,
  TIFF_BYTES,
  writeFiles,
} from './test-helpers.js';
import type { Polygon } from './types.js';

const NMT = 'poland.gugik.nmt';
const ORTO = 'poland.gugik.orto';

function sheetRow(id: string, year: number, lat: number, lon: number): Record<string, unknown> {
  return {
    gml_id: id,
    lowerCorner: `${lat} ${lon}`,
    upperCorner: `${lat + 1} ${lon + 1}`,
    timePosition: `${year}-06-01`,
    url_do_pobrania: `https://example.com/${id}.tif`,
    akt_rok: year,
  };
}

function tile(xmin: number): RasterInfo {
  return { bbox: { xmin, ymin: 400000, xmax: xmin + 1000, ymax: 401000 }, crs: 'EPSG:2180' };
}

describe('convert', () => {
  let dir: string;
  let options: ConvertOptions;

  beforeEach(async () => {
    dir = await makeTempDir();
    await writeFiles(join(dir, 'input'), {
      'nmt/a.tif': TIFF_BYTES,
      'nmt/a.thumb.png': 'png',
      'nmt/b.tif': TIFF_BYTES,
      'nmt/c.tif': TIFF_BYTES,
      'broken/dataset.json': '{"kind":"nope"}',
    });
    options = {
      inputFolder: join(dir, 'input'),
      outputFolder: join(dir, 'output', 'stac'),
      readers: fakeReaders({
        raster: { 'a.tif': tile(500000), 'b.tif': tile(501000), 'c.tif': new Error('corrupted') },
      }),
      workerCount: 2,
      checksums: false,
      catalogCrs: 'EPSG:2180',
    };
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  async function readJson(...path: string[]): Promise<Record<string, unknown>> {
    return JSON.parse(await readFile(join(options.outputFolder, ...path), 'utf8'));
  }

  it('should build every readable item and report the rest', async () => {
    const report = await convert(options);

    expect(exitCodeFor(report)).toBe(0);
    expect(report.fatal).toBeNull();
    expect(report.collectionsBuilt).toBe(1);
    expect(report.itemsBuilt).toBe(2);
    expect(report.warnings.map((w) => [w.code, w.ref])).toEqual([
      ['UnreadableSource', 'broken/dataset.json'],
      ['UnreadableSource', 'nmt/c.tif'],
    ]);
    expect(report.warnings[1].message).toBe('Could not read source nmt/c.tif: corrupted');
    expect(report.write?.inserted).toEqual([NMT, `${NMT}/a`, `${NMT}/b`]);
  });

  it('should group a tile with its sidecars and link local files relatively', async () => {
    await convert(options);
    const item = await readJson(NMT, 'a', 'a.json');

    expect(item.bbox).toEqual([500000, 400000, 501000, 401000]);
    expect(item.properties).toEqual({ datetime: null, 'source:files': ['nmt/a.thumb.png', 'nmt/a.tif'] });
    expect(item.assets).toEqual({
      data: {
        href: '../../../../input/nmt/a.tif',
        type: 'image/tiff; application=geotiff',
        roles: ['data'],
        'file:size': 17,
        'proj:code': 'EPSG:2180',
        'proj:bbox': [500000, 400000, 501000, 401000],
      },
      thumbnail: { href: '../../../../input/nmt/a.thumb.png', roles: ['thumbnail'], 'file:size': 3 },
    });

    const collection = await readJson(NMT, 'collection.json');
    expect(collection.description).toBe('Zbiór danych nmt');
    expect(collection.extent).toEqual({
      spatial: { bbox: [[500000, 400000, 502000, 401000]] },
      temporal: { interval: [[null, null]] },
    });
  });

  it('should remove items whose source file was deleted', async () => {
    await convert(options);
    await rm(join(options.inputFolder, 'nmt', 'b.tif'));

    const report = await convert(options);
    expect(report.write?.removed).toEqual([`${NMT}/b`]);
    expect(report.write?.overwritten).toEqual([NMT, `${NMT}/a`]);
    expect(existsSync(join(options.outputFolder, NMT, 'b', 'b.json'))).toBe(false);
  });

  it('should keep items whose source could not be read this time', async () => {
    await convert(options);
    const readers = fakeReaders({
      raster: { 'a.tif': tile(500000), 'b.tif': new Error('locked'), 'c.tif': new Error('corrupted') },
    });

    const report = await convert({ ...options, readers });
    expect(report.write?.preserved).toEqual([`${NMT}/b`]);
    expect(existsSync(join(options.outputFolder, NMT, 'b', 'b.json'))).toBe(true);
  });

  it('should report sources that take too long', async () => {
    const hanging: Readers = {
      ...fakeReaders({}),
      raster: { open: () => new Promise(() => undefined) },
    };
    const report = await convert({ ...options, readers: hanging, sourceTimeoutMs: 50 });

    expect(report.warnings).toContainEqual({
      code: 'SourceTimeout',
      ref: 'nmt/a.tif',
      message: 'Source nmt/a.tif was not processed within 50ms',
    });
    expect(exitCodeFor(report)).toBe(0);
  });

  it('should write nothing when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const report = await convert({ ...options, signal: controller.signal });

    expect(report.cancelled).toBe(true);
    expect(report.fatal?.code).toBe('RunCancelled');
    expect(exitCodeFor(report)).toBe(1);
    expect(existsSync(options.outputFolder)).toBe(false);
  });

  it('should fail when the input folder is missing', async () => {
    const report = await convert({ ...options, inputFolder: join(dir, 'missing') });
    expect(report.fatal?.code).toBe('UnreadableSource');
    expect(exitCodeFor(report)).toBe(1);
  });

  it('should fail on a catalog CRS proj4 does not know', async () => {
    const report = await convert({ ...options, catalogCrs: 'EPSG:999999' });
    expect(report.fatal).toEqual({
      code: 'UnsupportedCrs',
      ref: options.inputFolder,
      message: 'Unsupported CRS "EPSG:999999"',
    });
  });

  it('should fail without reading anything when the worker count is not positive', async () => {
    const report = await convert({ ...options, workerCount: 0 });
    expect(report.fatal?.code).toBe('UnexpectedError');
    expect(report.fatal?.ref).toBe(options.inputFolder);
    expect(exitCodeFor(report)).toBe(1);
    expect(existsSync(options.outputFolder)).toBe(false);
  });

  it('should write the same bytes on every run over unchanged input', async () => {
    await convert(options);
    const first = await readTree(options.outputFolder);
    await convert(options);
    expect(await readTree(options.outputFolder)).toEqual(first);
  });

  it('should move an item and its collection when the source extent changes', async () => {
    await convert(options);
    const readers = fakeReaders({
      raster: { 'a.tif': tile(510000), 'b.tif': tile(501000), 'c.tif': new Error('corrupted') },
    });

    const report = await convert({ ...options, readers });
    expect(report.write?.overwritten).toEqual([NMT, `${NMT}/a`, `${NMT}/b`]);
    const item = await readJson(NMT, 'a', 'a.json');
    expect(item.bbox).toEqual([510000, 400000, 511000, 401000]);
    const collection = await readJson(NMT, 'collection.json');
    expect(collection.extent).toEqual({
      spatial: { bbox: [[501000, 400000, 511000, 401000]] },
      temporal: { interval: [[null, null]] },
    });
  });

  it('should leave out a collection whose sources collide on an item id and keep its previous version', async () => {
    await convert(options);
    const first = await readTree(options.outputFolder);
    await writeFiles(options.inputFolder, { 'nmt/x/a.tif': TIFF_BYTES, 'nmt/x-a.tif': TIFF_BYTES });
    const readers = fakeReaders({
      raster: { 'a.tif': tile(500000), 'b.tif': tile(501000), 'c.tif': new Error('corrupted'), 'x-a.tif': tile(503000) },
    });

    const report = await convert({ ...options, readers });
    expect(report.fatal).toBeNull();
    expect(report.collectionsBuilt).toBe(0);
    expect(report.warnings).toContainEqual({
      code: 'DuplicateItemId',
      ref: NMT,
      message: `Item id x-a occurs more than once in collection ${NMT}`,
    });
    expect(report.write?.preserved).toEqual([NMT, `${NMT}/a`, `${NMT}/b`]);
    expect(await readTree(options.outputFolder)).toEqual(first);
  });

  describe('sheet indexes', () => {
    const outline: Polygon = {
      type: 'Polygon',
      coordinates: [
        [
          [20, 51],
          [21, 51],
          [20.5, 52],
          [20, 51],
        ],
      ],
    };

    beforeEach(async () => {
      await writeFiles(options.inputFolder, {
        'orto/dataset.json': '{"kind":"sheet-index"}',
        'orto/arkusze_2020.parquet': PARQUET_BYTES,
        'orto/arkusze_2021.parquet': PARQUET_BYTES,
        'orto/readme.txt': 'opis',
      });
    });

    function sheetReaders(records2021: VectorRecord[]): Readers {
      return fakeReaders({
        raster: { 'a.tif': tile(500000), 'b.tif': tile(501000), 'c.tif': new Error('corrupted') },
        vector: {
          'arkusze_2020.parquet': { crs: undefined, records: [{ geometry: null, properties: sheetRow('a.2020', 2020, 50, 19) }] },
          'arkusze_2021.parquet': { crs: undefined, records: records2021 },
        },
      });
    }

    it('should nest the sheets of each index under one collection per year', async () => {
      const readers = sheetReaders([{ geometry: outline, properties: sheetRow('a.2021', 2021, 51, 20) }]);
      const report = await convert({ ...options, readers, catalogCrs: 'EPSG:4326' });

      expect(report.write?.inserted).toEqual([
        NMT,
        `${NMT}/a`,
        `${NMT}/b`,
        ORTO,
        `${ORTO}.2020`,
        `${ORTO}.2020/a.2020`,
        `${ORTO}.2021`,
        `${ORTO}.2021/a.2021`,
      ]);
      const root = await readJson('catalog.json');
      expect(root.links).toContainEqual({
        rel: 'child',
        href: `./${ORTO}/collection.json`,
        type: 'application/json',
        title: 'Ortofotomapy',
      });
      expect(root.links).not.toContainEqual(expect.objectContaining({ href: `./${ORTO}.2020/collection.json` }));

      const parent = await readJson(ORTO, 'collection.json');
      expect(parent.title).toBe(SHEET_PARENT_TEXT.title);
      expect(parent.description).toBe(SHEET_PARENT_TEXT.description);
      expect(parent.keywords).toEqual(SHEET_KEYWORDS);
      expect(parent.extent).toEqual({
        spatial: { bbox: [[19, 50, 21, 52]] },
        temporal: { interval: [['2020-05-31T22:00:00.000Z', '2021-06-01T21:59:59.999Z']] },
      });

      const child = await readJson(`${ORTO}.2021`, 'collection.json');
      expect(child.title).toBe('2021');
      expect(child.description).toBe('Arkusze ortofotomapy z roku: 2021');
      expect(child.links).toContainEqual({
        rel: 'parent',
        href: `../${ORTO}/collection.json`,
        type: 'application/json',
        title: 'Ortofotomapy',
      });

      const sheet = await readJson(`${ORTO}.2021`, 'a.2021', 'a.2021.json');
      expect(sheet.geometry).toEqual(outline);
      const unoutlined = await readJson(`${ORTO}.2020`, 'a.2020', 'a.2020.json');
      expect(unoutlined.geometry).toEqual({
        type: 'Polygon',
        coordinates: [
          [
            [19, 50],
            [20, 50],
            [20, 51],
            [19, 51],
            [19, 50],
          ],
        ],
      });
    });

    it(
      'should report every unreadable row of a very large sheet index',
      async () => {
        const records: VectorRecord[] = [{ geometry: null, properties: sheetRow('a.2021', 2021, 51, 20) }];
        for (let i = 0; i < 200_000; i++) {
          records.push({ geometry: null, properties: { gml_id: `broken.${i}` } });
        }
        const report = await convert({ ...options, readers: sheetReaders(records) });

        expect(report.fatal).toBeNull();
        expect(report.itemsBuilt).toBe(4);
        expect(report.warnings).toHaveLength(200_002);
        expect(report.warnings[200_001]).toEqual({
          code: 'UnexpectedError',
          ref: 'orto/arkusze_2021.parquet#200000',
          message: 'column lowerCorner is empty',
        });
      },
      60_000
    );
  });
});
