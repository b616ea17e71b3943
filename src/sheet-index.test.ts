import { describe, it, expect } from 'vitest';
import {
  localDayRange,
  parseCorner,
  readSheetIndex,
  sheetCollectionId,
  sheetCollectionText,
  sheetEntry,
} from './sheet-index.js';
import type { Polygon } from './types.js';

const ZONE = 'Europe/Warsaw';

const row = {
  gml_id: 'sheet.1',
  lowerCorner: '50.0 19.0',
  upperCorner: '50.1 19.2',
  timePosition: '2021-05-14',
  url_do_pobrania: 'https://example.com/sheet1.tif',
  zrodlo_danych: 'Zdj. analogowe',
  godlo: 'M-34-64-C-c-1-1',
  kolor: 'RGB',
  piksel: 0.25,
  uklad_xy: 'PL-1992',
  wlk_pliku_MB: 1.5,
  akt_rok: 2021n,
  'dt_pzgik|timePosition': '2021-06-01',
  czy_ark_wypelniony: 'TAK',
  nr_zglosz: 'GI-1',
  modul_archiwizacji: 'M1',
};

describe('Sheet index', () => {
  describe('localDayRange', () => {
    it('should cover a summer day in Warsaw', () => {
      expect(localDayRange('2021-05-14', ZONE)).toEqual({
        start: '2021-05-13T22:00:00.000Z',
        end: '2021-05-14T21:59:59.999Z',
      });
    });

    it('should cover a winter day and ignore the time part', () => {
      expect(localDayRange('2021-01-10T15:30:00', ZONE)).toEqual({
        start: '2021-01-09T23:00:00.000Z',
        end: '2021-01-10T22:59:59.999Z',
      });
    });

    it('should cover the short day when clocks go forward', () => {
      expect(localDayRange('2021-03-28', ZONE)).toEqual({
        start: '2021-03-27T23:00:00.000Z',
        end: '2021-03-28T21:59:59.999Z',
      });
    });

    it('should reject values that are not dates', () => {
      expect(() => localDayRange('14.05.2021', ZONE)).toThrow('invalid date "14.05.2021"');
    });
  });

  it('should read corners as latitude then longitude', () => {
    expect(parseCorner(' 52.1  21.0 ')).toEqual([21, 52.1]);
    expect(() => parseCorner('52.1')).toThrow('invalid corner');
  });

  it('should map a row to a sheet entry', () => {
    expect(sheetEntry(row, ZONE)).toEqual({
      id: 'sheet.1',
      bbox: { xmin: 19, ymin: 50, xmax: 19.2, ymax: 50.1 },
      temporal: { start: '2021-05-13T22:00:00.000Z', end: '2021-05-14T21:59:59.999Z' },
      url: 'https://example.com/sheet1.tif',
      sizeBytes: 1572864,
      year: 2021,
      properties: {
        title: 'Zdj. analogowe: M-34-64-C-c-1-1 - 2021-05-14 - RGB',
        description: [
          'Zdj. analogowe',
          '- rodzaj zdjęcia: Kolor (RGB)',
          '- data zdjęcia: 2021-05-14',
          '- data przyjęcia do zasobu: 2021-06-01',
          '- id obszaru: M-34-64-C-c-1-1',
          '- czy arkusz w pełni wypełniony: TAK',
          '- numer zgłoszenia: GI-1',
          '- moduł archiwizacji: M1',
          '',
        ].join('\n'),
        gsd: 0.25,
        'proj:code': 'EPSG:2180',
      },
    });
  });

  it('should fill gaps with placeholders', () => {
    const entry = sheetEntry(
      {
        gml_id: 'sheet 2',
        lowerCorner: '50 19',
        upperCorner: '51 20',
        timePosition: '2020-07-01',
        url_do_pobrania: 'https://example.com/sheet2.tif',
        kolor: 'XYZ',
      },
      ZONE
    );
    expect(entry.id).toBe('sheet_2');
    expect(entry.properties.title).toBe('brak danych: brak danych - 2020-07-01 - XYZ');
    expect(entry.properties.gsd).toBeNull();
    expect(entry.properties['proj:code']).toBeNull();
    expect(entry).not.toHaveProperty('sizeBytes');
    expect(String(entry.properties.description).split('\n')[1]).toBe('- rodzaj zdjęcia: brak danych (XYZ)');
  });

  it('should report rows that cannot be mapped and keep the rest', () => {
    const { url_do_pobrania: _url, ...withoutUrl } = row;
    const index = readSheetIndex(
      [
        { geometry: null, properties: row },
        { geometry: null, properties: withoutUrl },
      ],
      'orto/index.parquet',
      ZONE
    );
    expect(index.entries.map((entry) => entry.id)).toEqual(['sheet.1']);
    expect(index.warnings).toEqual([
      { code: 'UnexpectedError', ref: 'orto/index.parquet#1', message: 'column url_do_pobrania is empty' },
    ]);
  });

  it('should describe a collection by the years of its sheets', () => {
    expect(sheetCollectionText([])).toBeUndefined();
    expect(sheetCollectionText([2021, 2021])).toEqual({ title: '2021', description: 'Arkusze ortofotomapy z roku: 2021' });
    expect(sheetCollectionText([2022, 2019])).toEqual({ title: '2019-2022', description: 'Arkusze ortofotomapy z lat: 2019-2022' });
  });

  it('should describe a collection holding a very large number of sheets', () => {
    const years = Array.from({ length: 200_000 }, (_value, i) => 2000 + (i % 24));
    expect(sheetCollectionText(years)).toEqual({ title: '2000-2023', description: 'Arkusze ortofotomapy z lat: 2000-2023' });
  });

  it('should name nested collections by year and fall back to the index name', () => {
    expect(sheetCollectionId('poland.gugik.orto', [2021], 'index')).toBe('poland.gugik.orto.2021');
    expect(sheetCollectionId('poland.gugik.orto', [2019, 2020], 'index')).toBe('poland.gugik.orto.2019-2020');
    expect(sheetCollectionId('poland.gugik.orto', [], 'archiwum-index')).toBe('poland.gugik.orto.archiwum-index');
  });

  it('should keep the outline stored with each row', () => {
    const outline: Polygon = {
      type: 'Polygon',
      coordinates: [
        [
          [19, 50],
          [20, 50],
          [20, 51],
          [19, 50],
        ],
      ],
    };
    const index = readSheetIndex([{ geometry: outline, properties: row }], 'orto/index.parquet', ZONE);
    expect(index.entries[0].geometry).toEqual(outline);
  });
});
