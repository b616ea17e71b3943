/**
 * Orthophoto sheet indexes
 *
 * A sheet index lists the downloadable orthophoto sheets of an area, one row per sheet. Each row
 * becomes one item with a remote GeoTIFF asset. Dates in the index are local to Poland.
 */

import { addDays, format, parseISO, subMilliseconds } from 'date-fns';
import { fromZonedTime } from 'date-fns-tz';
import _ from 'lodash';
import { CRS_ALIASES } from './crs.js';
import { toWarning } from './errors.js';
import type { RunWarning } from './errors.js';
import { sanitizeId } from './item-assembler.js';
import type { VectorRecord } from './readers/types.js';
import type { BoundingBox, Geometry, TemporalRange } from './types.js';

export const SHEET_KEYWORDS = ['ortofotomapa', 'ortofoto', 'zdjęcia lotnicze'];

/** Text of the collection holding one child collection per sheet index */
export const SHEET_PARENT_TEXT = {
  title: 'Ortofotomapy',
  description: 'Kolekcja z arkuszami ortofotomap, które można pobrać. Podzielona latami.',
};

const IMAGE_TYPES: Record<string, string> = {
  'B/W': 'Odcienie szarości',
  RGB: 'Kolor',
  CIR: 'Bliska podczerwień',
};

const MISSING = 'brak danych';

const BYTES_PER_MB = 1024 * 1024;

/**
 * Everything one index row contributes to its item
 */
export interface SheetEntry {
  id: string;
  bbox: BoundingBox;
  temporal: TemporalRange;
  url: string;
  sizeBytes?: number;
  year?: number;
  /** Sheet outline as stored in the index, in the index's CRS */
  geometry?: Geometry;
  properties: Record<string, unknown>;
}

export interface SheetIndex {
  entries: SheetEntry[];
  warnings: RunWarning[];
}

function stringValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() || undefined;
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') return String(value);
  return undefined;
}

function numberValue(value: unknown): number | undefined {
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function required(properties: Record<string, unknown>, column: string): string {
  const value = stringValue(properties[column]);
  if (value === undefined) {
    throw new Error(`column ${column} is empty`);
  }
  return value;
}

/**
 * Parse a `lowerCorner` / `upperCorner` value, given as "latitude longitude"
 *
 * @returns the corner as [longitude, latitude]
 */
export function parseCorner(value: string): [number, number] {
  const parts = value.trim().split(/\s+/).map(Number);
  if (parts.length !== 2 || !parts.every((p) => Number.isFinite(p))) {
    throw new Error(`invalid corner "${value}"`);
  }
  const [lat, lon] = parts;
  return [lon, lat];
}

/**
 * The UTC range covering one local calendar day.
 *
 * @param day - an ISO date, optionally with a time part that is ignored
 * @param timeZone - IANA zone the day is local to
 * @returns the range from local midnight to the last millisecond of the day
 */
export function localDayRange(day: string, timeZone: string): TemporalRange {
  const date = day.slice(0, 10);
  const parsed = parseISO(date);
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date) || Number.isNaN(parsed.getTime())) {
    throw new Error(`invalid date "${day}"`);
  }
  const nextDay = format(addDays(parsed, 1), 'yyyy-MM-dd');
  const start = fromZonedTime(`${date}T00:00:00`, timeZone);
  const end = subMilliseconds(fromZonedTime(`${nextDay}T00:00:00`, timeZone), 1);
  return { start: start.toISOString(), end: end.toISOString() };
}

/**
 * Multi-line description of a sheet
 */
export function sheetDescription(properties: Record<string, unknown>): string {
  const value = (column: string): string => stringValue(properties[column]) ?? MISSING;
  const kolor = value('kolor');
  return [
    value('zrodlo_danych'),
    `- rodzaj zdjęcia: ${IMAGE_TYPES[kolor] ?? MISSING} (${kolor})`,
    `- data zdjęcia: ${value('timePosition')}`,
    `- data przyjęcia do zasobu: ${value('dt_pzgik|timePosition')}`,
    `- id obszaru: ${value('godlo')}`,
    `- czy arkusz w pełni wypełniony: ${value('czy_ark_wypelniony')}`,
    `- numer zgłoszenia: ${value('nr_zglosz')}`,
    `- moduł archiwizacji: ${value('modul_archiwizacji')}`,
    '',
  ].join('\n');
}

/**
 * Map one index row to a sheet entry.
 *
 * @param properties - the row's columns
 * @param timeZone - zone the row's dates are local to
 * @returns the entry
 * @throws Error if a required column is missing or malformed
 */
export function sheetEntry(properties: Record<string, unknown>, timeZone: string): SheetEntry {
  const id = sanitizeId(required(properties, 'gml_id'));
  const [xmin, ymin] = parseCorner(required(properties, 'lowerCorner'));
  const [xmax, ymax] = parseCorner(required(properties, 'upperCorner'));
  const timePosition = required(properties, 'timePosition');
  const crsName = stringValue(properties.uklad_xy);
  const megabytes = numberValue(properties.wlk_pliku_MB);

  const entry: SheetEntry = {
    id,
    bbox: { xmin, ymin, xmax, ymax },
    temporal: localDayRange(timePosition, timeZone),
    url: required(properties, 'url_do_pobrania'),
    properties: {
      title: `${stringValue(properties.zrodlo_danych) ?? MISSING}: ${stringValue(properties.godlo) ?? MISSING} - ${timePosition} - ${stringValue(properties.kolor) ?? MISSING}`,
      description: sheetDescription(properties),
      gsd: numberValue(properties.piksel) ?? null,
      'proj:code': (crsName && CRS_ALIASES[crsName]) ?? null,
    },
  };
  if (megabytes !== undefined) entry.sizeBytes = Math.round(megabytes * BYTES_PER_MB);
  const year = numberValue(properties.akt_rok);
  if (year !== undefined) entry.year = year;
  return entry;
}

/**
 * Map every row of a sheet index. Rows that cannot be mapped are reported and skipped.
 *
 * @param records - the index rows
 * @param ref - the index file, relative to the input root
 * @param timeZone - zone the dates are local to
 */
export function readSheetIndex(records: Iterable<VectorRecord>, ref: string, timeZone: string): SheetIndex {
  const entries: SheetEntry[] = [];
  const warnings: RunWarning[] = [];
  let row = 0;
  for (const record of records) {
    try {
      const entry = sheetEntry(record.properties, timeZone);
      if (record.geometry) entry.geometry = record.geometry;
      entries.push(entry);
    } catch (error) {
      warnings.push(toWarning(error, `${ref}#${row}`));
    }
    row++;
  }
  return { entries, warnings };
}

/**
 * Collection description from the years of the sheets it holds
 *
 * @returns the title and description, or undefined when no year is known
 */
export function sheetCollectionText(years: readonly number[]): { title: string; description: string } | undefined {
  const min = _.min(years);
  const max = _.max(years);
  if (min === undefined || max === undefined) return undefined;
  if (min === max) {
    return { title: String(min), description: `Arkusze ortofotomapy z roku: ${min}` };
  }
  return { title: `${min}-${max}`, description: `Arkusze ortofotomapy z lat: ${min}-${max}` };
}

/**
 * Id of the child collection holding the sheets of one index: the parent id followed by the
 * year or range of years of the sheets, or by the index name when no year is known.
 *
 * @param parentId - id of the sheet-index dataset's collection
 * @param years - years of the index's sheets
 * @param indexKey - group key of the index file
 */
export function sheetCollectionId(parentId: string, years: readonly number[], indexKey: string): string {
  return `${parentId}.${sheetCollectionText(years)?.title ?? sanitizeId(indexKey)}`;
}
