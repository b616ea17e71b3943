/**
 * Extent Resolver
 *
 * Reads the native spatial and temporal extent of a single source. The source's own CRS is kept;
 * reprojection to the catalog CRS happens when extents are combined into an item.
 */

import { EnvelopeBuilder } from './bbox.js';
import { normalizeCrs } from './crs.js';
import { CatalogError, UnreadableSourceError } from './errors.js';
import { createExtent } from './extent.js';
import type { Readers } from './readers/types.js';
import type { BoundingBox, Extent, TemporalRange } from './types.js';

export interface VectorExtentSource {
  kind: 'vector';
  ref: string;
  path: string;
  /** Column holding the record timestamps */
  datetimeColumn?: string;
}

export interface RasterExtentSource {
  kind: 'raster';
  ref: string;
  path: string;
}

/**
 * An extent declared by the source itself, such as a capabilities layer or an index row
 */
export interface DeclaredExtentSource {
  kind: 'declared';
  ref: string;
  bbox: BoundingBox | null;
  crs: unknown;
  temporal?: TemporalRange;
}

export type ExtentSource = VectorExtentSource | RasterExtentSource | DeclaredExtentSource;

function toInstant(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  let date: Date;
  if (value instanceof Date) {
    date = value;
  } else if (typeof value === 'string' || typeof value === 'number') {
    date = new Date(value);
  } else if (typeof value === 'bigint') {
    date = new Date(Number(value));
  } else {
    return null;
  }
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

async function resolveVector(source: VectorExtentSource, readers: Readers): Promise<Extent> {
  const dataset = await readers.vector.open(source.path);
  const crs = normalizeCrs(dataset.crs, source.ref);

  const envelope = new EnvelopeBuilder();
  let start: string | null = null;
  let end: string | null = null;
  for (const record of dataset.records) {
    if (record.bbox) {
      envelope.addBbox(record.bbox);
    } else if (record.geometry) {
      envelope.addGeometry(record.geometry);
    }
    if (source.datetimeColumn) {
      const instant = toInstant(record.properties[source.datetimeColumn]);
      if (instant !== null) {
        if (start === null || instant < start) start = instant;
        if (end === null || instant > end) end = instant;
      }
    }
  }

  const bbox = envelope.result();
  if (!bbox) {
    throw new UnreadableSourceError(source.ref, 'no records with a geometry');
  }
  return createExtent(bbox, crs, start !== null ? { start, end } : undefined);
}

async function resolveRaster(source: RasterExtentSource, readers: Readers): Promise<Extent> {
  const info = await readers.raster.open(source.path);
  return createExtent(info.bbox, normalizeCrs(info.crs, source.ref));
}

function resolveDeclared(source: DeclaredExtentSource): Extent {
  if (!source.bbox) {
    throw new UnreadableSourceError(source.ref, 'no declared bounding box');
  }
  return createExtent(source.bbox, normalizeCrs(source.crs, source.ref), source.temporal);
}

/**
 * Resolve the native extent of a source.
 *
 * @param source - what to read and how
 * @param readers - the format readers
 * @returns the frozen extent in the source's own CRS
 * @throws UnsupportedCrsError if the CRS cannot be normalized
 * @throws UnreadableSourceError for anything else that goes wrong
 */
export async function resolveExtent(source: ExtentSource, readers: Readers): Promise<Extent> {
  try {
    switch (source.kind) {
      case 'vector':
        return await resolveVector(source, readers);
      case 'raster':
        return await resolveRaster(source, readers);
      case 'declared':
        return resolveDeclared(source);
    }
  } catch (error) {
    if (error instanceof CatalogError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new UnreadableSourceError(source.ref, reason, { cause: error });
  }
}
