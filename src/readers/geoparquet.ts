/**
 * GeoParquet vector reader
 *
 * Reads the primary geometry column (WKB) and the optional covering `bbox` struct column of
 * every row, and the CRS from the file's `geo` metadata.
 */

import { z } from 'zod';
import { readParquetFile } from '../parquet.js';
import type { BoundingBox } from '../types.js';
import { decodeGeometry } from '../wkb.js';
import type { VectorDataset, VectorReader, VectorRecord } from './types.js';

const geoMetadataSchema = z.object({
  primary_column: z.string().default('geometry'),
  columns: z.record(
    z
      .object({
        encoding: z.string().optional(),
        crs: z.unknown(),
      })
      .passthrough()
  ),
});

export type GeoMetadata = z.infer<typeof geoMetadataSchema>;

/**
 * Parse the `geo` key-value metadata entry of a GeoParquet file.
 *
 * @param raw - the JSON text, or undefined when the file has no entry
 * @returns the parsed metadata, or null for a plain parquet file
 * @throws Error if the entry is present but malformed
 */
export function parseGeoMetadata(raw: string | undefined): GeoMetadata | null {
  if (raw === undefined) return null;
  const result = geoMetadataSchema.safeParse(JSON.parse(raw));
  if (!result.success) {
    throw new Error(`Invalid GeoParquet metadata: ${result.error.issues.map((i) => i.message).join(', ')}`);
  }
  return result.data;
}

/**
 * Read a covering bbox struct (`{xmin, ymin, xmax, ymax}`) from a row value
 */
function rowBbox(value: unknown): BoundingBox | undefined {
  if (!value || typeof value !== 'object') return undefined;
  if (!('xmin' in value && 'ymin' in value && 'xmax' in value && 'ymax' in value)) return undefined;
  const { xmin, ymin, xmax, ymax } = value;
  if (
    typeof xmin !== 'number' ||
    typeof ymin !== 'number' ||
    typeof xmax !== 'number' ||
    typeof ymax !== 'number'
  ) {
    return undefined;
  }
  return { xmin, ymin, xmax, ymax };
}

/**
 * Convert a parquet row to a vector record
 */
export function rowToRecord(row: Record<string, unknown>, geometryColumn: string): VectorRecord {
  const geometry = decodeGeometry(row[geometryColumn]);

  // Build properties from all columns except geometry and bbox
  const properties: Record<string, unknown> = {};
  for (const key of Object.keys(row)) {
    if (key !== geometryColumn && key !== 'bbox') {
      properties[key] = row[key];
    }
  }

  return { geometry, bbox: rowBbox(row.bbox), properties };
}

export class GeoParquetReader implements VectorReader {
  async open(path: string): Promise<VectorDataset> {
    const { rows, metadata } = await readParquetFile(path);
    const geo = parseGeoMetadata(metadata.get('geo'));
    const geometryColumn = geo?.primary_column ?? 'geometry';
    const column = geo?.columns[geometryColumn];
    // An explicit null CRS means "unknown"; a missing one means OGC:CRS84
    const crs = column && 'crs' in column && column.crs === null ? 'unknown' : column?.crs;

    return {
      crs,
      records: rows.map((row) => rowToRecord(row, geometryColumn)),
    };
  }
}
