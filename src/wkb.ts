/**
 * Geometry column decoding
 *
 * GeoParquet writers store the primary geometry as WKB bytes; some older exports hold hex
 * encoded WKB or WKT text instead. All three decode with @loaders.gl/wkt.
 */

import { WKBLoader, WKTLoader } from '@loaders.gl/wkt';
import { parseSync } from '@loaders.gl/core';
import logger from './log.js';
import type { Geometry } from './types.js';

const log = logger.child({ component: 'wkb' });

const GEOMETRY_TYPES = new Set([
  'Point',
  'MultiPoint',
  'LineString',
  'MultiLineString',
  'Polygon',
  'MultiPolygon',
  'GeometryCollection',
]);

const HEX = /^(?:[0-9a-f]{2})+$/i;

export function isGeometry(value: unknown): value is Geometry {
  if (!value || typeof value !== 'object' || !('type' in value)) return false;
  if (typeof value.type !== 'string' || !GEOMETRY_TYPES.has(value.type)) return false;
  return value.type === 'GeometryCollection' ? 'geometries' in value : 'coordinates' in value;
}

function parseWkb(bytes: Uint8Array): unknown {
  // loaders.gl wants a plain ArrayBuffer holding exactly the geometry
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return parseSync(buffer, WKBLoader);
}

/**
 * Decode a geometry cell.
 *
 * @param value - WKB bytes, hex encoded WKB, or WKT
 * @returns the GeoJSON geometry, or null when the cell is empty or cannot be decoded
 */
export function decodeGeometry(value: unknown): Geometry | null {
  if (value === null || value === undefined) return null;
  try {
    let geometry: unknown = null;
    if (value instanceof Uint8Array) {
      geometry = parseWkb(value);
    } else if (typeof value === 'string' && HEX.test(value)) {
      geometry = parseWkb(Buffer.from(value, 'hex'));
    } else if (typeof value === 'string') {
      geometry = parseSync(value, WKTLoader);
    }
    return isGeometry(geometry) ? geometry : null;
  } catch (error) {
    log.warn(`Failed to decode geometry: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}
