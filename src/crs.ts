/**
 * Coordinate reference systems
 *
 * Normalizes the many spellings of a CRS found in source data to an `EPSG:n` identifier and
 * reprojects bounding boxes and geometries between identifiers with proj4.
 */

import proj4 from 'proj4';
import { EnvelopeBuilder, validateBbox } from './bbox.js';
import { DEFAULT_CRS } from './constants.js';
import { UnsupportedCrsError } from './errors.js';
import type { BoundingBox, Extent, Geometry, Position } from './types.js';

// Polish national grids. EPSG:4326 and EPSG:3857 ship with proj4.
proj4.defs(
  'EPSG:2180',
  '+proj=tmerc +lat_0=0 +lon_0=19 +k=0.9993 +x_0=500000 +y_0=-5300000 +ellps=GRS80 +towgs84=0,0,0,0,0,0,0 +units=m +no_defs'
);
proj4.defs(
  'EPSG:2176',
  '+proj=tmerc +lat_0=0 +lon_0=15 +k=0.999923 +x_0=5500000 +y_0=0 +ellps=GRS80 +towgs84=0,0,0,0,0,0,0 +units=m +no_defs'
);
proj4.defs(
  'EPSG:2177',
  '+proj=tmerc +lat_0=0 +lon_0=18 +k=0.999923 +x_0=6500000 +y_0=0 +ellps=GRS80 +towgs84=0,0,0,0,0,0,0 +units=m +no_defs'
);
proj4.defs(
  'EPSG:2178',
  '+proj=tmerc +lat_0=0 +lon_0=21 +k=0.999923 +x_0=7500000 +y_0=0 +ellps=GRS80 +towgs84=0,0,0,0,0,0,0 +units=m +no_defs'
);
proj4.defs(
  'EPSG:2179',
  '+proj=tmerc +lat_0=0 +lon_0=24 +k=0.999923 +x_0=8500000 +y_0=0 +ellps=GRS80 +towgs84=0,0,0,0,0,0,0 +units=m +no_defs'
);
proj4.defs('EPSG:4258', '+proj=longlat +ellps=GRS80 +towgs84=0,0,0,0,0,0,0 +no_defs');

/** Names used for the national grids in GUGiK data */
export const CRS_ALIASES: Record<string, string> = {
  'PL-1992': 'EPSG:2180',
  'PL-2000:S5': 'EPSG:2176',
  'PL-2000:S6': 'EPSG:2177',
  'PL-2000:S7': 'EPSG:2178',
  'PL-2000:S8': 'EPSG:2179',
  'CRS:84': 'EPSG:4326',
  'OGC:CRS84': 'EPSG:4326',
  'CRS84': 'EPSG:4326',
};

/** Points sampled along each edge so curved edges stay inside the reprojected box */
const EDGE_SAMPLES = 21;

/**
 * Check whether proj4 knows the definition for an identifier
 */
export function isKnownCrs(code: string): boolean {
  return proj4.defs(code) !== undefined;
}

function fromProjJson(value: object): string | null {
  if (!('id' in value)) return null;
  const { id } = value;
  if (id && typeof id === 'object' && 'authority' in id && 'code' in id) {
    const { authority, code } = id;
    if (typeof authority === 'string' && (typeof code === 'number' || typeof code === 'string')) {
      return `${authority}:${code}`;
    }
  }
  return null;
}

/**
 * Normalize a CRS given as an EPSG code, URN, OGC URL, alias or PROJJSON object.
 *
 * @param input - the CRS as found in the source. Null or undefined means OGC:CRS84.
 * @param ref - the source the CRS came from, for error messages
 * @returns an `EPSG:n` identifier known to proj4
 * @throws UnsupportedCrsError if the CRS cannot be normalized
 */
export function normalizeCrs(input: unknown, ref?: string): string {
  if (input === null || input === undefined) return DEFAULT_CRS;

  let candidate: string | null = null;
  if (typeof input === 'number' && Number.isInteger(input)) {
    candidate = `EPSG:${input}`;
  } else if (typeof input === 'string') {
    candidate = input.trim();
  } else if (typeof input === 'object') {
    candidate = fromProjJson(input);
  }
  if (!candidate) {
    throw new UnsupportedCrsError(JSON.stringify(input), ref);
  }

  const alias = CRS_ALIASES[candidate.toUpperCase()];
  if (alias) return alias;

  // detect opengis.net PURLs and URNs
  const purl = /opengis\.net\/def\/crs\/(EPSG|OGC)\/[^/]+\/(\w+)$/i.exec(candidate);
  const urn = /^urn:ogc:def:crs:(EPSG|OGC):[^:]*:(\w+)$/i.exec(candidate);
  const match = purl ?? urn;
  if (match) {
    candidate = match[1].toUpperCase() === 'OGC' ? `OGC:${match[2]}` : `EPSG:${match[2]}`;
    const ogcAlias = CRS_ALIASES[candidate.toUpperCase()];
    if (ogcAlias) return ogcAlias;
  }

  const epsg = /^epsg:(\d+)$/i.exec(candidate);
  if (epsg) {
    const code = `EPSG:${epsg[1]}`;
    if (isKnownCrs(code)) return code;
  }
  throw new UnsupportedCrsError(candidate, ref);
}

/**
 * Reproject a bounding box, densifying its edges so the result covers the whole source box.
 *
 * @param bbox - box in `from` coordinates
 * @param from - normalized source CRS
 * @param to - normalized target CRS
 * @returns the covering box in `to` coordinates
 */
export function reprojectBbox(bbox: BoundingBox, from: string, to: string): BoundingBox {
  if (from === to) return bbox;
  if (!isKnownCrs(from)) throw new UnsupportedCrsError(from);
  if (!isKnownCrs(to)) throw new UnsupportedCrsError(to);

  const converter = proj4(from, to);
  const envelope = new EnvelopeBuilder();
  for (let i = 0; i < EDGE_SAMPLES; i++) {
    const t = i / (EDGE_SAMPLES - 1);
    const x = bbox.xmin + (bbox.xmax - bbox.xmin) * t;
    const y = bbox.ymin + (bbox.ymax - bbox.ymin) * t;
    for (const point of [
      [x, bbox.ymin],
      [x, bbox.ymax],
      [bbox.xmin, y],
      [bbox.xmax, y],
    ]) {
      const [px, py] = converter.forward(point);
      envelope.addPosition([px, py]);
    }
  }
  const result = envelope.result();
  if (!result) {
    throw new UnsupportedCrsError(`${from} -> ${to}`);
  }
  return validateBbox(result);
}

/**
 * Express an extent in another CRS. The temporal range is carried over unchanged.
 */
export function reprojectExtent(extent: Extent, to: string): Extent {
  if (extent.crs === to) return extent;
  return Object.freeze({
    ...extent,
    bbox: reprojectBbox(extent.bbox, extent.crs, to),
    crs: to,
  });
}


function mapPositions(geometry: Geometry, move: (position: Position) => Position): Geometry {
  switch (geometry.type) {
    case 'Point':
      return { type: 'Point', coordinates: move(geometry.coordinates) };
    case 'MultiPoint':
      return { type: 'MultiPoint', coordinates: geometry.coordinates.map(move) };
    case 'LineString':
      return { type: 'LineString', coordinates: geometry.coordinates.map(move) };
    case 'MultiLineString':
      return { type: 'MultiLineString', coordinates: geometry.coordinates.map((line) => line.map(move)) };
    case 'Polygon':
      return { type: 'Polygon', coordinates: geometry.coordinates.map((ring) => ring.map(move)) };
    case 'MultiPolygon':
      return {
        type: 'MultiPolygon',
        coordinates: geometry.coordinates.map((polygon) => polygon.map((ring) => ring.map(move))),
      };
    case 'GeometryCollection':
      return {
        type: 'GeometryCollection',
        geometries: geometry.geometries.map((member) => mapPositions(member, move)),
      };
  }
}

/**
 * Reproject every vertex of a geometry. Heights are carried over unchanged.
 *
 * @param geometry - geometry in `from` coordinates
 * @param from - normalized source CRS
 * @param to - normalized target CRS
 */
export function reprojectGeometry(geometry: Geometry, from: string, to: string): Geometry {
  if (from === to) return geometry;
  if (!isKnownCrs(from)) throw new UnsupportedCrsError(from);
  if (!isKnownCrs(to)) throw new UnsupportedCrsError(to);

  const converter = proj4(from, to);
  return mapPositions(geometry, (position) => {
    const [x, y] = converter.forward([position[0], position[1]]);
    return position.length === 3 ? [x, y, position[2]] : [x, y];
  });
}
