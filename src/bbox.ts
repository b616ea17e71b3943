/**
 * Bounding box arithmetic
 *
 * Envelopes of geometries, unions, containment and conversion to the array and
 * polygon forms STAC documents use. Boxes are plain values and are never edited in place.
 */

import type { BoundingBox, Geometry, Polygon, Position } from './types.js';

/**
 * Check that `outer` fully contains `inner` (edges may touch)
 */
export function bboxContains(outer: BoundingBox, inner: BoundingBox): boolean {
  return (
    outer.xmin <= inner.xmin &&
    outer.ymin <= inner.ymin &&
    outer.xmax >= inner.xmax &&
    outer.ymax >= inner.ymax
  );
}

/**
 * Smallest box covering both inputs
 */
export function bboxUnion(a: BoundingBox, b: BoundingBox): BoundingBox {
  return {
    xmin: Math.min(a.xmin, b.xmin),
    ymin: Math.min(a.ymin, b.ymin),
    xmax: Math.max(a.xmax, b.xmax),
    ymax: Math.max(a.ymax, b.ymax),
  };
}

/**
 * Validate corner order and finiteness. Degenerate boxes (a point, a line) are valid.
 *
 * @throws Error if the box is not usable
 */
export function validateBbox(bbox: BoundingBox): BoundingBox {
  const values = [bbox.xmin, bbox.ymin, bbox.xmax, bbox.ymax];
  if (!values.every((v) => Number.isFinite(v))) {
    throw new Error('Invalid bounding box: all coordinates must be finite numbers');
  }
  if (bbox.xmin > bbox.xmax || bbox.ymin > bbox.ymax) {
    throw new Error(
      'Invalid bounding box: xmin must not exceed xmax, ymin must not exceed ymax'
    );
  }
  return bbox;
}

export function bboxToArray(bbox: BoundingBox): [number, number, number, number] {
  return [bbox.xmin, bbox.ymin, bbox.xmax, bbox.ymax];
}

export function bboxFromArray(values: readonly number[]): BoundingBox {
  if (values.length !== 4) {
    throw new Error(`Expected bounding box to have 4 bounds, got ${values.length}`);
  }
  const [xmin, ymin, xmax, ymax] = values;
  return validateBbox({ xmin, ymin, xmax, ymax });
}

/**
 * Accumulates the envelope of any number of positions
 */
export class EnvelopeBuilder {
  private box: BoundingBox | null = null;

  addPosition(position: Position): void {
    const [x, y] = position;
    if (!Number.isFinite(x) || !Number.isFinite(y)) return;
    this.addBbox({ xmin: x, ymin: y, xmax: x, ymax: y });
  }

  addBbox(bbox: BoundingBox): void {
    this.box = this.box ? bboxUnion(this.box, bbox) : bbox;
  }

  addGeometry(geometry: Geometry): void {
    switch (geometry.type) {
      case 'Point':
        this.addPosition(geometry.coordinates);
        break;
      case 'MultiPoint':
      case 'LineString':
        geometry.coordinates.forEach((p) => this.addPosition(p));
        break;
      case 'MultiLineString':
      case 'Polygon':
        geometry.coordinates.forEach((line) => line.forEach((p) => this.addPosition(p)));
        break;
      case 'MultiPolygon':
        geometry.coordinates.forEach((polygon) =>
          polygon.forEach((ring) => ring.forEach((p) => this.addPosition(p)))
        );
        break;
      case 'GeometryCollection':
        geometry.geometries.forEach((g) => this.addGeometry(g));
        break;
    }
  }

  /** The envelope so far, or null when nothing with coordinates was added */
  result(): BoundingBox | null {
    return this.box;
  }
}

/**
 * Envelope of a single geometry, or null for an empty geometry
 */
export function geometryEnvelope(geometry: Geometry): BoundingBox | null {
  const builder = new EnvelopeBuilder();
  builder.addGeometry(geometry);
  return builder.result();
}

/**
 * Creates a GeoJSON polygon for a bounding box, counter-clockwise from the south-west corner
 *
 * @param bbox - the bounding box to create a geometry from
 * @returns a Polygon representation of the box
 */
export function bboxToGeometry(bbox: BoundingBox): Polygon {
  const { xmin: west, ymin: south, xmax: east, ymax: north } = bbox;
  return {
    type: 'Polygon',
    coordinates: [[
      [west, south],
      [east, south],
      [east, north],
      [west, north],
      [west, south],
    ]],
  };
}
