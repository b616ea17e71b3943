import { describe, it, expect } from 'vitest';
import {
  bboxContains,
  bboxFromArray,
  bboxToGeometry,
  bboxUnion,
  EnvelopeBuilder,
  geometryEnvelope,
  validateBbox,
} from './bbox.js';
import type { BoundingBox } from './types.js';

const warsaw: BoundingBox = { xmin: 20.85, ymin: 52.09, xmax: 21.27, ymax: 52.37 };
const krakow: BoundingBox = { xmin: 19.79, ymin: 49.97, xmax: 20.21, ymax: 50.13 };

describe('Bounding boxes', () => {
  describe('bboxContains', () => {
    it('should accept boxes that touch the edges', () => {
      expect(bboxContains(warsaw, { ...warsaw })).toBe(true);
    });

    it('should reject boxes that stick out', () => {
      expect(bboxContains(warsaw, { ...warsaw, xmax: 21.3 })).toBe(false);
    });
  });

  it('should union two boxes', () => {
    expect(bboxUnion(warsaw, krakow)).toEqual({ xmin: 19.79, ymin: 49.97, xmax: 21.27, ymax: 52.37 });
  });

  describe('validateBbox', () => {
    it('should accept a degenerate box', () => {
      const point = { xmin: 1, ymin: 2, xmax: 1, ymax: 2 };
      expect(validateBbox(point)).toBe(point);
    });

    it('should reject swapped corners', () => {
      expect(() => validateBbox({ xmin: 2, ymin: 0, xmax: 1, ymax: 1 })).toThrow('xmin must not exceed xmax');
    });

    it('should reject non-finite coordinates', () => {
      expect(() => validateBbox({ xmin: 0, ymin: 0, xmax: Infinity, ymax: 1 })).toThrow('finite');
    });
  });

  it('should build a box from an array of four bounds', () => {
    expect(bboxFromArray([1, 2, 3, 4])).toEqual({ xmin: 1, ymin: 2, xmax: 3, ymax: 4 });
    expect(() => bboxFromArray([1, 2, 3])).toThrow('Expected bounding box to have 4 bounds, got 3');
  });

  describe('envelopes', () => {
    it('should cover every vertex of a multipolygon', () => {
      const envelope = geometryEnvelope({
        type: 'MultiPolygon',
        coordinates: [
          [[[0, 0], [2, 0], [2, 1], [0, 0]]],
          [[[-1, 5], [3, 5], [3, 6], [-1, 5]]],
        ],
      });
      expect(envelope).toEqual({ xmin: -1, ymin: 0, xmax: 3, ymax: 6 });
    });

    it('should return null when nothing was added', () => {
      expect(new EnvelopeBuilder().result()).toBeNull();
      expect(geometryEnvelope({ type: 'GeometryCollection', geometries: [] })).toBeNull();
    });
  });

  it('should turn a box into a closed polygon', () => {
    expect(bboxToGeometry({ xmin: 0, ymin: 1, xmax: 2, ymax: 3 })).toEqual({
      type: 'Polygon',
      coordinates: [[[0, 1], [2, 1], [2, 3], [0, 3], [0, 1]]],
    });
  });
});
