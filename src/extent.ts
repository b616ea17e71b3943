/**
 * Extent values
 *
 * Extents are frozen and only ever combined by union. The union of nothing is the
 * `UNDEFINED_EXTENT` marker, never a zero-area box.
 */

import { bboxContains, bboxUnion, validateBbox } from './bbox.js';
import type { BoundingBox, CollectionExtent, Extent, TemporalRange, UndefinedExtent } from './types.js';

export const UNDEFINED_EXTENT: UndefinedExtent = Object.freeze({ undefined: true as const });

export function isUndefinedExtent(extent: CollectionExtent): extent is UndefinedExtent {
  return 'undefined' in extent && extent.undefined;
}

/**
 * Create a frozen extent after validating the box
 */
export function createExtent(bbox: BoundingBox, crs: string, temporal?: TemporalRange): Extent {
  const extent: Extent = { bbox: Object.freeze(validateBbox({ ...bbox })), crs };
  if (temporal) {
    extent.temporal = Object.freeze(normalizeTemporal(temporal));
  }
  return Object.freeze(extent);
}

/**
 * Convert both bounds to UTC ISO strings and order them
 *
 * @throws Error if a bound is not a parseable date or start is after end
 */
export function normalizeTemporal(range: TemporalRange): TemporalRange {
  const toIso = (value: string | null): string | null => {
    if (value === null) return null;
    const date = new Date(value);
    if (Number.isNaN(date.getTime())) {
      throw new Error(`Invalid date in temporal range: ${value}`);
    }
    return date.toISOString();
  };
  const start = toIso(range.start);
  const end = toIso(range.end);
  if (start !== null && end !== null && start > end) {
    throw new Error(`Invalid temporal range: ${start} is after ${end}`);
  }
  return { start, end };
}

/**
 * Union of two temporal ranges. An open bound on either side stays open; a missing range
 * contributes nothing.
 */
export function unionTemporal(
  a: TemporalRange | undefined,
  b: TemporalRange | undefined
): TemporalRange | undefined {
  if (!a) return b;
  if (!b) return a;
  const start = a.start === null || b.start === null ? null : a.start < b.start ? a.start : b.start;
  const end = a.end === null || b.end === null ? null : a.end > b.end ? a.end : b.end;
  return { start, end };
}

/**
 * Union of extents that are all expressed in `crs`.
 *
 * @param extents - extents to combine
 * @param crs - the CRS every extent must already be in
 * @returns the union, or `UNDEFINED_EXTENT` for an empty input
 * @throws Error if an extent is in another CRS
 */
export function unionExtents(extents: readonly Extent[], crs: string): CollectionExtent {
  if (extents.length === 0) return UNDEFINED_EXTENT;

  let bbox: BoundingBox | null = null;
  let temporal: TemporalRange | undefined;
  for (const extent of extents) {
    if (extent.crs !== crs) {
      throw new Error(`Cannot union an extent in ${extent.crs} into ${crs}; reproject it first`);
    }
    bbox = bbox ? bboxUnion(bbox, extent.bbox) : extent.bbox;
    temporal = unionTemporal(temporal, extent.temporal);
  }
  return createExtent(bbox ?? extents[0].bbox, crs, temporal);
}

/**
 * Check that `outer` covers `inner` in space and time. Both must be in the same CRS.
 */
export function extentContains(outer: CollectionExtent, inner: Extent): boolean {
  if (isUndefinedExtent(outer)) return false;
  if (outer.crs !== inner.crs || !bboxContains(outer.bbox, inner.bbox)) return false;
  if (!inner.temporal) return true;
  if (!outer.temporal) return false;
  const startOk =
    outer.temporal.start === null ||
    (inner.temporal.start !== null && outer.temporal.start <= inner.temporal.start);
  const endOk =
    outer.temporal.end === null ||
    (inner.temporal.end !== null && outer.temporal.end >= inner.temporal.end);
  return startOk && endOk;
}
