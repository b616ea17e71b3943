/**
 * Contracts of the format readers the catalog builder consumes
 */

import type { BoundingBox, Geometry, TemporalRange } from '../types.js';

/**
 * One record of a vector dataset
 */
export interface VectorRecord {
  geometry: Geometry | null;
  /** Per-row covering box, when the file carries one */
  bbox?: BoundingBox;
  properties: Record<string, unknown>;
}

export interface VectorDataset {
  /** CRS as declared by the file; undefined when the file declares none */
  crs: unknown;
  records: Iterable<VectorRecord>;
}

export interface VectorReader {
  open(path: string): Promise<VectorDataset>;
}

export interface RasterInfo {
  bbox: BoundingBox;
  crs: unknown;
}

export interface RasterReader {
  open(path: string): Promise<RasterInfo>;
}

export type CapabilitiesService = 'WMS' | 'WMTS';

/**
 * A layer as advertised by a capabilities document. Boxes are in WGS84 longitude/latitude.
 */
export interface CapabilityLayer {
  name: string;
  title?: string;
  bbox: BoundingBox | null;
  temporal?: TemporalRange;
}

export interface CapabilitiesDocument {
  service: CapabilitiesService;
  version?: string;
  title?: string;
  layers: CapabilityLayer[];
}

export interface CapabilitiesReader {
  readCapabilities(url: string): Promise<CapabilitiesDocument>;
}

export interface Readers {
  vector: VectorReader;
  raster: RasterReader;
  capabilities: CapabilitiesReader;
}
