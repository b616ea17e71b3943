/**
 * Type definitions for gugik-stac
 */

/**
 * Bounding box coordinates in the CRS of the extent that carries it
 */
export interface BoundingBox {
  /** Western edge (min x / min longitude) */
  xmin: number;
  /** Southern edge (min y / min latitude) */
  ymin: number;
  /** Eastern edge (max x / max longitude) */
  xmax: number;
  /** Northern edge (max y / max latitude) */
  ymax: number;
}

/**
 * Time range in UTC, ISO-8601. A null bound is open-ended.
 */
export interface TemporalRange {
  start: string | null;
  end: string | null;
}

/**
 * Spatial (and optionally temporal) coverage of a source, asset, item or collection
 */
export interface Extent {
  bbox: BoundingBox;
  /** Normalized CRS identifier, e.g. "EPSG:2180" */
  crs: string;
  temporal?: TemporalRange;
}

/**
 * Marker for the union of zero extents
 */
export interface UndefinedExtent {
  undefined: true;
}

export type CollectionExtent = Extent | UndefinedExtent;

export type AssetMediaType = 'geoparquet' | 'image/tiff' | 'wms-capabilities' | 'other';

export type AssetRole = 'data' | 'metadata' | 'thumbnail';

/**
 * One physical file, partition or remote resource
 */
export interface Asset {
  href: string;
  mediaType: AssetMediaType;
  roles: AssetRole[];
  sizeBytes?: number;
  /** sha2-256 multihash, hex encoded */
  checksum?: string;
  title?: string;
  /** Extent in the source's native CRS */
  extent?: Extent;
}

export type ItemProperties = Record<string, unknown>;

/**
 * Exact shape of a source, in the CRS it was read in
 */
export interface Footprint {
  geometry: Geometry;
  crs: string;
}

/**
 * A logical unit (a tile, a partition, a service layer, an index sheet)
 */
export interface Item {
  id: string;
  /** Back-reference to the owning collection, by id */
  collectionId: string;
  /** Union of the asset extents, in the catalog CRS */
  extent: Extent;
  /** Footprint in the catalog CRS; the extent's box stands in when absent */
  geometry?: Geometry;
  assets: Record<string, Asset>;
  properties: ItemProperties;
  /** Raw files the item was built from, relative to the input root */
  sources: string[];
}

export interface Collection {
  id: string;
  /** Set on a collection nested under another collection instead of the root catalog */
  parentId?: string;
  title?: string;
  description: string;
  license: string;
  keywords: string[];
  /** Union of the item extents, or of the child collection extents for a parent */
  extent: CollectionExtent;
  /** Items ordered by id */
  items: Item[];
}

export interface Catalog {
  id: string;
  title: string;
  description: string;
  /** Every collection, nested ones included, ordered by id */
  collections: Collection[];
}

/**
 * GeoJSON Geometry types
 */
export type Geometry =
  | Point
  | MultiPoint
  | LineString
  | MultiLineString
  | Polygon
  | MultiPolygon
  | GeometryCollection;

export type Position = [number, number] | [number, number, number];

export interface Point {
  type: 'Point';
  coordinates: Position;
}

export interface MultiPoint {
  type: 'MultiPoint';
  coordinates: Position[];
}

export interface LineString {
  type: 'LineString';
  coordinates: Position[];
}

export interface MultiLineString {
  type: 'MultiLineString';
  coordinates: Position[][];
}

export interface Polygon {
  type: 'Polygon';
  coordinates: Position[][];
}

export interface MultiPolygon {
  type: 'MultiPolygon';
  coordinates: Position[][][];
}

export interface GeometryCollection {
  type: 'GeometryCollection';
  geometries: Geometry[];
}
