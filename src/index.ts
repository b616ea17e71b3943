/**
 * gugik-stac - STAC catalog builder for open GUGiK datasets
 *
 * Walks a tree of downloaded datasets and writes a deduplicated, link-checked STAC 1.1.0
 * catalog that is stable across runs.
 *
 * @packageDocumentation
 */

// Run orchestration
export { convert, exitCodeFor } from './convert.js';
export type { ConvertOptions, RunReport } from './convert.js';

// Extents
export { resolveExtent } from './extent-resolver.js';
export type { ExtentSource, VectorExtentSource, RasterExtentSource, DeclaredExtentSource } from './extent-resolver.js';
export { createExtent, unionExtents, extentContains, isUndefinedExtent, UNDEFINED_EXTENT } from './extent.js';
export { normalizeCrs, reprojectBbox, reprojectExtent, reprojectGeometry } from './crs.js';
export { bboxUnion, bboxContains, bboxToGeometry } from './bbox.js';

// Assets, items and collections
export { describeAsset, checksumOf } from './asset-descriptor.js';
export type { DescribeOptions } from './asset-descriptor.js';
export { groupKeyFor, assembleItem } from './item-assembler.js';
export type { GroupMember, AssembleOptions } from './item-assembler.js';
export { aggregateCollection, aggregateParent } from './collection-aggregator.js';
export type { CollectionMetadata } from './collection-aggregator.js';

// Catalog persistence
export { reconcileCatalog, writeCatalog, loadCatalog, readDocumentSet } from './catalog-writer.js';
export type { CatalogChanges, PersistedEntity, SourceExists, WriteOptions, WriteReport } from './catalog-writer.js';
export { validateLinkGraph, validateDocumentSet } from './links.js';
export { createRootCatalog, renderCatalog, serializeDocument, parseStacDocument } from './stac.js';
export type { StacCatalog, StacCollection, StacItem, StacAsset, StacLink, StacDocument } from './stac.js';

// Sources
export { discoverDatasets } from './datasets.js';
export type { Dataset, DatasetManifest, SourceFile } from './datasets.js';
export { expandSourceFile, classifyFile } from './sources.js';
export type { SourceUnit, SourceKind } from './sources.js';
export { createDefaultReaders } from './readers/index.js';
export type { Readers, VectorReader, RasterReader, CapabilitiesReader } from './readers/index.js';

// Errors
export {
  CatalogError,
  UnreadableSourceError,
  UnsupportedCrsError,
  SourceTimeoutError,
  EmptyGroupError,
  DuplicateItemIdError,
  BrokenLinkGraphError,
  CatalogLockedError,
  RunCancelledError,
} from './errors.js';
export type { LinkViolation, RunWarning } from './errors.js';

// Type definitions
export type {
  BoundingBox,
  TemporalRange,
  Extent,
  UndefinedExtent,
  CollectionExtent,
  Asset,
  AssetMediaType,
  AssetRole,
  Item,
  Collection,
  Catalog,
  Footprint,
  Geometry,
  Polygon,
} from './types.js';
