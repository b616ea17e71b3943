/**
 * STAC (SpatioTemporal Asset Catalog) documents
 *
 * Renders the in-memory catalog as the self-contained STAC 1.1.0 document set
 * (`catalog.json`, `<collection>/collection.json`, `<collection>/<item>/<item>.json`) and
 * parses such a document set back. Nested collections sit beside their parent in the same
 * flat layout and are reached through the parent's child links. Rendering is deterministic: keys, links, collections and
 * items are always emitted in the same order and no timestamps are added.
 */

import { posix } from 'node:path';
import _ from 'lodash';
import { z } from 'zod';
import { bboxFromArray, bboxToArray, bboxToGeometry } from './bbox.js';
import {
  CATALOG_FILE,
  COLLECTION_FILE,
  ID_CATALOG,
  MEDIA_TYPE_GEOJSON,
  MEDIA_TYPE_GEOTIFF,
  MEDIA_TYPE_JSON,
  MEDIA_TYPE_PARQUET,
  MEDIA_TYPE_WMS,
  SOURCE_FILES_PROPERTY,
  STAC_EXTENSIONS,
  STAC_VERSION,
} from './constants.js';
import { UnreadableSourceError } from './errors.js';
import { createExtent, isUndefinedExtent, UNDEFINED_EXTENT } from './extent.js';
import { isGeometry } from './wkb.js';
import type {
  Asset,
  AssetMediaType,
  AssetRole,
  Catalog,
  Collection,
  CollectionExtent,
  Geometry,
  Item,
  TemporalRange,
} from './types.js';

export const CATALOG_TITLE = 'Katalog otwartych danych GUGiK';
export const CATALOG_DESCRIPTION =
  'Katalog STAC pozwalający przeglądać dane udostępniane przez Główny Urząd Geodezji i Kartografii.';

const CATALOG_LANGUAGE = { code: 'pl', name: 'Polski', alternate: 'Polish', dir: 'ltr' };

const MEDIA_TYPES: Record<AssetMediaType, string | undefined> = {
  geoparquet: MEDIA_TYPE_PARQUET,
  'image/tiff': MEDIA_TYPE_GEOTIFF,
  'wms-capabilities': MEDIA_TYPE_WMS,
  other: undefined,
};

const TEMPORAL_PROPERTIES = ['datetime', 'start_datetime', 'end_datetime', SOURCE_FILES_PROPERTY];

const stacLinkSchema = z.object({
  rel: z.string(),
  href: z.string(),
  type: z.string().optional(),
  title: z.string().optional(),
});

const stacAssetSchema = z.object({
  href: z.string(),
  type: z.string().optional(),
  title: z.string().optional(),
  roles: z.array(z.string()).default([]),
  'file:size': z.number().optional(),
  'file:checksum': z.string().optional(),
  'proj:code': z.string().optional(),
  'proj:bbox': z.array(z.number()).optional(),
});

const stacCatalogSchema = z.object({
  type: z.literal('Catalog'),
  stac_version: z.string(),
  stac_extensions: z.array(z.string()).default([]),
  id: z.string(),
  title: z.string().optional(),
  description: z.string(),
  language: z
    .object({ code: z.string(), name: z.string().optional(), alternate: z.string().optional(), dir: z.string().optional() })
    .optional(),
  links: z.array(stacLinkSchema),
});

const stacCollectionSchema = z.object({
  type: z.literal('Collection'),
  stac_version: z.string(),
  stac_extensions: z.array(z.string()).default([]),
  id: z.string(),
  title: z.string().optional(),
  description: z.string(),
  keywords: z.array(z.string()).default([]),
  license: z.string(),
  extent: z.object({
    spatial: z.object({ bbox: z.array(z.array(z.number())) }),
    temporal: z.object({ interval: z.array(z.array(z.string().nullable())) }),
  }),
  links: z.array(stacLinkSchema),
});

const stacItemSchema = z.object({
  type: z.literal('Feature'),
  stac_version: z.string(),
  stac_extensions: z.array(z.string()).default([]),
  id: z.string(),
  collection: z.string().optional(),
  bbox: z.array(z.number()),
  geometry: z.custom<Geometry>(isGeometry, { message: 'not a GeoJSON geometry' }).nullable(),
  properties: z.record(z.unknown()),
  links: z.array(stacLinkSchema),
  assets: z.record(stacAssetSchema),
});

const stacDocumentSchema = z.discriminatedUnion('type', [
  stacCatalogSchema,
  stacCollectionSchema,
  stacItemSchema,
]);

export type StacLink = z.infer<typeof stacLinkSchema>;
export type StacAsset = z.infer<typeof stacAssetSchema>;
export type StacCatalog = z.infer<typeof stacCatalogSchema>;
export type StacCollection = z.infer<typeof stacCollectionSchema>;
export type StacItem = z.infer<typeof stacItemSchema>;
export type StacDocument = z.infer<typeof stacDocumentSchema>;

/**
 * Documents keyed by their path relative to the catalog root, using forward slashes
 */
export type DocumentSet = Map<string, StacDocument>;

export function collectionPath(collectionId: string): string {
  return `${collectionId}/${COLLECTION_FILE}`;
}

export function itemPath(collectionId: string, itemId: string): string {
  return `${collectionId}/${itemId}/${itemId}.json`;
}

/**
 * Href of `to` relative to the document at `from`, both relative to the catalog root
 */
function hrefBetween(from: string, to: string): string {
  const relative = posix.relative(posix.dirname(from), to);
  return relative.startsWith('.') ? relative : `./${relative}`;
}

function sortKeys<T>(record: Record<string, T>): Record<string, T> {
  return _.fromPairs(_.sortBy(_.toPairs(record), ([key]) => key));
}

function renderTemporal(temporal: TemporalRange | undefined): Record<string, string | null> {
  if (!temporal) return { datetime: null };
  if (temporal.start === temporal.end) return { datetime: temporal.start };
  return { datetime: temporal.start, start_datetime: temporal.start, end_datetime: temporal.end };
}

function renderAsset(asset: Asset): StacAsset {
  return {
    href: asset.href,
    type: MEDIA_TYPES[asset.mediaType],
    title: asset.title,
    roles: [...asset.roles],
    'file:size': asset.sizeBytes,
    'file:checksum': asset.checksum,
    'proj:code': asset.extent?.crs,
    'proj:bbox': asset.extent ? bboxToArray(asset.extent.bbox) : undefined,
  };
}

function renderItem(item: Item, collection: Collection): StacItem {
  const path = itemPath(collection.id, item.id);
  const collectionHref = hrefBetween(path, collectionPath(collection.id));
  const properties = _.omit(item.properties, TEMPORAL_PROPERTIES);
  return {
    type: 'Feature',
    stac_version: STAC_VERSION,
    stac_extensions: [...STAC_EXTENSIONS],
    id: item.id,
    collection: collection.id,
    bbox: bboxToArray(item.extent.bbox),
    geometry: item.geometry ?? bboxToGeometry(item.extent.bbox),
    properties: sortKeys({
      ...properties,
      ...renderTemporal(item.extent.temporal),
      [SOURCE_FILES_PROPERTY]: [...item.sources],
    }),
    links: [
      { rel: 'root', href: hrefBetween(path, CATALOG_FILE), type: MEDIA_TYPE_JSON, title: CATALOG_TITLE },
      { rel: 'parent', href: collectionHref, type: MEDIA_TYPE_JSON, title: collection.title },
      { rel: 'collection', href: collectionHref, type: MEDIA_TYPE_JSON, title: collection.title },
    ],
    assets: sortKeys(_.mapValues(item.assets, renderAsset)),
  };
}

function renderCollectionExtent(extent: CollectionExtent): StacCollection['extent'] {
  if (isUndefinedExtent(extent)) {
    return { spatial: { bbox: [] }, temporal: { interval: [] } };
  }
  return {
    spatial: { bbox: [bboxToArray(extent.bbox)] },
    temporal: { interval: [[extent.temporal?.start ?? null, extent.temporal?.end ?? null]] },
  };
}

function renderCollection(collection: Collection, parent: Collection | undefined, children: readonly Collection[]): StacCollection {
  const path = collectionPath(collection.id);
  const catalogHref = hrefBetween(path, CATALOG_FILE);
  const parentLink = parent
    ? { rel: 'parent', href: hrefBetween(path, collectionPath(parent.id)), type: MEDIA_TYPE_JSON, title: parent.title }
    : { rel: 'parent', href: catalogHref, type: MEDIA_TYPE_JSON, title: CATALOG_TITLE };
  return {
    type: 'Collection',
    stac_version: STAC_VERSION,
    stac_extensions: [...STAC_EXTENSIONS],
    id: collection.id,
    title: collection.title,
    description: collection.description,
    keywords: [...collection.keywords],
    license: collection.license,
    extent: renderCollectionExtent(collection.extent),
    links: [
      { rel: 'root', href: catalogHref, type: MEDIA_TYPE_JSON, title: CATALOG_TITLE },
      parentLink,
      ...children.map((child) => ({
        rel: 'child',
        href: hrefBetween(path, collectionPath(child.id)),
        type: MEDIA_TYPE_JSON,
        title: child.title,
      })),
      ...collection.items.map((item) => ({
        rel: 'item',
        href: hrefBetween(path, itemPath(collection.id, item.id)),
        type: MEDIA_TYPE_GEOJSON,
        title: typeof item.properties.title === 'string' ? item.properties.title : undefined,
      })),
    ],
  };
}

/**
 * Create the root catalog over a set of collections, ordered by id
 */
export function createRootCatalog(collections: readonly Collection[]): Catalog {
  return {
    id: ID_CATALOG,
    title: CATALOG_TITLE,
    description: CATALOG_DESCRIPTION,
    collections: _.sortBy(collections, (collection) => collection.id),
  };
}

/**
 * Render the catalog as a document set.
 *
 * A collection whose `parentId` names another collection of the catalog is linked from that
 * collection; every other collection is linked from the root catalog.
 *
 * @param catalog - the catalog to render
 * @returns documents keyed by their path relative to the catalog root
 */
export function renderCatalog(catalog: Catalog): DocumentSet {
  const documents: DocumentSet = new Map();
  const collections = _.sortBy(catalog.collections, (collection) => collection.id);
  const byId = new Map(collections.map((collection): [string, Collection] => [collection.id, collection]));
  const parentOf = (collection: Collection): Collection | undefined =>
    collection.parentId === undefined ? undefined : byId.get(collection.parentId);
  const topLevel = collections.filter((collection) => parentOf(collection) === undefined);
  documents.set(CATALOG_FILE, {
    type: 'Catalog',
    stac_version: STAC_VERSION,
    stac_extensions: [...STAC_EXTENSIONS],
    id: catalog.id,
    title: catalog.title,
    description: catalog.description,
    language: { ...CATALOG_LANGUAGE },
    links: [
      { rel: 'root', href: `./${CATALOG_FILE}`, type: MEDIA_TYPE_JSON, title: catalog.title },
      ...topLevel.map((collection) => ({
        rel: 'child',
        href: `./${collectionPath(collection.id)}`,
        type: MEDIA_TYPE_JSON,
        title: collection.title,
      })),
    ],
  });
  for (const collection of collections) {
    const children = collections.filter((child) => child.parentId === collection.id);
    documents.set(collectionPath(collection.id), renderCollection(collection, parentOf(collection), children));
    for (const item of _.sortBy(collection.items, (i) => i.id)) {
      documents.set(itemPath(collection.id, item.id), renderItem(item, collection));
    }
  }
  return documents;
}

/**
 * Serialize a document as pretty printed JSON with a trailing newline
 */
export function serializeDocument(document: StacDocument): string {
  const replacer = (_key: string, value: unknown): unknown => (typeof value === 'bigint' ? Number(value) : value);
  return `${JSON.stringify(document, replacer, 2)}\n`;
}

/**
 * Validate a parsed JSON value as a STAC catalog, collection or item.
 *
 * @param value - the parsed JSON
 * @param path - where the document was read from, for error messages
 * @returns the typed document
 * @throws UnreadableSourceError if the value is not a STAC document
 */
export function parseStacDocument(value: unknown, path: string): StacDocument {
  const result = stacDocumentSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new UnreadableSourceError(path, `not a STAC document (${issues.join('; ')})`);
  }
  return result.data;
}

/**
 * Resolve a link href against the path of the document holding it.
 *
 * @returns the target path relative to the catalog root, or null for an absolute URL
 */
export function resolveHref(from: string, href: string): string | null {
  if (/^[a-z][a-z0-9+.-]*:/i.test(href) || href.startsWith('/')) return null;
  return posix.normalize(posix.join(posix.dirname(from), href));
}

function isAssetRole(role: string): role is AssetRole {
  return role === 'data' || role === 'metadata' || role === 'thumbnail';
}

function mediaTypeOf(type: string | undefined): AssetMediaType {
  if (type === MEDIA_TYPE_PARQUET) return 'geoparquet';
  if (type === MEDIA_TYPE_GEOTIFF) return 'image/tiff';
  if (type === MEDIA_TYPE_WMS) return 'wms-capabilities';
  return 'other';
}

function parseAsset(stac: StacAsset): Asset {
  const asset: Asset = {
    href: stac.href,
    mediaType: mediaTypeOf(stac.type),
    roles: stac.roles.filter(isAssetRole),
  };
  if (stac['file:size'] !== undefined) asset.sizeBytes = stac['file:size'];
  if (stac['file:checksum'] !== undefined) asset.checksum = stac['file:checksum'];
  if (stac.title !== undefined) asset.title = stac.title;
  if (stac['proj:code'] && stac['proj:bbox']) {
    asset.extent = createExtent(bboxFromArray(stac['proj:bbox']), stac['proj:code']);
  }
  return Object.freeze(asset);
}

function optionalDate(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function parseItemTemporal(properties: Record<string, unknown>): TemporalRange | undefined {
  if ('start_datetime' in properties || 'end_datetime' in properties) {
    return { start: optionalDate(properties.start_datetime), end: optionalDate(properties.end_datetime) };
  }
  const datetime = optionalDate(properties.datetime);
  return datetime === null ? undefined : { start: datetime, end: datetime };
}

/**
 * Convert a parsed item document back into an Item
 *
 * @param stac - the item document
 * @param collectionId - the collection that links to it
 * @param crs - the catalog CRS the document's bbox is in
 */
export function parseItem(stac: StacItem, collectionId: string, crs: string): Item {
  const sourceFiles = stac.properties[SOURCE_FILES_PROPERTY];
  const bbox = bboxFromArray(stac.bbox);
  const item: Item = {
    id: stac.id,
    collectionId: stac.collection ?? collectionId,
    extent: createExtent(bbox, crs, parseItemTemporal(stac.properties)),
    assets: Object.freeze(_.mapValues(stac.assets, parseAsset)),
    properties: Object.freeze(_.omit(stac.properties, TEMPORAL_PROPERTIES)),
    sources: Array.isArray(sourceFiles) ? sourceFiles.filter((s): s is string => typeof s === 'string') : [],
  };
  // the box polygon is what renderItem writes for an item without a footprint
  if (stac.geometry && !_.isEqual(stac.geometry, bboxToGeometry(bbox))) item.geometry = stac.geometry;
  return Object.freeze(item);
}

function parseCollectionExtent(stac: StacCollection, crs: string): CollectionExtent {
  const [bbox] = stac.extent.spatial.bbox;
  if (!bbox) return UNDEFINED_EXTENT;
  const [interval] = stac.extent.temporal.interval;
  const start = interval?.[0] ?? null;
  const end = interval?.[1] ?? null;
  return createExtent(bboxFromArray(bbox), crs, start === null && end === null ? undefined : { start, end });
}

function followLinks(documents: DocumentSet, from: string, rel: string): [string, StacDocument][] {
  const document = documents.get(from);
  if (!document) return [];
  return document.links
    .filter((link) => link.rel === rel)
    .map((link) => {
      const target = resolveHref(from, link.href);
      const linked = target === null ? undefined : documents.get(target);
      if (target === null || !linked) {
        throw new UnreadableSourceError(from, `${rel} link ${link.href} does not resolve to a document`);
      }
      return [target, linked];
    });
}

function parseCollection(
  documents: DocumentSet,
  collectionFile: string,
  document: StacDocument,
  crs: string,
  parentId: string | undefined,
  collections: Collection[],
  visited: Set<string>
): void {
  if (document.type !== 'Collection') {
    throw new UnreadableSourceError(collectionFile, `expected a Collection, found a ${document.type}`);
  }
  if (visited.has(collectionFile)) {
    throw new UnreadableSourceError(collectionFile, 'collection is linked more than once');
  }
  visited.add(collectionFile);

  const items: Item[] = [];
  for (const [itemFile, linked] of followLinks(documents, collectionFile, 'item')) {
    if (linked.type !== 'Feature') {
      throw new UnreadableSourceError(itemFile, `expected an Item, found a ${linked.type}`);
    }
    items.push(parseItem(linked, document.id, crs));
  }
  const collection: Collection = {
    id: document.id,
    description: document.description,
    license: document.license,
    keywords: document.keywords,
    extent: parseCollectionExtent(document, crs),
    items: _.sortBy(items, (item) => item.id),
  };
  if (document.title !== undefined) collection.title = document.title;
  if (parentId !== undefined) collection.parentId = parentId;
  collections.push(Object.freeze(collection));

  for (const [childFile, child] of followLinks(documents, collectionFile, 'child')) {
    parseCollection(documents, childFile, child, crs, document.id, collections, visited);
  }
}

/**
 * Rebuild the catalog model from a document set by following child and item links from the
 * root catalog. Collections reached through another collection's child links get that
 * collection as their parent.
 *
 * @param documents - the persisted documents
 * @param crs - the CRS the persisted boxes are in
 * @returns the catalog
 * @throws UnreadableSourceError if a link does not resolve or a document has the wrong type
 */
export function catalogFromDocuments(documents: DocumentSet, crs: string): Catalog {
  const root = documents.get(CATALOG_FILE);
  if (!root || root.type !== 'Catalog') {
    throw new UnreadableSourceError(CATALOG_FILE, 'missing root catalog');
  }

  const collections: Collection[] = [];
  const visited = new Set<string>();
  for (const [collectionFile, document] of followLinks(documents, CATALOG_FILE, 'child')) {
    parseCollection(documents, collectionFile, document, crs, undefined, collections, visited);
  }

  return {
    id: root.id,
    title: root.title ?? CATALOG_TITLE,
    description: root.description,
    collections: _.sortBy(collections, (collection) => collection.id),
  };
}
