/**
 * Collection Aggregator
 */

import _ from 'lodash';
import { CC0 } from './constants.js';
import { DuplicateItemIdError } from './errors.js';
import { isUndefinedExtent, UNDEFINED_EXTENT, unionExtents } from './extent.js';
import type { Collection, Extent, Item } from './types.js';

/**
 * Descriptive fields of a collection, passed through from the dataset manifest
 */
export interface CollectionMetadata {
  title?: string;
  description: string;
  license?: string;
  keywords?: string[];
  /** Id of the collection this one is nested under */
  parentId?: string;
}

/**
 * Build a collection from the items of one dataset.
 *
 * @param datasetId - the collection id
 * @param items - successfully assembled items, all in `crs`
 * @param metadata - descriptive fields
 * @param crs - the catalog CRS
 * @returns the frozen collection with items sorted by id
 * @throws DuplicateItemIdError if two items share an id
 */
export function aggregateCollection(
  datasetId: string,
  items: readonly Item[],
  metadata: CollectionMetadata,
  crs: string
): Collection {
  const seen = new Set<string>();
  for (const item of items) {
    if (seen.has(item.id)) {
      throw new DuplicateItemIdError(datasetId, item.id);
    }
    seen.add(item.id);
  }

  const sorted = _.sortBy(items, (item) => item.id);
  const collection: Collection = {
    id: datasetId,
    description: metadata.description,
    license: metadata.license ?? CC0,
    keywords: [...(metadata.keywords ?? [])],
    extent: unionExtents(
      sorted.map((item) => item.extent),
      crs
    ),
    items: sorted,
  };
  if (metadata.title) collection.title = metadata.title;
  if (metadata.parentId) collection.parentId = metadata.parentId;
  return Object.freeze(collection);
}

/**
 * Build a collection that holds no items, only the collections nested under it. Its extent is
 * the union of the children's extents.
 *
 * @param collectionId - the parent's id
 * @param children - collections whose `parentId` is `collectionId`
 * @param metadata - descriptive fields
 * @param crs - the catalog CRS
 */
export function aggregateParent(
  collectionId: string,
  children: readonly Collection[],
  metadata: CollectionMetadata,
  crs: string
): Collection {
  const collection: Collection = {
    id: collectionId,
    description: metadata.description,
    license: metadata.license ?? CC0,
    keywords: [...(metadata.keywords ?? [])],
    extent: UNDEFINED_EXTENT,
    items: [],
  };
  if (metadata.title) collection.title = metadata.title;
  if (metadata.parentId) collection.parentId = metadata.parentId;
  return withChildren(collection, children, crs);
}

/**
 * A copy of a parent collection with its extent recomputed from its children
 */
export function withChildren(parent: Collection, children: readonly Collection[], crs: string): Collection {
  const extents: Extent[] = [];
  for (const child of children) {
    if (child.parentId === parent.id && !isUndefinedExtent(child.extent)) extents.push(child.extent);
  }
  return Object.freeze({ ...parent, extent: unionExtents(extents, crs) });
}

/**
 * A copy of `collection` with a different item list and the extent recomputed from it
 */
export function withItems(collection: Collection, items: readonly Item[], crs: string): Collection {
  const sorted = _.sortBy(items, (item) => item.id);
  return Object.freeze({
    ...collection,
    extent: unionExtents(
      sorted.map((item) => item.extent),
      crs
    ),
    items: sorted,
  });
}
