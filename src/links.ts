/**
 * Link graph validation
 *
 * The catalog is only persisted when its link graph is sound: every link resolves to a document
 * of the kind its relation expects, items and collections point at each other, no link is
 * repeated and following child, item and asset links never leads back to where it started.
 */

import _ from 'lodash';
import { CATALOG_FILE, ID_CATALOG } from './constants.js';
import type { LinkViolation } from './errors.js';
import { collectionPath, itemPath, renderCatalog, resolveHref } from './stac.js';
import type { DocumentSet, StacDocument } from './stac.js';
import type { Catalog } from './types.js';

type DocumentType = StacDocument['type'];

/** Document types each structural relation may point at */
const EXPECTED_TARGETS: Record<string, DocumentType[]> = {
  root: ['Catalog'],
  parent: ['Catalog', 'Collection'],
  child: ['Catalog', 'Collection'],
  item: ['Feature'],
  collection: ['Collection'],
};

const DOWNWARD_RELATIONS = new Set(['child', 'item']);

interface Edge {
  rel: string;
  target: string;
}

function findCycles(edges: Map<string, Edge[]>): LinkViolation[] {
  const violations: LinkViolation[] = [];
  const state = new Map<string, 'visiting' | 'done'>();

  const visit = (node: string): void => {
    state.set(node, 'visiting');
    for (const edge of edges.get(node) ?? []) {
      const seen = state.get(edge.target);
      if (seen === 'visiting') {
        violations.push({ source: node, rel: edge.rel, target: edge.target, problem: 'link closes a cycle' });
      } else if (seen === undefined) {
        visit(edge.target);
      }
    }
    state.set(node, 'done');
  };

  for (const node of [...edges.keys()].sort()) {
    if (!state.has(node)) visit(node);
  }
  return violations;
}

/**
 * Validate a rendered or persisted document set.
 *
 * @param documents - documents keyed by path relative to the catalog root
 * @returns every violation found, empty for a sound graph
 */
export function validateDocumentSet(documents: DocumentSet): LinkViolation[] {
  const violations: LinkViolation[] = [];
  const downward = new Map<string, Edge[]>();
  const collectionIds = new Map<string, string>();
  const itemIds = new Map<string, string>();

  const root = documents.get(CATALOG_FILE);
  if (!root || root.type !== 'Catalog') {
    violations.push({ source: CATALOG_FILE, rel: 'root', target: CATALOG_FILE, problem: 'root catalog is missing' });
  }

  for (const path of [...documents.keys()].sort()) {
    const document = documents.get(path);
    if (!document) continue;

    if (document.type === 'Collection') {
      const other = collectionIds.get(document.id);
      if (other) {
        violations.push({ source: path, rel: 'self', target: other, problem: `duplicate collection id ${document.id}` });
      }
      collectionIds.set(document.id, path);
    }
    if (document.type === 'Feature') {
      const key = `${document.collection ?? ''}/${document.id}`;
      const other = itemIds.get(key);
      if (other) {
        violations.push({ source: path, rel: 'self', target: other, problem: `duplicate item id ${document.id}` });
      }
      itemIds.set(key, path);
    }

    const seen = new Set<string>();
    const edges: Edge[] = [];
    for (const link of document.links) {
      const expected = EXPECTED_TARGETS[link.rel];
      const target = resolveHref(path, link.href);
      if (target === null) {
        if (expected) {
          violations.push({ source: path, rel: link.rel, target: link.href, problem: 'structural link is not relative' });
        }
        continue;
      }
      const triple = `${link.rel} ${target}`;
      if (seen.has(triple)) {
        violations.push({ source: path, rel: link.rel, target, problem: 'duplicate link' });
      }
      seen.add(triple);
      if (!expected) continue;

      const linked = documents.get(target);
      if (!linked) {
        violations.push({ source: path, rel: link.rel, target, problem: 'target does not exist' });
        continue;
      }
      if (!expected.includes(linked.type)) {
        violations.push({
          source: path,
          rel: link.rel,
          target,
          problem: `expected ${expected.join(' or ')}, found ${linked.type}`,
        });
      }
      if (DOWNWARD_RELATIONS.has(link.rel)) edges.push({ rel: link.rel, target });
    }

    if (document.type === 'Feature') {
      for (const [key, asset] of Object.entries(document.assets)) {
        if (!asset.href) {
          violations.push({ source: path, rel: 'asset', target: key, problem: 'asset has no href' });
          continue;
        }
        const target = resolveHref(path, asset.href);
        if (target !== null && documents.has(target)) edges.push({ rel: 'asset', target });
      }
      for (const violation of validateItemCollection(path, document.collection, documents)) violations.push(violation);
    }
    if (document.type === 'Collection') {
      const violation = validateParentListsChild(path, document, documents);
      if (violation) violations.push(violation);
    }
    downward.set(path, edges);
  }

  for (const violation of findCycles(downward)) violations.push(violation);
  for (const violation of findUnreachable(documents, downward)) violations.push(violation);
  return violations;
}

/**
 * A collection's parent, the root catalog or another collection, must list it as a child
 */
function validateParentListsChild(path: string, document: StacDocument, documents: DocumentSet): LinkViolation | undefined {
  const link = document.links.find((l) => l.rel === 'parent');
  const target = link ? resolveHref(path, link.href) : null;
  const parent = target === null ? undefined : documents.get(target);
  if (target === null || !parent || parent.type === 'Feature') return undefined;
  const listed = parent.links.some((l) => l.rel === 'child' && resolveHref(target, l.href) === path);
  return listed ? undefined : { source: target, rel: 'child', target: path, problem: 'parent does not list the collection' };
}

/**
 * An item must name its collection, link to it, and be linked back from it
 */
function validateItemCollection(
  path: string,
  collectionId: string | undefined,
  documents: DocumentSet
): LinkViolation[] {
  const document = documents.get(path);
  if (!document) return [];
  if (!collectionId) {
    return [{ source: path, rel: 'collection', target: '', problem: 'item does not declare its collection' }];
  }
  const link = document.links.find((l) => l.rel === 'collection');
  const target = link ? resolveHref(path, link.href) : null;
  if (target === null) {
    return [{ source: path, rel: 'collection', target: collectionId, problem: 'item has no collection link' }];
  }
  const collection = documents.get(target);
  if (!collection || collection.type !== 'Collection') return [];
  const violations: LinkViolation[] = [];
  if (collection.id !== collectionId) {
    violations.push({
      source: path,
      rel: 'collection',
      target,
      problem: `item declares collection ${collectionId} but links to ${collection.id}`,
    });
  }
  const listed = collection.links.some((l) => l.rel === 'item' && resolveHref(target, l.href) === path);
  if (!listed) {
    violations.push({ source: target, rel: 'item', target: path, problem: 'collection does not list the item' });
  }
  return violations;
}

function findUnreachable(documents: DocumentSet, downward: Map<string, Edge[]>): LinkViolation[] {
  if (!documents.has(CATALOG_FILE)) return [];
  const reached = new Set<string>([CATALOG_FILE]);
  const queue = [CATALOG_FILE];
  for (let next = 0; next < queue.length; next++) {
    const node = queue[next];
    for (const edge of downward.get(node) ?? []) {
      if (!reached.has(edge.target)) {
        reached.add(edge.target);
        queue.push(edge.target);
      }
    }
  }
  return [...documents.keys()]
    .filter((path) => !reached.has(path))
    .sort()
    .map((path) => ({ source: CATALOG_FILE, rel: 'child', target: path, problem: 'document is not reachable from the root' }));
}

/**
 * Validate the link graph of an in-memory catalog before it is written.
 *
 * Ids are checked on the model, since duplicates would collide when rendered, and then the
 * rendered document set is checked.
 *
 * @param catalog - the catalog to check
 * @returns every violation found, empty for a sound graph
 */
export function validateLinkGraph(catalog: Catalog): LinkViolation[] {
  const violations: LinkViolation[] = [];

  const collectionCounts = _.countBy(catalog.collections, (collection) => collection.id);
  for (const id of Object.keys(collectionCounts).filter((key) => collectionCounts[key] > 1)) {
    violations.push({ source: ID_CATALOG, rel: 'child', target: collectionPath(id), problem: `duplicate collection id ${id}` });
  }

  for (const collection of catalog.collections) {
    const counts = _.countBy(collection.items, (item) => item.id);
    for (const [id, count] of Object.entries(counts)) {
      if (count > 1) {
        violations.push({
          source: collectionPath(collection.id),
          rel: 'item',
          target: itemPath(collection.id, id),
          problem: `duplicate item id ${id}`,
        });
      }
    }
    for (const item of collection.items) {
      if (item.collectionId !== collection.id) {
        violations.push({
          source: itemPath(collection.id, item.id),
          rel: 'collection',
          target: collectionPath(item.collectionId),
          problem: `item declares collection ${item.collectionId} but is listed in ${collection.id}`,
        });
      }
      for (const [key, asset] of Object.entries(item.assets)) {
        if (!asset.href) {
          violations.push({ source: itemPath(collection.id, item.id), rel: 'asset', target: key, problem: 'asset has no href' });
        }
      }
    }
  }

  if (violations.length > 0) return violations;
  return validateDocumentSet(renderCatalog(catalog));
}
