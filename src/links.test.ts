import { describe, it, expect } from 'vitest';
import { aggregateCollection, aggregateParent } from './collection-aggregator.js';
import { createExtent } from './extent.js';
import { validateDocumentSet, validateLinkGraph } from './links.js';
import { createRootCatalog, renderCatalog } from './stac.js';
import type { Catalog, Collection, Item } from './types.js';

const COLLECTION_ID = 'poland.gugik.prg';
const COLLECTION_FILE = 'poland.gugik.prg/collection.json';

function item(id: string, collectionId = COLLECTION_ID): Item {
  return {
    id,
    collectionId,
    extent: createExtent({ xmin: 14, ymin: 49, xmax: 24, ymax: 55 }, 'EPSG:4326'),
    assets: { data: { href: `../../../input/${id}.parquet`, mediaType: 'geoparquet', roles: ['data'] } },
    properties: {},
    sources: [],
  };
}

function catalogOf(items: Item[]): Catalog {
  const collection: Collection = aggregateCollection(COLLECTION_ID, [], { description: 'Granice' }, 'EPSG:4326');
  return createRootCatalog([{ ...collection, items }]);
}

describe('Link graph validation', () => {
  it('should accept a rendered catalog', () => {
    expect(validateLinkGraph(catalogOf([item('a'), item('b')]))).toEqual([]);
  });

  it('should report duplicate item ids before rendering', () => {
    expect(validateLinkGraph(catalogOf([item('a'), item('a')]))).toEqual([
      {
        source: COLLECTION_FILE,
        rel: 'item',
        target: 'poland.gugik.prg/a/a.json',
        problem: 'duplicate item id a',
      },
    ]);
  });

  it('should report items that name another collection', () => {
    const violations = validateLinkGraph(catalogOf([item('a', 'poland.gugik.other')]));
    expect(violations).toEqual([
      {
        source: 'poland.gugik.prg/a/a.json',
        rel: 'collection',
        target: 'poland.gugik.other/collection.json',
        problem: `item declares collection poland.gugik.other but is listed in ${COLLECTION_ID}`,
      },
    ]);
  });

  it('should report assets without an href', () => {
    const broken: Item = { ...item('a'), assets: { data: { href: '', mediaType: 'other', roles: ['data'] } } };
    expect(validateLinkGraph(catalogOf([broken]))).toEqual([
      { source: 'poland.gugik.prg/a/a.json', rel: 'asset', target: 'data', problem: 'asset has no href' },
    ]);
  });

  describe('nested collections', () => {
    const PARENT_ID = 'poland.gugik.ortho';
    const CHILD_ID = 'poland.gugik.ortho.2021';

    function nestedCatalog(): Catalog {
      const child = aggregateCollection(
        CHILD_ID,
        [item('sheet1', CHILD_ID)],
        { title: '2021', description: 'Arkusze ortofotomapy z roku: 2021', parentId: PARENT_ID },
        'EPSG:4326'
      );
      const parent = aggregateParent(PARENT_ID, [child], { title: 'Ortofotomapy', description: 'Ortofotomapy' }, 'EPSG:4326');
      return createRootCatalog([parent, child]);
    }

    it('should accept a collection nested under another collection', () => {
      expect(validateLinkGraph(nestedCatalog())).toEqual([]);
    });

    it('should link the nested collection from its parent only', () => {
      const documents = renderCatalog(nestedCatalog());
      const root = documents.get('catalog.json');
      const parent = documents.get(`${PARENT_ID}/collection.json`);
      const child = documents.get(`${CHILD_ID}/collection.json`);
      expect(root?.links.filter((link) => link.rel === 'child').map((link) => link.href)).toEqual([
        `./${PARENT_ID}/collection.json`,
      ]);
      expect(parent?.links.filter((link) => link.rel === 'child').map((link) => link.href)).toEqual([
        `../${CHILD_ID}/collection.json`,
      ]);
      expect(child?.links.find((link) => link.rel === 'parent')).toEqual({
        rel: 'parent',
        href: `../${PARENT_ID}/collection.json`,
        type: 'application/json',
        title: 'Ortofotomapy',
      });
    });

    it('should report a parent that does not list its child', () => {
      const documents = renderCatalog(nestedCatalog());
      const path = `${PARENT_ID}/collection.json`;
      const parent = documents.get(path);
      if (parent?.type !== 'Collection') throw new Error('expected a collection');
      documents.set(path, { ...parent, links: parent.links.filter((link) => link.rel !== 'child') });
      expect(validateDocumentSet(documents)).toEqual([
        { source: path, rel: 'child', target: `${CHILD_ID}/collection.json`, problem: 'parent does not list the collection' },
        { source: 'catalog.json', rel: 'child', target: `${CHILD_ID}/collection.json`, problem: 'document is not reachable from the root' },
        { source: 'catalog.json', rel: 'child', target: `${CHILD_ID}/sheet1/sheet1.json`, problem: 'document is not reachable from the root' },
      ]);
    });
  });

  describe('validateDocumentSet', () => {
    it('should report links to missing documents', () => {
      const documents = renderCatalog(catalogOf([item('a'), item('b')]));
      documents.delete('poland.gugik.prg/b/b.json');
      expect(validateDocumentSet(documents)).toEqual([
        { source: COLLECTION_FILE, rel: 'item', target: 'poland.gugik.prg/b/b.json', problem: 'target does not exist' },
      ]);
    });

    it('should report documents nothing links to', () => {
      const documents = renderCatalog(catalogOf([item('a')]));
      const root = documents.get('catalog.json');
      if (root?.type !== 'Catalog') throw new Error('expected the root catalog');
      documents.set('catalog.json', { ...root, links: root.links.filter((link) => link.rel !== 'child') });
      expect(validateDocumentSet(documents)).toContainEqual({
        source: 'catalog.json',
        rel: 'child',
        target: COLLECTION_FILE,
        problem: 'document is not reachable from the root',
      });
    });

    it('should report cycles and repeated links', () => {
      const documents = renderCatalog(catalogOf([item('a')]));
      const collection = documents.get(COLLECTION_FILE);
      if (collection?.type !== 'Collection') throw new Error('expected a collection');
      const itemLink = collection.links.filter((link) => link.rel === 'item');
      documents.set(COLLECTION_FILE, {
        ...collection,
        links: [...collection.links, ...itemLink, { rel: 'child', href: '../catalog.json' }],
      });
      const violations = validateDocumentSet(documents);
      expect(violations).toContainEqual({
        source: COLLECTION_FILE,
        rel: 'item',
        target: 'poland.gugik.prg/a/a.json',
        problem: 'duplicate link',
      });
      expect(violations).toContainEqual({
        source: COLLECTION_FILE,
        rel: 'child',
        target: 'catalog.json',
        problem: 'link closes a cycle',
      });
    });

    it('should report structural links that leave the catalog', () => {
      const documents = renderCatalog(catalogOf([item('a')]));
      const path = 'poland.gugik.prg/a/a.json';
      const feature = documents.get(path);
      if (feature?.type !== 'Feature') throw new Error('expected an item');
      documents.set(path, {
        ...feature,
        links: [...feature.links, { rel: 'parent', href: 'https://example.com/collection.json' }],
      });
      expect(validateDocumentSet(documents)).toEqual([
        { source: path, rel: 'parent', target: 'https://example.com/collection.json', problem: 'structural link is not relative' },
      ]);
    });

    it('should report a missing root catalog', () => {
      const documents = renderCatalog(catalogOf([item('a')]));
      documents.delete('catalog.json');
      expect(validateDocumentSet(documents)).toContainEqual({
        source: 'catalog.json',
        rel: 'root',
        target: 'catalog.json',
        problem: 'root catalog is missing',
      });
    });
  });
});
