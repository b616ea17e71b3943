/**
 * Catalog Writer
 *
 * Merges the freshly built catalog with the one already on disk and replaces the persisted
 * document set in one step. The previous catalog stays untouched whenever anything fails before
 * the final rename.
 */

import { existsSync } from 'node:fs';
import { mkdir, open, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join, relative, sep } from 'node:path';
import _ from 'lodash';
import { withChildren, withItems } from './collection-aggregator.js';
import { CATALOG_FILE } from './constants.js';
import { BrokenLinkGraphError, CatalogLockedError, UnreadableSourceError } from './errors.js';
import { validateLinkGraph } from './links.js';
import logger from './log.js';
import { catalogFromDocuments, createRootCatalog, parseStacDocument, renderCatalog, serializeDocument } from './stac.js';
import type { DocumentSet } from './stac.js';
import type { Catalog, Collection, Item } from './types.js';

const log = logger.child({ component: 'catalog-writer' });

/**
 * A persisted entity whose source may have vanished
 */
export type PersistedEntity =
  | { kind: 'collection'; collection: Collection }
  | { kind: 'item'; item: Item; collectionId: string };

/**
 * Reports whether the source of a previously persisted entity still exists
 */
export type SourceExists = (entity: PersistedEntity) => boolean;

/**
 * Ids touched by a reconciliation. Items are named `<collection id>/<item id>`.
 */
export interface CatalogChanges {
  inserted: string[];
  overwritten: string[];
  removed: string[];
  preserved: string[];
}

export interface ReconcileResult {
  catalog: Catalog;
  changes: CatalogChanges;
}

export interface WriteOptions {
  /** CRS of every extent in the catalog */
  crs: string;
  /** Previous catalog; read from the target when undefined */
  previous?: Catalog | null;
  /** Defaults to keeping everything that was persisted before */
  sourceExists?: SourceExists;
}

export interface WriteReport extends CatalogChanges {
  target: string;
  collections: number;
  items: number;
  documents: number;
}

const keepEverything: SourceExists = () => true;

function itemKeys(collection: Collection): string[] {
  return collection.items.map((item) => `${collection.id}/${item.id}`);
}

function pushAll(target: string[], values: readonly string[]): void {
  for (const value of values) target.push(value);
}

function findOrphans(collections: readonly Collection[]): Collection[] {
  const ids = new Set(collections.map((collection) => collection.id));
  return collections.filter((c) => c.parentId !== undefined && !ids.has(c.parentId));
}

/**
 * Merge a freshly built catalog into the previously persisted one.
 *
 * New ids are inserted and shared ids overwritten. Entities only present in the previous
 * catalog are kept unless `sourceExists` reports their source gone; a kept collection that loses
 * every item it had is removed with them. Nested collections whose parent is gone are removed
 * too. Collection extents are recomputed whenever preserved items are merged back, and parent
 * extents from the children that remain.
 *
 * @param next - the catalog built by this run
 * @param previous - the persisted catalog, or null when there is none
 * @param sourceExists - decides the fate of previous-only entities
 * @param crs - the catalog CRS
 * @returns the merged catalog and the ids touched
 */
export function reconcileCatalog(
  next: Catalog,
  previous: Catalog | null,
  sourceExists: SourceExists,
  crs: string
): ReconcileResult {
  const changes: CatalogChanges = { inserted: [], overwritten: [], removed: [], preserved: [] };
  const previousCollections = new Map((previous?.collections ?? []).map((c) => [c.id, c]));
  let collections: Collection[] = [];

  for (const collection of next.collections) {
    const before = previousCollections.get(collection.id);
    previousCollections.delete(collection.id);
    if (!before) {
      changes.inserted.push(collection.id);
      pushAll(changes.inserted, itemKeys(collection));
      collections.push(collection);
      continue;
    }

    changes.overwritten.push(collection.id);
    const fresh = new Set(collection.items.map((item) => item.id));
    const known = new Set(before.items.map((item) => item.id));
    for (const item of collection.items) {
      const bucket = known.has(item.id) ? changes.overwritten : changes.inserted;
      bucket.push(`${collection.id}/${item.id}`);
    }
    const kept: Item[] = [];
    for (const item of before.items) {
      if (fresh.has(item.id)) continue;
      if (sourceExists({ kind: 'item', item, collectionId: collection.id })) {
        kept.push({ ...item, collectionId: collection.id });
        changes.preserved.push(`${collection.id}/${item.id}`);
      } else {
        changes.removed.push(`${collection.id}/${item.id}`);
      }
    }
    collections.push(kept.length > 0 ? withItems(collection, [...collection.items, ...kept], crs) : collection);
  }

  for (const collection of previousCollections.values()) {
    if (!sourceExists({ kind: 'collection', collection })) {
      changes.removed.push(collection.id);
      pushAll(changes.removed, itemKeys(collection));
      continue;
    }
    const kept: Item[] = [];
    for (const item of collection.items) {
      if (sourceExists({ kind: 'item', item, collectionId: collection.id })) {
        kept.push(item);
      } else {
        changes.removed.push(`${collection.id}/${item.id}`);
      }
    }
    if (collection.items.length > 0 && kept.length === 0) {
      changes.removed.push(collection.id);
      continue;
    }
    collections.push(kept.length === collection.items.length ? collection : withItems(collection, kept, crs));
    changes.preserved.push(collection.id);
    pushAll(changes.preserved, itemKeys({ ...collection, items: kept }));
  }

  // drop collections nested under a parent that did not survive, level by level
  let orphans = findOrphans(collections);
  while (orphans.length > 0) {
    const gone = new Set<string>();
    for (const orphan of orphans) {
      gone.add(orphan.id);
      for (const key of itemKeys(orphan)) gone.add(key);
    }
    changes.inserted = changes.inserted.filter((id) => !gone.has(id));
    changes.overwritten = changes.overwritten.filter((id) => !gone.has(id));
    changes.preserved = changes.preserved.filter((id) => !gone.has(id));
    pushAll(changes.removed, [...gone]);
    collections = _.difference(collections, orphans);
    orphans = findOrphans(collections);
  }

  const parents = new Set(collections.map((collection) => collection.parentId));
  collections = collections.map((collection) =>
    parents.has(collection.id) && collection.items.length === 0 ? withChildren(collection, collections, crs) : collection
  );

  return {
    catalog: { ...createRootCatalog(collections), title: next.title, description: next.description },
    changes: _.mapValues(changes, (ids) => [...ids].sort()),
  };
}

async function listJsonFiles(root: string, directory = root): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await readdir(directory, { withFileTypes: true })) {
    const path = join(directory, entry.name);
    if (entry.isDirectory()) {
      pushAll(files, await listJsonFiles(root, path));
    } else if (entry.isFile() && entry.name.endsWith('.json')) {
      files.push(relative(root, path).split(sep).join('/'));
    }
  }
  return files.sort();
}

/**
 * Read every STAC document under a catalog directory.
 *
 * @param target - the catalog directory
 * @returns the documents keyed by path relative to the target
 * @throws UnreadableSourceError if a file is not valid JSON or not a STAC document
 */
export async function readDocumentSet(target: string): Promise<DocumentSet> {
  const documents: DocumentSet = new Map();
  for (const path of await listJsonFiles(target)) {
    let value: unknown;
    try {
      value = JSON.parse(await readFile(join(target, path), 'utf8'));
    } catch (error) {
      throw new UnreadableSourceError(path, error instanceof Error ? error.message : String(error), { cause: error });
    }
    documents.set(path, parseStacDocument(value, path));
  }
  return documents;
}

/**
 * Read a persisted catalog back into memory.
 *
 * @param target - the catalog directory
 * @param crs - the CRS the persisted boxes are in
 * @returns the catalog, or null when the target holds none
 * @throws UnreadableSourceError if the documents cannot be read or do not link up
 */
export async function loadCatalog(target: string, crs: string): Promise<Catalog | null> {
  if (!existsSync(join(target, CATALOG_FILE))) return null;
  return catalogFromDocuments(await readDocumentSet(target), crs);
}

/**
 * Whether the process that wrote a lock file is still running
 */
function lockHolderAlive(content: string): boolean {
  const pid = Number(content.trim());
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means the process exists but belongs to someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

async function acquireLock(target: string, takeOver = true): Promise<() => Promise<void>> {
  const lockPath = `${target}.lock`;
  await mkdir(dirname(lockPath), { recursive: true });
  try {
    const handle = await open(lockPath, 'wx');
    await handle.writeFile(String(process.pid));
    await handle.close();
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) throw error;
    const holder = await readFile(lockPath, 'utf8').catch(() => '');
    if (!takeOver || lockHolderAlive(holder)) {
      throw new CatalogLockedError(target);
    }
    log.warn(`Taking over stale lock ${lockPath} left by process ${holder.trim() || '(unknown)'}`);
    await rm(lockPath, { force: true });
    return acquireLock(target, false);
  }
  return () => rm(lockPath, { force: true });
}

/**
 * Put back the backup of an interrupted swap, when the target itself is gone
 */
async function restoreBackup(target: string): Promise<void> {
  const backup = `${target}.previous`;
  if (existsSync(target) || !existsSync(backup)) return;
  log.warn(`Restoring ${target} from ${backup} left by an interrupted write`);
  await rename(backup, target);
}

async function stage(documents: Map<string, string>, staging: string): Promise<void> {
  await rm(staging, { recursive: true, force: true });
  for (const [path, text] of documents) {
    const file = join(staging, ...path.split('/'));
    await mkdir(dirname(file), { recursive: true });
    await writeFile(file, text, 'utf8');
  }
}

async function swap(staging: string, target: string): Promise<void> {
  const backup = `${target}.previous`;
  await rm(backup, { recursive: true, force: true });
  const hadPrevious = existsSync(target);
  if (hadPrevious) await rename(target, backup);
  try {
    await rename(staging, target);
  } catch (error) {
    if (hadPrevious) await rename(backup, target);
    throw error;
  }
  await rm(backup, { recursive: true, force: true });
}

/**
 * Persist a catalog, merged with what the target already holds.
 *
 * The target directory is owned by the writer: its content is replaced by the rendered
 * document set.
 *
 * @param catalog - the catalog built by this run
 * @param target - the catalog directory
 * @param options - CRS, previous catalog and source check
 * @returns what was written
 * @throws CatalogLockedError if another running writer holds the target
 * @throws BrokenLinkGraphError if the merged catalog does not link up; nothing is written
 */
export async function writeCatalog(catalog: Catalog, target: string, options: WriteOptions): Promise<WriteReport> {
  const release = await acquireLock(target);
  try {
    await restoreBackup(target);
    const previous = options.previous !== undefined ? options.previous : await loadCatalog(target, options.crs);
    const { catalog: merged, changes } = reconcileCatalog(
      catalog,
      previous,
      options.sourceExists ?? keepEverything,
      options.crs
    );

    const violations = validateLinkGraph(merged);
    if (violations.length > 0) {
      throw new BrokenLinkGraphError(violations);
    }

    const rendered = renderCatalog(merged);
    const texts = new Map([...rendered].map(([path, document]) => [path, serializeDocument(document)]));
    const staging = `${target}.staging`;
    await stage(texts, staging);
    await swap(staging, target);

    const report: WriteReport = {
      ...changes,
      target,
      collections: merged.collections.length,
      items: _.sumBy(merged.collections, (c) => c.items.length),
      documents: texts.size,
    };
    log.info(`Wrote ${report.documents} documents to ${target}`, {
      inserted: changes.inserted.length,
      overwritten: changes.overwritten.length,
      removed: changes.removed.length,
      preserved: changes.preserved.length,
    });
    return report;
  } finally {
    await release();
  }
}
