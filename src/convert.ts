/**
 * Catalog generation run
 *
 * Reads every dataset under the input root and writes the merged catalog to the output folder.
 * Work on individual files runs on a bounded queue; each dataset is assembled once all of its
 * files are done, and the catalog is written once every dataset is assembled.
 */

import { existsSync } from 'node:fs';
import { stat } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';
import _ from 'lodash';
import PromiseQueue from 'p-queue';
import { clearChecksumCache, describeAsset, isRemoteRef } from './asset-descriptor.js';
import { aggregateCollection, aggregateParent } from './collection-aggregator.js';
import type { CollectionMetadata } from './collection-aggregator.js';
import { writeCatalog } from './catalog-writer.js';
import type { PersistedEntity, SourceExists, WriteReport } from './catalog-writer.js';
import { normalizeCrs } from './crs.js';
import { discoverDatasets } from './datasets.js';
import type { Dataset, Discovery, SourceFile } from './datasets.js';
import env from './env.js';
import {
  RunCancelledError,
  SourceTimeoutError,
  toWarning,
  UnreadableSourceError,
} from './errors.js';
import type { RunWarning } from './errors.js';
import { resolveExtent } from './extent-resolver.js';
import { assembleItem, groupKeyFor } from './item-assembler.js';
import type { GroupMember } from './item-assembler.js';
import logger from './log.js';
import { createDefaultReaders } from './readers/index.js';
import type { Readers } from './readers/types.js';
import { SHEET_KEYWORDS, SHEET_PARENT_TEXT, sheetCollectionId, sheetCollectionText } from './sheet-index.js';
import { expandSourceFile } from './sources.js';
import type { SourceUnit } from './sources.js';
import { createRootCatalog } from './stac.js';
import type { Collection, Item } from './types.js';

const log = logger.child({ component: 'convert' });

export interface ConvertOptions {
  inputFolder: string;
  outputFolder: string;
  readers?: Readers;
  workerCount?: number;
  sourceTimeoutMs?: number;
  checksums?: boolean;
  catalogCrs?: string;
  /** Zone that local dates in sheet indexes refer to */
  timeZone?: string;
  signal?: AbortSignal;
}

export interface RunReport {
  collectionsBuilt: number;
  itemsBuilt: number;
  warnings: RunWarning[];
  /** Set when the run failed as a whole and nothing was written */
  fatal: RunWarning | null;
  write: WriteReport | null;
  cancelled: boolean;
}

interface RunContext {
  inputFolder: string;
  outputFolder: string;
  readers: Readers;
  checksums: boolean;
  timeZone: string;
}

interface UnitResult {
  groupKey: string;
  origin: string;
  member: GroupMember;
}

interface FileResult {
  file: SourceFile;
  members: UnitResult[];
  warnings: RunWarning[];
  /** True when every unit of the file was read */
  complete: boolean;
  years: number[];
}

function toPosix(path: string): string {
  return path.split(sep).join('/');
}

/**
 * Href of a local file as seen from the document of the item it belongs to
 */
function assetHref(context: RunContext, dataset: Dataset, groupKey: string, ref: string): string {
  if (isRemoteRef(ref)) return ref;
  return toPosix(relative(join(context.outputFolder, dataset.collectionId, groupKey), ref));
}

async function describeUnit(unit: SourceUnit, dataset: Dataset, context: RunContext): Promise<GroupMember> {
  const extent = unit.extent ? await resolveExtent(unit.extent, context.readers) : undefined;
  const { asset: planned } = unit;
  const asset = await describeAsset(planned.ref, {
    href: assetHref(context, dataset, unit.groupKey, planned.ref),
    declaredType: planned.declaredType,
    roles: planned.roles,
    title: planned.title,
    sizeBytes: planned.sizeBytes,
    extent,
    checksum: context.checksums,
  });
  const member: GroupMember = { asset, sources: unit.sources };
  if (planned.key) member.key = planned.key;
  if (unit.properties) member.properties = unit.properties;
  if (unit.footprint) member.footprint = unit.footprint;
  return member;
}

async function processFile(file: SourceFile, dataset: Dataset, context: RunContext): Promise<FileResult> {
  const result: FileResult = { file, members: [], warnings: [], complete: true, years: [] };
  let units: SourceUnit[];
  try {
    const expansion = await expandSourceFile(file, context.readers, {
      datasetKind: dataset.manifest.kind,
      datetimeColumn: dataset.manifest.datetimeColumn,
      timeZone: context.timeZone,
    });
    units = expansion.units;
    result.warnings = expansion.warnings;
    result.years = expansion.years;
    if (expansion.warnings.length > 0) result.complete = false;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    result.warnings.push(toWarning(new UnreadableSourceError(file.relativePath, reason, { cause: error }), file.relativePath));
    result.complete = false;
    return result;
  }

  for (const unit of units) {
    try {
      const member = await describeUnit(unit, dataset, context);
      result.members.push({ groupKey: unit.groupKey, origin: unit.origin, member });
    } catch (error) {
      result.warnings.push(toWarning(error, unit.ref));
      result.complete = false;
    }
  }
  return result;
}

function failedFile(file: SourceFile, error: unknown, timeoutMs: number): FileResult {
  const cause = error instanceof Error && error.name === 'TimeoutError' ? new SourceTimeoutError(file.relativePath, timeoutMs) : error;
  return { file, members: [], warnings: [toWarning(cause, file.relativePath)], complete: false, years: [] };
}

/**
 * Results of the files that end up in one collection
 */
interface Partition {
  collectionId: string;
  results: FileResult[];
  years: number[];
}

/**
 * Split a dataset's file results by target collection. A sheet-index dataset gets one nested
 * collection per year, or range of years, of its index files; any other dataset is one
 * collection.
 */
function partitionResults(dataset: Dataset, results: readonly FileResult[]): Partition[] {
  if (dataset.manifest.kind !== 'sheet-index') {
    const years: number[] = [];
    for (const result of results) for (const year of result.years) years.push(year);
    return [{ collectionId: dataset.collectionId, results: [...results], years }];
  }
  const partitions = new Map<string, Partition>();
  for (const result of results) {
    const collectionId = sheetCollectionId(dataset.collectionId, result.years, groupKeyFor(result.file.datasetPath));
    const partition = partitions.get(collectionId) ?? { collectionId, results: [], years: [] };
    partition.results.push(result);
    for (const year of result.years) partition.years.push(year);
    partitions.set(collectionId, partition);
  }
  return _.sortBy([...partitions.values()], (partition) => partition.collectionId);
}

function collectionMetadata(dataset: Dataset): CollectionMetadata {
  const { manifest } = dataset;
  return {
    title: manifest.title,
    description: manifest.description ?? `Zbiór danych ${dataset.name}`,
    license: manifest.license,
    keywords: manifest.keywords,
  };
}

function sheetParentMetadata(dataset: Dataset): CollectionMetadata {
  const { manifest } = dataset;
  return {
    title: manifest.title ?? SHEET_PARENT_TEXT.title,
    description: manifest.description ?? SHEET_PARENT_TEXT.description,
    license: manifest.license,
    keywords: manifest.keywords.length > 0 ? manifest.keywords : SHEET_KEYWORDS,
  };
}

function sheetChildMetadata(dataset: Dataset, partition: Partition): CollectionMetadata {
  const text = sheetCollectionText(partition.years);
  const label = partition.collectionId.slice(dataset.collectionId.length + 1);
  return {
    title: text?.title ?? label,
    description: text?.description ?? `Arkusze ortofotomapy z indeksu ${label}`,
    license: dataset.manifest.license,
    keywords: SHEET_KEYWORDS,
    parentId: dataset.collectionId,
  };
}

/**
 * Group the members of a partition into items. Members are grouped by the key they share and
 * the origin that key was derived from, so that distinct sources whose keys collide end up as
 * separate items with the same id.
 */
function groupMembers(results: readonly FileResult[]): { groupKey: string; members: GroupMember[] }[] {
  const groups = new Map<string, { groupKey: string; members: GroupMember[] }>();
  for (const result of results) {
    for (const { groupKey, origin, member } of result.members) {
      const key = `${groupKey}\n${origin}`;
      const group = groups.get(key);
      if (group) {
        group.members.push(member);
      } else {
        groups.set(key, { groupKey, members: [member] });
      }
    }
  }
  return _.sortBy([...groups.entries()], ([key]) => key).map(([, group]) => group);
}

/**
 * The default source check for reconciliation.
 *
 * An item is gone when one of its source files no longer exists, or when all of them were fully
 * read in this run without producing the item. A collection is gone when its dataset directory
 * no longer exists; a nested collection looks at the directory of its parent.
 */
function sourceExistsFor(
  inputFolder: string,
  collectionIds: Set<string>,
  completeFiles: Set<string>,
  producedKeys: Set<string>
): SourceExists {
  return (entity: PersistedEntity) => {
    if (entity.kind === 'collection') {
      return collectionIds.has(entity.collection.parentId ?? entity.collection.id);
    }
    const { item, collectionId } = entity;
    if (item.sources.length === 0) return true;
    if (item.sources.some((source) => !existsSync(join(inputFolder, ...source.split('/'))))) return false;
    const reread = item.sources.every((source) => completeFiles.has(source));
    return !reread || producedKeys.has(`${collectionId}/${item.id}`);
  };
}

function emptyReport(): RunReport {
  return { collectionsBuilt: 0, itemsBuilt: 0, warnings: [], fatal: null, write: null, cancelled: false };
}

/**
 * Build the catalog for an input root and write it to the output folder.
 *
 * Problems with single sources and groups are collected as warnings. The run fails as a whole,
 * with nothing written, only when the input cannot be listed, the run is cancelled or the
 * catalog cannot be written.
 *
 * @param options - input and output folders and run settings
 * @returns the run report
 */
export async function convert(options: ConvertOptions): Promise<RunReport> {
  const report = emptyReport();
  try {
    return await run(options, report);
  } finally {
    clearChecksumCache();
  }
}

/**
 * Files of a dataset that are read. A sheet-index dataset is read from its index files only.
 */
function filesToRead(dataset: Dataset): SourceFile[] {
  if (dataset.manifest.kind !== 'sheet-index') return dataset.files;
  return dataset.files.filter((file) => {
    if (file.kind === 'sheet-index') return true;
    log.debug(`Ignoring ${file.relativePath}: not a sheet index`, { dataset: dataset.name });
    return false;
  });
}

interface DatasetOutcome {
  collections: Collection[];
  items: number;
}

/**
 * Assemble the collections of one dataset from its file results
 */
function buildDataset(
  dataset: Dataset,
  results: readonly FileResult[],
  crs: string,
  report: RunReport,
  producedKeys: Set<string>,
  signal: AbortSignal | undefined
): DatasetOutcome {
  const outcome: DatasetOutcome = { collections: [], items: 0 };
  const nested = dataset.manifest.kind === 'sheet-index';
  for (const partition of partitionResults(dataset, results)) {
    const { collectionId } = partition;
    const items: Item[] = [];
    for (const { groupKey, members } of groupMembers(partition.results)) {
      if (signal?.aborted) throw new RunCancelledError();
      producedKeys.add(`${collectionId}/${groupKey}`);
      try {
        items.push(assembleItem(groupKey, members, { collectionId, crs }));
      } catch (error) {
        report.warnings.push(toWarning(error, `${collectionId}/${groupKey}`));
      }
    }

    if (nested && items.length === 0) {
      log.debug(`No sheets read for ${collectionId}`, { dataset: dataset.name });
      continue;
    }
    const metadata = nested ? sheetChildMetadata(dataset, partition) : collectionMetadata(dataset);
    try {
      outcome.collections.push(aggregateCollection(collectionId, items, metadata, crs));
      outcome.items += items.length;
    } catch (error) {
      report.warnings.push(toWarning(error, collectionId));
      log.warn(`Collection ${collectionId} left out of this run`, { dataset: dataset.name, error });
    }
  }
  if (nested) {
    outcome.collections.push(aggregateParent(dataset.collectionId, outcome.collections, sheetParentMetadata(dataset), crs));
  }
  return outcome;
}

async function run(options: ConvertOptions, report: RunReport): Promise<RunReport> {
  const { signal } = options;
  const timeoutMs = options.sourceTimeoutMs ?? env.sourceTimeoutMs;
  const context: RunContext = {
    inputFolder: options.inputFolder,
    outputFolder: options.outputFolder,
    readers: options.readers ?? createDefaultReaders(),
    checksums: options.checksums ?? env.computeChecksums,
    timeZone: options.timeZone ?? env.sourceTimezone,
  };

  let crs: string;
  let queue: PromiseQueue;
  let discovery: Discovery;
  try {
    crs = normalizeCrs(options.catalogCrs ?? env.catalogCrs);
    const input = await stat(options.inputFolder).catch(() => null);
    if (!input?.isDirectory()) {
      throw new UnreadableSourceError(options.inputFolder, 'input folder does not exist or is not a directory');
    }
    queue = new PromiseQueue({ concurrency: options.workerCount ?? env.workerCount, timeout: timeoutMs });
    discovery = await discoverDatasets(options.inputFolder);
  } catch (error) {
    report.fatal = toWarning(error, options.inputFolder);
    log.error(`Run failed before reading any dataset: ${report.fatal.message}`, { error });
    return report;
  }

  const { datasets, collectionIds } = discovery;
  for (const warning of discovery.warnings) report.warnings.push(warning);
  log.info(`Found ${datasets.length} datasets in ${options.inputFolder}`);

  const pending = datasets.map((dataset) =>
    filesToRead(dataset).map((file) =>
      queue
        .add(() => processFile(file, dataset, context), { throwOnTimeout: true, signal })
        .catch((error: unknown) => failedFile(file, error, timeoutMs))
    )
  );

  const cancel = (): RunReport => {
    queue.clear();
    report.cancelled = true;
    report.fatal = toWarning(new RunCancelledError(), options.outputFolder);
    log.warn('Run cancelled, nothing was written');
    return report;
  };

  const collections: Collection[] = [];
  const completeFiles = new Set<string>();
  const producedKeys = new Set<string>();
  for (const [index, dataset] of datasets.entries()) {
    const results = await Promise.all(pending[index]);
    if (signal?.aborted) return cancel();

    for (const result of results) {
      for (const warning of result.warnings) report.warnings.push(warning);
      if (result.complete) completeFiles.add(result.file.relativePath);
    }

    let outcome: DatasetOutcome;
    try {
      outcome = buildDataset(dataset, results, crs, report, producedKeys, signal);
    } catch (error) {
      if (error instanceof RunCancelledError) return cancel();
      throw error;
    }
    for (const collection of outcome.collections) collections.push(collection);
    report.itemsBuilt += outcome.items;
  }
  if (signal?.aborted) return cancel();
  report.collectionsBuilt = collections.length;

  try {
    report.write = await writeCatalog(createRootCatalog(collections), options.outputFolder, {
      crs,
      sourceExists: sourceExistsFor(options.inputFolder, collectionIds, completeFiles, producedKeys),
    });
  } catch (error) {
    report.fatal = toWarning(error, options.outputFolder);
    log.error(`Catalog was not written: ${report.fatal.message}`, { error });
  }

  for (const warning of report.warnings) {
    log.warn(warning.message, { code: warning.code, ref: warning.ref });
  }
  log.info(`Built ${report.itemsBuilt} items in ${report.collectionsBuilt} collections with ${report.warnings.length} warnings`);
  return report;
}

/**
 * Process exit code for a finished run: 1 when it failed as a whole, 0 otherwise
 */
export function exitCodeFor(report: RunReport): number {
  return report.fatal ? 1 : 0;
}
