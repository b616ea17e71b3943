/**
 * Dataset discovery
 *
 * Every top-level directory of the input root is one dataset and becomes one collection. An
 * optional `dataset.json` in the directory describes it.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';
import { z } from 'zod';
import { CC0, DATASET_MANIFEST, ID_CATALOG } from './constants.js';
import { toWarning, UnreadableSourceError } from './errors.js';
import type { RunWarning } from './errors.js';
import { sanitizeId } from './item-assembler.js';
import logger from './log.js';
import { classifyFile } from './sources.js';
import type { SourceKind } from './sources.js';

const log = logger.child({ component: 'datasets' });

const datasetManifestSchema = z
  .object({
    title: z.string().min(1).optional(),
    description: z.string().min(1).optional(),
    license: z.string().min(1).default(CC0),
    keywords: z.array(z.string()).default([]),
    kind: z.enum(['files', 'sheet-index']).default('files'),
    /** Column of a vector dataset holding record timestamps */
    datetimeColumn: z.string().min(1).optional(),
  })
  .strict();

export type DatasetManifest = z.infer<typeof datasetManifestSchema>;

export type DatasetKind = DatasetManifest['kind'];

/**
 * One raw file of a dataset
 */
export interface SourceFile {
  /** Absolute path */
  path: string;
  /** Path relative to the input root, with forward slashes */
  relativePath: string;
  /** Path relative to the dataset directory, with forward slashes */
  datasetPath: string;
  kind: SourceKind;
}

export interface Dataset {
  /** Directory name */
  name: string;
  directory: string;
  collectionId: string;
  manifest: DatasetManifest;
  files: SourceFile[];
}

export interface Discovery {
  datasets: Dataset[];
  /** Collection ids of every dataset directory, including skipped ones */
  collectionIds: Set<string>;
  warnings: RunWarning[];
}

export function collectionIdFor(directoryName: string): string {
  return `${ID_CATALOG}.${sanitizeId(directoryName)}`;
}

/**
 * Parse the content of a dataset manifest.
 *
 * @param text - the JSON text
 * @param ref - the manifest path, for error messages
 * @returns the manifest with defaults applied
 * @throws UnreadableSourceError if the text is not a valid manifest
 */
export function parseManifest(text: string, ref: string): DatasetManifest {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new UnreadableSourceError(ref, error instanceof Error ? error.message : String(error), { cause: error });
  }
  const result = datasetManifestSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new UnreadableSourceError(ref, `invalid manifest (${issues.join('; ')})`);
  }
  return result.data;
}

async function readManifest(directory: string, ref: string): Promise<DatasetManifest> {
  let text: string;
  try {
    text = await readFile(join(directory, DATASET_MANIFEST), 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return datasetManifestSchema.parse({});
    }
    throw new UnreadableSourceError(ref, error instanceof Error ? error.message : String(error), { cause: error });
  }
  return parseManifest(text, ref);
}

function isHidden(name: string): boolean {
  return name.startsWith('.');
}

async function walk(directory: string): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await readdir(directory, { withFileTypes: true })) {
    if (isHidden(entry.name)) continue;
    const path = join(directory, entry.name);
    if (entry.isDirectory()) {
      for (const nested of await walk(path)) files.push(nested);
    } else if (entry.isFile()) {
      files.push(path);
    }
  }
  return files;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function toPosix(path: string): string {
  return path.split(sep).join('/');
}

/**
 * List the datasets under an input root, in directory name order.
 *
 * A dataset whose manifest is invalid is skipped and reported. Files directly under the root
 * belong to no dataset and are ignored.
 *
 * @param root - the input root
 * @returns the datasets and any warnings
 */
export async function discoverDatasets(root: string): Promise<Discovery> {
  const datasets: Dataset[] = [];
  const warnings: RunWarning[] = [];
  const collectionIds = new Set<string>();

  const entries = (await readdir(root, { withFileTypes: true })).filter((e) => !isHidden(e.name));
  for (const entry of entries.sort((a, b) => compareStrings(a.name, b.name))) {
    if (!entry.isDirectory()) {
      log.debug(`Ignoring ${entry.name}: not inside a dataset directory`);
      continue;
    }
    const directory = join(root, entry.name);
    collectionIds.add(collectionIdFor(entry.name));
    const manifestRef = `${entry.name}/${DATASET_MANIFEST}`;
    let manifest: DatasetManifest;
    try {
      manifest = await readManifest(directory, manifestRef);
    } catch (error) {
      warnings.push(toWarning(error, manifestRef));
      log.warn(`Skipping dataset ${entry.name}`, { dataset: entry.name, error });
      continue;
    }

    const files = (await walk(directory))
      .map((path) => ({
        path,
        relativePath: toPosix(relative(root, path)),
        datasetPath: toPosix(relative(directory, path)),
      }))
      .filter((file) => file.datasetPath !== DATASET_MANIFEST)
      .sort((a, b) => compareStrings(a.relativePath, b.relativePath))
      .map((file) => ({ ...file, kind: classifyFile(file.datasetPath, manifest.kind) }));

    datasets.push({
      name: entry.name,
      directory,
      collectionId: collectionIdFor(entry.name),
      manifest,
      files,
    });
  }
  return { datasets, collectionIds, warnings };
}
