import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, join } from 'node:path';
import type {
  CapabilitiesDocument,
  RasterInfo,
  Readers,
  VectorDataset,
} from './readers/types.js';

type Fixture<T> = T | Error;

interface FakeFixtures {
  vector?: Record<string, Fixture<VectorDataset>>;
  raster?: Record<string, Fixture<RasterInfo>>;
  capabilities?: Record<string, Fixture<CapabilitiesDocument>>;
}

function lookup<T>(fixtures: Record<string, Fixture<T>> | undefined, path: string): T {
  const fixture = fixtures?.[basename(path)];
  if (fixture === undefined) throw new Error(`no fixture for ${basename(path)}`);
  if (fixture instanceof Error) throw fixture;
  return fixture;
}

/**
 * Readers answering from in-memory fixtures keyed by file name
 */
export function fakeReaders(fixtures: FakeFixtures): Readers {
  return {
    vector: { open: async (path) => lookup(fixtures.vector, path) },
    raster: { open: async (path) => lookup(fixtures.raster, path) },
    capabilities: { readCapabilities: async (url) => lookup(fixtures.capabilities, url) },
  };
}

/** Leading bytes of a parquet file */
export const PARQUET_BYTES = 'PAR1 test content';

/** Leading bytes of a little-endian TIFF */
export const TIFF_BYTES = 'II*\0 test content';

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'gugik-stac-'));
}

export async function removeTempDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Write files below a root, creating directories as needed
 */
export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [path, content] of Object.entries(files)) {
    const file = join(root, ...path.split('/'));
    await mkdir(dirname(file), { recursive: true });
    await writeFile(file, content, 'latin1');
  }
}

/**
 * Every file below a root with its text, keyed by forward slash path in sorted order
 */
export async function readTree(root: string, prefix = ''): Promise<Map<string, string>> {
  const files = new Map<string, string>();
  for (const entry of await readdir(join(root, ...prefix.split('/')), { withFileTypes: true })) {
    const path = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      for (const [nested, text] of await readTree(root, path)) files.set(nested, text);
    } else {
      files.set(path, await readFile(join(root, ...path.split('/')), 'utf8'));
    }
  }
  return new Map([...files].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}
