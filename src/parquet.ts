/**
 * Shared parquet utilities
 *
 * Loads parquet-wasm once and reads local GeoParquet files into plain row objects
 * together with their file-level `geo` metadata.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { tableFromIPC } from 'apache-arrow';
import type { Table as ArrowTable } from 'apache-arrow';

/**
 * Type for parquet-wasm module
 */
export type ParquetWasmModule = typeof import('parquet-wasm/esm');

/**
 * Promise for ongoing WASM initialization (prevents race conditions)
 */
let wasmPromise: Promise<ParquetWasmModule> | null = null;

/**
 * Initialize parquet-wasm from the WASM bytes shipped in the package.
 */
async function initializeWasm(): Promise<ParquetWasmModule> {
  const parquetWasm = await import('parquet-wasm/esm');

  // Resolve path to the WASM file in parquet-wasm package
  const wasmPath = fileURLToPath(import.meta.resolve('parquet-wasm/esm/parquet_wasm_bg.wasm'));
  const wasmBytes = await readFile(wasmPath);
  parquetWasm.initSync({ module: wasmBytes });

  return parquetWasm;
}

/**
 * Get the parquet-wasm module, initializing it on first use.
 *
 * Uses Promise-based initialization so concurrent readers share one initialization.
 *
 * @returns Initialized parquet-wasm module
 */
export async function getParquetWasm(): Promise<ParquetWasmModule> {
  if (!wasmPromise) {
    wasmPromise = initializeWasm().catch((error: unknown) => {
      wasmPromise = null;
      throw error;
    });
  }
  return wasmPromise;
}

export interface ParquetContents {
  rows: Record<string, unknown>[];
  /** File key-value metadata, e.g. the GeoParquet `geo` entry */
  metadata: Map<string, string>;
}

/**
 * Read a local parquet file and return all rows as objects.
 *
 * @param path - path of the parquet file
 * @param options - Optional configuration (columns to read)
 * @returns rows and file metadata
 */
export async function readParquetFile(
  path: string,
  options?: { columns?: string[] }
): Promise<ParquetContents> {
  const parquetWasm = await getParquetWasm();
  const buffer = await readFile(path);

  const table = parquetWasm.readParquet(new Uint8Array(buffer), {
    columns: options?.columns,
  });
  const ipcStream = table.intoIPCStream();
  const arrowTable: ArrowTable = tableFromIPC(ipcStream);

  const rows: Record<string, unknown>[] = [];
  for (const row of arrowTable) {
    rows.push(row.toJSON());
  }
  return { rows, metadata: arrowTable.schema.metadata };
}
