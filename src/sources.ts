/**
 * Source units
 *
 * A raw file expands into one or more source units. A unit is whatever can contribute to an
 * item: it may expose an extent, and it always describes one asset. Adding a new kind of source
 * means adding an expansion here, nothing else changes downstream.
 */

import { extname } from 'node:path';
import { sidecarSuffix } from './asset-descriptor.js';
import type { DatasetKind, SourceFile } from './datasets.js';
import { DEFAULT_CRS } from './constants.js';
import { normalizeCrs } from './crs.js';
import { toWarning } from './errors.js';
import type { RunWarning } from './errors.js';
import type { DeclaredExtentSource, ExtentSource, VectorExtentSource } from './extent-resolver.js';
import { groupKeyFor, pathStem, sanitizeId } from './item-assembler.js';
import type { Readers } from './readers/types.js';
import { readSheetIndex } from './sheet-index.js';
import type { AssetMediaType, AssetRole, Footprint, ItemProperties } from './types.js';

export type SourceKind = 'vector' | 'raster' | 'capabilities' | 'sheet-index' | 'sidecar';

/**
 * How the unit's asset is described
 */
export interface AssetSpec {
  /** Local path or remote URL */
  ref: string;
  key?: string;
  declaredType?: AssetMediaType;
  roles?: AssetRole[];
  title?: string;
  sizeBytes?: number;
}

export interface SourceUnit {
  /** Identifies the unit in warnings */
  ref: string;
  groupKey: string;
  /**
   * What the group key was derived from, before sanitizing. Units sharing a group key must
   * share their origin too, otherwise two distinct sources would fold into one item.
   */
  origin: string;
  /** Raw files the unit was read from, relative to the input root */
  sources: string[];
  extent?: ExtentSource;
  /** Exact outline of the unit, when its source records one */
  footprint?: Footprint;
  asset: AssetSpec;
  properties?: ItemProperties;
}

export interface Expansion {
  units: SourceUnit[];
  warnings: RunWarning[];
  /** Years of the sheets read from a sheet index */
  years: number[];
}

export interface ExpandOptions {
  datasetKind: DatasetKind;
  datetimeColumn?: string;
  /** Zone that local dates in sheet indexes refer to */
  timeZone: string;
}

/**
 * Decide how a file is read from its name and the kind of dataset holding it.
 *
 * @param datasetPath - path relative to the dataset directory
 * @param datasetKind - the dataset kind from its manifest
 */
export function classifyFile(datasetPath: string, datasetKind: DatasetKind): SourceKind {
  if (sidecarSuffix(datasetPath)) return 'sidecar';
  const name = datasetPath.toLowerCase();
  const extension = extname(name);
  if (extension === '.parquet' || extension === '.geoparquet') {
    return datasetKind === 'sheet-index' ? 'sheet-index' : 'vector';
  }
  if (extension === '.tif' || extension === '.tiff') return 'raster';
  if (extension === '.xml' && /capabilities|wms|wmts/.test(name)) return 'capabilities';
  return 'sidecar';
}

function singleUnit(file: SourceFile, extent?: ExtentSource): Expansion {
  const unit: SourceUnit = {
    ref: file.relativePath,
    groupKey: groupKeyFor(file.datasetPath),
    origin: pathStem(file.datasetPath),
    sources: [file.relativePath],
    asset: { ref: file.path },
  };
  if (extent) unit.extent = extent;
  return { units: [unit], warnings: [], years: [] };
}

async function expandCapabilities(file: SourceFile, readers: Readers): Promise<Expansion> {
  const document = await readers.capabilities.readCapabilities(file.path);
  const baseKey = groupKeyFor(file.datasetPath);
  const units = document.layers.map((layer): SourceUnit => {
    const properties: ItemProperties = { title: layer.title ?? layer.name };
    if (document.service === 'WMS') {
      properties['wms:layers'] = [layer.name];
    } else {
      properties['wmts:layer'] = layer.name;
    }
    const ref = `${file.relativePath}#${layer.name}`;
    const extent: DeclaredExtentSource = { kind: 'declared', ref, bbox: layer.bbox, crs: DEFAULT_CRS };
    if (layer.temporal) extent.temporal = layer.temporal;
    return {
      ref,
      groupKey: `${baseKey}-${sanitizeId(layer.name)}`,
      origin: `${pathStem(file.datasetPath)}#${layer.name}`,
      sources: [file.relativePath],
      extent,
      asset: { ref: file.path, declaredType: 'wms-capabilities', title: document.title },
      properties,
    };
  });
  return { units, warnings: [], years: [] };
}

async function expandSheetIndex(file: SourceFile, readers: Readers, timeZone: string): Promise<Expansion> {
  const dataset = await readers.vector.open(file.path);
  const { entries, warnings } = readSheetIndex(dataset.records, file.relativePath, timeZone);
  // sheet outlines are kept only when the index's CRS is usable
  let outlineCrs: string | undefined;
  try {
    outlineCrs = normalizeCrs(dataset.crs, file.relativePath);
  } catch (error) {
    warnings.push(toWarning(error, file.relativePath));
  }
  const years: number[] = [];
  const units = entries.map((entry, row): SourceUnit => {
    if (entry.year !== undefined) years.push(entry.year);
    const asset: AssetSpec = { ref: entry.url, key: 'image', declaredType: 'image/tiff', roles: ['data'] };
    if (entry.sizeBytes !== undefined) asset.sizeBytes = entry.sizeBytes;
    const ref = `${file.relativePath}#${entry.id}`;
    const unit: SourceUnit = {
      ref,
      groupKey: entry.id,
      origin: `${file.relativePath}#${row}`,
      sources: [file.relativePath],
      extent: { kind: 'declared', ref, bbox: entry.bbox, crs: DEFAULT_CRS, temporal: entry.temporal },
      asset,
      properties: entry.properties,
    };
    if (entry.geometry && outlineCrs) unit.footprint = { geometry: entry.geometry, crs: outlineCrs };
    return unit;
  });
  return { units, warnings, years };
}

/**
 * Expand a raw file into its source units.
 *
 * Vector and raster files are a single unit whose extent is read later. Capabilities documents
 * yield a unit per named layer and sheet indexes a unit per row; both are read here.
 *
 * @param file - the file to expand
 * @param readers - the format readers
 * @param options - dataset settings
 * @returns the units, with warnings for parts of the file that were skipped
 */
export async function expandSourceFile(file: SourceFile, readers: Readers, options: ExpandOptions): Promise<Expansion> {
  switch (file.kind) {
    case 'vector': {
      const extent: VectorExtentSource = { kind: 'vector', ref: file.relativePath, path: file.path };
      if (options.datetimeColumn) extent.datetimeColumn = options.datetimeColumn;
      return singleUnit(file, extent);
    }
    case 'raster':
      return singleUnit(file, { kind: 'raster', ref: file.relativePath, path: file.path });
    case 'capabilities':
      return expandCapabilities(file, readers);
    case 'sheet-index':
      return expandSheetIndex(file, readers, options.timeZone);
    case 'sidecar':
      return singleUnit(file);
  }
}
