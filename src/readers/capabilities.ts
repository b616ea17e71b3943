/**
 * WMS / WMTS capabilities reader
 *
 * Extracts the advertised layers with their declared WGS84 boxes and time dimensions.
 * WMS layers inherit the box and time dimension of their parent layers.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { DOMParser } from '@xmldom/xmldom';
import type { BoundingBox, TemporalRange } from '../types.js';
import type {
  CapabilitiesDocument,
  CapabilitiesReader,
  CapabilitiesService,
  CapabilityLayer,
} from './types.js';

const WMS_ROOTS = ['WMS_Capabilities', 'WMT_MS_Capabilities'];

function isElement(node: Node): node is Element {
  return node.nodeType === 1;
}

function localName(element: Element): string {
  return element.localName ?? element.nodeName.replace(/^.*:/, '');
}

function children(element: Element, name: string): Element[] {
  const result: Element[] = [];
  for (let i = 0; i < element.childNodes.length; i++) {
    const node = element.childNodes[i];
    if (isElement(node) && localName(node) === name) result.push(node);
  }
  return result;
}

function child(element: Element, name: string): Element | undefined {
  return children(element, name)[0];
}

function text(element: Element | undefined): string | undefined {
  const value = element?.textContent?.trim();
  return value ? value : undefined;
}

function toBbox(values: (string | number | null | undefined)[]): BoundingBox | null {
  const [xmin, ymin, xmax, ymax] = values.map((v) => (v === null || v === undefined ? NaN : Number(v)));
  if (![xmin, ymin, xmax, ymax].every((v) => Number.isFinite(v))) return null;
  return { xmin, ymin, xmax, ymax };
}

/**
 * Parse a time dimension value list: comma separated instants and `start/end/period` intervals.
 *
 * @param value - the dimension content
 * @returns the covering range, or undefined when nothing parses as a date
 */
export function parseTimeDimension(value: string | undefined): TemporalRange | undefined {
  if (!value) return undefined;
  const instants: string[] = [];
  for (const part of value.split(',')) {
    const [start, end] = part.trim().split('/');
    for (const candidate of [start, end]) {
      if (!candidate) continue;
      const date = new Date(candidate);
      if (!Number.isNaN(date.getTime())) instants.push(date.toISOString());
    }
  }
  if (instants.length === 0) return undefined;
  instants.sort();
  return { start: instants[0], end: instants[instants.length - 1] };
}

function wmsLayerBbox(layer: Element): BoundingBox | null {
  const geographic = child(layer, 'EX_GeographicBoundingBox');
  if (geographic) {
    return toBbox([
      text(child(geographic, 'westBoundLongitude')),
      text(child(geographic, 'southBoundLatitude')),
      text(child(geographic, 'eastBoundLongitude')),
      text(child(geographic, 'northBoundLatitude')),
    ]);
  }
  const latLon = child(layer, 'LatLonBoundingBox');
  if (latLon) {
    return toBbox([
      latLon.getAttribute('minx'),
      latLon.getAttribute('miny'),
      latLon.getAttribute('maxx'),
      latLon.getAttribute('maxy'),
    ]);
  }
  return null;
}

function wmsLayerTime(layer: Element): TemporalRange | undefined {
  const dimensions = [...children(layer, 'Dimension'), ...children(layer, 'Extent')];
  const time = dimensions.find((d) => d.getAttribute('name')?.toLowerCase() === 'time');
  return parseTimeDimension(text(time));
}

function collectWmsLayers(
  layer: Element,
  inherited: { bbox: BoundingBox | null; temporal?: TemporalRange },
  into: CapabilityLayer[]
): void {
  const bbox = wmsLayerBbox(layer) ?? inherited.bbox;
  const temporal = wmsLayerTime(layer) ?? inherited.temporal;
  const name = text(child(layer, 'Name'));
  if (name) {
    const entry: CapabilityLayer = { name, bbox };
    const title = text(child(layer, 'Title'));
    if (title) entry.title = title;
    if (temporal) entry.temporal = temporal;
    into.push(entry);
  }
  for (const nested of children(layer, 'Layer')) {
    collectWmsLayers(nested, { bbox, temporal }, into);
  }
}

function parseWms(root: Element): CapabilityLayer[] {
  const layers: CapabilityLayer[] = [];
  const capability = child(root, 'Capability');
  for (const layer of capability ? children(capability, 'Layer') : []) {
    collectWmsLayers(layer, { bbox: null }, layers);
  }
  return layers;
}

function parseCorner(value: string | undefined): [number, number] | null {
  const parts = (value ?? '').split(/\s+/).map(Number);
  if (parts.length !== 2 || !parts.every((p) => Number.isFinite(p))) return null;
  return [parts[0], parts[1]];
}

function parseWmts(root: Element): CapabilityLayer[] {
  const contents = child(root, 'Contents');
  const layers: CapabilityLayer[] = [];
  for (const layer of contents ? children(contents, 'Layer') : []) {
    const name = text(child(layer, 'Identifier'));
    if (!name) continue;
    const wgs84 = child(layer, 'WGS84BoundingBox');
    const lower = parseCorner(text(wgs84 && child(wgs84, 'LowerCorner')));
    const upper = parseCorner(text(wgs84 && child(wgs84, 'UpperCorner')));
    const entry: CapabilityLayer = {
      name,
      bbox: lower && upper ? toBbox([lower[0], lower[1], upper[0], upper[1]]) : null,
    };
    const title = text(child(layer, 'Title'));
    if (title) entry.title = title;
    const time = children(layer, 'Dimension').find(
      (d) => text(child(d, 'Identifier'))?.toLowerCase() === 'time'
    );
    const values = time ? children(time, 'Value').map((v) => text(v) ?? '').join(',') : undefined;
    const temporal = parseTimeDimension(values);
    if (temporal) entry.temporal = temporal;
    layers.push(entry);
  }
  return layers;
}

/**
 * Parse a WMS 1.1.1 / 1.3.0 or WMTS 1.0.0 capabilities document.
 *
 * @param xml - the document text
 * @returns the service kind and its named layers
 * @throws Error if the text is not XML or not a capabilities document
 */
export function parseCapabilities(xml: string): CapabilitiesDocument {
  const document = new DOMParser({
    errorHandler: {
      error: (message: string) => {
        throw new Error(`Malformed capabilities document: ${message}`);
      },
      fatalError: (message: string) => {
        throw new Error(`Malformed capabilities document: ${message}`);
      },
    },
  }).parseFromString(xml, 'text/xml');
  const root = document.documentElement;
  if (!root) {
    throw new Error('Malformed capabilities document: no root element');
  }

  const rootName = localName(root);
  let service: CapabilitiesService;
  let layers: CapabilityLayer[];
  if (WMS_ROOTS.includes(rootName)) {
    service = 'WMS';
    layers = parseWms(root);
  } else if (rootName === 'Capabilities') {
    service = 'WMTS';
    layers = parseWmts(root);
  } else {
    throw new Error(`Not a capabilities document: root element is ${rootName}`);
  }

  const result: CapabilitiesDocument = { service, layers };
  const version = root.getAttribute('version');
  if (version) result.version = version;
  const serviceElement = child(root, service === 'WMS' ? 'Service' : 'ServiceIdentification');
  const title = text(serviceElement && child(serviceElement, 'Title'));
  if (title) result.title = title;
  return result;
}

export class XmlCapabilitiesReader implements CapabilitiesReader {
  /**
   * Read a capabilities document stored on disk. Remote URLs are fetched by the downloader
   * before a run, so only paths and file: URLs are accepted here.
   */
  async readCapabilities(url: string): Promise<CapabilitiesDocument> {
    if (/^https?:\/\//i.test(url)) {
      throw new Error(`Remote capabilities are not read directly: ${url}`);
    }
    const path = url.startsWith('file:') ? fileURLToPath(url) : url;
    return parseCapabilities(await readFile(path, 'utf8'));
  }
}
