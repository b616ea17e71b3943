import { XmlCapabilitiesReader } from './capabilities.js';
import { GeoParquetReader } from './geoparquet.js';
import { GeoTiffReader } from './geotiff.js';
import type { Readers } from './types.js';

export { parseCapabilities, parseTimeDimension, XmlCapabilitiesReader } from './capabilities.js';
export { GeoParquetReader, parseGeoMetadata, rowToRecord } from './geoparquet.js';
export { crsFromGeoKeys, GeoTiffReader } from './geotiff.js';
export type * from './types.js';

/**
 * Readers backed by parquet-wasm, geotiff and xmldom
 */
export function createDefaultReaders(): Readers {
  return {
    vector: new GeoParquetReader(),
    raster: new GeoTiffReader(),
    capabilities: new XmlCapabilitiesReader(),
  };
}
