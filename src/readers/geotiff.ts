/**
 * GeoTIFF raster reader
 */

import { fromFile } from 'geotiff';
import type { RasterInfo, RasterReader } from './types.js';

/** GeoKey value for a user-defined (non-EPSG) coordinate system */
const USER_DEFINED = 32767;

/**
 * Pick the EPSG code out of GeoTIFF GeoKeys: the projected system if there is one,
 * otherwise the geographic one.
 *
 * @param geoKeys - the image GeoKeys
 * @returns an `EPSG:n` string, or a description of why there is none
 */
export function crsFromGeoKeys(geoKeys: unknown): string {
  if (!geoKeys || typeof geoKeys !== 'object') return 'unknown';
  const projected = 'ProjectedCSTypeGeoKey' in geoKeys ? geoKeys.ProjectedCSTypeGeoKey : undefined;
  const geographic = 'GeographicTypeGeoKey' in geoKeys ? geoKeys.GeographicTypeGeoKey : undefined;
  for (const code of [projected, geographic]) {
    if (typeof code === 'number' && code !== USER_DEFINED) {
      return `EPSG:${code}`;
    }
  }
  return 'user-defined';
}

export class GeoTiffReader implements RasterReader {
  async open(path: string): Promise<RasterInfo> {
    const tiff = await fromFile(path);
    try {
      const image = await tiff.getImage();
      const [xmin, ymin, xmax, ymax] = image.getBoundingBox();
      const geoKeys: unknown = image.getGeoKeys();
      return { bbox: { xmin, ymin, xmax, ymax }, crs: crsFromGeoKeys(geoKeys) };
    } finally {
      await tiff.close();
    }
  }
}
