/**
 * Shared constants for the GUGiK STAC catalog
 */

export const STAC_VERSION = '1.1.0';

export const STAC_EXTENSIONS = [
  'https://stac-extensions.github.io/projection/v2.0.0/schema.json',
  'https://stac-extensions.github.io/language/v1.0.0/schema.json',
  'https://stac-extensions.github.io/file/v2.1.0/schema.json',
];

export const ID_CATALOG = 'poland.gugik';

export const CC0 = 'CC0-1.0';

export const DEFAULT_CRS = 'EPSG:4326';

export const MEDIA_TYPE_JSON = 'application/json';
export const MEDIA_TYPE_GEOJSON = 'application/geo+json';
export const MEDIA_TYPE_GEOTIFF = 'image/tiff; application=geotiff';
export const MEDIA_TYPE_PARQUET = 'application/vnd.apache.parquet';
export const MEDIA_TYPE_WMS = 'application/vnd.ogc.wms_xml';

/** Persisted file names of the self-contained layout */
export const CATALOG_FILE = 'catalog.json';
export const COLLECTION_FILE = 'collection.json';
export const DATASET_MANIFEST = 'dataset.json';

/** Item property listing the raw files an item was built from */
export const SOURCE_FILES_PROPERTY = 'source:files';
