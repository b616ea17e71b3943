/**
 * Asset descriptors
 *
 * Maps one physical file, partition or remote resource to an Asset record. The media type is
 * taken from, in order: an explicitly declared type, the file's signature, its extension.
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { open, stat } from 'node:fs/promises';
import { extname } from 'node:path';
import type { Stats } from 'node:fs';
import { UnreadableSourceError } from './errors.js';
import type { Asset, AssetMediaType, AssetRole, Extent } from './types.js';

/** Bytes read from the head of a file to sniff its signature */
const SNIFF_BYTES = 512;

/** sha2-256 multihash prefix: function code 0x12, digest length 0x20 */
const MULTIHASH_SHA256 = '1220';

const THUMBNAIL_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg', '.webp', '.gif']);
const METADATA_EXTENSIONS = new Set(['.json', '.xml', '.txt', '.html', '.prj']);

export interface DescribeOptions {
  /** Href recorded on the asset; defaults to the ref */
  href?: string;
  declaredType?: AssetMediaType;
  roles?: AssetRole[];
  title?: string;
  /** Size known from elsewhere, e.g. a remote resource listed in an index */
  sizeBytes?: number;
  /** Native extent of the source */
  extent?: Extent;
  checksum?: boolean;
}

export function isRemoteRef(ref: string): boolean {
  return /^https?:\/\//i.test(ref);
}

/**
 * Suffix before the extension that marks a sidecar file, e.g. `tile_12.thumb.png`
 */
export function sidecarSuffix(path: string): string | null {
  const match = /\.(thumb|thumbnail|meta|metadata|aux)\.[^./]+$/i.exec(path);
  return match ? match[1].toLowerCase() : null;
}

/**
 * Guess the media type from the file extension alone
 */
export function mediaTypeFromExtension(path: string): AssetMediaType {
  const lower = path.toLowerCase().replace(/[?#].*$/, '');
  const extension = extname(lower);
  if (extension === '.parquet' || extension === '.geoparquet') return 'geoparquet';
  if ((extension === '.tif' || extension === '.tiff') && !sidecarSuffix(lower)) return 'image/tiff';
  if (extension === '.xml' && /capabilities|wms|wmts/.test(lower) && !sidecarSuffix(lower)) {
    return 'wms-capabilities';
  }
  return 'other';
}

/**
 * Identify a media type from the first bytes of a file.
 *
 * @param head - the leading bytes
 * @returns the sniffed type, or null when the signature is not recognized
 */
export function sniffMediaType(head: Uint8Array): AssetMediaType | null {
  const ascii = Buffer.from(head).toString('latin1');
  if (ascii.startsWith('PAR1')) return 'geoparquet';
  if (ascii.startsWith('II*\0') || ascii.startsWith('MM\0*') || ascii.startsWith('II+\0') || ascii.startsWith('MM\0+')) {
    return 'image/tiff';
  }
  if (/^\s*</.test(ascii) && /<(?:[\w-]+:)?(WMS_Capabilities|WMT_MS_Capabilities|Capabilities)[\s>]/.test(ascii)) {
    return 'wms-capabilities';
  }
  return null;
}

/**
 * Infer the roles of an asset from its media type and path
 */
export function inferRoles(path: string, mediaType: AssetMediaType): AssetRole[] {
  const suffix = sidecarSuffix(path);
  if (suffix === 'thumb' || suffix === 'thumbnail') return ['thumbnail'];
  if (suffix === 'meta' || suffix === 'metadata' || suffix === 'aux') return ['metadata'];
  if (mediaType === 'wms-capabilities') return ['metadata'];
  if (mediaType !== 'other') return ['data'];
  const extension = extname(path.toLowerCase());
  if (THUMBNAIL_EXTENSIONS.has(extension)) return ['thumbnail'];
  if (METADATA_EXTENSIONS.has(extension)) return ['metadata'];
  return ['data'];
}

async function readHead(path: string): Promise<Uint8Array> {
  const handle = await open(path, 'r');
  try {
    const buffer = Buffer.alloc(SNIFF_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, SNIFF_BYTES, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

/**
 * Checksums already computed or in flight, keyed by path, size and modification time
 */
const checksumCache = new Map<string, Promise<string>>();

async function hashFile(path: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return MULTIHASH_SHA256 + hash.digest('hex');
}

/**
 * sha2-256 multihash of a file. Computed at most once per file version; concurrent callers
 * share the same computation.
 *
 * @param path - file to hash
 * @param stats - the file's stats, identifying its version
 * @returns hex encoded multihash
 */
export function checksumOf(path: string, stats: Pick<Stats, 'size' | 'mtimeMs'>): Promise<string> {
  const key = `${path}:${stats.size}:${stats.mtimeMs}`;
  let pending = checksumCache.get(key);
  if (!pending) {
    pending = hashFile(path).catch((error: unknown) => {
      checksumCache.delete(key);
      throw error;
    });
    checksumCache.set(key, pending);
  }
  return pending;
}

/**
 * Clears memoized checksums. Called at the end of every run.
 */
export function clearChecksumCache(): void {
  checksumCache.clear();
}

/**
 * Describe a file or remote resource as an Asset.
 *
 * Unrecognized types map to `other`. Remote refs are described without any I/O.
 *
 * @param ref - local path or http(s) URL
 * @param options - declared values and checksum switch
 * @returns the frozen asset
 * @throws UnreadableSourceError if a local file cannot be read
 */
export async function describeAsset(ref: string, options: DescribeOptions = {}): Promise<Asset> {
  let mediaType: AssetMediaType | undefined = options.declaredType;
  let sizeBytes = options.sizeBytes;
  let checksum: string | undefined;

  if (!isRemoteRef(ref)) {
    let stats: Stats;
    try {
      stats = await stat(ref);
      if (!stats.isFile()) throw new Error('not a regular file');
      mediaType ??= sniffMediaType(await readHead(ref)) ?? undefined;
    } catch (error) {
      throw new UnreadableSourceError(ref, error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }
    sizeBytes ??= stats.size;
    if (options.checksum) {
      try {
        checksum = await checksumOf(ref, stats);
      } catch (error) {
        throw new UnreadableSourceError(ref, error instanceof Error ? error.message : String(error), {
          cause: error,
        });
      }
    }
  }
  mediaType ??= mediaTypeFromExtension(ref);

  const asset: Asset = {
    href: options.href ?? ref,
    mediaType,
    roles: options.roles ?? inferRoles(ref, mediaType),
  };
  if (sizeBytes !== undefined) asset.sizeBytes = sizeBytes;
  if (checksum !== undefined) asset.checksum = checksum;
  if (options.title) asset.title = options.title;
  if (options.extent) asset.extent = options.extent;
  Object.freeze(asset.roles);
  return Object.freeze(asset);
}
