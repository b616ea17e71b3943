/**
 * Item Assembler
 *
 * Groups the assets that belong to the same logical unit (a tile, a partition, a service layer,
 * an index sheet) into one item.
 */

import _ from 'lodash';
import { reprojectExtent, reprojectGeometry } from './crs.js';
import { EmptyGroupError } from './errors.js';
import { isUndefinedExtent, unionExtents } from './extent.js';
import type { Asset, AssetRole, Footprint, Item, ItemProperties } from './types.js';

const SIDECAR_SUFFIX = /\.(thumb|thumbnail|meta|metadata|aux)$/i;

/**
 * One asset contributing to an item, with the metadata it brings along
 */
export interface GroupMember {
  asset: Asset;
  /** Asset key to use instead of the one derived from the role */
  key?: string;
  properties?: ItemProperties;
  /** Exact shape of the member's source */
  footprint?: Footprint;
  /** Raw files the member was read from, relative to the input root */
  sources: string[];
}

export interface AssembleOptions {
  collectionId: string;
  /** CRS every item extent is expressed in */
  crs: string;
}

/**
 * The path of a file without its extension and sidecar suffix, with forward slashes.
 *
 * A tile and its sidecars share a stem. Two files with different stems are different units
 * even when their group keys collide.
 *
 * @param relativePath - path relative to the dataset directory
 */
export function pathStem(relativePath: string): string {
  const segments = relativePath.replace(/\\/g, '/').split('/').filter((s) => s !== '' && s !== '.');
  const name = segments.pop() ?? '';
  const dot = name.lastIndexOf('.');
  const stem = (dot > 0 ? name.slice(0, dot) : name).replace(SIDECAR_SUFFIX, '');
  return [...segments, stem].join('/');
}

/**
 * Derive the item id of a file from its path alone.
 *
 * `ortho/2021/tile_12.thumb.png` and `ortho/2021/tile_12.tif` both map to `ortho-2021-tile_12`.
 *
 * @param relativePath - path relative to the dataset directory
 * @returns the group key
 */
export function groupKeyFor(relativePath: string): string {
  return sanitizeId(pathStem(relativePath).split('/').join('-'));
}

/**
 * Replace characters that are not safe in an id or a file name
 */
export function sanitizeId(value: string): string {
  return value.replace(/[^A-Za-z0-9._=-]/g, '_');
}

function primaryRole(roles: readonly AssetRole[]): AssetRole {
  return roles[0] ?? 'data';
}

/**
 * Assemble an item from the members sharing a group key.
 *
 * Asset keys are the member's primary role; the second and later members with the same key get
 * an index suffix (`data`, `data1`, `data2`). Members are ordered by href so keys are stable.
 * The item geometry is the member footprint when exactly one member has one.
 *
 * @param groupKey - the item id
 * @param members - assets of the group
 * @param options - owning collection and catalog CRS
 * @returns the frozen item
 * @throws EmptyGroupError if there are no members or none of them has an extent
 */
export function assembleItem(groupKey: string, members: readonly GroupMember[], options: AssembleOptions): Item {
  if (members.length === 0) {
    throw new EmptyGroupError(groupKey);
  }

  const ordered = _.sortBy(members, [(m) => m.asset.href, (m) => m.key ?? primaryRole(m.asset.roles)]);
  const extents = ordered.flatMap((m) => (m.asset.extent ? [reprojectExtent(m.asset.extent, options.crs)] : []));
  const extent = unionExtents(extents, options.crs);
  if (isUndefinedExtent(extent)) {
    throw new EmptyGroupError(groupKey, 'no assets with a spatial extent');
  }

  const assets: Record<string, Asset> = {};
  const used = new Map<string, number>();
  const properties: ItemProperties = {};
  const sources = new Set<string>();
  for (const member of ordered) {
    const base = member.key ?? primaryRole(member.asset.roles);
    const count = used.get(base) ?? 0;
    used.set(base, count + 1);
    assets[count === 0 ? base : `${base}${count}`] = member.asset;
    Object.assign(properties, member.properties);
    member.sources.forEach((s) => sources.add(s));
  }

  const item: Item = {
    id: groupKey,
    collectionId: options.collectionId,
    extent,
    assets: Object.freeze(assets),
    properties: Object.freeze(properties),
    sources: [...sources].sort(),
  };
  const footprints = ordered.flatMap((m) => (m.footprint ? [m.footprint] : []));
  if (footprints.length === 1) {
    const [{ geometry, crs }] = footprints;
    item.geometry = reprojectGeometry(geometry, crs, options.crs);
  }
  return Object.freeze(item);
}
