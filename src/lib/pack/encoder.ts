/**
 * Pack encoder.
 * Converts grouped tiles into a contiguous compressed blob and an offset/length index.
 */

import type { Tile } from '../tiles/aggregate';
import { compareTileKeys, formatTileKey } from '../tiles/grid';
import { encodeTile } from './canonical';
import type { Codec } from './compression';
import type { PackIndex, PackIndexEntry } from './types';

/**
 * Options for pack encoding
 */
export interface EncoderOptions {
  /** Codec applied to each tile's canonical bytes */
  codec: Codec;
}

export interface EncodedPack {
  /** Compressed payloads, concatenated in ascending tile key order */
  blob: Uint8Array;
  /** Index entries in blob order */
  entries: PackIndexEntry[];
  /** Same entries keyed by `"ix,iy"` */
  index: PackIndex;
}

/**
 * Encodes tiles into a pack.
 *
 * Tiles may arrive in any order. Each one is encoded and compressed on its
 * own, then ascending `(ix, iy)` order is restored before offsets are
 * assigned, so identical input always yields identical bytes.
 *
 * @throws Error if two tiles share a key
 */
export function encodePack(tiles: Iterable<Tile>, options: EncoderOptions): EncodedPack {
  const { codec } = options;

  const payloads = Array.from(tiles)
    .filter((tile) => tile.buildings.length > 0)
    .map((tile) => ({ key: tile.key, data: codec.compress(encodeTile(tile.buildings)) }));

  payloads.sort((a, b) => compareTileKeys(a.key, b.key));

  for (let i = 1; i < payloads.length; i++) {
    if (compareTileKeys(payloads[i - 1].key, payloads[i].key) === 0) {
      throw new Error(`Duplicate tile ${formatTileKey(payloads[i].key)} in pack input`);
    }
  }

  const totalLength = payloads.reduce((sum, payload) => sum + payload.data.length, 0);
  const blob = new Uint8Array(totalLength);
  const entries: PackIndexEntry[] = [];

  let offset = 0;
  for (const { key, data } of payloads) {
    blob.set(data, offset);
    entries.push({ tileKey: formatTileKey(key), offset, length: data.length });
    offset += data.length;
  }

  return { blob, entries, index: toPackIndex(entries) };
}

/**
 * Builds the persisted index from entries, keeping their order.
 */
export function toPackIndex(entries: readonly PackIndexEntry[]): PackIndex {
  const index: PackIndex = {};
  for (const { tileKey, offset, length } of entries) {
    index[tileKey] = { offset, length };
  }
  return index;
}

/**
 * Index file contents: two-space indented JSON with a trailing newline.
 */
export function serializePackIndex(index: PackIndex): string {
  return `${JSON.stringify(index, null, 2)}\n`;
}
