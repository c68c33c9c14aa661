/**
 * Pack format types and artifact naming.
 *
 * A pack is two files: a blob of compressed tile payloads concatenated in
 * ascending tile key order, and a JSON index mapping `"ix,iy"` to the byte
 * range of each payload.
 */

import type { TileKey } from '../tiles/types';

/**
 * One tile's byte range inside the pack blob
 */
export interface PackIndexEntry {
  tileKey: string;
  offset: number;
  length: number;
}

/**
 * Persisted index: `"ix,iy"` → byte range, keys in ascending tile order
 */
export type PackIndex = Record<string, { offset: number; length: number }>;

// ─────────────────────────────────────────────────────────────────────────────
// Compression
// ─────────────────────────────────────────────────────────────────────────────

export const COMPRESSION_ALGORITHMS = ['zlib', 'gzip', 'deflate-raw', 'zstd'] as const;

export type CompressionAlgorithm = (typeof COMPRESSION_ALGORITHMS)[number];

/** Codecs usable without loading a WebAssembly module first */
export type SyncCompressionAlgorithm = Exclude<CompressionAlgorithm, 'zstd'>;

export const DEFAULT_COMPRESSION: CompressionAlgorithm = 'zlib';

// ─────────────────────────────────────────────────────────────────────────────
// Output
// ─────────────────────────────────────────────────────────────────────────────

export const OUTPUT_MODES = ['packed', 'tiles', 'flat'] as const;

/**
 * - packed: one compressed blob plus an index
 * - tiles: one uncompressed JSON file per tile
 * - flat: every building in a single JSON file, no tiling
 */
export type OutputMode = (typeof OUTPUT_MODES)[number];

export const DEFAULT_ARTIFACT_NAME = 'buildings';

export const FLAT_FILE_NAME = 'buildings.json';

/**
 * File names of a packed artifact, e.g. `buildings.pack` and `buildings.index.json`.
 */
export function packFileNames(name: string): { pack: string; index: string } {
  return { pack: `${name}.pack`, index: `${name}.index.json` };
}

/**
 * File name of one tile in uncompressed mode, e.g. `tile_1_2.json`.
 */
export function tileFileName(key: TileKey): string {
  return `tile_${key.ix}_${key.iy}.json`;
}
