/**
 * Artifact writers.
 *
 * Every file is first written under a temporary name in its destination
 * directory and renamed into place only once all files of the run are fully
 * written. On failure the temporaries are removed and an IOFailure is thrown,
 * so a partially written artifact is never published. For packs the index is
 * renamed last: a reader never sees an index pointing into an older blob.
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Position } from 'geojson';

import type { BuildingRecord } from '../buildings/types';
import type { Tile } from '../tiles/aggregate';
import { tileOrigin } from '../tiles/grid';
import { canonicalizeTile } from './canonical';
import { type EncodedPack, serializePackIndex } from './encoder';
import { FLAT_FILE_NAME, packFileNames, tileFileName } from './types';
import { IOFailure } from '../errors';

interface PendingFile {
  path: string;
  data: Uint8Array | string;
}

/**
 * Grid parameters recorded in per-tile files
 */
export interface TileFileOptions {
  minBound: Position;
  tileSize: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Writes `<name>.pack` and `<name>.index.json`.
 *
 * @returns Paths of the blob and the index
 */
export async function writePackArtifacts(
  pack: EncodedPack,
  dir: string,
  name: string
): Promise<{ packPath: string; indexPath: string }> {
  const files = packFileNames(name);
  const packPath = join(dir, files.pack);
  const indexPath = join(dir, files.index);

  await ensureDirectory(dir);
  await commitFiles([
    { path: packPath, data: pack.blob },
    { path: indexPath, data: serializePackIndex(pack.index) },
  ]);

  return { packPath, indexPath };
}

/**
 * Writes one uncompressed `tile_<ix>_<iy>.json` per tile:
 * `{"tile_origin":[x,y],"tile_size":s,"buildings":[...]}`.
 *
 * @returns Paths of the written files, in the order of `tiles`
 */
export async function writeTileFiles(
  tiles: readonly Tile[],
  dir: string,
  options: TileFileOptions
): Promise<string[]> {
  const files = tiles
    .filter((tile) => tile.buildings.length > 0)
    .map((tile) => ({
      path: join(dir, tileFileName(tile.key)),
      data: serializeTileFile(tile, options),
    }));

  await ensureDirectory(dir);
  await commitFiles(files);

  return files.map((file) => file.path);
}

/**
 * Writes every building into a single `buildings.json`: `{"buildings":[...]}`.
 */
export async function writeFlatFile(
  buildings: readonly BuildingRecord[],
  dir: string
): Promise<string> {
  const path = join(dir, FLAT_FILE_NAME);

  await ensureDirectory(dir);
  await commitFiles([{ path, data: `{"buildings":${canonicalizeTile(buildings)}}` }]);

  return path;
}

/**
 * Contents of an uncompressed tile file.
 */
export function serializeTileFile(tile: Tile, options: TileFileOptions): string {
  const origin = tileOrigin(tile.key, options.minBound, options.tileSize);
  return (
    `{"tile_origin":${JSON.stringify(origin)},` +
    `"tile_size":${JSON.stringify(options.tileSize)},` +
    `"buildings":${canonicalizeTile(tile.buildings)}}`
  );
}

// ─────────────────────────────────────────────────────────────────────────────
// Commit
// ─────────────────────────────────────────────────────────────────────────────

async function ensureDirectory(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
  } catch (error) {
    throw new IOFailure('Cannot create output directory', dir, { cause: error });
  }
}

/**
 * Stages all files, then renames them into place in order.
 */
async function commitFiles(files: readonly PendingFile[]): Promise<void> {
  const staged: { temp: string; path: string }[] = [];
  let current = '';

  try {
    for (const file of files) {
      current = file.path;
      const temp = `${file.path}.tmp-${process.pid}`;
      staged.push({ temp, path: file.path });
      await writeFile(temp, file.data);
    }
    for (const { temp, path } of staged) {
      current = path;
      await rename(temp, path);
    }
  } catch (error) {
    await Promise.allSettled(staged.map(({ temp }) => rm(temp, { force: true })));
    throw new IOFailure('Cannot write artifact', current, { cause: error });
  }
}
