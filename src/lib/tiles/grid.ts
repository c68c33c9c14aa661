/**
 * Tile grid indexing.
 *
 * Cells are half-open squares `[origin + i·s, origin + (i+1)·s)` on each
 * axis, so a point on a cell boundary belongs to the cell with the larger
 * index. Previously generated packs depend on this convention.
 */

import type { Position } from 'geojson';
import type { Bounds, TileKey } from './types';
import { ConfigurationError } from '../errors';

const TILE_KEY_PATTERN = /^(-?\d+),(-?\d+)$/;

/**
 * Maps a point to the grid cell containing it.
 *
 * @param point Planar point, usually a building centroid
 * @param minBound Grid origin, the dataset's minimum corner
 * @param tileSize Cell edge length in metres
 * @throws ConfigurationError if tileSize is not a positive finite number
 *
 * @example
 * tileKeyFor([1500, 2500], [0, 0], 1000); // → { ix: 1, iy: 2 }
 */
export function tileKeyFor(point: Position, minBound: Position, tileSize: number): TileKey {
  assertTileSize(tileSize);
  const [x, y] = point;
  if (!Number.isFinite(x) || !Number.isFinite(y)) {
    throw new Error(`Cannot index non-finite point (${x}, ${y})`);
  }
  return {
    ix: Math.floor((x - minBound[0]) / tileSize),
    iy: Math.floor((y - minBound[1]) / tileSize),
  };
}

/**
 * Lower-left corner of a cell in planar coordinates.
 *
 * @example
 * tileOrigin({ ix: 1, iy: 2 }, [0, 0], 1000); // → [1000, 2000]
 */
export function tileOrigin(key: TileKey, minBound: Position, tileSize: number): [number, number] {
  assertTileSize(tileSize);
  return [minBound[0] + key.ix * tileSize, minBound[1] + key.iy * tileSize];
}

/**
 * Formats a key as `"ix,iy"`, the form used in pack indexes.
 */
export function formatTileKey(key: TileKey): string {
  return `${key.ix},${key.iy}`;
}

/**
 * Parses an `"ix,iy"` string.
 * Returns null if the string is not two comma-separated integers.
 */
export function parseTileKey(value: string): TileKey | null {
  const match = TILE_KEY_PATTERN.exec(value);
  if (!match) return null;

  const ix = Number(match[1]);
  const iy = Number(match[2]);
  if (!Number.isSafeInteger(ix) || !Number.isSafeInteger(iy)) return null;

  return { ix, iy };
}

/**
 * Ascending lexicographic `(ix, iy)` order, the order tiles are written to a pack.
 */
export function compareTileKeys(a: TileKey, b: TileKey): number {
  return a.ix !== b.ix ? a.ix - b.ix : a.iy - b.iy;
}

/**
 * Computes the bounds of a set of rings, ignoring non-finite positions.
 * Returns null when there are no finite coordinates.
 */
export function computeBounds(rings: Iterable<Position[]>): Bounds | null {
  let bounds: Bounds | null = null;
  for (const ring of rings) {
    for (const [x, y] of ring) {
      if (!Number.isFinite(x) || !Number.isFinite(y)) continue;
      if (!bounds) {
        bounds = { minX: x, minY: y, maxX: x, maxY: y };
        continue;
      }
      bounds.minX = Math.min(bounds.minX, x);
      bounds.minY = Math.min(bounds.minY, y);
      bounds.maxX = Math.max(bounds.maxX, x);
      bounds.maxY = Math.max(bounds.maxY, y);
    }
  }
  return bounds;
}

function assertTileSize(tileSize: number): void {
  if (!Number.isFinite(tileSize) || tileSize <= 0) {
    throw new ConfigurationError(`Tile size must be a positive number, got ${tileSize}`);
  }
}
