/**
 * Groups building records by tile key.
 *
 * Insertion order is preserved, both for tiles (first seen first) and for the
 * buildings inside each tile. Only tiles that received a building exist.
 */

import type { BuildingRecord } from '../buildings/types';
import type { TileKey } from './types';
import { compareTileKeys, formatTileKey } from './grid';

/**
 * One grid cell and the buildings whose centroid falls inside it.
 */
export interface Tile {
  readonly key: TileKey;
  readonly buildings: BuildingRecord[];
}

export class TileAggregator {
  private readonly tiles = new Map<string, Tile>();
  private count = 0;

  /**
   * Appends a building to the tile with the given key, creating the tile on first use.
   */
  add(key: TileKey, building: BuildingRecord): void {
    const id = formatTileKey(key);
    let tile = this.tiles.get(id);
    if (!tile) {
      tile = { key: { ix: key.ix, iy: key.iy }, buildings: [] };
      this.tiles.set(id, tile);
    }
    tile.buildings.push(building);
    this.count++;
  }

  get(key: TileKey): Tile | undefined {
    return this.tiles.get(formatTileKey(key));
  }

  /** Number of non-empty tiles */
  get size(): number {
    return this.tiles.size;
  }

  /** Number of buildings across all tiles */
  get buildingCount(): number {
    return this.count;
  }

  /**
   * Tiles in insertion order.
   */
  values(): Tile[] {
    return [...this.tiles.values()];
  }

  /**
   * Tiles in ascending `(ix, iy)` order.
   */
  sorted(): Tile[] {
    return this.values().sort((a, b) => compareTileKeys(a.key, b.key));
  }
}
