/**
 * Core types and defaults for the tile grid.
 */

/**
 * Integer grid cell coordinates. `ix` grows with x (east), `iy` with y (north).
 */
export interface TileKey {
  readonly ix: number;
  readonly iy: number;
}

/**
 * Axis-aligned planar bounds in metres
 */
export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Grid Defaults
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Tile edge length in metres (1 km × 1 km)
 */
export const DEFAULT_TILE_SIZE = 1000;

// ─────────────────────────────────────────────────────────────────────────────
// Height Defaults
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Fallback building height when tags carry nothing usable.
 * Roughly a single storey; dense cities may want more.
 */
export const DEFAULT_HEIGHT = 5;

/** Height of one storey, multiplied by the level count tag */
export const DEFAULT_LEVEL_HEIGHT = 5;

/** Tag keys read by the height estimator */
export const DEFAULT_HEIGHT_KEY = 'height';
export const DEFAULT_LEVELS_KEY = 'building:levels';
