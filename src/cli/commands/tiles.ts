/**
 * Uncompressed output: one JSON file per non-empty tile.
 */

import { createBuildCommand } from '../command-factory';

/**
 * footprint-pack tiles <input> → buildings_tiles/tile_<ix>_<iy>.json
 */
export const tilesCommand = () =>
  createBuildCommand({
    name: 'tiles',
    description: 'Write one uncompressed JSON file per non-empty tile',
    mode: 'tiles',
    defaultOutDir: 'buildings_tiles',
  });
