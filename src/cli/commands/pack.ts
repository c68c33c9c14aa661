/**
 * Packed output: one compressed blob plus an offset/length index.
 */

import { createBuildCommand } from '../command-factory';

/**
 * footprint-pack pack <input> → packed_buildings/buildings.pack, buildings.index.json
 */
export const packCommand = () =>
  createBuildCommand({
    name: 'pack',
    description: 'Write a compressed, randomly accessible tile pack and its index',
    mode: 'packed',
    defaultOutDir: 'packed_buildings',
  });
