import { createBuildCommand } from '../command-factory';

/**
 * footprint-pack flat <input> → ./buildings.json, every building without tiling
 */
export const flatCommand = () =>
  createBuildCommand({
    name: 'flat',
    description: 'Write every accepted building into a single JSON file',
    mode: 'flat',
    defaultOutDir: '.',
  });
