import { Command } from 'commander';

import { packCommand } from './commands/pack';
import { tilesCommand } from './commands/tiles';
import { flatCommand } from './commands/flat';
import { inspectCommand } from './commands/inspect';

export const VERSION = '0.1.0';

/**
 * Builds the CLI. Each call returns a fresh program so tests can parse
 * arguments repeatedly.
 */
export function createProgram(): Command {
  return new Command()
    .name('footprint-pack')
    .description('Tile building footprints into compact, randomly accessible packs')
    .version(VERSION)
    .addCommand(packCommand())
    .addCommand(tilesCommand())
    .addCommand(flatCommand())
    .addCommand(inspectCommand());
}
