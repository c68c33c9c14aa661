/**
 * Reads a pack back: summary, a single tile, or a full verification pass.
 *
 * Results go to stdout as JSON; logs go to stderr.
 */

import { Command, Option } from 'commander';

import { PackReader } from '../../lib/pack/reader';
import { loadCodec } from '../../lib/pack/compression';
import { decodeTile, encodeTile } from '../../lib/pack/canonical';
import { COMPRESSION_ALGORITHMS, DEFAULT_ARTIFACT_NAME, DEFAULT_COMPRESSION, type CompressionAlgorithm } from '../../lib/pack/types';
import { parseTileKey } from '../../lib/tiles/grid';
import { createConsoleLogger, LOG_LEVELS, type LogLevel } from '../../lib/logger';
import { ConfigurationError, describeError } from '../../lib/errors';
import { ENV_PREFIX } from '../command-factory';

interface InspectOptions {
  name: string;
  compression: CompressionAlgorithm;
  tile?: string;
  verify?: boolean;
  logLevel: LogLevel;
}

export interface VerifyReport {
  tiles: number;
  buildings: number;
  /** Tiles whose payload does not decode to canonical bytes */
  mismatches: string[];
}

/**
 * Decodes every tile and checks that re-encoding reproduces the stored bytes.
 */
export function verifyPack(reader: PackReader): VerifyReport {
  const report: VerifyReport = { tiles: 0, buildings: 0, mismatches: [] };

  for (const key of reader.keys()) {
    const raw = reader.readRaw(key);
    report.tiles++;
    if (!raw) {
      report.mismatches.push(key);
      continue;
    }
    const buildings = decodeTile(raw);
    report.buildings += buildings.length;
    if (!sameBytes(raw, encodeTile(buildings))) report.mismatches.push(key);
  }

  return report;
}

export const inspectCommand = () =>
  new Command('inspect')
    .description('Print the contents of a tile pack')
    .argument('<dir>', 'directory holding the pack and its index')
    .addOption(
      new Option('-n, --name <name>', 'artifact base name').env(`${ENV_PREFIX}NAME`).default(DEFAULT_ARTIFACT_NAME)
    )
    .addOption(
      new Option('--compression <algorithm>', 'tile payload codec')
        .env(`${ENV_PREFIX}COMPRESSION`)
        .choices(COMPRESSION_ALGORITHMS)
        .default(DEFAULT_COMPRESSION)
    )
    .option('-t, --tile <ix,iy>', 'print the buildings of one tile')
    .option('--verify', 'decode every tile and check its canonical encoding')
    .addOption(
      new Option('--log-level <level>', 'minimum log level')
        .env(`${ENV_PREFIX}LOG_LEVEL`)
        .choices(LOG_LEVELS)
        .default('info')
    )
    .action(async (dir: string, options: InspectOptions) => {
      const logger = createConsoleLogger({ level: options.logLevel });

      try {
        const reader = await PackReader.open(dir, options.name, await loadCodec(options.compression));

        if (options.tile !== undefined) {
          const key = parseTileKey(options.tile);
          if (!key) throw new ConfigurationError(`Tile key must be "ix,iy", got "${options.tile}"`);
          const buildings = reader.readTile(key);
          if (!buildings) {
            logger.error('Tile not found', { tile: options.tile });
            process.exitCode = 1;
            return;
          }
          console.log(JSON.stringify({ tile: options.tile, buildings }));
          return;
        }

        if (options.verify) {
          const report = verifyPack(reader);
          console.log(JSON.stringify(report));
          if (report.mismatches.length > 0) {
            logger.error('Pack verification failed', { mismatches: report.mismatches.length });
            process.exitCode = 1;
          }
          return;
        }

        console.log(
          JSON.stringify({
            tiles: reader.size,
            bytes: reader.byteLength,
            keys: reader.keys(),
          })
        );
      } catch (error) {
        logger.error('inspect failed', { error: describeError(error) });
        process.exitCode = error instanceof ConfigurationError ? 2 : 1;
      }
    });

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
