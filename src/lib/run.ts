/**
 * End-to-end run: load features, tile them, write the configured artifacts.
 *
 * A run always starts from scratch. Re-running with the same input and
 * configuration reproduces byte-identical output, so an aborted run is
 * recovered by simply running again.
 */

import type { RawFeature } from './buildings/types';
import type { PackConfig } from './config';
import { readFeatures } from './input';
import { buildTiles, type PipelineStats } from './pipeline';
import { loadCodec } from './pack/compression';
import { encodePack } from './pack/encoder';
import { writeFlatFile, writePackArtifacts, writeTileFiles } from './pack/writer';
import type { OutputMode } from './pack/types';
import { type Logger, silentLogger } from './logger';

export interface RunSummary {
  mode: OutputMode;
  /** Paths of the files written */
  files: string[];
  stats: PipelineStats;
}

/**
 * Reads an input file and writes the artifacts described by `config`.
 *
 * @throws IOFailure if the input cannot be read or an artifact cannot be written
 */
export async function runBuild(
  inputPath: string,
  config: PackConfig,
  logger: Logger = silentLogger
): Promise<RunSummary> {
  const features = await readFeatures(inputPath, logger);
  logger.info('Loaded features', { input: inputPath, features: features.length });
  return writeArtifacts(features, config, logger);
}

/**
 * Tiles in-memory features and writes the artifacts described by `config`.
 */
export async function writeArtifacts(
  features: Iterable<RawFeature>,
  config: PackConfig,
  logger: Logger = silentLogger
): Promise<RunSummary> {
  const { tiles, buildings, minBound, stats } = buildTiles(features, config, logger);
  const { dir, name, mode } = config.output;

  switch (mode) {
    case 'packed': {
      const pack = encodePack(tiles.values(), { codec: await loadCodec(config.compression) });
      const { packPath, indexPath } = await writePackArtifacts(pack, dir, name);
      logger.info('Wrote pack', {
        pack: packPath,
        index: indexPath,
        tiles: pack.entries.length,
        bytes: pack.blob.length,
        compression: config.compression,
      });
      return { mode, files: [packPath, indexPath], stats };
    }
    case 'tiles': {
      const files = await writeTileFiles(tiles.sorted(), dir, { minBound, tileSize: config.tileSize });
      logger.info('Wrote tile files', { dir, tiles: files.length });
      return { mode, files, stats };
    }
    case 'flat': {
      const path = await writeFlatFile(buildings, dir);
      logger.info('Wrote buildings file', { path, buildings: buildings.length });
      return { mode, files: [path], stats };
    }
  }
}
