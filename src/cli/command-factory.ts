/**
 * Factory for build commands with the common boilerplate extracted.
 *
 * Handles: shared options (with environment fallbacks), configuration
 * validation, AOI loading, logging, and error reporting. Commands only choose
 * their output mode and defaults.
 */

import { Command, Option } from 'commander';

import { createConfig, type PackConfig } from '../lib/config';
import { loadAreaOfInterest } from '../lib/input';
import { bboxToAreaOfInterest, parseBbox, type AreaOfInterest } from '../lib/buildings/aoi';
import { runBuild } from '../lib/run';
import {
  COMPRESSION_ALGORITHMS,
  DEFAULT_ARTIFACT_NAME,
  DEFAULT_COMPRESSION,
  type CompressionAlgorithm,
  type OutputMode,
} from '../lib/pack/types';
import {
  DEFAULT_HEIGHT,
  DEFAULT_HEIGHT_KEY,
  DEFAULT_LEVEL_HEIGHT,
  DEFAULT_LEVELS_KEY,
  DEFAULT_TILE_SIZE,
} from '../lib/tiles/types';
import { createConsoleLogger, LOG_LEVELS, type Logger, type LogLevel } from '../lib/logger';
import { ConfigurationError, describeError } from '../lib/errors';

/** Prefix of environment variables read as option fallbacks */
export const ENV_PREFIX = 'FOOTPRINT_PACK_';

/**
 * Raw option values as Commander hands them over
 */
export interface BuildCommandOptions {
  out: string;
  name: string;
  tileSize: string;
  defaultHeight: string;
  levelHeight: string;
  heightKey: string;
  levelsKey: string;
  compression: CompressionAlgorithm;
  origin?: string;
  aoi?: string;
  bbox?: string;
  logLevel: LogLevel;
  jsonLogs?: boolean;
}

/**
 * Configuration for a build command
 */
export interface BuildCommandConfig {
  /** Command name (e.g., 'pack', 'tiles') */
  name: string;
  description: string;
  mode: OutputMode;
  /** Output directory when neither --out nor the environment sets one */
  defaultOutDir: string;
}

/**
 * Creates a command that reads a GeoJSON file and writes artifacts in the given mode.
 *
 * Exit codes: 0 on success, 1 on I/O or data failures, 2 on configuration errors.
 */
export function createBuildCommand(config: BuildCommandConfig): Command {
  const { name, description, mode, defaultOutDir } = config;

  const command = new Command(name)
    .description(description)
    .argument('<input>', 'GeoJSON FeatureCollection or newline-delimited features, in planar metres')
    .addOption(envOption('-o, --out <dir>', 'output directory', 'OUT_DIR').default(defaultOutDir))
    .addOption(envOption('-n, --name <name>', 'artifact base name', 'NAME').default(DEFAULT_ARTIFACT_NAME))
    .addOption(envOption('--tile-size <metres>', 'tile edge length', 'TILE_SIZE').default(String(DEFAULT_TILE_SIZE)))
    .addOption(
      envOption('--default-height <metres>', 'height when tags carry none', 'DEFAULT_HEIGHT').default(
        String(DEFAULT_HEIGHT)
      )
    )
    .addOption(
      envOption('--level-height <metres>', 'height of one storey', 'LEVEL_HEIGHT').default(
        String(DEFAULT_LEVEL_HEIGHT)
      )
    )
    .addOption(envOption('--height-key <tag>', 'tag holding an explicit height', 'HEIGHT_KEY').default(DEFAULT_HEIGHT_KEY))
    .addOption(envOption('--levels-key <tag>', 'tag holding a level count', 'LEVELS_KEY').default(DEFAULT_LEVELS_KEY))
    .addOption(
      envOption('--compression <algorithm>', 'tile payload codec', 'COMPRESSION')
        .choices(COMPRESSION_ALGORITHMS)
        .default(DEFAULT_COMPRESSION)
    )
    .addOption(new Option('--origin <x,y>', 'grid origin (default: minimum corner of the data)'))
    .addOption(new Option('--aoi <file>', 'GeoJSON polygon limiting the buildings kept'))
    .addOption(new Option('--bbox <minx,miny,maxx,maxy>', 'rectangular area of interest').conflicts('aoi'))
    .addOption(envOption('--log-level <level>', 'minimum log level', 'LOG_LEVEL').choices(LOG_LEVELS).default('info'))
    .option('--json-logs', 'write logs as JSON lines');

  command.action(async (input: string, options: BuildCommandOptions) => {
    const logger = createConsoleLogger({ level: options.logLevel, json: options.jsonLogs ?? false });

    try {
      const packConfig = await resolveConfig(options, mode);
      const summary = await runBuild(input, packConfig, logger);
      logSkips(logger, summary.stats.skipped);
    } catch (error) {
      logger.error(`${name} failed`, { error: describeError(error) });
      process.exitCode = error instanceof ConfigurationError ? 2 : 1;
    }
  });

  return command;
}

/**
 * Turns raw option strings into a validated configuration.
 *
 * @throws ConfigurationError if any value is invalid
 */
export async function resolveConfig(options: BuildCommandOptions, mode: OutputMode): Promise<PackConfig> {
  return createConfig({
    tileSize: parseNumber(options.tileSize),
    defaultHeight: parseNumber(options.defaultHeight),
    levelHeight: parseNumber(options.levelHeight),
    heightKey: options.heightKey,
    levelsKey: options.levelsKey,
    compression: options.compression,
    origin: options.origin === undefined ? undefined : parseOrigin(options.origin),
    aoi: await resolveAreaOfInterest(options),
    output: { dir: options.out, name: options.name, mode },
  });
}

async function resolveAreaOfInterest(options: BuildCommandOptions): Promise<AreaOfInterest | undefined> {
  if (options.aoi !== undefined) return loadAreaOfInterest(options.aoi);
  if (options.bbox !== undefined) return bboxToAreaOfInterest(parseBbox(options.bbox));
  return undefined;
}

function envOption(flags: string, description: string, envSuffix: string): Option {
  return new Option(flags, description).env(`${ENV_PREFIX}${envSuffix}`);
}

/**
 * Empty strings become NaN so validation rejects them instead of reading 0.
 */
function parseNumber(value: string): number {
  return value.trim() === '' ? Number.NaN : Number(value);
}

function parseOrigin(value: string): [number, number] {
  const parts = value.split(',');
  if (parts.length !== 2) {
    throw new ConfigurationError(`Origin must be "x,y", got "${value}"`);
  }
  return [parseNumber(parts[0]), parseNumber(parts[1])];
}

function logSkips(logger: Logger, skipped: Record<string, number>): void {
  for (const [reason, count] of Object.entries(skipped)) {
    if (count > 0) logger.warn('Skipped geometries', { reason, count });
  }
}
