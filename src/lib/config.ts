/**
 * Run configuration.
 *
 * Every tunable of a run (grid, height rules, codec, AOI, output) lives in
 * one immutable value created here and passed to each component. Nothing in
 * the library reads environment variables or process-wide state.
 */

import { z } from 'zod';

import { FootprintGeometrySchema } from './geojson-schema';
import {
  DEFAULT_HEIGHT,
  DEFAULT_HEIGHT_KEY,
  DEFAULT_LEVEL_HEIGHT,
  DEFAULT_LEVELS_KEY,
  DEFAULT_TILE_SIZE,
} from './tiles/types';
import {
  COMPRESSION_ALGORITHMS,
  DEFAULT_ARTIFACT_NAME,
  DEFAULT_COMPRESSION,
  OUTPUT_MODES,
} from './pack/types';
import { ConfigurationError } from './errors';

const positiveMetres = z.number().finite().positive();

/** Artifact names become file names; keep them to one path segment */
const ARTIFACT_NAME = /^[A-Za-z0-9][\w.-]*$/;

export const PackConfigSchema = z
  .object({
    tileSize: positiveMetres.default(DEFAULT_TILE_SIZE),
    defaultHeight: positiveMetres.default(DEFAULT_HEIGHT),
    levelHeight: positiveMetres.default(DEFAULT_LEVEL_HEIGHT),
    heightKey: z.string().min(1).default(DEFAULT_HEIGHT_KEY),
    levelsKey: z.string().min(1).default(DEFAULT_LEVELS_KEY),
    compression: z.enum(COMPRESSION_ALGORITHMS).default(DEFAULT_COMPRESSION),
    /** Grid origin; defaults to the minimum corner of the dataset */
    origin: z.tuple([z.number().finite(), z.number().finite()]).optional(),
    /** Area of interest in the same planar reference as the input */
    aoi: FootprintGeometrySchema.optional(),
    output: z
      .object({
        dir: z.string().min(1),
        name: z
          .string()
          .regex(ARTIFACT_NAME, 'must be a plain file name')
          .default(DEFAULT_ARTIFACT_NAME),
        mode: z.enum(OUTPUT_MODES).default('packed'),
      })
      .readonly(),
  })
  .readonly();

export type PackConfig = z.output<typeof PackConfigSchema>;
export type PackConfigInput = z.input<typeof PackConfigSchema>;

/**
 * Validates and freezes a run configuration, filling in defaults.
 *
 * @throws ConfigurationError listing every invalid field
 *
 * @example
 * const config = createConfig({ tileSize: 500, output: { dir: 'out' } });
 * config.compression; // 'zlib'
 */
export function createConfig(input: PackConfigInput): PackConfig {
  const result = PackConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid configuration',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}
