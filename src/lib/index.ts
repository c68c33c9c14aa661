/**
 * Building footprint tiling and packing.
 *
 * - **Buildings**: normalize raw polygons, estimate heights, filter by AOI
 * - **Tiles**: map centroids to grid cells and group buildings per cell
 * - **Pack**: canonical per-tile encoding, compression, offset/length index
 *
 * @example
 * const config = createConfig({ output: { dir: 'packed_buildings' } });
 * const { tiles } = buildTiles(features, config);
 * const pack = encodePack(tiles.values(), { codec: await loadCodec(config.compression) });
 * await writePackArtifacts(pack, config.output.dir, config.output.name);
 *
 * // Later, read one tile without decompressing the rest
 * const reader = await PackReader.open('packed_buildings', 'buildings', getCodec('zlib'));
 * const buildings = reader.readTile('3,7');
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  BuildingRecord,
  FootprintGeometry,
  NormalizedPolygon,
  RawFeature,
  RawGeometry,
  TagMap,
} from './buildings/types';
export type { TileKey, Bounds } from './tiles/types';
export type { Tile } from './tiles/aggregate';
export type {
  PackIndex,
  PackIndexEntry,
  CompressionAlgorithm,
  OutputMode,
} from './pack/types';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration, Errors, Logging
// ─────────────────────────────────────────────────────────────────────────────

export { createConfig, type PackConfig, type PackConfigInput } from './config';
export {
  ConfigurationError,
  IOFailure,
  PackFormatError,
  type HeightFallback,
  type SkippedGeometry,
  type SkipReason,
} from './errors';
export { createConsoleLogger, silentLogger, type Logger, type LogLevel } from './logger';

// ─────────────────────────────────────────────────────────────────────────────
// Buildings
// ─────────────────────────────────────────────────────────────────────────────

export { normalizeGeometry, normalizePolygon } from './buildings/normalize';
export { polygonCentroid } from './buildings/centroid';
export { estimateHeight, type HeightEstimate, type HeightOptions } from './buildings/height';
export {
  isWithinAreaOfInterest,
  bboxToAreaOfInterest,
  parseBbox,
  type AreaOfInterest,
} from './buildings/aoi';

// ─────────────────────────────────────────────────────────────────────────────
// Tiles
// ─────────────────────────────────────────────────────────────────────────────

export {
  DEFAULT_TILE_SIZE,
  DEFAULT_HEIGHT,
  DEFAULT_LEVEL_HEIGHT,
} from './tiles/types';
export {
  tileKeyFor,
  tileOrigin,
  formatTileKey,
  parseTileKey,
  compareTileKeys,
  computeBounds,
} from './tiles/grid';
export { TileAggregator } from './tiles/aggregate';

// ─────────────────────────────────────────────────────────────────────────────
// Pack
// ─────────────────────────────────────────────────────────────────────────────

export { canonicalizeTile, encodeTile, decodeTile } from './pack/canonical';
export { getCodec, loadCodec, type Codec } from './pack/compression';
export { encodePack, serializePackIndex, type EncodedPack } from './pack/encoder';
export { PackReader, parsePackIndex, verifyPackIndex } from './pack/reader';
export { writePackArtifacts, writeTileFiles, writeFlatFile } from './pack/writer';

// ─────────────────────────────────────────────────────────────────────────────
// Pipeline
// ─────────────────────────────────────────────────────────────────────────────

export { readFeatures, loadAreaOfInterest } from './input';
export { buildTiles, type PipelineResult, type PipelineStats } from './pipeline';
export { runBuild, writeArtifacts, type RunSummary } from './run';
