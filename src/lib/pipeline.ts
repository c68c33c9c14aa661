/**
 * Tiling pipeline: normalize → estimate height → filter by AOI → index → aggregate.
 *
 * The grid origin is the minimum corner of the whole input, skipped and
 * out-of-AOI geometries included, so features are read in a first pass and
 * assigned to tiles in a second one.
 */

import type { Position } from 'geojson';

import type { BuildingRecord, NormalizedPolygon, RawFeature, RawGeometry } from './buildings/types';
import { normalizeGeometry } from './buildings/normalize';
import { estimateHeight, type HeightSource } from './buildings/height';
import { type AreaOfInterest, isWithinAreaOfInterest } from './buildings/aoi';
import { polygonCentroid } from './buildings/centroid';
import { computeBounds, tileKeyFor } from './tiles/grid';
import { TileAggregator } from './tiles/aggregate';
import type { PackConfig } from './config';
import { type Logger, silentLogger } from './logger';
import type { SkipReason } from './errors';

/**
 * The configuration fields the tiling stage reads
 */
export type TilingOptions = Pick<
  PackConfig,
  'tileSize' | 'defaultHeight' | 'levelHeight' | 'heightKey' | 'levelsKey' | 'origin'
> & {
  aoi?: AreaOfInterest;
};

export interface PipelineStats {
  /** Input features read */
  features: number;
  /** Polygons that passed normalization */
  polygons: number;
  /** Buildings assigned to tiles */
  buildings: number;
  /** Non-empty tiles */
  tiles: number;
  /** Skipped geometries (or multi-polygon parts) by reason */
  skipped: Record<SkipReason, number>;
  /** Features by the height rule that produced their height */
  heightSources: Record<HeightSource, number>;
  /** Height rules that were present but unusable */
  heightFallbacks: number;
  /** Polygons dropped for lying outside the area of interest */
  outsideAoi: number;
}

export interface PipelineResult {
  tiles: TileAggregator;
  /** Every accepted building, in input order */
  buildings: BuildingRecord[];
  /** Grid origin used for tile keys */
  minBound: Position;
  stats: PipelineStats;
}

interface Candidate {
  polygon: NormalizedPolygon;
  height: number;
}

/**
 * Groups input features into tiles.
 *
 * @example
 * const { tiles, stats } = buildTiles(features, config, logger);
 * const pack = encodePack(tiles.values(), { codec: await loadCodec(config.compression) });
 */
export function buildTiles(
  features: Iterable<RawFeature>,
  options: TilingOptions,
  logger: Logger = silentLogger
): PipelineResult {
  const stats = createStats();
  const candidates: Candidate[] = [];
  const inputRings: Position[][] = [];

  for (const feature of features) {
    const position = stats.features++;
    for (const ring of geometryRings(feature.geometry)) inputRings.push(ring);
    const { polygons, skipped } = normalizeGeometry(feature.geometry);

    for (const { reason, part } of skipped) {
      stats.skipped[reason]++;
      logger.debug('Skipped geometry', { feature: position, part, reason });
    }
    if (polygons.length === 0) continue;

    const estimate = estimateHeight(feature.tags, options);
    stats.heightSources[estimate.source]++;
    for (const fallback of estimate.fallbacks) {
      stats.heightFallbacks++;
      logger.debug('Height rule fell through', { feature: position, rule: fallback.rule, value: fallback.value });
    }

    for (const polygon of polygons) {
      stats.polygons++;
      if (options.aoi && !isWithinAreaOfInterest(polygon.exterior, options.aoi)) {
        stats.outsideAoi++;
        continue;
      }
      candidates.push({ polygon, height: estimate.height });
    }
  }

  const minBound = resolveMinBound(inputRings, options.origin);
  const tiles = new TileAggregator();
  const buildings: BuildingRecord[] = [];

  for (const { polygon, height } of candidates) {
    const building: BuildingRecord = { footprint: polygon.exterior, height };
    tiles.add(tileKeyFor(polygonCentroid(polygon), minBound, options.tileSize), building);
    buildings.push(building);
  }

  stats.buildings = tiles.buildingCount;
  stats.tiles = tiles.size;

  logger.info('Grouped buildings into tiles', {
    features: stats.features,
    buildings: stats.buildings,
    tiles: stats.tiles,
    skipped: countSkipped(stats),
    outsideAoi: stats.outsideAoi,
  });

  return { tiles, buildings, minBound, stats };
}

/**
 * The configured origin, else the minimum finite corner of the input.
 * Without any finite coordinate the origin is irrelevant and defaults to (0, 0).
 */
function resolveMinBound(rings: readonly Position[][], origin: PackConfig['origin']): Position {
  if (origin) return [origin[0], origin[1]];
  const bounds = computeBounds(rings);
  return bounds ? [bounds.minX, bounds.minY] : [0, 0];
}

function geometryRings(geometry: RawGeometry | null): Position[][] {
  if (!geometry) return [];
  switch (geometry.type) {
    case 'Polygon':
      return geometry.coordinates;
    case 'MultiPolygon':
      return geometry.coordinates.flat();
    default:
      return [];
  }
}

function createStats(): PipelineStats {
  return {
    features: 0,
    polygons: 0,
    buildings: 0,
    tiles: 0,
    skipped: {
      'null-geometry': 0,
      'unsupported-type': 0,
      empty: 0,
      'missing-exterior': 0,
      'non-finite-coordinate': 0,
      'too-few-points': 0,
      'zero-area': 0,
      'self-intersection': 0,
      'hole-outside-shell': 0,
    },
    heightSources: { height: 0, levels: 0, default: 0 },
    heightFallbacks: 0,
    outsideAoi: 0,
  };
}

function countSkipped(stats: PipelineStats): number {
  return Object.values(stats.skipped).reduce((sum, count) => sum + count, 0);
}
