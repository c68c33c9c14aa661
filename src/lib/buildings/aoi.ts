/**
 * Area-of-interest filtering.
 *
 * The AOI is a polygon in the same planar reference as the footprints. A
 * footprint is kept when all of its exterior vertices lie inside the AOI or
 * on its boundary.
 */

import type { Polygon, Position } from 'geojson';
import booleanPointInPolygon from '@turf/boolean-point-in-polygon';
import { polygon } from '@turf/helpers';

import type { FootprintGeometry } from './types';
import { ConfigurationError } from '../errors';

export type AreaOfInterest = FootprintGeometry;

export type BBox = [minX: number, minY: number, maxX: number, maxY: number];

/**
 * Tests whether a footprint lies within the area of interest.
 */
export function isWithinAreaOfInterest(footprint: Position[], aoi: AreaOfInterest): boolean {
  return footprint.every((position) => booleanPointInPolygon(position, aoi));
}

/**
 * Builds a rectangular AOI polygon from a bounding box.
 */
export function bboxToAreaOfInterest(bbox: BBox): Polygon {
  const [minX, minY, maxX, maxY] = bbox;
  return polygon([
    [
      [minX, minY],
      [maxX, minY],
      [maxX, maxY],
      [minX, maxY],
      [minX, minY],
    ],
  ]).geometry;
}

/**
 * Parses `"minx,miny,maxx,maxy"`.
 *
 * @throws ConfigurationError if the value is not four finite numbers with min < max
 */
export function parseBbox(value: string): BBox {
  const parts = value.split(',').map((part) => Number(part.trim()));
  if (parts.length !== 4 || parts.some((part) => !Number.isFinite(part))) {
    throw new ConfigurationError(`Bounding box must be "minx,miny,maxx,maxy", got "${value}"`);
  }

  const [minX, minY, maxX, maxY] = parts;
  if (minX >= maxX || minY >= maxY) {
    throw new ConfigurationError(`Bounding box minimum must be below its maximum, got "${value}"`);
  }
  return [minX, minY, maxX, maxY];
}
