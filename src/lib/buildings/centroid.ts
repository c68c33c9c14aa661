/**
 * Planar polygon centroid.
 *
 * Uses the area-weighted centroid (holes subtract), not the vertex mean or
 * the bounding-box centre. Coordinates are shifted to the first exterior
 * vertex before accumulating to keep large projected values precise.
 */

import type { Position } from 'geojson';
import type { NormalizedPolygon } from './types';

/**
 * Computes the area-weighted centroid of a polygon.
 *
 * @throws Error if the polygon has zero net area
 *
 * @example
 * polygonCentroid({ exterior: [[0, 0], [2, 0], [2, 2], [0, 2], [0, 0]], holes: [] });
 * // → [1, 1]
 */
export function polygonCentroid(polygon: NormalizedPolygon): Position {
  const [ox, oy] = polygon.exterior[0];

  let area = 0;
  let momentX = 0;
  let momentY = 0;

  const accumulate = (ring: Position[], isHole: boolean) => {
    const moments = ringMoments(ring, ox, oy);
    // Exterior counts positive and holes negative, whatever the winding
    const sign = (moments.area >= 0) !== isHole ? 1 : -1;
    area += sign * moments.area;
    momentX += sign * moments.momentX;
    momentY += sign * moments.momentY;
  };

  accumulate(polygon.exterior, false);
  for (const hole of polygon.holes) {
    accumulate(hole, true);
  }

  if (area === 0) {
    throw new Error('Cannot compute the centroid of a polygon with zero area');
  }

  return [ox + momentX / area, oy + momentY / area];
}

function ringMoments(
  ring: Position[],
  ox: number,
  oy: number
): { area: number; momentX: number; momentY: number } {
  let twiceArea = 0;
  let sx = 0;
  let sy = 0;

  for (let i = 0; i < ring.length - 1; i++) {
    const x0 = ring[i][0] - ox;
    const y0 = ring[i][1] - oy;
    const x1 = ring[i + 1][0] - ox;
    const y1 = ring[i + 1][1] - oy;
    const cross = x0 * y1 - x1 * y0;
    twiceArea += cross;
    sx += (x0 + x1) * cross;
    sy += (y0 + y1) * cross;
  }

  return { area: twiceArea / 2, momentX: sx / 6, momentY: sy / 6 };
}
