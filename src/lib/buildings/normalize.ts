/**
 * Geometry normalization for raw building footprints.
 *
 * Expands multi-polygons into simple polygons and drops anything that cannot
 * be a footprint: null or empty geometry, non-polygonal types, rings with
 * non-finite coordinates, degenerate or self-intersecting rings, and holes
 * lying outside their shell. Every drop is reported as a SkippedGeometry so
 * callers can log and count it.
 *
 * A polygon that passes has a positive net area, so its centroid is defined.
 */

import type { Polygon, Position } from 'geojson';
import booleanPointInPolygon from '@turf/boolean-point-in-polygon';
import { polygon } from '@turf/helpers';
import kinks from '@turf/kinks';

import type { NormalizedPolygon, RawGeometry } from './types';
import type { SkipReason, SkippedGeometry } from '../errors';

/**
 * Result of normalizing one raw geometry.
 */
export interface NormalizeResult {
  polygons: NormalizedPolygon[];
  skipped: SkippedGeometry[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Normalizes a Polygon or MultiPolygon into zero or more simple polygons.
 *
 * @example
 * const { polygons, skipped } = normalizeGeometry(feature.geometry);
 */
export function normalizeGeometry(geometry: RawGeometry | null | undefined): NormalizeResult {
  if (!geometry) {
    return { polygons: [], skipped: [skip('null-geometry', 0)] };
  }

  let parts: Position[][][];
  switch (geometry.type) {
    case 'Polygon':
      parts = [geometry.coordinates];
      break;
    case 'MultiPolygon':
      parts = geometry.coordinates;
      break;
    default:
      return { polygons: [], skipped: [skip('unsupported-type', 0)] };
  }

  if (parts.length === 0) {
    return { polygons: [], skipped: [skip('empty', 0)] };
  }

  const result: NormalizeResult = { polygons: [], skipped: [] };
  parts.forEach((rings, part) => {
    const normalized = normalizePolygon(rings);
    if (typeof normalized === 'string') {
      result.skipped.push(skip(normalized, part));
    } else {
      result.polygons.push(normalized);
    }
  });
  return result;
}

/**
 * Validates the rings of one polygon.
 *
 * @returns The normalized polygon, or the reason it was rejected
 */
export function normalizePolygon(rings: Position[][]): NormalizedPolygon | SkipReason {
  if (rings.length === 0) return 'empty';
  if (rings[0].length === 0) return 'missing-exterior';

  const closed: Position[][] = [];
  for (const ring of rings) {
    if (!ring.every(isFinitePosition)) return 'non-finite-coordinate';
    closed.push(closeRing(ring.map((p) => [p[0], p[1]])));
  }

  for (const ring of closed) {
    if (countDistinct(ring) < 3) return 'too-few-points';
    if (signedArea(ring) === 0) return 'zero-area';
  }

  if (hasSelfIntersection(closed)) return 'self-intersection';

  const [exterior, ...holes] = closed;
  if (!holes.every((hole) => isInsideShell(hole, exterior))) return 'hole-outside-shell';
  if (netArea(exterior, holes) <= 0) return 'zero-area';

  return { exterior, holes };
}

/**
 * Signed planar area of a closed ring (shoelace). Positive when counter-clockwise.
 */
export function signedArea(ring: Position[]): number {
  let sum = 0;
  for (let i = 0; i < ring.length - 1; i++) {
    sum += ring[i][0] * ring[i + 1][1] - ring[i + 1][0] * ring[i][1];
  }
  return sum / 2;
}

// ─────────────────────────────────────────────────────────────────────────────
// Ring Helpers
// ─────────────────────────────────────────────────────────────────────────────

function skip(reason: SkipReason, part: number): SkippedGeometry {
  return { kind: 'skipped-geometry', reason, part };
}

function isFinitePosition(p: Position): boolean {
  return p.length >= 2 && Number.isFinite(p[0]) && Number.isFinite(p[1]);
}

function samePosition(a: Position, b: Position): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

function closeRing(ring: Position[]): Position[] {
  const first = ring[0];
  const last = ring[ring.length - 1];
  return samePosition(first, last) ? ring : [...ring, [first[0], first[1]]];
}

function countDistinct(ring: Position[]): number {
  return new Set(ring.map((p) => `${p[0]},${p[1]}`)).size;
}

/**
 * Consecutive duplicate vertices produce zero-length segments that the
 * intersection test would report as kinks; drop them before testing.
 */
function dropRepeatedPoints(ring: Position[]): Position[] {
  return ring.filter((p, i) => i === 0 || !samePosition(p, ring[i - 1]));
}

/**
 * Vertices on the shell boundary count as inside; a hole crossing the shell
 * is already rejected as a self-intersection.
 */
function isInsideShell(hole: Position[], exterior: Position[]): boolean {
  const shell: Polygon = polygon([exterior]).geometry;
  return hole.every((position) => booleanPointInPolygon(position, shell));
}

function netArea(exterior: Position[], holes: Position[][]): number {
  return holes.reduce((area, hole) => area - Math.abs(signedArea(hole)), Math.abs(signedArea(exterior)));
}

function hasSelfIntersection(rings: Position[][]): boolean {
  const geometry: Polygon = polygon(rings.map(dropRepeatedPoints)).geometry;
  return kinks(geometry).features.length > 0;
}
