/**
 * Common type definitions for building footprints.
 *
 * Re-exports the GeoJSON types the pipeline works with.
 */

import type { Geometry, MultiPolygon, Polygon, Position } from 'geojson';

export type { Position, Polygon, MultiPolygon, Geometry } from 'geojson';

/**
 * Geometry types that carry building footprints.
 */
export type FootprintGeometry = Polygon | MultiPolygon;

/**
 * Any other GeoJSON geometry. Only the type is inspected.
 */
export interface UnsupportedGeometry {
  readonly type: Exclude<Geometry['type'], FootprintGeometry['type']>;
}

export type RawGeometry = FootprintGeometry | UnsupportedGeometry;

/**
 * Free-form attribute tags (OSM style). Only a few configured keys are read.
 */
export type TagMap = Readonly<Record<string, unknown>>;

/**
 * One upstream input record, already projected to planar metres.
 */
export interface RawFeature {
  readonly geometry: RawGeometry | null;
  readonly tags: TagMap;
}

/**
 * A validated simple polygon with closed rings.
 */
export interface NormalizedPolygon {
  readonly exterior: Position[];
  readonly holes: Position[][];
}

/**
 * A building ready for tiling: closed exterior ring plus a positive height.
 */
export interface BuildingRecord {
  readonly footprint: Position[];
  readonly height: number;
}
