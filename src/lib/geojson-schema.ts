/**
 * Runtime schemas for the GeoJSON shapes read from disk.
 *
 * Only polygonal geometries are checked down to their coordinates; other
 * geometry types keep just their `type` so the normalizer can report them.
 */

import { z } from 'zod';

/**
 * A position with at least x and y. Infinity is let through (JSON.parse
 * produces it for `1e999`); the normalizer drops such rings.
 */
export const PositionSchema = z.array(z.number()).min(2);

export const PolygonSchema = z.object({
  type: z.literal('Polygon'),
  coordinates: z.array(z.array(PositionSchema)),
});

export const MultiPolygonSchema = z.object({
  type: z.literal('MultiPolygon'),
  coordinates: z.array(z.array(z.array(PositionSchema))),
});

export const FootprintGeometrySchema = z.discriminatedUnion('type', [
  PolygonSchema,
  MultiPolygonSchema,
]);

export const UnsupportedGeometrySchema = z.object({
  type: z.enum(['Point', 'MultiPoint', 'LineString', 'MultiLineString', 'GeometryCollection']),
});

export const RawGeometrySchema = z.union([FootprintGeometrySchema, UnsupportedGeometrySchema]);

export const FeatureSchema = z.object({
  type: z.literal('Feature'),
  geometry: z.unknown(),
  properties: z.record(z.unknown()).nullable().optional(),
});

/**
 * A building as serialized in tile payloads and JSON outputs.
 */
export const BuildingRecordSchema = z.object({
  footprint: z.array(z.array(z.number().finite()).length(2)).min(4),
  height: z.number().finite().positive(),
});

export const BuildingListSchema = z.array(BuildingRecordSchema);
