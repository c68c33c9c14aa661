/**
 * Input loading.
 *
 * Reads building features, already reprojected to a planar metre reference,
 * from a GeoJSON FeatureCollection or from newline-delimited GeoJSON features.
 * Feature properties become the tag map.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { z } from 'zod';

import type { RawFeature, RawGeometry } from './buildings/types';
import type { AreaOfInterest } from './buildings/aoi';
import { FeatureSchema, FootprintGeometrySchema, RawGeometrySchema } from './geojson-schema';
import { type Logger, silentLogger } from './logger';
import { ConfigurationError, IOFailure } from './errors';

const FeatureCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(z.unknown()),
});

/** Extensions read as one feature per line */
const SEQUENCE_EXTENSIONS = new Set(['.ndjson', '.jsonl', '.geojsonl', '.geojsons']);

/** RFC 8142 record separator, allowed before each GeoJSON text sequence record */
const RECORD_SEPARATOR = '\u001e';

// ─────────────────────────────────────────────────────────────────────────────
// Features
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Reads every feature from a file. The format follows the extension.
 *
 * @throws IOFailure if the file cannot be read or is not GeoJSON
 */
export async function readFeatures(path: string, logger: Logger = silentLogger): Promise<RawFeature[]> {
  const text = await readText(path);
  return SEQUENCE_EXTENSIONS.has(extname(path).toLowerCase())
    ? parseFeatureSequence(text, path, logger)
    : parseFeatureCollection(text, path, logger);
}

/**
 * Parses a FeatureCollection document.
 *
 * @param source Label used in errors and logs, usually the file path
 * @throws IOFailure if the text is not a FeatureCollection
 */
export function parseFeatureCollection(text: string, source: string, logger: Logger = silentLogger): RawFeature[] {
  const result = FeatureCollectionSchema.safeParse(parseJson(text, source));
  if (!result.success) {
    throw new IOFailure('Input is not a GeoJSON FeatureCollection', source);
  }

  const features: RawFeature[] = [];
  result.data.features.forEach((value, position) => {
    const feature = toRawFeature(value, position, logger);
    if (feature) features.push(feature);
  });
  return features;
}

/**
 * Parses newline-delimited features (GeoJSONSeq / NDJSON). Blank lines are ignored.
 *
 * @throws IOFailure if a line is not valid JSON
 */
export function parseFeatureSequence(text: string, source: string, logger: Logger = silentLogger): RawFeature[] {
  const features: RawFeature[] = [];
  text.split(/\r?\n/).forEach((line, lineIndex) => {
    const record = line.replaceAll(RECORD_SEPARATOR, '').trim();
    if (record === '') return;

    const feature = toRawFeature(parseJson(record, `${source}:${lineIndex + 1}`), lineIndex, logger);
    if (feature) features.push(feature);
  });
  return features;
}

/**
 * Validates one feature. Malformed features are dropped and malformed
 * geometries become null (reported later as skipped); both are logged.
 */
function toRawFeature(value: unknown, position: number, logger: Logger): RawFeature | null {
  const feature = FeatureSchema.safeParse(value);
  if (!feature.success) {
    logger.warn('Ignoring malformed feature', { feature: position });
    return null;
  }

  const tags = feature.data.properties ?? {};
  if (feature.data.geometry === null || feature.data.geometry === undefined) {
    return { geometry: null, tags };
  }

  const geometry = RawGeometrySchema.safeParse(feature.data.geometry);
  if (!geometry.success) {
    logger.warn('Ignoring malformed geometry', { feature: position });
    return { geometry: null, tags };
  }

  const parsed: RawGeometry = geometry.data;
  return { geometry: parsed, tags };
}

// ─────────────────────────────────────────────────────────────────────────────
// Area of Interest
// ─────────────────────────────────────────────────────────────────────────────

const AoiFeatureSchema = z.object({
  type: z.literal('Feature'),
  geometry: FootprintGeometrySchema,
});

const AoiDocumentSchema = z.union([
  FootprintGeometrySchema,
  AoiFeatureSchema,
  z.object({
    type: z.literal('FeatureCollection'),
    features: z.array(AoiFeatureSchema).min(1),
  }),
]);

/**
 * Loads an AOI from a GeoJSON file: a Polygon or MultiPolygon geometry, a
 * Feature holding one, or a FeatureCollection of them (merged into one
 * MultiPolygon).
 *
 * @throws IOFailure if the file cannot be read
 * @throws ConfigurationError if it holds no polygonal AOI
 */
export async function loadAreaOfInterest(path: string): Promise<AreaOfInterest> {
  const text = await readText(path);

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new ConfigurationError(`Area of interest ${path} is not valid JSON`);
  }

  const result = AoiDocumentSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigurationError(
      `Area of interest ${path} must be a polygonal GeoJSON geometry, feature or feature collection`
    );
  }

  const document = result.data;
  switch (document.type) {
    case 'Polygon':
    case 'MultiPolygon':
      return document;
    case 'Feature':
      return document.geometry;
    case 'FeatureCollection':
      return {
        type: 'MultiPolygon',
        coordinates: document.features.flatMap(({ geometry }) =>
          geometry.type === 'Polygon' ? [geometry.coordinates] : geometry.coordinates
        ),
      };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    throw new IOFailure('Cannot read input', path, { cause: error });
  }
}

function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new IOFailure('Input is not valid JSON', source, { cause: error });
  }
}
