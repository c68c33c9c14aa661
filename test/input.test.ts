import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  loadAreaOfInterest,
  parseFeatureCollection,
  parseFeatureSequence,
  readFeatures,
} from '../src/lib/input';
import { ConfigurationError, IOFailure } from '../src/lib/errors';
import { collectingLogger, createTempDir, removeTempDir, square } from './test-utils';

const polygon = { type: 'Polygon', coordinates: [square(0, 0, 10)] };

describe('parseFeatureCollection', () => {
  it('should turn features into geometry and tags', () => {
    const text = JSON.stringify({
      type: 'FeatureCollection',
      features: [{ type: 'Feature', geometry: polygon, properties: { height: '12m' } }],
    });

    expect(parseFeatureCollection(text, 'input.geojson')).toEqual([
      { geometry: { type: 'Polygon', coordinates: [square(0, 0, 10)] }, tags: { height: '12m' } },
    ]);
  });

  it('should keep features without geometry or properties', () => {
    const text = JSON.stringify({
      type: 'FeatureCollection',
      features: [
        { type: 'Feature', geometry: null, properties: null },
        { type: 'Feature', geometry: polygon },
      ],
    });

    expect(parseFeatureCollection(text, 'input.geojson')).toEqual([
      { geometry: null, tags: {} },
      { geometry: { type: 'Polygon', coordinates: [square(0, 0, 10)] }, tags: {} },
    ]);
  });

  it('should keep only the type of non-polygonal geometries', () => {
    const text = JSON.stringify({
      type: 'FeatureCollection',
      features: [{ type: 'Feature', geometry: { type: 'Point', coordinates: [1, 2] }, properties: {} }],
    });

    expect(parseFeatureCollection(text, 'input.geojson')).toEqual([{ geometry: { type: 'Point' }, tags: {} }]);
  });

  it('should drop malformed features with a warning', () => {
    const logger = collectingLogger();
    const text = JSON.stringify({
      type: 'FeatureCollection',
      features: [42, { type: 'Feature', geometry: polygon, properties: {} }],
    });

    expect(parseFeatureCollection(text, 'input.geojson', logger)).toHaveLength(1);
    expect(logger.entries).toEqual([
      { level: 'warn', message: 'Ignoring malformed feature', metadata: { feature: 0 } },
    ]);
  });

  it('should null out malformed geometries with a warning', () => {
    const logger = collectingLogger();
    const text = JSON.stringify({
      type: 'FeatureCollection',
      features: [{ type: 'Feature', geometry: { type: 'Polygon', coordinates: 'oops' }, properties: { a: 1 } }],
    });

    expect(parseFeatureCollection(text, 'input.geojson', logger)).toEqual([{ geometry: null, tags: { a: 1 } }]);
    expect(logger.entries).toEqual([
      { level: 'warn', message: 'Ignoring malformed geometry', metadata: { feature: 0 } },
    ]);
  });

  it('should reject documents that are not feature collections', () => {
    expect(() => parseFeatureCollection('{"type":"Feature"}', 'input.geojson')).toThrow(
      'Input is not a GeoJSON FeatureCollection: input.geojson'
    );
  });

  it('should reject invalid JSON', () => {
    expect(() => parseFeatureCollection('{', 'input.geojson')).toThrow(IOFailure);
  });
});

describe('parseFeatureSequence', () => {
  it('should read one feature per line and skip blank lines', () => {
    const feature = JSON.stringify({ type: 'Feature', geometry: polygon, properties: { id: 1 } });
    const text = `${feature}\n\n\u001e${feature.replace('"id":1', '"id":2')}\r\n`;

    expect(parseFeatureSequence(text, 'input.ndjson').map((f) => f.tags)).toEqual([{ id: 1 }, { id: 2 }]);
  });

  it('should name the failing line', () => {
    const feature = JSON.stringify({ type: 'Feature', geometry: polygon, properties: {} });
    expect(() => parseFeatureSequence(`${feature}\n{broken`, 'input.ndjson')).toThrow(
      'Input is not valid JSON: input.ndjson:2'
    );
  });
});

describe('files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('readFeatures', () => {
    it('should read a FeatureCollection file', async () => {
      const path = join(dir, 'input.geojson');
      await writeFile(
        path,
        JSON.stringify({
          type: 'FeatureCollection',
          features: [{ type: 'Feature', geometry: polygon, properties: { height: 3 } }],
        })
      );

      expect(await readFeatures(path)).toEqual([
        { geometry: { type: 'Polygon', coordinates: [square(0, 0, 10)] }, tags: { height: 3 } },
      ]);
    });

    it('should read newline-delimited files by extension', async () => {
      const path = join(dir, 'input.geojsonl');
      const line = JSON.stringify({ type: 'Feature', geometry: polygon, properties: {} });
      await writeFile(path, `${line}\n${line}\n`);

      expect(await readFeatures(path)).toHaveLength(2);
    });

    it('should fail with IOFailure for missing files', async () => {
      await expect(readFeatures(join(dir, 'missing.geojson'))).rejects.toThrow(IOFailure);
    });
  });

  describe('loadAreaOfInterest', () => {
    it('should accept a bare polygon', async () => {
      const path = join(dir, 'aoi.geojson');
      await writeFile(path, JSON.stringify(polygon));

      expect(await loadAreaOfInterest(path)).toEqual({ type: 'Polygon', coordinates: [square(0, 0, 10)] });
    });

    it('should unwrap a feature', async () => {
      const path = join(dir, 'aoi.geojson');
      await writeFile(path, JSON.stringify({ type: 'Feature', geometry: polygon, properties: {} }));

      expect(await loadAreaOfInterest(path)).toEqual({ type: 'Polygon', coordinates: [square(0, 0, 10)] });
    });

    it('should merge a feature collection into a multi-polygon', async () => {
      const path = join(dir, 'aoi.geojson');
      await writeFile(
        path,
        JSON.stringify({
          type: 'FeatureCollection',
          features: [
            { type: 'Feature', geometry: polygon, properties: {} },
            {
              type: 'Feature',
              geometry: { type: 'MultiPolygon', coordinates: [[square(50, 50, 5)], [square(70, 70, 5)]] },
              properties: {},
            },
          ],
        })
      );

      expect(await loadAreaOfInterest(path)).toEqual({
        type: 'MultiPolygon',
        coordinates: [[square(0, 0, 10)], [square(50, 50, 5)], [square(70, 70, 5)]],
      });
    });

    it('should reject non-polygonal documents', async () => {
      const path = join(dir, 'aoi.geojson');
      await writeFile(path, JSON.stringify({ type: 'Point', coordinates: [0, 0] }));

      await expect(loadAreaOfInterest(path)).rejects.toThrow(ConfigurationError);
    });

    it('should reject invalid JSON', async () => {
      const path = join(dir, 'aoi.geojson');
      await writeFile(path, 'not json');

      await expect(loadAreaOfInterest(path)).rejects.toThrow(`Area of interest ${path} is not valid JSON`);
    });
  });
});
