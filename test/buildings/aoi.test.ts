import { describe, it, expect } from 'vitest';
import type { MultiPolygon } from 'geojson';
import { bboxToAreaOfInterest, isWithinAreaOfInterest, parseBbox } from '../../src/lib/buildings/aoi';
import { ConfigurationError } from '../../src/lib/errors';
import { square } from '../test-utils';

const aoi = bboxToAreaOfInterest([0, 0, 100, 100]);

describe('isWithinAreaOfInterest', () => {
  it('should keep footprints entirely inside', () => {
    expect(isWithinAreaOfInterest(square(10, 10, 10), aoi)).toBe(true);
  });

  it('should drop footprints crossing the boundary', () => {
    expect(isWithinAreaOfInterest(square(95, 10, 10), aoi)).toBe(false);
  });

  it('should drop footprints entirely outside', () => {
    expect(isWithinAreaOfInterest(square(200, 200, 10), aoi)).toBe(false);
  });

  it('should keep footprints touching the boundary', () => {
    expect(isWithinAreaOfInterest(square(0, 0, 10), aoi)).toBe(true);
  });

  it('should test against every part of a multi-polygon', () => {
    const multi: MultiPolygon = {
      type: 'MultiPolygon',
      coordinates: [[square(0, 0, 10)], [square(100, 100, 10)]],
    };

    expect(isWithinAreaOfInterest(square(102, 102, 2), multi)).toBe(true);
    expect(isWithinAreaOfInterest(square(50, 50, 2), multi)).toBe(false);
  });
});

describe('bboxToAreaOfInterest', () => {
  it('should build a closed counter-clockwise rectangle', () => {
    expect(bboxToAreaOfInterest([0, 0, 10, 20])).toEqual({
      type: 'Polygon',
      coordinates: [
        [
          [0, 0],
          [10, 0],
          [10, 20],
          [0, 20],
          [0, 0],
        ],
      ],
    });
  });
});

describe('parseBbox', () => {
  it('should parse four comma-separated numbers', () => {
    expect(parseBbox('0, 0,10,20.5')).toEqual([0, 0, 10, 20.5]);
  });

  it('should reject the wrong number of values', () => {
    expect(() => parseBbox('1,2,3')).toThrow(ConfigurationError);
  });

  it('should reject non-numeric values', () => {
    expect(() => parseBbox('a,b,c,d')).toThrow(ConfigurationError);
  });

  it('should reject an inverted box', () => {
    expect(() => parseBbox('5,0,1,1')).toThrow('Bounding box minimum must be below its maximum, got "5,0,1,1"');
  });
});
