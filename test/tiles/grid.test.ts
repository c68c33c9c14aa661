import { describe, it, expect } from 'vitest';
import {
  compareTileKeys,
  computeBounds,
  formatTileKey,
  parseTileKey,
  tileKeyFor,
  tileOrigin,
} from '../../src/lib/tiles/grid';
import { ConfigurationError } from '../../src/lib/errors';
import { square } from '../test-utils';

describe('tileKeyFor', () => {
  it('should map a centroid to its cell', () => {
    expect(tileKeyFor([1500, 2500], [0, 0], 1000)).toEqual({ ix: 1, iy: 2 });
  });

  it('should measure from the minimum bound', () => {
    expect(tileKeyFor([150, 250], [100, 200], 100)).toEqual({ ix: 0, iy: 0 });
    expect(tileKeyFor([250, 450], [100, 200], 100)).toEqual({ ix: 1, iy: 2 });
  });

  it('should put boundary points in the cell with the larger index', () => {
    expect(tileKeyFor([1000, 2000], [0, 0], 1000)).toEqual({ ix: 1, iy: 2 });
    expect(tileKeyFor([999.999, 1999.999], [0, 0], 1000)).toEqual({ ix: 0, iy: 1 });
  });

  it('should floor below the origin', () => {
    expect(tileKeyFor([-1, -1000.5], [0, 0], 1000)).toEqual({ ix: -1, iy: -2 });
  });

  it('should be deterministic', () => {
    const keys = Array.from({ length: 3 }, () => tileKeyFor([1234.5, 6789.25], [12, 34], 250));
    expect(keys).toEqual([
      { ix: 4, iy: 27 },
      { ix: 4, iy: 27 },
      { ix: 4, iy: 27 },
    ]);
  });

  it('should reject non-positive tile sizes', () => {
    expect(() => tileKeyFor([0, 0], [0, 0], 0)).toThrow(ConfigurationError);
    expect(() => tileKeyFor([0, 0], [0, 0], -10)).toThrow(ConfigurationError);
    expect(() => tileKeyFor([0, 0], [0, 0], Number.NaN)).toThrow(ConfigurationError);
  });

  it('should reject non-finite points', () => {
    expect(() => tileKeyFor([Number.NaN, 0], [0, 0], 1000)).toThrow('Cannot index non-finite point (NaN, 0)');
  });
});

describe('tileOrigin', () => {
  it('should return the lower-left corner of a cell', () => {
    expect(tileOrigin({ ix: 1, iy: 2 }, [0, 0], 1000)).toEqual([1000, 2000]);
    expect(tileOrigin({ ix: -1, iy: 0 }, [500, 700], 250)).toEqual([250, 700]);
  });
});

describe('tile key strings', () => {
  it('should format as "ix,iy"', () => {
    expect(formatTileKey({ ix: -3, iy: 7 })).toBe('-3,7');
  });

  it('should parse integer pairs', () => {
    expect(parseTileKey('-3,7')).toEqual({ ix: -3, iy: 7 });
    expect(parseTileKey('0,0')).toEqual({ ix: 0, iy: 0 });
  });

  it('should reject anything else', () => {
    expect(parseTileKey('1.5,2')).toBeNull();
    expect(parseTileKey('1,2,3')).toBeNull();
    expect(parseTileKey(' 1,2')).toBeNull();
    expect(parseTileKey('a,b')).toBeNull();
    expect(parseTileKey('99999999999999999999,1')).toBeNull();
  });
});

describe('compareTileKeys', () => {
  it('should order by ix, then iy', () => {
    const keys = [
      { ix: 2, iy: 0 },
      { ix: 1, iy: 5 },
      { ix: -1, iy: 9 },
      { ix: 1, iy: -1 },
    ];

    expect(keys.sort(compareTileKeys)).toEqual([
      { ix: -1, iy: 9 },
      { ix: 1, iy: -1 },
      { ix: 1, iy: 5 },
      { ix: 2, iy: 0 },
    ]);
  });
});

describe('computeBounds', () => {
  it('should return null without coordinates', () => {
    expect(computeBounds([])).toBeNull();
  });

  it('should cover every ring', () => {
    expect(computeBounds([square(10, 20, 5), square(-3, 40, 1)])).toEqual({
      minX: -3,
      minY: 20,
      maxX: 15,
      maxY: 41,
    });
  });

  it('should ignore non-finite positions', () => {
    expect(
      computeBounds([
        [
          [Number.NEGATIVE_INFINITY, 0],
          [5, Number.NaN],
          [3, 4],
        ],
      ])
    ).toEqual({ minX: 3, minY: 4, maxX: 3, maxY: 4 });
    expect(computeBounds([[[Number.NaN, Number.NaN]]])).toBeNull();
  });
});
