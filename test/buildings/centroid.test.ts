import { describe, it, expect } from 'vitest';
import { polygonCentroid } from '../../src/lib/buildings/centroid';
import { square } from '../test-utils';

describe('polygonCentroid', () => {
  it('should return the centre of a square', () => {
    expect(polygonCentroid({ exterior: square(1000, 2000, 1000), holes: [] })).toEqual([1500, 2500]);
  });

  it('should not depend on winding order', () => {
    const clockwise = [...square(1000, 2000, 1000)].reverse();
    expect(polygonCentroid({ exterior: clockwise, holes: [] })).toEqual([1500, 2500]);
  });

  it('should weight by area rather than averaging vertices', () => {
    // L shape: a 2×1 bar plus a 1×1 block on its left end
    const [x, y] = polygonCentroid({
      exterior: [
        [0, 0],
        [2, 0],
        [2, 1],
        [1, 1],
        [1, 2],
        [0, 2],
        [0, 0],
      ],
      holes: [],
    });

    expect(x).toBeCloseTo(5 / 6, 12);
    expect(y).toBeCloseTo(5 / 6, 12);
  });

  it('should subtract holes', () => {
    // 4×4 square (area 16, centre 2,2) minus a unit hole centred at 1.5,1.5
    const [x, y] = polygonCentroid({ exterior: square(0, 0, 4), holes: [square(1, 1, 1)] });

    expect(x).toBeCloseTo(30.5 / 15, 12);
    expect(y).toBeCloseTo(30.5 / 15, 12);
  });

  it('should stay precise for large projected coordinates', () => {
    const [x, y] = polygonCentroid({ exterior: square(500_000_000, 6_000_000_000, 10), holes: [] });

    expect(x).toBe(500_000_005);
    expect(y).toBe(6_000_000_005);
  });

  it('should throw for a polygon with zero area', () => {
    expect(() =>
      polygonCentroid({
        exterior: [
          [0, 0],
          [1, 0],
          [2, 0],
          [0, 0],
        ],
        holes: [],
      })
    ).toThrow('zero area');
  });
});
