import { describe, it, expect } from 'vitest';
import { encodePack, serializePackIndex, toPackIndex } from '../../src/lib/pack/encoder';
import { encodeTile } from '../../src/lib/pack/canonical';
import { getCodec } from '../../src/lib/pack/compression';
import type { Tile } from '../../src/lib/tiles/aggregate';
import { building } from '../test-utils';

const codec = getCodec('zlib');

function sampleTiles(): Tile[] {
  return [
    { key: { ix: 1, iy: 0 }, buildings: [building(1000, 0, 10)] },
    { key: { ix: 0, iy: 5 }, buildings: [building(0, 5000, 10, 12), building(20, 5000, 10, 8)] },
    { key: { ix: 0, iy: 1 }, buildings: [building(0, 1000, 10)] },
  ];
}

describe('encodePack', () => {
  it('should order entries by tile key', () => {
    const pack = encodePack(sampleTiles(), { codec });

    expect(pack.entries.map((entry) => entry.tileKey)).toEqual(['0,1', '0,5', '1,0']);
    expect(Object.keys(pack.index)).toEqual(['0,1', '0,5', '1,0']);
  });

  it('should lay payloads out contiguously', () => {
    const { blob, entries } = encodePack(sampleTiles(), { codec });

    expect(entries[0].offset).toBe(0);
    for (let i = 1; i < entries.length; i++) {
      expect(entries[i].offset).toBe(entries[i - 1].offset + entries[i - 1].length);
    }
    expect(entries.reduce((sum, entry) => sum + entry.length, 0)).toBe(blob.length);
  });

  it('should store each tile as its compressed canonical encoding', () => {
    const tiles = sampleTiles();
    const { blob, index } = encodePack(tiles, { codec });

    for (const tile of tiles) {
      const { offset, length } = index[`${tile.key.ix},${tile.key.iy}`];
      expect(codec.decompress(blob.subarray(offset, offset + length))).toEqual(encodeTile(tile.buildings));
    }
  });

  it('should not depend on input order', () => {
    const forward = encodePack(sampleTiles(), { codec });
    const reversed = encodePack(sampleTiles().reverse(), { codec });

    expect(reversed.blob).toEqual(forward.blob);
    expect(reversed.entries).toEqual(forward.entries);
  });

  it('should skip empty tiles', () => {
    const pack = encodePack([...sampleTiles(), { key: { ix: 9, iy: 9 }, buildings: [] }], { codec });
    expect(Object.keys(pack.index)).toEqual(['0,1', '0,5', '1,0']);
  });

  it('should produce an empty pack without tiles', () => {
    const pack = encodePack([], { codec });

    expect(pack.blob.length).toBe(0);
    expect(pack.entries).toEqual([]);
    expect(pack.index).toEqual({});
  });

  it('should reject duplicate keys', () => {
    const tiles: Tile[] = [
      { key: { ix: 0, iy: 0 }, buildings: [building(0, 0, 1)] },
      { key: { ix: 0, iy: 0 }, buildings: [building(5, 5, 1)] },
    ];
    expect(() => encodePack(tiles, { codec })).toThrow('Duplicate tile 0,0 in pack input');
  });
});

describe('toPackIndex', () => {
  it('should keep entry order', () => {
    const index = toPackIndex([
      { tileKey: '-1,0', offset: 0, length: 4 },
      { tileKey: '2,3', offset: 4, length: 6 },
    ]);

    expect(index).toEqual({ '-1,0': { offset: 0, length: 4 }, '2,3': { offset: 4, length: 6 } });
    expect(Object.keys(index)).toEqual(['-1,0', '2,3']);
  });
});

describe('serializePackIndex', () => {
  it('should indent with two spaces and end with a newline', () => {
    expect(serializePackIndex({ '0,0': { offset: 0, length: 10 } })).toBe(
      '{\n  "0,0": {\n    "offset": 0,\n    "length": 10\n  }\n}\n'
    );
  });
});
