/**
 * Canonical tile encoding.
 *
 * A tile's buildings serialize to a compact JSON array with a fixed field
 * order (`footprint`, then `height`) and no whitespace, encoded as UTF-8.
 * Identical building lists always produce identical bytes, which is what
 * makes compressed packs reproducible.
 */

import type { BuildingRecord } from '../buildings/types';
import { BuildingListSchema } from '../geojson-schema';
import { PackFormatError } from '../errors';

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Serializes buildings to their canonical JSON text.
 *
 * @throws RangeError if any coordinate or height is not finite
 *
 * @example
 * canonicalizeTile([{ footprint: [[0, 0], [1, 0], [1, 1], [0, 0]], height: 5 }]);
 * // → '[{"footprint":[[0,0],[1,0],[1,1],[0,0]],"height":5}]'
 */
export function canonicalizeTile(buildings: readonly BuildingRecord[]): string {
  const records = buildings.map((building) => {
    const footprint = building.footprint.map((p) => [p[0], p[1]]);
    for (const [x, y] of footprint) {
      if (!Number.isFinite(x) || !Number.isFinite(y)) {
        throw new RangeError(`Non-finite coordinate (${x}, ${y}) in tile encoding`);
      }
    }
    if (!Number.isFinite(building.height)) {
      throw new RangeError(`Non-finite height ${building.height} in tile encoding`);
    }
    return { footprint, height: building.height };
  });
  return JSON.stringify(records);
}

/**
 * Canonical UTF-8 bytes of a tile's buildings.
 */
export function encodeTile(buildings: readonly BuildingRecord[]): Uint8Array {
  return textEncoder.encode(canonicalizeTile(buildings));
}

/**
 * Parses canonical bytes back into building records.
 *
 * @throws PackFormatError if the bytes are not a valid building list
 */
export function decodeTile(bytes: Uint8Array): BuildingRecord[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(textDecoder.decode(bytes));
  } catch (error) {
    throw new PackFormatError('Tile payload is not valid UTF-8 JSON', [String(error)]);
  }

  const result = BuildingListSchema.safeParse(parsed);
  if (!result.success) {
    throw new PackFormatError(
      'Tile payload is not a building list',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}
