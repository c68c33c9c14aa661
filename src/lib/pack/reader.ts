/**
 * Random access to packed tiles.
 *
 * Reading a tile touches only its byte range: the index gives the offset and
 * length, the slice is decompressed, and the canonical JSON is parsed.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';

import type { BuildingRecord } from '../buildings/types';
import type { TileKey } from '../tiles/types';
import { compareTileKeys, formatTileKey, parseTileKey } from '../tiles/grid';
import { decodeTile } from './canonical';
import type { Codec } from './compression';
import { type PackIndex, packFileNames } from './types';
import { IOFailure, PackFormatError } from '../errors';

const PackIndexSchema = z.record(
  z.object({
    offset: z.number().int().nonnegative(),
    length: z.number().int().nonnegative(),
  })
);

// ─────────────────────────────────────────────────────────────────────────────
// Index Validation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parses index file contents.
 *
 * @throws PackFormatError if the text is not an index object
 */
export function parsePackIndex(text: string): PackIndex {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new PackFormatError('Pack index is not valid JSON', [String(error)]);
  }

  const result = PackIndexSchema.safeParse(json);
  if (!result.success) {
    throw new PackFormatError(
      'Pack index has an invalid shape',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Checks an index against the pack invariants.
 *
 * - every key is an `"ix,iy"` integer pair
 * - in key order, each payload starts where the previous one ended
 *   (offsets increase, ranges neither overlap nor leave gaps)
 * - payloads are non-empty and the lengths sum to the blob size
 *
 * @returns Human-readable problems; empty when the index is valid
 */
export function verifyPackIndex(index: PackIndex, blobLength: number): string[] {
  const problems: string[] = [];
  const entries: { key: TileKey; id: string; offset: number; length: number }[] = [];

  for (const [id, { offset, length }] of Object.entries(index)) {
    const key = parseTileKey(id);
    if (!key) {
      problems.push(`invalid tile key "${id}"`);
      continue;
    }
    if (length === 0) {
      problems.push(`tile ${id} has an empty payload`);
    }
    entries.push({ key, id, offset, length });
  }

  entries.sort((a, b) => compareTileKeys(a.key, b.key));

  let expected = 0;
  let total = 0;
  for (const entry of entries) {
    if (entry.offset < expected) {
      problems.push(`tile ${entry.id} at offset ${entry.offset} overlaps the previous tile ending at ${expected}`);
    } else if (entry.offset > expected) {
      problems.push(`gap of ${entry.offset - expected} bytes before tile ${entry.id}`);
    }
    if (entry.offset + entry.length > blobLength) {
      problems.push(`tile ${entry.id} extends past the end of the blob (${blobLength} bytes)`);
    }
    expected = entry.offset + entry.length;
    total += entry.length;
  }

  if (total !== blobLength) {
    problems.push(`payload lengths sum to ${total} bytes but the blob has ${blobLength}`);
  }

  return problems;
}

// ─────────────────────────────────────────────────────────────────────────────
// Pack Reader
// ─────────────────────────────────────────────────────────────────────────────

export class PackReader {
  private constructor(
    private readonly blob: Uint8Array,
    private readonly index: PackIndex,
    private readonly codec: Codec
  ) {}

  /**
   * Wraps an in-memory blob and index after verifying them.
   *
   * @throws PackFormatError if the index does not describe the blob
   */
  static fromBuffers(blob: Uint8Array, index: PackIndex, codec: Codec): PackReader {
    const problems = verifyPackIndex(index, blob.length);
    if (problems.length > 0) {
      throw new PackFormatError('Pack index does not match the blob', problems);
    }
    return new PackReader(blob, index, codec);
  }

  /**
   * Loads `<name>.pack` and `<name>.index.json` from a directory.
   *
   * @throws IOFailure if either file cannot be read
   * @throws PackFormatError if they do not form a valid pack
   */
  static async open(dir: string, name: string, codec: Codec): Promise<PackReader> {
    const files = packFileNames(name);
    const packPath = join(dir, files.pack);
    const indexPath = join(dir, files.index);

    const [blob, indexText] = await Promise.all([
      readArtifact(packPath, () => readFile(packPath)),
      readArtifact(indexPath, () => readFile(indexPath, 'utf-8')),
    ]);

    return PackReader.fromBuffers(new Uint8Array(blob), parsePackIndex(indexText), codec);
  }

  /** Number of tiles */
  get size(): number {
    return Object.keys(this.index).length;
  }

  /** Blob size in bytes */
  get byteLength(): number {
    return this.blob.length;
  }

  /**
   * Tile keys in ascending `(ix, iy)` order.
   */
  keys(): string[] {
    return Object.keys(this.index)
      .map((id) => ({ id, key: parseTileKey(id) }))
      .sort((a, b) => (a.key && b.key ? compareTileKeys(a.key, b.key) : 0))
      .map(({ id }) => id);
  }

  has(key: TileKey | string): boolean {
    return Object.hasOwn(this.index, toId(key));
  }

  /**
   * Byte range of a tile, or undefined for unknown keys.
   */
  entry(key: TileKey | string): { offset: number; length: number } | undefined {
    const id = toId(key);
    return Object.hasOwn(this.index, id) ? this.index[id] : undefined;
  }

  /**
   * Decompressed canonical bytes of a tile, or undefined for unknown keys.
   */
  readRaw(key: TileKey | string): Uint8Array | undefined {
    const entry = this.entry(key);
    if (!entry) return undefined;
    return this.codec.decompress(this.blob.subarray(entry.offset, entry.offset + entry.length));
  }

  /**
   * Buildings of a tile, or undefined for unknown keys.
   */
  readTile(key: TileKey | string): BuildingRecord[] | undefined {
    const raw = this.readRaw(key);
    return raw ? decodeTile(raw) : undefined;
  }
}

function toId(key: TileKey | string): string {
  return typeof key === 'string' ? key : formatTileKey(key);
}

async function readArtifact<T>(path: string, read: () => Promise<T>): Promise<T> {
  try {
    return await read();
  } catch (error) {
    throw new IOFailure('Cannot read pack artifact', path, { cause: error });
  }
}
