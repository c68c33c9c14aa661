/**
 * Lossless codecs for tile payloads.
 *
 * - zlib: deflate with zlib header and Adler-32 trailer
 * - gzip: deflate with gzip framing (header mtime is zero, so output is stable)
 * - deflate-raw: bare deflate stream
 * - zstd: Zstandard frame at level 3, via WebAssembly
 *
 * The deflate family comes from pako and is ready at import time. zstd needs
 * its WebAssembly module loaded first, so it is only handed out by loadCodec.
 */

import pako from 'pako';
import * as zstd from '@bokuweb/zstd-wasm';

import type { CompressionAlgorithm, SyncCompressionAlgorithm } from './types';
import { PackFormatError } from '../errors';

const ZSTD_LEVEL = 3;

let zstdReady: Promise<void> | undefined;

export interface Codec {
  readonly algorithm: CompressionAlgorithm;
  compress(data: Uint8Array): Uint8Array;
  decompress(data: Uint8Array): Uint8Array;
}

const CODECS: Record<CompressionAlgorithm, Codec> = {
  zlib: {
    algorithm: 'zlib',
    compress: (data) => pako.deflate(data),
    decompress: (data) => inflateWith(pako.inflate, data, 'zlib'),
  },
  gzip: {
    algorithm: 'gzip',
    compress: (data) => pako.gzip(data),
    decompress: (data) => inflateWith(pako.ungzip, data, 'gzip'),
  },
  'deflate-raw': {
    algorithm: 'deflate-raw',
    compress: (data) => pako.deflateRaw(data),
    decompress: (data) => inflateWith(pako.inflateRaw, data, 'deflate-raw'),
  },
  zstd: {
    algorithm: 'zstd',
    compress: (data) => new Uint8Array(zstd.compress(data, ZSTD_LEVEL)),
    decompress: (data) => inflateWith((input) => new Uint8Array(zstd.decompress(input)), data, 'zstd'),
  },
};

/**
 * Returns a deflate-family codec.
 *
 * @example
 * const codec = getCodec('zlib');
 * const roundTrip = codec.decompress(codec.compress(bytes));
 */
export function getCodec(algorithm: SyncCompressionAlgorithm): Codec {
  return CODECS[algorithm];
}

/**
 * Returns the codec for any algorithm, loading the zstd module on first use.
 *
 * @example
 * const codec = await loadCodec(config.compression);
 */
export async function loadCodec(algorithm: CompressionAlgorithm): Promise<Codec> {
  if (algorithm === 'zstd') {
    zstdReady ??= zstd.init();
    await zstdReady;
  }
  return CODECS[algorithm];
}

/**
 * pako throws its error message as a bare string, and returns undefined
 * instead of throwing for a truncated stream. Both become PackFormatError,
 * as do errors raised by the zstd decoder.
 */
function inflateWith(
  inflate: (data: Uint8Array) => Uint8Array,
  data: Uint8Array,
  algorithm: CompressionAlgorithm
): Uint8Array {
  let result: Uint8Array | undefined;
  try {
    result = inflate(data);
  } catch (error) {
    throw new PackFormatError(`Cannot decompress ${algorithm} payload`, [String(error)]);
  }
  if (!(result instanceof Uint8Array)) {
    throw new PackFormatError(`Cannot decompress ${algorithm} payload`, ['stream is truncated']);
  }
  return result;
}
