import { createReadStream, createWriteStream } from 'node:fs';
import { rm } from 'node:fs/promises';
import { pipeline } from 'node:stream/promises';
import { createGunzip } from 'node:zlib';
import { DecompressionError } from '@gps-sim-prep/domain';
import type { DecompressorPort } from '@gps-sim-prep/domain';

/**
 * Gunzips archive downloads. `.Z` payloads go through the same decoder; a true
 * LZW stream is rejected as corrupt rather than decoded.
 */
export class GzipDecompressor implements DecompressorPort {
  async decompress(sourcePath: string, targetPath: string): Promise<void> {
    try {
      await pipeline(createReadStream(sourcePath), createGunzip(), createWriteStream(targetPath));
    } catch (err) {
      await rm(targetPath, { force: true });
      throw new DecompressionError(sourcePath, { cause: err });
    }
  }
}
