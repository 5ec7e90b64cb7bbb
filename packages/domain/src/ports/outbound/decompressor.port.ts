export interface DecompressorPort {
  /**
   * Decodes `sourcePath` into `targetPath`. On failure the partial target is
   * removed and a `DecompressionError` is thrown; the source is left untouched.
   */
  decompress(sourcePath: string, targetPath: string): Promise<void>;
}
