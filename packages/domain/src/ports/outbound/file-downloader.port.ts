export interface DownloadOptions {
  timeoutMs: number;
}

/**
 * Streams a remote resource to a local file.
 * Implementations throw `EphemerisDownloadError` on non-2xx status, connection
 * failure or timeout, and never leave a partial file behind. Local filesystem
 * errors while writing propagate unchanged.
 */
export interface FileDownloaderPort {
  /** Resolves with the number of bytes written. */
  download(url: string, outputPath: string, opts: DownloadOptions): Promise<number>;
}
