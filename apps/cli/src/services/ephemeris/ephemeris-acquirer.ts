import * as path from 'node:path';
import { rename, rm } from 'node:fs/promises';
import {
  EphemerisUnavailableError,
  isPipelineError,
} from '@gps-sim-prep/domain';
import type {
  DecompressorPort,
  EphemerisArtifact,
  EphemerisAttempt,
  FileDownloaderPort,
} from '@gps-sim-prep/domain';
import { buildEphemerisCandidates, toEphemerisReference } from './ephemeris-naming.js';
import { formatKb, minimumSizeValidity } from './ephemeris-validity.js';
import type { EphemerisValidityCheck } from './ephemeris-validity.js';

/** Suffix of in-progress files; `outputPath` is only replaced by a rename. */
export const PARTIAL_SUFFIX = '.part';

export interface EphemerisAcquirerOptions {
  archiveBaseUrl: string;
  downloadTimeoutMs: number;
  /** Defaults to the 100 KB minimum-size heuristic. */
  validity?: EphemerisValidityCheck;
}

/**
 * Fetches the daily broadcast-ephemeris file for a date, trying the plain,
 * gzip and .Z variants in turn. No retries beyond that fixed list.
 */
export class EphemerisAcquirer {
  private readonly validity: EphemerisValidityCheck;

  constructor(
    private readonly downloader: FileDownloaderPort,
    private readonly decompressor: DecompressorPort,
    private readonly opts: EphemerisAcquirerOptions,
  ) {
    this.validity = opts.validity ?? minimumSizeValidity();
  }

  /**
   * Resolves with the uncompressed file at `outputPath`.
   * Throws EphemerisUnavailableError once every candidate failed, or
   * DecompressionError when an accepted download cannot be decoded.
   */
  async acquire(targetDate: Date, outputPath: string): Promise<EphemerisArtifact> {
    const candidates = buildEphemerisCandidates(toEphemerisReference(targetDate), this.opts.archiveBaseUrl);
    const attempts: EphemerisAttempt[] = [];

    for (const candidate of candidates) {
      const downloadPath = outputPath + candidate.extension + PARTIAL_SUFFIX;
      console.log(`[acquirer] trying ${candidate.url}`);

      let bytes: number;
      try {
        bytes = await this.downloader.download(candidate.url, downloadPath, {
          timeoutMs: this.opts.downloadTimeoutMs,
        });
      } catch (err) {
        if (!isPipelineError(err)) throw err;
        console.warn(`[acquirer] ${err.message}`);
        attempts.push({ url: candidate.url, reason: err.message });
        continue;
      }

      const verdict = await this.validity(downloadPath);
      if (!verdict.valid) {
        const reason = verdict.reason ?? 'rejected by validity check';
        console.warn(`[acquirer] discarding ${candidate.fileName}: ${reason}`);
        attempts.push({ url: candidate.url, reason });
        await rm(downloadPath, { force: true });
        continue;
      }

      console.log(`[acquirer] downloaded ${candidate.fileName} (${formatKb(bytes)})`);

      if (candidate.compression === 'none') {
        await rename(downloadPath, outputPath);
        return { path: outputPath, source: 'download', candidate };
      }

      console.log(`[acquirer] decompressing ${candidate.fileName}`);
      const decodedPath = outputPath + PARTIAL_SUFFIX;
      try {
        await this.decompressor.decompress(downloadPath, decodedPath);
      } finally {
        await rm(downloadPath, { force: true });
      }
      await rename(decodedPath, outputPath);
      return { path: outputPath, source: 'download', candidate };
    }

    throw new EphemerisUnavailableError(attempts);
  }
}
