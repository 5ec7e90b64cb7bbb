import { createWriteStream } from 'node:fs';
import { rm, stat } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { fetch } from 'undici';
import type { Dispatcher, Response } from 'undici';
import { EphemerisDownloadError } from '@gps-sim-prep/domain';
import type { DownloadOptions, FileDownloaderPort } from '@gps-sim-prep/domain';

const USER_AGENT = 'gps-sim-prep/0.1';

// fs syscalls a failing write stream reports; these are local faults, not transfer faults
const WRITE_SYSCALLS: ReadonlySet<string> = new Set(['open', 'write', 'close']);

export class UndiciFileDownloader implements FileDownloaderPort {
  /** `dispatcher` lets tests route requests through an undici MockAgent. */
  constructor(private readonly dispatcher?: Dispatcher) {}

  /**
   * `timeoutMs` bounds the wait for the response headers and every gap
   * between body chunks, not the whole transfer.
   */
  async download(url: string, outputPath: string, opts: DownloadOptions): Promise<number> {
    const controller = new AbortController();
    const idle = setTimeout(() => controller.abort(), opts.timeoutMs);

    try {
      let res: Response;
      try {
        res = await fetch(url, {
          signal: controller.signal,
          redirect: 'follow',
          headers: { 'user-agent': USER_AGENT },
          dispatcher: this.dispatcher,
        });
      } catch (err) {
        throw toDownloadError(url, err, controller.signal);
      }

      if (!res.ok || !res.body) {
        await res.body?.cancel();
        throw new EphemerisDownloadError(url, 'http_status', `HTTP ${res.status} for ${url}`);
      }

      idle.refresh();
      try {
        await pipeline(
          Readable.fromWeb(res.body),
          async function* (source: AsyncIterable<Buffer>) {
            for await (const chunk of source) {
              idle.refresh();
              yield chunk;
            }
          },
          createWriteStream(outputPath),
        );
      } catch (err) {
        await rm(outputPath, { force: true });
        if (isLocalWriteError(err)) throw err;
        throw toDownloadError(url, err, controller.signal);
      }
    } finally {
      clearTimeout(idle);
    }
    return (await stat(outputPath)).size;
  }
}

function isLocalWriteError(err: unknown): boolean {
  return (
    err instanceof Error &&
    'syscall' in err &&
    typeof err.syscall === 'string' &&
    WRITE_SYSCALLS.has(err.syscall)
  );
}

function toDownloadError(url: string, err: unknown, signal: AbortSignal): EphemerisDownloadError {
  if (signal.aborted) {
    return new EphemerisDownloadError(url, 'timeout', `timed out fetching ${url}`, { cause: err });
  }
  const detail = err instanceof Error ? describeNetworkError(err) : String(err);
  return new EphemerisDownloadError(url, 'network', `network error fetching ${url}: ${detail}`, {
    cause: err,
  });
}

// undici wraps the socket-level failure in a generic "fetch failed" TypeError
function describeNetworkError(err: Error): string {
  if (err.cause instanceof Error) return `${err.message} (${err.cause.message})`;
  return err.message;
}
