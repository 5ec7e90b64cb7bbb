import type { EphemerisAttempt } from '../entities/ephemeris.js';

export type PipelineErrorKind =
  | 'ephemeris_unavailable'
  | 'ephemeris_download'
  | 'decompression'
  | 'tool_configuration'
  | 'tool_execution'
  | 'tool_timeout'
  | 'distribution';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type DownloadFailureReason = 'http_status' | 'network' | 'timeout';

/** A single ephemeris URL could not be fetched. */
export class EphemerisDownloadError extends PipelineError {
  readonly kind = 'ephemeris_download' as const;

  constructor(
    readonly url: string,
    readonly reason: DownloadFailureReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Every remote candidate failed or was rejected by the validity check. */
export class EphemerisUnavailableError extends PipelineError {
  readonly kind = 'ephemeris_unavailable' as const;

  constructor(readonly attempts: readonly EphemerisAttempt[]) {
    super(
      attempts.length > 0
        ? `no usable ephemeris file after ${attempts.length} attempt(s): ${attempts
            .map((a) => `${a.url} (${a.reason})`)
            .join('; ')}`
        : 'no usable ephemeris file',
    );
  }
}

export class DecompressionError extends PipelineError {
  readonly kind = 'decompression' as const;

  constructor(
    readonly sourcePath: string,
    options?: { cause?: unknown },
  ) {
    super(`failed to decompress ${sourcePath}: not a valid gzip stream or corrupted`, options);
  }
}

/** Tool path is missing, not a file, or not executable. */
export class ToolConfigurationError extends PipelineError {
  readonly kind = 'tool_configuration' as const;

  constructor(
    readonly toolPath: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`signal tool unusable at ${toolPath}: ${detail}`, options);
  }
}

export class ToolExecutionError extends PipelineError {
  readonly kind = 'tool_execution' as const;

  constructor(
    readonly exitCode: number | null,
    readonly stderr: string,
    readonly stdout: string = '',
  ) {
    super(`signal tool exited with code ${exitCode ?? 'null'}${stderr ? `: ${stderr.trim()}` : ''}`);
  }
}

export class ToolTimeoutError extends PipelineError {
  readonly kind = 'tool_timeout' as const;

  constructor(readonly timeoutMs: number) {
    super(`signal tool did not finish within ${timeoutMs} ms`);
  }
}

export class DistributionError extends PipelineError {
  readonly kind = 'distribution' as const;

  constructor(
    readonly targetRoot: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`could not copy artifacts to ${targetRoot}: ${detail}`, options);
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}
