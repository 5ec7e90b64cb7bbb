import { ZodError } from 'zod';
import { isPipelineError } from '@gps-sim-prep/domain';
import type { PipelineError } from '@gps-sim-prep/domain';

const HINTS: Partial<Record<PipelineError['kind'], string>> = {
  ephemeris_unavailable:
    'The archive may require a login; download the file in a browser and supply it manually.',
  decompression: 'The downloaded file is corrupted or not gzip; supply an uncompressed file manually.',
  tool_configuration: 'Check GPS_SDR_SIM_PATH or the path entered at the prompt.',
  tool_execution:
    'Check the ephemeris file covers the simulation date, or run gps-sdr-sim by hand with the same arguments.',
  tool_timeout: 'Shorten the simulation duration or raise GPS_SDR_SIM_TIMEOUT_MS.',
  distribution: 'The generated files are still in the output directory; copy them to <card>/gps/ by hand.',
};

/** Readable lines describing a fatal failure, for the top-level handler. */
export function describeFailure(err: unknown): string[] {
  if (err instanceof ZodError) {
    return [
      'invalid configuration',
      ...err.errors.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`),
    ];
  }
  if (isPipelineError(err)) {
    const hint = HINTS[err.kind];
    return hint ? [err.message, hint] : [err.message];
  }
  if (err instanceof Error) return [err.message];
  return ['unexpected error'];
}
