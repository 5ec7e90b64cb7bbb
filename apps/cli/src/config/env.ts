import * as path from 'node:path';
import { z } from 'zod';

export const DEFAULT_ARCHIVE_URL = 'https://cddis.nasa.gov/archive/gnss/data/daily/';

export function defaultToolPath(platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32'
    ? 'C:\\Users\\Public\\gps-sdr-sim-win\\gps-sdr-sim.exe'
    : '/usr/local/bin/gps-sdr-sim';
}

const envSchema = z.object({
  GPS_SDR_SIM_PATH: z.string().trim().min(1).optional(),
  EPHEMERIS_ARCHIVE_URL: z.string().trim().url().default(DEFAULT_ARCHIVE_URL),
  GPS_SIM_OUTPUT_DIR: z.string().trim().min(1).optional(),
  EPHEMERIS_DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  GPS_SDR_SIM_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  MIN_EPHEMERIS_FILE_BYTES: z.coerce.number().int().nonnegative().default(100 * 1024),
});

export interface AppConfig {
  /** Preferred tool location; the prompter asks again when it is unusable. */
  readonly toolPath: string;
  readonly archiveBaseUrl: string;
  readonly outputDir: string;
  readonly downloadTimeoutMs: number;
  readonly toolTimeoutMs: number;
  readonly minEphemerisBytes: number;
}

/** Parses the process environment; throws ZodError on malformed values. */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    toolPath: parsed.GPS_SDR_SIM_PATH ?? defaultToolPath(),
    archiveBaseUrl: parsed.EPHEMERIS_ARCHIVE_URL,
    outputDir: path.resolve(cwd, parsed.GPS_SIM_OUTPUT_DIR ?? 'gps_sim_output'),
    downloadTimeoutMs: parsed.EPHEMERIS_DOWNLOAD_TIMEOUT_MS,
    toolTimeoutMs: parsed.GPS_SDR_SIM_TIMEOUT_MS,
    minEphemerisBytes: parsed.MIN_EPHEMERIS_FILE_BYTES,
  };
}
