import * as path from 'node:path';
import { stat } from 'node:fs/promises';
import { z } from 'zod';
import { ToolConfigurationError } from '@gps-sim-prep/domain';
import type { SimulationRequest } from '@gps-sim-prep/domain';
import { assertExecutable } from '../services/generator/signal-generator.js';
import { formatKb } from '../services/ephemeris/ephemeris-validity.js';

export type Validation<T> = { ok: true; value: T } | { ok: false; message: string };

const reject = <T>(message: string): Validation<T> => ({ ok: false, message });

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid input';
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

// ─── Coordinates ──────────────────────────────────────────────────────────────

const decimalSchema = z
  .string()
  .trim()
  .min(1, 'a value is required')
  .transform((s) => s.replace(/,/g, '.'))
  .pipe(z.coerce.number({ invalid_type_error: 'not a number' }).finite('must be a finite number'));

const coordinatesSchema = z.object({
  latitude: decimalSchema,
  longitude: decimalSchema,
  altitude: decimalSchema,
});

export type Coordinates = Pick<SimulationRequest, 'latitude' | 'longitude' | 'altitude'>;

/** Decimal commas are accepted. Ranges are not checked. */
export function parseCoordinates(latitude: string, longitude: string, altitude: string): Validation<Coordinates> {
  const parsed = coordinatesSchema.safeParse({ latitude, longitude, altitude });
  return parsed.success ? { ok: true, value: parsed.data } : reject(firstIssue(parsed.error));
}

// ─── Date / time ──────────────────────────────────────────────────────────────

const dateTimeSchema = z
  .object({
    date: z.string().trim().regex(/^\d{4}-\d{1,2}-\d{1,2}$/, 'use YYYY-MM-DD'),
    time: z.string().trim().regex(/^\d{1,2}:\d{1,2}:\d{1,2}$/, 'use HH:MM:SS'),
  })
  .transform(({ date, time }, ctx) => {
    const [year = 0, month = 0, day = 0] = date.split('-').map(Number);
    const [hour = 0, minute = 0, second = 0] = time.split(':').map(Number);
    const value = new Date(Date.UTC(year, month - 1, day, hour, minute, second));

    const roundTrips =
      value.getUTCFullYear() === year &&
      value.getUTCMonth() === month - 1 &&
      value.getUTCDate() === day &&
      value.getUTCHours() === hour &&
      value.getUTCMinutes() === minute &&
      value.getUTCSeconds() === second;
    if (!roundTrips) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'not a real calendar date and time' });
      return z.NEVER;
    }
    return value;
  });

/** Reads `YYYY-MM-DD` and `HH:MM:SS` as a UTC instant. */
export function parseSimulationDateTime(date: string, time: string): Validation<Date> {
  const parsed = dateTimeSchema.safeParse({ date, time });
  return parsed.success ? { ok: true, value: parsed.data } : reject(firstIssue(parsed.error));
}

// ─── Yes / no ─────────────────────────────────────────────────────────────────

const ANSWERS = ['s', 'sim', 'y', 'yes', 'n', 'nao', 'não', 'no'] as const;
const AFFIRMATIVE: ReadonlySet<string> = new Set(['s', 'sim', 'y', 'yes']);

const yesNoSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(ANSWERS, { errorMap: () => ({ message: "answer 'y' or 'n'" }) }));

export function parseYesNo(answer: string): Validation<boolean> {
  const parsed = yesNoSchema.safeParse(answer);
  if (!parsed.success) return reject(firstIssue(parsed.error));
  return { ok: true, value: AFFIRMATIVE.has(parsed.data) };
}

// ─── Paths ────────────────────────────────────────────────────────────────────

/** Trims whitespace and the quotes file managers add to copied paths. */
export function normalizePathInput(input: string): string {
  return input.trim().replace(/^(['"])(.*)\1$/, '$2');
}

/**
 * Windows accepts a drive letter (`D:` → `D:\`) or an absolute path; other
 * platforms take the absolute mount point of the card.
 */
export function parseTargetRoot(input: string, platform: NodeJS.Platform = process.platform): Validation<string> {
  const value = normalizePathInput(input);
  if (!value) return reject('a drive or mount point is required');

  if (platform === 'win32') {
    const drive = /^([A-Za-z]):\\?$/.exec(value);
    if (drive?.[1]) return { ok: true, value: `${drive[1].toUpperCase()}:\\` };
    if (path.win32.isAbsolute(value)) return { ok: true, value };
    return reject('enter a drive letter followed by a colon, e.g. D:');
  }

  if (!path.posix.isAbsolute(value)) return reject('enter the absolute mount point, e.g. /media/sdcard');
  return { ok: true, value };
}

export async function inspectTargetRoot(root: string): Promise<Validation<string>> {
  try {
    const info = await stat(root);
    return info.isDirectory() ? { ok: true, value: root } : reject(`'${root}' is not a directory`);
  } catch {
    return reject(`'${root}' does not exist or is not accessible`);
  }
}

export async function inspectExecutable(input: string): Promise<Validation<string>> {
  const toolPath = normalizePathInput(input);
  if (!toolPath) return reject('a path is required');
  try {
    await assertExecutable(toolPath);
    return { ok: true, value: toolPath };
  } catch (err) {
    if (err instanceof ToolConfigurationError) return reject(err.message);
    throw err;
  }
}

export interface ManualEphemerisInspection {
  path: string;
  /** Conditions the user must confirm before the file is used. */
  warnings: string[];
}

// brdcDDD0.YYn, plain .n, or RINEX 3 .rnx
const EPHEMERIS_NAME = /(\.\d{2}n|\.n|\.rnx)$/i;

export async function inspectManualEphemeris(
  input: string,
  minBytes: number,
): Promise<Validation<ManualEphemerisInspection>> {
  const filePath = normalizePathInput(input);
  if (!filePath) return reject('a path is required');

  let size: number;
  try {
    const info = await stat(filePath);
    if (!info.isFile()) return reject(`'${filePath}' is not a regular file`);
    size = info.size;
  } catch {
    return reject(`'${filePath}' was not found`);
  }

  const warnings: string[] = [];
  if (size < minBytes) {
    warnings.push(`'${path.basename(filePath)}' is only ${formatKb(size)}, unusually small for an ephemeris file`);
  }
  if (!EPHEMERIS_NAME.test(filePath)) {
    warnings.push(`'${path.basename(filePath)}' does not end in .n, .YYn or .rnx`);
  }
  return { ok: true, value: { path: filePath, warnings } };
}
