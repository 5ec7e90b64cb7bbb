import type { EphemerisCandidate, EphemerisReference } from '@gps-sim-prep/domain';

const MS_PER_DAY = 86_400_000;

/** 1-based ordinal day of `date` within its UTC calendar year. */
export function dayOfYear(date: Date): number {
  const year = date.getUTCFullYear();
  const startOfDay = Date.UTC(year, date.getUTCMonth(), date.getUTCDate());
  return Math.round((startOfDay - Date.UTC(year, 0, 1)) / MS_PER_DAY) + 1;
}

export function toEphemerisReference(date: Date): EphemerisReference {
  return { year: date.getUTCFullYear(), dayOfYear: dayOfYear(date) };
}

function dayStr(ref: EphemerisReference): string {
  return String(ref.dayOfYear).padStart(3, '0');
}

/** Uncompressed daily GPS navigation file name, e.g. `brdc1560.25n`. */
export function ephemerisFileName(ref: EphemerisReference): string {
  const yearShort = String(ref.year).slice(-2);
  return `brdc${dayStr(ref)}0.${yearShort}n`;
}

/**
 * Remote variants in download priority order: plain, gzip, then legacy
 * Unix-compress. URLs follow `{base}/{year}/{ddd}/brdc/{file}`.
 */
export function buildEphemerisCandidates(
  ref: EphemerisReference,
  archiveBaseUrl: string,
): EphemerisCandidate[] {
  const base = archiveBaseUrl.replace(/\/+$/, '');
  const plain = ephemerisFileName(ref);
  const dir = `${base}/${ref.year}/${dayStr(ref)}/brdc`;

  return [
    { fileName: plain, url: `${dir}/${plain}`, compression: 'none', extension: '' },
    { fileName: `${plain}.gz`, url: `${dir}/${plain}.gz`, compression: 'gzip', extension: '.gz' },
    { fileName: `${plain}.Z`, url: `${dir}/${plain}.Z`, compression: 'lzw', extension: '.Z' },
  ];
}
