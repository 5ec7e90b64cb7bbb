import { stat } from 'node:fs/promises';

export interface ValidityVerdict {
  valid: boolean;
  reason?: string;
}

/**
 * Decides whether a downloaded file is real ephemeris data rather than an
 * error or login page. Swappable so a content check can replace the size one.
 */
export type EphemerisValidityCheck = (filePath: string) => Promise<ValidityVerdict>;

export const DEFAULT_MIN_EPHEMERIS_BYTES = 100 * 1024;

export function formatKb(bytes: number): string {
  return `${(bytes / 1024).toFixed(2)} KB`;
}

// Archive error pages run ~11 KB; real daily files are several hundred KB.
export function minimumSizeValidity(minBytes: number = DEFAULT_MIN_EPHEMERIS_BYTES): EphemerisValidityCheck {
  return async (filePath) => {
    const { size } = await stat(filePath);
    if (size < minBytes) {
      return {
        valid: false,
        reason: `only ${formatKb(size)}, below ${formatKb(minBytes)}; likely an error or login page`,
      };
    }
    return { valid: true };
  };
}
