export interface EphemerisReference {
  readonly year: number;
  /** 1-based ordinal day within `year` (1–366). */
  readonly dayOfYear: number;
}

export type EphemerisCompression = 'none' | 'gzip' | 'lzw';

/** One remote variant of a daily broadcast-ephemeris file. */
export interface EphemerisCandidate {
  readonly fileName: string;
  readonly url: string;
  readonly compression: EphemerisCompression;
  /** Suffix appended to the local output path while the body is downloaded. */
  readonly extension: '' | '.gz' | '.Z';
}

export type EphemerisSource = 'download' | 'manual';

/** An uncompressed broadcast-ephemeris file on local storage. */
export interface EphemerisArtifact {
  readonly path: string;
  readonly source: EphemerisSource;
  readonly candidate?: EphemerisCandidate;
}

export interface EphemerisAttempt {
  readonly url: string;
  readonly reason: string;
}
