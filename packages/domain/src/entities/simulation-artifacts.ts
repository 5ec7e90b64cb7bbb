import type { EphemerisArtifact } from './ephemeris.js';

export interface SimulationArtifactPair {
  /** 8-bit I/Q samples written by the signal-generation tool. */
  readonly iqCapturePath: string;
  /** key=value sidecar written alongside the capture. */
  readonly configPath: string;
}

export interface RadioSettings {
  readonly sampleRateHz: number;
  readonly centerFrequencyHz: number;
}

export type DistributionOutcome =
  | { readonly status: 'copied'; readonly destinationDir: string; readonly files: readonly string[] }
  | { readonly status: 'skipped' }
  | { readonly status: 'failed'; readonly message: string };

export interface SimulationRunReport {
  readonly outputBaseName: string;
  readonly ephemeris: EphemerisArtifact;
  readonly artifacts: SimulationArtifactPair;
  readonly distribution: DistributionOutcome;
}
