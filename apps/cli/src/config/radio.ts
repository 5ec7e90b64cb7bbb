import type { RadioSettings } from '@gps-sim-prep/domain';

// GPS L1 C/A playback settings expected by the transmitter firmware. Fixed for
// every request; not read from the environment.
export const SAMPLE_RATE_HZ = 2_600_000;
export const CENTER_FREQUENCY_HZ = 1_575_420_000;

/** I/Q sample width passed to the tool as `-b`. */
export const IQ_BIT_DEPTH = 8;

export const RADIO_SETTINGS: RadioSettings = Object.freeze({
  sampleRateHz: SAMPLE_RATE_HZ,
  centerFrequencyHz: CENTER_FREQUENCY_HZ,
});
