import type { SimulationRequest } from '@gps-sim-prep/domain';
import { IQ_BIT_DEPTH } from '../../config/radio.js';

const pad2 = (n: number): string => String(n).padStart(2, '0');

/** `lat,lon,alt` in shortest round-trip decimal form, e.g. `-22.9519,-43.2105,710`. */
export function formatLocation(request: SimulationRequest): string {
  return `${request.latitude},${request.longitude},${request.altitude}`;
}

/** `YYYY/MM/DD,HH:MM:SS` in UTC. */
export function formatToolTime(date: Date): string {
  const d = `${date.getUTCFullYear()}/${pad2(date.getUTCMonth() + 1)}/${pad2(date.getUTCDate())}`;
  const t = `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())}`;
  return `${d},${t}`;
}

export function formatCompactTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad2(date.getUTCMonth() + 1)}${pad2(date.getUTCDate())}_` +
    `${pad2(date.getUTCHours())}${pad2(date.getUTCMinutes())}${pad2(date.getUTCSeconds())}`
  );
}

/**
 * Base name shared by the capture and its sidecar. Every coordinate and the
 * start time are embedded at full precision so distinct requests never collide.
 */
export function outputBaseName(request: SimulationRequest): string {
  return (
    `gps_sim_${request.latitude}_${request.longitude}_${request.altitude}m_` +
    formatCompactTimestamp(request.startTime)
  );
}

/** Argument vector in the order the signal tool expects. */
export function buildToolArgs(
  ephemerisPath: string,
  request: SimulationRequest,
  iqCapturePath: string,
): string[] {
  return [
    '-e', ephemerisPath,
    '-l', formatLocation(request),
    '-b', String(IQ_BIT_DEPTH),
    '-t', formatToolTime(request.startTime),
    '-o', iqCapturePath,
  ];
}
