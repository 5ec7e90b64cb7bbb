import * as path from 'node:path';
import type { SimulationRequest, SimulationRunReport } from '@gps-sim-prep/domain';
import { formatToolTime } from './services/generator/tool-arguments.js';

export function renderSummary(report: SimulationRunReport, request: SimulationRequest, outputDir: string): string[] {
  const capture = path.basename(report.artifacts.iqCapturePath);
  const sidecar = path.basename(report.artifacts.configPath);

  const lines = [
    `Generated files in ${outputDir}: ${capture} and ${sidecar}`,
    `Ephemeris: ${report.ephemeris.path} (${report.ephemeris.source})`,
    `Location: lat=${request.latitude}, lon=${request.longitude}, alt=${request.altitude}m`,
    `Start time (UTC): ${formatToolTime(request.startTime)}`,
  ];

  switch (report.distribution.status) {
    case 'copied':
      lines.push(`Copied to ${report.distribution.destinationDir}`);
      break;
    case 'failed':
      lines.push(`Copy to SD card failed: ${report.distribution.message}`);
      lines.push(`Copy ${capture} and ${sidecar} into the card's gps/ folder by hand.`);
      break;
    case 'skipped':
      lines.push(`SD card copy skipped; place ${capture} and ${sidecar} in the card's gps/ folder later.`);
      break;
  }

  lines.push(
    'Playback: eject the card safely, insert it in the transmitter, open Transmit -> GPS Sim,',
    `load ${capture} from the gps folder, start with TX gain at 0 dB, and only transmit`,
    'into a shielded enclosure or a cabled receiver under test.',
  );
  return lines;
}
