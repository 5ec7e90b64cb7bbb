import * as path from 'node:path';
import { constants } from 'node:fs';
import { access, stat, writeFile } from 'node:fs/promises';
import { ToolConfigurationError, ToolExecutionError } from '@gps-sim-prep/domain';
import type {
  RadioSettings,
  SignalToolRunnerPort,
  SimulationArtifactPair,
  SimulationRequest,
} from '@gps-sim-prep/domain';
import { RADIO_SETTINGS } from '../../config/radio.js';
import { buildToolArgs } from './tool-arguments.js';

export const IQ_CAPTURE_EXTENSION = '.c8';
export const SIDECAR_EXTENSION = '.txt';

export interface SignalGeneratorOptions {
  outputDir: string;
  toolTimeoutMs: number;
}

/** Exactly two newline-terminated `key=value` lines. */
export function renderSidecar(radio: RadioSettings = RADIO_SETTINGS): string {
  return `sample_rate=${radio.sampleRateHz}\ncenter_frequency=${radio.centerFrequencyHz}\n`;
}

/** Throws ToolConfigurationError unless `toolPath` is an executable regular file. */
export async function assertExecutable(toolPath: string): Promise<void> {
  let isFile: boolean;
  try {
    isFile = (await stat(toolPath)).isFile();
  } catch (err) {
    throw new ToolConfigurationError(toolPath, 'file not found', { cause: err });
  }
  if (!isFile) throw new ToolConfigurationError(toolPath, 'not a regular file');

  // Windows has no execute bit; existence is the best available check there.
  if (process.platform === 'win32') return;
  try {
    await access(toolPath, constants.X_OK);
  } catch (err) {
    throw new ToolConfigurationError(toolPath, 'not executable', { cause: err });
  }
}

export class SignalArtifactGenerator {
  constructor(
    private readonly runner: SignalToolRunnerPort,
    private readonly opts: SignalGeneratorOptions,
  ) {}

  async generate(
    toolPath: string,
    ephemerisPath: string,
    request: SimulationRequest,
    outputBaseName: string,
  ): Promise<SimulationArtifactPair> {
    // The tool runs inside outputDir, so caller-relative paths must be pinned first.
    const tool = path.resolve(toolPath);
    await assertExecutable(tool);

    const outputDir = path.resolve(this.opts.outputDir);
    const iqCapturePath = path.join(outputDir, outputBaseName + IQ_CAPTURE_EXTENSION);
    const configPath = path.join(outputDir, outputBaseName + SIDECAR_EXTENSION);
    const args = buildToolArgs(path.resolve(ephemerisPath), request, iqCapturePath);

    console.log(`[generator] running ${[tool, ...args].join(' ')}`);
    const result = await this.runner.run(tool, args, {
      timeoutMs: this.opts.toolTimeoutMs,
      cwd: outputDir,
    });

    if (result.stdout.trim()) console.log(`[generator] tool output:\n${result.stdout.trimEnd()}`);
    if (result.exitCode !== 0) {
      throw new ToolExecutionError(result.exitCode, result.stderr, result.stdout);
    }
    if (result.stderr.trim()) console.warn(`[generator] tool stderr:\n${result.stderr.trimEnd()}`);

    await writeFile(configPath, renderSidecar(), { encoding: 'ascii' });
    console.log(`[generator] wrote ${path.basename(iqCapturePath)} and ${path.basename(configPath)}`);

    return { iqCapturePath, configPath };
  }
}
