import * as readline from 'node:readline/promises';
import type {
  DistributionTargetProvider,
  ManualEphemerisProvider,
  PipelineError,
  SimulationRequest,
} from '@gps-sim-prep/domain';
import {
  inspectExecutable,
  inspectManualEphemeris,
  inspectTargetRoot,
  parseCoordinates,
  parseSimulationDateTime,
  parseTargetRoot,
  parseYesNo,
} from './validators.js';
import type { Validation } from './validators.js';

/** Asks one question and resolves with the raw answer line. */
export type Ask = (question: string) => Promise<string>;

export interface ReadlineSession {
  ask: Ask;
  close(): void;
}

export function openReadlineSession(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): ReadlineSession {
  const rl = readline.createInterface({ input, output });
  return {
    ask: (question) => rl.question(question),
    close: () => rl.close(),
  };
}

export interface ConsolePrompterOptions {
  minEphemerisBytes: number;
  platform?: NodeJS.Platform;
}

/**
 * Interactive input gathering. Every answer goes through a validate-or-reject
 * parser and the question repeats until the parser accepts it.
 */
export class ConsolePrompter implements ManualEphemerisProvider, DistributionTargetProvider {
  private readonly platform: NodeJS.Platform;

  constructor(
    private readonly ask: Ask,
    private readonly opts: ConsolePrompterOptions,
  ) {
    this.platform = opts.platform ?? process.platform;
  }

  /** Uses `preferred` when it is an executable file, otherwise asks for one. */
  async resolveToolPath(preferred: string): Promise<string> {
    const initial = await inspectExecutable(preferred);
    if (initial.ok) return initial.value;
    console.warn(`[cli] ${initial.message}`);

    return this.askUntilValid('Full path to the gps-sdr-sim executable: ', inspectExecutable);
  }

  async askSimulationRequest(): Promise<SimulationRequest> {
    const coords = await this.askUntilValid(null, async () => {
      const lat = await this.ask('Latitude (e.g. -22.9519): ');
      const lon = await this.ask('Longitude (e.g. -43.2105): ');
      const alt = await this.ask('Altitude in metres (e.g. 710): ');
      return parseCoordinates(lat, lon, alt);
    });

    const startTime = await this.askUntilValid(null, async () => {
      const date = await this.ask('Simulation date, UTC (YYYY-MM-DD): ');
      const time = await this.ask('Simulation time, UTC (HH:MM:SS): ');
      return parseSimulationDateTime(date, time);
    });

    return { ...coords, startTime };
  }

  /** An empty answer gives up and resolves with null. */
  async provideEphemeris(failure: PipelineError): Promise<string | null> {
    console.log(`[cli] automatic download failed (${failure.kind}).`);
    console.log('[cli] Download the daily brdcDDD0.YYn file for the simulation date from a GNSS');
    console.log('[cli] archive that you have access to, and decompress it if it ends in .gz or .Z.');

    for (;;) {
      const answer = await this.ask('Path to an uncompressed ephemeris file (empty to abort): ');
      if (!answer.trim()) return null;

      const inspected = await inspectManualEphemeris(answer, this.opts.minEphemerisBytes);
      if (!inspected.ok) {
        console.warn(`[cli] ${inspected.message}`);
        continue;
      }

      let accepted = true;
      for (const warning of inspected.value.warnings) {
        console.warn(`[cli] ${warning}`);
        if (!(await this.confirm('Use this file anyway? (y/n): '))) {
          accepted = false;
          break;
        }
      }
      if (accepted) return inspected.value.path;
    }
  }

  async chooseTargetRoot(): Promise<string | null> {
    if (!(await this.confirm('Copy the generated files to the SD card now? (y/n): '))) return null;

    const question =
      this.platform === 'win32' ? 'SD card drive letter (e.g. D:): ' : 'SD card mount point (e.g. /media/sdcard): ';
    return this.askUntilValid(question, async (answer) => {
      const root = parseTargetRoot(answer, this.platform);
      return root.ok ? inspectTargetRoot(root.value) : root;
    });
  }

  private async confirm(question: string): Promise<boolean> {
    return this.askUntilValid(question, async (answer) => parseYesNo(answer));
  }

  /**
   * With a question, asks it and validates the answer; with `null`, the
   * validator asks its own questions.
   */
  private async askUntilValid<T>(
    question: string | null,
    validate: (answer: string) => Promise<Validation<T>>,
  ): Promise<T> {
    for (;;) {
      const answer = question === null ? '' : await this.ask(question);
      const result = await validate(answer);
      if (result.ok) return result.value;
      console.warn(`[cli] ${result.message}`);
    }
  }
}
