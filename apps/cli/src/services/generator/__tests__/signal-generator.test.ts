import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { existsSync } from 'node:fs';
import { chmod, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { ChildProcessToolRunner } from '@gps-sim-prep/adapters';
import {
  ToolConfigurationError,
  ToolExecutionError,
  ToolTimeoutError,
} from '@gps-sim-prep/domain';
import type { SimulationRequest } from '@gps-sim-prep/domain';
import { SignalArtifactGenerator, renderSidecar } from '../signal-generator.js';
import { FakeToolRunner, makeFakeTool, makeTempDir } from '../../../__tests__/fakes.js';

const REQUEST: SimulationRequest = {
  latitude: -22.9519,
  longitude: -43.2105,
  altitude: 710,
  startTime: new Date('2025-06-05T10:00:00Z'),
};
const BASE_NAME = 'gps_sim_-22.9519_-43.2105_710m_20250605_100000';
const SIDECAR = 'sample_rate=2600000\ncenter_frequency=1575420000\n';

// Stand-in for gps-sdr-sim: needs a readable -e file and writes the -o file.
const SHELL_TOOL = `#!/bin/sh
while [ $# -gt 0 ]; do
  case "$1" in
    -e) eph="$2"; shift 2 ;;
    -o) out="$2"; shift 2 ;;
    *) shift ;;
  esac
done
[ -f "$eph" ] || { echo "missing $eph" >&2; exit 4; }
printf 'iq' > "$out"
`;

const itPosix = process.platform === 'win32' ? it.skip : it;

describe('renderSidecar', () => {
  it('renders exactly two key=value lines', () => {
    expect(renderSidecar()).toBe(SIDECAR);
  });
});

describe('SignalArtifactGenerator', () => {
  let workDir: string;
  let toolPath: string;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    workDir = await makeTempDir('gen');
    toolPath = await makeFakeTool(workDir);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(workDir, { recursive: true, force: true });
  });

  const generatorWith = (runner: FakeToolRunner) =>
    new SignalArtifactGenerator(runner, { outputDir: workDir, toolTimeoutMs: 300_000 });

  it('invokes the tool with the contract arguments and writes the sidecar', async () => {
    const runner = new FakeToolRunner();
    const ephemeris = path.join(workDir, 'brdc1560.25n');

    const pair = await generatorWith(runner).generate(toolPath, ephemeris, REQUEST, BASE_NAME);

    expect(pair).toEqual({
      iqCapturePath: path.join(workDir, `${BASE_NAME}.c8`),
      configPath: path.join(workDir, `${BASE_NAME}.txt`),
    });
    expect(runner.runs).toHaveLength(1);
    expect(runner.runs[0]?.toolPath).toBe(toolPath);
    expect(runner.runs[0]?.args).toEqual([
      '-e', ephemeris,
      '-l', '-22.9519,-43.2105,710',
      '-b', '8',
      '-t', '2025/06/05,10:00:00',
      '-o', pair.iqCapturePath,
    ]);
    expect(runner.runs[0]?.opts.timeoutMs).toBe(300_000);
    expect(await readFile(pair.configPath, 'ascii')).toBe(SIDECAR);
  });

  it('writes the same sidecar whatever the request', async () => {
    const runner = new FakeToolRunner();
    const pair = await generatorWith(runner).generate(
      toolPath,
      path.join(workDir, 'brdc0010.24n'),
      { latitude: 51.5, longitude: -0.12, altitude: 0, startTime: new Date('2024-01-01T00:00:00Z') },
      'other',
    );

    expect(await readFile(pair.configPath, 'ascii')).toBe(SIDECAR);
  });

  it('fails with the captured stderr on a non-zero exit and writes no sidecar', async () => {
    const runner = new FakeToolRunner(async () => ({
      exitCode: 1,
      signal: null,
      stdout: '',
      stderr: 'ERROR: Invalid start time.\n',
    }));

    const err = await generatorWith(runner)
      .generate(toolPath, path.join(workDir, 'brdc1560.25n'), REQUEST, BASE_NAME)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ToolExecutionError);
    expect((err as ToolExecutionError).exitCode).toBe(1);
    expect((err as ToolExecutionError).stderr).toBe('ERROR: Invalid start time.\n');
    expect(existsSync(path.join(workDir, `${BASE_NAME}.txt`))).toBe(false);
  });

  it('propagates a timeout as its own failure kind', async () => {
    const runner = new FakeToolRunner(async () => {
      throw new ToolTimeoutError(300_000);
    });

    await expect(
      generatorWith(runner).generate(toolPath, path.join(workDir, 'brdc1560.25n'), REQUEST, BASE_NAME),
    ).rejects.toBeInstanceOf(ToolTimeoutError);
  });

  it('rejects a missing tool before running anything', async () => {
    const runner = new FakeToolRunner();

    await expect(
      generatorWith(runner).generate(path.join(workDir, 'missing'), 'x', REQUEST, BASE_NAME),
    ).rejects.toBeInstanceOf(ToolConfigurationError);
    expect(runner.runs).toHaveLength(0);
  });

  it('rejects a directory or a non-executable file as the tool', async () => {
    const runner = new FakeToolRunner();
    const plainFile = await makeFakeTool(await makeTempDir('gen-noexec'), 0o644);

    const dirErr = await generatorWith(runner)
      .generate(workDir, 'x', REQUEST, BASE_NAME)
      .catch((e: unknown) => e);
    const modeErr = await generatorWith(runner)
      .generate(plainFile, 'x', REQUEST, BASE_NAME)
      .catch((e: unknown) => e);

    expect((dirErr as ToolConfigurationError).message).toBe(
      `signal tool unusable at ${workDir}: not a regular file`,
    );
    expect((modeErr as ToolConfigurationError).message).toBe(
      `signal tool unusable at ${plainFile}: not executable`,
    );
    expect(runner.runs).toHaveLength(0);
    await rm(path.dirname(plainFile), { recursive: true, force: true });
  });

  itPosix('runs a real tool given paths relative to the working directory', async () => {
    const toolFile = path.join(workDir, 'gps-sdr-sim.sh');
    await writeFile(toolFile, SHELL_TOOL);
    await chmod(toolFile, 0o755);
    const ephemerisFile = path.join(workDir, 'brdc1560.25n');
    await writeFile(ephemerisFile, 'nav data');
    const outputDir = path.join(workDir, 'out');
    await mkdir(outputDir);

    const generator = new SignalArtifactGenerator(new ChildProcessToolRunner(), {
      outputDir,
      toolTimeoutMs: 10_000,
    });
    const pair = await generator.generate(
      path.relative(process.cwd(), toolFile),
      path.relative(process.cwd(), ephemerisFile),
      REQUEST,
      BASE_NAME,
    );

    expect(pair.iqCapturePath).toBe(path.join(outputDir, `${BASE_NAME}.c8`));
    expect(await readFile(pair.iqCapturePath, 'ascii')).toBe('iq');
    expect(await readFile(pair.configPath, 'ascii')).toBe(SIDECAR);
  });
});
