import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { existsSync } from 'node:fs';
import { mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { DistributionError } from '@gps-sim-prep/domain';
import { distributeArtifacts } from '../artifact-distributor.js';
import { makeTempDir } from '../../../__tests__/fakes.js';

describe('distributeArtifacts', () => {
  let workDir: string;
  let capture: string;
  let sidecar: string;
  let cardRoot: string;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    workDir = await makeTempDir('dist');
    capture = path.join(workDir, 'gps_sim_a.c8');
    sidecar = path.join(workDir, 'gps_sim_a.txt');
    cardRoot = path.join(workDir, 'card');
    await writeFile(capture, Buffer.alloc(2048, 0x01));
    await writeFile(sidecar, 'sample_rate=2600000\ncenter_frequency=1575420000\n');
    await mkdir(cardRoot);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(workDir, { recursive: true, force: true });
  });

  it('creates <root>/gps and copies both files into it', async () => {
    const result = await distributeArtifacts(capture, sidecar, cardRoot);

    const gpsDir = path.join(cardRoot, 'gps');
    expect(result).toEqual({
      destinationDir: gpsDir,
      files: [path.join(gpsDir, 'gps_sim_a.c8'), path.join(gpsDir, 'gps_sim_a.txt')],
    });
    expect((await readdir(gpsDir)).sort()).toEqual(['gps_sim_a.c8', 'gps_sim_a.txt']);
    expect(await readFile(path.join(gpsDir, 'gps_sim_a.txt'), 'utf8')).toBe(
      'sample_rate=2600000\ncenter_frequency=1575420000\n',
    );
  });

  it('is idempotent: a second call overwrites instead of duplicating', async () => {
    await distributeArtifacts(capture, sidecar, cardRoot);
    await writeFile(sidecar, 'updated\n');
    await distributeArtifacts(capture, sidecar, cardRoot);

    const gpsDir = path.join(cardRoot, 'gps');
    expect((await readdir(gpsDir)).sort()).toEqual(['gps_sim_a.c8', 'gps_sim_a.txt']);
    expect(await readFile(path.join(gpsDir, 'gps_sim_a.txt'), 'utf8')).toBe('updated\n');
  });

  it('works when the gps folder already exists', async () => {
    await mkdir(path.join(cardRoot, 'gps'));
    await expect(distributeArtifacts(capture, sidecar, cardRoot)).resolves.toMatchObject({
      destinationDir: path.join(cardRoot, 'gps'),
    });
  });

  it('fails without side effects when the root does not exist', async () => {
    const missing = path.join(workDir, 'no-card');

    const err = await distributeArtifacts(capture, sidecar, missing).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DistributionError);
    expect((err as DistributionError).targetRoot).toBe(missing);
    expect(existsSync(missing)).toBe(false);
  });

  it('fails when the root is a file', async () => {
    const err = await distributeArtifacts(capture, sidecar, sidecar).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DistributionError);
    expect((err as DistributionError).message).toBe(`could not copy artifacts to ${sidecar}: not a directory`);
  });

  it('wraps copy failures in DistributionError', async () => {
    await rm(sidecar);

    await expect(distributeArtifacts(capture, sidecar, cardRoot)).rejects.toBeInstanceOf(DistributionError);
    expect(await readdir(path.join(cardRoot, 'gps'))).toEqual(['gps_sim_a.c8']);
  });
});
