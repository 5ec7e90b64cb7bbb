import * as path from 'node:path';
import { mkdir } from 'node:fs/promises';
import {
  DecompressionError,
  DistributionError,
  EphemerisUnavailableError,
} from '@gps-sim-prep/domain';
import type {
  DistributionOutcome,
  DistributionTargetProvider,
  EphemerisArtifact,
  ManualEphemerisProvider,
  SimulationPipelinePort,
  SimulationRequest,
  SimulationRunReport,
} from '@gps-sim-prep/domain';
import type { EphemerisAcquirer } from '../ephemeris/ephemeris-acquirer.js';
import { ephemerisFileName, toEphemerisReference } from '../ephemeris/ephemeris-naming.js';
import type { SignalArtifactGenerator } from '../generator/signal-generator.js';
import { outputBaseName } from '../generator/tool-arguments.js';
import { distributeArtifacts } from '../distribution/artifact-distributor.js';

export interface SimulationPipelineDeps {
  acquirer: EphemerisAcquirer;
  generator: SignalArtifactGenerator;
  manualEphemeris: ManualEphemerisProvider;
  distributionTarget: DistributionTargetProvider;
}

/**
 * Acquirer → Generator → Distributor, strictly in sequence. A stage only runs
 * once the previous one produced its artifact.
 */
export class SimulationPipeline implements SimulationPipelinePort {
  constructor(
    private readonly deps: SimulationPipelineDeps,
    private readonly outputDir: string,
  ) {}

  async run(request: SimulationRequest, toolPath: string): Promise<SimulationRunReport> {
    await mkdir(this.outputDir, { recursive: true });
    console.log(`[pipeline] working directory ${this.outputDir}`);

    const ephemeris = await this.resolveEphemeris(request.startTime);

    const baseName = outputBaseName(request);
    const artifacts = await this.deps.generator.generate(toolPath, ephemeris.path, request, baseName);

    const distribution = await this.distributeIfRequested(artifacts.iqCapturePath, artifacts.configPath);

    return { outputBaseName: baseName, ephemeris, artifacts, distribution };
  }

  private async resolveEphemeris(startTime: Date): Promise<EphemerisArtifact> {
    const fileName = ephemerisFileName(toEphemerisReference(startTime));
    const outputPath = path.join(this.outputDir, fileName);

    try {
      return await this.deps.acquirer.acquire(startTime, outputPath);
    } catch (err) {
      if (!(err instanceof EphemerisUnavailableError || err instanceof DecompressionError)) throw err;
      console.warn(`[pipeline] automatic ephemeris download failed: ${err.message}`);

      const manualPath = await this.deps.manualEphemeris.provideEphemeris(err);
      if (manualPath === null) throw err;
      console.log(`[pipeline] using manually supplied ephemeris ${manualPath}`);
      return { path: manualPath, source: 'manual' };
    }
  }

  private async distributeIfRequested(capturePath: string, configPath: string): Promise<DistributionOutcome> {
    const targetRoot = await this.deps.distributionTarget.chooseTargetRoot();
    if (targetRoot === null) {
      console.log('[pipeline] distribution skipped');
      return { status: 'skipped' };
    }

    try {
      const result = await distributeArtifacts(capturePath, configPath, targetRoot);
      return { status: 'copied', destinationDir: result.destinationDir, files: result.files };
    } catch (err) {
      // Artifacts stay valid in the working directory; the copy can be redone by hand.
      if (!(err instanceof DistributionError)) throw err;
      console.error(`[pipeline] ${err.message}`);
      return { status: 'failed', message: err.message };
    }
  }
}
