import {
  ChildProcessToolRunner,
  GzipDecompressor,
  UndiciFileDownloader,
} from '@gps-sim-prep/adapters';
import type {
  DecompressorPort,
  DistributionTargetProvider,
  FileDownloaderPort,
  ManualEphemerisProvider,
  SignalToolRunnerPort,
} from '@gps-sim-prep/domain';
import type { AppConfig } from './config/env.js';
import { EphemerisAcquirer } from './services/ephemeris/ephemeris-acquirer.js';
import { minimumSizeValidity } from './services/ephemeris/ephemeris-validity.js';
import { SignalArtifactGenerator } from './services/generator/signal-generator.js';
import { SimulationPipeline } from './services/pipeline/simulation-pipeline.js';

export interface PipelineAdapters {
  downloader: FileDownloaderPort;
  decompressor: DecompressorPort;
  runner: SignalToolRunnerPort;
}

export function defaultAdapters(): PipelineAdapters {
  return {
    downloader: new UndiciFileDownloader(),
    decompressor: new GzipDecompressor(),
    runner: new ChildProcessToolRunner(),
  };
}

export function buildPipeline(
  config: AppConfig,
  providers: ManualEphemerisProvider & DistributionTargetProvider,
  adapters: PipelineAdapters = defaultAdapters(),
): SimulationPipeline {
  const acquirer = new EphemerisAcquirer(adapters.downloader, adapters.decompressor, {
    archiveBaseUrl: config.archiveBaseUrl,
    downloadTimeoutMs: config.downloadTimeoutMs,
    validity: minimumSizeValidity(config.minEphemerisBytes),
  });
  const generator = new SignalArtifactGenerator(adapters.runner, {
    outputDir: config.outputDir,
    toolTimeoutMs: config.toolTimeoutMs,
  });

  return new SimulationPipeline(
    { acquirer, generator, manualEphemeris: providers, distributionTarget: providers },
    config.outputDir,
  );
}
