import type { SimulationRequest } from '../../entities/simulation-request.js';
import type { SimulationRunReport } from '../../entities/simulation-artifacts.js';
import type { PipelineError } from '../../errors/pipeline-errors.js';

/** Supplies a locally available ephemeris file once automatic download failed. */
export interface ManualEphemerisProvider {
  provideEphemeris(failure: PipelineError): Promise<string | null>;
}

/** Chooses where artifacts are copied; `null` skips distribution. */
export interface DistributionTargetProvider {
  chooseTargetRoot(): Promise<string | null>;
}

export interface SimulationPipelinePort {
  run(request: SimulationRequest, toolPath: string): Promise<SimulationRunReport>;
}
