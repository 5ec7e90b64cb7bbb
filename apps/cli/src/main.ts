import 'dotenv/config';
import { loadConfig } from './config/env.js';
import { buildPipeline } from './composition.js';
import { describeFailure } from './errors/error-reporter.js';
import { ConsolePrompter, openReadlineSession } from './input/console-prompter.js';
import { renderSummary } from './summary.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const session = openReadlineSession();
  const prompter = new ConsolePrompter(session.ask, { minEphemerisBytes: config.minEphemerisBytes });

  try {
    console.log('[cli] step 1: locating gps-sdr-sim');
    const toolPath = await prompter.resolveToolPath(config.toolPath);

    console.log('[cli] step 2: simulation location and start time');
    const request = await prompter.askSimulationRequest();

    console.log('[cli] step 3: ephemeris, signal generation and SD card copy');
    const report = await buildPipeline(config, prompter).run(request, toolPath);

    for (const line of renderSummary(report, request, config.outputDir)) console.log(line);
  } finally {
    session.close();
  }
}

main().catch((err) => {
  const [headline = 'unexpected error', ...details] = describeFailure(err);
  console.error(`[cli] fatal: ${headline}`);
  for (const line of details) console.error(`[cli] ${line}`);
  process.exit(1);
});
