import * as path from 'node:path';
import { copyFile, mkdir, stat } from 'node:fs/promises';
import { DistributionError } from '@gps-sim-prep/domain';

/** Folder on the storage root the transmitter firmware lists captures from. */
export const DISTRIBUTION_FOLDER = 'gps';

export interface DistributionResult {
  destinationDir: string;
  files: string[];
}

function errorDetail(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Copies the capture and its sidecar into `<targetRoot>/gps/`, creating the
 * folder when absent and overwriting same-named files. Whether `targetRoot`
 * is removable storage is the caller's concern.
 */
export async function distributeArtifacts(
  capturePath: string,
  configPath: string,
  targetRoot: string,
): Promise<DistributionResult> {
  try {
    const root = await stat(targetRoot);
    if (!root.isDirectory()) throw new DistributionError(targetRoot, 'not a directory');
  } catch (err) {
    if (err instanceof DistributionError) throw err;
    throw new DistributionError(targetRoot, `not accessible (${errorDetail(err)})`, { cause: err });
  }

  const destinationDir = path.join(targetRoot, DISTRIBUTION_FOLDER);
  const files: string[] = [];
  try {
    await mkdir(destinationDir, { recursive: true });
    for (const source of [capturePath, configPath]) {
      const target = path.join(destinationDir, path.basename(source));
      console.log(`[distributor] copying ${path.basename(source)} to ${destinationDir}`);
      await copyFile(source, target);
      files.push(target);
    }
  } catch (err) {
    throw new DistributionError(targetRoot, errorDetail(err), { cause: err });
  }

  return { destinationDir, files };
}
