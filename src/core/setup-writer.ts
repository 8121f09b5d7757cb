import path from 'path';
import { SetupPlan } from '../types/index.js';
import { atomicWrite } from './atomic-fs.js';
import type { Logger } from './logger.js';

export const SETUP_LOCAL_FILENAME = 'Setup.local';
export const MAKEFILE_EXTRA_FILENAME = 'Makefile.extra';

/**
 * Publish the synthesized Setup.local, the Makefile supplement and every
 * variant sidecar into `outDir`. Returns the written paths.
 */
export async function writeSetupPlan(plan: SetupPlan, outDir: string, logger: Logger): Promise<string[]> {
  const files: [string, string][] = [
    [SETUP_LOCAL_FILENAME, plan.setupLocal],
    [MAKEFILE_EXTRA_FILENAME, plan.makeData],
    ...[...plan.sidecars.entries()].sort(([a], [b]) => a.localeCompare(b)),
  ];

  const written: string[] = [];
  for (const [name, content] of files) {
    const filePath = path.join(outDir, name);
    await atomicWrite(filePath, content);
    logger.debug(`wrote ${filePath}`);
    written.push(filePath);
  }
  return written;
}
