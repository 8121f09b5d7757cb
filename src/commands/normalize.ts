import fs from 'fs/promises';
import path from 'path';
import chalk from 'chalk';
import { normalizeArchive } from '../core/archive-packager.js';
import { atomicWrite } from '../core/atomic-fs.js';
import { ConfigManager } from '../core/config.js';
import { reportFailure } from './project.js';
import type { NormalizeOptions } from '../types/index.js';

/**
 * Canonicalize an existing tar file. Works outside an initialized project;
 * archive settings come from the config when one exists.
 */
export const normalizeCommand = async (input: string, output: string) => {
  try {
    const manager = new ConfigManager(process.cwd());
    let options: NormalizeOptions = {};
    if (await manager.exists()) {
      const { archive } = await manager.load();
      options = { metadataMember: archive.metadata_member, mtime: archive.mtime, owner: archive.owner };
    }

    const data = await fs.readFile(path.resolve(input));
    const normalized = await normalizeArchive(data, options);
    await atomicWrite(path.resolve(output), normalized);

    console.log(chalk.green(`[distkit] Normalized ${input} -> ${output}`));
  } catch (err) {
    reportFailure('Normalization', err);
  }
};
