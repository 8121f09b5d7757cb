import path from 'path';
import chalk from 'chalk';
import { packageDistribution } from '../core/archive-packager.js';
import { atomicWrite } from '../core/atomic-fs.js';
import { loadBuildCell, resolveManifest, resolveSetup } from '../core/build-cell.js';
import { cellName } from '../core/config.js';
import { CommandOptions, openProject, reportFailure } from './project.js';

export interface PackageCommandOptions extends CommandOptions {
  out?: string;
}

export const packageCommand = async (options: PackageCommandOptions = {}) => {
  try {
    const project = await openProject(options);
    if (!project) return;

    const { manager, config, logger } = project;
    const cell = await loadBuildCell(manager, config);
    const plan = resolveSetup(cell, logger);
    const manifest = await resolveManifest(manager, cell, plan, logger);

    const archive = await packageDistribution(manager.resolve(config.paths.artifacts), manifest, {
      prefix: config.archive.prefix,
      metadataMember: config.archive.metadata_member,
      mtime: config.archive.mtime,
      owner: config.archive.owner,
    });

    const outPath = manager.resolve(options.out ?? path.join(config.paths.output_dir, `${cellName(config)}.tar`));
    await atomicWrite(outPath, archive);

    console.log(chalk.green(`[distkit] Archive written to ${outPath} (${archive.length} bytes)`));
  } catch (err) {
    reportFailure('Packaging', err);
  }
};
