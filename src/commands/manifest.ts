import path from 'path';
import chalk from 'chalk';
import { loadBuildCell, resolveManifest, resolveSetup } from '../core/build-cell.js';
import { writeManifest } from '../core/manifest-builder.js';
import { CommandOptions, openProject, reportFailure } from './project.js';

export interface ManifestCommandOptions extends CommandOptions {
  out?: string;
}

export const manifestCommand = async (options: ManifestCommandOptions = {}) => {
  try {
    const project = await openProject(options);
    if (!project) return;

    const cell = await loadBuildCell(project.manager, project.config);
    const plan = resolveSetup(cell, project.logger);
    const manifest = await resolveManifest(project.manager, cell, plan, project.logger);

    const outPath = project.manager.resolve(options.out ?? path.join(project.config.paths.output_dir, 'PYTHON.json'));
    await writeManifest(manifest, outPath);

    console.log(chalk.green(`[distkit] Manifest written to ${outPath}`));
  } catch (err) {
    reportFailure('Manifest generation', err);
  }
};
