import path from 'path';
import chalk from 'chalk';
import { loadBuildCell, resolveSetup } from '../core/build-cell.js';
import { writeSetupPlan } from '../core/setup-writer.js';
import { CommandOptions, openProject, reportFailure } from './project.js';

export interface SetupCommandOptions extends CommandOptions {
  out?: string;
}

export const setupCommand = async (options: SetupCommandOptions = {}) => {
  try {
    const project = await openProject(options);
    if (!project) return;

    const cell = await loadBuildCell(project.manager, project.config);
    const plan = resolveSetup(cell, project.logger);

    const outDir = project.manager.resolve(options.out ?? path.join(project.config.paths.output_dir, 'setup'));
    const written = await writeSetupPlan(plan, outDir, project.logger);

    const primaries = plan.directives.filter(d => d.kind === 'synthesized').length;
    const variants = plan.directives.filter(d => d.kind === 'variant').length;
    console.log(chalk.green(`[distkit] Wrote ${written.length} file(s) to ${outDir}`));
    console.log(chalk.dim(`  ${primaries} synthesized, ${variants} variant(s), ${plan.disabled.length} disabled`));
  } catch (err) {
    reportFailure('Setup synthesis', err);
  }
};
