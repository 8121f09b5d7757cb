import chalk from 'chalk';
import { loadBuildCell } from '../core/build-cell.js';
import { validateConsistency } from '../core/consistency-validator.js';
import { CommandOptions, openProject, reportFailure } from './project.js';

export const validateCommand = async (options: CommandOptions = {}) => {
  try {
    const project = await openProject(options);
    if (!project) return;

    const cell = await loadBuildCell(project.manager, project.config);
    validateConsistency(cell.catalog, cell.native, cell.target, project.logger.child('validate'));

    console.log(chalk.green(`[distkit] Catalog consistent with native configuration (${Object.keys(cell.catalog).length} modules).`));
  } catch (err) {
    reportFailure('Validation', err);
  }
};
