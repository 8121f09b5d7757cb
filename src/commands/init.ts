import inquirer from 'inquirer';
import chalk from 'chalk';
import path from 'path';
import { ConfigManager } from '../core/config.js';
import { errorMessage } from '../core/errors.js';
import { parseBuildOptions } from '../core/target-predicates.js';

const TRIPLES = [
  'x86_64-unknown-linux-gnu',
  'x86_64-unknown-linux-musl',
  'aarch64-unknown-linux-gnu',
  'x86_64-apple-darwin',
  'aarch64-apple-darwin',
];

export const initCommand = async () => {
  const baseDir = process.cwd();
  const configManager = new ConfigManager(baseDir);

  if (await configManager.exists()) {
    const { overwrite } = await inquirer.prompt([{
      type: 'confirm',
      name: 'overwrite',
      message: '.distkit/ already exists. Reinitialize?',
      default: false,
    }]);
    if (!overwrite) {
      console.log(chalk.dim('  Aborted.'));
      return;
    }
  }

  const answers = await inquirer.prompt([
    {
      type: 'select',
      name: 'triple',
      message: 'Target triple:',
      choices: TRIPLES,
      default: TRIPLES[0],
    },
    {
      type: 'input',
      name: 'python_version',
      message: 'Runtime version:',
      default: '3.13.1',
    },
    {
      type: 'input',
      name: 'build_options',
      message: 'Build options (e.g. pgo+lto, debug):',
      default: 'pgo+lto',
      validate: (value: string) => {
        try {
          parseBuildOptions(value);
          return true;
        } catch (err) {
          return errorMessage(err);
        }
      },
    },
    {
      type: 'input',
      name: 'catalog',
      message: 'Extension catalog path:',
      default: 'catalog/extension-modules.yml',
    },
  ]);

  try {
    const config = await configManager.init({
      project: { name: path.basename(baseDir) },
      target: {
        triple: answers.triple,
        python_version: answers.python_version,
        build_options: answers.build_options,
      },
      paths: { catalog: answers.catalog },
    });

    const w = chalk.white.bold;
    console.log('');
    console.log(`  ${chalk.green.bold('distkit initialized')}`);
    console.log('');
    console.log(`  ${w('Project')}    ${config.project.name}`);
    console.log(`  ${w('Target')}     ${config.target.triple}`);
    console.log(`  ${w('Runtime')}    ${config.target.python_version}`);
    console.log(`  ${w('Options')}    ${config.target.build_options}`);
    console.log('');
    console.log(`  ${chalk.dim('Run')} ${chalk.cyan('distkit doctor')} ${chalk.dim('to check the configured inputs.')}`);
    console.log('');
  } catch (err) {
    console.error(chalk.red(`\n  Error: ${errorMessage(err)}`));
    process.exitCode = 1;
  }
};
