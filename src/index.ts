#!/usr/bin/env node

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { configGetCommand, configSetCommand } from './commands/config-cmd.js';
import { validateCommand } from './commands/validate.js';
import { setupCommand } from './commands/setup.js';
import { manifestCommand } from './commands/manifest.js';
import { packageCommand } from './commands/package.js';
import { normalizeCommand } from './commands/normalize.js';
import { doctorCommand } from './commands/doctor.js';

const program = new Command();

program
  .name('distkit')
  .description('Resolve extension build configuration, generate build manifests and package reproducible runtime archives')
  .version('1.0.0');

// ─── Init & Configuration ───
program
  .command('init')
  .description('Initialize distkit in the current directory')
  .action(initCommand);

const configCmd = program
  .command('config')
  .description('View or update project configuration');

configCmd
  .command('get [key]')
  .description('Show configuration (or a specific key)')
  .action(configGetCommand);

configCmd
  .command('set <key> <value>')
  .description('Update a configuration value (e.g., target.build_options debug)')
  .action(configSetCommand);

// ─── Build Cell ───
program
  .command('validate')
  .description('Check the extension catalog against the native Setup files and init table')
  .option('-v, --verbose', 'Print debug output')
  .action(validateCommand);

program
  .command('setup')
  .description('Write Setup.local, Makefile.extra and variant sidecars for the configured target')
  .option('-o, --out <dir>', 'Output directory')
  .option('-v, --verbose', 'Print debug output')
  .action(setupCommand);

program
  .command('manifest')
  .description('Scan the built tree and write the distribution manifest')
  .option('-o, --out <file>', 'Manifest path')
  .option('-v, --verbose', 'Print debug output')
  .action(manifestCommand);

program
  .command('package')
  .description('Write the canonical distribution archive')
  .option('-o, --out <file>', 'Archive path')
  .option('-v, --verbose', 'Print debug output')
  .action(packageCommand);

program
  .command('normalize <input> <output>')
  .description('Canonicalize an existing tar archive')
  .action(normalizeCommand);

// ─── Diagnostics ───
program
  .command('doctor')
  .description('Check configuration and inputs')
  .action(doctorCommand);

program.parse(process.argv);

if (!process.argv.slice(2).length) {
  program.outputHelp();
}
