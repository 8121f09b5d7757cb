import chalk from 'chalk';
import { ConfigManager, cellName } from '../core/config.js';
import { DistkitError, errorMessage } from '../core/errors.js';
import { Logger, createLogger } from '../core/logger.js';
import type { DistkitConfig } from '../types/index.js';

export interface CommandOptions {
  verbose?: boolean;
}

export interface Project {
  manager: ConfigManager;
  config: DistkitConfig;
  logger: Logger;
}

/** Load `.distkit/config.yaml` from the working directory, or report why not. */
export async function openProject(options: CommandOptions = {}): Promise<Project | null> {
  const manager = new ConfigManager(process.cwd());

  if (!(await manager.exists())) {
    console.error(chalk.red('[distkit] Not initialized. Run `distkit init` first.'));
    process.exitCode = 1;
    return null;
  }

  const config = await manager.load();
  const logger = createLogger({ prefix: cellName(config), verbose: options.verbose });
  return { manager, config, logger };
}

export function reportFailure(action: string, err: unknown): void {
  console.error(chalk.red(`[distkit] ${action} failed: ${errorMessage(err)}`));
  if (err instanceof DistkitError) {
    for (const detail of err.details) {
      console.error(chalk.red(`  - ${detail}`));
    }
  }
  process.exitCode = 1;
}
