import fs from 'fs/promises';
import chalk from 'chalk';
import { loadBuildVariables } from '../core/artifact-scanner.js';
import { moduleBuildType } from '../core/build-cell.js';
import { loadCatalogFile } from '../core/catalog-loader.js';
import { ConfigManager, targetOf } from '../core/config.js';
import { diffCatalog } from '../core/consistency-validator.js';
import { errorMessage } from '../core/errors.js';
import { loadPackageRegistryFile } from '../core/license-registry.js';
import { loadNativeIndex } from '../core/native-config.js';
import type { Catalog, DistkitConfig, NativeExtensionIndex } from '../types/index.js';

type Status = 'ok' | 'warn' | 'fail';

function log(status: Status, msg: string): void {
  const icons: Record<Status, string> = {
    ok:   chalk.green('  ✓'),
    warn: chalk.yellow('  ~'),
    fail: chalk.red('  ✗'),
  };
  console.log(`${icons[status]} ${msg}`);
}

async function present(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export const doctorCommand = async () => {
  const configManager = new ConfigManager(process.cwd());

  console.log(chalk.bold('\n  distkit doctor\n'));

  let issues = 0;
  let warnings = 0;

  // ─── 1. Config ───
  if (!(await configManager.exists())) {
    log('fail', '.distkit/config.yaml missing. Run: distkit init');
    process.exitCode = 1;
    return;
  }

  let config: DistkitConfig;
  try {
    config = await configManager.load();
    targetOf(config);
    log('ok', `config.yaml (${config.project.name}, ${config.target.triple}, ${config.target.build_options || 'no options'})`);
  } catch (err) {
    log('fail', `config.yaml invalid: ${errorMessage(err)}`);
    process.exitCode = 1;
    return;
  }
  const { paths } = config;

  // ─── 2. Catalog ───
  let catalog: Catalog | undefined;
  try {
    catalog = await loadCatalogFile(configManager.resolve(paths.catalog));
    log('ok', `${paths.catalog} (${Object.keys(catalog).length} extension modules)`);
  } catch (err) {
    log('fail', `${paths.catalog}: ${errorMessage(err)}`);
    issues++;
  }

  // ─── 3. Native configuration ───
  let native: NativeExtensionIndex | undefined;
  try {
    native = await loadNativeIndex(
      paths.setup_files.map(p => configManager.resolve(p)),
      configManager.resolve(paths.init_table),
      { moduleBuildType: moduleBuildType(targetOf(config)) },
    );
    log('ok', `native configuration (${native.static.size} static, ${native.shared.size} shared, ${native.initTable.size} in core)`);
  } catch (err) {
    log('fail', `native configuration: ${errorMessage(err)}`);
    issues++;
  }

  if (catalog && native) {
    const report = diffCatalog(catalog, native, targetOf(config));
    const drift = report.missingFromCatalog.length + report.setupEnabledMismatch.length + report.configCOnlyMismatch.length;
    if (drift === 0) {
      log('ok', 'catalog consistent with native configuration');
    } else {
      log('fail', `${drift} drift issue(s). Run: distkit validate`);
      issues++;
    }
  }

  if (paths.static_modules) {
    if (await present(configManager.resolve(paths.static_modules))) {
      log('ok', paths.static_modules);
    } else {
      log('fail', `${paths.static_modules} missing`);
      issues++;
    }
  }

  // ─── 4. License registry ───
  try {
    const registry = await loadPackageRegistryFile(configManager.resolve(paths.registry));
    log('ok', `${paths.registry} (${Object.keys(registry).length} packages)`);
  } catch (err) {
    log('fail', `${paths.registry}: ${errorMessage(err)}`);
    issues++;
  }

  // ─── 5. Build outputs (only needed for manifest and package) ───
  if (await present(configManager.resolve(paths.artifacts))) {
    log('ok', `${paths.artifacts}/`);
  } else {
    log('warn', `${paths.artifacts}/ not built yet`);
    warnings++;
  }

  if (await present(configManager.resolve(paths.build_variables))) {
    try {
      await loadBuildVariables(configManager.resolve(paths.build_variables));
      log('ok', paths.build_variables);
    } catch (err) {
      log('fail', `${paths.build_variables}: ${errorMessage(err)}`);
      issues++;
    }
  } else {
    log('warn', `${paths.build_variables} not written yet`);
    warnings++;
  }

  console.log('');
  if (issues > 0) {
    console.log(chalk.red(`  ${issues} issue(s), ${warnings} warning(s)\n`));
    process.exitCode = 1;
  } else if (warnings > 0) {
    console.log(chalk.yellow(`  ${warnings} warning(s)\n`));
  } else {
    console.log(chalk.green('  All checks passed\n'));
  }
};
