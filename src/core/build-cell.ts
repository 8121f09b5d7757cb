import fs from 'fs/promises';
import {
  BuildVariables,
  Catalog,
  DistkitConfig,
  DistributionManifest,
  NativeExtensionIndex,
  SetupPlan,
} from '../types/index.js';
import { loadBuildVariables, scanArtifactTree } from './artifact-scanner.js';
import { loadCatalogFile } from './catalog-loader.js';
import { ConfigManager, targetOf } from './config.js';
import { validateConsistency } from './consistency-validator.js';
import { loadPackageRegistryFile } from './license-registry.js';
import type { Logger } from './logger.js';
import { buildManifest, validateManifest } from './manifest-builder.js';
import { loadNativeIndex } from './native-config.js';
import { synthesizeSetup } from './setup-synthesizer.js';
import { BuildOptions, TargetContext, isFullyStaticTarget } from './target-predicates.js';

/**
 * Everything one (triple × build options) cell reads before synthesis. Cells
 * share nothing, so each command loads its own.
 */
export interface BuildCell {
  config: DistkitConfig;
  target: TargetContext & { buildOptions: BuildOptions };
  catalog: Catalog;
  native: NativeExtensionIndex;
  extraLines: string[];
  /** Present once the runtime has been built and its variables dumped. */
  buildVariables?: BuildVariables;
}

async function fileExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

export async function loadBuildCell(manager: ConfigManager, config: DistkitConfig): Promise<BuildCell> {
  const { paths } = config;
  const target = targetOf(config);
  const catalog = await loadCatalogFile(manager.resolve(paths.catalog));
  const native = await loadNativeIndex(
    paths.setup_files.map(p => manager.resolve(p)),
    manager.resolve(paths.init_table),
    { moduleBuildType: moduleBuildType(target) },
  );
  const extraLines = paths.static_modules
    ? (await fs.readFile(manager.resolve(paths.static_modules), 'utf8')).split(/\r?\n/)
    : [];

  const variablesFile = manager.resolve(paths.build_variables);
  const buildVariables = (await fileExists(variablesFile)) ? await loadBuildVariables(variablesFile) : undefined;

  return { config, target, catalog, native, extraLines, buildVariables };
}

/** Fully static targets build every native module into the core. */
export function moduleBuildType(target: BuildCell['target']): 'static' | 'shared' {
  return isFullyStaticTarget(target.triple, target.buildOptions) ? 'static' : 'shared';
}

/** Validate the catalog against the native files, then synthesize. */
export function resolveSetup(cell: BuildCell, logger: Logger): SetupPlan {
  validateConsistency(cell.catalog, cell.native, cell.target, logger.child('validate'));
  return synthesizeSetup(
    cell.catalog,
    {
      ...cell.target,
      native: cell.native,
      extraLines: cell.extraLines,
      toolsDepsPath: cell.config.paths.tools_deps,
      extSuffix: cell.config.target.ext_suffix ?? cell.buildVariables?.EXT_SUFFIX,
    },
    logger.child('setup'),
  );
}

/** Scan the built tree and produce a validated manifest for the cell. */
export async function resolveManifest(
  manager: ConfigManager,
  cell: BuildCell,
  plan: SetupPlan,
  logger: Logger,
): Promise<DistributionManifest> {
  const { paths, licenses } = cell.config;
  const tree = await scanArtifactTree(manager.resolve(paths.artifacts));
  const buildVariables = cell.buildVariables ?? await loadBuildVariables(manager.resolve(paths.build_variables));
  const registry = await loadPackageRegistryFile(manager.resolve(paths.registry));

  const manifest = buildManifest(
    {
      ...cell.target,
      tree,
      plan,
      catalog: cell.catalog,
      native: cell.native,
      buildVariables,
      registry,
      ignorePackages: licenses.ignore_packages,
      licenses: licenses.runtime,
      licensePath: licenses.license_path,
      llvmVersion: cell.config.target.llvm_version,
    },
    logger.child('manifest'),
  );
  return validateManifest(manifest, cell.catalog);
}
