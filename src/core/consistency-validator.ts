import { Catalog, NativeExtensionIndex } from '../types/index.js';
import { DriftError } from './errors.js';
import type { Logger } from './logger.js';
import { isSetupEnabled } from './catalog-loader.js';
import { nativeDeclaredModules, nativeEnabledModules } from './native-config.js';
import type { TargetContext } from './target-predicates.js';

export interface DriftReport {
  missingFromCatalog: string[];
  setupEnabledMismatch: { name: string; catalog: boolean; native: boolean }[];
  configCOnlyMismatch: { name: string; catalog: boolean; native: boolean }[];
}

/** Compute the three set differences between the catalog and the native files. */
export function diffCatalog(catalog: Catalog, native: NativeExtensionIndex, ctx: TargetContext): DriftReport {
  const enabled = nativeEnabledModules(native);

  const missingFromCatalog = [...nativeDeclaredModules(native)]
    .filter(name => !(name in catalog))
    .sort();

  const setupEnabledMismatch: DriftReport['setupEnabledMismatch'] = [];
  const configCOnlyMismatch: DriftReport['configCOnlyMismatch'] = [];

  for (const name of Object.keys(catalog).sort()) {
    const spec = catalog[name];

    const wantEnabled = isSetupEnabled(spec, ctx);
    const haveEnabled = enabled.has(name);
    if (wantEnabled !== haveEnabled) {
      setupEnabledMismatch.push({ name, catalog: wantEnabled, native: haveEnabled });
    }

    const wantConfigC = spec['config-c-only'];
    const haveConfigC = native.initTable.has(name);
    if (wantConfigC !== haveConfigC) {
      configCOnlyMismatch.push({ name, catalog: wantConfigC, native: haveConfigC });
    }
  }

  return { missingFromCatalog, setupEnabledMismatch, configCOnlyMismatch };
}

/**
 * Abort with a DriftError naming every offending module when the catalog and
 * the runtime's native configuration disagree.
 */
export function validateConsistency(
  catalog: Catalog,
  native: NativeExtensionIndex,
  ctx: TargetContext,
  logger: Logger,
): void {
  const report = diffCatalog(catalog, native, ctx);
  const details: string[] = [];

  for (const name of report.missingFromCatalog) {
    details.push(`${name}: declared by the native Setup files or init table but missing from the catalog`);
  }
  for (const m of report.setupEnabledMismatch) {
    details.push(m.catalog
      ? `${m.name}: marked setup-enabled but not enabled by the native Setup files`
      : `${m.name}: enabled by the native Setup files but not marked setup-enabled`);
  }
  for (const m of report.configCOnlyMismatch) {
    details.push(m.catalog
      ? `${m.name}: marked config-c-only but absent from the init table`
      : `${m.name}: present in the init table but not marked config-c-only`);
  }

  if (details.length > 0) {
    for (const line of details) logger.error(line);
    const modules = [...new Set([
      ...report.missingFromCatalog,
      ...report.setupEnabledMismatch.map(m => m.name),
      ...report.configCOnlyMismatch.map(m => m.name),
    ])].sort();
    throw new DriftError(modules, details);
  }

  logger.info(`extension metadata consistent with native configuration (${Object.keys(catalog).length} modules)`);
}
