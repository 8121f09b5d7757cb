import {
  ArtifactTree,
  BuildVariables,
  Catalog,
  DistributionManifest,
  DistributionManifestSchema,
  ExtensionBuildRecord,
  LinkEntry,
  MANIFEST_SCHEMA_VERSION,
  NativeExtensionIndex,
  PackageRegistry,
  SetupDirective,
  SetupPlan,
} from '../types/index.js';
import { atomicWrite } from './atomic-fs.js';
import { objectFilesUnder, staticArchives } from './artifact-scanner.js';
import { formatZodIssues } from './catalog-loader.js';
import { MissingLicenseError, SchemaViolation, UnattributedLinkError } from './errors.js';
import { attributeLicenses, isLocalLink } from './license-registry.js';
import type { Logger } from './logger.js';
import { objectPathForSource } from './setup-grammar.js';
import {
  BuildOptions,
  TargetContext,
  formatBuildOptions,
  isAppleTarget,
  isFullyStaticTarget,
  isMuslTarget,
  matchesAnyTarget,
} from './target-predicates.js';

/** Extensions the runtime cannot start without. */
export const REQUIRED_EXTENSIONS = [
  '_codecs',
  '_io',
  '_signal',
  '_thread',
  '_tracemalloc',
  '_weakref',
  'faulthandler',
  'posix',
];

export const CORE_OBJECT_DIRS = ['Objects', 'Parser', 'Python'];
export const EXTENSION_OBJECT_DIRS = ['Modules'];

const CORE_SYSTEM_LIBRARIES = {
  apple: ['dl', 'm', 'pthread', 'util'],
  musl: ['c', 'dl', 'm', 'pthread', 'rt', 'util'],
  gnu: ['crypt', 'dl', 'm', 'pthread', 'rt', 'util'],
};

export function coreLinkAllowList(triple: string): readonly string[] {
  if (isAppleTarget(triple)) return CORE_SYSTEM_LIBRARIES.apple;
  if (isMuslTarget(triple)) return CORE_SYSTEM_LIBRARIES.musl;
  return CORE_SYSTEM_LIBRARIES.gnu;
}

// ─── Object claiming ───

export interface ClaimRequest {
  key: string;
  objects: readonly string[];
}

export interface ClaimResult {
  claimed: ReadonlyMap<string, readonly string[]>;
  unclaimed: readonly string[];
}

/**
 * Attribute candidate objects to requests in order. An object goes to the
 * first request naming it; objects nobody names are returned as unclaimed.
 */
export function claimObjects(candidates: readonly string[], requests: readonly ClaimRequest[]): ClaimResult {
  const pool = new Set(candidates);
  const taken = new Set<string>();
  const claimed = new Map<string, string[]>();

  for (const request of requests) {
    const objects = [...new Set(request.objects)]
      .filter(obj => pool.has(obj) && !taken.has(obj))
      .sort();
    for (const obj of objects) taken.add(obj);
    claimed.set(request.key, objects);
  }

  return {
    claimed,
    unclaimed: candidates.filter(obj => !taken.has(obj)).sort(),
  };
}

function directiveObjects(directive: SetupDirective, pythonVersion: string): string[] {
  if (directive.kind === 'config-c') return [];
  if (directive.variantObjects) {
    return directive.variantObjects.map(obj => `build/${obj}`);
  }
  return directive.parsed.sources.map(source => `build/${objectPathForSource(source, pythonVersion)}`);
}

function directiveKey(directive: SetupDirective): string {
  return `${directive.extension}\0${directive.variant}`;
}

// ─── Links ───

function bareLibraryName(lib: string): string {
  const m = /^(?:.*\/)?lib([^/]+)\.a$/.exec(lib);
  return m ? m[1] : lib;
}

export function extensionLinks(
  links: readonly string[],
  frameworks: readonly string[],
  archives: ReadonlyMap<string, string>,
): LinkEntry[] {
  const entries: LinkEntry[] = [];
  for (const name of [...new Set(links.map(bareLibraryName))].sort()) {
    const archive = archives.get(name);
    entries.push(archive ? { name, path_static: archive } : { name, system: true });
  }
  for (const name of [...new Set(frameworks)].sort()) {
    entries.push({ name, framework: true });
  }
  return entries;
}

/**
 * Links of the core binary, from the link flags it was built with. Every
 * library must be a local archive or on the platform allow-list.
 */
export function coreLinks(
  variables: BuildVariables,
  triple: string,
  archives: ReadonlyMap<string, string>,
): LinkEntry[] {
  const flags = `${variables.LIBS} ${variables.SYSLIBS}`.trim();
  const words = flags ? flags.split(/\s+/) : [];
  const libs: string[] = [];
  const frameworks: string[] = [];

  for (let i = 0; i < words.length; i++) {
    const word = words[i];
    if (word === '-framework' && i + 1 < words.length) {
      frameworks.push(words[++i]);
    } else if (word.startsWith('-l')) {
      libs.push(word.slice(2));
    }
  }

  const allowed = coreLinkAllowList(triple);
  const unexpected = [...new Set(libs)]
    .filter(lib => !archives.has(lib) && !allowed.includes(lib))
    .sort();
  if (unexpected.length > 0) {
    throw new UnattributedLinkError(unexpected, flags);
  }

  return extensionLinks(libs, frameworks, archives);
}

// ─── Manifest ───

export interface ManifestInputs extends TargetContext {
  tree: ArtifactTree;
  plan: SetupPlan;
  catalog: Catalog;
  native?: NativeExtensionIndex;
  buildVariables: BuildVariables;
  registry: PackageRegistry;
  buildOptions: BuildOptions;
  /** Packages skipped during license attribution, e.g. `libressl`. */
  ignorePackages?: readonly string[];
  licenses: readonly string[];
  licensePath: string;
  /** Recorded in `object_file_format` for lto builds. */
  llvmVersion?: string;
}

export function pythonTag(pythonVersion: string): string {
  const m = /^(\d+)\.(\d+)/.exec(pythonVersion);
  if (!m) throw new SchemaViolation(`invalid version '${pythonVersion}': expected major.minor`);
  return `cp${m[1]}${m[2]}`;
}

export interface InstallPaths {
  python_exe: string;
  python_include: string;
  python_stdlib: string;
}

function underInstall(dir: string | undefined, prefix: string | undefined): string | null {
  if (dir === undefined || prefix === undefined) return null;
  const root = prefix.replace(/\/+$/, '');
  if (dir === root) return 'install';
  return dir.startsWith(`${root}/`) ? `install/${dir.slice(root.length + 1)}` : null;
}

/**
 * Interpreter, header and stdlib locations inside the distribution, taken
 * from the install directories the runtime reports. Directories outside the
 * prefix fall back to the standard layout.
 */
export function installPaths(vars: BuildVariables, pythonVersion: string): InstallPaths {
  const m = /^(\d+)\.(\d+)/.exec(pythonVersion);
  if (!m) throw new SchemaViolation(`invalid version '${pythonVersion}': expected major.minor`);
  const ver = `${m[1]}.${m[2]}`;
  const bin = underInstall(vars.BINDIR, vars.prefix) ?? 'install/bin';

  return {
    python_exe: `${bin}/python${ver}${vars.abiflags}`,
    python_include: underInstall(vars.INCLUDEPY, vars.prefix) ?? `install/include/python${ver}${vars.abiflags}`,
    python_stdlib: underInstall(vars.LIBDEST, vars.prefix) ?? `install/lib/python${ver}`,
  };
}

export function objectFileFormat(triple: string, options: BuildOptions, llvmVersion?: string): string {
  if (options.has('lto')) {
    return llvmVersion ? `llvm-bitcode:${llvmVersion}` : 'llvm-bitcode';
  }
  return isAppleTarget(triple) ? 'mach-o' : 'elf';
}

export function crtFeatures(triple: string): string[] {
  if (isAppleTarget(triple)) return ['libSystem'];
  if (isMuslTarget(triple)) return ['static'];
  return ['glibc-dynamic'];
}

export function buildManifest(inputs: ManifestInputs, logger: Logger): DistributionManifest {
  const { tree, plan, catalog, triple, pythonVersion, buildOptions } = inputs;
  const present = new Set(tree);
  const archives = staticArchives(tree);

  const coreObjs = objectFilesUnder(tree, CORE_OBJECT_DIRS);
  const candidates = objectFilesUnder(tree, EXTENSION_OBJECT_DIRS);

  const { claimed, unclaimed } = claimObjects(
    candidates,
    plan.directives.map(d => ({ key: directiveKey(d), objects: directiveObjects(d, pythonVersion) })),
  );

  const extensions: Record<string, ExtensionBuildRecord[]> = {};

  for (const directive of plan.directives) {
    const { extension, variant } = directive;
    const spec = catalog[extension];
    const required = REQUIRED_EXTENSIONS.includes(extension)
      || (spec !== undefined && matchesAnyTarget(triple, spec['required-targets'] ?? []));

    let record: ExtensionBuildRecord;
    if (directive.kind === 'config-c') {
      logger.debug(`adding in-core extension ${extension}`);
      record = {
        in_core: true,
        init_fn: inputs.native?.initTable.get(extension) ?? `PyInit_${extension}`,
        links: [],
        objs: [],
        required,
        variant,
      };
    } else {
      const objs = [...(claimed.get(directiveKey(directive)) ?? [])];
      for (const obj of objs) logger.debug(`adding object file ${obj} for extension ${extension}`);
      const links = extensionLinks(directive.parsed.links, directive.parsed.frameworks, archives);

      record = {
        in_core: false,
        init_fn: `PyInit_${extension}`,
        links,
        objs,
        required,
        variant,
        ...attributeLicenses(extension, links, inputs.registry, inputs.ignorePackages),
      };

      const sharedLib = directive.variantSharedLib && `build/${directive.variantSharedLib}`;
      if (sharedLib && present.has(sharedLib)) {
        record.shared_lib = sharedLib;
      }
    }

    (extensions[extension] ??= []).push(record);
  }

  for (const obj of unclaimed) logger.debug(`adding core object file ${obj}`);

  const core: DistributionManifest['build_info']['core'] = {
    objs: [...coreObjs, ...unclaimed],
    links: coreLinks(inputs.buildVariables, triple, archives),
  };
  const { LIBRARY, LDLIBRARY } = inputs.buildVariables;
  if (LIBRARY && present.has(`install/lib/${LIBRARY}`)) {
    core.static_lib = `install/lib/${LIBRARY}`;
  }
  if (LDLIBRARY && LDLIBRARY !== LIBRARY && present.has(`install/lib/${LDLIBRARY}`)) {
    core.shared_lib = `install/lib/${LDLIBRARY}`;
  }

  const loading = ['builtin'];
  if (!isFullyStaticTarget(triple, buildOptions)) loading.push('shared-library');

  logger.info(`manifest lists ${Object.keys(extensions).length} extensions and ${core.objs.length} core objects`);

  return {
    version: MANIFEST_SCHEMA_VERSION,
    target_triple: triple,
    build_options: formatBuildOptions(buildOptions),
    python_version: pythonVersion,
    python_tag: pythonTag(pythonVersion),
    python_flavor: 'cpython',
    ...installPaths(inputs.buildVariables, pythonVersion),
    object_file_format: objectFileFormat(triple, buildOptions, inputs.llvmVersion),
    python_extension_module_loading: loading,
    build_info: { core, extensions },
    crt_features: crtFeatures(triple),
    licenses: [...inputs.licenses],
    license_path: inputs.licensePath,
  };
}

/**
 * Re-check a finished manifest: structure, catalog coverage of every
 * extension, and license annotations on local links.
 */
export function validateManifest(manifest: unknown, catalog?: Catalog): DistributionManifest {
  const result = DistributionManifestSchema.safeParse(manifest);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new SchemaViolation(`distribution manifest failed validation (${issues.length} issue(s))`, issues);
  }
  const parsed = result.data;
  const extensions = parsed.build_info.extensions;

  if (catalog) {
    const missing = Object.keys(extensions).filter(name => !(name in catalog)).sort();
    if (missing.length > 0) {
      throw new SchemaViolation(`extension modules in manifest lack metadata: ${missing.join(', ')}`, missing);
    }
  }

  for (const name of Object.keys(extensions).sort()) {
    for (const record of extensions[name]) {
      const local = record.links.filter(isLocalLink);
      if (local.length > 0 && !record.licenses?.length && !record.license_public_domain) {
        throw new MissingLicenseError(name, local.map(l => l.name));
      }
    }
  }

  return parsed;
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, child] of entries) out[key] = sortKeys(child);
    return out;
  }
  return value;
}

/** Canonical JSON: keys sorted, 4-space indent, trailing newline. */
export function serializeManifest(manifest: DistributionManifest): string {
  return `${JSON.stringify(sortKeys(manifest), null, 4)}\n`;
}

export async function writeManifest(manifest: DistributionManifest, filePath: string): Promise<void> {
  await atomicWrite(filePath, serializeManifest(manifest));
}
