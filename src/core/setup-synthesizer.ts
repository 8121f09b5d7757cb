import {
  Catalog,
  DEFAULT_VARIANT,
  ExtensionModuleSpec,
  NativeExtensionIndex,
  ParsedDirective,
  SetupDirective,
  SetupPlan,
} from '../types/index.js';
import { MalformedDirectiveError } from './errors.js';
import type { Logger } from './logger.js';
import { isSetupEnabled } from './catalog-loader.js';
import { nativeDirective } from './native-config.js';
import {
  objectPathForSource,
  parseDirective,
  stripComment,
  tokenizeDirective,
  variantObjectPath,
  variantSidecarName,
} from './setup-grammar.js';
import {
  BuildOptions,
  TargetContext,
  conditionApplies,
  isAppleTarget,
  isFullyStaticTarget,
  matchesAnyTarget,
  meetsMaximum,
  meetsMinimum,
} from './target-predicates.js';

/** Test extensions that cannot be linked statically into debug builds. */
export const DEBUG_DISABLED_EXTENSIONS = [
  '_testbuffer',
  '_testcapi',
  '_testimportmultiple',
  '_testinternalcapi',
  '_testmultiphase',
  '_xxtestfuzz',
];

export const DEFAULT_TOOLS_DEPS_PATH = '/tools/deps';

export interface SynthesisOptions extends TargetContext {
  buildOptions: BuildOptions;
  /** Native Setup files; pass-through directives borrow their parsed lines. */
  native?: NativeExtensionIndex;
  /** Supplemental hand-written directive lines, appended after catalog lines. */
  extraLines?: readonly string[];
  toolsDepsPath?: string;
  /** Suffix of loadable extension modules, e.g. `.cpython-313-x86_64-linux-gnu.so`. */
  extSuffix?: string;
}

const DEFINE_WITH_VALUE = /^-D[^=]+=\S+$/;

function emptyDirective(extension: string): ParsedDirective {
  return {
    extension,
    variant: DEFAULT_VARIANT,
    sources: [],
    defines: [],
    includes: [],
    links: [],
    frameworks: [],
    linkerArgs: [],
  };
}

/** Sorted names of the extensions disabled for this build cell. */
export function computeDisabled(
  catalog: Catalog,
  options: SynthesisOptions,
  logger: Logger,
): string[] {
  const disabled = new Set<string>();

  for (const [name, spec] of Object.entries(catalog)) {
    const min = spec['minimum-python-version'];
    const max = spec['maximum-python-version'];
    if ((min && !meetsMinimum(options.pythonVersion, min)) || (max && !meetsMaximum(options.pythonVersion, max))) {
      logger.debug(`disabling extension module ${name} because Python ${options.pythonVersion} is out of range`);
      disabled.add(name);
      continue;
    }
    if (matchesAnyTarget(options.triple, spec['disabled-targets'] ?? [])) {
      logger.debug(`disabling extension module ${name} for target ${options.triple}`);
      disabled.add(name);
    }
  }

  if (options.buildOptions.has('debug')) {
    for (const name of DEBUG_DISABLED_EXTENSIONS) {
      if (name in catalog && !disabled.has(name)) {
        logger.debug(`disabling extension module ${name} for debug build`);
        disabled.add(name);
      }
    }
  }

  return [...disabled].sort();
}

/** Archive names become complete paths under the dependency tree's `lib/`. */
export function linkTokens(lib: string, triple: string, depsPath: string = DEFAULT_TOOLS_DEPS_PATH): string[] {
  // Apple linkers have no version scripts, so hidden linking keeps the
  // library's symbols from being re-exported.
  if (isAppleTarget(triple)) {
    return lib.endsWith('.a') ? ['-Xlinker', lib] : ['-Xlinker', `-hidden-l${lib}`];
  }
  if (!lib.endsWith('.a')) return [`-l${lib}`];
  return [lib.includes('/') ? lib : `${depsPath}/lib/${lib}`];
}

function resolveSources(spec: Readonly<ExtensionModuleSpec>, ctx: TargetContext): string[] {
  const sources = [...(spec.sources ?? [])];
  for (const entry of spec['sources-conditional'] ?? []) {
    if (conditionApplies(entry, ctx)) sources.push(entry.source);
  }
  return sources;
}

/** Build the directive text for one catalog entry. */
export function synthesizeLine(
  name: string,
  spec: Readonly<ExtensionModuleSpec>,
  options: SynthesisOptions,
): string | null {
  const sources = resolveSources(spec, options);
  if (sources.length === 0) return null;

  const apple = isAppleTarget(options.triple);
  const depsPath = options.toolsDepsPath ?? DEFAULT_TOOLS_DEPS_PATH;
  const words: string[] = [name, ...sources];

  for (const define of spec.defines ?? []) words.push(`-D${define}`);
  for (const entry of spec['defines-conditional'] ?? []) {
    if (conditionApplies(entry, options)) words.push(`-D${entry.define}`);
  }

  for (const include of spec.includes ?? []) words.push(`-I${include}`);
  for (const entry of spec['includes-conditional'] ?? []) {
    if (conditionApplies(entry, options)) words.push(`-I${entry.path}`);
  }
  // The global search path already covers dependency headers on Apple.
  if (!apple) {
    for (const include of spec['includes-deps'] ?? []) words.push(`-I${depsPath}/${include}`);
  }

  for (const lib of spec.links ?? []) words.push(...linkTokens(lib, options.triple, depsPath));
  for (const entry of spec['links-conditional'] ?? []) {
    if (conditionApplies(entry, options)) words.push(...linkTokens(entry.name, options.triple, depsPath));
  }

  if (apple) {
    for (const framework of spec.frameworks ?? []) words.push('-framework', framework);
  }

  for (const entry of spec['linker-args'] ?? []) {
    if (matchesAnyTarget(options.triple, entry.targets)) {
      for (const arg of entry.args) words.push('-Xlinker', arg);
    }
  }

  return words.join(' ');
}

/**
 * Primary directive of an entry with no sources for this target. Nothing is
 * written to Setup.local; the links, frameworks and defines it declares still
 * reach the manifest.
 */
function externalDirective(name: string, spec: Readonly<ExtensionModuleSpec>, ctx: TargetContext): SetupDirective {
  const parsed = emptyDirective(name);
  parsed.defines.push(...(spec.defines ?? []));
  for (const entry of spec['defines-conditional'] ?? []) {
    if (conditionApplies(entry, ctx)) parsed.defines.push(entry.define);
  }
  parsed.links.push(...(spec.links ?? []));
  for (const entry of spec['links-conditional'] ?? []) {
    if (conditionApplies(entry, ctx)) parsed.links.push(entry.name);
  }
  if (isAppleTarget(ctx.triple)) parsed.frameworks.push(...(spec.frameworks ?? []));

  return {
    extension: name,
    variant: DEFAULT_VARIANT,
    kind: 'external',
    text: null,
    section: spec['build-mode'] === 'shared' ? 'shared' : 'static',
    parsed,
  };
}

interface CandidateLine {
  text: string;
  section: 'static' | 'shared';
}

/**
 * Resolve the catalog for one build cell into Setup.local content, a Makefile
 * supplement, variant sidecars and the directive set the manifest builder
 * re-uses.
 */
export function synthesizeSetup(catalog: Catalog, options: SynthesisOptions, logger: Logger): SetupPlan {
  const disabled = computeDisabled(catalog, options, logger);
  const disabledSet = new Set(disabled);
  const fullyStatic = isFullyStaticTarget(options.triple, options.buildOptions);
  const extSuffix = options.extSuffix ?? '.so';
  const depsPath = options.toolsDepsPath ?? DEFAULT_TOOLS_DEPS_PATH;

  const directives: SetupDirective[] = [];
  const primaries = new Map<string, string>();
  const candidates: CandidateLine[] = [];

  for (const name of Object.keys(catalog).sort()) {
    if (disabledSet.has(name)) continue;
    const spec = catalog[name];

    if (spec['config-c-only']) {
      directives.push({
        extension: name,
        variant: DEFAULT_VARIANT,
        kind: 'config-c',
        text: null,
        section: 'static',
        parsed: emptyDirective(name),
      });
      primaries.set(name, DEFAULT_VARIANT);
      continue;
    }

    if (isSetupEnabled(spec, options)) {
      const native = options.native;
      directives.push({
        extension: name,
        variant: DEFAULT_VARIANT,
        kind: 'native',
        text: null,
        section: native?.shared.has(name) ? 'shared' : 'static',
        parsed: (native && nativeDirective(native, name)) ?? emptyDirective(name),
      });
      primaries.set(name, DEFAULT_VARIANT);
      continue;
    }

    const line = synthesizeLine(name, spec, options);
    if (line === null) {
      logger.info(`recording extension ${name} without sources for ${options.triple}`);
      directives.push(externalDirective(name, spec, options));
      primaries.set(name, DEFAULT_VARIANT);
      continue;
    }
    candidates.push({ text: line, section: spec['build-mode'] === 'shared' ? 'shared' : 'static' });
  }

  for (const raw of options.extraLines ?? []) {
    const text = stripComment(raw);
    if (!text) continue;
    const name = tokenizeDirective(text)[0];
    if (disabledSet.has(name)) {
      logger.debug(`skipping supplemental directive for disabled extension ${name}`);
      continue;
    }
    candidates.push({ text, section: 'static' });
  }

  const extraCflags = new Map<string, string[]>();
  const variantRules: string[] = [];
  const sidecars = new Map<string, string>();
  const sectionLines: Record<'static' | 'shared', string[]> = { static: [], shared: [] };

  for (const candidate of candidates) {
    const parsed = parseDirective(candidate.text, { strict: true });
    if (!parsed) continue;

    const { extension, variant } = parsed;
    const primaryVariant = primaries.get(extension);

    if (primaryVariant === variant) {
      throw new MalformedDirectiveError(`duplicate directive for extension ${extension} (variant ${variant})`, candidate.text);
    }

    if (primaryVariant !== undefined) {
      const rules = variantBuildRules(parsed, options.triple, fullyStatic, extSuffix, depsPath, extraCflags);
      variantRules.push(...rules.make);
      sidecars.set(variantSidecarName(extension, variant), candidate.text);
      if (rules.sharedLib === undefined) {
        // The sidecar is still written: consumers may see a variant whose
        // loadable module was never produced on this target.
        logger.warn(`variant ${variant} of ${extension} is not linked on fully static target ${options.triple}`);
      }
      logger.info(`adding variant ${variant} of extension ${extension}`);
      directives.push({
        extension,
        variant,
        kind: 'variant',
        text: null,
        section: 'shared',
        parsed,
        variantObjects: rules.objects,
        variantSharedLib: rules.sharedLib,
      });
      continue;
    }

    const words = tokenizeDirective(candidate.text).filter(w => !w.startsWith('VARIANT='));
    const kept: string[] = [];
    for (const word of words) {
      if (!DEFINE_WITH_VALUE.test(word)) {
        kept.push(word);
        continue;
      }
      // makesetup reads `=` as a variable assignment, so valued defines move
      // to per-object Makefile rules.
      for (const source of parsed.sources) {
        const obj = objectPathForSource(source, options.pythonVersion);
        const flags = extraCflags.get(obj) ?? [];
        flags.push(word);
        extraCflags.set(obj, flags);
      }
    }

    const text = kept.join(' ');
    if (text.includes('=')) {
      throw new MalformedDirectiveError('= appears in directive; will confuse makesetup', text);
    }

    logger.info(`adding ${candidate.section} extension ${extension}: ${text}`);
    primaries.set(extension, variant);
    sectionLines[candidate.section].push(text);
    directives.push({
      extension,
      variant,
      kind: 'synthesized',
      text,
      section: candidate.section,
      parsed,
    });
  }

  const setupLines = ['*static*', ...sectionLines.static];
  if (sectionLines.shared.length > 0) {
    setupLines.push('', '*shared*', ...sectionLines.shared);
  }
  setupLines.push('\n*disabled*\n', ...disabled, '');

  const makeLines = [...variantRules];
  for (const obj of [...extraCflags.keys()].sort()) {
    makeLines.push(`${obj}: PY_STDMODULE_CFLAGS += ${(extraCflags.get(obj) ?? []).join(' ')}`);
  }

  return {
    directives,
    disabled,
    setupLocal: setupLines.join('\n'),
    makeData: makeLines.length > 0 ? `${makeLines.join('\n')}\n` : '',
    extraCflags,
    sidecars,
  };
}

interface VariantRules {
  make: string[];
  objects: string[];
  sharedLib?: string;
}

/**
 * Compile each variant source to its own object and link them into a
 * variant-suffixed loadable module, so the variant never collides with the
 * primary build of the same sources.
 */
function variantBuildRules(
  parsed: ParsedDirective,
  triple: string,
  fullyStatic: boolean,
  extSuffix: string,
  depsPath: string,
  extraCflags: Map<string, string[]>,
): VariantRules {
  const { extension, variant } = parsed;
  const cflags: string[] = [];
  for (const define of parsed.defines) {
    if (!define.includes('=')) cflags.push(`-D${define}`);
  }
  for (const include of parsed.includes) cflags.push(`-I${include}`);
  const cflagText = cflags.length > 0 ? ` ${cflags.join(' ')}` : '';

  const make: string[] = [];
  const objects: string[] = [];
  for (const source of parsed.sources) {
    const obj = variantObjectPath(extension, variant, source);
    const src = `$(srcdir)/Modules/${source}`;
    objects.push(obj);
    make.push(`${obj}: ${src}`);
    make.push(`\t$(CC) $(PY_STDMODULE_CFLAGS) $(CCSHARED)${cflagText} -c ${src} -o ${obj}`);
    for (const define of parsed.defines) {
      if (!define.includes('=')) continue;
      const flags = extraCflags.get(obj) ?? [];
      flags.push(`-D${define}`);
      extraCflags.set(obj, flags);
    }
  }

  if (fullyStatic) {
    return { make, objects };
  }

  const ldflags: string[] = [...parsed.linkerArgs.filter(a => a.startsWith('-L'))];
  for (const lib of parsed.links) ldflags.push(...linkTokens(lib, triple, depsPath));
  if (isAppleTarget(triple)) {
    for (const framework of parsed.frameworks) ldflags.push('-framework', framework);
  }
  for (const arg of parsed.linkerArgs.filter(a => !a.startsWith('-L'))) ldflags.push('-Xlinker', arg);

  const sharedLib = `Modules/${extension}_${variant}${extSuffix}`;
  const ldflagText = ldflags.length > 0 ? ` ${ldflags.join(' ')}` : '';
  make.push(`${sharedLib}: ${objects.join(' ')}`);
  make.push(`\t$(BLDSHARED) ${objects.join(' ')}${ldflagText} -o ${sharedLib}`);
  make.push(`sharedmods: ${sharedLib}`);

  return { make, objects, sharedLib };
}
