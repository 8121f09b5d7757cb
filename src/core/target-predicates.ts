import { SchemaViolation } from './errors.js';
import type { Condition } from '../types/index.js';

export const BUILD_OPTION_FLAGS = ['debug', 'noopt', 'pgo', 'lto', 'freethreaded', 'static'] as const;

export type BuildOptionFlag = (typeof BUILD_OPTION_FLAGS)[number];
export type BuildOptions = ReadonlySet<BuildOptionFlag>;

export interface TargetContext {
  triple: string;
  pythonVersion: string;
}

function majorMinor(version: string): [number, number] {
  const m = /^(\d+)\.(\d+)/.exec(version.trim());
  if (!m) {
    throw new SchemaViolation(`invalid version '${version}': expected major.minor`);
  }
  return [Number(m[1]), Number(m[2])];
}

function compareVersions(a: string, b: string): number {
  const [aMajor, aMinor] = majorMinor(a);
  const [bMajor, bMinor] = majorMinor(b);
  return aMajor !== bMajor ? aMajor - bMajor : aMinor - bMinor;
}

/** `actual` is at least `wanted`, comparing major.minor only. */
export function meetsMinimum(actual: string, wanted: string): boolean {
  return compareVersions(actual, wanted) >= 0;
}

/** `actual` is at most `wanted`, comparing major.minor only. */
export function meetsMaximum(actual: string, wanted: string): boolean {
  return compareVersions(actual, wanted) <= 0;
}

const patternCache = new Map<string, RegExp>();

function fullMatch(pattern: string): RegExp {
  let re = patternCache.get(pattern);
  if (!re) {
    try {
      re = new RegExp(`^(?:${pattern})$`);
    } catch (err) {
      throw new SchemaViolation(`invalid target pattern '${pattern}'`, [String(err)]);
    }
    patternCache.set(pattern, re);
  }
  return re;
}

/** True iff at least one pattern fully matches the triple. */
export function matchesAnyTarget(triple: string, patterns: readonly string[]): boolean {
  return patterns.some(p => fullMatch(p).test(triple));
}

/**
 * A conditional catalog entry applies when its target patterns (if any) match
 * and its version bounds (if any) hold.
 */
export function conditionApplies(condition: Condition, ctx: TargetContext): boolean {
  if (condition.targets && !matchesAnyTarget(ctx.triple, condition.targets)) return false;
  const min = condition['minimum-python-version'];
  if (min && !meetsMinimum(ctx.pythonVersion, min)) return false;
  const max = condition['maximum-python-version'];
  if (max && !meetsMaximum(ctx.pythonVersion, max)) return false;
  return true;
}

export function isAppleTarget(triple: string): boolean {
  return triple.includes('-apple-');
}

export function isMuslTarget(triple: string): boolean {
  return triple.includes('-musl');
}

/** Targets where no dynamically loadable module can be produced. */
export function isFullyStaticTarget(triple: string, options: BuildOptions): boolean {
  return isMuslTarget(triple) || options.has('static');
}

function isBuildOptionFlag(value: string): value is BuildOptionFlag {
  return (BUILD_OPTION_FLAGS as readonly string[]).includes(value);
}

/** Parse `pgo+lto` style option strings. */
export function parseBuildOptions(value: string): BuildOptions {
  const flags = new Set<BuildOptionFlag>();
  for (const raw of value.split('+')) {
    const flag = raw.trim();
    if (!flag) continue;
    if (!isBuildOptionFlag(flag)) {
      throw new SchemaViolation(`unknown build option '${flag}' in '${value}'`, [
        `known options: ${BUILD_OPTION_FLAGS.join(', ')}`,
      ]);
    }
    flags.add(flag);
  }
  return flags;
}

/** Canonical `+`-joined form, flags in declaration order. */
export function formatBuildOptions(options: BuildOptions): string {
  return BUILD_OPTION_FLAGS.filter(f => options.has(f)).join('+');
}
