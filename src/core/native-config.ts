import fs from 'fs/promises';
import { NativeExtensionIndex, ParsedDirective } from '../types/index.js';
import { MalformedDirectiveError } from './errors.js';
import { parseDirective, stripComment } from './setup-grammar.js';

export type SetupSection = 'static' | 'shared' | 'disabled';

export interface ParsedSetupFile {
  static: Map<string, ParsedDirective>;
  shared: Map<string, ParsedDirective>;
  disabled: Set<string>;
}

const SECTION_MARKERS: Record<string, SetupSection> = {
  '*static*': 'static',
  '*shared*': 'shared',
  '*disabled*': 'disabled',
};

// `*@MODULE_BUILDTYPE@*`: a marker whose section configure fills in.
const SUBSTITUTED_MARKER = /^\*@([A-Z0-9_]+)@\*$/;
const ANY_MARKER = /^\*\S*\*$/;

export interface SetupParseOptions {
  /** Section configure substitutes for `*@MODULE_BUILDTYPE@*`. */
  moduleBuildType?: 'static' | 'shared';
}

function sectionForMarker(line: string, options: SetupParseOptions): SetupSection | null {
  const known = SECTION_MARKERS[line];
  if (known) return known;
  if (!ANY_MARKER.test(line)) return null;

  const m = SUBSTITUTED_MARKER.exec(line);
  if (m && m[1] === 'MODULE_BUILDTYPE') return options.moduleBuildType ?? 'shared';
  throw new MalformedDirectiveError('unknown section marker', line);
}

// `NAME=value` lines define make variables rather than modules.
const VARIABLE_LINE = /^[A-Za-z_][A-Za-z0-9_]*\s*\+?=/;
// configure substitutes these with '' (enabled) or '#' (disabled).
const CONFIGURE_GUARD = /^@[A-Z0-9_]+@/;

/**
 * Parse a native Setup file. Lines before the first section marker belong to
 * the static section.
 */
export function parseSetupFile(
  text: string,
  into?: ParsedSetupFile,
  options: SetupParseOptions = {},
): ParsedSetupFile {
  const result: ParsedSetupFile = into ?? { static: new Map(), shared: new Map(), disabled: new Set() };
  let section: SetupSection = 'static';

  for (const rawLine of text.split(/\r?\n/)) {
    const line = stripComment(rawLine).replace(CONFIGURE_GUARD, '');
    if (!line) continue;

    const marker = sectionForMarker(line, options);
    if (marker) {
      section = marker;
      continue;
    }
    if (VARIABLE_LINE.test(line)) continue;

    if (section === 'disabled') {
      for (const name of line.split(/\s+/)) result.disabled.add(name);
      continue;
    }

    const parsed = parseDirective(line);
    if (!parsed) continue;
    const target = result[section];
    if (!target.has(parsed.extension)) {
      target.set(parsed.extension, parsed);
    }
  }

  return result;
}

const INITTAB_START = 'struct _inittab';
const INITTAB_SENTINEL = '/* Sentinel */';
const INITTAB_ENTRY = /\{"([^"]+)",\s*([^}]+?)\s*\},/;

/**
 * Parse the init-function table of a `config.c` style document. Entries with a
 * NULL initializer are interpreter pseudo-modules and are skipped.
 */
export function parseInitTable(text: string): Map<string, string> {
  const entries = new Map<string, string>();
  let seenStart = false;

  for (const line of text.split(/\r?\n/)) {
    if (line.startsWith(INITTAB_START)) seenStart = true;
    if (!seenStart) continue;
    if (line.includes(INITTAB_SENTINEL)) break;

    const m = INITTAB_ENTRY.exec(line);
    if (m && m[2] !== 'NULL') {
      entries.set(m[1], m[2]);
    }
  }

  return entries;
}

export function buildNativeIndex(
  setupTexts: readonly string[],
  initTableText: string,
  options: SetupParseOptions = {},
): NativeExtensionIndex {
  const setup: ParsedSetupFile = { static: new Map(), shared: new Map(), disabled: new Set() };
  for (const text of setupTexts) parseSetupFile(text, setup, options);

  return {
    static: setup.static,
    shared: setup.shared,
    disabled: setup.disabled,
    initTable: parseInitTable(initTableText),
  };
}

export async function loadNativeIndex(
  setupPaths: readonly string[],
  initTablePath: string,
  options: SetupParseOptions = {},
): Promise<NativeExtensionIndex> {
  const setupTexts = await Promise.all(setupPaths.map(p => fs.readFile(p, 'utf8')));
  const initTable = await fs.readFile(initTablePath, 'utf8');
  return buildNativeIndex(setupTexts, initTable, options);
}

/** Modules the native Setup files build (static or shared). */
export function nativeEnabledModules(index: NativeExtensionIndex): Set<string> {
  return new Set([...index.static.keys(), ...index.shared.keys()]);
}

/** Every module the native files mention, including disabled ones. */
export function nativeDeclaredModules(index: NativeExtensionIndex): Set<string> {
  return new Set([...nativeEnabledModules(index), ...index.disabled, ...index.initTable.keys()]);
}

export function nativeDirective(index: NativeExtensionIndex, name: string): ParsedDirective | undefined {
  return index.static.get(name) ?? index.shared.get(name);
}
