import path from 'path';
import { DEFAULT_VARIANT, ParsedDirective } from '../types/index.js';
import { MalformedDirectiveError } from './errors.js';
import { meetsMinimum } from './target-predicates.js';

// Grammar of one directive line:
//
//   directive := name word*
//   word      := source | '-D' define | '-I' path | '-l' lib | '-l:' archive
//              | '-L' path | '-framework' name | '-Xlinker' arg
//              | '-hidden-l' lib | archive | 'VARIANT=' tag
//   source    := any word ending in .c, .m, .cc or .cpp
//   archive   := any word ending in .a, linked by path
//
// '#' starts a comment that runs to the end of the line.

const SOURCE_SUFFIXES = ['.c', '.m', '.cc', '.cpp'];
const VARIANT_PREFIX = 'VARIANT=';
const HIDDEN_LINK_PREFIX = '-hidden-l';

export function stripComment(line: string): string {
  const idx = line.indexOf('#');
  return (idx === -1 ? line : line.slice(0, idx)).trim();
}

export function tokenizeDirective(line: string): string[] {
  const text = stripComment(line);
  return text ? text.split(/\s+/) : [];
}

export function isSourceToken(word: string): boolean {
  return SOURCE_SUFFIXES.some(s => word.endsWith(s));
}

export interface ParseOptions {
  /** Reject words the grammar does not know. Native files are parsed leniently. */
  strict?: boolean;
}

/** Parse a directive line. Blank and comment-only lines yield null. */
export function parseDirective(line: string, options: ParseOptions = {}): ParsedDirective | null {
  const words = tokenizeDirective(line);
  if (words.length === 0) return null;

  const [extension, ...rest] = words;
  const parsed: ParsedDirective = {
    extension,
    variant: DEFAULT_VARIANT,
    sources: [],
    defines: [],
    includes: [],
    links: [],
    frameworks: [],
    linkerArgs: [],
  };

  for (let i = 0; i < rest.length; i++) {
    const word = rest[i];

    if (word.startsWith(VARIANT_PREFIX)) {
      parsed.variant = word.slice(VARIANT_PREFIX.length);
    } else if (isSourceToken(word)) {
      parsed.sources.push(word);
    } else if (word.endsWith('.a') && !word.startsWith('-')) {
      parsed.links.push(word);
    } else if (word.startsWith('-D')) {
      parsed.defines.push(word.slice(2));
    } else if (word.startsWith('-I')) {
      parsed.includes.push(word.slice(2));
    } else if (word.startsWith('-l:')) {
      parsed.links.push(word.slice(3));
    } else if (word.startsWith('-l')) {
      parsed.links.push(word.slice(2));
    } else if (word.startsWith(HIDDEN_LINK_PREFIX)) {
      parsed.links.push(word.slice(HIDDEN_LINK_PREFIX.length));
    } else if (word.startsWith('-L')) {
      parsed.linkerArgs.push(word);
    } else if (word === '-framework' || word === '-Xlinker') {
      const arg = rest[i + 1];
      if (arg === undefined) {
        throw new MalformedDirectiveError(`${word} without an argument`, line);
      }
      i++;
      if (word === '-framework') {
        parsed.frameworks.push(arg);
      } else if (arg.startsWith(HIDDEN_LINK_PREFIX)) {
        parsed.links.push(arg.slice(HIDDEN_LINK_PREFIX.length));
      } else if (arg.endsWith('.a')) {
        parsed.links.push(arg);
      } else {
        parsed.linkerArgs.push(arg);
      }
    } else if (options.strict) {
      throw new MalformedDirectiveError(`unexpected token '${word}'`, line);
    }
  }

  return parsed;
}

/**
 * Object file produced for a source, relative to the build root. Since 3.11
 * sources in subdirectories keep their directory.
 */
export function objectPathForSource(source: string, pythonVersion: string): string {
  const stem = path.posix.basename(source).replace(/\.[^.]+$/, '');
  const dir = path.posix.dirname(source);
  if (dir !== '.' && meetsMinimum(pythonVersion, '3.11')) {
    return `Modules/${dir}/${stem}.o`;
  }
  return `Modules/${stem}.o`;
}

export function variantObjectPath(extension: string, variant: string, source: string): string {
  const stem = path.posix.basename(source).replace(/\.[^.]+$/, '');
  return `Modules/VARIANT-${extension}-${variant}-${stem}.o`;
}

export function variantSidecarName(extension: string, variant: string): string {
  return `VARIANT-${extension}-${variant}.data`;
}
