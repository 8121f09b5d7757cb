import fs from 'fs/promises';
import path from 'path';
import YAML from 'yaml';
import { ArtifactTree, BuildVariables, BuildVariablesSchema } from '../types/index.js';
import { SchemaViolation, errorMessage } from './errors.js';
import { formatZodIssues } from './catalog-loader.js';

/**
 * Walk a compiled output tree. Paths are relative to `root`, use `/`
 * separators and come back sorted. Directories are not listed.
 */
export async function scanArtifactTree(root: string): Promise<ArtifactTree> {
  const found: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else {
        found.push(path.relative(root, full).split(path.sep).join('/'));
      }
    }
  }

  await walk(root);
  return found.sort();
}

/** Parse the build variables the built runtime reported about itself (JSON or YAML). */
export function parseBuildVariables(content: string): BuildVariables {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    throw new SchemaViolation(`build variables are not valid JSON or YAML: ${errorMessage(err)}`);
  }

  const result = BuildVariablesSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new SchemaViolation('build variables failed validation', formatZodIssues(result.error));
  }
  return result.data;
}

export async function loadBuildVariables(filePath: string): Promise<BuildVariables> {
  return parseBuildVariables(await fs.readFile(filePath, 'utf8'));
}

/** Object files under `build/<dir>/`. */
export function objectFilesUnder(tree: ArtifactTree, dirs: readonly string[]): string[] {
  return tree.filter(p => {
    if (!p.endsWith('.o')) return false;
    const parts = p.split('/');
    return parts[0] === 'build' && parts.length > 2 && dirs.includes(parts[1]);
  });
}

/**
 * Static archives directly under `build/lib/`, keyed by bare library name
 * (`build/lib/libz.a` → `z`).
 */
export function staticArchives(tree: ArtifactTree): Map<string, string> {
  const archives = new Map<string, string>();
  for (const p of tree) {
    const m = /^build\/lib\/lib([^/]+)\.a$/.exec(p);
    if (m) archives.set(m[1], p);
  }
  return archives;
}
