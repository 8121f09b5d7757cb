import fs from 'fs/promises';
import YAML from 'yaml';
import type { ZodError } from 'zod';
import { Catalog, CatalogSchema, ExtensionModuleSpec } from '../types/index.js';
import { SchemaViolation, errorMessage } from './errors.js';
import { TargetContext, conditionApplies } from './target-predicates.js';

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map(issue => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `${where}: ${issue.message}`;
  });
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Parse and validate an extension catalog document. Unknown keys anywhere in
 * the document are rejected.
 */
export function loadCatalog(content: string | Buffer): Catalog {
  const text = typeof content === 'string' ? content : content.toString('utf8');

  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (err) {
    throw new SchemaViolation(`extension catalog is not valid YAML: ${errorMessage(err)}`);
  }

  if (raw === null || raw === undefined) {
    raw = {};
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new SchemaViolation('extension catalog must be a mapping of extension name to metadata');
  }

  const result = CatalogSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new SchemaViolation(`extension catalog failed validation (${issues.length} issue(s))`, issues);
  }
  return deepFreeze(result.data);
}

export async function loadCatalogFile(filePath: string): Promise<Catalog> {
  const content = await fs.readFile(filePath, 'utf8');
  return loadCatalog(content);
}

/**
 * Whether the runtime's native Setup files already build this module for the
 * target. The last applicable conditional entry wins.
 */
export function isSetupEnabled(spec: Readonly<ExtensionModuleSpec>, ctx: TargetContext): boolean {
  let enabled = spec['setup-enabled'];
  for (const entry of spec['setup-enabled-conditional'] ?? []) {
    if (conditionApplies(entry, ctx)) enabled = entry.enabled;
  }
  return enabled;
}
