import chalk from 'chalk';
import YAML from 'yaml';
import { ConfigManager } from '../core/config.js';
import { DistkitError, errorMessage } from '../core/errors.js';

type ConfigValue = string | number | boolean | string[];

async function openConfig(): Promise<ConfigManager | null> {
  const configManager = new ConfigManager();
  if (!(await configManager.exists())) {
    console.error(chalk.red('[distkit] Not initialized. Run `distkit init` first.'));
    process.exitCode = 1;
    return null;
  }
  return configManager;
}

export const configGetCommand = async (key?: string) => {
  try {
    const configManager = await openConfig();
    if (!configManager) return;

    const config = await configManager.load();
    const value = key ? getNestedValue(config, key) : config;
    if (value === undefined) {
      console.error(chalk.red(`[distkit] Key '${key}' not found in config.`));
      process.exitCode = 1;
      return;
    }

    console.log(isRecord(value) || Array.isArray(value) ? YAML.stringify(value).trimEnd() : String(value));
  } catch (err) {
    console.error(chalk.red(`[distkit] Failed to read config: ${errorMessage(err)}`));
    process.exitCode = 1;
  }
};

/**
 * Set one dotted key. The raw text is read as the type the key already holds,
 * so `target.python_version 3.12` stays a string and `archive.mtime 0` a number.
 */
export const configSetCommand = async (key: string, raw: string) => {
  try {
    const configManager = await openConfig();
    if (!configManager) return;

    const draft: Record<string, unknown> = structuredClone(await configManager.load());
    const current = getNestedValue(draft, key);
    const parentKey = key.split('.').slice(0, -1).join('.');
    const section = parentKey ? getNestedValue(draft, parentKey) : draft;
    if (!isRecord(section) || isRecord(current)) {
      console.error(chalk.red(`[distkit] '${key}' is not a settable config key.`));
      process.exitCode = 1;
      return;
    }

    const value = coerceValue(raw, current);
    setNestedValue(draft, key, value);
    const saved = await configManager.save(draft);
    if (getNestedValue(saved, key) === undefined) {
      console.error(chalk.red(`[distkit] '${key}' is not a settable config key.`));
      process.exitCode = 1;
      return;
    }

    console.log(chalk.green(`[distkit] Set ${key} = ${JSON.stringify(value)}`));
  } catch (err) {
    console.error(chalk.red(`[distkit] Failed to update config: ${errorMessage(err)}`));
    if (err instanceof DistkitError) {
      for (const detail of err.details) console.error(chalk.red(`  - ${detail}`));
    }
    process.exitCode = 1;
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getNestedValue(obj: Record<string, unknown>, key: string): unknown {
  return key.split('.').reduce<unknown>((acc, part) => (isRecord(acc) ? acc[part] : undefined), obj);
}

export function setNestedValue(obj: Record<string, unknown>, key: string, value: unknown): void {
  const parts = key.split('.');
  const last = parts.pop() ?? key;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/** `[a, b]` and `a,b` are lists; everything else is taken literally. */
export function parseList(raw: string): string[] {
  const inner = raw.startsWith('[') && raw.endsWith(']') ? raw.slice(1, -1) : raw;
  return inner.split(',').map(s => s.trim()).filter(Boolean);
}

export function coerceValue(raw: string, current: unknown): ConfigValue {
  if (Array.isArray(current)) return parseList(raw);
  if (typeof current === 'number') {
    const num = Number(raw);
    return raw.trim() !== '' && !isNaN(num) ? num : raw;
  }
  if (typeof current === 'boolean') {
    if (raw === 'true') return true;
    if (raw === 'false') return false;
  }
  return raw;
}
