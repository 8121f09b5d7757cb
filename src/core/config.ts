import fs from 'fs/promises';
import path from 'path';
import YAML from 'yaml';
import { DistkitConfig, DistkitConfigPatch, DistkitConfigSchema } from '../types/index.js';
import { atomicWrite, withLock } from './atomic-fs.js';
import { formatZodIssues } from './catalog-loader.js';
import { SchemaViolation } from './errors.js';
import { BuildOptions, TargetContext, parseBuildOptions } from './target-predicates.js';

export class ConfigManager {
  public configPath: string;
  public distkitDir: string;
  public baseDir: string;

  constructor(baseDir: string = process.cwd()) {
    this.baseDir = baseDir;
    this.distkitDir = path.join(baseDir, '.distkit');
    this.configPath = path.join(this.distkitDir, 'config.yaml');
  }

  async init(data: DistkitConfigPatch = {}): Promise<DistkitConfig> {
    await fs.mkdir(this.distkitDir, { recursive: true });

    const config = this.parse({
      version: '1.0',
      project: {
        name: data.project?.name || path.basename(this.baseDir),
      },
      target: { ...data.target },
      paths: { ...data.paths },
      archive: { ...data.archive },
      licenses: { ...data.licenses },
    });

    await atomicWrite(this.configPath, YAML.stringify(config));
    return config;
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.configPath);
      return true;
    } catch {
      return false;
    }
  }

  async load(): Promise<DistkitConfig> {
    const content = await fs.readFile(this.configPath, 'utf8');
    return this.parse(YAML.parse(content));
  }

  async update(patch: DistkitConfigPatch): Promise<DistkitConfig> {
    return withLock(this.configPath, async () => {
      const current = await this.load();
      const config = this.parse({
        ...current,
        project: { ...current.project, ...patch.project },
        target: { ...current.target, ...patch.target },
        paths: { ...current.paths, ...patch.paths },
        archive: { ...current.archive, ...patch.archive },
        licenses: { ...current.licenses, ...patch.licenses },
      });
      await atomicWrite(this.configPath, YAML.stringify(config));
      return config;
    });
  }

  /** Replace the whole document after validating it. */
  async save(raw: unknown): Promise<DistkitConfig> {
    return withLock(this.configPath, async () => {
      const config = this.parse(raw);
      await atomicWrite(this.configPath, YAML.stringify(config));
      return config;
    });
  }

  /** Resolve a configured path against the project root. */
  resolve(relative: string): string {
    return path.resolve(this.baseDir, relative);
  }

  private parse(raw: unknown): DistkitConfig {
    const result = DistkitConfigSchema.safeParse(raw);
    if (!result.success) {
      throw new SchemaViolation(`${this.configPath} failed validation`, formatZodIssues(result.error));
    }
    return result.data;
  }
}

/** The build cell a configuration describes. */
export function targetOf(config: DistkitConfig): TargetContext & { buildOptions: BuildOptions } {
  return {
    triple: config.target.triple,
    pythonVersion: config.target.python_version,
    buildOptions: parseBuildOptions(config.target.build_options),
  };
}

/** Build-cell name used as the log prefix, e.g. `cpython-3.13-x86_64-unknown-linux-gnu-pgo+lto`. */
export function cellName(config: DistkitConfig): string {
  const [major, minor] = config.target.python_version.split('.');
  const options = config.target.build_options ? `-${config.target.build_options}` : '';
  return `cpython-${major}.${minor}-${config.target.triple}${options}`;
}
