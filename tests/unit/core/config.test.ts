import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import YAML from 'yaml';
import { ConfigManager, cellName, targetOf } from '../../../src/core/config.js';
import { SchemaViolation } from '../../../src/core/errors.js';

describe('ConfigManager', () => {
  let tempDir: string;
  let manager: ConfigManager;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'distkit-config-test-'));
    manager = new ConfigManager(tempDir);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should initialize a new config file', async () => {
    const config = await manager.init({
      project: { name: 'Test' },
      target: { triple: 'aarch64-apple-darwin' },
    });

    expect(await manager.exists()).toBe(true);
    expect(config.project.name).toBe('Test');
    expect(config.target.triple).toBe('aarch64-apple-darwin');
    expect(config.target.python_version).toBe('3.13.1');
    expect(config.version).toBe('1.0');
  });

  it('should default the project name to the directory name', async () => {
    const config = await manager.init();
    expect(config.project.name).toBe(path.basename(tempDir));
  });

  it('should detect if config exists', async () => {
    expect(await manager.exists()).toBe(false);
    await manager.init({});
    expect(await manager.exists()).toBe(true);
  });

  it('should load and fill defaults', async () => {
    await manager.init({ project: { name: 'LoadTest' } });
    const config = await manager.load();

    expect(config.project.name).toBe('LoadTest');
    expect(config.paths.catalog).toBe('catalog/extension-modules.yml');
    expect(config.archive.mtime).toBe(1704067200);
    expect(config.licenses.ignore_packages).toEqual(['libressl']);
  });

  it('should update config section by section', async () => {
    await manager.init({ project: { name: 'Original' }, target: { build_options: 'debug' } });
    const updated = await manager.update({ target: { python_version: '3.12.8' }, archive: { owner: 'build' } });

    expect(updated.project.name).toBe('Original');
    expect(updated.target.build_options).toBe('debug');
    expect(updated.target.python_version).toBe('3.12.8');
    expect(updated.archive.owner).toBe('build');
    expect((await manager.load()).archive.owner).toBe('build');
  });

  it('should reject an invalid document on save', async () => {
    await manager.init({ project: { name: 'Broken' } });
    await expect(manager.save({ project: { name: 'Broken' }, archive: { mtime: -1 } })).rejects.toThrow(SchemaViolation);
    expect(YAML.parse(await fs.readFile(manager.configPath, 'utf8')).archive.mtime).toBe(1704067200);
  });

  it('should resolve paths against the project root', () => {
    expect(manager.resolve('dist/out.tar')).toBe(path.join(tempDir, 'dist', 'out.tar'));
  });
});

describe('targetOf / cellName', () => {
  it('describes the build cell', async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'distkit-config-test-'));
    try {
      const config = await new ConfigManager(tempDir).init({ project: { name: 'cell' } });
      const target = targetOf(config);

      expect(target.triple).toBe('x86_64-unknown-linux-gnu');
      expect([...target.buildOptions]).toEqual(['pgo', 'lto']);
      expect(cellName(config)).toBe('cpython-3.13-x86_64-unknown-linux-gnu-pgo+lto');
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });
});
