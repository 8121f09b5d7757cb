import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { manifestCommand } from '../../../src/commands/manifest.js';
import { packageCommand } from '../../../src/commands/package.js';
import { readArchive } from '../../../src/core/archive-packager.js';
import { createProject } from './project-fixture.js';

describe('packageCommand', () => {
  let tempDir: string;
  let originalCwd: () => string;
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'distkit-package-cmd-test-'));
    originalCwd = process.cwd;
    process.cwd = () => tempDir;
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    process.cwd = originalCwd;
    process.exitCode = undefined;
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should archive the built tree with the manifest first', async () => {
    await createProject(tempDir);

    await manifestCommand();
    await packageCommand();

    const outPath = path.join(tempDir, 'dist', 'cpython-3.13-x86_64-unknown-linux-gnu-pgo.tar');
    const members = await readArchive(await fs.readFile(outPath));

    expect(logSpy.mock.calls.flat().join('\n')).toContain(`[distkit] Archive written to ${outPath}`);
    expect(members.map(m => m.name)).toEqual([
      'python/PYTHON.json',
      'python/build/Modules/_bisectmodule.o',
      'python/build/Modules/_json.o',
      'python/build/Modules/_math.o',
      'python/build/Modules/mathmodule.o',
      'python/build/Modules/zlibmodule.o',
      'python/build/Objects/abstract.o',
      'python/build/Python/ceval.o',
      'python/build/lib/libz.a',
      'python/install/lib/libpython3.13.a',
    ]);
    expect(members[0].content.toString('utf8')).toBe(
      await fs.readFile(path.join(tempDir, 'dist', 'PYTHON.json'), 'utf8'),
    );
    expect(members.every(m => m.uname === 'root' && m.mtime.getTime() === 1704067200 * 1000)).toBe(true);
  });

  it('should produce identical archives on repeated runs', async () => {
    await createProject(tempDir);

    await packageCommand({ out: 'first.tar' });
    await fs.utimes(path.join(tempDir, 'out', 'python', 'build', 'lib', 'libz.a'), new Date(0), new Date(0));
    await packageCommand({ out: 'second.tar' });

    const first = await fs.readFile(path.join(tempDir, 'first.tar'));
    const second = await fs.readFile(path.join(tempDir, 'second.tar'));
    expect(second.equals(first)).toBe(true);
  });
});
