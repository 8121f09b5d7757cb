import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { normalizeCommand } from '../../../src/commands/normalize.js';
import { encodeArchive, readArchive } from '../../../src/core/archive-packager.js';
import { ConfigManager } from '../../../src/core/config.js';
import type { ArchiveMember } from '../../../src/types/index.js';

function file(name: string, mode: number): ArchiveMember {
  return {
    name,
    type: 'file',
    mode,
    mtime: new Date('2022-02-02T00:00:00Z'),
    uid: 1000,
    gid: 1000,
    uname: 'builder',
    gname: 'builder',
    content: Buffer.from(name),
  };
}

describe('normalizeCommand', () => {
  let tempDir: string;
  let originalCwd: () => string;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'distkit-normalize-test-'));
    originalCwd = process.cwd;
    process.cwd = () => tempDir;
    vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    process.cwd = originalCwd;
    process.exitCode = undefined;
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should canonicalize a tar file without a project', async () => {
    const input = path.join(tempDir, 'in.tar');
    const output = path.join(tempDir, 'out.tar');
    await fs.writeFile(input, await encodeArchive([
      file('python/lib/b.txt', 0o600),
      file('python/PYTHON.json', 0o644),
      file('python/bin/a', 0o700),
    ]));

    await normalizeCommand(input, output);

    const members = await readArchive(await fs.readFile(output));
    expect(members.map(m => [m.name, m.mode, m.uname])).toEqual([
      ['python/PYTHON.json', 0o664, 'root'],
      ['python/bin/a', 0o770, 'root'],
      ['python/lib/b.txt', 0o660, 'root'],
    ]);
  });

  it('should use the archive settings of an initialized project', async () => {
    await new ConfigManager(tempDir).init({ archive: { owner: 'build', mtime: 86400, metadata_member: 'python/bin/a' } });
    const input = path.join(tempDir, 'in.tar');
    const output = path.join(tempDir, 'out.tar');
    await fs.writeFile(input, await encodeArchive([file('python/PYTHON.json', 0o644), file('python/bin/a', 0o755)]));

    await normalizeCommand(input, output);

    const members = await readArchive(await fs.readFile(output));
    expect(members.map(m => m.name)).toEqual(['python/bin/a', 'python/PYTHON.json']);
    expect(members[0].uname).toBe('build');
    expect(members[0].mtime.getTime()).toBe(86400 * 1000);
  });

  it('should fail on a file that is not a tar stream', async () => {
    const input = path.join(tempDir, 'garbage.tar');
    await fs.writeFile(input, Buffer.alloc(1024, 0x41));

    await normalizeCommand(input, path.join(tempDir, 'out.tar'));

    expect(errorSpy.mock.calls.flat().join('\n')).toContain(
      '[distkit] Normalization failed: archive is not a readable tar stream',
    );
    expect(process.exitCode).toBe(1);
  });
});
